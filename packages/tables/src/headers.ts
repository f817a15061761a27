// packages/tables/src/headers.ts
import { normalizeText } from "../../cells/src/normalize.js";
import type { Sheet } from "./sheet.js";
import { TableLoadError } from "./errors.js";
import type { TableName } from "./errors.js";

export type HeaderSearch =
  | { kind: "fixed"; row: number }
  | { kind: "scan"; first_row: number; last_row: number };

export type FieldRequirement<F extends string = string> = {
  name: F;
  synonyms: readonly string[];
};

export type ColumnResolution<F extends string = string> =
  | { ok: true; header_row: number; columns: Record<F, number> }
  | { ok: false; missing: F[]; best_row: number | null; message: string };

/**
 * Locate the header row and map each logical field to a 1-based column.
 *
 * Matching is case-insensitive on trimmed text; when a header label repeats
 * in one row the left-most column wins. Synonyms are tried in listed order.
 * The first row in range that satisfies every field is the header row.
 */
export function resolveColumns<F extends string>(
  sheet: Sheet,
  search: HeaderSearch,
  fields: ReadonlyArray<FieldRequirement<F>>
): ColumnResolution<F> {
  const [first, last] = searchBounds(search);

  let best: { row: number; matched: number; missing: F[] } | null = null;

  for (let r = first; r <= Math.min(last, sheet.max_row); r++) {
    const headerMap = headerMapForRow(sheet, r);
    const columns: Partial<Record<F, number>> = {};
    const missing: F[] = [];

    for (const f of fields) {
      const col = firstSynonymColumn(headerMap, f.synonyms);
      if (col == null) missing.push(f.name);
      else columns[f.name] = col;
    }

    if (hasAllColumns(fields, columns)) {
      return { ok: true, header_row: r, columns };
    }

    const matched = fields.length - missing.length;
    if (!best || matched > best.matched) best = { row: r, matched, missing };
  }

  const missing = best && best.matched > 0 ? best.missing : fields.map((f) => f.name);
  const best_row = best && best.matched > 0 ? best.row : null;

  return {
    ok: false,
    missing,
    best_row,
    message: `Header not found in ${describeSearch(search)}; missing columns: ${missing.join(", ")}.`,
  };
}

/**
 * resolveColumns for loaders: a failure is fatal for the whole table.
 */
export function requireColumns<F extends string>(
  table: TableName,
  sheet: Sheet,
  search: HeaderSearch,
  fields: ReadonlyArray<FieldRequirement<F>>
): { header_row: number; columns: Record<F, number> } {
  const res = resolveColumns(sheet, search, fields);
  if (!res.ok) {
    throw new TableLoadError({
      table,
      missing: res.missing,
      header_search: describeSearch(search),
      message: `${table}: ${res.message}`,
    });
  }
  return { header_row: res.header_row, columns: res.columns };
}

export function describeSearch(search: HeaderSearch): string {
  return search.kind === "fixed"
    ? `row ${search.row}`
    : `rows ${search.first_row}-${search.last_row}`;
}

/* ------------------------------ internals ----------------------------- */

function searchBounds(search: HeaderSearch): [number, number] {
  return search.kind === "fixed"
    ? [search.row, search.row]
    : [search.first_row, search.last_row];
}

function headerMapForRow(sheet: Sheet, row: number): Map<string, number> {
  const m = new Map<string, number>();
  for (let c = 1; c <= sheet.max_column; c++) {
    const key = normalizeText(sheet.cell(row, c)).toLowerCase();
    if (key && !m.has(key)) m.set(key, c);
  }
  return m;
}

function firstSynonymColumn(headerMap: Map<string, number>, synonyms: readonly string[]): number | null {
  for (const s of synonyms) {
    const col = headerMap.get(s.trim().toLowerCase());
    if (col != null) return col;
  }
  return null;
}

function hasAllColumns<F extends string>(
  fields: ReadonlyArray<FieldRequirement<F>>,
  columns: Partial<Record<F, number>>
): columns is Record<F, number> {
  return fields.every((f) => columns[f.name] != null);
}
