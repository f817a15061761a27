// packages/workbook/src/xlsx-sheet.ts
import * as XLSX from "xlsx";
import { ABSENT, toRawCell } from "../../cells/src/raw-cell.js";
import type { RawCell } from "../../cells/src/raw-cell.js";
import type { Sheet } from "../../tables/src/sheet.js";

export type WorkbookSheetOptions = {
  sheet_name?: string | null; // default: first worksheet
};

/* ---- Reading ---- */

/** Plain-text inputs (CSV) keep every value as text, so long numeric ids keep their digits. */
export function readWorkbook(bytes: Uint8Array): XLSX.WorkBook {
  return XLSX.read(bytes, { type: Buffer.isBuffer(bytes) ? "buffer" : "array", raw: true });
}

/**
 * Decode a workbook and expose one worksheet through the `Sheet` contract.
 * Error cells read as absent; formulas read as their cached value. CSV cells
 * arrive as text and go through the same normalizers as text cells in XLSX.
 */
export function readWorkbookSheet(bytes: Uint8Array, opts: WorkbookSheetOptions = {}): Sheet {
  const wb = readWorkbook(bytes);
  return worksheetAsSheet(pickWorksheet(wb, opts.sheet_name ?? null));
}

export function pickWorksheet(wb: XLSX.WorkBook, sheet_name: string | null): XLSX.WorkSheet {
  const name = sheet_name ?? wb.SheetNames[0];
  const ws = name === undefined ? undefined : wb.Sheets[name];
  if (!ws) {
    const available = wb.SheetNames.length > 0 ? wb.SheetNames.join(", ") : "(none)";
    throw new Error(`Worksheet '${name ?? ""}' not found; available: ${available}`);
  }
  return ws;
}

export function worksheetAsSheet(ws: XLSX.WorkSheet): Sheet {
  const ref = ws["!ref"];
  const range = ref ? XLSX.utils.decode_range(ref) : null;

  return {
    max_row: range ? range.e.r + 1 : 0,
    max_column: range ? range.e.c + 1 : 0,
    cell(row: number, col: number): RawCell {
      if (row < 1 || col < 1) return ABSENT;
      const c: unknown = ws[XLSX.utils.encode_cell({ r: row - 1, c: col - 1 })];
      return isCellObject(c) ? cellToRaw(c) : ABSENT;
    },
  };
}

/* ---- Writing ---- */

export function writeWorkbook(wb: XLSX.WorkBook): Buffer {
  const out: unknown = XLSX.write(wb, { type: "buffer", bookType: "xlsx" });
  if (!Buffer.isBuffer(out)) throw new Error("xlsx: expected a Buffer from workbook write");
  return out;
}

/**
 * Set one cell, growing the sheet's used range to cover it. Writes that land
 * inside a merged range go to the range's top-left cell. Clearing a covered
 * cell of a merge is a no-op; a clear never touches the anchor.
 */
export function setCell(ws: XLSX.WorkSheet, row: number, col: number, value: string | number | null): void {
  const raw: XLSX.CellAddress = { r: row - 1, c: col - 1 };
  const at = mergeAnchor(ws, raw);

  if (value === null) {
    if (at.r === raw.r && at.c === raw.c) delete ws[XLSX.utils.encode_cell(raw)];
    return;
  }

  ws[XLSX.utils.encode_cell(at)] = typeof value === "number" ? { t: "n", v: value } : { t: "s", v: value };

  const ref = ws["!ref"];
  const range = ref ? XLSX.utils.decode_range(ref) : { s: { ...at }, e: { ...at } };
  range.s.r = Math.min(range.s.r, at.r);
  range.s.c = Math.min(range.s.c, at.c);
  range.e.r = Math.max(range.e.r, at.r);
  range.e.c = Math.max(range.e.c, at.c);
  ws["!ref"] = XLSX.utils.encode_range(range);
}

/* ---- internals ---- */

function mergeAnchor(ws: XLSX.WorkSheet, at: XLSX.CellAddress): XLSX.CellAddress {
  for (const m of ws["!merges"] ?? []) {
    if (at.r >= m.s.r && at.r <= m.e.r && at.c >= m.s.c && at.c <= m.e.c) return { r: m.s.r, c: m.s.c };
  }
  return at;
}

function isCellObject(v: unknown): v is XLSX.CellObject {
  return typeof v === "object" && v !== null && "t" in v;
}

function cellToRaw(c: XLSX.CellObject): RawCell {
  if (c.t === "e" || c.t === "z") return ABSENT;
  return toRawCell(c.v);
}
