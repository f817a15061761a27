// packages/tables/src/pricelist.ts
import { normalizePrice, normalizeText } from "../../cells/src/normalize.js";
import type { CanonicalPrice } from "../../cells/src/normalize.js";
import { rescale, DEFAULT_MAGNITUDE_RULE } from "../../cells/src/magnitude.js";
import type { MagnitudeRule } from "../../cells/src/magnitude.js";
import type { Sheet } from "./sheet.js";
import { requireColumns } from "./headers.js";
import type { FieldRequirement, HeaderSearch } from "./headers.js";

export type TierColumn = {
  label: string; // canonical tier id, e.g. "M3"
  synonyms: readonly string[];
};

export type PricelistLayout = {
  header: HeaderSearch;
  sku_column: readonly string[];
  tiers: readonly TierColumn[];
};

export type TierPrices = ReadonlyMap<string, CanonicalPrice>;

/** base SKU (trimmed, case-sensitive) -> tier label -> price */
export type Pricelist = ReadonlyMap<string, TierPrices>;

export type SkippedTableRow = {
  row: number;
  key: string;
  reason_code: "NO_PRICE";
};

export type TableLoad<T> = {
  entries: T;
  header_row: number;
  skipped_rows: SkippedTableRow[];
};

const SKU_FIELD = "SKU";

export function loadPricelist(
  sheet: Sheet,
  layout: PricelistLayout,
  magnitude: Readonly<MagnitudeRule> = DEFAULT_MAGNITUDE_RULE
): TableLoad<Pricelist> {
  const fields: FieldRequirement[] = [
    { name: SKU_FIELD, synonyms: layout.sku_column },
    ...layout.tiers.map((t) => ({ name: t.label, synonyms: t.synonyms })),
  ];

  const { header_row, columns } = requireColumns("pricelist", sheet, layout.header, fields);

  const entries = new Map<string, Map<string, CanonicalPrice>>();
  const skipped_rows: SkippedTableRow[] = [];

  for (let r = header_row + 1; r <= sheet.max_row; r++) {
    const sku = normalizeText(sheet.cell(r, columns[SKU_FIELD]));
    if (!sku) continue;

    const parsed = new Map<string, CanonicalPrice>();
    for (const t of layout.tiers) {
      const p = normalizePrice(sheet.cell(r, columns[t.label]));
      if (p != null) parsed.set(t.label, rescale(p, magnitude));
    }

    if (parsed.size === 0) {
      skipped_rows.push({ row: r, key: sku, reason_code: "NO_PRICE" });
      continue;
    }

    // duplicates: last write wins, per tier
    const prev = entries.get(sku);
    entries.set(sku, new Map([...(prev ?? []), ...parsed]));
  }

  return { entries, header_row, skipped_rows };
}
