// packages/tables/src/addons.ts
import { normalizeAddonCode, normalizePrice } from "../../cells/src/normalize.js";
import type { AddonCode, CanonicalPrice } from "../../cells/src/normalize.js";
import { rescale, DEFAULT_MAGNITUDE_RULE } from "../../cells/src/magnitude.js";
import type { MagnitudeRule } from "../../cells/src/magnitude.js";
import type { Sheet } from "./sheet.js";
import { requireColumns } from "./headers.js";
import type { HeaderSearch } from "./headers.js";
import type { SkippedTableRow, TableLoad } from "./pricelist.js";

export type AddonLayout = {
  header: HeaderSearch;
  code_column: readonly string[];
  price_column: readonly string[];
};

export type AddonPriceTable = ReadonlyMap<AddonCode, CanonicalPrice>;

export function loadAddonTable(
  sheet: Sheet,
  layout: AddonLayout,
  magnitude: Readonly<MagnitudeRule> = DEFAULT_MAGNITUDE_RULE
): TableLoad<AddonPriceTable> {
  const { header_row, columns } = requireColumns("addons", sheet, layout.header, [
    { name: "addon_code", synonyms: layout.code_column },
    { name: "price", synonyms: layout.price_column },
  ]);

  const entries = new Map<AddonCode, CanonicalPrice>();
  const skipped_rows: SkippedTableRow[] = [];

  for (let r = header_row + 1; r <= sheet.max_row; r++) {
    const code = normalizeAddonCode(sheet.cell(r, columns.addon_code));
    if (!code) continue;

    const price = normalizePrice(sheet.cell(r, columns.price));
    if (price == null) {
      skipped_rows.push({ row: r, key: code, reason_code: "NO_PRICE" });
      continue;
    }

    entries.set(code, rescale(price, magnitude));
  }

  return { entries, header_row, skipped_rows };
}
