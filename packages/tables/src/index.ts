// ---------- Sheets (stable public API) ----------
export { sheetFromRows } from "./sheet.js";
export type { Sheet } from "./sheet.js";

// ---------- Header resolution ----------
export { resolveColumns, requireColumns, describeSearch } from "./headers.js";
export type { HeaderSearch, FieldRequirement, ColumnResolution } from "./headers.js";

export { TableLoadError } from "./errors.js";
export type { TableName } from "./errors.js";

// ---------- Lookup tables ----------
export { loadPricelist } from "./pricelist.js";
export type {
  Pricelist,
  PricelistLayout,
  TierColumn,
  TierPrices,
  SkippedTableRow,
  TableLoad,
} from "./pricelist.js";

export { loadAddonTable } from "./addons.js";
export type { AddonLayout, AddonPriceTable } from "./addons.js";

// ---------- Input sheets ----------
export { readInputRows } from "./input.js";
export type { InputField, InputLayout, InputRead, InputRow, RowRef } from "./input.js";
