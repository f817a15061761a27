// packages/tables/src/input.ts
import { normalizeIdentifier, normalizePrice } from "../../cells/src/normalize.js";
import type { CanonicalId, CanonicalPrice } from "../../cells/src/normalize.js";
import type { Sheet } from "./sheet.js";
import { requireColumns } from "./headers.js";
import type { HeaderSearch } from "./headers.js";

export type InputField = "product_id" | "sku_id" | "price" | "stock" | "seller_sku";

export type InputLayout = {
  header: HeaderSearch;
  // first data row; rows between the header and this one are template notes
  data_start_row?: number | null;
  columns: Record<InputField, readonly string[]>;
};

export type RowRef = {
  file: string | null;
  row: number;
};

export type InputRow = {
  ref: RowRef;
  product_id: CanonicalId;
  sku_id: CanonicalId;
  seller_sku: CanonicalId;
  current_price: CanonicalPrice | null; // listing's price before this run, reference only
  stock: number | null;
};

export type InputRead = {
  rows: InputRow[];
  header_row: number;
  columns: Record<InputField, number>;
};

const INPUT_FIELDS: readonly InputField[] = ["product_id", "sku_id", "price", "stock", "seller_sku"];

export function readInputRows(sheet: Sheet, layout: InputLayout, file: string | null = null): InputRead {
  const { header_row, columns } = requireColumns(
    "input",
    sheet,
    layout.header,
    INPUT_FIELDS.map((name) => ({ name, synonyms: layout.columns[name] }))
  );

  const start = Math.max(layout.data_start_row ?? header_row + 1, header_row + 1);
  const rows: InputRow[] = [];

  for (let r = start; r <= sheet.max_row; r++) {
    rows.push({
      ref: { file, row: r },
      product_id: normalizeIdentifier(sheet.cell(r, columns.product_id)),
      sku_id: normalizeIdentifier(sheet.cell(r, columns.sku_id)),
      seller_sku: normalizeIdentifier(sheet.cell(r, columns.seller_sku)),
      // no magnitude rescale: these are pass-through values
      current_price: normalizePrice(sheet.cell(r, columns.price)),
      stock: normalizePrice(sheet.cell(r, columns.stock)),
    });
  }

  return { rows, header_row, columns };
}
