// packages/workbook/src/shapes.ts
import * as XLSX from "xlsx";
import type { OutputRow } from "../../pricing/src/batch.js";
import { pickWorksheet, readWorkbook, setCell, writeWorkbook } from "./xlsx-sheet.js";

export type OutputArtifact = {
  file_name: string;
  bytes: Buffer;
};

/**
 * Strategy that turns priced rows into one upload artifact.
 * `splittable` shapes may be rendered once per chunk by `renderOutput`.
 */
export type OutputShape = {
  readonly name: string;
  readonly splittable: boolean;
  render(rows: readonly OutputRow[], file_name: string): OutputArtifact;
};

// Row 1 of the marketplace "product discount" upload template.
export const OUTPUT_HEADERS = [
  "Product_id (wajib)",
  "SKU_id (wajib)",
  "Harga Penawaran (wajib)",
  "Total Stok Promosi (optional)\n1. Total Stok Promosi≤ Stok\n2. Jika tidak diisi artinya tidak terbatas",
  "Batas Pembelian (optional)\n1. 1 ≤ Batas pembelian≤99\n2. Jika tidak diisi artinya tidak terbatas",
] as const;

/* ---- fresh ---- */

export function freshWorkbookShape(): OutputShape {
  return {
    name: "fresh",
    splittable: true,
    render(rows, file_name) {
      const aoa: Array<Array<string | number | null>> = [
        [...OUTPUT_HEADERS],
        // purchase limit (column 5) stays blank
        ...rows.map((r) => [r.product_id, r.sku_id, r.price, r.stock]),
      ];

      const wb = XLSX.utils.book_new();
      XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(aoa), "Sheet1");
      return { file_name, bytes: writeWorkbook(wb) };
    },
  };
}

/* ---- template overlay ---- */

export type TemplateOverlayOptions = {
  template: Uint8Array;
  data_start_row: number;
  sheet_name?: string | null;
};

export function templateOverlayShape(opts: TemplateOverlayOptions): OutputShape {
  assertRow("templateOverlayShape: data_start_row", opts.data_start_row);

  return {
    name: "template",
    splittable: true,
    render(rows, file_name) {
      // re-read per render so split chunks never share cells
      const wb = readWorkbook(opts.template);
      const ws = pickWorksheet(wb, opts.sheet_name ?? null);

      rows.forEach((r, i) => {
        const row = opts.data_start_row + i;
        setCell(ws, row, 1, r.product_id);
        setCell(ws, row, 2, r.sku_id);
        setCell(ws, row, 3, r.price);
        setCell(ws, row, 4, r.stock);
        setCell(ws, row, 5, null);
      });

      return { file_name, bytes: writeWorkbook(wb) };
    },
  };
}

/* ---- in-place update ---- */

export type InPlaceUpdateOptions = {
  source: Uint8Array;
  price_column: number;
  file?: string | null; // when set, rows read from other files are ignored
  sheet_name?: string | null;
};

export function inPlaceUpdateShape(opts: InPlaceUpdateOptions): OutputShape {
  assertRow("inPlaceUpdateShape: price_column", opts.price_column);
  const file = opts.file ?? null;

  return {
    name: "in-place",
    splittable: false,
    render(rows, file_name) {
      const wb = readWorkbook(opts.source);
      const ws = pickWorksheet(wb, opts.sheet_name ?? null);

      for (const r of rows) {
        if (file !== null && r.ref.file !== file) continue;
        setCell(ws, r.ref.row, opts.price_column, r.price);
      }

      return { file_name, bytes: writeWorkbook(wb) };
    },
  };
}

function assertRow(label: string, n: number): void {
  if (!Number.isInteger(n) || n < 1) throw new Error(`${label} must be a positive integer, got ${n}`);
}
