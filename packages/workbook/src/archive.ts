// packages/workbook/src/archive.ts
import path from "node:path";
import AdmZip from "adm-zip";
import type { OutputRow } from "../../pricing/src/batch.js";
import type { OutputShape } from "./shapes.js";

export type RenderOptions = {
  shape: OutputShape;
  file_name: string; // e.g. "product_discount_output.xlsx"
  max_rows_per_file?: number | null;
};

export type RenderedOutput =
  | { kind: "xlsx"; file_name: string; bytes: Buffer }
  | { kind: "zip"; file_name: string; bytes: Buffer; parts: string[] };

/**
 * Render priced rows through a shape. Over the row cap the rows are split
 * into consecutive chunks, one `<stem>_part<N>.xlsx` each, zipped into
 * `<stem>.zip`.
 */
export function renderOutput(rows: readonly OutputRow[], opts: RenderOptions): RenderedOutput {
  const cap = opts.max_rows_per_file ?? null;

  if (cap !== null) {
    if (!Number.isInteger(cap) || cap < 1) {
      throw new Error(`renderOutput: max_rows_per_file must be a positive integer, got ${cap}`);
    }
    if (!opts.shape.splittable) {
      throw new Error(`renderOutput: shape '${opts.shape.name}' cannot be split into parts`);
    }
  }

  if (cap === null || rows.length <= cap) {
    const a = opts.shape.render(rows, opts.file_name);
    return { kind: "xlsx", file_name: a.file_name, bytes: a.bytes };
  }

  const stem = path.parse(opts.file_name).name;
  const zip = new AdmZip();
  const parts: string[] = [];

  for (let i = 0, n = 1; i < rows.length; i += cap, n++) {
    const a = opts.shape.render(rows.slice(i, i + cap), `${stem}_part${n}.xlsx`);
    zip.addFile(a.file_name, a.bytes);
    parts.push(a.file_name);
  }

  return { kind: "zip", file_name: `${stem}.zip`, bytes: zip.toBuffer(), parts };
}
