// packages/workbook/src/issues.ts
import * as XLSX from "xlsx";
import type { Issue } from "../../pricing/src/batch.js";
import { writeWorkbook } from "./xlsx-sheet.js";

export type IssueFormat = "csv" | "xlsx";

export const ISSUE_COLUMNS = [
  "file",
  "row",
  "product_id",
  "sku_id",
  "seller_sku",
  "current_price",
  "reason_code",
  "reason",
] as const;

/** Issue list as a downloadable CSV (UTF-8) or single-sheet XLSX. */
export function exportIssues(issues: readonly Issue[], format: IssueFormat): Buffer {
  const aoa: Array<Array<string | number | null>> = [
    [...ISSUE_COLUMNS],
    ...issues.map((i) => [
      i.ref.file ?? "",
      i.ref.row,
      i.product_id,
      i.sku_id,
      i.seller_sku,
      i.current_price,
      i.reason.code,
      i.message,
    ]),
  ];
  const ws = XLSX.utils.aoa_to_sheet(aoa);

  if (format === "csv") return Buffer.from(XLSX.utils.sheet_to_csv(ws), "utf8");

  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, ws, "Issues");
  return writeWorkbook(wb);
}
