// packages/tables/src/sheet.ts
import { ABSENT, toRawCell } from "../../cells/src/raw-cell.js";
import type { RawCell } from "../../cells/src/raw-cell.js";

/**
 * Sheet contract consumed by the loaders.
 * - Rows and columns are 1-based, like the spreadsheet UI.
 * - Cells outside the used range read as absent.
 */
export type Sheet = {
  cell(row: number, col: number): RawCell;
  readonly max_row: number;
  readonly max_column: number;
};

/**
 * In-memory sheet over a row array (rows[0] is sheet row 1).
 */
export function sheetFromRows(rows: ReadonlyArray<ReadonlyArray<unknown>>): Sheet {
  const cells = rows.map((r) => r.map(toRawCell));
  const max_column = cells.reduce((m, r) => Math.max(m, r.length), 0);

  return {
    max_row: cells.length,
    max_column,
    cell(row: number, col: number): RawCell {
      return cells[row - 1]?.[col - 1] ?? ABSENT;
    },
  };
}
