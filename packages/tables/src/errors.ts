export type TableName = "input" | "pricelist" | "addons";

/**
 * Fatal table-load failure: the required header columns were not found, so no
 * row of the batch can be resolved. Raised before any row processing.
 */
export class TableLoadError extends Error {
  readonly code = "HEADER_NOT_FOUND";
  readonly table: TableName;
  readonly missing: string[];
  readonly header_search: string;

  constructor(input: { table: TableName; missing: string[]; header_search: string; message: string }) {
    super(input.message);
    this.name = "TableLoadError";
    this.table = input.table;
    this.missing = input.missing;
    this.header_search = input.header_search;
  }
}
