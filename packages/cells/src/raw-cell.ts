// Raw spreadsheet cell values, as handed over by the I/O boundary.
// Types + one constructor. Normalization lives in normalize.ts.

export type RawCell =
  | { kind: "absent" }
  | { kind: "number"; value: number }
  | { kind: "text"; value: string };

export const ABSENT: RawCell = { kind: "absent" };

/**
 * Close an untyped cell value (what a workbook library hands back) into the
 * RawCell union. Non-finite numbers count as absent.
 */
export function toRawCell(v: unknown): RawCell {
  if (v == null) return ABSENT;

  if (typeof v === "number") {
    return Number.isFinite(v) ? { kind: "number", value: v } : ABSENT;
  }

  if (typeof v === "string") return { kind: "text", value: v };

  if (typeof v === "boolean") return { kind: "text", value: v ? "TRUE" : "FALSE" };

  if (v instanceof Date) {
    return Number.isNaN(v.getTime()) ? ABSENT : { kind: "text", value: v.toISOString() };
  }

  return { kind: "text", value: String(v) };
}
