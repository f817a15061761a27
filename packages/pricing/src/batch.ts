// packages/pricing/src/batch.ts
import type { CanonicalId, CanonicalPrice } from "../../cells/src/normalize.js";
import type { InputRow, RowRef } from "../../tables/src/input.js";
import type { Pricelist } from "../../tables/src/pricelist.js";
import type { AddonPriceTable } from "../../tables/src/addons.js";
import { resolvePrice } from "./resolve.js";
import { describeFailure } from "./reasons.js";
import type { FailureCode, FailureReason } from "./reasons.js";

export type OutputRow = {
  ref: RowRef;
  product_id: CanonicalId;
  sku_id: CanonicalId;
  price: CanonicalPrice;
  stock: number | null;
};

export type Issue = {
  ref: RowRef;
  product_id: CanonicalId;
  sku_id: CanonicalId;
  seller_sku: string;
  current_price: CanonicalPrice | null;
  reason: FailureReason;
  message: string;
};

export type BatchContext = {
  pricelist: Pricelist;
  addons: AddonPriceTable;
  tier: string;
  discount: number;
};

export type BatchResult = {
  output: OutputRow[];
  issues: Issue[];
  skipped_blank: number;
};

export type BatchSummary = {
  rows_priced: number;
  rows_failed: number;
  skipped_blank: number;
  issues_by_code: Record<FailureCode, number>;
};

/**
 * Price every input row. Each non-blank row lands in exactly one of
 * `output` / `issues`, in input order; a failing row never stops the batch.
 */
export function runBatch(rows: Iterable<InputRow>, ctx: BatchContext): BatchResult {
  if (!Number.isInteger(ctx.discount) || ctx.discount < 0) {
    throw new Error(`runBatch: discount must be a non-negative integer, got ${ctx.discount}`);
  }

  const output: OutputRow[] = [];
  const issues: Issue[] = [];
  let skipped_blank = 0;

  for (const row of rows) {
    if (!row.product_id && !row.sku_id && !row.seller_sku) {
      skipped_blank++;
      continue;
    }

    const res = resolvePrice(row.seller_sku, ctx.tier, ctx.pricelist, ctx.addons, ctx.discount);

    if (!res.ok) {
      issues.push({
        ref: row.ref,
        product_id: row.product_id,
        sku_id: row.sku_id,
        seller_sku: row.seller_sku,
        current_price: row.current_price,
        reason: res.reason,
        message: describeFailure(res.reason),
      });
      continue;
    }

    output.push({
      ref: row.ref,
      product_id: row.product_id,
      sku_id: row.sku_id,
      price: res.price,
      stock: row.stock,
    });
  }

  return { output, issues, skipped_blank };
}

export function summarizeBatch(r: BatchResult): BatchSummary {
  const issues_by_code: Record<FailureCode, number> = {
    EMPTY_SKU: 0,
    BASE_SKU_NOT_FOUND: 0,
    TIER_PRICE_MISSING: 0,
    ADDON_NOT_FOUND: 0,
  };
  for (const i of r.issues) issues_by_code[i.reason.code]++;

  return {
    rows_priced: r.output.length,
    rows_failed: r.issues.length,
    skipped_blank: r.skipped_blank,
    issues_by_code,
  };
}
