// ---------- SKU decomposition (stable public API) ----------
export { decomposeSku } from "./sku.js";
export type { DecomposedSku } from "./sku.js";

// ---------- Failure reasons ----------
export { describeFailure, FAILURE_CODES } from "./reasons.js";
export type { FailureCode, FailureReason } from "./reasons.js";

// ---------- Price resolution ----------
export { resolvePrice } from "./resolve.js";
export type { PriceResolution, PriceTrace } from "./resolve.js";

// ---------- Batch ----------
export { runBatch, summarizeBatch } from "./batch.js";
export type { BatchContext, BatchResult, BatchSummary, OutputRow, Issue } from "./batch.js";
