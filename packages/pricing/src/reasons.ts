// packages/pricing/src/reasons.ts

/** Every failure code, in the order summaries list them. */
export const FAILURE_CODES = ["EMPTY_SKU", "BASE_SKU_NOT_FOUND", "TIER_PRICE_MISSING", "ADDON_NOT_FOUND"] as const;

export type FailureCode = (typeof FAILURE_CODES)[number];

export type FailureReason =
  | { code: "EMPTY_SKU" }
  | { code: "BASE_SKU_NOT_FOUND"; base_sku: string }
  | { code: "TIER_PRICE_MISSING"; base_sku: string; tier: string }
  | { code: "ADDON_NOT_FOUND"; base_sku: string; addon_code: string };

/**
 * Stable, operator-facing reason text. These strings end up in exported issue
 * files, so changing one is a format change.
 */
export function describeFailure(reason: FailureReason): string {
  switch (reason.code) {
    case "EMPTY_SKU":
      return "Seller SKU is empty";
    case "BASE_SKU_NOT_FOUND":
      return `Base SKU '${reason.base_sku}' not found in pricelist`;
    case "TIER_PRICE_MISSING":
      return `Base SKU '${reason.base_sku}' has no ${reason.tier} price in pricelist`;
    case "ADDON_NOT_FOUND":
      return `Add-on '${reason.addon_code}' not found in add-on table`;
  }
}
