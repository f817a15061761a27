// packages/pricing/src/resolve.ts
import { normalizeAddonCode } from "../../cells/src/normalize.js";
import type { AddonCode, CanonicalPrice } from "../../cells/src/normalize.js";
import type { Pricelist } from "../../tables/src/pricelist.js";
import type { AddonPriceTable } from "../../tables/src/addons.js";
import { decomposeSku } from "./sku.js";
import type { FailureReason } from "./reasons.js";

export type PriceTrace = {
  base_sku: string;
  tier: string;
  base_price: CanonicalPrice;
  addons: Array<{ code: AddonCode; price: CanonicalPrice }>;
  discount: number;
  unclamped: number; // base + addons - discount, may be negative
  clamped: boolean;
};

export type PriceResolution =
  | { ok: true; price: CanonicalPrice; trace: PriceTrace }
  | { ok: false; reason: FailureReason };

/**
 * Price one composite seller SKU:
 *   final = max(0, base[tier] + Σ addon - discount)
 *
 * Short-circuits on the first failure; one unknown add-on fails the row (no
 * partial pricing). Pure: no I/O, no mutation of the tables.
 */
export function resolvePrice(
  sellerSku: string | null | undefined,
  tier: string,
  pricelist: Pricelist,
  addonTable: AddonPriceTable,
  flatDiscount: number
): PriceResolution {
  const { base, addons } = decomposeSku(sellerSku);
  if (!base) return { ok: false, reason: { code: "EMPTY_SKU" } };

  const entry = pricelist.get(base);
  if (!entry) return { ok: false, reason: { code: "BASE_SKU_NOT_FOUND", base_sku: base } };

  const base_price = entry.get(tier);
  if (base_price == null) {
    return { ok: false, reason: { code: "TIER_PRICE_MISSING", base_sku: base, tier } };
  }

  const priced: PriceTrace["addons"] = [];
  for (const a of addons) {
    const code = normalizeAddonCode(a);
    const price = addonTable.get(code);
    if (price == null) {
      return { ok: false, reason: { code: "ADDON_NOT_FOUND", base_sku: base, addon_code: code } };
    }
    priced.push({ code, price });
  }

  const unclamped = base_price + priced.reduce((s, x) => s + x.price, 0) - flatDiscount;
  const clamped = unclamped < 0;

  return {
    ok: true,
    price: clamped ? 0 : unclamped,
    trace: {
      base_sku: base,
      tier,
      base_price,
      addons: priced,
      discount: flatDiscount,
      unclamped,
      clamped,
    },
  };
}
