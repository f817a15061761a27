import type { CanonicalPrice } from "./normalize.js";

/**
 * Magnitude heuristic for price tables that are typed in thousands.
 *
 * Any loaded price below `threshold` is taken to be missing its trailing
 * zeros and is multiplied by `multiplier` (50 -> 50_000). This is a business
 * approximation, not a parsing guarantee: a genuine price under the threshold
 * is rescaled too. Only table loaders apply it.
 */
export type MagnitudeRule = {
  threshold: number;
  multiplier: number;
};

export const DEFAULT_MAGNITUDE_RULE: Readonly<MagnitudeRule> = Object.freeze({
  threshold: 1_000_000,
  multiplier: 1000,
});

export function rescale(
  price: CanonicalPrice,
  rule: Readonly<MagnitudeRule> = DEFAULT_MAGNITUDE_RULE
): CanonicalPrice {
  return price < rule.threshold ? price * rule.multiplier : price;
}
