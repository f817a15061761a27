// Pricing run configuration
// Types only. No functions.

import type { MagnitudeRule } from "../../cells/src/magnitude.js";
import type { InputLayout } from "../../tables/src/input.js";
import type { PricelistLayout } from "../../tables/src/pricelist.js";
import type { AddonLayout } from "../../tables/src/addons.js";

/* ------------------------------- Output ------------------------------- */

export interface OutputSettings {
  file_name: string;
  max_rows_per_file: number | null; // null = one workbook, never split
}

/* ------------------------------ Config ------------------------------- */

/**
 * Fully resolved configuration for one batch run. Built by
 * `parsePricingConfig` from a partial document merged over the defaults;
 * treat as immutable.
 */
export interface PricingConfig {
  input: InputLayout;
  pricelist: PricelistLayout;
  addons: AddonLayout;

  magnitude: MagnitudeRule;

  tier: string; // which pricelist tier prices every row
  discount: number; // flat, non-negative, subtracted per row

  output: OutputSettings;
}
