export type { PricingConfig, OutputSettings } from "./schema.js";
export { defaultPricingConfig } from "./defaults.js";
export {
  PricingConfigSchema,
  PricingOverridesSchema,
  ConfigError,
  parsePricingConfig,
} from "./validate.js";
export type { PricingConfigInput, PricingOverrides } from "./validate.js";
