// ---------- Raw cells ----------
export { ABSENT, toRawCell } from "./raw-cell.js";
export type { RawCell } from "./raw-cell.js";

// ---------- Normalization ----------
export {
  normalizeIdentifier,
  normalizeAddonCode,
  normalizeText,
  normalizePrice,
} from "./normalize.js";

export type { CanonicalPrice, CanonicalId, AddonCode } from "./normalize.js";

// ---------- Magnitude heuristic ----------
export { rescale, DEFAULT_MAGNITUDE_RULE } from "./magnitude.js";
export type { MagnitudeRule } from "./magnitude.js";
