// ---------- Price explanation (stable public API) ----------
export { explainResolution, formatExplanation } from "./explain-price.js";
export type { ExplanationLine, PriceExplanation } from "./explain-price.js";
