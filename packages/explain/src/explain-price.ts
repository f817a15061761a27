import { decomposeSku } from "../../pricing/src/sku.js";
import { describeFailure } from "../../pricing/src/reasons.js";
import type { PriceResolution } from "../../pricing/src/resolve.js";

export type ExplanationLine = {
  kind: "INPUT" | "COMPUTE" | "RESULT" | "NOTE";
  text: string;
};

export type PriceExplanation = {
  seller_sku: string;
  lines: ExplanationLine[];
};

/**
 * Walk an operator through how one seller SKU was (or was not) priced.
 * Lines come out in a fixed order so explanations diff cleanly.
 */
export function explainResolution(seller_sku: string, resolution: PriceResolution): PriceExplanation {
  const lines: ExplanationLine[] = [];
  const { base, addons } = decomposeSku(seller_sku);

  // ---- Inputs
  lines.push({ kind: "INPUT", text: `Seller SKU = '${seller_sku}'` });
  lines.push({
    kind: "INPUT",
    text: `Decomposed: base = ${base ? `'${base}'` : "(empty)"}, add-ons = ${addons.length > 0 ? addons.join(", ") : "(none)"}`,
  });

  if (!resolution.ok) {
    lines.push({
      kind: "RESULT",
      text: `Not priced (${resolution.reason.code}): ${describeFailure(resolution.reason)}`,
    });
    return { seller_sku, lines };
  }

  const t = resolution.trace;

  lines.push({ kind: "INPUT", text: `Base price ${t.base_sku} @ ${t.tier} = ${fmt(t.base_price)}` });
  for (const a of t.addons) {
    lines.push({ kind: "INPUT", text: `Add-on ${a.code} = ${fmt(a.price)}` });
  }
  lines.push({ kind: "INPUT", text: `Flat discount = ${fmt(t.discount)}` });

  // ---- Computation
  const terms = [fmt(t.base_price), ...t.addons.map((a) => `+ ${fmt(a.price)}`), `- ${fmt(t.discount)}`];
  const formula = t.addons.length > 0 ? "base + add-ons - discount" : "base - discount";

  lines.push({
    kind: "COMPUTE",
    text: `Offer price = ${formula} = ${terms.join(" ")} = ${fmt(t.unclamped)}`,
  });

  if (t.clamped) {
    lines.push({ kind: "NOTE", text: `Total ${fmt(t.unclamped)} is below zero; clamped to 0` });
  }

  lines.push({ kind: "RESULT", text: `Offer price = ${fmt(resolution.price)}` });

  return { seller_sku, lines };
}

/** Render lines as `KIND  text`, one per line. */
export function formatExplanation(e: PriceExplanation): string {
  return e.lines.map((l) => `${l.kind.padEnd(7)} ${l.text}`).join("\n");
}

function fmt(n: number): string {
  return Number.isFinite(n) ? String(n) : "NaN";
}
