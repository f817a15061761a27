import { describe, it, expect } from "vitest";
import { explainResolution, formatExplanation } from "../src/index.js";
import { resolvePrice } from "../../pricing/src/index.js";

const pricelist = new Map([
  ["ABC", new Map([["M3", 50_000]])],
  ["LOW", new Map([["M3", 1_000]])],
]);
const addons = new Map([["PC", 2_000]]);

describe("explainResolution", () => {
  it("lists inputs, the substituted formula and the result", () => {
    const e = explainResolution("ABC+PC", resolvePrice("ABC+PC", "M3", pricelist, addons, 0));

    expect(e.seller_sku).toBe("ABC+PC");
    expect(e.lines).toEqual([
      { kind: "INPUT", text: "Seller SKU = 'ABC+PC'" },
      { kind: "INPUT", text: "Decomposed: base = 'ABC', add-ons = PC" },
      { kind: "INPUT", text: "Base price ABC @ M3 = 50000" },
      { kind: "INPUT", text: "Add-on PC = 2000" },
      { kind: "INPUT", text: "Flat discount = 0" },
      { kind: "COMPUTE", text: "Offer price = base + add-ons - discount = 50000 + 2000 - 0 = 52000" },
      { kind: "RESULT", text: "Offer price = 52000" },
    ]);
  });

  it("notes the clamp when the discount exceeds the total", () => {
    const e = explainResolution("LOW", resolvePrice("LOW", "M3", pricelist, addons, 1_500));

    expect(e.lines.slice(-3)).toEqual([
      { kind: "COMPUTE", text: "Offer price = base - discount = 1000 - 1500 = -500" },
      { kind: "NOTE", text: "Total -500 is below zero; clamped to 0" },
      { kind: "RESULT", text: "Offer price = 0" },
    ]);
  });

  it("ends with the failure reason when the SKU cannot be priced", () => {
    const e = explainResolution("ABC+ZZ", resolvePrice("ABC+ZZ", "M3", pricelist, addons, 0));

    expect(e.lines).toEqual([
      { kind: "INPUT", text: "Seller SKU = 'ABC+ZZ'" },
      { kind: "INPUT", text: "Decomposed: base = 'ABC', add-ons = ZZ" },
      { kind: "RESULT", text: "Not priced (ADDON_NOT_FOUND): Add-on 'ZZ' not found in add-on table" },
    ]);
  });

  it("shows an empty decomposition", () => {
    const e = explainResolution("", resolvePrice("", "M3", pricelist, addons, 0));
    expect(e.lines[1]).toEqual({ kind: "INPUT", text: "Decomposed: base = (empty), add-ons = (none)" });
  });
});

describe("formatExplanation", () => {
  it("pads the kind column", () => {
    const text = formatExplanation({
      seller_sku: "X",
      lines: [
        { kind: "INPUT", text: "a" },
        { kind: "COMPUTE", text: "b" },
        { kind: "RESULT", text: "c" },
      ],
    });
    expect(text).toBe("INPUT   a\nCOMPUTE b\nRESULT  c");
  });
});
