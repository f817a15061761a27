import { describe, it, expect } from "vitest";
import {
  ABSENT,
  toRawCell,
  normalizeIdentifier,
  normalizeAddonCode,
  normalizePrice,
} from "../src/index.js";

const num = (value: number) => ({ kind: "number" as const, value });
const text = (value: string) => ({ kind: "text" as const, value });

describe("toRawCell", () => {
  it("closes untyped values into the union", () => {
    expect(toRawCell(null)).toEqual(ABSENT);
    expect(toRawCell(undefined)).toEqual(ABSENT);
    expect(toRawCell(Number.NaN)).toEqual(ABSENT);
    expect(toRawCell(12)).toEqual(num(12));
    expect(toRawCell(" a ")).toEqual(text(" a "));
    expect(toRawCell(true)).toEqual(text("TRUE"));
    expect(toRawCell(new Date("2026-01-02T00:00:00.000Z"))).toEqual(text("2026-01-02T00:00:00.000Z"));
  });
});

describe("normalizeIdentifier", () => {
  it("renders integral floats as plain digits", () => {
    expect(normalizeIdentifier(num(1729384756.0))).toBe("1729384756");
    expect(normalizeIdentifier(num(1e21))).toBe("1000000000000000000000");
    expect(normalizeIdentifier(num(-0))).toBe("0");
  });

  it("never renders exponent notation for fractions", () => {
    expect(normalizeIdentifier(num(1.5))).toBe("1.5");
    expect(normalizeIdentifier(num(1e-7))).toBe("0.0000001");
    expect(normalizeIdentifier(num(-2.5e-8))).toBe("-0.000000025");
  });

  it("trims text and maps absent to empty", () => {
    expect(normalizeIdentifier(text("  SKU-1 "))).toBe("SKU-1");
    expect(normalizeIdentifier(ABSENT)).toBe("");
  });

  it("is a fixed point on its own output", () => {
    for (const c of [num(123456789012), num(0.25), text("  abc  "), ABSENT]) {
      const once = normalizeIdentifier(c);
      expect(normalizeIdentifier(text(once))).toBe(once);
    }
  });
});

describe("normalizeAddonCode", () => {
  it("uppercases and trims", () => {
    expect(normalizeAddonCode(" pc ")).toBe("PC");
    expect(normalizeAddonCode(text("gw1"))).toBe("GW1");
    expect(normalizeAddonCode(num(7))).toBe("7");
  });
});

describe("normalizePrice", () => {
  it("keeps integral numbers and rounds the rest half-up", () => {
    expect(normalizePrice(num(50000))).toBe(50000);
    expect(normalizePrice(num(50000.0))).toBe(50000);
    expect(normalizePrice(num(2.5))).toBe(3);
    expect(normalizePrice(num(2.4))).toBe(2);
  });

  it("strips the currency prefix and whitespace", () => {
    expect(normalizePrice(text("Rp 50.000"))).toBe(50000);
    expect(normalizePrice(text("rp1.250.000"))).toBe(1250000);
    expect(normalizePrice(text(" RP 75 "))).toBe(75);
  });

  it("reads dot+comma as thousands+decimal", () => {
    expect(normalizePrice(text("1.234,50"))).toBe(1235);
    expect(normalizePrice(text("1.234,40"))).toBe(1234);
  });

  it("treats a lone separator as thousands", () => {
    expect(normalizePrice(text("12.500"))).toBe(12500);
    expect(normalizePrice(text("12,500"))).toBe(12500);
    expect(normalizePrice(text("12,5"))).toBe(125);
  });

  it("returns null for blank or unparseable input", () => {
    expect(normalizePrice(ABSENT)).toBeNull();
    expect(normalizePrice(text("   "))).toBeNull();
    expect(normalizePrice(text("Rp"))).toBeNull();
    expect(normalizePrice(text("abc"))).toBeNull();
    expect(normalizePrice(text("1,2,3.4"))).toBeNull();
    expect(normalizePrice(text("-5000"))).toBeNull();
  });
});
