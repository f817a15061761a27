import type { RawCell } from "./raw-cell.js";

/**
 * Canonical cell normalization for pricing inputs.
 * - Identifiers render without exponent notation or a trailing ".0"
 * - Prices become non-negative integers (half-up), or null when unusable
 *
 * NOTE: nothing here throws. Unusable values degrade to "" / null and the
 * caller decides whether that blocks a row.
 */

export type CanonicalPrice = number;
export type CanonicalId = string;
export type AddonCode = string;

/* ----------------------------- Identifiers ---------------------------- */

export function normalizeIdentifier(c: RawCell): CanonicalId {
  switch (c.kind) {
    case "absent":
      return "";
    case "number":
      return Number.isInteger(c.value) ? BigInt(c.value).toString() : toPlainDecimal(c.value);
    case "text":
      return c.value.trim();
  }
}

export function normalizeAddonCode(c: RawCell | string): AddonCode {
  const id = typeof c === "string" ? c.trim() : normalizeIdentifier(c);
  return id.toUpperCase();
}

/** Header cell text: same rendering as identifiers. */
export function normalizeText(c: RawCell): string {
  return normalizeIdentifier(c);
}

// String(1e-7) === "1e-7"; shift the decimal point by hand instead.
function toPlainDecimal(n: number): string {
  const s = String(n);
  const m = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(s);
  if (!m) return s;

  const [, sign, intPart, fracPart = "", expStr] = m;
  const digits = intPart + fracPart;
  const point = intPart.length + Number(expStr);

  if (point <= 0) return `${sign}0.${"0".repeat(-point)}${digits}`;
  if (point >= digits.length) return `${sign}${digits}${"0".repeat(point - digits.length)}`;
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/* ------------------------------- Prices ------------------------------- */

const PLAIN_DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function normalizePrice(c: RawCell): CanonicalPrice | null {
  switch (c.kind) {
    case "absent":
      return null;
    case "number":
      return toCanonicalPrice(c.value);
    case "text":
      return parsePriceText(c.value);
  }
}

function parsePriceText(raw: string): CanonicalPrice | null {
  let s = raw.replace(/\s+/g, "").replace(/rp/gi, "");
  if (!s) return null;

  const hasDot = s.includes(".");
  const hasComma = s.includes(",");

  // "1.234,50" -> dot groups thousands, comma is the decimal mark.
  // A lone separator of either kind is always a thousands separator.
  if (hasDot && hasComma) s = s.replace(/\./g, "").replace(/,/g, ".");
  else if (hasDot) s = s.replace(/\./g, "");
  else if (hasComma) s = s.replace(/,/g, "");

  if (!PLAIN_DECIMAL.test(s)) return null;
  return toCanonicalPrice(Number(s));
}

function toCanonicalPrice(n: number): CanonicalPrice | null {
  if (!Number.isFinite(n) || n < 0) return null;
  const r = Number.isInteger(n) ? n : Math.round(n);
  return r === 0 ? 0 : r;
}
