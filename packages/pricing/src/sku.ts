export type DecomposedSku = {
  base: string;
  addons: string[]; // as written, not canonicalized
};

/**
 * Split a composite seller SKU ("BASE+ADDON+ADDON") on the literal `+`.
 * There is no escaping: a base SKU that itself contains `+` is split too.
 */
export function decomposeSku(raw: string | null | undefined): DecomposedSku {
  const s = (raw ?? "").trim();
  if (!s) return { base: "", addons: [] };

  const [head = "", ...rest] = s.split("+");
  return {
    base: head.trim(),
    addons: rest.map((p) => p.trim()).filter((p) => p.length > 0),
  };
}
