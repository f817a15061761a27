import { resolvePrice } from "../packages/pricing/src/index.js";
import { explainResolution, formatExplanation } from "../packages/explain/src/index.js";

const pricelist = new Map([["KRS-01", new Map([["M3", 450_000]])]]);
const addons = new Map([
  ["PC", 25_000],
  ["GW", 15_000],
]);

for (const sku of process.argv.slice(2).length ? process.argv.slice(2) : ["KRS-01+pc+gw", "KRS-01+XX"]) {
  const explanation = explainResolution(sku, resolvePrice(sku, "M3", pricelist, addons, 5_000));
  console.log(formatExplanation(explanation));
  console.log();
}
