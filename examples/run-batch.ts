import { parsePricingConfig } from "../packages/config/src/index.js";
import { sheetFromRows, loadPricelist, loadAddonTable, readInputRows } from "../packages/tables/src/index.js";
import { runBatch, summarizeBatch } from "../packages/pricing/src/index.js";

const config = parsePricingConfig({ discount: 1000 });

const pricelist = loadPricelist(
  sheetFromRows([
    ["Daftar Harga"],
    ["KODEBARANG", "NAMA", "M3", "M4"],
    ["KRS-01", "Kursi", 450, 475],
    ["MJA-02", "Meja", "1.250", "1.300"],
  ]),
  config.pricelist,
  config.magnitude
);

const addons = loadAddonTable(
  sheetFromRows([
    ["Kode", "harga"],
    ["PC", 25],
    ["GW", 15],
  ]),
  config.addons,
  config.magnitude
);

const input = readInputRows(
  sheetFromRows([
    ["Mass update"],
    [],
    ["ID Produk", "ID SKU", "Harga Ritel", "Kuantitas", "SKU Penjual"],
    ["wajib"],
    ["catatan"],
    [1001, 2001, 500000, 10, "KRS-01+PC"],
    [1002, 2002, 1300000, 4, "MJA-02+GW+PC"],
    [1003, 2003, 99000, 1, "KRS-01+XX"],
  ]),
  config.input,
  "mass-update.xlsx"
);

const result = runBatch(input.rows, {
  pricelist: pricelist.entries,
  addons: addons.entries,
  tier: config.tier,
  discount: config.discount,
});

console.log(JSON.stringify({ summary: summarizeBatch(result), output: result.output, issues: result.issues }, null, 2));
if (result.issues.length) process.exitCode = 1;
