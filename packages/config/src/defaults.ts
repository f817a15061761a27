import type { PricingConfig } from "./schema.js";

/**
 * Default layouts of the marketplace mass-update template, the pricelist
 * workbook and the add-on mapping. Returns a fresh object on every call.
 */
export function defaultPricingConfig(): PricingConfig {
  return {
    input: {
      // row 3 holds the headers, rows 4-5 are the template's notes
      header: { kind: "fixed", row: 3 },
      data_start_row: 6,
      columns: {
        product_id: ["ID Produk", "Product ID", "Product_Id"],
        sku_id: ["ID SKU", "ID_SKU", "SKU ID", "SKU_Id"],
        price: ["Harga Ritel (Mata Uang Lokal)", "Harga Ritel", "Harga", "PRICE"],
        stock: ["Kuantitas", "Qty", "Stock", "Stok"],
        seller_sku: ["SKU Penjual", "SKU_PENJUAL", "Seller SKU", "SKU Seller"],
      },
    },

    pricelist: {
      header: { kind: "fixed", row: 2 },
      sku_column: ["KODEBARANG", "KODE BARANG", "SKU", "SKU NO", "SKU_NO"],
      tiers: [
        { label: "M3", synonyms: ["M3"] },
        { label: "M4", synonyms: ["M4"] },
      ],
    },

    addons: {
      header: { kind: "scan", first_row: 1, last_row: 29 },
      code_column: ["addon_code", "Addon Code", "Kode", "KODE ADDON", "KODE_ADDON"],
      price_column: ["harga", "Price"],
    },

    magnitude: { threshold: 1_000_000, multiplier: 1000 },

    tier: "M3",
    discount: 0,

    output: {
      file_name: "product_discount_output.xlsx",
      max_rows_per_file: null,
    },
  };
}
