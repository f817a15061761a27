import { describe, it, expect, beforeEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import AdmZip from "adm-zip";
import { runCli, VERSION } from "../src/offerprice.js";
import type { CliIO } from "../src/offerprice.js";
import { readWorkbookSheet } from "../../workbook/src/index.js";
import { workbookBytes } from "../../workbook/__tests__/_helpers/workbooks.js";

type Captured = { code: number; out: string[]; err: string[] };

let dir = "";

function cli(...args: string[]): Captured {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIO = { out: (l) => out.push(l), err: (l) => err.push(l), cwd: dir };
  const code = runCli(["node", "offerprice", ...args], io);
  return { code, out, err };
}

function put(name: string, rows: unknown[][]): void {
  fs.writeFileSync(path.join(dir, name), workbookBytes({ Sheet1: { rows } }));
}

function sheetAt(name: string) {
  return readWorkbookSheet(fs.readFileSync(path.join(dir, name)));
}

const TABLES = ["--pricelist", "pricelist.xlsx", "--addons", "addons.xlsx"];

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "offerprice-cli-"));

  put("pricelist.xlsx", [
    ["Daftar Harga"],
    ["KODEBARANG", "NAMA", "M3", "M4"],
    ["ABC", "Kursi", 50, 55],
    ["LOW", "Meja", 1, ""],
    ["NOPRICE", "Lemari", "", ""],
  ]);
  put("addons.xlsx", [
    ["Addon mapping"],
    ["Kode", "harga"],
    ["PC", 2],
    ["gw", "15"],
  ]);
  put("listing.xlsx", [
    ["Template"],
    [],
    ["ID Produk", "ID SKU", "Harga Ritel", "Kuantitas", "SKU Penjual"],
    ["wajib"],
    ["catatan"],
    [111, 211, 60000, 5, "ABC+PC"],
    [112, 212, 60000, "", "ABC+ZZ"],
    [113, 213, "", 2, "LOW+gw"],
  ]);
});

describe("offerprice run", () => {
  it("writes the upload workbook and reports a summary", () => {
    const r = cli("run", "--input", "listing.xlsx", ...TABLES);

    expect(r.code).toBe(0);
    expect(r.err).toContain("[offerprice] tier M3, discount 0: priced 2, failed 1, blank 0");
    expect(r.err).toContain("[offerprice]   listing.xlsx:7 Add-on 'ZZ' not found in add-on table");
    expect(r.err).toContain("[offerprice] pricelist.xlsx: skipped 1 row(s) without a usable price: 5 (NOPRICE)");

    const s = sheetAt("product_discount_output.xlsx");
    expect(s.max_row).toBe(3);
    expect(s.cell(2, 1)).toEqual({ kind: "text", value: "111" });
    expect(s.cell(2, 3)).toEqual({ kind: "number", value: 52_000 });
    expect(s.cell(2, 4)).toEqual({ kind: "number", value: 5 });
    expect(s.cell(3, 1)).toEqual({ kind: "text", value: "113" });
    expect(s.cell(3, 3)).toEqual({ kind: "number", value: 16_000 });
  });

  it("applies tier and discount flags and prints JSON", () => {
    const r = cli("run", "--input", "listing.xlsx", ...TABLES, "--tier", "M4", "--discount", "1000", "--json");

    expect(r.code).toBe(0);
    const report = JSON.parse(r.out.join("\n"));
    expect(report.summary).toEqual({
      rows_priced: 1,
      rows_failed: 2,
      skipped_blank: 0,
      issues_by_code: { EMPTY_SKU: 0, BASE_SKU_NOT_FOUND: 0, TIER_PRICE_MISSING: 1, ADDON_NOT_FOUND: 1 },
    });
    expect(report.parts).toBeNull();
    expect(sheetAt("product_discount_output.xlsx").cell(2, 3)).toEqual({ kind: "number", value: 56_000 });
  });

  it("exports issues as CSV", () => {
    const r = cli("run", "--input", "listing.xlsx", ...TABLES, "--issues", "issues.csv");

    expect(r.code).toBe(0);
    const lines = fs.readFileSync(path.join(dir, "issues.csv"), "utf8").split("\n");
    expect(lines[1]).toBe("listing.xlsx,7,112,212,ABC+ZZ,60000,ADDON_NOT_FOUND,Add-on 'ZZ' not found in add-on table");
  });

  it("splits the output into a zip over the row cap", () => {
    const r = cli("run", "--input", "listing.xlsx", ...TABLES, "--max-rows", "1", "--out", "out/result.xlsx");

    expect(r.code).toBe(0);
    const zip = new AdmZip(path.join(dir, "out", "result.zip"));
    expect(zip.getEntries().map((e) => e.entryName)).toEqual(["result_part1.xlsx", "result_part2.xlsx"]);
  });

  it("updates prices in place in the source workbook", () => {
    const r = cli("run", "--input", "listing.xlsx", ...TABLES, "--shape", "in-place", "--out", "priced.xlsx");

    expect(r.code).toBe(0);
    const s = sheetAt("priced.xlsx");
    expect(s.cell(6, 3)).toEqual({ kind: "number", value: 52_000 });
    expect(s.cell(7, 3)).toEqual({ kind: "number", value: 60_000 });
    expect(s.cell(8, 3)).toEqual({ kind: "number", value: 16_000 });
  });

  it("reads several input files in order", () => {
    put("second.xlsx", [
      ["Template"],
      [],
      ["ID Produk", "ID SKU", "Harga Ritel", "Kuantitas", "SKU Penjual"],
      [],
      [],
      [114, 214, "", 3, "ABC"],
    ]);

    const r = cli("run", "--input", "listing.xlsx,second.xlsx", ...TABLES, "--json");

    expect(r.code).toBe(0);
    const s = sheetAt("product_discount_output.xlsx");
    expect(s.max_row).toBe(4);
    expect(s.cell(4, 1)).toEqual({ kind: "text", value: "114" });
    expect(s.cell(4, 3)).toEqual({ kind: "number", value: 50_000 });
  });

  it("exits 1 when a table header cannot be found", () => {
    put("pricelist.xlsx", [["Daftar Harga"], ["CODE", "NAME", "PRICE"], ["ABC", "Kursi", 50]]);

    const r = cli("run", "--input", "listing.xlsx", ...TABLES);

    expect(r.code).toBe(1);
    expect(r.err).toContain("[offerprice] pricelist: Header not found in row 2; missing columns: SKU, M3, M4.");
    expect(fs.existsSync(path.join(dir, "product_discount_output.xlsx"))).toBe(false);
  });

  it("exits 1 on an unknown tier", () => {
    const r = cli("run", "--input", "listing.xlsx", ...TABLES, "--tier", "M9");

    expect(r.code).toBe(1);
    expect(r.err).toContain("[offerprice]   tier: 'M9' is not one of the pricelist tiers (M3, M4)");
  });

  it("exits 1 on usage errors", () => {
    expect(cli("run", ...TABLES).err[0]).toBe("[offerprice] Missing --input <file>");
    expect(cli("run", "--input", "missing.xlsx", ...TABLES).code).toBe(1);
    expect(cli("run", "--input", "listing.xlsx", ...TABLES, "--discount", "-5").code).toBe(1);
    expect(cli("run", "--input", "listing.xlsx", ...TABLES, "--shape", "in-place", "--max-rows", "5").code).toBe(1);
    expect(cli("bogus").err[0]).toBe("[offerprice] Unknown command: bogus");
  });

  it("takes layout changes from a config file", () => {
    fs.writeFileSync(
      path.join(dir, "config.json"),
      JSON.stringify({ pricelist: { tiers: [{ label: "M3" }] }, discount: 2000 })
    );

    const r = cli("run", "--input", "listing.xlsx", ...TABLES, "--config", "config.json");

    expect(r.code).toBe(0);
    expect(sheetAt("product_discount_output.xlsx").cell(2, 3)).toEqual({ kind: "number", value: 50_000 });
  });
});

describe("offerprice explain", () => {
  it("prints the explanation lines", () => {
    const r = cli("explain", "ABC+PC", ...TABLES);

    expect(r.code).toBe(0);
    expect(r.out).toEqual([
      [
        "INPUT   Seller SKU = 'ABC+PC'",
        "INPUT   Decomposed: base = 'ABC', add-ons = PC",
        "INPUT   Base price ABC @ M3 = 50000",
        "INPUT   Add-on PC = 2000",
        "INPUT   Flat discount = 0",
        "COMPUTE Offer price = base + add-ons - discount = 50000 + 2000 - 0 = 52000",
        "RESULT  Offer price = 52000",
      ].join("\n"),
    ]);
  });

  it("explains a failure without failing the command", () => {
    const r = cli("explain", "NOPE", ...TABLES, "--json");

    expect(r.code).toBe(0);
    expect(JSON.parse(r.out.join("\n")).lines.at(-1)).toEqual({
      kind: "RESULT",
      text: "Not priced (BASE_SKU_NOT_FOUND): Base SKU 'NOPE' not found in pricelist",
    });
  });
});

describe("offerprice inspect", () => {
  it("reports a loaded pricelist", () => {
    const r = cli("inspect", "pricelist", "pricelist.xlsx", "--json");

    expect(r.code).toBe(0);
    expect(JSON.parse(r.out.join("\n"))).toEqual({
      table: "pricelist",
      file: "pricelist.xlsx",
      header_row: 2,
      entries: 2,
      skipped_rows: [{ row: 5, key: "NOPRICE", reason_code: "NO_PRICE" }],
    });
  });

  it("reports an add-on table found by scanning", () => {
    const r = cli("inspect", "addons", "addons.xlsx");

    expect(r.code).toBe(0);
    expect(r.out).toEqual(["addons addons.xlsx", "  header row:   2", "  entries:      2", "  skipped rows: 0"]);
  });
});

describe("offerprice version and help", () => {
  it("prints the version", () => {
    expect(cli("version").out).toEqual([`offerprice v${VERSION}`]);
  });

  it("prints usage for --help", () => {
    const r = cli("--help");
    expect(r.code).toBe(0);
    expect(r.out[0]?.startsWith("offerprice - marketplace offer price generator")).toBe(true);
  });
});
