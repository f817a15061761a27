#!/usr/bin/env node
// packages/cli/src/offerprice.ts
/* eslint-disable no-console */

import * as fs from "node:fs";
import * as path from "node:path";

import { parsePricingConfig, ConfigError } from "../../config/src/index.js";
import type { PricingConfig } from "../../config/src/index.js";
import { loadPricelist, loadAddonTable, readInputRows, TableLoadError } from "../../tables/src/index.js";
import type { Pricelist, AddonPriceTable, InputRow, SkippedTableRow } from "../../tables/src/index.js";
import { runBatch, summarizeBatch, resolvePrice } from "../../pricing/src/index.js";
import { explainResolution, formatExplanation } from "../../explain/src/index.js";
import {
  readWorkbookSheet,
  renderOutput,
  exportIssues,
  freshWorkbookShape,
  templateOverlayShape,
  inPlaceUpdateShape,
} from "../../workbook/src/index.js";
import type { OutputShape, IssueFormat } from "../../workbook/src/index.js";

export const VERSION = "0.1.0";

/** Where the CLI writes. Tests swap in collectors. */
export type CliIO = {
  out(line: string): void;
  err(line: string): void;
  cwd: string;
};

const processIO: CliIO = {
  out: (line) => process.stdout.write(line + "\n"),
  err: (line) => console.error(line),
  cwd: process.cwd(),
};

function usage(): string {
  return `offerprice - marketplace offer price generator

Usage:
  offerprice --help
  offerprice version

  offerprice run --input <file>[,<file>...] --pricelist <file> --addons <file>
                 [--config <file.json>] [--tier <label>] [--discount <n>]
                 [--out <file.xlsx>] [--issues <file.csv|file.xlsx>]
                 [--shape fresh|template|in-place] [--template <file.xlsx>] [--template-row <n>]
                 [--max-rows <n>] [--json]
  offerprice explain <seller-sku> --pricelist <file> --addons <file>
                 [--config <file.json>] [--tier <label>] [--discount <n>] [--json]
  offerprice inspect <pricelist|addons> <file> [--config <file.json>] [--json]

Examples:
  offerprice run --input listing.xlsx --pricelist pricelist.xlsx --addons addons.xlsx --discount 5000
  offerprice run --input a.xlsx,b.xlsx --pricelist pl.xlsx --addons ad.xlsx --max-rows 500 --issues issues.csv
  offerprice explain "ABC+PC" --pricelist pricelist.xlsx --addons addons.xlsx
  offerprice inspect pricelist pricelist.xlsx --json
`;
}

/** Bad invocation: wrong flags, unreadable files. Printed with the usage text. */
class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

// -------------------- arg helpers --------------------

function getFlagValue(args: string[], flag: string): string | null {
  const i = args.indexOf(flag);
  if (i < 0) return null;
  const v = args[i + 1];
  if (!v || v.startsWith("--")) return null;
  return v;
}

function requireFlag(args: string[], flag: string, hint: string): string {
  const v = getFlagValue(args, flag);
  if (!v) throw new UsageError(`Missing ${flag} <${hint}>`);
  return v;
}

function intFlag(args: string[], flag: string): number | undefined {
  const v = getFlagValue(args, flag);
  if (v === null) {
    if (args.includes(flag)) throw new UsageError(`Missing value for ${flag}`);
    return undefined;
  }
  if (!/^\d+$/.test(v)) throw new UsageError(`${flag} must be a non-negative integer, got "${v}"`);
  return Number(v);
}

function positional(args: string[], i: number, what: string): string {
  const v = args[i];
  if (!v || v.startsWith("--")) throw new UsageError(`Missing ${what}.`);
  return v;
}

// -------------------- file helpers --------------------

function readBytes(io: CliIO, filePath: string): Buffer {
  const abs = path.resolve(io.cwd, filePath);
  if (!fs.existsSync(abs)) throw new UsageError(`file not found: ${filePath}`);
  return fs.readFileSync(abs);
}

function readJsonFile(io: CliIO, filePath: string): unknown {
  const raw = readBytes(io, filePath).toString("utf8");
  try {
    return JSON.parse(raw);
  } catch {
    throw new UsageError(`"${filePath}" is not valid JSON. First 120 chars: ${raw.slice(0, 120)}`);
  }
}

function writeBytes(io: CliIO, filePath: string, bytes: Buffer): string {
  const abs = path.resolve(io.cwd, filePath);
  fs.mkdirSync(path.dirname(abs), { recursive: true });
  fs.writeFileSync(abs, bytes);
  return abs;
}

function writeJsonPretty(io: CliIO, obj: unknown): void {
  io.out(JSON.stringify(obj, null, 2));
}

function log(io: CliIO, msg: string): void {
  io.err(`[offerprice] ${msg}`);
}

// -------------------- shared loading --------------------

function loadConfig(io: CliIO, args: string[], overrides: Record<string, unknown>): PricingConfig {
  const configFile = getFlagValue(args, "--config");
  const doc = configFile ? readJsonFile(io, configFile) : {};
  return parsePricingConfig(doc, overrides);
}

function runOverrides(args: string[]): Record<string, unknown> {
  const o: Record<string, unknown> = {};
  const tier = getFlagValue(args, "--tier");
  const discount = intFlag(args, "--discount");
  if (tier !== null) o.tier = tier;
  if (discount !== undefined) o.discount = discount;
  return o;
}

type Tables = { pricelist: Pricelist; addons: AddonPriceTable };

function loadTables(io: CliIO, args: string[], config: PricingConfig): Tables {
  const plFile = requireFlag(args, "--pricelist", "file");
  const adFile = requireFlag(args, "--addons", "file");

  const pl = loadPricelist(readWorkbookSheet(readBytes(io, plFile)), config.pricelist, config.magnitude);
  log(io, `pricelist ${plFile}: ${pl.entries.size} SKUs (header row ${pl.header_row})`);
  reportSkipped(io, plFile, pl.skipped_rows);

  const ad = loadAddonTable(readWorkbookSheet(readBytes(io, adFile)), config.addons, config.magnitude);
  log(io, `addons ${adFile}: ${ad.entries.size} codes (header row ${ad.header_row})`);
  reportSkipped(io, adFile, ad.skipped_rows);

  return { pricelist: pl.entries, addons: ad.entries };
}

function reportSkipped(io: CliIO, file: string, skipped: SkippedTableRow[]): void {
  if (skipped.length === 0) return;
  const sample = skipped
    .slice(0, 5)
    .map((s) => `${s.row} (${s.key})`)
    .join(", ");
  log(io, `${file}: skipped ${skipped.length} row(s) without a usable price: ${sample}${skipped.length > 5 ? ", ..." : ""}`);
}

// -------------------- commands --------------------

function cmdRun(io: CliIO, args: string[]): void {
  const inputs = requireFlag(args, "--input", "file")
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  if (inputs.length === 0) throw new UsageError("Missing --input <file>");

  const overrides = runOverrides(args);
  const maxRows = intFlag(args, "--max-rows");
  if (maxRows !== undefined) overrides.max_rows_per_file = maxRows;
  const outFile = getFlagValue(args, "--out");
  if (outFile) overrides.file_name = path.basename(outFile);

  const config = loadConfig(io, args, overrides);
  const tables = loadTables(io, args, config);

  // ---- read every input sheet, in the order given
  const rows: InputRow[] = [];
  let firstPriceColumn = 0;
  for (const file of inputs) {
    const read = readInputRows(readWorkbookSheet(readBytes(io, file)), config.input, path.basename(file));
    log(io, `input ${file}: ${read.rows.length} data row(s) (header row ${read.header_row})`);
    if (firstPriceColumn === 0) firstPriceColumn = read.columns.price;
    rows.push(...read.rows);
  }

  const shape = pickShape(io, args, inputs, firstPriceColumn);
  if (!shape.splittable && config.output.max_rows_per_file !== null) {
    throw new UsageError(`--shape ${shape.name} writes one workbook; drop --max-rows / output.max_rows_per_file`);
  }

  const result = runBatch(rows, { ...tables, tier: config.tier, discount: config.discount });
  const summary = summarizeBatch(result);

  // ---- output artifact
  const rendered = renderOutput(result.output, {
    shape,
    file_name: config.output.file_name,
    max_rows_per_file: config.output.max_rows_per_file,
  });
  const outDir = outFile ? path.dirname(outFile) : ".";
  const written = writeBytes(io, path.join(outDir, rendered.file_name), rendered.bytes);

  // ---- issues
  const issuesFile = getFlagValue(args, "--issues");
  let issuesWritten: string | null = null;
  if (issuesFile) {
    issuesWritten = writeBytes(io, issuesFile, exportIssues(result.issues, issueFormat(issuesFile)));
  }

  log(
    io,
    `tier ${config.tier}, discount ${config.discount}: priced ${summary.rows_priced}, ` +
      `failed ${summary.rows_failed}, blank ${summary.skipped_blank}`
  );
  for (const i of result.issues.slice(0, 10)) {
    log(io, `  ${i.ref.file ?? "?"}:${i.ref.row} ${i.message}`);
  }
  if (result.issues.length > 10) log(io, `  ... ${result.issues.length - 10} more`);
  log(io, `wrote ${written}`);
  if (issuesWritten) log(io, `wrote ${issuesWritten}`);

  if (args.includes("--json")) {
    writeJsonPretty(io, {
      ok: true,
      output: written,
      parts: rendered.kind === "zip" ? rendered.parts : null,
      issues_file: issuesWritten,
      summary,
      issues: result.issues,
    });
  }
}

function pickShape(io: CliIO, args: string[], inputs: string[], priceColumn: number): OutputShape {
  const name = getFlagValue(args, "--shape") ?? "fresh";

  if (name === "fresh") return freshWorkbookShape();

  if (name === "template") {
    const template = readBytes(io, requireFlag(args, "--template", "file.xlsx"));
    return templateOverlayShape({ template, data_start_row: intFlag(args, "--template-row") ?? 2 });
  }

  if (name === "in-place") {
    const [only, ...rest] = inputs;
    if (only === undefined || rest.length > 0) {
      throw new UsageError("--shape in-place takes exactly one --input file");
    }
    return inPlaceUpdateShape({
      source: readBytes(io, only),
      price_column: priceColumn,
      file: path.basename(only),
    });
  }

  throw new UsageError(`Unknown --shape: ${name} (expected fresh, template or in-place)`);
}

function issueFormat(file: string): IssueFormat {
  const ext = path.extname(file).toLowerCase();
  if (ext === ".csv") return "csv";
  if (ext === ".xlsx") return "xlsx";
  throw new UsageError(`--issues must end in .csv or .xlsx, got "${file}"`);
}

function cmdExplain(io: CliIO, args: string[]): void {
  const sku = positional(args, 1, "seller SKU");
  const config = loadConfig(io, args, runOverrides(args));
  const { pricelist, addons } = loadTables(io, args, config);

  const explanation = explainResolution(sku, resolvePrice(sku, config.tier, pricelist, addons, config.discount));

  if (args.includes("--json")) writeJsonPretty(io, explanation);
  else io.out(formatExplanation(explanation));
}

function cmdInspect(io: CliIO, args: string[]): void {
  const which = positional(args, 1, "table kind (pricelist|addons)");
  const file = positional(args, 2, "file");
  const config = loadConfig(io, args, {});
  const sheet = readWorkbookSheet(readBytes(io, file));

  let report: { table: string; file: string; header_row: number; entries: number; skipped_rows: SkippedTableRow[] };
  if (which === "pricelist") {
    const pl = loadPricelist(sheet, config.pricelist, config.magnitude);
    report = { table: which, file, header_row: pl.header_row, entries: pl.entries.size, skipped_rows: pl.skipped_rows };
  } else if (which === "addons") {
    const ad = loadAddonTable(sheet, config.addons, config.magnitude);
    report = { table: which, file, header_row: ad.header_row, entries: ad.entries.size, skipped_rows: ad.skipped_rows };
  } else {
    throw new UsageError(`Unknown table kind: ${which} (expected pricelist or addons)`);
  }

  if (args.includes("--json")) {
    writeJsonPretty(io, report);
    return;
  }
  io.out(`${report.table} ${report.file}`);
  io.out(`  header row:   ${report.header_row}`);
  io.out(`  entries:      ${report.entries}`);
  io.out(`  skipped rows: ${report.skipped_rows.length}`);
  for (const s of report.skipped_rows) io.out(`    row ${s.row} (${s.key}): ${s.reason_code}`);
}

// -------------------- entry --------------------

/**
 * Run one CLI invocation and return its exit code: 0 on success, 1 on a
 * usage, config or table-load error. Rows that fail to price do not change
 * the exit code; they are reported as issues.
 */
export function runCli(argv: string[] = process.argv, io: CliIO = processIO): number {
  const args = argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    io.out(usage());
    return 0;
  }

  const cmd = args[0];

  try {
    if (cmd === "version") {
      io.out(`offerprice v${VERSION}`);
      return 0;
    }
    if (cmd === "run") {
      cmdRun(io, args);
      return 0;
    }
    if (cmd === "explain") {
      cmdExplain(io, args);
      return 0;
    }
    if (cmd === "inspect") {
      cmdInspect(io, args);
      return 0;
    }
    throw new UsageError(`Unknown command: ${cmd}`);
  } catch (e) {
    if (e instanceof UsageError) {
      log(io, e.message);
      io.err(usage());
      return 1;
    }
    if (e instanceof ConfigError) {
      log(io, "invalid config:");
      for (const i of e.issues) log(io, `  ${i}`);
      return 1;
    }
    if (e instanceof TableLoadError) {
      log(io, e.message);
      return 1;
    }
    throw e;
  }
}

// Entrypoint: run when invoked as the script (node, tsx or the npm bin link)
const argv1 = process.argv[1] ?? "";
if (/offerprice(\.[cm]?[jt]s)?$/.test(argv1)) {
  process.exitCode = runCli(process.argv);
}
