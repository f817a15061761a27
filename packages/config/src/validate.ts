import { z } from "zod";
import { defaultPricingConfig } from "./defaults.js";
import type { PricingConfig } from "./schema.js";

/* ------------------------------------------------------------------ */
/*                              Primitives                            */
/* ------------------------------------------------------------------ */

const Row = z.number().int().min(1);

const Synonyms = z.array(z.string().trim().min(1)).min(1);

const HeaderSearchSchema = z
  .discriminatedUnion("kind", [
    z.object({ kind: z.literal("fixed"), row: Row }),
    z.object({ kind: z.literal("scan"), first_row: Row, last_row: Row }),
  ])
  .refine((h) => h.kind === "fixed" || h.first_row <= h.last_row, "first_row must not exceed last_row");

const Discount = z.number().int().min(0);

const MaxRows = z.number().int().positive().nullable();

/* ------------------------------------------------------------------ */
/*                               Layouts                              */
/* ------------------------------------------------------------------ */

const InputSchema = z
  .object({
    header: HeaderSearchSchema.optional(),
    data_start_row: Row.nullable().optional(),
    columns: z
      .object({
        product_id: Synonyms.optional(),
        sku_id: Synonyms.optional(),
        price: Synonyms.optional(),
        stock: Synonyms.optional(),
        seller_sku: Synonyms.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

const PricelistSchema = z
  .object({
    header: HeaderSearchSchema.optional(),
    sku_column: Synonyms.optional(),
    tiers: z
      .array(
        z
          .object({
            label: z.string().trim().min(1),
            synonyms: Synonyms.optional(), // defaults to [label]
          })
          .strict()
      )
      .min(1)
      .optional(),
  })
  .strict();

const AddonsSchema = z
  .object({
    header: HeaderSearchSchema.optional(),
    code_column: Synonyms.optional(),
    price_column: Synonyms.optional(),
  })
  .strict();

/* ------------------------------------------------------------------ */
/*                               Config                               */
/* ------------------------------------------------------------------ */

export const PricingConfigSchema = z
  .object({
    input: InputSchema.optional(),
    pricelist: PricelistSchema.optional(),
    addons: AddonsSchema.optional(),
    magnitude: z
      .object({
        threshold: z.number().int().positive().optional(),
        multiplier: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    tier: z.string().trim().min(1).optional(),
    discount: Discount.optional(),
    output: z
      .object({
        file_name: z.string().trim().min(1).optional(),
        max_rows_per_file: MaxRows.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

/** Per-run values that a caller (e.g. CLI flags) lays over the document. */
export const PricingOverridesSchema = z
  .object({
    tier: z.string().trim().min(1).optional(),
    discount: Discount.optional(),
    max_rows_per_file: MaxRows.optional(),
    file_name: z.string().trim().min(1).optional(),
  })
  .strict();

export type PricingConfigInput = z.infer<typeof PricingConfigSchema>;
export type PricingOverrides = z.infer<typeof PricingOverridesSchema>;

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid pricing config: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Parse a partial config document, lay it over the defaults and apply the
 * per-run overrides. Throws ConfigError listing every problem found.
 */
export function parsePricingConfig(input: unknown = {}, overrides: unknown = {}): PricingConfig {
  const doc = PricingConfigSchema.safeParse(input);
  const ov = PricingOverridesSchema.safeParse(overrides);

  const issues = [
    ...(doc.success ? [] : formatIssues(doc.error, "")),
    ...(ov.success ? [] : formatIssues(ov.error, "overrides.")),
  ];
  if (!doc.success || !ov.success) throw new ConfigError(issues);

  const config = mergeOverDefaults(doc.data, ov.data);

  const problems = checkConsistency(config);
  if (problems.length > 0) throw new ConfigError(problems);

  return config;
}

/* ------------------------------ internals ----------------------------- */

function mergeOverDefaults(c: PricingConfigInput, ov: PricingOverrides): PricingConfig {
  const d = defaultPricingConfig();
  const cols = c.input?.columns;
  const dataStart = c.input?.data_start_row;
  const maxRows = ov.max_rows_per_file !== undefined ? ov.max_rows_per_file : c.output?.max_rows_per_file;

  return {
    input: {
      header: c.input?.header ?? d.input.header,
      data_start_row: dataStart === undefined ? d.input.data_start_row : dataStart,
      columns: {
        product_id: cols?.product_id ?? d.input.columns.product_id,
        sku_id: cols?.sku_id ?? d.input.columns.sku_id,
        price: cols?.price ?? d.input.columns.price,
        stock: cols?.stock ?? d.input.columns.stock,
        seller_sku: cols?.seller_sku ?? d.input.columns.seller_sku,
      },
    },

    pricelist: {
      header: c.pricelist?.header ?? d.pricelist.header,
      sku_column: c.pricelist?.sku_column ?? d.pricelist.sku_column,
      tiers:
        c.pricelist?.tiers?.map((t) => ({ label: t.label, synonyms: t.synonyms ?? [t.label] })) ??
        d.pricelist.tiers,
    },

    addons: {
      header: c.addons?.header ?? d.addons.header,
      code_column: c.addons?.code_column ?? d.addons.code_column,
      price_column: c.addons?.price_column ?? d.addons.price_column,
    },

    magnitude: {
      threshold: c.magnitude?.threshold ?? d.magnitude.threshold,
      multiplier: c.magnitude?.multiplier ?? d.magnitude.multiplier,
    },

    tier: ov.tier ?? c.tier ?? d.tier,
    discount: ov.discount ?? c.discount ?? d.discount,

    output: {
      file_name: ov.file_name ?? c.output?.file_name ?? d.output.file_name,
      max_rows_per_file: maxRows === undefined ? d.output.max_rows_per_file : maxRows,
    },
  };
}

function checkConsistency(c: PricingConfig): string[] {
  const problems: string[] = [];
  const labels = c.pricelist.tiers.map((t) => t.label);

  const seen = new Set<string>();
  for (const l of labels) {
    if (seen.has(l)) problems.push(`pricelist.tiers: duplicate tier label '${l}'`);
    seen.add(l);
  }

  // the pricelist loader keys its SKU column under this name
  if (labels.includes("SKU")) problems.push("pricelist.tiers: 'SKU' is reserved for the SKU column");

  if (!labels.includes(c.tier)) {
    problems.push(`tier: '${c.tier}' is not one of the pricelist tiers (${labels.join(", ")})`);
  }

  return problems;
}

function formatIssues(err: z.ZodError, prefix: string): string[] {
  return err.issues.map((i) => {
    const path = i.path.map(String).join(".");
    return `${prefix}${path || "(root)"}: ${i.message}`;
  });
}
