import { readFile } from "fs/promises";
import { z } from "zod";
import { LanguageSchema, ParameterRecordSchema } from "../config/schema";
import type { OverrideRule } from "../config/schema";
import { DEFAULT_OVERRIDE_RULES, ruleFallbackDescriptor } from "../resolver/rules";
import { createDescriptor, parametersFromLists } from "./catalog";
import type { CatalogStore } from "./store";
import type { FunctionDescriptor, Language } from "./types";

/**
 * Raw record as emitted by a catalog scraper
 */
export const CatalogRecordSchema = z.object({
  language: LanguageSchema,
  package: z.string().min(1),
  function_name: z.string().min(1),
  parameters: z.array(ParameterRecordSchema).default([]),
  signature: z.string().optional(),
  description: z.string().default(""),
  /** Explicit display key; derived from the record when absent */
  key: z.string().min(1).optional(),
});

export const CatalogSeedSchema = z.array(CatalogRecordSchema);

export type CatalogRecord = z.infer<typeof CatalogRecordSchema>;

/**
 * Hand-written entries for common tasks, so their phrasing is embedded
 * even when scraped descriptions are terse
 */
const COMMON_TASKS: CatalogRecord[] = [
  {
    key: "R: stats::lm - Perform linear regression on data",
    language: "r",
    package: "stats",
    function_name: "lm",
    parameters: [{ name: "formula", default: "" }, { name: "data", default: "" }],
    signature: "stats::lm(formula, data, ...)",
    description: "Linear regression modeling for statistical analysis. Used to fit linear models to data.",
  },
  {
    key: "R: stats::t.test - Perform t-test for statistical significance",
    language: "r",
    package: "stats",
    function_name: "t.test",
    parameters: [{ name: "x", default: "" }, { name: "y", default: "NULL" }],
    signature: "stats::t.test(x, y = NULL, ...)",
    description: "Student's t-test for comparing means between samples.",
  },
  {
    key: "R: stats::cor - Calculate correlation between variables",
    language: "r",
    package: "stats",
    function_name: "cor",
    parameters: [{ name: "x", default: "" }, { name: "y", default: "NULL" }],
    signature: "stats::cor(x, y = NULL, ...)",
    description: "Correlation coefficient calculation between variables.",
  },
];

export function recordToDescriptor(record: CatalogRecord): FunctionDescriptor {
  return createDescriptor({
    language: record.language,
    namespace: record.package,
    name: record.function_name,
    parameters: parametersFromLists(
      record.parameters.map(p => p.name),
      record.parameters.map(p => p.default),
    ),
    signature: record.signature,
    description: record.description,
    displayKey: record.key,
  });
}

/**
 * Normalise scraper records into descriptors
 * - first record wins when two produce the same display key
 * - guarantees an entry for every override rule target
 * - appends the common-task entries whose keys are absent
 */
export function unifyRecords(
  records: CatalogRecord[],
  rules: readonly OverrideRule[] = DEFAULT_OVERRIDE_RULES,
): FunctionDescriptor[] {
  const byKey = new Map<string, FunctionDescriptor>();
  const add = (descriptor: FunctionDescriptor) => {
    if (!byKey.has(descriptor.displayKey)) {
      byKey.set(descriptor.displayKey, descriptor);
    }
  };

  for (const record of records) {
    add(recordToDescriptor(record));
  }

  for (const rule of rules) {
    const { language, namespace, name } = rule.target;
    const present = [...byKey.values()].some(
      d => d.language === language && d.namespace === namespace && d.name === name,
    );
    if (!present) {
      add(ruleFallbackDescriptor(rule));
    }
  }

  for (const task of COMMON_TASKS) {
    add(recordToDescriptor(task));
  }

  return [...byKey.values()];
}

export type SeedSummary = Record<Language, number> & { total: number };

/**
 * Rebuild the catalog from raw records (clear + reinsert)
 */
export function seedCatalog(
  store: CatalogStore,
  records: CatalogRecord[],
  rules: readonly OverrideRule[] = DEFAULT_OVERRIDE_RULES,
): SeedSummary {
  const descriptors = unifyRecords(records, rules);
  store.replaceAll(descriptors);
  return {
    javascript: descriptors.filter(d => d.language === "javascript").length,
    r: descriptors.filter(d => d.language === "r").length,
    total: descriptors.length,
  };
}

/**
 * Read and validate a JSON seed file
 */
export async function loadSeedFile(filePath: string): Promise<CatalogRecord[]> {
  const content = await readFile(filePath, "utf-8");
  return CatalogSeedSchema.parse(JSON.parse(content));
}
