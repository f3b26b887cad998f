import { homedir } from "os";
import { join } from "path";
import { z } from "zod";

export const DATA_DIR = join(homedir(), ".local", "share", "autods");
export const DEFAULT_CONFIG_PATH = join(homedir(), ".config", "autods", "autods.jsonc");

export const LanguageSchema = z.enum(["javascript", "r"]);

/**
 * Catalog storage
 */
export const CatalogConfigSchema = z.object({
  /** SQLite database file (":memory:" for a throwaway catalog) */
  path: z.string().min(1).default(join(DATA_DIR, "catalog.db")),
  /** JSON seed file used by the `seed` command */
  seed: z.string().optional(),
});

/**
 * Vector index build and search
 */
export const IndexConfigSchema = z.object({
  /** Directory holding functions.index, descriptions.txt and function_map.json */
  dir: z.string().min(1).default(join(DATA_DIR, "index")),
  /** Display keys per embedding request (default: 100) */
  batchSize: z.number().int().min(1).max(2048).default(100),
});

/**
 * Embedding provider
 * - "openai": OpenAI embeddings API, needs an API key
 * - "hash": local feature hashing, no network (tests and offline use)
 */
export const EmbeddingConfigSchema = z.object({
  provider: z.enum(["openai", "hash"]).default("openai"),
  model: z.string().min(1).default("text-embedding-3-small"),
  apiKey: z.string().optional().describe("Usually {env:OPENAI_API_KEY}"),
  baseUrl: z.string().url().optional(),
  dimensions: z.number().int().min(8).max(4096).optional(),
});

/**
 * R bridge
 */
export const RRuntimeConfigSchema = z.object({
  command: z.string().min(1).default("Rscript"),
  /** Milliseconds before the Rscript process is killed, 0 to wait forever */
  timeout: z.number().int().min(0).default(120000),
});

export const RuntimesConfigSchema = z.object({
  r: RRuntimeConfigSchema.default({}),
});

/**
 * Per-language value for an argument filled in by an override rule
 */
export const RuleDefaultSchema = z.object({
  javascript: z.unknown().optional(),
  r: z.unknown().optional(),
});

export const ParameterRecordSchema = z.object({
  name: z.string().min(1),
  default: z.string().nullable().optional(),
});

/**
 * Deterministic short-circuit for a known high-value query
 */
export const OverrideRuleSchema = z.object({
  name: z.string().min(1),
  /** Case-insensitive substrings of the query that trigger the rule */
  triggers: z.array(z.string().min(1)).min(1),
  target: z.object({
    language: LanguageSchema,
    namespace: z.string().min(1),
    name: z.string().min(1),
    /** Case-insensitive regex over display keys, tried when no exact match */
    keyPattern: z.string().min(1),
  }),
  /** Descriptor synthesised when the catalog has no match at all */
  fallback: z.object({
    displayKey: z.string().min(1).optional(),
    parameters: z.array(ParameterRecordSchema),
    signature: z.string().optional(),
    description: z.string().default(""),
  }),
  /** Missing required arguments filled in when the rule triggers */
  defaults: z.record(z.string(), RuleDefaultSchema).default({}),
});

export const SettingsConfigSchema = z.object({
  logFile: z.string().default(join(DATA_DIR, "autods.log")),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

/**
 * AutoDS configuration schema
 * Located at ~/.config/autods/autods.jsonc
 */
export const ConfigSchema = z.object({
  catalog: CatalogConfigSchema.default({}),
  index: IndexConfigSchema.default({}),
  embedding: EmbeddingConfigSchema.default({}),
  runtimes: RuntimesConfigSchema.default({}),
  /** Replaces the built-in override rules when present */
  rules: z.array(OverrideRuleSchema).optional(),
  settings: SettingsConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type CatalogConfig = z.infer<typeof CatalogConfigSchema>;
export type IndexConfig = z.infer<typeof IndexConfigSchema>;
export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>;
export type RRuntimeConfig = z.infer<typeof RRuntimeConfigSchema>;
export type OverrideRule = z.infer<typeof OverrideRuleSchema>;
export type RuleDefault = z.infer<typeof RuleDefaultSchema>;
export type ParameterRecord = z.infer<typeof ParameterRecordSchema>;
export type SettingsConfig = z.infer<typeof SettingsConfigSchema>;
export type LogLevel = SettingsConfig["logLevel"];
