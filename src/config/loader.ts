import { parse, printParseErrorCode } from "jsonc-parser";
import type { ParseError } from "jsonc-parser";
import { z } from "zod";
import { access, mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { isMissingFile } from "../errors";
import { ConfigSchema } from "./schema";

export type ConfigParseResult = ReturnType<typeof ConfigSchema.safeParse>;

/**
 * Generate default config content
 * @returns JSONC string with default config
 */
export function generateDefaultConfig(): string {
  return `{
  "catalog": {
    // SQLite file holding the function catalog
    // "path": "~/.local/share/autods/catalog.db",
    // JSON records loaded by the \`seed\` command
    // "seed": "./data/catalog.seed.json"
  },
  "index": {
    "batchSize": 100
  },
  "embedding": {
    "provider": "openai",
    "model": "text-embedding-3-small",
    "apiKey": "{env:OPENAI_API_KEY}"
  },
  "runtimes": {
    "r": {
      "command": "Rscript"
    }
  },
  "settings": {
    "logLevel": "info"
  }
}
`;
}

/**
 * Create default config file if it doesn't exist
 * @param filePath - Path to config file
 * @returns true if file was created, false if it already existed
 */
export async function createDefaultConfigIfMissing(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return false;
  } catch (error) {
    if (!isMissingFile(error)) throw error;
  }

  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, generateDefaultConfig(), "utf-8");
  return true;
}

/**
 * Interpolate environment variables in config values
 * Handles {env:VAR_NAME} pattern
 */
function interpolateEnvVars(value: unknown): unknown {
  if (typeof value === "string") {
    // Replace {env:VAR_NAME} with actual env var or empty string
    return value.replace(/\{env:([A-Za-z_][A-Za-z0-9_]*)\}/g, (_, varName: string) => {
      return process.env[varName] || "";
    });
  }

  if (Array.isArray(value)) {
    return value.map(interpolateEnvVars);
  }

  if (value && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = interpolateEnvVars(entry);
    }
    return result;
  }

  return value;
}

/**
 * Expand a leading "~/" in path settings
 */
function expandHome(path: string): string {
  const home = process.env.HOME;
  return home && path.startsWith("~/") ? `${home}${path.slice(1)}` : path;
}

function failure(message: string): ConfigParseResult {
  return {
    success: false,
    error: new z.ZodError([
      {
        code: z.ZodIssueCode.custom,
        message,
        path: [],
      },
    ]),
  };
}

/**
 * Parse and validate autods.jsonc config
 * @param jsonc - JSONC string (may contain comments)
 * @returns Zod validation result
 */
export function parseConfig(jsonc: string): ConfigParseResult {
  // Parse JSONC (handles comments and trailing commas)
  const errors: ParseError[] = [];
  const parsed: unknown = parse(jsonc, errors, { allowTrailingComma: true });
  const firstError = errors[0];
  if (firstError) {
    return failure(`Failed to parse JSONC: ${printParseErrorCode(firstError.error)} at offset ${firstError.offset}`);
  }

  // Interpolate environment variables
  const interpolated = interpolateEnvVars(parsed ?? {});

  // Validate against schema
  const result = ConfigSchema.safeParse(interpolated);
  if (!result.success) {
    return result;
  }

  const config = result.data;
  config.catalog.path = expandHome(config.catalog.path);
  if (config.catalog.seed) {
    config.catalog.seed = expandHome(config.catalog.seed);
  }
  config.index.dir = expandHome(config.index.dir);
  config.settings.logFile = expandHome(config.settings.logFile);
  return result;
}

/**
 * Load config from file path
 * @param filePath - Path to config file
 * @returns Zod validation result
 */
export async function loadConfig(filePath: string): Promise<ConfigParseResult> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (error) {
    return failure(`Failed to read config file: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseConfig(content);
}
