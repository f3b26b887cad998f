import type { ArgumentMap, FunctionDescriptor, Language } from "../catalog/types";
import { bindArguments } from "../execution/native";

function isRowList(value: unknown): value is unknown[][] {
  return Array.isArray(value) && value.length > 0 && value.every(row => Array.isArray(row));
}

function bigintLiteral(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? Number(value) : value;
}

function formatValue(value: unknown, language: Language): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "bigint") return language === "javascript" ? `${value}n` : String(value);
  if (value === undefined) return language === "r" ? "NULL" : "undefined";

  if (language === "r") {
    if (value === null) return "NULL";
    if (typeof value === "boolean") return value ? "TRUE" : "FALSE";
    if (isRowList(value)) {
      return `rbind(${value.map(row => `c(${row.map(v => formatValue(v, language)).join(", ")})`).join(", ")})`;
    }
    if (Array.isArray(value)) {
      return `c(${value.map(v => formatValue(v, language)).join(", ")})`;
    }
  }

  if (typeof value === "object") return JSON.stringify(value, bigintLiteral);
  return String(value);
}

/**
 * Import alias for a module specifier: "node:path" -> "path", "lodash/fp" -> "fp"
 */
export function moduleAlias(namespace: string): string {
  const segment = namespace.split(/[/:]/).filter(Boolean).pop() ?? "";
  const alias = segment.replace(/[^A-Za-z0-9_$]/g, "_");
  if (alias === "") return "mod";
  return /^[0-9]/.test(alias) ? `_${alias}` : alias;
}

/**
 * Source text showing how the function was called
 * Documentation only, never evaluated
 */
export function generateCodeSnippet(descriptor: FunctionDescriptor, args: ArgumentMap): string {
  const { language, namespace, name } = descriptor;

  if (language === "javascript") {
    const alias = moduleAlias(namespace);
    const { values, unexpected } = bindArguments(descriptor, args);
    const rendered = [...values, ...unexpected.map(key => args[key])].map(v => formatValue(v, language));
    return `import * as ${alias} from ${JSON.stringify(namespace)};\n${alias}.${name}(${rendered.join(", ")})`;
  }

  const rendered = Object.entries(args).map(([key, value]) => `${key}=${formatValue(value, language)}`);
  return `library(${namespace})\n${namespace}::${name}(${rendered.join(", ")})`;
}
