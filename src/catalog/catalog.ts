import type { DescriptorSummary, FunctionDescriptor, Language, ParameterSpec } from "./types";

/** Default values that still mark a parameter as required */
export const EMPTY_DEFAULTS: ReadonlySet<string> = new Set(["", "None", "NULL"]);

const SUMMARY_LENGTH = 100;

const LANGUAGE_LABELS: Record<Language, string> = {
  javascript: "JavaScript",
  r: "R",
};

/**
 * Qualified name in the runtime's own notation
 * (`node:path.basename`, `stats::lm`)
 */
export function qualifiedName(language: Language, namespace: string, name: string): string {
  return language === "r" ? `${namespace}::${name}` : `${namespace}.${name}`;
}

/**
 * Build the display key for a function
 * Format: "<Label>: <qualified name> - <first 100 chars of description>"
 */
export function buildDisplayKey(
  language: Language,
  namespace: string,
  name: string,
  description: string
): string {
  const label = LANGUAGE_LABELS[language];
  const qualified = qualifiedName(language, namespace, name);
  const flat = description.replace(/\s+/g, " ").trim();
  const summary = flat ? flat.slice(0, SUMMARY_LENGTH) : `${label} function ${qualified}`;
  return `${label}: ${qualified} - ${summary}`;
}

/**
 * A parameter is required when it has no default, or when its default
 * is one of the empty sentinels
 */
export function isRequired(param: ParameterSpec): boolean {
  if (!param.hasDefault) return true;
  return param.defaultValue === undefined || EMPTY_DEFAULTS.has(param.defaultValue);
}

/**
 * Names of the required parameters, in declaration order
 */
export function requiredParameters(descriptor: FunctionDescriptor): string[] {
  return descriptor.parameters.filter(isRequired).map(p => p.name);
}

/**
 * Build parameter specs from parallel name/default lists
 * (the shape catalog scrapers emit)
 */
export function parametersFromLists(
  names: string[],
  defaults: Array<string | null | undefined>
): ParameterSpec[] {
  return names.map((name, i) => {
    const value = defaults[i];
    if (value === undefined || value === null) {
      return { name, hasDefault: false };
    }
    return { name, hasDefault: true, defaultValue: value };
  });
}

/**
 * Render a signature when the catalog record carries none
 */
export function renderSignature(
  language: Language,
  namespace: string,
  name: string,
  parameters: ParameterSpec[]
): string {
  const params = parameters
    .map(p => (p.hasDefault && p.defaultValue ? `${p.name} = ${p.defaultValue}` : p.name))
    .join(", ");
  return `${qualifiedName(language, namespace, name)}(${params})`;
}

/**
 * Create a descriptor, deriving the display key and signature when absent
 */
export function createDescriptor(input: {
  language: Language;
  namespace: string;
  name: string;
  parameters: ParameterSpec[];
  signature?: string;
  description?: string;
  displayKey?: string;
}): FunctionDescriptor {
  const description = input.description ?? "";
  const displayKey = input.displayKey ?? buildDisplayKey(input.language, input.namespace, input.name, description);
  if (displayKey.includes("\n")) {
    throw new Error(`Display key must be a single line: ${JSON.stringify(displayKey)}`);
  }

  return {
    displayKey,
    language: input.language,
    namespace: input.namespace,
    name: input.name,
    parameters: input.parameters.map(p => ({ ...p })),
    signature: input.signature || renderSignature(input.language, input.namespace, input.name, input.parameters),
    description,
  };
}

export function summarize(descriptor: FunctionDescriptor): DescriptorSummary {
  return {
    displayKey: descriptor.displayKey,
    language: descriptor.language,
    namespace: descriptor.namespace,
    name: descriptor.name,
  };
}
