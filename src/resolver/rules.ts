import { createDescriptor, parametersFromLists } from "../catalog/catalog";
import type { FunctionDescriptor } from "../catalog/types";
import type { OverrideRule } from "../config";

/**
 * Built-in override rules
 * Linear regression is the most common query; it must never depend on
 * embedding rank
 */
export const DEFAULT_OVERRIDE_RULES: OverrideRule[] = [
  {
    name: "linear-regression",
    triggers: ["linear regression", "linear model"],
    target: {
      language: "r",
      namespace: "stats",
      name: "lm",
      keyPattern: "stats::lm|linear regression",
    },
    fallback: {
      displayKey: "R: stats::lm - Linear Models for regression analysis",
      parameters: [{ name: "formula" }, { name: "data" }],
      signature: "stats::lm(formula, data, ...)",
      description: "Fits Linear Models. The lm function is used to fit linear models.",
    },
    defaults: {
      formula: { r: "y ~ x", javascript: "y ~ x" },
      data: { r: "cars", javascript: [[1, 2], [2, 3], [3, 4]] },
    },
  },
];

export function normalizeQuery(query: string): string {
  return query.trim().toLowerCase();
}

/**
 * Every rule with a trigger phrase inside the query (case-insensitive), in table order
 */
export function matchingRules(rules: readonly OverrideRule[], query: string): OverrideRule[] {
  const normalized = normalizeQuery(query);
  return rules.filter(rule => rule.triggers.some(trigger => normalized.includes(trigger.toLowerCase())));
}

export function matchRule(rules: readonly OverrideRule[], query: string): OverrideRule | undefined {
  return matchingRules(rules, query)[0];
}

/**
 * Descriptor synthesised from a rule when the catalog has nothing to offer
 */
export function ruleFallbackDescriptor(rule: OverrideRule): FunctionDescriptor {
  const { target, fallback } = rule;
  return createDescriptor({
    language: target.language,
    namespace: target.namespace,
    name: target.name,
    parameters: parametersFromLists(
      fallback.parameters.map(p => p.name),
      fallback.parameters.map(p => p.default),
    ),
    signature: fallback.signature,
    description: fallback.description,
    displayKey: fallback.displayKey,
  });
}
