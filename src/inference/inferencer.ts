import { requiredParameters } from "../catalog/catalog";
import type { ArgumentMap, FunctionDescriptor } from "../catalog/types";
import type { OverrideRule, RuleDefault } from "../config";
import type { Logger } from "../logger";
import type { Profiler } from "../profiler";
import { DEFAULT_OVERRIDE_RULES, matchingRules } from "../resolver/rules";

/**
 * Required parameters filled for any query when no rule supplied them
 */
export const DEFAULT_FALLBACK_DEFAULTS: Readonly<Record<string, RuleDefault>> = {
  data: { r: "iris" },
};

export type InferencerOptions = {
  rules?: OverrideRule[];
  fallbackDefaults?: Record<string, RuleDefault>;
  logger?: Logger;
  profiler?: Profiler;
};

/**
 * Own data property, so keys like "__proto__" stay ordinary entries
 */
function setArgument(args: ArgumentMap, key: string, value: unknown): void {
  Object.defineProperty(args, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Fills an ArgumentMap from caller arguments plus rule defaults
 *
 * Order of the result:
 *   1. required parameters the caller supplied, in parameter order
 *   2. the rest of the caller's keys, in their order
 *   3. rule defaults for required parameters still missing
 *   4. fallback defaults for required parameters still missing
 *
 * Completeness is not checked; a missing argument surfaces at execution.
 */
export class ArgumentInferencer {
  private readonly rules: OverrideRule[];
  private readonly fallbackDefaults: Readonly<Record<string, RuleDefault>>;
  private readonly logger: Logger | undefined;
  private readonly profiler: Profiler | undefined;

  constructor(options?: InferencerOptions) {
    this.rules = options?.rules ?? DEFAULT_OVERRIDE_RULES;
    this.fallbackDefaults = options?.fallbackDefaults ?? DEFAULT_FALLBACK_DEFAULTS;
    this.logger = options?.logger;
    this.profiler = options?.profiler;
  }

  infer(descriptor: FunctionDescriptor, query: string, providedArgs: ArgumentMap = {}): ArgumentMap {
    const timer = this.profiler?.startTimer("infer");
    const args: ArgumentMap = {};
    const required = requiredParameters(descriptor);

    for (const name of required) {
      if (Object.hasOwn(providedArgs, name)) {
        setArgument(args, name, providedArgs[name]);
      }
    }

    for (const [key, value] of Object.entries(providedArgs)) {
      if (!Object.hasOwn(args, key)) {
        setArgument(args, key, value);
      }
    }

    const filled: string[] = [];
    const fill = (defaults: Readonly<Record<string, RuleDefault>>): void => {
      for (const [name, perLanguage] of Object.entries(defaults)) {
        if (!required.includes(name) || Object.hasOwn(args, name)) continue;
        if (!Object.hasOwn(perLanguage, descriptor.language)) continue;
        setArgument(args, name, perLanguage[descriptor.language]);
        filled.push(name);
      }
    };

    for (const rule of matchingRules(this.rules, query)) {
      fill(rule.defaults);
    }
    fill(this.fallbackDefaults);

    timer?.();
    this.logger?.info("Inferred arguments", {
      displayKey: descriptor.displayKey,
      args,
      ...(filled.length > 0 ? { defaulted: filled } : {}),
    });
    return args;
  }
}
