import type { ArgumentMap, FunctionDescriptor } from "../../catalog/types";
import { normalizeError } from "../../errors";
import type { Logger } from "../../logger";
import { executionFailure } from "../types";
import type { ExecutionResult, Executor } from "../types";
import type { BridgeOutcome, Coefficient, RBridge } from "./bridge";
import { shapeArgument } from "./values";
import type { ShapeContext } from "./values";
import type { RValue } from "./values";

/** The call whose result is summarised as intercept and slope */
export function isRegressionCall(descriptor: Pick<FunctionDescriptor, "namespace" | "name">): boolean {
  return descriptor.namespace === "stats" && descriptor.name === "lm";
}

export function formatRegressionSummary(formula: string, coefficients: readonly Coefficient[]): string {
  const lines = [
    "Linear regression (stats::lm)",
    `Formula: ${formula}`,
    "Coefficients:",
    ...coefficients.map(c => `  ${c.term}: ${c.value}`),
  ];

  const intercept = coefficients.find(c => c.term === "(Intercept)");
  const slope = coefficients.find(c => c.term !== "(Intercept)");
  if (intercept) lines.push(`Intercept: ${intercept.value}`);
  if (slope) lines.push(`Slope: ${slope.value}`);
  return lines.join("\n");
}

/**
 * Executor for R functions reached through an RBridge
 */
export class ForeignExecutor implements Executor {
  readonly language = "r" as const;
  private readonly bridge: RBridge;
  private readonly logger: Logger | undefined;

  constructor(bridge: RBridge, logger?: Logger) {
    this.bridge = bridge;
    this.logger = logger;
  }

  async execute(descriptor: FunctionDescriptor, args: ArgumentMap): Promise<ExecutionResult> {
    const regression = isRegressionCall(descriptor);
    const formulaArg = Object.entries(args).find(([name]) => name.toLowerCase() === "formula")?.[1];
    const context: ShapeContext = {
      regression,
      formula: typeof formulaArg === "string" ? formulaArg : undefined,
      logger: this.logger,
    };
    const shaped: Array<[string, RValue]> = Object.entries(args).map(([name, value]) => [
      name,
      shapeArgument(name, value, context),
    ]);

    let outcome: BridgeOutcome;
    try {
      outcome = await this.bridge.call({
        namespace: descriptor.namespace,
        name: descriptor.name,
        args: shaped,
        summary: regression ? "coefficients" : "print",
      });
    } catch (error) {
      const { message, stack } = normalizeError(error);
      this.logger?.error("R bridge call failed", { displayKey: descriptor.displayKey, error: message });
      return executionFailure("InvocationFailure", message, stack ?? message);
    }

    if (!outcome.ok) {
      return executionFailure(outcome.kind, outcome.message, outcome.trace);
    }

    if (regression && outcome.coefficients && outcome.coefficients.length > 0) {
      const formula = shaped.find(([, value]) => value.kind === "formula")?.[1];
      const text = formula?.kind === "formula" ? formula.text : "(unspecified)";
      return { success: true, result: formatRegressionSummary(text, outcome.coefficients) };
    }

    return { success: true, result: outcome.printed };
  }
}
