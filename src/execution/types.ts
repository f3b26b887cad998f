import type { ArgumentMap, FunctionDescriptor, Language } from "../catalog/types";

/**
 * Why an invocation failed
 * - ImportFailure: namespace could not be loaded
 * - AttributeFailure: no such callable in the namespace
 * - InvocationFailure: the call threw or the arguments did not bind
 * - ConversionFailure: an argument could not be shaped for the runtime
 */
export type ExecutionErrorKind = "ImportFailure" | "AttributeFailure" | "InvocationFailure" | "ConversionFailure";

export type ExecutionResult =
  | { success: true; result: string }
  | { success: false; error: string; diagnostic: string; kind: ExecutionErrorKind };

/**
 * Runs a resolved descriptor on one runtime
 * Never throws; every failure comes back as an ExecutionResult
 */
export interface Executor {
  readonly language: Language;
  execute(descriptor: FunctionDescriptor, args: ArgumentMap): Promise<ExecutionResult>;
}

export function executionFailure(
  kind: ExecutionErrorKind,
  error: string,
  diagnostic: string = "",
): Extract<ExecutionResult, { success: false }> {
  return { success: false, error, diagnostic, kind };
}
