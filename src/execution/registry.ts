import type { ArgumentMap, FunctionDescriptor } from "../catalog/types";
import type { Logger } from "../logger";
import type { Profiler } from "../profiler";
import type { ExecutionResult, Executor } from "./types";

export type DispatchResult = ExecutionResult | { success: false; error: string };

/**
 * Language -> executor
 */
export class ExecutorRegistry {
  private readonly executors = new Map<string, Executor>();
  private readonly logger: Logger | undefined;
  private readonly profiler: Profiler | undefined;

  constructor(executors: Executor[] = [], options?: { logger?: Logger; profiler?: Profiler }) {
    for (const executor of executors) {
      this.register(executor);
    }
    this.logger = options?.logger;
    this.profiler = options?.profiler;
  }

  register(executor: Executor): this {
    this.executors.set(executor.language, executor);
    return this;
  }

  get(language: string): Executor | undefined {
    return this.executors.get(language);
  }

  languages(): string[] {
    return [...this.executors.keys()];
  }

  async execute(descriptor: FunctionDescriptor, args: ArgumentMap): Promise<DispatchResult> {
    const executor = this.executors.get(descriptor.language);
    if (!executor) {
      const error = `Unknown language => ${descriptor.language}`;
      this.logger?.warn(error, { displayKey: descriptor.displayKey });
      return { success: false, error };
    }

    const timer = this.profiler?.startTimer(`execute.${descriptor.language}`);
    const result = await executor.execute(descriptor, args);
    const durationMs = timer?.();

    if (result.success) {
      this.logger?.info("Execution succeeded", { displayKey: descriptor.displayKey, durationMs });
    } else {
      this.logger?.warn("Execution failed", {
        displayKey: descriptor.displayKey,
        kind: result.kind,
        error: result.error,
        durationMs,
      });
    }
    return result;
  }
}
