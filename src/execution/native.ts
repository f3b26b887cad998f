import { inspect } from "util";
import type { ArgumentMap, FunctionDescriptor } from "../catalog/types";
import { normalizeError } from "../errors";
import type { Logger } from "../logger";
import { executionFailure } from "./types";
import type { ExecutionResult, Executor } from "./types";

export const REST_PARAMETER = "...";

export type ModuleLoader = (namespace: string) => Promise<unknown>;

const defaultLoader: ModuleLoader = namespace => import(namespace);

/**
 * Namespace -> module object
 * Modules registered up front win; anything else goes through the loader once
 */
export class ModuleRegistry {
  private readonly modules = new Map<string, unknown>();
  private readonly loader: ModuleLoader;

  constructor(loader: ModuleLoader = defaultLoader) {
    this.loader = loader;
  }

  register(namespace: string, module: unknown): this {
    this.modules.set(namespace, module);
    return this;
  }

  has(namespace: string): boolean {
    return this.modules.has(namespace);
  }

  async load(namespace: string): Promise<unknown> {
    if (this.modules.has(namespace)) {
      return this.modules.get(namespace);
    }
    const module = await this.loader(namespace);
    this.modules.set(namespace, module);
    return module;
  }
}

export type BoundArguments = {
  /** Positional values in call order */
  values: unknown[];
  /** Keys matching no parameter when there is no rest parameter */
  unexpected: string[];
};

/**
 * Named arguments -> positional values in descriptor parameter order
 * Trailing unset parameters are omitted; a "..." parameter takes the
 * extra keys in their order
 */
export function bindArguments(descriptor: FunctionDescriptor, args: ArgumentMap): BoundArguments {
  const names = descriptor.parameters.map(p => p.name);
  const known = new Set(names);
  const extras = Object.keys(args).filter(key => !known.has(key));
  const hasRest = known.has(REST_PARAMETER);

  const slots: Array<{ set: boolean; value: unknown }> = [];
  for (const name of names) {
    if (name === REST_PARAMETER) {
      for (const key of extras) {
        slots.push({ set: true, value: args[key] });
      }
      continue;
    }
    const set = Object.hasOwn(args, name);
    slots.push({ set, value: set ? args[name] : undefined });
  }

  let end = slots.length;
  while (end > 0 && !slots[end - 1]?.set) end--;

  return {
    values: slots.slice(0, end).map(slot => slot.value),
    unexpected: hasRest ? [] : extras,
  };
}

function member(owner: unknown, key: string): unknown {
  if ((typeof owner === "object" && owner !== null) || typeof owner === "function") {
    return Reflect.get(owner, key);
  }
  return undefined;
}

type Callable = (...values: unknown[]) => unknown;

/**
 * "name" or one level of nesting "Owner.member" (called with Owner as this)
 * CommonJS modules loaded through import() keep their exports on `default`
 */
function lookupCallable(module: unknown, name: string): Callable | undefined {
  const path = name.split(".");
  if (path.length > 2 || path.some(part => part === "")) return undefined;

  for (const root of [module, member(module, "default")]) {
    let self: unknown = undefined;
    let target = root;
    for (const [i, part] of path.entries()) {
      if (i === path.length - 1) self = path.length > 1 ? target : undefined;
      target = member(target, part);
    }
    if (typeof target === "function") {
      const fn = target;
      return (...values: unknown[]) => Reflect.apply(fn, self, values);
    }
  }
  return undefined;
}

export function stringifyResult(value: unknown): string {
  return typeof value === "string" ? value : inspect(value, { depth: 4 });
}

/**
 * Executor for the Node.js host
 */
export class NativeExecutor implements Executor {
  readonly language = "javascript" as const;
  private readonly modules: ModuleRegistry;
  private readonly logger: Logger | undefined;

  constructor(options?: { modules?: ModuleRegistry; logger?: Logger }) {
    this.modules = options?.modules ?? new ModuleRegistry();
    this.logger = options?.logger;
  }

  async execute(descriptor: FunctionDescriptor, args: ArgumentMap): Promise<ExecutionResult> {
    const { namespace, name } = descriptor;

    let module: unknown;
    try {
      module = await this.modules.load(namespace);
    } catch (error) {
      const { message, stack } = normalizeError(error);
      this.logger?.warn(`Failed to load module ${namespace}`, { error: message });
      return executionFailure("ImportFailure", `No module named '${namespace}'`, stack ?? message);
    }

    const callable = lookupCallable(module, name);
    if (!callable) {
      return executionFailure(
        "AttributeFailure",
        `module '${namespace}' has no callable '${name}'`,
        `Looked up ${namespace}.${name}`,
      );
    }

    const { values, unexpected } = bindArguments(descriptor, args);
    const [first] = unexpected;
    if (first !== undefined) {
      return executionFailure(
        "InvocationFailure",
        `${name}() got an unexpected keyword argument '${first}'`,
        `Parameters: ${descriptor.parameters.map(p => p.name).join(", ") || "(none)"}`,
      );
    }

    try {
      const result: unknown = await callable(...values);
      return { success: true, result: stringifyResult(result) };
    } catch (error) {
      const { message, stack } = normalizeError(error);
      return executionFailure("InvocationFailure", message, stack ?? message);
    }
  }
}
