import { errorMessage } from "../../errors";
import type { BridgeCall, BridgeOutcome, Coefficient, RBridge } from "./bridge";
import type { RValue } from "./values";

export type FakeRReturn = string | { printed: string; coefficients?: Coefficient[] };

export type FakeRFunction = (args: Array<[string, RValue]>, call: BridgeCall) => FakeRReturn | Promise<FakeRReturn>;

/**
 * Configuration for FakeRBridge behavior
 */
export type FakeRBridgeConfig = {
  /** package -> function name -> handler */
  packages: Record<string, Record<string, FakeRFunction>>;
  /** Simulated session latency in ms (default: 0) */
  delay?: number;
};

/**
 * In-process stand-in for an R session
 * Unknown package: ImportFailure, unknown function: AttributeFailure,
 * a throwing handler: InvocationFailure
 */
export class FakeRBridge implements RBridge {
  private readonly config: FakeRBridgeConfig;
  readonly calls: BridgeCall[] = [];

  constructor(config: FakeRBridgeConfig) {
    this.config = { delay: 0, ...config };
  }

  private async simulateDelay(): Promise<void> {
    if (this.config.delay && this.config.delay > 0) {
      await new Promise(resolve => setTimeout(resolve, this.config.delay));
    }
  }

  async call(request: BridgeCall): Promise<BridgeOutcome> {
    await this.simulateDelay();
    this.calls.push(request);

    const pkg = this.config.packages[request.namespace];
    if (!pkg) {
      return {
        ok: false,
        kind: "ImportFailure",
        message: `there is no package called '${request.namespace}'`,
        trace: `library(${request.namespace})`,
      };
    }

    const handler = pkg[request.name];
    if (!handler) {
      return {
        ok: false,
        kind: "AttributeFailure",
        message: `object '${request.name}' of mode 'function' was not found`,
        trace: `get("${request.name}", envir = asNamespace("${request.namespace}"))`,
      };
    }

    try {
      const value = await handler(request.args, request);
      if (typeof value === "string") return { ok: true, printed: value };
      return value.coefficients
        ? { ok: true, printed: value.printed, coefficients: value.coefficients }
        : { ok: true, printed: value.printed };
    } catch (error) {
      return {
        ok: false,
        kind: "InvocationFailure",
        message: errorMessage(error),
        trace: `${request.namespace}::${request.name}`,
      };
    }
  }
}

export type FakeTable = Record<string, number[]>;

function numericColumns(value: RValue | undefined, datasets: Record<string, FakeTable>): FakeTable {
  if (!value) throw new Error("argument \"data\" is missing, with no default");

  if (value.kind === "data.frame") {
    const table: FakeTable = {};
    for (const column of value.columns) {
      table[column.name] = column.values.map(Number);
    }
    return table;
  }

  if (value.kind === "dataset") {
    const source = datasets[value.name];
    if (!source) throw new Error(`object '${value.name}' not found`);
    if (!value.columns) return source;
    const renamed: FakeTable = {};
    for (const [i, values] of Object.values(source).entries()) {
      renamed[value.columns[i] ?? `V${i + 1}`] = values;
    }
    return renamed;
  }

  throw new Error("'data' must be a data.frame, environment, or list");
}

/**
 * Ordinary least squares for a single-term formula "lhs ~ rhs"
 * Datasets named by a string argument are looked up in `datasets`
 */
export function fakeLinearModel(datasets: Record<string, FakeTable> = {}): FakeRFunction {
  return args => {
    const byName = new Map(args);
    const formula = byName.get("formula");
    if (formula?.kind !== "formula") throw new Error("argument \"formula\" is missing, with no default");

    const [lhs = "", rhs = ""] = formula.text.split("~").map(s => s.trim());
    const table = numericColumns(byName.get("data"), datasets);
    const ys = table[lhs];
    const xs = table[rhs];
    if (!ys) throw new Error(`object '${lhs}' not found`);
    if (!xs) throw new Error(`object '${rhs}' not found`);

    const n = xs.length;
    const meanX = xs.reduce((a, b) => a + b, 0) / n;
    const meanY = ys.reduce((a, b) => a + b, 0) / n;
    let sxy = 0;
    let sxx = 0;
    for (const [i, x] of xs.entries()) {
      sxy += (x - meanX) * ((ys[i] ?? 0) - meanY);
      sxx += (x - meanX) ** 2;
    }
    const slope = sxy / sxx;
    const intercept = meanY - slope * meanX;

    return {
      printed: `Call:\nlm(formula = ${formula.text})\n\nCoefficients:\n(Intercept)  ${rhs}\n${intercept}  ${slope}`,
      coefficients: [
        { term: "(Intercept)", value: intercept },
        { term: rhs, value: slope },
      ],
    };
  };
}
