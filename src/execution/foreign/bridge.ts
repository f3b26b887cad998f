import type { ExecutionErrorKind } from "../types";
import type { RValue } from "./values";

export type SummaryMode = "coefficients" | "print";

export type BridgeCall = {
  namespace: string;
  name: string;
  /** Shaped arguments in call order */
  args: Array<[string, RValue]>;
  summary: SummaryMode;
};

export type Coefficient = { term: string; value: number };

export type BridgeOutcome =
  | { ok: true; printed: string; coefficients?: Coefficient[] }
  | { ok: false; kind: ExecutionErrorKind; message: string; trace: string };

/**
 * A live R session, in process or out
 */
export interface RBridge {
  call(request: BridgeCall): Promise<BridgeOutcome>;
}
