import { execa } from "execa";
import type { RRuntimeConfig } from "../../config";
import type { Logger } from "../../logger";
import type { BridgeCall, BridgeOutcome, RBridge } from "./bridge";
import { parseScriptOutput, renderScript } from "./script";

/**
 * One Rscript process per call, program fed on stdin
 */
export class RscriptBridge implements RBridge {
  private readonly command: string;
  private readonly timeout: number;
  private readonly logger: Logger | undefined;

  constructor(config: Partial<RRuntimeConfig> = {}, logger?: Logger) {
    this.command = config.command ?? "Rscript";
    this.timeout = config.timeout ?? 120000;
    this.logger = logger;
  }

  async call(request: BridgeCall): Promise<BridgeOutcome> {
    const script = renderScript(request);
    this.logger?.debug(`Running ${this.command}`, { namespace: request.namespace, name: request.name });

    const result = await execa(this.command, ["--vanilla", "-"], {
      input: script,
      timeout: this.timeout || undefined,
      reject: false,
    });

    if (result.timedOut) {
      return {
        ok: false,
        kind: "InvocationFailure",
        message: `R call timed out after ${this.timeout} ms`,
        trace: String(result.stderr).trim(),
      };
    }

    const outcome = parseScriptOutput(String(result.stdout), String(result.stderr));
    if (!outcome.ok && result.failed && result.stdout === "") {
      return {
        ok: false,
        kind: "InvocationFailure",
        message: `${this.command} exited with code ${result.exitCode}: ${String(result.stderr).trim() || "no output"}`,
        trace: script,
      };
    }
    return outcome;
  }
}
