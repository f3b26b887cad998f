import type { ExecutionErrorKind } from "../types";
import type { BridgeCall, BridgeOutcome, Coefficient } from "./bridge";
import { renderRValue } from "./values";

/*
 * Output protocol, one record per line on stdout:
 *   @@ERROR<TAB>kind<TAB>message
 *   @@COEF<TAB>term<TAB>value
 *   @@BEGIN ... printed value ... @@END
 */
const TAG_ERROR = "@@ERROR";
const TAG_COEF = "@@COEF";
const TAG_BEGIN = "@@BEGIN";
const TAG_END = "@@END";

const ERROR_KINDS: readonly ExecutionErrorKind[] = [
  "ImportFailure",
  "AttributeFailure",
  "InvocationFailure",
  "ConversionFailure",
];

function rString(text: string): string {
  return JSON.stringify(text);
}

function rName(name: string): string {
  return "`" + name.replace(/\\/g, "\\\\").replace(/`/g, "\\`") + "`";
}

/**
 * R program that performs one call and reports through the output protocol
 */
export function renderScript(call: BridgeCall): string {
  const ns = rString(call.namespace);
  const args = call.args.map(([name, value]) => `  ${rName(name)} = ${renderRValue(value)}`);

  const lines = [
    ".fail <- function(kind, e) {",
    `  cat("${TAG_ERROR}\\t", kind, "\\t", gsub("[\\r\\n]+", " ", conditionMessage(e)), "\\n", sep = "")`,
    "  quit(save = \"no\", status = 0)",
    "}",
    `tryCatch(suppressPackageStartupMessages(library(${ns}, character.only = TRUE)), error = function(e) .fail("ImportFailure", e))`,
    `.fn <- tryCatch(get(${rString(call.name)}, envir = asNamespace(${ns}), mode = "function"), error = function(e) .fail("AttributeFailure", e))`,
    `.args <- tryCatch(list(${args.length > 0 ? "\n" + args.join(",\n") + "\n" : ""}), error = function(e) .fail("ConversionFailure", e))`,
    ".value <- tryCatch(do.call(.fn, .args), error = function(e) .fail(\"InvocationFailure\", e))",
  ];

  if (call.summary === "coefficients") {
    lines.push(
      ".coef <- stats::coef(.value)",
      "for (.i in seq_along(.coef)) {",
      `  cat("${TAG_COEF}\\t", names(.coef)[.i], "\\t", format(.coef[[.i]], digits = 15), "\\n", sep = "")`,
      "}",
    );
  }

  lines.push(
    `cat("${TAG_BEGIN}\\n")`,
    "writeLines(utils::capture.output(print(.value)))",
    `cat("${TAG_END}\\n")`,
  );
  return lines.join("\n") + "\n";
}

function errorKind(text: string): ExecutionErrorKind {
  return ERROR_KINDS.find(kind => kind === text) ?? "InvocationFailure";
}

/**
 * Read the protocol back from the process output
 */
export function parseScriptOutput(stdout: string, stderr: string): BridgeOutcome {
  const lines = stdout.split(/\r?\n/);
  const printed: string[] = [];
  const coefficients: Coefficient[] = [];
  let inValue = false;
  let sawEnd = false;

  for (const line of lines) {
    if (inValue) {
      if (line === TAG_END) {
        inValue = false;
        sawEnd = true;
      } else {
        printed.push(line);
      }
      continue;
    }

    const [tag, first = "", ...rest] = line.split("\t");
    if (tag === TAG_ERROR) {
      return { ok: false, kind: errorKind(first), message: rest.join("\t"), trace: stderr.trim() };
    }
    if (tag === TAG_COEF) {
      coefficients.push({ term: first, value: Number(rest.join("\t")) });
    } else if (line === TAG_BEGIN) {
      inValue = true;
    }
  }

  if (!sawEnd) {
    return {
      ok: false,
      kind: "InvocationFailure",
      message: "R process ended without a result",
      trace: stderr.trim(),
    };
  }

  return coefficients.length > 0
    ? { ok: true, printed: printed.join("\n"), coefficients }
    : { ok: true, printed: printed.join("\n") };
}
