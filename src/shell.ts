import chalk from "chalk";
import type { ChalkInstance } from "chalk";
import type { Agent, HandleResult } from "./agent";
import { loadSeedFile } from "./catalog/seed";
import type { ArgumentMap } from "./catalog/types";
import { errorMessage } from "./errors";

export type ShellIO = {
  write: (text: string) => void;
  colors?: ChalkInstance;
};

export type ShellStep =
  | { type: "exit" }
  | { type: "done" }
  | { type: "clear" }
  | { type: "query"; query: string };

export type ParsedArgs = { args: ArgumentMap; warning?: string };

export const PROMPT = "AutoDS>";
export const ARGS_PROMPT = "Args>";

/**
 * JSON object typed at the Args> prompt; anything else means no arguments
 */
export function parseArgsInput(text: string): ParsedArgs {
  if (text.trim() === "") return { args: {} };

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { args: {}, warning: "Invalid JSON format. Using empty arguments." };
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return { args: {}, warning: "Arguments must be a JSON object. Using empty arguments." };
  }
  return { args: { ...parsed } };
}

const SUGGESTIONS: Record<string, string[]> = {
  ImportFailure: ["Check that the package is installed for its runtime", "Verify the namespace in the catalog entry"],
  AttributeFailure: ["Check the function name with `find <regex>`"],
  InvocationFailure: ["Check if the arguments match the function requirements", "Verify the data format is correct"],
  ConversionFailure: ["Verify the data format is correct"],
  none: ["Try a more specific query", "Run `index build` after seeding the catalog"],
};

export function formatHandleResult(result: HandleResult, c: ChalkInstance = chalk): string {
  const lines: string[] = [];

  if (result.success) {
    lines.push(c.green("✓ Function executed successfully!"), "");
    lines.push(`${c.yellow("Language:")} ${result.language}`, "");
    lines.push(c.yellow("Code:"), c.cyan(result.codeSnippet), "");
    lines.push(c.yellow("Result:"), result.result);
    return lines.join("\n");
  }

  lines.push(c.red("✗ Error executing function:"), result.error);
  if (result.codeSnippet) {
    lines.push("", c.yellow("Code:"), c.cyan(result.codeSnippet));
  }
  if (result.diagnostic) {
    lines.push("", c.yellow("Diagnostic:"), result.diagnostic);
  }

  const suggestions = SUGGESTIONS[result.kind ?? (result.displayKey ? "InvocationFailure" : "none")] ?? [];
  if (suggestions.length > 0) {
    lines.push("", c.yellow("Suggestions:"), ...suggestions.map(s => `- ${s}`));
  }
  return lines.join("\n");
}

export function helpText(c: ChalkInstance = chalk): string {
  return [
    c.green("=== AutoDS Help ==="),
    "",
    "Example queries:",
    `  ${c.cyan("* Perform linear regression")}`,
    `  ${c.cyan("* Calculate correlation between variables")}`,
    `  ${c.cyan("* Get the last portion of a path")}`,
    "",
    "Argument format:",
    "  Provide arguments as a JSON object. Examples:",
    `  ${c.yellow('{"formula": "y ~ x", "data": [[1,2], [2,3], [3,4]]}')}`,
    `  ${c.yellow('{"formula": "y ~ x", "data": "cars"}')}`,
    "",
    "Commands:",
    `  ${c.green("help")}          Show this help information`,
    `  ${c.green("clear")}         Clear the screen`,
    `  ${c.green("status")}        Catalog, index and runtime status`,
    `  ${c.green("perf")}          Performance report`,
    `  ${c.green("find <regex>")}  Search display keys, (?i) for case-insensitive`,
    `  ${c.green("seed [file]")}   Rebuild the catalog from a JSON seed file`,
    `  ${c.green("index build")}   Embed the catalog and save the index`,
    `  ${c.green("exit")}          Exit the application`,
  ].join("\n");
}

/**
 * Command interpreter behind the interactive prompt
 */
export class Shell {
  private readonly agent: Agent;
  private readonly io: ShellIO;
  private readonly colors: ChalkInstance;
  private readonly seedPath: string | undefined;

  constructor(agent: Agent, io: ShellIO, options?: { seedPath?: string }) {
    this.agent = agent;
    this.io = io;
    this.colors = io.colors ?? chalk;
    this.seedPath = options?.seedPath;
  }

  private print(text: string = ""): void {
    this.io.write(`${text}\n`);
  }

  /**
   * Run one line typed at the main prompt
   * A line that is not a command is a query waiting for its arguments
   */
  async command(line: string): Promise<ShellStep> {
    const input = line.trim();
    const [head = "", ...rest] = input.split(/\s+/);
    const word = head.toLowerCase();
    const argument = rest.join(" ");

    if (input === "") return { type: "done" };

    switch (word) {
      case "exit":
      case "quit":
        return { type: "exit" };
      case "help":
        this.print(helpText(this.colors));
        return { type: "done" };
      case "clear":
        return { type: "clear" };
      case "status":
        this.print(JSON.stringify(this.agent.status(), null, 2));
        return { type: "done" };
      case "perf":
        this.print(JSON.stringify(this.agent.context.profiler.export(), null, 2));
        return { type: "done" };
      case "find":
        this.find(argument);
        return { type: "done" };
      case "seed":
        await this.seed(argument);
        return { type: "done" };
      case "index":
        if (argument.toLowerCase() === "build") {
          await this.buildIndex();
          return { type: "done" };
        }
        break;
    }

    return { type: "query", query: input };
  }

  /**
   * Run a query with the text typed at the Args> prompt
   */
  async query(query: string, argsText: string): Promise<HandleResult> {
    const { args, warning } = parseArgsInput(argsText);
    if (warning) this.print(this.colors.red(warning));

    this.print(this.colors.cyan("Processing your request..."));
    const result = await this.agent.handle(query, args);
    this.print();
    this.print(formatHandleResult(result, this.colors));
    this.print();
    return result;
  }

  private find(pattern: string): void {
    if (pattern === "") {
      this.print(this.colors.yellow("Usage: find <regex>"));
      return;
    }
    const result = this.agent.find(pattern);
    if ("error" in result) {
      this.print(this.colors.red(`${result.error.code}: ${result.error.message}`));
      return;
    }
    if (result.length === 0) {
      this.print(this.colors.yellow("No matching functions."));
      return;
    }
    for (const match of result) {
      this.print(`${this.colors.green(match.displayKey)}\n  ${this.colors.dim(match.signature)}`);
    }
  }

  private async seed(argument: string): Promise<void> {
    const file = argument || this.seedPath;
    if (!file) {
      this.print(this.colors.yellow("Usage: seed <file> (or set catalog.seed in the config file)"));
      return;
    }
    try {
      const summary = this.agent.seed(await loadSeedFile(file));
      this.print(this.colors.green(`Seeded ${summary.total} functions (javascript: ${summary.javascript}, r: ${summary.r})`));
      this.print(this.colors.yellow("Run `index build` to make them searchable."));
    } catch (error) {
      this.print(this.colors.red(`Seeding failed: ${errorMessage(error)}`));
    }
  }

  private async buildIndex(): Promise<void> {
    this.print(this.colors.cyan("Building index..."));
    const result = await this.agent.buildIndex();
    if (result.success) {
      this.print(this.colors.green(`Indexed ${result.index.size} functions (dimension ${result.index.dimension})`));
    } else {
      this.print(this.colors.red(`Index build failed: ${result.error}`));
    }
  }
}
