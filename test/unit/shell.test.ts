import { test, expect, describe, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { Chalk } from "chalk";
import type { Agent, HandleResult } from "../../src/agent";
import { formatHandleResult, parseArgsInput, Shell } from "../../src/shell";
import { createTestAgent, SAMPLE_DESCRIPTORS } from "../fixtures";

const plain = new Chalk({ level: 0 });

describe("parseArgsInput", () => {
  test("empty input means no arguments", () => {
    expect(parseArgsInput("")).toEqual({ args: {} });
    expect(parseArgsInput("   ")).toEqual({ args: {} });
  });

  test("JSON object", () => {
    expect(parseArgsInput('{"formula": "y ~ x", "data": [[1, 2]]}')).toEqual({
      args: { formula: "y ~ x", data: [[1, 2]] },
    });
  });

  test("invalid JSON", () => {
    expect(parseArgsInput("{formula: y ~ x}")).toEqual({
      args: {},
      warning: "Invalid JSON format. Using empty arguments.",
    });
  });

  test("JSON that is not an object", () => {
    const warning = "Arguments must be a JSON object. Using empty arguments.";
    expect(parseArgsInput("[1, 2]")).toEqual({ args: {}, warning });
    expect(parseArgsInput("null")).toEqual({ args: {}, warning });
    expect(parseArgsInput("3")).toEqual({ args: {}, warning });
  });
});

describe("formatHandleResult", () => {
  test("success", () => {
    const result: HandleResult = {
      success: true,
      result: "b",
      codeSnippet: 'import * as path from "node:path";\npath.basename("/a/b.txt", ".txt")',
      language: "javascript",
      displayKey: "JavaScript: node:path.basename - Return the last portion of a path",
    };

    expect(formatHandleResult(result, plain)).toBe([
      "✓ Function executed successfully!",
      "",
      "Language: javascript",
      "",
      "Code:",
      'import * as path from "node:path";',
      'path.basename("/a/b.txt", ".txt")',
      "",
      "Result:",
      "b",
    ].join("\n"));
  });

  test("execution failure with diagnostic and suggestions", () => {
    const result: HandleResult = {
      success: false,
      error: "there is no package called 'forecastr'",
      diagnostic: "library(forecastr)",
      kind: "ImportFailure",
      codeSnippet: "library(forecastr)\nforecastr::auto()",
      language: "r",
      displayKey: "R: forecastr::auto - R function forecastr::auto",
    };

    expect(formatHandleResult(result, plain)).toBe([
      "✗ Error executing function:",
      "there is no package called 'forecastr'",
      "",
      "Code:",
      "library(forecastr)",
      "forecastr::auto()",
      "",
      "Diagnostic:",
      "library(forecastr)",
      "",
      "Suggestions:",
      "- Check that the package is installed for its runtime",
      "- Verify the namespace in the catalog entry",
    ].join("\n"));
  });

  test("nothing resolved", () => {
    expect(formatHandleResult({ success: false, error: "No matching function found" }, plain)).toBe([
      "✗ Error executing function:",
      "No matching function found",
      "",
      "Suggestions:",
      "- Try a more specific query",
      "- Run `index build` after seeding the catalog",
    ].join("\n"));
  });
});

describe("Shell", () => {
  let dir: string;
  let agent: Agent;
  let output: string[];
  let shell: Shell;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "autods-shell-"));
    ({ agent } = await createTestAgent({ indexDir: join(dir, "index") }));
    agent.context.store.replaceAll(SAMPLE_DESCRIPTORS);
    output = [];
    shell = new Shell(agent, { write: text => output.push(text), colors: plain });
  });

  afterEach(async () => {
    await agent.close();
    await rm(dir, { recursive: true, force: true });
  });

  test("exit commands", async () => {
    expect(await shell.command("exit")).toEqual({ type: "exit" });
    expect(await shell.command("  QUIT ")).toEqual({ type: "exit" });
  });

  test("blank lines and clear", async () => {
    expect(await shell.command("")).toEqual({ type: "done" });
    expect(await shell.command("clear")).toEqual({ type: "clear" });
    expect(output).toEqual([]);
  });

  test("help", async () => {
    expect(await shell.command("help")).toEqual({ type: "done" });
    expect(output[0]?.startsWith("=== AutoDS Help ===\n")).toBe(true);
  });

  test("anything else is a query", async () => {
    expect(await shell.command("Perform linear regression")).toEqual({
      type: "query",
      query: "Perform linear regression",
    });
    expect(await shell.command("index")).toEqual({ type: "query", query: "index" });
  });

  test("status", async () => {
    await shell.command("status");
    const status: unknown = JSON.parse(output[0] ?? "");
    expect(status).toEqual({
      catalog: { total: 5, javascript: 2, r: 3 },
      index: { loaded: false, size: 0, dimension: null, dir: join(dir, "index") },
      embedding: { model: "hash-128" },
      languages: ["javascript", "r"],
      rules: ["linear-regression"],
    });
  });

  test("find", async () => {
    await shell.command("find (?i)MEDIAN");
    expect(output).toEqual([
      "R: stats::median - Compute the sample median of a numeric vector.\n  stats::median(x, na.rm = FALSE)\n",
    ]);
  });

  test("find without a pattern or with a bad one", async () => {
    await shell.command("find");
    await shell.command("find (");
    expect(output[0]).toBe("Usage: find <regex>\n");
    expect(output[1]?.startsWith("invalid_pattern: ")).toBe(true);
  });

  test("find with no hits", async () => {
    await shell.command("find zzz");
    expect(output).toEqual(["No matching functions.\n"]);
  });

  test("seed needs a file", async () => {
    await shell.command("seed");
    expect(output).toEqual(["Usage: seed <file> (or set catalog.seed in the config file)\n"]);
  });

  test("seed from a file", async () => {
    const file = join(dir, "seed.json");
    await writeFile(file, JSON.stringify([
      { language: "javascript", package: "node:path", function_name: "extname", parameters: [{ name: "path" }] },
    ]));

    await shell.command(`seed ${file}`);
    expect(output).toEqual([
      "Seeded 5 functions (javascript: 1, r: 4)\n",
      "Run `index build` to make them searchable.\n",
    ]);
  });

  test("seed reports bad files", async () => {
    await shell.command(`seed ${join(dir, "missing.json")}`);
    expect(output[0]?.startsWith("Seeding failed: ENOENT")).toBe(true);
  });

  test("index build", async () => {
    await shell.command("index build");
    expect(output).toEqual(["Building index...\n", "Indexed 5 functions (dimension 128)\n"]);
    expect(agent.status().index.loaded).toBe(true);
  });

  test("perf", async () => {
    await shell.command("index build");
    output.length = 0;
    await shell.command("perf");

    const report: unknown = JSON.parse(output[0] ?? "");
    expect(report).toMatchObject({ indexing: { size: 5, dimension: 128, builds: 1 } });
  });

  test("query with invalid arguments warns and runs with none", async () => {
    const result = await shell.query("zzqx qqzx", "{oops");

    expect(result).toEqual({ success: false, error: "No matching function found" });
    expect(output.slice(0, 2)).toEqual([
      "Invalid JSON format. Using empty arguments.\n",
      "Processing your request...\n",
    ]);
  });
});
