import { test, expect, describe, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { Agent } from "../../src/agent";
import { HashEmbeddingProvider } from "../../src/embedding";
import type { EmbeddingProvider } from "../../src/embedding";
import { FakeRBridge, fakeLinearModel, ModuleRegistry } from "../../src/execution";
import { createTestAgent, SAMPLE_DESCRIPTORS } from "../fixtures";

const [basename, join_, lm, median, kmeans] = SAMPLE_DESCRIPTORS;

function statsBridge(): FakeRBridge {
  return new FakeRBridge({
    packages: {
      stats: {
        lm: fakeLinearModel(),
        median: () => "[1] 2",
      },
    },
  });
}

/**
 * Hash embeddings that can be switched to failing
 */
class SwitchableProvider implements EmbeddingProvider {
  readonly model = "switchable";
  failing = false;
  private readonly inner = new HashEmbeddingProvider(64);

  async embed(texts: string[]): Promise<number[][]> {
    if (this.failing) throw new Error("quota exceeded");
    return this.inner.embed(texts);
  }
}

describe("pipeline", () => {
  let dir: string;
  let agent: Agent;
  let lines: string[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "autods-pipeline-"));
    ({ agent, lines } = await createTestAgent({ indexDir: join(dir, "index"), bridge: statsBridge() }));
    agent.context.store.replaceAll(SAMPLE_DESCRIPTORS);
    const built = await agent.buildIndex();
    expect(built.success).toBe(true);
  });

  afterEach(async () => {
    await agent.close();
    await rm(dir, { recursive: true, force: true });
  });

  test("linear regression query is pinned to stats::lm and gets a default formula", async () => {
    const result = await agent.handle("Perform linear regression", { data: [[1, 2], [2, 3], [3, 4]] });

    expect(result).toEqual({
      success: true,
      result: "Linear regression (stats::lm)\nFormula: y ~ x\nCoefficients:\n  (Intercept): 1\n  x: 1\nIntercept: 1\nSlope: 1",
      codeSnippet: 'library(stats)\nstats::lm(data=rbind(c(1, 2), c(2, 3), c(3, 4)), formula="y ~ x")',
      language: "r",
      displayKey: lm?.displayKey,
    });
  });

  test("an exact display key resolves to itself and runs natively", async () => {
    const key = basename?.displayKey ?? "";
    const match = await agent.context.resolver.resolve(key);
    expect(match?.descriptor.displayKey).toBe(key);
    expect(match?.distance).toBeCloseTo(0, 6);

    const result = await agent.handle(key, { path: "/tmp/data.csv", suffix: ".csv" });
    expect(result).toEqual({
      success: true,
      result: "data",
      codeSnippet: 'import * as path from "node:path";\npath.basename("/tmp/data.csv", ".csv")',
      language: "javascript",
      displayKey: key,
    });
  });

  test("variadic JavaScript call", async () => {
    const key = join_?.displayKey ?? "";
    const result = await agent.handle(key, { a: "reports", b: "2024", c: "q1.csv" });
    expect(result.success ? result.result : result.error).toBe("reports/2024/q1.csv");
  });

  test("R call through the bridge", async () => {
    const result = await agent.handle(median?.displayKey ?? "", { x: [1, 2, 3] });
    expect(result).toEqual({
      success: true,
      result: "[1] 2",
      codeSnippet: "library(stats)\nstats::median(x=c(1, 2, 3))",
      language: "r",
      displayKey: median?.displayKey,
    });
  });

  test("execution failures keep the snippet and the error kind", async () => {
    const result = await agent.handle(kmeans?.displayKey ?? "", { x: [[1, 2]], centers: 2 });
    expect(result).toEqual({
      success: false,
      error: "object 'kmeans' of mode 'function' was not found",
      diagnostic: 'get("kmeans", envir = asNamespace("stats"))',
      kind: "AttributeFailure",
      codeSnippet: "library(stats)\nstats::kmeans(x=rbind(c(1, 2)), centers=2)",
      language: "r",
      displayKey: kmeans?.displayKey,
    });
  });

  test("logs the query, the language and the outcome", async () => {
    await agent.handle(median?.displayKey ?? "", { x: [1] });
    await agent.context.logger.flush();

    const messages = lines.map(line => line.slice(line.indexOf(" ") + 1));
    expect(messages.some(m => m.startsWith(`[INFO] Processing user query: '${median?.displayKey}'`))).toBe(true);
    expect(messages.some(m => m.startsWith("[INFO] Detected language => r"))).toBe(true);
    expect(messages.some(m => m.startsWith("[INFO] Execution succeeded"))).toBe(true);
  });

  test("the built index is persisted and reloaded by a new agent", async () => {
    const { agent: second } = await createTestAgent({ indexDir: join(dir, "index") });
    try {
      expect(second.status().index).toEqual({ loaded: true, size: 5, dimension: 128, dir: join(dir, "index") });
    } finally {
      await second.close();
    }
  });

  test("profiler sees every stage", async () => {
    await agent.handle("Perform linear regression", { data: [[1, 2], [2, 3], [3, 4]] });
    const report = agent.context.profiler.export();

    expect(report.resolve.override?.count).toBe(1);
    expect(report.infer?.count).toBe(1);
    expect(report.execute.r?.count).toBe(1);
    expect(report.indexing.builds).toBe(1);
  });
});

describe("pipeline failures", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "autods-pipeline-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("an embedding failure at query time is reported", async () => {
    const provider = new SwitchableProvider();
    const { agent } = await createTestAgent({ indexDir: join(dir, "index"), provider });
    try {
      agent.context.store.replaceAll(SAMPLE_DESCRIPTORS);
      await agent.buildIndex();
      provider.failing = true;

      const result = await agent.handle("cluster my points");
      expect(result.success).toBe(false);
      expect(result.success ? "" : result.error).toMatch(/^Resolution failed: .*quota exceeded/);
    } finally {
      await agent.close();
    }
  });

  test("index build failures leave the old snapshot in place", async () => {
    const provider = new SwitchableProvider();
    const { agent } = await createTestAgent({ indexDir: join(dir, "index"), provider });
    try {
      agent.context.store.replaceAll(SAMPLE_DESCRIPTORS);
      await agent.buildIndex();
      provider.failing = true;

      const result = await agent.buildIndex();
      expect(result.success).toBe(false);
      expect(agent.status().index.size).toBe(5);
    } finally {
      await agent.close();
    }
  });

  test("registered modules stand in for real ones", async () => {
    const modules = new ModuleRegistry().register("./stats", { mean: (...xs: number[]) => xs.reduce((a, b) => a + b, 0) / xs.length });
    const { agent } = await createTestAgent({ indexDir: join(dir, "index"), modules });
    try {
      const key = "JavaScript: ./stats.mean - Arithmetic mean of the arguments.";
      agent.context.store.upsert({
        displayKey: key,
        language: "javascript",
        namespace: "./stats",
        name: "mean",
        parameters: [{ name: "...", hasDefault: false }],
        signature: "mean(...values)",
        description: "Arithmetic mean of the arguments.",
      });
      await agent.buildIndex();

      const result = await agent.handle(key, { a: 1, b: 2, c: 6 });
      expect(result.success ? result.result : result.error).toBe("3");
    } finally {
      await agent.close();
    }
  });

  test("bigint arguments are logged and passed through", async () => {
    const modules = new ModuleRegistry().register("./big", { double: (n: bigint) => n * 2n });
    const { agent, lines } = await createTestAgent({ indexDir: join(dir, "index"), modules });
    try {
      const key = "JavaScript: ./big.double - Double a bigint.";
      agent.context.store.upsert({
        displayKey: key,
        language: "javascript",
        namespace: "./big",
        name: "double",
        parameters: [{ name: "n", hasDefault: false }],
        signature: "double(n)",
        description: "Double a bigint.",
      });
      await agent.buildIndex();

      const result = await agent.handle(key, { n: 10n });
      expect(result).toEqual({
        success: true,
        result: "20n",
        codeSnippet: 'import * as big from "./big";\nbig.double(10n)',
        language: "javascript",
        displayKey: key,
      });
      await agent.context.logger.flush();
      expect(lines.some(line => line.includes(`Processing user query: '${key}' {"args":{"n":"10n"}}`))).toBe(true);
    } finally {
      await agent.close();
    }
  });
});
