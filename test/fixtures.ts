import { createDescriptor, parametersFromLists } from "../src/catalog/catalog";
import type { FunctionDescriptor, Language } from "../src/catalog/types";
import { createAgent } from "../src/agent";
import type { Agent } from "../src/agent";
import { ConfigSchema } from "../src/config";
import type { OverrideRule } from "../src/config";
import { HashEmbeddingProvider } from "../src/embedding";
import type { EmbeddingProvider } from "../src/embedding";
import { FakeRBridge } from "../src/execution";
import type { ModuleRegistry, RBridge } from "../src/execution";
import { Logger } from "../src/logger";

/**
 * Descriptor from a compact form: params as [name, default?] pairs
 */
export function makeDescriptor(
  language: Language,
  namespace: string,
  name: string,
  params: Array<[string, string?]> = [],
  description: string = "",
): FunctionDescriptor {
  return createDescriptor({
    language,
    namespace,
    name,
    parameters: parametersFromLists(
      params.map(([p]) => p),
      params.map(([, d]) => d),
    ),
    description,
  });
}

/**
 * Logger that keeps its lines in memory
 */
export function memoryLogger(level: "debug" | "info" | "warn" | "error" = "debug"): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger("", {
    level,
    sink: async line => {
      lines.push(line);
    },
  });
  return { logger, lines };
}

export const SAMPLE_DESCRIPTORS: FunctionDescriptor[] = [
  makeDescriptor("javascript", "node:path", "basename", [["path"], ["suffix", "undefined"]],
    "Return the last portion of a path, optionally removing a trailing suffix."),
  makeDescriptor("javascript", "node:path", "join", [["..."]],
    "Join path segments together using the platform separator."),
  makeDescriptor("r", "stats", "lm", [["formula"], ["data"]],
    "Fitting Linear Models. lm is used to fit linear models."),
  makeDescriptor("r", "stats", "median", [["x"], ["na.rm", "FALSE"]],
    "Compute the sample median of a numeric vector."),
  makeDescriptor("r", "stats", "kmeans", [["x"], ["centers"]],
    "K-Means Clustering of a data matrix."),
];

export type TestAgentOptions = {
  indexDir: string;
  bridge?: RBridge;
  modules?: ModuleRegistry;
  rules?: OverrideRule[];
  provider?: EmbeddingProvider;
  logLevel?: "debug" | "info" | "warn" | "error";
};

/**
 * Agent on an in-memory catalog with hash embeddings and no real R
 */
export async function createTestAgent(options: TestAgentOptions): Promise<{ agent: Agent; lines: string[] }> {
  const config = ConfigSchema.parse({
    catalog: { path: ":memory:" },
    index: { dir: options.indexDir, batchSize: 2 },
    embedding: { provider: "hash" },
    ...(options.rules ? { rules: options.rules } : {}),
  });
  const { logger, lines } = memoryLogger(options.logLevel ?? "debug");
  const agent = await createAgent(config, {
    provider: options.provider ?? new HashEmbeddingProvider(128),
    bridge: options.bridge ?? new FakeRBridge({ packages: {} }),
    modules: options.modules,
    logger,
  });
  return { agent, lines };
}
