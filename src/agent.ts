import { mkdir } from "fs/promises";
import { dirname } from "path";
import type { CatalogRecord, SeedSummary } from "./catalog/seed";
import { seedCatalog } from "./catalog/seed";
import { SqliteCatalogStore } from "./catalog/store";
import type { CatalogStore } from "./catalog/store";
import type { ArgumentMap, Language, ResolvedMatch } from "./catalog/types";
import type { Config, OverrideRule } from "./config";
import type { EmbeddingProvider } from "./embedding";
import { createEmbeddingProvider } from "./embedding";
import { errorMessage, IndexNotFoundError } from "./errors";
import { ExecutorRegistry, ForeignExecutor, ModuleRegistry, NativeExecutor, RscriptBridge } from "./execution";
import type { RBridge } from "./execution";
import { ArgumentInferencer } from "./inference";
import { Logger } from "./logger";
import { Profiler } from "./profiler";
import { DEFAULT_OVERRIDE_RULES, Resolver } from "./resolver";
import { buildSemanticIndex, loadSemanticIndex, saveSemanticIndex, searchKeysWithRegex } from "./search";
import type { IndexBuildResult, KeyMatch, RegexSearchError, SemanticIndex } from "./search";
import { generateCodeSnippet } from "./snippet";

export type HandleResult =
  | {
      success: true;
      result: string;
      codeSnippet: string;
      language: Language;
      displayKey: string;
    }
  | {
      success: false;
      error: string;
      diagnostic?: string;
      kind?: string;
      codeSnippet?: string;
      language?: Language;
      displayKey?: string;
    };

/**
 * Everything the pipeline needs, wired explicitly
 */
export type AgentContext = {
  store: CatalogStore;
  provider: EmbeddingProvider;
  resolver: Resolver;
  inferencer: ArgumentInferencer;
  executors: ExecutorRegistry;
  rules: OverrideRule[];
  logger: Logger;
  profiler: Profiler;
  /** Where index builds are persisted; builds stay in memory when absent */
  indexDir?: string;
  batchSize?: number;
};

export type AgentStatus = {
  catalog: { total: number } & Record<Language, number>;
  index: { loaded: boolean; size: number; dimension: number | null; dir: string | null };
  embedding: { model: string };
  languages: string[];
  rules: string[];
};

export class Agent {
  readonly context: AgentContext;

  constructor(context: AgentContext) {
    this.context = context;
  }

  /**
   * resolve -> infer -> snippet -> execute
   */
  async handle(query: string, args: ArgumentMap = {}): Promise<HandleResult> {
    const { resolver, inferencer, executors, logger } = this.context;
    logger.info(`Processing user query: '${query}'`, { args });

    let match: ResolvedMatch | undefined;
    try {
      match = await resolver.resolve(query);
    } catch (error) {
      const message = errorMessage(error);
      logger.error("Resolution failed", { query, error: message });
      return { success: false, error: `Resolution failed: ${message}` };
    }

    if (!match) {
      logger.warn("No function found for that query.", { query });
      return { success: false, error: "No matching function found" };
    }

    const { descriptor } = match;
    const filled = inferencer.infer(descriptor, query, args);
    const codeSnippet = generateCodeSnippet(descriptor, filled);
    logger.info(`Detected language => ${descriptor.language}`, { displayKey: descriptor.displayKey });

    const outcome = await executors.execute(descriptor, filled);
    const located = { codeSnippet, language: descriptor.language, displayKey: descriptor.displayKey };

    if (outcome.success) {
      return { success: true, result: outcome.result, ...located };
    }
    if ("kind" in outcome) {
      return { success: false, error: outcome.error, diagnostic: outcome.diagnostic, kind: outcome.kind, ...located };
    }
    return { success: false, error: outcome.error, ...located };
  }

  /**
   * Rebuild the catalog from seed records
   * The loaded index no longer matches the catalog afterwards
   */
  seed(records: CatalogRecord[]): SeedSummary {
    const summary = seedCatalog(this.context.store, records, this.context.rules);
    this.context.logger.info(`Seeded catalog with ${summary.total} functions`, { ...summary });
    return summary;
  }

  /**
   * Embed the catalog, persist the artifacts and swap the new snapshot in
   */
  async buildIndex(): Promise<IndexBuildResult> {
    const { store, provider, resolver, logger, profiler, indexDir, batchSize } = this.context;
    const start = performance.now();

    const result = await buildSemanticIndex(store, provider, { batchSize, logger });
    if (!result.success) {
      return result;
    }

    if (indexDir) {
      try {
        await saveSemanticIndex(result.index, indexDir);
      } catch (error) {
        const message = `Failed to save index to ${indexDir}: ${errorMessage(error)}`;
        logger.error(message);
        return { success: false, error: message };
      }
      logger.info(`Saved index to ${indexDir}`, { size: result.index.size });
    }

    resolver.setIndex(result.index);
    profiler.recordIndexBuild(performance.now() - start, result.index.size, result.index.dimension);
    return result;
  }

  /**
   * Pattern search over display keys
   */
  find(pattern: string, limit?: number): KeyMatch[] | { error: RegexSearchError } {
    return searchKeysWithRegex(this.context.store.list(), pattern, limit);
  }

  status(): AgentStatus {
    const { store, resolver, provider, executors, rules, indexDir } = this.context;
    const descriptors = store.list();
    const index = resolver.getIndex();
    return {
      catalog: {
        total: descriptors.length,
        javascript: descriptors.filter(d => d.language === "javascript").length,
        r: descriptors.filter(d => d.language === "r").length,
      },
      index: {
        loaded: index !== null,
        size: index?.size ?? 0,
        dimension: index?.dimension ?? null,
        dir: indexDir ?? null,
      },
      embedding: { model: provider.model },
      languages: executors.languages(),
      rules: rules.map(rule => rule.name),
    };
  }

  async close(): Promise<void> {
    this.context.store.close();
    await this.context.logger.flush();
  }
}

export type CreateAgentOptions = {
  /** Overrides for tests and embedding hosts */
  provider?: EmbeddingProvider;
  bridge?: RBridge;
  modules?: ModuleRegistry;
  logger?: Logger;
  profiler?: Profiler;
};

async function openIndex(dir: string, logger: Logger): Promise<SemanticIndex | null> {
  try {
    const index = await loadSemanticIndex(dir);
    logger.info(`Loaded index from ${dir}`, { size: index.size, dimension: index.dimension });
    return index;
  } catch (error) {
    if (error instanceof IndexNotFoundError) {
      logger.warn(error.message);
      return null;
    }
    throw error;
  }
}

/**
 * Wire an Agent from configuration
 * Throws on missing credentials or a corrupt index
 */
export async function createAgent(config: Config, options?: CreateAgentOptions): Promise<Agent> {
  const logger = options?.logger ?? new Logger(config.settings.logFile, { level: config.settings.logLevel });
  const profiler = options?.profiler ?? new Profiler();
  const provider = options?.provider ?? createEmbeddingProvider(config.embedding);
  const rules = config.rules ?? DEFAULT_OVERRIDE_RULES;

  if (config.catalog.path !== ":memory:") {
    await mkdir(dirname(config.catalog.path), { recursive: true });
  }
  const store = new SqliteCatalogStore(config.catalog.path);

  const index = await openIndex(config.index.dir, logger);
  if (index) profiler.recordIndexLoad(index.size, index.dimension);

  const bridge = options?.bridge ?? new RscriptBridge(config.runtimes.r, logger);
  const executors = new ExecutorRegistry(
    [new NativeExecutor({ modules: options?.modules, logger }), new ForeignExecutor(bridge, logger)],
    { logger, profiler },
  );

  return new Agent({
    store,
    provider,
    resolver: new Resolver({ store, provider, index, rules, logger, profiler }),
    inferencer: new ArgumentInferencer({ rules, logger, profiler }),
    executors,
    rules,
    logger,
    profiler,
    indexDir: config.index.dir,
    batchSize: config.index.batchSize,
  });
}
