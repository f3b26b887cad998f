import type { CatalogStore } from "../catalog/store";
import type { ResolvedMatch } from "../catalog/types";
import type { OverrideRule } from "../config";
import type { EmbeddingProvider } from "../embedding";
import type { Logger } from "../logger";
import type { Profiler } from "../profiler";
import { searchSemanticIndex } from "../search/semantic";
import type { SemanticIndex } from "../search/semantic";
import { DEFAULT_OVERRIDE_RULES, matchRule, ruleFallbackDescriptor } from "./rules";

export type ResolverOptions = {
  store: CatalogStore;
  provider: EmbeddingProvider;
  index?: SemanticIndex | null;
  rules?: OverrideRule[];
  logger?: Logger;
  profiler?: Profiler;
};

export type ResolveOptions = {
  /** Apply override rules before semantic search (default: true) */
  overrides?: boolean;
};

/**
 * Query text -> best matching descriptor
 * Override rules first, then the semantic index
 */
export class Resolver {
  private readonly store: CatalogStore;
  private readonly provider: EmbeddingProvider;
  private readonly rules: OverrideRule[];
  private readonly logger: Logger | undefined;
  private readonly profiler: Profiler | undefined;
  private index: SemanticIndex | null;

  constructor(options: ResolverOptions) {
    this.store = options.store;
    this.provider = options.provider;
    this.rules = options.rules ?? DEFAULT_OVERRIDE_RULES;
    this.index = options.index ?? null;
    this.logger = options.logger;
    this.profiler = options.profiler;
  }

  /**
   * Swap in a freshly built or reloaded snapshot
   */
  setIndex(index: SemanticIndex | null): void {
    this.index = index;
  }

  getIndex(): SemanticIndex | null {
    return this.index;
  }

  async resolve(query: string, options?: ResolveOptions): Promise<ResolvedMatch | undefined> {
    const timer = this.profiler?.startTimer("resolve");
    try {
      if (options?.overrides ?? true) {
        const pinned = this.resolveOverride(query);
        if (pinned) return pinned;
      }
      return await this.resolveSemantic(query);
    } finally {
      timer?.();
    }
  }

  /**
   * Deterministic lookup for queries that trigger an override rule
   * exact namespace+name -> key regex -> synthesised descriptor
   */
  resolveOverride(query: string): ResolvedMatch | undefined {
    const rule = matchRule(this.rules, query);
    if (!rule) return undefined;

    const timer = this.profiler?.startTimer("resolve.override");
    const { language, namespace, name, keyPattern } = rule.target;

    let descriptor = this.store.findByName(namespace, name, language);
    let source = "exact";

    if (!descriptor) {
      try {
        descriptor = this.store.findByKeyPattern(language, keyPattern);
        source = "pattern";
      } catch (error) {
        this.logger?.warn(`Override rule ${rule.name} has an invalid key pattern`, {
          pattern: keyPattern,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    if (!descriptor) {
      descriptor = ruleFallbackDescriptor(rule);
      source = "fallback";
    }

    timer?.();
    this.logger?.info(`Override rule ${rule.name} matched`, { query, displayKey: descriptor.displayKey, source });
    return { descriptor, distance: 0 };
  }

  private async resolveSemantic(query: string): Promise<ResolvedMatch | undefined> {
    if (!this.index) {
      this.logger?.warn("No index loaded. Run the index build first.", { query });
      return undefined;
    }

    const timer = this.profiler?.startTimer("resolve.semantic");
    const [best] = await searchSemanticIndex(this.index, query, this.provider, this.store, 1);
    const duration = timer?.();

    if (!best) {
      this.logger?.info("No function found for that query.", { query });
      return undefined;
    }

    this.logger?.info(`Best match => ${best.descriptor.displayKey}`, {
      query,
      distance: best.distance,
      durationMs: duration,
    });
    return best;
  }
}
