import { summarize } from "../catalog/catalog";
import type { CatalogStore } from "../catalog/store";
import type { DescriptorSummary, DisplayKey, ResolvedMatch } from "../catalog/types";
import type { EmbeddingProvider } from "../embedding";
import { errorMessage, IndexCorruptionError } from "../errors";
import type { Logger } from "../logger";
import { FlatL2Index } from "./flat-index";

export const DEFAULT_BATCH_SIZE = 100;

/**
 * Immutable snapshot: vector at position i embeds keys[i]
 */
export class SemanticIndex {
  readonly vectors: FlatL2Index;
  readonly keys: readonly DisplayKey[];
  readonly summaries: readonly DescriptorSummary[];

  constructor(vectors: FlatL2Index, keys: DisplayKey[], summaries: DescriptorSummary[]) {
    if (vectors.size !== keys.length || keys.length !== summaries.length) {
      throw new IndexCorruptionError(
        `Index holds ${vectors.size} vectors, ${keys.length} keys and ${summaries.length} summaries`,
      );
    }
    summaries.forEach((summary, i) => {
      if (summary.displayKey !== keys[i]) {
        throw new IndexCorruptionError(`Summary ${i} names "${summary.displayKey}" but key ${i} is "${keys[i]}"`);
      }
    });

    this.vectors = vectors;
    this.keys = [...keys];
    this.summaries = summaries.map(s => ({ ...s }));
  }

  get size(): number {
    return this.keys.length;
  }

  get dimension(): number {
    return this.vectors.dimension;
  }

  /**
   * Nearest display keys for an already-embedded query
   * Positions outside the key list (padding) are skipped
   */
  nearest(queryVector: ArrayLike<number>, k: number = 1): Array<{ displayKey: DisplayKey; distance: number }> {
    const results: Array<{ displayKey: DisplayKey; distance: number }> = [];
    for (const neighbor of this.vectors.search(queryVector, k)) {
      if (neighbor.position < 0 || neighbor.position >= this.keys.length) continue;
      const displayKey = this.keys[neighbor.position];
      if (displayKey === undefined) continue;
      results.push({ displayKey, distance: neighbor.distance });
    }
    return results;
  }
}

export type IndexBuildResult =
  | { success: true; index: SemanticIndex }
  | { success: false; error: string };

export type BuildOptions = {
  batchSize?: number;
  logger?: Logger;
};

/**
 * Embed every display key in the catalog and build a fresh snapshot
 * Any failed batch fails the whole build; no partial index is returned
 */
export async function buildSemanticIndex(
  store: CatalogStore,
  provider: EmbeddingProvider,
  options?: BuildOptions,
): Promise<IndexBuildResult> {
  const logger = options?.logger;
  const batchSize = options?.batchSize ?? DEFAULT_BATCH_SIZE;
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    return { success: false, error: `Invalid batch size: ${batchSize}` };
  }

  const descriptors = store.list();
  logger?.info(`Loaded ${descriptors.length} functions from the catalog`);
  if (descriptors.length === 0) {
    logger?.warn("No descriptors to embed. Stopping build process.");
    return { success: false, error: "No descriptors to embed" };
  }

  const keys = descriptors.map(d => d.displayKey);
  const totalBatches = Math.ceil(keys.length / batchSize);
  let vectors: FlatL2Index | null = null;

  for (let i = 0; i < keys.length; i += batchSize) {
    const batch = keys.slice(i, i + batchSize);
    const batchNumber = i / batchSize + 1;
    logger?.info(`Processing batch ${batchNumber} of ${totalBatches}`, { size: batch.length });

    let embeddings: number[][];
    try {
      embeddings = await provider.embed(batch);
    } catch (error) {
      const message = `Embedding batch ${batchNumber} failed: ${errorMessage(error)}`;
      logger?.error(message);
      return { success: false, error: message };
    }

    if (embeddings.length !== batch.length) {
      const message = `Embedding batch ${batchNumber} returned ${embeddings.length} vectors for ${batch.length} keys`;
      logger?.error(message);
      return { success: false, error: message };
    }

    for (const embedding of embeddings) {
      if (embedding.length === 0) {
        const message = `Embedding batch ${batchNumber} returned an empty vector`;
        logger?.error(message);
        return { success: false, error: message };
      }
      vectors ??= new FlatL2Index(embedding.length, keys.length);
      if (embedding.length !== vectors.dimension) {
        const message = `Embedding dimension changed from ${vectors.dimension} to ${embedding.length} in batch ${batchNumber}`;
        logger?.error(message);
        return { success: false, error: message };
      }
      vectors.add(embedding);
    }
  }

  if (!vectors) {
    return { success: false, error: "No embeddings were generated" };
  }

  logger?.info(`Built index with ${vectors.size} vectors of dimension ${vectors.dimension}`);
  return { success: true, index: new SemanticIndex(vectors, keys, descriptors.map(summarize)) };
}

/**
 * Embed the query, find its k nearest keys and re-fetch the live descriptors
 * Keys deleted from the catalog since the build are skipped
 */
export async function searchSemanticIndex(
  index: SemanticIndex,
  query: string,
  provider: EmbeddingProvider,
  store: CatalogStore,
  k: number = 1,
): Promise<ResolvedMatch[]> {
  const [queryVector] = await provider.embed([query]);
  if (!queryVector) {
    return [];
  }

  const matches: ResolvedMatch[] = [];
  for (const { displayKey, distance } of index.nearest(queryVector, k)) {
    const descriptor = store.get(displayKey);
    if (descriptor) {
      matches.push({ descriptor, distance });
    }
  }
  return matches;
}
