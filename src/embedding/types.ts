/**
 * Converts text to fixed-dimension vectors
 * Every vector of one call, and of calls within one index build, shares a dimension
 */
export interface EmbeddingProvider {
  /** Model identifier recorded with the index */
  readonly model: string;
  embed(texts: string[]): Promise<number[][]>;
}
