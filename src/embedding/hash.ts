import type { EmbeddingProvider } from "./types";

export const DEFAULT_HASH_DIMENSIONS = 256;

/**
 * Lowercases and splits on whitespace and punctuation
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\w\s]/g, " ")  // Replace punctuation with spaces
    .split(/\s+/)
    .filter(token => token.length > 0);
}

// 32-bit FNV-1a
function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Local feature-hashing embedder
 * Word unigrams and character trigrams hashed into a signed, L2-normalised vector.
 * Identical texts always map to identical vectors; no network involved.
 */
export class HashEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private readonly dimensions: number;

  constructor(dimensions: number = DEFAULT_HASH_DIMENSIONS) {
    if (!Number.isInteger(dimensions) || dimensions < 1) {
      throw new Error(`Invalid embedding dimension: ${dimensions}`);
    }
    this.dimensions = dimensions;
    this.model = `hash-${dimensions}`;
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map(text => this.embedOne(text));
  }

  private embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);

    for (const token of tokenize(text)) {
      this.addFeature(vector, `w:${token}`, 1);
      const padded = ` ${token} `;
      for (let i = 0; i + 3 <= padded.length; i++) {
        this.addFeature(vector, `c:${padded.slice(i, i + 3)}`, 0.5);
      }
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm > 0 ? vector.map(v => v / norm) : vector;
  }

  private addFeature(vector: number[], feature: string, weight: number): void {
    const hash = fnv1a(feature);
    const slot = hash % this.dimensions;
    const sign = (hash & 0x80000000) === 0 ? 1 : -1;
    vector[slot] = (vector[slot] ?? 0) + sign * weight;
  }
}
