import OpenAI from "openai";
import { EmbeddingError } from "../errors";
import type { EmbeddingProvider } from "./types";

/**
 * The slice of the OpenAI client used here
 */
export type EmbeddingsClient = {
  embeddings: {
    create(body: OpenAI.EmbeddingCreateParams): Promise<OpenAI.CreateEmbeddingResponse>;
  };
};

export type OpenAIEmbeddingOptions = {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  dimensions?: number;
  /** Override client creation for testing */
  client?: EmbeddingsClient;
};

/**
 * Embeddings from the OpenAI API
 * Quota and auth failures surface as EmbeddingError; retries stay with the SDK
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private readonly client: EmbeddingsClient;
  private readonly dimensions: number | undefined;

  constructor(options: OpenAIEmbeddingOptions) {
    this.model = options.model ?? "text-embedding-3-small";
    this.dimensions = options.dimensions;
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl });
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    let response: OpenAI.CreateEmbeddingResponse;
    try {
      response = await this.client.embeddings.create({
        model: this.model,
        input: texts,
        ...(this.dimensions ? { dimensions: this.dimensions } : {}),
      });
    } catch (error) {
      throw new EmbeddingError(
        `Embedding request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    if (response.data.length !== texts.length) {
      throw new EmbeddingError(`Expected ${texts.length} embeddings, received ${response.data.length}`);
    }

    // The API may return items out of order; index says where each belongs
    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map(item => item.embedding);
  }
}
