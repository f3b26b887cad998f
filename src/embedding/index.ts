import type { EmbeddingConfig } from "../config";
import { MissingCredentialsError } from "../errors";
import { HashEmbeddingProvider } from "./hash";
import { OpenAIEmbeddingProvider } from "./openai";
import type { EmbeddingProvider } from "./types";

export * from "./types";
export * from "./hash";
export * from "./openai";

/**
 * Create the configured provider
 * Missing credentials are fatal: no partial operation without embeddings
 */
export function createEmbeddingProvider(config: EmbeddingConfig): EmbeddingProvider {
  if (config.provider === "hash") {
    return new HashEmbeddingProvider(config.dimensions);
  }

  if (!config.apiKey) {
    throw new MissingCredentialsError(
      "Missing OpenAI API key. Set OPENAI_API_KEY or embedding.apiKey in the config file.",
    );
  }

  return new OpenAIEmbeddingProvider({
    apiKey: config.apiKey,
    model: config.model,
    baseUrl: config.baseUrl,
    dimensions: config.dimensions,
  });
}
