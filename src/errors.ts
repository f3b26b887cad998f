export interface NormalizedError {
  message: string;
  stack?: string;
}

export function normalizeError(error: unknown): NormalizedError {
  if (error instanceof Error) {
    return error.stack ? { message: error.message, stack: error.stack } : { message: error.message };
  }
  if (typeof error === "string") {
    return { message: error };
  }
  try {
    return { message: JSON.stringify(error) ?? String(error) };
  } catch {
    return { message: String(error) };
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** Configuration file missing, unreadable or invalid */
export class ConfigError extends Error {
  override readonly name = "ConfigError";
}

/** Embedding provider configured without credentials; fatal at startup */
export class MissingCredentialsError extends Error {
  override readonly name = "MissingCredentialsError";
}

/** Embedding provider call failed or returned malformed vectors */
export class EmbeddingError extends Error {
  override readonly name = "EmbeddingError";
}

/** No persisted index artifacts in the index directory */
export class IndexNotFoundError extends Error {
  override readonly name = "IndexNotFoundError";
}

/** Persisted index artifacts do not belong together */
export class IndexCorruptionError extends Error {
  override readonly name = "IndexCorruptionError";
}

/** Catalog store write rejected */
export class CatalogError extends Error {
  override readonly name = "CatalogError";
}
