/** Machine-readable error categories surfaced by the memory engine. */
export type MemoryErrorCode =
  | "INVALID_ARGUMENT"
  | "EXTRACTION_FAILED"
  | "EMBEDDING_FAILED"
  | "NOT_FOUND"
  | "STORAGE_FAILED";

/**
 * Base class for every error the engine raises on purpose. Callers can branch
 * on `code` (or `instanceof` a subclass) instead of parsing messages.
 */
export class MemoryEngineError extends Error {
  public readonly code: MemoryErrorCode;

  public constructor(code: MemoryErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MemoryEngineError";
    this.code = code;
  }
}

/** Bad chunk size, negative top_k, mismatched embedding dimension, ... */
export class InvalidArgumentError extends MemoryEngineError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("INVALID_ARGUMENT", message, options);
    this.name = "InvalidArgumentError";
  }
}

/** An extractor could not turn the source into text. */
export class ExtractionError extends MemoryEngineError {
  public readonly source: string;

  public constructor(source: string, message: string, options?: { cause?: unknown }) {
    super("EXTRACTION_FAILED", message, options);
    this.name = "ExtractionError";
    this.source = source;
  }
}

/** The embedding provider failed or returned a vector that cannot be normalized. */
export class EmbeddingError extends MemoryEngineError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("EMBEDDING_FAILED", message, options);
    this.name = "EmbeddingError";
  }
}

export class NotFoundError extends MemoryEngineError {
  public readonly documentId: string;

  public constructor(documentId: string) {
    super("NOT_FOUND", `Unknown document id: ${documentId}`);
    this.name = "NotFoundError";
    this.documentId = documentId;
  }
}

/** Snapshot read/write failure. */
export class StorageError extends MemoryEngineError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("STORAGE_FAILED", message, options);
    this.name = "StorageError";
  }
}

/** Error thrown when attempting to embed before initialization. */
export class EmbedderNotInitializedError extends Error {
  constructor() {
    super("Embedder not initialized. Call init() first.");
    this.name = "EmbedderNotInitializedError";
  }
}

/** Render an unknown thrown value for log lines and wrapped messages. */
export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
