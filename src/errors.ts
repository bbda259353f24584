/**
 * Error taxonomy for the RAG core.
 *
 * Per-document problems (IngestionError, UnsupportedFormatError) are caught by
 * the ingestion pipeline and reported; everything that would leave an answer
 * without grounding infrastructure (IndexUnavailableError,
 * GenerationUnavailableError) propagates to the caller.
 */

export type RagErrorCode =
  | "INGESTION_FAILED"
  | "UNSUPPORTED_FORMAT"
  | "UNSUPPORTED_LANGUAGE"
  | "INDEX_UNAVAILABLE"
  | "VECTOR_DIMENSION_MISMATCH"
  | "EMBEDDING_PROVIDER_ERROR"
  | "GENERATION_PROVIDER_ERROR"
  | "GENERATION_UNAVAILABLE"
  | "CONFIGURATION_ERROR";

/** Base class; `code` lets the tool layer branch without instanceof chains. */
export class RagError extends Error {
  public readonly code: RagErrorCode;

  public constructor(code: RagErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = "RagError";
  }
}

/** A single document failed to load, parse, or embed. Logged and skipped. */
export class IngestionError extends RagError {
  public readonly sourceUri: string;

  public constructor(sourceUri: string, message: string, options?: { cause?: unknown }) {
    super("INGESTION_FAILED", `${sourceUri}: ${message}`, options);
    this.sourceUri = sourceUri;
    this.name = "IngestionError";
  }
}

export class UnsupportedFormatError extends RagError {
  public readonly sourceUri: string;

  public constructor(sourceUri: string, detail: string) {
    super("UNSUPPORTED_FORMAT", `Unsupported document format for ${sourceUri} (${detail})`);
    this.sourceUri = sourceUri;
    this.name = "UnsupportedFormatError";
  }
}

export class UnsupportedLanguageError extends RagError {
  public constructor(language: string, supported: readonly string[]) {
    super(
      "UNSUPPORTED_LANGUAGE",
      `Language '${language}' is not supported (expected one of: ${supported.join(", ")})`,
    );
    this.name = "UnsupportedLanguageError";
  }
}

/** The vector store is closed or its backing files cannot be read/written. */
export class IndexUnavailableError extends RagError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("INDEX_UNAVAILABLE", message, options);
    this.name = "IndexUnavailableError";
  }
}

export class VectorDimensionError extends RagError {
  public constructor(language: string, expected: number, actual: number) {
    super(
      "VECTOR_DIMENSION_MISMATCH",
      `Collection '${language}' holds ${expected}-d vectors, got ${actual}-d`,
    );
    this.name = "VectorDimensionError";
  }
}

/** Failure reported by an embedding or LLM provider. */
export abstract class ProviderError extends RagError {
  /** Quota, timeout, and 5xx failures are retryable; auth/validation failures are not. */
  public readonly retryable: boolean;

  protected constructor(
    code: RagErrorCode,
    message: string,
    retryable: boolean,
    options?: { cause?: unknown },
  ) {
    super(code, message, options);
    this.retryable = retryable;
  }
}

export class EmbeddingProviderError extends ProviderError {
  public constructor(message: string, retryable: boolean, options?: { cause?: unknown }) {
    super("EMBEDDING_PROVIDER_ERROR", message, retryable, options);
    this.name = "EmbeddingProviderError";
  }
}

export class GenerationProviderError extends ProviderError {
  public constructor(message: string, retryable: boolean, options?: { cause?: unknown }) {
    super("GENERATION_PROVIDER_ERROR", message, retryable, options);
    this.name = "GenerationProviderError";
  }
}

/** Generation failed after the retry budget was spent. */
export class GenerationUnavailableError extends RagError {
  public constructor(options?: { cause?: unknown }) {
    super("GENERATION_UNAVAILABLE", "Answer generation is temporarily unavailable", options);
    this.name = "GenerationUnavailableError";
  }
}

export class ConfigError extends RagError {
  public constructor(message: string) {
    super("CONFIGURATION_ERROR", message);
    this.name = "ConfigError";
  }
}

export function isRetryableProviderError(error: unknown): boolean {
  return error instanceof ProviderError && error.retryable;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const TRANSIENT_PATTERN =
  /\b(429|500|502|503|504)\b|quota|rate.?limit|timed? ?out|timeout|abort|ECONNRESET|ECONNREFUSED|ETIMEDOUT|fetch failed|overloaded|unavailable/i;

/**
 * Classify a raw provider failure. Uses the HTTP status when the SDK exposes
 * one, otherwise falls back to message matching.
 */
export function isTransientFailure(error: unknown): boolean {
  if (typeof error === "object" && error !== null && "status" in error) {
    const status = error.status;
    if (typeof status === "number") return status === 408 || status === 429 || status >= 500;
  }
  return TRANSIENT_PATTERN.test(errorMessage(error));
}
