import { GoogleGenerativeAI, TaskType, type GenerativeModel } from "@google/generative-ai";
import { EmbeddingProviderError, errorMessage, isTransientFailure } from "./errors";

/** Embedding capability consumed by ingestion and retrieval. */
export interface EmbeddingProvider {
  /** Model identifier; persisted with the index to detect incompatible stores. */
  getModelName(): string;
  /** Embed passages for storage. Output order matches input order. */
  embedDocuments(texts: string[]): Promise<Float32Array[]>;
  /** Embed a search query. */
  embedQuery(text: string): Promise<Float32Array>;
}

export interface EmbeddingsOptions {
  apiKey: string;
  modelName?: string;
  /** Per-request timeout in ms (default 30000). */
  timeoutMs?: number;
  /** Max texts per batchEmbedContents request (default 32, API limit 100). */
  batchSize?: number;
}

/**
 * Gemini-backed embedding provider. A single instance can be reused for any
 * number of calls; failures surface as {@link EmbeddingProviderError} with a
 * `retryable` flag so callers can apply backoff.
 */
export class Embeddings implements EmbeddingProvider {
  private readonly modelName: string;
  private readonly batchSize: number;
  private readonly model: GenerativeModel;

  public constructor(opts: EmbeddingsOptions) {
    this.modelName = opts.modelName?.trim() || "text-embedding-004";
    this.batchSize = Math.max(1, Math.min(100, opts.batchSize ?? 32));
    const genAI = new GoogleGenerativeAI(opts.apiKey);
    this.model = genAI.getGenerativeModel(
      { model: this.modelName },
      { timeout: opts.timeoutMs ?? 30000 },
    );
  }

  public getModelName(): string {
    return this.modelName;
  }

  public async embedDocuments(texts: string[]): Promise<Float32Array[]> {
    const out: Float32Array[] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      try {
        const result = await this.model.batchEmbedContents({
          requests: batch.map((text) => ({
            content: { role: "user", parts: [{ text }] },
            taskType: TaskType.RETRIEVAL_DOCUMENT,
          })),
        });
        if (result.embeddings.length !== batch.length) {
          throw new EmbeddingProviderError(
            `Expected ${batch.length} embeddings, received ${result.embeddings.length}`,
            false,
          );
        }
        for (const e of result.embeddings) out.push(Float32Array.from(e.values));
      } catch (e) {
        throw Embeddings.wrap(e);
      }
    }
    return out;
  }

  public async embedQuery(text: string): Promise<Float32Array> {
    try {
      const result = await this.model.embedContent({
        content: { role: "user", parts: [{ text }] },
        taskType: TaskType.RETRIEVAL_QUERY,
      });
      return Float32Array.from(result.embedding.values);
    } catch (e) {
      throw Embeddings.wrap(e);
    }
  }

  private static wrap(e: unknown): EmbeddingProviderError {
    if (e instanceof EmbeddingProviderError) return e;
    return new EmbeddingProviderError(
      `Embedding request failed: ${errorMessage(e)}`,
      isTransientFailure(e),
      { cause: e },
    );
  }

  /**
   * Cosine similarity between two vectors, in [-1, 1]. A zero vector scores
   * 0 against everything.
   */
  public static cosine(a: Float32Array, b: Float32Array): number {
    let dot = 0,
      na = 0,
      nb = 0;
    const n = Math.min(a.length, b.length);
    for (let i = 0; i < n; i++) {
      const x = a[i],
        y = b[i];
      dot += x * y;
      na += x * x;
      nb += y * y;
    }
    return dot / (Math.sqrt(na) * Math.sqrt(nb) + 1e-10);
  }
}
