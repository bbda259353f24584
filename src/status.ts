import { APP_VERSION } from "./config";
import type { Language } from "./types";

/** Counters for the most recent ingestion run. */
export interface IndexingStatus {
  documentsDiscovered: number;
  documentsLoaded: number;
  documentsSkipped: number;
  chunksTotal: number;
  chunksEmbedded: number;
  /** Entries per committed language collection. */
  collections: Record<Language, number>;
  lastRunAt: string | null;
}

export interface ProviderStatus {
  embeddingModel: string;
  llmModel: string;
  /** Retries issued after retryable embedding failures. */
  embeddingRetries: number;
  /** Retries issued after retryable generation failures. */
  generationRetries: number;
}

/**
 * Snapshot of server lifecycle and indexing progress. `ready` flips to true
 * once the first ingestion run has committed its collections.
 */
export interface ServerStatus {
  version: string;
  docsDir: string;
  transport: string;
  ready: boolean;
  ingesting: boolean;
  startedAt: string;
  indexing: IndexingStatus;
  providers: ProviderStatus;
}

/**
 * Class wrapper around mutable server status state. One instance is shared
 * by the pipelines and the transports; tests create their own.
 */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      docsDir: initial?.docsDir ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      ingesting: initial?.ingesting ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      indexing: initial?.indexing ?? {
        documentsDiscovered: 0,
        documentsLoaded: 0,
        documentsSkipped: 0,
        chunksTotal: 0,
        chunksEmbedded: 0,
        collections: {},
        lastRunAt: null,
      },
      providers: initial?.providers ?? {
        embeddingModel: "",
        llmModel: "",
        embeddingRetries: 0,
        generationRetries: 0,
      },
    };
  }

  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setDocsDir(dir: string) {
    this.data.docsDir = dir;
  }

  public setModels(embeddingModel: string, llmModel: string) {
    this.data.providers.embeddingModel = embeddingModel;
    this.data.providers.llmModel = llmModel;
  }

  /** Reset per-run counters at the start of an ingestion run. */
  public beginIngestion(documentsDiscovered: number) {
    const { indexing } = this.data;
    this.data.ingesting = true;
    indexing.documentsDiscovered = documentsDiscovered;
    indexing.documentsLoaded = 0;
    indexing.documentsSkipped = 0;
    indexing.chunksTotal = 0;
    indexing.chunksEmbedded = 0;
  }

  public recordDocument(outcome: "loaded" | "skipped", chunks = 0) {
    if (outcome === "loaded") {
      this.data.indexing.documentsLoaded++;
      this.data.indexing.chunksTotal += chunks;
    } else {
      this.data.indexing.documentsSkipped++;
    }
  }

  public incEmbedded(count = 1) {
    this.data.indexing.chunksEmbedded += count;
  }

  public setCollectionSize(language: Language, entries: number) {
    this.data.indexing.collections[language] = entries;
  }

  /** Close an ingestion run; the first completed run marks the server ready. */
  public endIngestion() {
    this.data.ingesting = false;
    this.data.indexing.lastRunAt = new Date().toISOString();
    this.data.ready = true;
  }

  public recordRetry(kind: "embedding" | "generation") {
    if (kind === "embedding") this.data.providers.embeddingRetries++;
    else this.data.providers.generationRetries++;
  }

  /** Access a live reference to current status (treat as read-only). */
  public getStatus(): ServerStatus {
    return this.data;
  }

  public toJSON() {
    return this.data;
  }
}
