import { withRetry, type RetryOptions } from "./backoff";
import type { Chunker } from "./chunker";
import type { EmbeddingProvider } from "./embeddings";
import {
  EmbeddingProviderError,
  IndexUnavailableError,
  IngestionError,
  RagError,
  errorMessage,
  isRetryableProviderError,
} from "./errors";
import { computeHash } from "./hash";
import type { LanguageRouter } from "./language";
import { parseDocument, resolveFormat } from "./parsers";
import { remoteFile, type DocumentSource, type SourceFile } from "./sources";
import type { StatusManager } from "./status";
import type { Chunk, Language, SourceDocument } from "./types";
import type { CollectionBuild, EmbeddingIndex } from "./vector-index";

export interface IngestionFailure {
  /** Document URI, or the source name when a listing failed. */
  uri: string;
  message: string;
}

export interface IngestionReport {
  documentsLoaded: number;
  /** Empty, duplicate, unsupported and failed documents. */
  documentsSkipped: number;
  chunksIndexed: number;
  errors: IngestionFailure[];
  /** Entry count of every collection committed by this run. */
  languages: Record<Language, number>;
}

export interface AddDocumentResult {
  sourceUri: string;
  language: Language;
  chunks: number;
}

export interface IngestionPipelineOptions {
  sources: DocumentSource[];
  index: EmbeddingIndex;
  embeddings: EmbeddingProvider;
  chunker: Chunker;
  router: LanguageRouter;
  /** Chunks per embedding request (default 32). */
  batchSize?: number;
  retry?: RetryOptions;
  status?: StatusManager;
  verbose?: boolean;
}

interface PreparedDocument {
  doc: SourceDocument;
  chunks: Chunk[];
  vectors: Float32Array[];
}

/**
 * Loads every document from the configured sources into the embedding
 * index. Each run rebuilds the collections of the languages it loaded
 * documents for, in shadow, and swaps them in once the run is over.
 */
export class IngestionPipeline {
  private readonly sources: DocumentSource[];
  private readonly index: EmbeddingIndex;
  private readonly embeddings: EmbeddingProvider;
  private readonly chunker: Chunker;
  private readonly router: LanguageRouter;
  private readonly batchSize: number;
  private readonly retry: RetryOptions;
  private readonly status?: StatusManager;
  private readonly verbose: boolean;
  private inFlight?: Promise<IngestionReport>;
  /** Documents added by URL; later runs load them again alongside the sources. */
  private readonly added = new Map<string, Language | undefined>();

  public constructor(opts: IngestionPipelineOptions) {
    this.sources = opts.sources;
    this.index = opts.index;
    this.embeddings = opts.embeddings;
    this.chunker = opts.chunker;
    this.router = opts.router;
    this.batchSize = Math.max(1, opts.batchSize ?? 32);
    this.retry = opts.retry ?? {};
    this.status = opts.status;
    this.verbose = !!opts.verbose;
  }

  /**
   * Rebuild the index from all sources. Calls made while a run is in
   * progress share that run's result.
   * @throws {IndexUnavailableError} when the index is closed or cannot be written.
   */
  public ingestAll(): Promise<IngestionReport> {
    if (!this.inFlight) {
      this.inFlight = this.run().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  /**
   * Load one remote document into the live collection, replacing entries
   * previously stored for the same URL, and flush the index. The write
   * waits for a run in progress, and later runs keep the document.
   */
  public async addFromUrl(url: string, language?: Language): Promise<AddDocumentResult> {
    this.ensureIndexOpen();
    let prepared: PreparedDocument | undefined;
    try {
      prepared = await this.prepare(remoteFile(url, language));
    } catch (e) {
      throw e instanceof RagError ? e : new IngestionError(url, errorMessage(e), { cause: e });
    }
    if (!prepared) throw new IngestionError(url, "document contains no text");
    const { doc, chunks, vectors } = prepared;

    this.added.set(url, language);
    // A failed run is reported to whoever started it.
    await this.inFlight?.then(
      () => undefined,
      () => undefined,
    );
    this.index.checkDimensions(doc.language, vectors);
    await this.index.deleteSource(doc.language, doc.sourceUri);
    for (const [i, chunk] of chunks.entries()) {
      await this.index.upsert(doc.language, chunk.id, vectors[i], {
        text: chunk.text,
        metadata: { documentId: doc.id, sourceUri: doc.sourceUri, ordinal: chunk.ordinal },
      });
    }
    await this.index.flush();
    this.status?.setCollectionSize(doc.language, this.index.count(doc.language));
    console.error(`[Ingest] Added ${url} (${doc.language}): ${chunks.length} chunks.`);
    return { sourceUri: doc.sourceUri, language: doc.language, chunks: chunks.length };
  }

  private async run(): Promise<IngestionReport> {
    this.ensureIndexOpen();
    const report: IngestionReport = {
      documentsLoaded: 0,
      documentsSkipped: 0,
      chunksIndexed: 0,
      errors: [],
      languages: {},
    };

    const files: SourceFile[] = [];
    for (const source of this.allSources()) {
      try {
        const listed = await source.list();
        if (this.verbose) console.error(`[Ingest][verbose] ${source.name}: ${listed.length} documents`);
        files.push(...listed);
      } catch (e) {
        console.error(`[Ingest] Listing ${source.name} documents failed:`, e);
        report.errors.push({ uri: source.name, message: errorMessage(e) });
      }
    }
    console.error(`[Ingest] Discovered ${files.length} documents.`);
    this.status?.beginIngestion(files.length);

    const builds = new Map<Language, CollectionBuild>();
    const seen = new Set<string>();
    try {
      for (const file of files) {
        try {
          const prepared = await this.prepare(file, seen);
          if (!prepared) {
            report.documentsSkipped++;
            this.status?.recordDocument("skipped");
            continue;
          }
          const { doc, chunks, vectors } = prepared;
          let build = builds.get(doc.language);
          if (!build) {
            build = this.index.beginRebuild(doc.language);
            builds.set(doc.language, build);
          }
          build.upsertAll(
            chunks.map((chunk, i) => ({
              chunkId: chunk.id,
              vector: vectors[i],
              input: {
                text: chunk.text,
                metadata: { documentId: doc.id, sourceUri: doc.sourceUri, ordinal: chunk.ordinal },
              },
            })),
          );
          report.documentsLoaded++;
          report.chunksIndexed += chunks.length;
          this.status?.recordDocument("loaded", chunks.length);
          if (this.verbose) {
            console.error(`[Ingest][verbose] ${doc.sourceUri} (${doc.language}): ${chunks.length} chunks`);
          }
        } catch (e) {
          if (e instanceof IndexUnavailableError) throw e;
          const failure = e instanceof RagError ? e : new IngestionError(file.uri, errorMessage(e), { cause: e });
          console.error(`[Ingest] Skipping ${file.uri}: ${failure.message}`);
          report.errors.push({ uri: file.uri, message: failure.message });
          report.documentsSkipped++;
          this.status?.recordDocument("skipped");
        }
      }

      for (const [language, build] of builds) {
        if (build.size() === 0) {
          // Every document of this language failed; keep the committed collection.
          build.abort();
          continue;
        }
        await build.commit();
        report.languages[language] = build.size();
        this.status?.setCollectionSize(language, build.size());
        console.error(`[Ingest] Committed '${language}' collection: ${build.size()} entries.`);
      }
    } catch (e) {
      for (const build of builds.values()) build.abort();
      throw e;
    } finally {
      this.status?.endIngestion();
    }

    console.error(
      `[Ingest] Done: ${report.documentsLoaded} loaded, ${report.documentsSkipped} skipped, ${report.chunksIndexed} chunks, ${report.errors.length} errors.`,
    );
    return report;
  }

  private allSources(): DocumentSource[] {
    if (this.added.size === 0) return this.sources;
    const added: DocumentSource = {
      name: "added",
      list: async () => [...this.added].map(([url, language]) => remoteFile(url, language)),
    };
    return [...this.sources, added];
  }

  /**
   * Load, parse, route, chunk and embed one document. Returns undefined for
   * documents with nothing to index (empty, or a duplicate in `seen`).
   */
  private async prepare(file: SourceFile, seen?: Set<string>): Promise<PreparedDocument | undefined> {
    const { bytes, contentType } = await file.load();
    const format = resolveFormat(file.uri, contentType);
    const rawText = await parseDocument(bytes, format);
    if (!rawText.trim()) {
      console.error(`[Ingest] Skipping ${file.uri}: empty document.`);
      return undefined;
    }

    const contentHash = computeHash(rawText);
    if (seen) {
      if (seen.has(contentHash)) {
        console.error(`[Ingest] Skipping ${file.uri}: duplicate content.`);
        return undefined;
      }
      seen.add(contentHash);
    }

    const language =
      file.language !== undefined
        ? this.router.resolve(file.language, rawText)
        : (this.router.fromPath(file.uri) ?? this.router.detect(rawText));
    const doc: SourceDocument = {
      id: contentHash,
      sourceUri: file.uri,
      language,
      format,
      rawText,
      contentHash,
    };
    const chunks = this.chunker.split(doc);
    if (chunks.length === 0) {
      console.error(`[Ingest] Skipping ${file.uri}: no chunks.`);
      return undefined;
    }
    return { doc, chunks, vectors: await this.embed(file.uri, chunks) };
  }

  /** Embed all chunks of one document; any exhausted batch fails the document. */
  private async embed(uri: string, chunks: Chunk[]): Promise<Float32Array[]> {
    const vectors: Float32Array[] = [];
    for (let i = 0; i < chunks.length; i += this.batchSize) {
      const texts = chunks.slice(i, i + this.batchSize).map((c) => c.text);
      const batch = await withRetry(
        () => this.embeddings.embedDocuments(texts),
        isRetryableProviderError,
        {
          label: `embedding ${uri}`,
          ...this.retry,
          onRetry: (...args) => {
            this.status?.recordRetry("embedding");
            this.retry.onRetry?.(...args);
          },
        },
      );
      if (batch.length !== texts.length) {
        throw new EmbeddingProviderError(
          `Expected ${texts.length} embeddings, received ${batch.length}`,
          false,
        );
      }
      vectors.push(...batch);
      this.status?.incEmbedded(batch.length);
    }
    const dims = vectors[0]?.length;
    if (vectors.some((v) => v.length !== dims)) {
      throw new EmbeddingProviderError(`Inconsistent embedding dimensions for ${uri}`, false);
    }
    return vectors;
  }

  private ensureIndexOpen(): void {
    if (!this.index.isOpen()) throw new IndexUnavailableError("Embedding index is not open");
  }
}
