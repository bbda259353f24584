import { Embeddings } from "./embeddings";
import { IndexUnavailableError, VectorDimensionError } from "./errors";
import { Persistence } from "./persistence";
import type { IndexEntry, IndexEntryMetadata, Language, RetrievalResult } from "./types";

export interface EmbeddingIndexOptions {
  /** Optional disk store; without it the index lives in memory only. */
  persistence?: Persistence;
  /** Pin the vector dimensionality; otherwise each collection adopts its first vector's length. */
  dimensions?: number;
  verbose?: boolean;
}

/** Input to {@link EmbeddingIndex.upsert}: text plus metadata, without the language. */
export interface UpsertInput {
  text: string;
  metadata: Omit<IndexEntryMetadata, "language">;
}

class Collection {
  /** Map iteration order is insertion order, which breaks score ties. */
  public readonly entries = new Map<string, IndexEntry>();
  public readonly language: Language;
  public dimensions: number | null;
  public dirty = false;

  public constructor(language: Language, dimensions: number | null) {
    this.language = language;
    this.dimensions = dimensions;
  }

  /** Throws unless every vector matches this collection's (or the first vector's) dimensionality. */
  public checkDimensions(vectors: Float32Array[]): void {
    const expected = this.dimensions ?? vectors[0]?.length;
    for (const vector of vectors) {
      if (vector.length !== expected) {
        throw new VectorDimensionError(this.language, expected ?? vector.length, vector.length);
      }
    }
  }

  public put(entry: IndexEntry): void {
    const dims = entry.vector.length;
    if (this.dimensions === null) this.dimensions = dims;
    else if (dims !== this.dimensions) {
      throw new VectorDimensionError(this.language, this.dimensions, dims);
    }
    // Replacement counts as a fresh insertion.
    this.entries.delete(entry.chunkId);
    this.entries.set(entry.chunkId, entry);
    this.dirty = true;
  }
}

export interface BuildEntry {
  chunkId: string;
  vector: Float32Array;
  input: UpsertInput;
}

/**
 * A shadow collection filled during a rebuild. Queries keep hitting the
 * previous collection until {@link commit} swaps it in.
 */
export interface CollectionBuild {
  readonly language: Language;
  upsert(chunkId: string, vector: Float32Array, input: UpsertInput): void;
  /** Add all entries or, on a dimension mismatch, none of them. */
  upsertAll(entries: BuildEntry[]): void;
  size(): number;
  /** Persist the shadow, then make it the active collection. */
  commit(): Promise<void>;
  /** Discard the shadow; the active collection is untouched. */
  abort(): void;
}

/**
 * Language-partitioned vector store with brute-force cosine search.
 *
 * Owned explicitly: create it, {@link open} it, hand it to the ingestion and
 * retrieval pipelines, {@link close} it on shutdown. Every operation on a
 * closed index fails with {@link IndexUnavailableError}.
 */
export class EmbeddingIndex {
  private readonly persistence?: Persistence;
  private readonly dimensions?: number;
  private readonly verbose: boolean;
  private readonly collections = new Map<Language, Collection>();
  private opened = false;

  public constructor(opts: EmbeddingIndexOptions = {}) {
    this.persistence = opts.persistence;
    this.dimensions = opts.dimensions;
    this.verbose = !!opts.verbose;
  }

  /** Load persisted collections (if a store is configured) and accept operations. */
  public async open(): Promise<void> {
    if (this.opened) return;
    this.collections.clear();
    if (this.persistence) {
      for (const language of await this.persistence.listLanguages()) {
        const loaded = await this.persistence.load(language);
        if (!loaded) continue;
        if (this.dimensions !== undefined && loaded.dimensions !== null && loaded.dimensions !== this.dimensions) {
          console.error(
            `[Index] Stored '${language}' collection has ${loaded.dimensions}-d vectors, expected ${this.dimensions}; ignoring it.`,
          );
          continue;
        }
        const collection = new Collection(language, this.dimensions ?? loaded.dimensions);
        for (const entry of loaded.entries) collection.put(entry);
        collection.dirty = false;
        this.collections.set(language, collection);
        console.error(`[Index] Loaded '${language}' collection: ${collection.entries.size} entries.`);
      }
    }
    this.opened = true;
  }

  /** Flush pending writes and stop accepting operations. */
  public async close(): Promise<void> {
    if (!this.opened) return;
    await this.flush();
    this.opened = false;
  }

  public isOpen(): boolean {
    return this.opened;
  }

  public languages(): Language[] {
    this.ensureOpen();
    return [...this.collections.keys()].sort();
  }

  public count(language: Language): number {
    this.ensureOpen();
    return this.collections.get(language)?.entries.size ?? 0;
  }

  /** Chunk ids of a collection in insertion order. */
  public chunkIds(language: Language): string[] {
    this.ensureOpen();
    return [...(this.collections.get(language)?.entries.keys() ?? [])];
  }

  public getEntry(language: Language, chunkId: string): IndexEntry | undefined {
    this.ensureOpen();
    return this.collections.get(language)?.entries.get(chunkId);
  }

  /**
   * Insert or replace one entry in the live collection. Changes are held in
   * memory until {@link flush} (or {@link close}).
   */
  public async upsert(
    language: Language,
    chunkId: string,
    vector: Float32Array,
    input: UpsertInput,
  ): Promise<void> {
    this.ensureOpen();
    let collection = this.collections.get(language);
    if (!collection) {
      collection = new Collection(language, this.dimensions ?? null);
      this.collections.set(language, collection);
    }
    collection.put(EmbeddingIndex.toEntry(language, chunkId, vector, input));
  }

  /**
   * Check vectors against a language's dimensionality before writing them.
   * @throws {VectorDimensionError} on a mismatch.
   */
  public checkDimensions(language: Language, vectors: Float32Array[]): void {
    this.ensureOpen();
    const collection = this.collections.get(language) ?? new Collection(language, this.dimensions ?? null);
    collection.checkDimensions(vectors);
  }

  /** Remove every entry of one document (by source URI). Returns the number removed. */
  public async deleteSource(language: Language, sourceUri: string): Promise<number> {
    this.ensureOpen();
    const collection = this.collections.get(language);
    if (!collection) return 0;
    let removed = 0;
    for (const [id, entry] of collection.entries) {
      if (entry.metadata.sourceUri === sourceUri) {
        collection.entries.delete(id);
        removed++;
      }
    }
    if (removed > 0) collection.dirty = true;
    return removed;
  }

  /** Drop a whole language collection, in memory and on disk. */
  public async deleteCollection(language: Language): Promise<void> {
    this.ensureOpen();
    this.collections.delete(language);
    await this.persistence?.remove(language);
  }

  /**
   * Top-k cosine search within one language. Results have score >=
   * `scoreThreshold`, sorted by descending score; equal scores keep
   * insertion order.
   */
  public async query(
    language: Language,
    vector: Float32Array,
    k: number,
    scoreThreshold: number,
  ): Promise<RetrievalResult[]> {
    this.ensureOpen();
    const collection = this.collections.get(language);
    if (!collection || k <= 0) return [];
    if (collection.dimensions !== null && vector.length !== collection.dimensions) {
      throw new VectorDimensionError(language, collection.dimensions, vector.length);
    }

    const scored: RetrievalResult[] = [];
    for (const entry of collection.entries.values()) {
      const score = Embeddings.cosine(entry.vector, vector);
      if (score < scoreThreshold) continue;
      scored.push({
        chunkId: entry.chunkId,
        text: entry.text,
        sourceUri: entry.metadata.sourceUri,
        score,
      });
    }
    // Array.prototype.sort is stable, so ties stay in insertion order.
    scored.sort((a, b) => b.score - a.score);
    if (this.verbose) {
      console.error(`[Index][verbose] '${language}' query: ${scored.length} hits >= ${scoreThreshold}`);
    }
    return scored.slice(0, Math.floor(k));
  }

  /** Start a shadow rebuild of one language collection. */
  public beginRebuild(language: Language): CollectionBuild {
    this.ensureOpen();
    const shadow = new Collection(language, this.dimensions ?? null);
    let finished = false;

    return {
      language,
      upsert: (chunkId, vector, input) => {
        if (finished) throw new Error(`Rebuild of '${language}' already finished`);
        shadow.put(EmbeddingIndex.toEntry(language, chunkId, vector, input));
      },
      upsertAll: (entries) => {
        if (finished) throw new Error(`Rebuild of '${language}' already finished`);
        shadow.checkDimensions(entries.map((e) => e.vector));
        for (const { chunkId, vector, input } of entries) {
          shadow.put(EmbeddingIndex.toEntry(language, chunkId, vector, input));
        }
      },
      size: () => shadow.entries.size,
      commit: async () => {
        if (finished) throw new Error(`Rebuild of '${language}' already finished`);
        this.ensureOpen();
        await this.persistence?.save({
          language,
          dimensions: shadow.dimensions,
          entries: shadow.entries.values(),
        });
        shadow.dirty = false;
        finished = true;
        this.collections.set(language, shadow);
      },
      abort: () => {
        finished = true;
      },
    };
  }

  /** Persist every collection changed through {@link upsert} or {@link deleteSource}. */
  public async flush(): Promise<void> {
    this.ensureOpen();
    if (!this.persistence) return;
    for (const collection of this.collections.values()) {
      if (!collection.dirty) continue;
      await this.persistence.save({
        language: collection.language,
        dimensions: collection.dimensions,
        entries: collection.entries.values(),
      });
      collection.dirty = false;
    }
  }

  private ensureOpen(): void {
    if (!this.opened) throw new IndexUnavailableError("Embedding index is not open");
  }

  private static toEntry(
    language: Language,
    chunkId: string,
    vector: Float32Array,
    input: UpsertInput,
  ): IndexEntry {
    return { chunkId, vector, text: input.text, metadata: { ...input.metadata, language } };
  }
}
