import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { IndexUnavailableError, errorMessage } from "./errors";
import type { IndexEntry, Language } from "./types";

/**
 * On-disk layout of one language collection (`<storeDir>/<language>.json`).
 * Vectors are stored as base64-encoded little-endian float32.
 */
const StoredCollectionSchema = z.object({
  version: z.literal(1),
  meta: z.object({
    language: z.string(),
    modelName: z.string(),
    dimensions: z.number().int().nonnegative().nullable(),
    savedAt: z.string(),
    embEncoding: z.literal("f32-base64"),
  }),
  entries: z.array(
    z.object({
      chunkId: z.string(),
      documentId: z.string(),
      sourceUri: z.string(),
      ordinal: z.number().int().nonnegative(),
      text: z.string(),
      emb: z.string(),
    }),
  ),
});

export interface LoadedCollection {
  language: Language;
  dimensions: number | null;
  entries: IndexEntry[];
}

export interface SaveParams {
  language: Language;
  dimensions: number | null;
  entries: Iterable<IndexEntry>;
}

const COLLECTION_NAME = /^[a-z]{2,3}(-[a-z0-9]+)?$/i;

function encodeVector(v: Float32Array): string {
  return Buffer.from(v.buffer, v.byteOffset, v.byteLength).toString("base64");
}

function decodeVector(b64: string): Float32Array | null {
  const buf = Buffer.from(b64, "base64");
  if (buf.byteLength === 0 || buf.byteLength % 4 !== 0) return null;
  // Copy into a fresh, aligned buffer.
  return new Float32Array(new Uint8Array(buf).buffer);
}

/**
 * Load/save of language collections. Loads are tolerant: a missing,
 * corrupt or incompatible file (different embedding model) yields `null`
 * and the caller rebuilds. Saves must succeed or the index is unavailable.
 */
export class Persistence {
  private readonly storeDir: string;
  private readonly modelName: string;
  private readonly verbose: boolean;

  /**
   * @param storeDir  Directory holding one JSON file per language.
   * @param modelName Embedding model the vectors were produced with.
   */
  public constructor(storeDir: string, modelName: string, verbose = false) {
    this.storeDir = storeDir;
    this.modelName = modelName;
    this.verbose = verbose;
  }

  /** Languages that have a collection file on disk. */
  public async listLanguages(): Promise<Language[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.storeDir);
    } catch (e) {
      if (isNotFound(e)) return [];
      throw new IndexUnavailableError(`Cannot read index store ${this.storeDir}`, { cause: e });
    }
    return names
      .filter((n) => n.endsWith(".json"))
      .map((n) => n.slice(0, -".json".length))
      .filter((n) => COLLECTION_NAME.test(n))
      .sort();
  }

  public async load(language: Language): Promise<LoadedCollection | null> {
    const file = this.fileFor(language);
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (e) {
      if (isNotFound(e)) return null;
      throw new IndexUnavailableError(`Cannot read collection ${file}`, { cause: e });
    }

    let parsed: z.infer<typeof StoredCollectionSchema>;
    try {
      parsed = StoredCollectionSchema.parse(JSON.parse(raw));
    } catch (e) {
      console.error(`[Index] Ignoring unreadable collection ${file}: ${errorMessage(e)}`);
      return null;
    }
    if (parsed.meta.modelName !== this.modelName || parsed.meta.language !== language) {
      console.error(
        `[Index] Stored '${language}' collection was built with ${parsed.meta.modelName}; ignoring it.`,
      );
      return null;
    }

    const entries: IndexEntry[] = [];
    for (const e of parsed.entries) {
      const vector = decodeVector(e.emb);
      if (!vector) continue; // require embedding
      if (parsed.meta.dimensions !== null && vector.length !== parsed.meta.dimensions) continue;
      entries.push({
        chunkId: e.chunkId,
        vector,
        text: e.text,
        metadata: { documentId: e.documentId, sourceUri: e.sourceUri, language, ordinal: e.ordinal },
      });
    }
    if (this.verbose) console.error(`[Index][verbose] Loaded ${entries.length} entries from ${file}`);
    return { language, dimensions: parsed.meta.dimensions, entries };
  }

  /** Write a collection atomically (temp file + rename). */
  public async save(params: SaveParams): Promise<void> {
    const file = this.fileFor(params.language);
    const out = {
      version: 1,
      meta: {
        language: params.language,
        modelName: this.modelName,
        dimensions: params.dimensions,
        savedAt: new Date().toISOString(),
        embEncoding: "f32-base64",
      },
      entries: Array.from(params.entries, (e) => ({
        chunkId: e.chunkId,
        documentId: e.metadata.documentId,
        sourceUri: e.metadata.sourceUri,
        ordinal: e.metadata.ordinal,
        text: e.text,
        emb: encodeVector(e.vector),
      })),
    } satisfies z.input<typeof StoredCollectionSchema>;

    const tmp = `${file}.${process.pid}.tmp`;
    try {
      await fs.mkdir(this.storeDir, { recursive: true });
      await fs.writeFile(tmp, JSON.stringify(out));
      await fs.rename(tmp, file);
    } catch (e) {
      throw new IndexUnavailableError(`Failed to persist collection ${file}`, { cause: e });
    }
    if (this.verbose) console.error(`[Index][verbose] Persisted ${out.entries.length} entries to ${file}`);
  }

  public async remove(language: Language): Promise<void> {
    try {
      await fs.rm(this.fileFor(language), { force: true });
    } catch (e) {
      throw new IndexUnavailableError(`Failed to delete collection '${language}'`, { cause: e });
    }
  }

  private fileFor(language: Language): string {
    if (!COLLECTION_NAME.test(language)) {
      throw new IndexUnavailableError(`Invalid collection name '${language}'`);
    }
    return path.join(this.storeDir, `${language}.json`);
  }
}

function isNotFound(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}
