/** ISO 639-1 language code ("en", "es", ...). One index collection exists per language. */
export type Language = string;

/** Document formats the ingestion pipeline can parse. */
export type DocumentFormat = "pdf" | "plain-text" | "markdown";

/**
 * A parsed source document. Identity is the content hash, so re-ingesting an
 * unchanged file yields the same id (and therefore the same chunk ids).
 */
export interface SourceDocument {
  /** Equal to {@link contentHash}. */
  readonly id: string;
  /** Path relative to the docs directory, or absolute URL for remote documents. */
  readonly sourceUri: string;
  readonly language: Language;
  readonly format: DocumentFormat;
  readonly rawText: string;
  /** `sha256:` + 64 hex chars over the parsed text. */
  readonly contentHash: string;
}

/** A bounded passage of a document, the retrieval unit. */
export interface Chunk {
  /** `<documentId>#<ordinal>` */
  readonly id: string;
  readonly documentId: string;
  readonly text: string;
  /** 0-based position within the document; contiguous. */
  readonly ordinal: number;
  readonly language: Language;
  /** Markdown heading breadcrumb ("Experience > 2020"), when the chunk came from a section. */
  readonly sectionPath?: string;
}

/** Metadata persisted next to every vector. */
export interface IndexEntryMetadata {
  readonly documentId: string;
  readonly sourceUri: string;
  readonly language: Language;
  readonly ordinal: number;
}

/** A persisted (chunk, vector) pair inside one language collection. */
export interface IndexEntry {
  readonly chunkId: string;
  readonly vector: Float32Array;
  readonly text: string;
  readonly metadata: IndexEntryMetadata;
}

/** Ephemeral per-query hit. */
export interface RetrievalResult {
  readonly chunkId: string;
  readonly text: string;
  readonly sourceUri: string;
  /** Cosine similarity in [-1, 1]. */
  readonly score: number;
}

export type TurnRole = "user" | "assistant";

export interface Turn {
  readonly role: TurnRole;
  readonly text: string;
  /** ISO timestamp of when the turn was appended. */
  readonly timestamp: string;
}

export interface Session {
  readonly sessionId: string;
  readonly createdAt: string;
  turns: Turn[];
}
