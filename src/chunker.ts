import type { Chunk, SourceDocument } from "./types";

export interface ChunkerOptions {
  /** Target maximum characters per chunk (default 2000). */
  chunkSize?: number;
  /** Characters of trailing context carried into the next chunk (default 400). */
  chunkOverlap?: number;
}

/** Split points tried in order: paragraph, line, sentence, word. Hard cut after that. */
export const DEFAULT_SEPARATORS: readonly string[] = ["\n\n", "\n", ". ", "? ", "! ", " "];

const HEADING = /^(#{1,3})\s+(.+?)\s*#*\s*$/;

interface MarkdownSection {
  /** "h1 > h2 > h3" breadcrumb, undefined for text before the first heading. */
  path?: string;
  body: string;
}

/**
 * Deterministic text splitter. Windows are built from natural-boundary pieces
 * so a chunk only breaks mid-word when a single word is longer than the
 * window. Identical input always yields identical chunks and ordinals.
 */
export class Chunker {
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;

  public constructor(opts: ChunkerOptions = {}) {
    this.chunkSize = Math.max(1, opts.chunkSize ?? 2000);
    let overlap = Math.max(0, opts.chunkOverlap ?? 400);
    // Overlap must stay below the window size for forward progress.
    if (overlap >= this.chunkSize) {
      const fallback = Math.floor(this.chunkSize * 0.15);
      console.error(
        `[Chunker] chunkOverlap (=${overlap}) >= chunkSize (=${this.chunkSize}). Using fallback overlap ${fallback}.`,
      );
      overlap = fallback;
    }
    this.chunkOverlap = overlap;
  }

  public getChunkSize(): number {
    return this.chunkSize;
  }

  public getChunkOverlap(): number {
    return this.chunkOverlap;
  }

  /**
   * Split a document into chunks with contiguous ordinals starting at 0.
   * Markdown is split by h1-h3 sections first and each chunk carries its
   * heading breadcrumb; an empty document yields no chunks.
   */
  public split(doc: SourceDocument): Chunk[] {
    if (!doc.rawText.trim()) return [];

    const pieces: { text: string; sectionPath?: string }[] = [];
    if (doc.format === "markdown") {
      for (const section of Chunker.splitMarkdownSections(doc.rawText)) {
        for (const leaf of Chunker.splitText(section.body, this.chunkSize, this.chunkOverlap)) {
          pieces.push({
            text: section.path ? `[${section.path}]\n\n${leaf}` : leaf,
            sectionPath: section.path,
          });
        }
      }
    }
    if (pieces.length === 0) {
      for (const leaf of Chunker.splitText(doc.rawText, this.chunkSize, this.chunkOverlap)) {
        pieces.push({ text: leaf });
      }
    }

    return pieces.map((p, ordinal) => ({
      id: `${doc.id}#${ordinal}`,
      documentId: doc.id,
      text: p.text,
      ordinal,
      language: doc.language,
      ...(p.sectionPath ? { sectionPath: p.sectionPath } : {}),
    }));
  }

  /**
   * Split text into overlapping windows of at most `size` characters
   * (after trimming). Whitespace-only windows are dropped.
   */
  public static splitText(
    text: string,
    size: number,
    overlap: number,
    separators: readonly string[] = DEFAULT_SEPARATORS,
  ): string[] {
    const pieces = Chunker.splitRecursive(text, size, separators);
    const out: string[] = [];
    let window: string[] = [];
    let length = 0;

    for (const piece of pieces) {
      if (length + piece.length > size && window.length > 0) {
        const chunk = window.join("").trim();
        if (chunk) out.push(chunk);
        // Keep the trailing pieces as overlap, as long as the next piece still fits.
        while (window.length > 0 && (length > overlap || length + piece.length > size)) {
          length -= window[0].length;
          window.shift();
        }
      }
      window.push(piece);
      length += piece.length;
    }
    const last = window.join("").trim();
    if (last) out.push(last);
    return out;
  }

  /**
   * Break text into pieces no longer than `size`, trying each separator in
   * turn. Separators stay attached to the preceding piece so that the
   * pieces concatenate back to the input.
   */
  private static splitRecursive(
    text: string,
    size: number,
    separators: readonly string[],
  ): string[] {
    if (text.length <= size) return text ? [text] : [];
    const [sep, ...rest] = separators;
    if (sep === undefined) {
      const out: string[] = [];
      for (let i = 0; i < text.length; i += size) out.push(text.slice(i, i + size));
      return out;
    }
    const parts = splitKeepingSeparator(text, sep);
    if (parts.length === 1) return Chunker.splitRecursive(text, size, rest);
    return parts.flatMap((part) =>
      part.length <= size ? [part] : Chunker.splitRecursive(part, size, rest),
    );
  }

  /**
   * Split markdown into sections at h1-h3 headings. Heading lines are removed
   * from the body and recorded as the section path.
   */
  public static splitMarkdownSections(text: string): MarkdownSection[] {
    const sections: MarkdownSection[] = [];
    const headings: string[] = [];
    let body: string[] = [];
    let currentPath: string | undefined;
    let inFence = false;

    const flush = () => {
      const joined = body.join("\n").trim();
      if (joined) sections.push({ path: currentPath, body: joined });
      body = [];
    };

    for (const line of text.split(/\r?\n/)) {
      if (/^\s*(```|~~~)/.test(line)) inFence = !inFence;
      const match = inFence ? null : HEADING.exec(line);
      if (!match) {
        body.push(line);
        continue;
      }
      flush();
      const level = match[1].length;
      headings.length = level - 1;
      headings[level - 1] = match[2];
      currentPath = headings.filter(Boolean).join(" > ");
    }
    flush();
    return sections;
  }
}

function splitKeepingSeparator(text: string, sep: string): string[] {
  const out: string[] = [];
  let start = 0;
  let idx = text.indexOf(sep, start);
  while (idx !== -1) {
    out.push(text.slice(start, idx + sep.length));
    start = idx + sep.length;
    idx = text.indexOf(sep, start);
  }
  if (start < text.length) out.push(text.slice(start));
  return out;
}
