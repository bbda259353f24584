/**
 * Format detection and text extraction.
 *
 * Each {@link DocumentFormat} has exactly one parser, looked up by tag. The
 * PDF parser loads pdf-parse on first use so that text-only knowledge bases
 * never pay for the PDF engine.
 */
import path from "node:path";
import { UnsupportedFormatError } from "./errors";
import type { DocumentFormat } from "./types";

export interface DocumentParser {
  readonly format: DocumentFormat;
  parse(bytes: Buffer): Promise<string>;
}

const EXTENSION_FORMATS: Record<string, DocumentFormat> = {
  ".md": "markdown",
  ".markdown": "markdown",
  ".txt": "plain-text",
  ".text": "plain-text",
  ".pdf": "pdf",
};

const CONTENT_TYPE_FORMATS: Record<string, DocumentFormat> = {
  "text/markdown": "markdown",
  "text/x-markdown": "markdown",
  "text/plain": "plain-text",
  "application/pdf": "pdf",
};

function decodeText(bytes: Buffer): string {
  // Strip a UTF-8 BOM and normalise line endings.
  return bytes.toString("utf8").replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
}

const textParser = (format: DocumentFormat): DocumentParser => ({
  format,
  parse: async (bytes) => decodeText(bytes),
});

const pdfParser: DocumentParser = {
  format: "pdf",
  async parse(bytes) {
    const { PDFParse } = await import("pdf-parse");
    const parser = new PDFParse({ data: new Uint8Array(bytes) });
    try {
      const textResult = await parser.getText();
      return (textResult.text || "").replace(/\r\n?/g, "\n");
    } finally {
      await parser.destroy();
    }
  },
};

const PARSERS: Record<DocumentFormat, DocumentParser> = {
  markdown: textParser("markdown"),
  "plain-text": textParser("plain-text"),
  pdf: pdfParser,
};

function decodePath(pathname: string): string {
  try {
    return decodeURIComponent(pathname);
  } catch {
    // Malformed escape such as a bare "%": keep the path as written.
    return pathname;
  }
}

/**
 * The file extension of a path or URL, lowercased. URLs lose their query
 * string and fragment and have their path decoded; local paths are taken
 * as they are.
 */
export function extensionOf(uri: string): string {
  const pathname = /^https?:\/\//i.test(uri) ? decodePath(new URL(uri).pathname) : uri;
  return path.extname(pathname).toLowerCase();
}

/**
 * Resolve the format from the extension, falling back to the HTTP content
 * type when the name carries none.
 * @throws {UnsupportedFormatError} when neither identifies a supported format.
 */
export function resolveFormat(uri: string, contentType?: string): DocumentFormat {
  const ext = extensionOf(uri);
  if (ext) {
    const byExt = EXTENSION_FORMATS[ext];
    if (byExt) return byExt;
    throw new UnsupportedFormatError(uri, `extension ${ext}`);
  }
  const mime = contentType?.split(";")[0].trim().toLowerCase();
  const byType = mime ? CONTENT_TYPE_FORMATS[mime] : undefined;
  if (byType) return byType;
  throw new UnsupportedFormatError(uri, mime ? `content type ${mime}` : "no extension");
}

export function isSupportedExtension(uri: string): boolean {
  return extensionOf(uri) in EXTENSION_FORMATS;
}

export async function parseDocument(bytes: Buffer, format: DocumentFormat): Promise<string> {
  return PARSERS[format].parse(bytes);
}
