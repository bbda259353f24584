import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { z } from "zod";
import { errorMessage } from "./errors";
import { isSupportedExtension } from "./parsers";
import type { Language } from "./types";

export interface LoadedBytes {
  bytes: Buffer;
  /** Content-Type header for remote documents. */
  contentType?: string;
}

/** One listed document; bytes are fetched lazily through {@link load}. */
export interface SourceFile {
  /** Path relative to the docs directory, or an absolute URL. */
  readonly uri: string;
  /** Language declared by the listing, if any. */
  readonly language?: Language;
  load(): Promise<LoadedBytes>;
}

export interface DocumentSource {
  readonly name: string;
  list(): Promise<SourceFile[]>;
}

export interface LocalSourceOptions {
  root: string;
  /** Extensions without leading dot. */
  allowedExt: string[];
  /** Folder names pruned anywhere in the tree. */
  excludedFolders?: string[];
}

/** Documents under a local directory, in a stable (sorted) order. */
export class LocalDocumentSource implements DocumentSource {
  public readonly name = "local";
  private readonly root: string;
  private readonly allowedExt: string[];
  private readonly excludedFolders: string[];

  public constructor(opts: LocalSourceOptions) {
    this.root = path.resolve(opts.root);
    this.allowedExt = opts.allowedExt;
    this.excludedFolders = opts.excludedFolders ?? [];
  }

  public async list(): Promise<SourceFile[]> {
    try {
      const st = await fs.stat(this.root);
      if (!st.isDirectory()) {
        console.error(`[Ingest] ${this.root} is not a directory; no local documents.`);
        return [];
      }
    } catch {
      console.error(`[Ingest] ${this.root} does not exist; no local documents.`);
      return [];
    }

    const patterns = this.allowedExt.map((ext) => `**/*.${ext}`);
    const files = await fg(patterns, {
      cwd: this.root,
      dot: false,
      onlyFiles: true,
      caseSensitiveMatch: false,
      ignore: this.excludedFolders.map((f) => `**/${f}/**`),
    });
    return files
      .map((rel) => rel.split(path.sep).join("/"))
      .filter(isSupportedExtension)
      .sort()
      .map((rel) => ({
        uri: rel,
        load: async () => ({ bytes: await fs.readFile(path.join(this.root, rel)) }),
      }));
  }
}

const RemoteListingSchema = z.object({
  files: z.array(
    z.union([z.string(), z.object({ uri: z.string(), language: z.string().optional() })]),
  ),
});

export interface RemoteSourceOptions {
  /** Endpoint returning `{ files: (string | { uri, language? })[] }`. */
  listUrl: string;
  /** Base URL relative file names resolve against (defaults to the listing URL). */
  baseUrl?: string;
  timeoutMs?: number;
}

/** Fetch a remote document, failing on non-2xx responses. */
export async function fetchDocument(url: string, timeoutMs = 10000): Promise<LoadedBytes> {
  const res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
  if (!res.ok) throw new Error(`GET ${url} failed with ${res.status} ${res.statusText}`);
  const contentType = res.headers.get("content-type") ?? undefined;
  return { bytes: Buffer.from(await res.arrayBuffer()), contentType };
}

/** A single URL as a {@link SourceFile}. */
export function remoteFile(url: string, language?: Language, timeoutMs?: number): SourceFile {
  return { uri: url, language, load: () => fetchDocument(url, timeoutMs) };
}

/** Documents advertised by a remote listing endpoint (e.g. an object-store index). */
export class RemoteDocumentSource implements DocumentSource {
  public readonly name = "remote";
  private readonly listUrl: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  public constructor(opts: RemoteSourceOptions) {
    this.listUrl = opts.listUrl;
    this.baseUrl = opts.baseUrl ?? opts.listUrl;
    this.timeoutMs = opts.timeoutMs ?? 10000;
  }

  public async list(): Promise<SourceFile[]> {
    const res = await fetch(this.listUrl, { signal: AbortSignal.timeout(this.timeoutMs) });
    if (!res.ok) {
      throw new Error(`Listing ${this.listUrl} failed with ${res.status} ${res.statusText}`);
    }
    let listing: z.infer<typeof RemoteListingSchema>;
    try {
      listing = RemoteListingSchema.parse(await res.json());
    } catch (e) {
      throw new Error(`Listing ${this.listUrl} returned an unexpected body: ${errorMessage(e)}`, {
        cause: e,
      });
    }
    return listing.files.map((item) => {
      const { uri, language } = typeof item === "string" ? { uri: item, language: undefined } : item;
      const url = new URL(uri, this.baseUrl.endsWith("/") ? this.baseUrl : `${this.baseUrl}/`);
      return remoteFile(url.toString(), language, this.timeoutMs);
    });
  }
}
