import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigError } from "./errors";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Centralized single dotenv.config() call.
// Prefer the project-root .env next to package.json; otherwise use dotenv's default lookup.
(() => {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const rootEnv = path.resolve(path.dirname(__filename), "../.env");
    if (fsSync.existsSync(rootEnv)) {
      dotenv.config({ path: rootEnv });
      return;
    }
  } catch (e) {
    console.error("[Config] Could not resolve project .env, using default lookup:", e);
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export interface Config {
  DOCS_DIR: string;
  ALLOWED_EXT: string[];
  EXCLUDED_FOLDERS: string[];
  REMOTE_LIST_URL: string | undefined;
  REMOTE_BASE_URL: string | undefined;
  VERBOSE: boolean;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  INDEX_STORE_PATH: string | undefined;
  EMBEDDING_DIMENSIONS: number | undefined;
  LANGUAGES: string[];
  DEFAULT_LANGUAGE: string;
  LANGUAGE_MIN_CONFIDENCE: number;
  GOOGLE_API_KEY: string | undefined;
  EMBEDDING_MODEL: string;
  LLM_MODEL: string;
  TEMPERATURE: number;
  REQUEST_TIMEOUT_MS: number;
  EMBED_BATCH_SIZE: number;
  TOP_K: number;
  SCORE_THRESHOLD: number;
  CONTEXT_BUDGET: number;
  SESSION_MAX_TURNS: number;
  SESSION_MAX_CHARS: number | undefined;
  RETRY_MAX_ATTEMPTS: number;
  RETRY_BASE_DELAY_MS: number;
  RETRY_MAX_DELAY_MS: number;
  ASSISTANT_NAME: string;
  MCP_TRANSPORT: string;
  MCP_PORT: number;
  HOST: string;
  ALLOWED_HOSTS: string[] | undefined;
  ENABLE_DNS_REBINDING_PROTECTION: boolean;
}

function list(raw: string | undefined, fallback: string[]): string[] {
  const items = raw
    ?.split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return items && items.length > 0 ? items : fallback;
}

/** Positive integer, clamped to `max`; anything unparsable yields the default. */
function int(raw: string | undefined, fallback: number, min: number, max: number): number {
  const v = raw?.trim();
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n >= min ? Math.min(max, Math.floor(n)) : fallback;
}

function float(raw: string | undefined, fallback: number, min: number, max: number): number {
  const v = raw?.trim();
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n >= min && n <= max ? n : fallback;
}

function flag(raw: string | undefined): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  // Knowledge base directory; files are routed to a language by name prefix (en_cv.md).
  const DOCS_DIR = path.resolve(env.DOCS_DIR?.trim() || "data");

  const ALLOWED_EXT = list(env.ALLOWED_EXT, ["md", "markdown", "txt", "pdf"]).map((e) =>
    e.replace(/^\./, "").toLowerCase(),
  );

  // Folder names (not globs) pruned during directory traversal.
  const EXCLUDED_FOLDERS = list(env.EXCLUDED_FOLDERS, ["node_modules", ".git", ".cache"]);

  // Optional remote listing endpoint returning { files: [...] } and the base URL files resolve against.
  const REMOTE_LIST_URL = env.REMOTE_LIST_URL?.trim() || undefined;
  const REMOTE_BASE_URL = env.REMOTE_BASE_URL?.trim() || undefined;

  // Character-based windows; ~4 chars per token puts the defaults near 500/100 tokens.
  const CHUNK_SIZE = int(env.CHUNK_SIZE, 2000, 1, 16000);
  const CHUNK_OVERLAP = int(env.CHUNK_OVERLAP, 400, 0, 8000);

  const INDEX_STORE_PATH = env.INDEX_STORE_PATH?.trim() || undefined;
  const EMBEDDING_DIMENSIONS = env.EMBEDDING_DIMENSIONS?.trim()
    ? int(env.EMBEDDING_DIMENSIONS, 0, 1, 8192) || undefined
    : undefined;

  const LANGUAGES = list(env.LANGUAGES, ["en", "es"]).map((l) => l.toLowerCase());
  const DEFAULT_LANGUAGE = (env.DEFAULT_LANGUAGE?.trim() || LANGUAGES[0]).toLowerCase();
  if (!LANGUAGES.includes(DEFAULT_LANGUAGE)) {
    throw new ConfigError(
      `DEFAULT_LANGUAGE '${DEFAULT_LANGUAGE}' must be one of LANGUAGES (${LANGUAGES.join(", ")})`,
    );
  }
  const LANGUAGE_MIN_CONFIDENCE = float(env.LANGUAGE_MIN_CONFIDENCE, 0.6, 0, 1);

  const CONTEXT_BUDGET = int(env.CONTEXT_BUDGET, 6000, 100, 200000);
  const SESSION_MAX_CHARS = env.SESSION_MAX_CHARS?.trim()
    ? int(env.SESSION_MAX_CHARS, 6000, 0, 1000000) || undefined
    : 6000;

  return {
    DOCS_DIR,
    ALLOWED_EXT,
    EXCLUDED_FOLDERS,
    REMOTE_LIST_URL,
    REMOTE_BASE_URL,
    VERBOSE: flag(env.VERBOSE),
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    INDEX_STORE_PATH,
    EMBEDDING_DIMENSIONS,
    LANGUAGES,
    DEFAULT_LANGUAGE,
    LANGUAGE_MIN_CONFIDENCE,
    GOOGLE_API_KEY: env.GOOGLE_API_KEY?.trim() || undefined,
    EMBEDDING_MODEL: env.EMBEDDING_MODEL?.trim() || "text-embedding-004",
    LLM_MODEL: env.LLM_MODEL?.trim() || "gemini-2.0-flash",
    TEMPERATURE: float(env.TEMPERATURE, 0.5, 0, 2),
    REQUEST_TIMEOUT_MS: int(env.REQUEST_TIMEOUT_MS, 30000, 1000, 600000),
    // Gemini caps batchEmbedContents at 100 requests.
    EMBED_BATCH_SIZE: int(env.EMBED_BATCH_SIZE, 32, 1, 100),
    TOP_K: int(env.TOP_K, 4, 1, 50),
    SCORE_THRESHOLD: float(env.SCORE_THRESHOLD, 0.3, -1, 1),
    CONTEXT_BUDGET,
    SESSION_MAX_TURNS: int(env.SESSION_MAX_TURNS, 10, 1, 1000),
    SESSION_MAX_CHARS,
    RETRY_MAX_ATTEMPTS: int(env.RETRY_MAX_ATTEMPTS, 3, 1, 10),
    RETRY_BASE_DELAY_MS: int(env.RETRY_BASE_DELAY_MS, 500, 0, 60000),
    RETRY_MAX_DELAY_MS: int(env.RETRY_MAX_DELAY_MS, 8000, 0, 300000),
    ASSISTANT_NAME: env.ASSISTANT_NAME?.trim() || "the author",
    // 'stdio' (default) or 'http'/'streamable-http'.
    MCP_TRANSPORT: (env.MCP_TRANSPORT ?? "").trim().toLowerCase(),
    MCP_PORT: int(env.MCP_PORT, 3000, 1, 65535),
    HOST: env.HOST?.trim() || "127.0.0.1",
    // Explicit host[:port] allow-list; unset means local-only defaults.
    ALLOWED_HOSTS: env.ALLOWED_HOSTS?.trim() ? list(env.ALLOWED_HOSTS, []) : undefined,
    ENABLE_DNS_REBINDING_PROTECTION: (env.ENABLE_DNS_REBINDING_PROTECTION ?? "true").trim() !== "false",
  };
}
