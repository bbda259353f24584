/**
 * Application entry point.
 *
 * 1. Load configuration (.env + environment).
 * 2. Build the Gemini embedding and chat providers.
 * 3. Open the embedding index (reloading INDEX_STORE_PATH when set).
 * 4. Ingest every configured document source, blocking until done.
 * 5. Serve the MCP tools over stdio (default) or streamable HTTP
 *    (MCP_TRANSPORT=http|streamable-http), where /health exposes status.
 *
 * Exposed tools: ask, ingest, add_document, status (see ./server).
 */
import { getConfig, type Config } from "./config";
import { Chunker } from "./chunker";
import { Embeddings } from "./embeddings";
import { ConfigError } from "./errors";
import { IngestionPipeline } from "./ingestion";
import { LanguageRouter } from "./language";
import { ChatModel } from "./llm";
import { Persistence } from "./persistence";
import { RagPipeline } from "./rag-pipeline";
import { createServer, type ToolDeps } from "./server";
import { SessionMemory } from "./session-memory";
import { LocalDocumentSource, RemoteDocumentSource, type DocumentSource } from "./sources";
import { StatusManager } from "./status";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";
import { EmbeddingIndex } from "./vector-index";

const config: Config = getConfig();
const {
  DOCS_DIR,
  VERBOSE,
  GOOGLE_API_KEY,
  INDEX_STORE_PATH,
  MCP_TRANSPORT,
  RETRY_MAX_ATTEMPTS,
  RETRY_BASE_DELAY_MS,
  RETRY_MAX_DELAY_MS,
} = config;

if (!GOOGLE_API_KEY) throw new ConfigError("GOOGLE_API_KEY is required");

const status = new StatusManager();
status.setDocsDir(DOCS_DIR);

const embeddings = new Embeddings({
  apiKey: GOOGLE_API_KEY,
  modelName: config.EMBEDDING_MODEL,
  timeoutMs: config.REQUEST_TIMEOUT_MS,
  batchSize: config.EMBED_BATCH_SIZE,
});
const llm = new ChatModel({
  apiKey: GOOGLE_API_KEY,
  modelName: config.LLM_MODEL,
  temperature: config.TEMPERATURE,
  timeoutMs: config.REQUEST_TIMEOUT_MS,
});
status.setModels(embeddings.getModelName(), llm.getModelName());

const index = new EmbeddingIndex({
  persistence: INDEX_STORE_PATH
    ? new Persistence(INDEX_STORE_PATH, embeddings.getModelName(), VERBOSE)
    : undefined,
  dimensions: config.EMBEDDING_DIMENSIONS,
  verbose: VERBOSE,
});
await index.open();

const router = new LanguageRouter({
  supported: config.LANGUAGES,
  fallback: config.DEFAULT_LANGUAGE,
  minConfidence: config.LANGUAGE_MIN_CONFIDENCE,
});
const retry = {
  maxAttempts: RETRY_MAX_ATTEMPTS,
  baseDelayMs: RETRY_BASE_DELAY_MS,
  maxDelayMs: RETRY_MAX_DELAY_MS,
};

const sources: DocumentSource[] = [
  new LocalDocumentSource({
    root: DOCS_DIR,
    allowedExt: config.ALLOWED_EXT,
    excludedFolders: config.EXCLUDED_FOLDERS,
  }),
];
if (config.REMOTE_LIST_URL) {
  sources.push(
    new RemoteDocumentSource({
      listUrl: config.REMOTE_LIST_URL,
      baseUrl: config.REMOTE_BASE_URL,
      timeoutMs: config.REQUEST_TIMEOUT_MS,
    }),
  );
}

const ingestion = new IngestionPipeline({
  sources,
  index,
  embeddings,
  chunker: new Chunker({ chunkSize: config.CHUNK_SIZE, chunkOverlap: config.CHUNK_OVERLAP }),
  router,
  batchSize: config.EMBED_BATCH_SIZE,
  retry,
  status,
  verbose: VERBOSE,
});

const rag = new RagPipeline({
  index,
  embeddings,
  llm,
  memory: new SessionMemory({
    maxTurns: config.SESSION_MAX_TURNS,
    maxChars: config.SESSION_MAX_CHARS,
  }),
  router,
  topK: config.TOP_K,
  scoreThreshold: config.SCORE_THRESHOLD,
  contextBudget: config.CONTEXT_BUDGET,
  retry,
  assistantName: config.ASSISTANT_NAME,
  status,
  verbose: VERBOSE,
});

const deps: ToolDeps = { rag, ingestion, status, languages: router.supported() };

// Traffic is accepted only once the startup ingestion has committed.
await ingestion.ingestAll();

const useHttp = MCP_TRANSPORT === "http" || MCP_TRANSPORT === "streamable-http";
let stopTransport: () => Promise<void>;

if (useHttp) {
  status.markTransport("http");
  const httpServer = await startHttpTransport(() => createServer(deps), {
    port: config.MCP_PORT,
    host: config.HOST,
    allowedHosts: config.ALLOWED_HOSTS,
    enableDnsRebindingProtection: config.ENABLE_DNS_REBINDING_PROTECTION,
    status,
  });
  stopTransport = () =>
    new Promise<void>((resolve, reject) => httpServer.close((e) => (e ? reject(e) : resolve())));
} else {
  status.markTransport("stdio");
  const server = await startStdioTransport(() => createServer(deps));
  stopTransport = () => server.close();
}

let shuttingDown = false;
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.error(`[MCP] ${signal} received; shutting down.`);
  try {
    await stopTransport();
    await index.close();
    process.exit(0);
  } catch (e) {
    console.error("[MCP] Shutdown failed:", e);
    process.exit(1);
  }
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));
