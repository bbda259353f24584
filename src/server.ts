import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { APP_VERSION } from "./config";
import {
  GenerationUnavailableError,
  IndexUnavailableError,
  IngestionError,
  ProviderError,
  UnsupportedFormatError,
  UnsupportedLanguageError,
  errorMessage,
} from "./errors";
import type { IngestionPipeline } from "./ingestion";
import type { RagPipeline } from "./rag-pipeline";
import type { StatusManager } from "./status";

/** Long-lived components shared by every MCP session. */
export interface ToolDeps {
  rag: RagPipeline;
  ingestion: IngestionPipeline;
  status: StatusManager;
  /** Languages with a collection, listed in tool descriptions. */
  languages: string[];
}

const AskArgs = z.object({
  question: z.string().trim().min(1, "question must not be empty"),
  session_id: z.string().trim().min(1, "session_id must not be empty"),
  language: z.string().trim().min(1).optional(),
});

const AddDocumentArgs = z.object({
  url: z.string().url(),
  language: z.string().trim().min(1).optional(),
});

const NoArgs = z.object({});

export const UNAVAILABLE_MESSAGE =
  "The answering service is temporarily unavailable. Please try again in a moment.";

export function listTools(languages: string[]): Tool[] {
  const languageProp = {
    type: "string",
    description: `Language code (${languages.join(", ")}). Detected from the text when omitted.`,
  };
  return [
    {
      name: "ask",
      description:
        "Answer a question from the knowledge base. Follow-up questions in the same session are resolved against the conversation so far. Returns the answer, the source documents used and whether any context was found.",
      inputSchema: {
        type: "object",
        properties: {
          question: { type: "string", description: "The user's question." },
          session_id: {
            type: "string",
            description: "Conversation id; reuse it for follow-up questions.",
          },
          language: languageProp,
        },
        required: ["question", "session_id"],
      },
    },
    {
      name: "ingest",
      description:
        "Reload every configured document source and rebuild the affected language collections.",
      inputSchema: { type: "object", properties: {} },
    },
    {
      name: "add_document",
      description:
        "Fetch one document (Markdown, text or PDF) by URL and add it to the knowledge base, replacing an earlier copy of the same URL.",
      inputSchema: {
        type: "object",
        properties: {
          url: { type: "string", description: "Absolute http(s) URL of the document." },
          language: languageProp,
        },
        required: ["url"],
      },
    },
    {
      name: "status",
      description: "Server, indexing and provider status.",
      inputSchema: { type: "object", properties: {} },
    },
  ];
}

function jsonResult(value: unknown): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] };
}

function errorResult(message: string): CallToolResult {
  return { content: [{ type: "text", text: message }], isError: true };
}

function parseArgs<T>(schema: z.ZodType<T>, args: unknown): T {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new McpError(ErrorCode.InvalidParams, `Invalid arguments: ${detail}`);
  }
  return parsed.data;
}

/**
 * Map domain failures onto the tool surface: caller mistakes become
 * InvalidParams, exhausted providers and bad documents become error results
 * the client can show, and an unavailable index is an internal error.
 */
function toToolFailure(e: unknown): CallToolResult {
  if (e instanceof McpError) throw e;
  if (e instanceof UnsupportedLanguageError) throw new McpError(ErrorCode.InvalidParams, e.message);
  if (e instanceof IndexUnavailableError) {
    throw new McpError(ErrorCode.InternalError, `Knowledge base unavailable: ${e.message}`);
  }
  if (e instanceof GenerationUnavailableError || e instanceof ProviderError) {
    return errorResult(UNAVAILABLE_MESSAGE);
  }
  if (e instanceof IngestionError || e instanceof UnsupportedFormatError) {
    return errorResult(e.message);
  }
  throw new McpError(ErrorCode.InternalError, errorMessage(e));
}

/** Execute one tool call. */
export async function callTool(deps: ToolDeps, name: string, args: unknown): Promise<CallToolResult> {
  try {
    switch (name) {
      case "ask": {
        const { question, session_id, language } = parseArgs(AskArgs, args);
        const result = await deps.rag.answer(session_id, question, language);
        return jsonResult({
          answer: result.answer,
          sources: result.sources,
          grounded: result.grounded,
          language: result.language,
        });
      }
      case "ingest": {
        parseArgs(NoArgs, args);
        return jsonResult(await deps.ingestion.ingestAll());
      }
      case "add_document": {
        const { url, language } = parseArgs(AddDocumentArgs, args);
        return jsonResult(await deps.ingestion.addFromUrl(url, language));
      }
      case "status": {
        parseArgs(NoArgs, args);
        return jsonResult(deps.status.getStatus());
      }
      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
  } catch (e) {
    return toToolFailure(e);
  }
}

/**
 * Build a fresh, unconnected MCP server. One is created per transport
 * session; the pipelines in `deps` are shared.
 */
export function createServer(deps: ToolDeps): Server {
  const server = new Server(
    { name: "kb-rag-server", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: listTools(deps.languages),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (req) =>
    callTool(deps, req.params.name, req.params.arguments),
  );

  return server;
}
