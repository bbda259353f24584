import { describe, it, expect, beforeEach } from "vitest";
import { ErrorCode, McpError, type CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { Chunker } from "../../src/chunker";
import { IngestionPipeline } from "../../src/ingestion";
import { LanguageRouter } from "../../src/language";
import { RagPipeline } from "../../src/rag-pipeline";
import { UNAVAILABLE_MESSAGE, callTool, listTools, type ToolDeps } from "../../src/server";
import { SessionMemory } from "../../src/session-memory";
import { StatusManager } from "../../src/status";
import { EmbeddingIndex } from "../../src/vector-index";
import { MemorySource, NO_DELAY, ScriptedLlm, TopicEmbeddings } from "../helpers/fakes";

function textOf(result: CallToolResult): string {
  const [first] = result.content;
  return first?.type === "text" ? first.text : "";
}

async function expectMcpError(promise: Promise<unknown>, code: ErrorCode): Promise<void> {
  const error = await promise.then(
    () => undefined,
    (e: unknown) => e,
  );
  expect(error).toBeInstanceOf(McpError);
  expect(error).toMatchObject({ code });
}

describe("MCP tools", () => {
  let deps: ToolDeps;
  let index: EmbeddingIndex;
  let llm: ScriptedLlm;

  beforeEach(async () => {
    index = new EmbeddingIndex();
    await index.open();
    const embeddings = new TopicEmbeddings({ skills: ["skills", "languages", "go", "rust"] });
    llm = new ScriptedLlm(() => "I mostly write Go and Rust.");
    const router = new LanguageRouter({ supported: ["en", "es"], fallback: "en", minConfidence: 0.6 });
    const status = new StatusManager();
    const ingestion = new IngestionPipeline({
      sources: [new MemorySource({ "en_skills.txt": "Skills: Go, Rust, distributed systems." })],
      index,
      embeddings,
      chunker: new Chunker(),
      router,
      retry: NO_DELAY,
      status,
    });
    const rag = new RagPipeline({
      index,
      embeddings,
      llm,
      memory: new SessionMemory(),
      router,
      retry: NO_DELAY,
      status,
    });
    deps = { rag, ingestion, status, languages: router.supported() };
    await ingestion.ingestAll();
  });

  it("should list the four tools", () => {
    const tools = listTools(["en", "es"]);
    expect(tools.map((t) => t.name)).toEqual(["ask", "ingest", "add_document", "status"]);
    expect(tools[0].inputSchema.required).toEqual(["question", "session_id"]);
  });

  it("ask should return the answer with its sources", async () => {
    const result = await callTool(deps, "ask", {
      question: "What languages does he know?",
      session_id: "s1",
      language: "en",
    });

    expect(result.isError).toBeUndefined();
    expect(JSON.parse(textOf(result))).toEqual({
      answer: "I mostly write Go and Rust.",
      sources: ["en_skills.txt"],
      grounded: true,
      language: "en",
    });
  });

  it("ask should reject invalid arguments with InvalidParams", async () => {
    await expectMcpError(callTool(deps, "ask", { question: "  ", session_id: "s1" }), ErrorCode.InvalidParams);
    await expectMcpError(callTool(deps, "ask", { question: "Hi" }), ErrorCode.InvalidParams);
    await expectMcpError(
      callTool(deps, "ask", { question: "Hi", session_id: "s1", language: "fr" }),
      ErrorCode.InvalidParams,
    );
  });

  it("ask should report temporary unavailability when generation is exhausted", async () => {
    llm.failNext(3);
    const result = await callTool(deps, "ask", { question: "What languages?", session_id: "s1" });
    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe(UNAVAILABLE_MESSAGE);
  });

  it("ask should fail with InternalError when the index is unavailable", async () => {
    await index.close();
    await expectMcpError(
      callTool(deps, "ask", { question: "What languages?", session_id: "s1" }),
      ErrorCode.InternalError,
    );
  });

  it("ingest should return the run report", async () => {
    const result = await callTool(deps, "ingest", {});
    expect(JSON.parse(textOf(result))).toMatchObject({
      documentsLoaded: 1,
      documentsSkipped: 0,
      chunksIndexed: 1,
      errors: [],
      languages: { en: 1 },
    });
  });

  it("add_document should validate the URL", async () => {
    await expectMcpError(callTool(deps, "add_document", { url: "not a url" }), ErrorCode.InvalidParams);
  });

  it("status should expose indexing counters", async () => {
    const result = await callTool(deps, "status", undefined);
    const body = JSON.parse(textOf(result));
    expect(body.ready).toBe(true);
    expect(body.indexing.collections).toEqual({ en: 1 });
  });

  it("should reject unknown tools with MethodNotFound", async () => {
    await expectMcpError(callTool(deps, "delete_everything", {}), ErrorCode.MethodNotFound);
  });
});
