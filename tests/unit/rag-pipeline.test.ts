import { describe, it, expect, beforeEach } from "vitest";
import { Chunker } from "../../src/chunker";
import {
  EmbeddingProviderError,
  GenerationUnavailableError,
  IndexUnavailableError,
  UnsupportedLanguageError,
} from "../../src/errors";
import { IngestionPipeline } from "../../src/ingestion";
import { LanguageRouter } from "../../src/language";
import { noContextNotice } from "../../src/prompts";
import { RagPipeline, type RagPipelineOptions } from "../../src/rag-pipeline";
import { SessionMemory } from "../../src/session-memory";
import { StatusManager } from "../../src/status";
import { EmbeddingIndex } from "../../src/vector-index";
import { MemorySource, NO_DELAY, ScriptedLlm, TopicEmbeddings } from "../helpers/fakes";

const TOPICS = {
  skills: ["skills", "habilidades", "lenguajes", "languages", "go", "rust"],
  work: ["work", "worked"],
  initech: ["initech"],
  globex: ["globex"],
};

const DOCS = {
  "en_skills.txt": "Skills: Go, Rust, distributed systems.",
  "en_initech.txt": "In 2020 I worked at Initech building payment systems.",
  "en_globex.txt": "In 2018 I worked at Globex on search.",
  "es_habilidades.txt": "Habilidades: Go y Rust.",
};

const CONDENSED = "What did he do at Initech?";

describe("RagPipeline", () => {
  let index: EmbeddingIndex;
  let embeddings: TopicEmbeddings;
  let llm: ScriptedLlm;
  let memory: SessionMemory;
  let status: StatusManager;
  const router = new LanguageRouter({ supported: ["en", "es"], fallback: "en", minConfidence: 0.6 });

  beforeEach(async () => {
    index = new EmbeddingIndex();
    await index.open();
    embeddings = new TopicEmbeddings(TOPICS);
    llm = new ScriptedLlm((prompt) =>
      prompt.includes("Rewritten question:") ? CONDENSED : "Generated answer.",
    );
    memory = new SessionMemory();
    status = new StatusManager();
    await new IngestionPipeline({
      sources: [new MemorySource(DOCS)],
      index,
      embeddings,
      chunker: new Chunker(),
      router,
      retry: NO_DELAY,
    }).ingestAll();
  });

  function pipeline(overrides: Partial<RagPipelineOptions> = {}): RagPipeline {
    return new RagPipeline({
      index,
      embeddings,
      llm,
      memory,
      router,
      topK: 4,
      scoreThreshold: 0.5,
      contextBudget: 6000,
      retry: NO_DELAY,
      assistantName: "Alex",
      status,
      now: () => new Date("2024-06-01T12:00:00.000Z"),
      ...overrides,
    });
  }

  it("should answer from retrieved context and cite its source", async () => {
    const result = await pipeline().answer("s1", "What languages does he know?", "en");

    expect(result).toEqual({
      answer: "Generated answer.",
      sources: ["en_skills.txt"],
      grounded: true,
      language: "en",
      standaloneQuestion: "What languages does he know?",
    });
    expect(llm.calls).toHaveLength(1);
    expect(llm.calls[0].prompt).toBe(
      "### Context\n[1] (source: en_skills.txt)\nSkills: Go, Rust, distributed systems.\n\n### Question\nWhat languages does he know?",
    );
    expect(llm.calls[0].history).toEqual([]);
    expect(llm.calls[0].system).toContain("You are the AI version of Alex.");
    expect(llm.calls[0].system).toContain("Today's date: 2024-06-01");
  });

  it("should tell the model to decline when nothing relevant is found", async () => {
    const result = await pipeline().answer("s1", "What is his favourite food?", "en");

    expect(result.grounded).toBe(false);
    expect(result.sources).toEqual([]);
    expect(llm.calls[0].prompt).toBe(
      `### Context\n${noContextNotice("en")}\n\n### Question\nWhat is his favourite food?`,
    );
  });

  it("should condense a follow-up question against the history", async () => {
    const rag = pipeline();
    const first = await rag.answer("s1", "Where did he work?", "en");
    expect(first.sources).toEqual(["en_initech.txt", "en_globex.txt"]);

    const second = await rag.answer("s1", "What did he do there?", "en");
    expect(second.standaloneQuestion).toBe(CONDENSED);
    expect(second.sources).toEqual(["en_initech.txt"]);
    expect(embeddings.queries).toEqual(["Where did he work?", CONDENSED]);

    const [, condense, answer] = llm.calls;
    expect(condense.prompt).toContain("User: Where did he work?\nAssistant: Generated answer.");
    expect(condense.prompt).toContain("Latest question:\nWhat did he do there?");
    expect(answer.history.map((t) => t.text)).toEqual(["Where did he work?", "Generated answer."]);
    expect(answer.prompt.endsWith("### Question\nWhat did he do there?")).toBe(true);
    expect(memory.getHistory("s1")).toHaveLength(4);
  });

  it("should fall back to the raw question when condensation returns nothing", async () => {
    llm = new ScriptedLlm((prompt) => (prompt.includes("Rewritten question:") ? "  " : "ok"));
    const rag = pipeline();
    await rag.answer("s1", "Where did he work?", "en");
    const result = await rag.answer("s1", "Tell me about Globex", "en");
    expect(result.standaloneQuestion).toBe("Tell me about Globex");
    expect(result.sources).toEqual(["en_globex.txt"]);
  });

  it("should only retrieve from the requested language", async () => {
    const es = await pipeline().answer("s1", "¿Qué lenguajes conoce?", "es");
    expect(es.sources).toEqual(["es_habilidades.txt"]);
    const en = await pipeline().answer("s2", "What languages does he know?", "en");
    expect(en.sources).toEqual(["en_skills.txt"]);
  });

  it("should detect the language when none is given", async () => {
    const result = await pipeline().answer("s1", "¿Qué lenguajes conoce él?");
    expect(result.language).toBe("es");
    expect(llm.calls[0].system).toContain("Eres la versión IA de Alex.");
  });

  it("should reject an unsupported explicit language", async () => {
    await expect(pipeline().answer("s1", "Quelles langues?", "fr")).rejects.toBeInstanceOf(
      UnsupportedLanguageError,
    );
  });

  it("should keep the top chunk and drop the rest once the context budget is spent", async () => {
    const result = await pipeline({ contextBudget: 10 }).answer("s1", "Where did he work?", "en");

    expect(result.grounded).toBe(true);
    expect(result.sources).toEqual(["en_initech.txt"]);
    expect(llm.calls[0].prompt).not.toContain("[2]");
  });

  it("should retry a failing query embedding and count the retries", async () => {
    embeddings.failQueries(2);
    const result = await pipeline().answer("s1", "What languages does he know?", "en");

    expect(result.grounded).toBe(true);
    expect(embeddings.queries).toHaveLength(3);
    expect(status.getStatus().providers.embeddingRetries).toBe(2);
  });

  it("should surface a query embedding failure after the retry budget", async () => {
    embeddings.failQueries(5);
    await expect(pipeline().answer("s1", "What languages does he know?", "en")).rejects.toBeInstanceOf(
      EmbeddingProviderError,
    );
    expect(embeddings.queries).toHaveLength(3);
  });

  it("should raise GenerationUnavailable when generation keeps failing", async () => {
    llm.failNext(5);
    await expect(pipeline().answer("s1", "What languages does he know?", "en")).rejects.toBeInstanceOf(
      GenerationUnavailableError,
    );
    expect(llm.calls).toHaveLength(3);
    expect(status.getStatus().providers.generationRetries).toBe(2);
    expect(memory.getHistory("s1")).toEqual([]);
  });

  it("should not retry a non-retryable generation failure", async () => {
    llm.failNext(1, false);
    await expect(pipeline().answer("s1", "What languages does he know?", "en")).rejects.toBeInstanceOf(
      GenerationUnavailableError,
    );
    expect(llm.calls).toHaveLength(1);
  });

  it("should fail with IndexUnavailable instead of answering without grounding", async () => {
    await index.close();
    await expect(pipeline().answer("s1", "What languages does he know?", "en")).rejects.toBeInstanceOf(
      IndexUnavailableError,
    );
    expect(llm.calls).toEqual([]);
  });
});
