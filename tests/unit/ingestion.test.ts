import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Chunker } from "../../src/chunker";
import { IndexUnavailableError, IngestionError, UnsupportedLanguageError } from "../../src/errors";
import { computeHash } from "../../src/hash";
import { IngestionPipeline } from "../../src/ingestion";
import { LanguageRouter } from "../../src/language";
import type { DocumentSource, SourceFile } from "../../src/sources";
import { StatusManager } from "../../src/status";
import { EmbeddingIndex } from "../../src/vector-index";
import { BrokenSource, MemorySource, NO_DELAY, TopicEmbeddings } from "../helpers/fakes";

const TOPICS = {
  skills: ["skills", "habilidades", "languages", "go", "rust"],
  work: ["work", "worked"],
  initech: ["initech"],
  globex: ["globex"],
};

const router = new LanguageRouter({ supported: ["en", "es"], fallback: "en", minConfidence: 0.6 });

describe("IngestionPipeline", () => {
  let index: EmbeddingIndex;
  let embeddings: TopicEmbeddings;
  let status: StatusManager;

  beforeEach(async () => {
    index = new EmbeddingIndex();
    await index.open();
    embeddings = new TopicEmbeddings(TOPICS);
    status = new StatusManager();
  });

  function pipelineFor(...sources: DocumentSource[]): IngestionPipeline {
    return new IngestionPipeline({
      sources,
      index,
      embeddings,
      chunker: new Chunker({ chunkSize: 200, chunkOverlap: 40 }),
      router,
      batchSize: 8,
      retry: NO_DELAY,
      status,
    });
  }

  it("should load every document into its language collection", async () => {
    const pipeline = pipelineFor(
      new MemorySource({
        "en_skills.txt": "Skills: Go, Rust, distributed systems.",
        "es_habilidades.txt": "Habilidades: Go, Rust y sistemas distribuidos.",
        "en_work.md": "# Work\nIn 2020 I worked at Initech.",
      }),
    );

    const report = await pipeline.ingestAll();
    expect(report).toEqual({
      documentsLoaded: 3,
      documentsSkipped: 0,
      chunksIndexed: 3,
      errors: [],
      languages: { en: 2, es: 1 },
    });

    const workId = computeHash("# Work\nIn 2020 I worked at Initech.");
    expect(index.getEntry("en", `${workId}#0`)).toMatchObject({
      text: "[Work]\n\nIn 2020 I worked at Initech.",
      metadata: { documentId: workId, sourceUri: "en_work.md", language: "en", ordinal: 0 },
    });
  });

  it("should be idempotent across runs", async () => {
    const pipeline = pipelineFor(
      new MemorySource({
        "en_skills.txt": "Skills: Go, Rust, distributed systems.",
        "en_work.txt": "In 2020 I worked at Initech.",
      }),
    );

    const first = await pipeline.ingestAll();
    const ids = index.chunkIds("en");
    const second = await pipeline.ingestAll();

    expect(second).toEqual(first);
    expect(index.chunkIds("en")).toEqual(ids);
    expect(index.count("en")).toBe(2);
  });

  it("should skip empty, duplicate and unsupported documents without aborting", async () => {
    const pipeline = pipelineFor(
      new MemorySource({
        "en_a.txt": "Skills: Go.",
        "en_copy.txt": "Skills: Go.",
        "en_empty.txt": "   ",
        "en_slides.pptx": "binary",
        "en_b.txt": "I worked at Globex.",
      }),
    );

    const report = await pipeline.ingestAll();
    expect(report.documentsLoaded).toBe(2);
    expect(report.documentsSkipped).toBe(3);
    expect(report.chunksIndexed).toBe(2);
    expect(report.errors).toEqual([
      {
        uri: "en_slides.pptx",
        message: "Unsupported document format for en_slides.pptx (extension .pptx)",
      },
    ]);
    expect(index.count("en")).toBe(2);
  });

  it("should record a failing document and keep going", async () => {
    const pipeline = pipelineFor(
      new MemorySource({
        "en_a.txt": { text: "", failWith: "disk on fire" },
        "en_b.txt": "Skills: Rust.",
      }),
    );

    const report = await pipeline.ingestAll();
    expect(report.errors).toEqual([{ uri: "en_a.txt", message: "en_a.txt: disk on fire" }]);
    expect(report.documentsLoaded).toBe(1);
    expect(index.count("en")).toBe(1);
  });

  it("should report a source whose listing fails", async () => {
    const pipeline = pipelineFor(new BrokenSource(), new MemorySource({ "en_b.txt": "Skills: Rust." }));

    const report = await pipeline.ingestAll();
    expect(report.errors).toEqual([{ uri: "broken", message: "listing endpoint returned 503" }]);
    expect(report.documentsLoaded).toBe(1);
  });

  it("should keep a language's previous collection when all its documents fail", async () => {
    const source = new MemorySource({ "en_a.txt": "Skills: Go.", "es_a.txt": "Habilidades: Go." });
    const pipeline = pipelineFor(source);
    await pipeline.ingestAll();
    const enIds = index.chunkIds("en");

    source.set({
      "en_a.txt": { text: "", failWith: "timeout" },
      "es_b.txt": "Habilidades: Rust.",
    });
    const report = await pipeline.ingestAll();

    expect(report.languages).toEqual({ es: 1 });
    expect(index.chunkIds("en")).toEqual(enIds);
    expect(index.chunkIds("es")).toEqual([`${computeHash("Habilidades: Rust.")}#0`]);
  });

  it("should keep a language's previous collection when its documents cannot be stored", async () => {
    index = new EmbeddingIndex({ dimensions: 2 });
    await index.open();
    embeddings = new TopicEmbeddings({ skills: ["skills"], go: ["go"] });
    const source = new MemorySource({ "en_a.txt": "Skills: Go." });
    await pipelineFor(source).ingestAll();
    const enIds = index.chunkIds("en");

    embeddings = new TopicEmbeddings(TOPICS);
    const report = await pipelineFor(source).ingestAll();

    expect(report.languages).toEqual({});
    expect(report.errors).toEqual([
      { uri: "en_a.txt", message: "Collection 'en' holds 2-d vectors, got 4-d" },
    ]);
    expect(index.chunkIds("en")).toEqual(enIds);
  });

  it("should route by declared language, then file name, then detected text", async () => {
    const pipeline = pipelineFor(
      new MemorySource({
        "cv.txt": "¿Dónde trabajó él? Trabajó en Initech.",
        "bio.txt": { text: "Skills: Go.", language: "es" },
        "en_notes.txt": "Notas sobre el trabajo en Globex.",
        "x.txt": { text: "Skills: Rust.", language: "fr" },
      }),
    );

    const report = await pipeline.ingestAll();
    expect(index.count("es")).toBe(2);
    expect(index.count("en")).toBe(1);
    expect(report.errors).toEqual([
      { uri: "x.txt", message: new UnsupportedLanguageError("fr", ["en", "es"]).message },
    ]);
  });

  it("should retry a retryable embedding failure", async () => {
    embeddings.failDocuments(1);
    const report = await pipelineFor(new MemorySource({ "en_a.txt": "Skills: Go." })).ingestAll();

    expect(report.documentsLoaded).toBe(1);
    expect(embeddings.documentCalls).toBe(2);
    expect(status.getStatus().providers.embeddingRetries).toBe(1);
  });

  it("should skip a document whose embedding fails permanently", async () => {
    embeddings.failDocuments(1, false);
    const report = await pipelineFor(new MemorySource({ "en_a.txt": "Skills: Go." })).ingestAll();

    expect(report.documentsLoaded).toBe(0);
    expect(report.errors).toEqual([{ uri: "en_a.txt", message: "429 quota exceeded" }]);
    expect(report.languages).toEqual({});
    expect(index.count("en")).toBe(0);
  });

  it("should update the status counters", async () => {
    await pipelineFor(
      new MemorySource({ "en_a.txt": "Skills: Go.", "en_b.txt": "   ", "es_a.txt": "Habilidades: Go." }),
    ).ingestAll();

    const { indexing, ready, ingesting } = status.getStatus();
    expect(ready).toBe(true);
    expect(ingesting).toBe(false);
    expect(indexing).toMatchObject({
      documentsDiscovered: 3,
      documentsLoaded: 2,
      documentsSkipped: 1,
      chunksTotal: 2,
      chunksEmbedded: 2,
      collections: { en: 1, es: 1 },
    });
  });

  it("should share one run between concurrent callers", async () => {
    const pipeline = pipelineFor(new MemorySource({ "en_a.txt": "Skills: Go." }));
    const first = pipeline.ingestAll();
    const second = pipeline.ingestAll();

    expect(second).toBe(first);
    await first;
    expect(embeddings.documentCalls).toBe(1);
  });

  it("should keep serving the committed collection while a rebuild is running", async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    let gated = false;
    const source: DocumentSource = {
      name: "gated",
      list: async (): Promise<SourceFile[]> => [
        {
          uri: "en_a.txt",
          load: async () => {
            if (gated) await gate;
            return { bytes: Buffer.from(gated ? "I worked at Globex." : "Skills: Go.") };
          },
        },
      ],
    };
    const pipeline = pipelineFor(source);
    await pipeline.ingestAll();
    const before = index.chunkIds("en");

    gated = true;
    const running = pipeline.ingestAll();
    await new Promise((resolve) => setImmediate(resolve));
    expect(status.getStatus().ingesting).toBe(true);
    expect(index.chunkIds("en")).toEqual(before);

    release();
    await running;
    expect(index.chunkIds("en")).toEqual([`${computeHash("I worked at Globex.")}#0`]);
  });

  it("should fail with IndexUnavailable when the index is closed", async () => {
    await index.close();
    await expect(pipelineFor(new MemorySource({})).ingestAll()).rejects.toBeInstanceOf(
      IndexUnavailableError,
    );
  });

  describe("addFromUrl", () => {
    afterEach(() => {
      vi.unstubAllGlobals();
    });

    it("should add a remote document and replace it when added again", async () => {
      const fetchMock = vi.fn(
        async () =>
          new Response("# Bio\nI worked at Initech.", {
            status: 200,
            headers: { "content-type": "text/markdown" },
          }),
      );
      vi.stubGlobal("fetch", fetchMock);
      const pipeline = pipelineFor();
      const url = "https://cdn.example.com/kb/en_bio.md";

      expect(await pipeline.addFromUrl(url)).toEqual({ sourceUri: url, language: "en", chunks: 1 });
      expect(await pipeline.addFromUrl(url)).toEqual({ sourceUri: url, language: "en", chunks: 1 });
      expect(index.count("en")).toBe(1);
      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(status.getStatus().indexing.collections).toEqual({ en: 1 });
    });

    it("should keep a document added while a run is in progress", async () => {
      vi.stubGlobal("fetch", vi.fn(async () => new Response("# Bio\nI worked at Initech.")));
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const source: DocumentSource = {
        name: "gated",
        list: async (): Promise<SourceFile[]> => [
          {
            uri: "en_a.txt",
            load: async () => {
              await gate;
              return { bytes: Buffer.from("I worked at Globex.") };
            },
          },
        ],
      };
      const pipeline = pipelineFor(source);
      const url = "https://cdn.example.com/kb/en_bio.md";

      const running = pipeline.ingestAll();
      const adding = pipeline.addFromUrl(url);
      await new Promise((resolve) => setImmediate(resolve));
      release();
      await running;

      expect(await adding).toEqual({ sourceUri: url, language: "en", chunks: 1 });
      expect(index.chunkIds("en")).toEqual([
        `${computeHash("I worked at Globex.")}#0`,
        `${computeHash("# Bio\nI worked at Initech.")}#0`,
      ]);
    });

    it("should load documents added by URL again on later runs", async () => {
      const fetchMock = vi.fn(async () => new Response("# Bio\nI worked at Initech."));
      vi.stubGlobal("fetch", fetchMock);
      const pipeline = pipelineFor(new MemorySource({ "en_a.txt": "Skills: Go." }));
      await pipeline.addFromUrl("https://cdn.example.com/kb/en_bio.md");

      const report = await pipeline.ingestAll();

      expect(report.languages).toEqual({ en: 2 });
      expect(index.chunkIds("en")).toEqual([
        `${computeHash("Skills: Go.")}#0`,
        `${computeHash("# Bio\nI worked at Initech.")}#0`,
      ]);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it("should wrap a failed download in an IngestionError", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn(async () => new Response("", { status: 404, statusText: "Not Found" })),
      );
      const url = "https://cdn.example.com/kb/missing.md";
      const result = pipelineFor().addFromUrl(url);

      await expect(result).rejects.toBeInstanceOf(IngestionError);
      await expect(result).rejects.toThrow(`${url}: GET ${url} failed with 404 Not Found`);
    });
  });
});
