import { withRetry, type RetryOptions } from "./backoff";
import type { EmbeddingProvider } from "./embeddings";
import { GenerationUnavailableError, isRetryableProviderError } from "./errors";
import type { LanguageRouter } from "./language";
import type { CompletionOptions, LlmProvider } from "./llm";
import { buildAnswerPrompt, buildCondensePrompt, buildSystemPrompt } from "./prompts";
import type { SessionMemory } from "./session-memory";
import type { StatusManager } from "./status";
import type { Language, RetrievalResult, Turn } from "./types";
import type { EmbeddingIndex } from "./vector-index";

export interface AnswerResult {
  answer: string;
  /** Distinct source URIs of the chunks placed in the prompt, in prompt order. */
  sources: string[];
  /** False when no chunk met the score threshold. */
  grounded: boolean;
  language: Language;
  /** The question after condensation against the session history. */
  standaloneQuestion: string;
}

export interface RagPipelineOptions {
  index: EmbeddingIndex;
  embeddings: EmbeddingProvider;
  llm: LlmProvider;
  memory: SessionMemory;
  router: LanguageRouter;
  topK?: number;
  scoreThreshold?: number;
  /** Max characters of assembled context. */
  contextBudget?: number;
  retry?: RetryOptions;
  /** Persona the answers speak as. */
  assistantName?: string;
  status?: StatusManager;
  now?: () => Date;
  verbose?: boolean;
}

interface AssembledContext {
  text?: string;
  sources: string[];
}

const BLOCK_SEPARATOR = "\n\n";

/**
 * Question answering over the embedding index: condense the question against
 * the session history, retrieve from the question's language collection,
 * and generate a grounded answer.
 */
export class RagPipeline {
  private readonly index: EmbeddingIndex;
  private readonly embeddings: EmbeddingProvider;
  private readonly llm: LlmProvider;
  private readonly memory: SessionMemory;
  private readonly router: LanguageRouter;
  private readonly topK: number;
  private readonly scoreThreshold: number;
  private readonly contextBudget: number;
  private readonly retry: RetryOptions;
  private readonly assistantName: string;
  private readonly status?: StatusManager;
  private readonly now: () => Date;
  private readonly verbose: boolean;

  public constructor(opts: RagPipelineOptions) {
    this.index = opts.index;
    this.embeddings = opts.embeddings;
    this.llm = opts.llm;
    this.memory = opts.memory;
    this.router = opts.router;
    this.topK = opts.topK ?? 4;
    this.scoreThreshold = opts.scoreThreshold ?? 0.3;
    this.contextBudget = opts.contextBudget ?? 6000;
    this.retry = opts.retry ?? {};
    this.assistantName = opts.assistantName ?? "the author";
    this.status = opts.status;
    this.now = opts.now ?? (() => new Date());
    this.verbose = !!opts.verbose;
  }

  /**
   * Answer `question` within a session. The exchange is recorded in session
   * memory only when an answer was produced.
   *
   * @throws {UnsupportedLanguageError} for an explicit unsupported language.
   * @throws {IndexUnavailableError} when the index cannot be queried.
   * @throws {EmbeddingProviderError} when the query cannot be embedded.
   * @throws {GenerationUnavailableError} when generation keeps failing.
   */
  public async answer(sessionId: string, question: string, language?: Language): Promise<AnswerResult> {
    const lang = this.router.resolve(language, question);
    const history = this.memory.getHistory(sessionId);
    const standaloneQuestion = await this.condense(lang, history, question);

    const vector = await withRetry(
      () => this.embeddings.embedQuery(standaloneQuestion),
      isRetryableProviderError,
      this.retryOptions("query embedding", "embedding"),
    );
    const hits = await this.index.query(lang, vector, this.topK, this.scoreThreshold);
    const context = this.assemble(hits);
    const grounded = context.text !== undefined;
    if (this.verbose) {
      console.error(
        `[RAG][verbose] '${lang}' "${standaloneQuestion}": ${hits.length} hits, ${context.sources.length} sources`,
      );
    }
    if (!grounded) console.error(`[RAG] No grounding found in '${lang}' collection.`);

    const answer = await this.generate(buildAnswerPrompt(lang, context.text, question), history, {
      system: buildSystemPrompt(lang, this.assistantName, this.now().toISOString().slice(0, 10)),
    });
    this.memory.appendExchange(sessionId, question, answer);
    return { answer, sources: context.sources, grounded, language: lang, standaloneQuestion };
  }

  private async condense(language: Language, history: readonly Turn[], question: string): Promise<string> {
    if (history.length === 0) return question;
    const rewritten = await this.generate(buildCondensePrompt(language, history, question), [], {});
    return rewritten.trim() || question;
  }

  /**
   * Number hits in score order until the budget is reached. The top hit is
   * always kept, even when it alone exceeds the budget.
   */
  private assemble(hits: RetrievalResult[]): AssembledContext {
    const blocks: string[] = [];
    const sources: string[] = [];
    let used = 0;
    for (const hit of hits) {
      const block = `[${blocks.length + 1}] (source: ${hit.sourceUri})\n${hit.text}`;
      const cost = block.length + (blocks.length > 0 ? BLOCK_SEPARATOR.length : 0);
      if (blocks.length > 0 && used + cost > this.contextBudget) break;
      blocks.push(block);
      used += cost;
      if (!sources.includes(hit.sourceUri)) sources.push(hit.sourceUri);
    }
    return { text: blocks.length > 0 ? blocks.join(BLOCK_SEPARATOR) : undefined, sources };
  }

  private async generate(prompt: string, history: readonly Turn[], opts: CompletionOptions): Promise<string> {
    try {
      return await withRetry(
        () => this.llm.complete(prompt, history, opts),
        isRetryableProviderError,
        this.retryOptions("generation", "generation"),
      );
    } catch (e) {
      console.error("[RAG] Generation failed:", e);
      throw new GenerationUnavailableError({ cause: e });
    }
  }

  private retryOptions(label: string, kind: "embedding" | "generation"): RetryOptions {
    return {
      label,
      ...this.retry,
      onRetry: (...args) => {
        this.status?.recordRetry(kind);
        this.retry.onRetry?.(...args);
      },
    };
  }
}
