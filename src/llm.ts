import { GoogleGenerativeAI, type Content } from "@google/generative-ai";
import { GenerationProviderError, errorMessage, isTransientFailure } from "./errors";
import type { Turn } from "./types";

export interface CompletionOptions {
  /** System instructions (persona, rules). */
  system?: string;
}

/** Chat-completion capability used for condensation and answering. */
export interface LlmProvider {
  getModelName(): string;
  /**
   * Send `prompt` as the next user message after `history`.
   * @throws {GenerationProviderError} on quota, timeout or API failure.
   */
  complete(prompt: string, history: readonly Turn[], opts?: CompletionOptions): Promise<string>;
}

export interface ChatModelOptions {
  apiKey: string;
  modelName?: string;
  temperature?: number;
  timeoutMs?: number;
}

/** Gemini chat model. */
export class ChatModel implements LlmProvider {
  private readonly genAI: GoogleGenerativeAI;
  private readonly modelName: string;
  private readonly temperature: number;
  private readonly timeoutMs: number;

  public constructor(opts: ChatModelOptions) {
    this.genAI = new GoogleGenerativeAI(opts.apiKey);
    this.modelName = opts.modelName?.trim() || "gemini-2.0-flash";
    this.temperature = opts.temperature ?? 0.5;
    this.timeoutMs = opts.timeoutMs ?? 30000;
  }

  public getModelName(): string {
    return this.modelName;
  }

  public async complete(
    prompt: string,
    history: readonly Turn[],
    opts: CompletionOptions = {},
  ): Promise<string> {
    const model = this.genAI.getGenerativeModel(
      {
        model: this.modelName,
        generationConfig: { temperature: this.temperature },
        ...(opts.system ? { systemInstruction: opts.system } : {}),
      },
      { timeout: this.timeoutMs },
    );
    try {
      const chat = model.startChat({ history: ChatModel.toContents(history) });
      const result = await chat.sendMessage(prompt);
      return result.response.text().trim();
    } catch (e) {
      throw new GenerationProviderError(
        `Generation request failed: ${errorMessage(e)}`,
        isTransientFailure(e),
        { cause: e },
      );
    }
  }

  /** Gemini requires the history to open with a user turn. */
  private static toContents(history: readonly Turn[]): Content[] {
    const firstUser = history.findIndex((t) => t.role === "user");
    if (firstUser === -1) return [];
    return history.slice(firstUser).map((t) => ({
      role: t.role === "assistant" ? "model" : "user",
      parts: [{ text: t.text }],
    }));
  }
}
