import path from "node:path";
import { UnsupportedLanguageError } from "./errors";
import type { Language } from "./types";
import stopwords from "./data/stopwords.json" with { type: "json" };

const STOPWORDS: Record<string, ReadonlySet<string>> = Object.fromEntries(
  Object.entries(stopwords).map(([lang, words]) => [lang, new Set(words)]),
);

export interface LanguagePolicy {
  /** Collections that exist; every routed language is one of these. */
  supported: Language[];
  /** Used when neither an explicit value nor a confident detection is available. */
  fallback: Language;
  /** Share of stop-word hits the leading language needs (0..1). */
  minConfidence: number;
}

export interface LanguageGuess {
  language: Language;
  /** Leading language's share of all stop-word hits. */
  confidence: number;
  hits: number;
}

/**
 * Stop-word vote over the supported languages. Returns undefined when the
 * text contains no stop word of any supported language.
 */
export function detectLanguage(text: string, supported: readonly Language[]): LanguageGuess | undefined {
  const tokens = text.toLowerCase().match(/\p{L}+/gu) ?? [];
  const counts = new Map<Language, number>();
  let total = 0;
  for (const token of tokens) {
    for (const lang of supported) {
      if (STOPWORDS[lang]?.has(token)) {
        counts.set(lang, (counts.get(lang) ?? 0) + 1);
        total++;
      }
    }
  }
  let best: LanguageGuess | undefined;
  for (const lang of supported) {
    const hits = counts.get(lang) ?? 0;
    if (hits > 0 && (!best || hits > best.hits)) {
      best = { language: lang, confidence: hits / total, hits };
    }
  }
  return best;
}

/** Normalise "EN", "en-US", "es_MX" to the primary subtag. */
export function normalizeLanguage(value: string): Language {
  return value.trim().toLowerCase().split(/[-_]/)[0];
}

/**
 * Decides which language collection a request or document belongs to:
 * explicit value, then (for documents) the path prefix, then stop-word
 * detection, then the configured fallback.
 */
export class LanguageRouter {
  private readonly policy: LanguagePolicy;

  public constructor(policy: LanguagePolicy) {
    this.policy = {
      ...policy,
      supported: policy.supported.map(normalizeLanguage),
      fallback: normalizeLanguage(policy.fallback),
    };
  }

  public supported(): Language[] {
    return [...this.policy.supported];
  }

  public isSupported(language: string): boolean {
    return this.policy.supported.includes(normalizeLanguage(language));
  }

  /**
   * Resolve a request language.
   * @throws {UnsupportedLanguageError} when `explicit` names an unsupported language.
   */
  public resolve(explicit: string | undefined, text: string): Language {
    if (explicit?.trim()) {
      const lang = normalizeLanguage(explicit);
      if (!this.policy.supported.includes(lang)) {
        throw new UnsupportedLanguageError(lang, this.policy.supported);
      }
      return lang;
    }
    return this.detect(text);
  }

  /** Detected language when confident enough, else the fallback. */
  public detect(text: string): Language {
    const guess = detectLanguage(text, this.policy.supported);
    if (guess && guess.confidence >= this.policy.minConfidence) return guess.language;
    return this.policy.fallback;
  }

  /**
   * Language declared by a file path: a name prefix (`en_cv.md`, `es-cv.pdf`,
   * `en.notes.txt`) or a directory segment (`es/cv.md`).
   */
  public fromPath(uri: string): Language | undefined {
    const pathname = /^https?:\/\//i.test(uri) ? new URL(uri).pathname : uri;
    const segments = decodeURIComponent(pathname).split(/[\\/]/).filter(Boolean);
    const base = segments.pop() ?? "";
    const prefix = /^([a-z]{2})[_\-.]/i.exec(path.basename(base));
    if (prefix && this.isSupported(prefix[1])) return normalizeLanguage(prefix[1]);
    for (const segment of segments.reverse()) {
      if (this.isSupported(segment) && segment.length === 2) return normalizeLanguage(segment);
    }
    return undefined;
  }
}
