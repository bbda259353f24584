/**
 * Exponential backoff with jitter for provider calls.
 *
 * Delay doubles each attempt (base, 2x base, 4x base, ...) up to `maxDelayMs`,
 * with +/- `jitterFraction` randomness. Logs go to stderr: stdout carries the
 * stdio JSON-RPC stream.
 */

export interface BackoffConfig {
  /** Base delay in milliseconds (default: 500) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 8000) */
  maxDelayMs: number;
  /** Total attempts including the first call (default: 3) */
  maxAttempts: number;
  /** Jitter fraction +/- (default: 0.25) */
  jitterFraction: number;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 500,
  maxDelayMs: 8000,
  maxAttempts: 3,
  jitterFraction: 0.25,
};

export interface RetryOptions extends Partial<BackoffConfig> {
  /** Tag used in log lines, e.g. "embedding". */
  label?: string;
  /** Invoked before each retry sleep with the 1-based number of the failed attempt. */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

/** min(base * 2^attempt, max) +/- jitter, never negative. `attempt` is 0-indexed. */
export function calculateBackoffDelay(attempt: number, config?: Partial<BackoffConfig>): number {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const cappedDelay = Math.min(cfg.baseDelayMs * Math.pow(2, attempt), cfg.maxDelayMs);
  const jitter = (Math.random() * 2 - 1) * cappedDelay * cfg.jitterFraction;
  return Math.max(0, Math.round(cappedDelay + jitter));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn`, retrying errors accepted by `shouldRetry` up to `maxAttempts`
 * total calls. Non-retryable errors are re-thrown at once; after the last
 * attempt the final error is thrown.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  options: RetryOptions = {},
): Promise<T> {
  const { label = "call", onRetry, ...backoff } = options;
  const cfg = { ...DEFAULT_BACKOFF, ...backoff };
  const attempts = Math.max(1, cfg.maxAttempts);
  let lastError: unknown;

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error) || attempt === attempts - 1) throw error;
      const delay = calculateBackoffDelay(attempt, cfg);
      console.error(
        `[Backoff] ${label} attempt ${attempt + 1}/${attempts} failed; retrying in ${delay}ms`,
      );
      onRetry?.(attempt + 1, error, delay);
      await sleep(delay);
    }
  }

  throw lastError;
}
