/**
 * Bounded exponential backoff
 *
 * Delay doubles per attempt (1s, 2s, 4s ... capped at maxDelayMs) with
 * +/-25% jitter. Used by the HTTP collaborators for transient failures only.
 *
 * @module utils/backoff
 */

export interface BackoffConfig {
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs: number;
  /** Total attempts including the first (default: 3) */
  maxAttempts: number;
  /** Jitter fraction +/- (default: 0.25) */
  jitterFraction: number;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  maxAttempts: 3,
  jitterFraction: 0.25,
};

/** Network and 5xx failures worth another attempt */
const TRANSIENT_ERROR_PATTERN = /\b(429|500|502|503|504)\b|ECONNREFUSED|ECONNRESET|ETIMEDOUT|fetch failed|timeout/i;

export function isTransientError(error: unknown): boolean {
  const message = error instanceof Error ? error.message : String(error);
  return TRANSIENT_ERROR_PATTERN.test(message);
}

/**
 * Delay before retry number `attempt` (0-indexed):
 * min(baseDelay * 2^attempt, maxDelay) +/- jitter, never negative
 */
export function calculateBackoffDelay(attempt: number, config?: Partial<BackoffConfig>): number {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const cappedDelay = Math.min(cfg.baseDelayMs * Math.pow(2, attempt), cfg.maxDelayMs);
  const jitter = (Math.random() * 2 - 1) * cappedDelay * cfg.jitterFraction;
  return Math.max(0, Math.round(cappedDelay + jitter));
}

export interface RetryOptions {
  /** Prefix for log lines, e.g. 'Generation' */
  label: string;
  shouldRetry?: (error: unknown) => boolean;
  backoff?: Partial<BackoffConfig>;
  /** Replaced in tests to avoid real waits */
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Run `fn`, retrying transient failures with backoff.
 *
 * @throws the first non-retryable error, or the last error once attempts run out
 */
export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const cfg = { ...DEFAULT_BACKOFF, ...options.backoff };
  const shouldRetry = options.shouldRetry ?? isTransientError;
  const sleep = options.sleep ?? defaultSleep;
  let lastError: unknown = new Error(`[${options.label}] no attempts made`);

  for (let attempt = 0; attempt < cfg.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error) || attempt === cfg.maxAttempts - 1) {
        throw error;
      }
      const delay = calculateBackoffDelay(attempt, cfg);
      console.error(
        `[${options.label}] Attempt ${attempt + 1}/${cfg.maxAttempts} failed: ` +
          `${error instanceof Error ? error.message : String(error)}. Retrying in ${delay}ms...`
      );
      await sleep(delay);
    }
  }
  throw lastError;
}
