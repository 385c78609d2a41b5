import { RateLimitError, isRetryableError } from "./errors.js";
import { logger } from "./logger.js";

const log = logger.child("retry");

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay in milliseconds for exponential backoff (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Add 0-25% random jitter to each delay (default: true) */
  jitter?: boolean;
  shouldRetry?: (error: Error, attempt: number) => boolean;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  /** Replaceable for tests */
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_OPTIONS = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitter: true,
};

export function calculateBackoff(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitter: boolean
): number {
  const clampedDelay = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);

  if (jitter) {
    return Math.floor(clampedDelay * (1 + Math.random() * 0.25));
  }

  return clampedDelay;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn`, retrying transient failures with exponential backoff.
 *
 * A {@link RateLimitError} carrying `retryAfter` waits exactly that many
 * seconds instead of the computed backoff, or fails at once when that is
 * longer than `maxDelayMs`.
 *
 * @throws The last error once retries are exhausted or the error is not retryable
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const wait = opts.sleep ?? sleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      const shouldRetry = opts.shouldRetry
        ? opts.shouldRetry(lastError, attempt)
        : isRetryableError(lastError) || lastError instanceof RateLimitError;

      const requestedMs =
        lastError instanceof RateLimitError && lastError.retryAfter !== undefined
          ? lastError.retryAfter * 1000
          : undefined;

      // A server-requested wait beyond maxDelayMs (an exhausted daily quota) is not waited out
      if (
        attempt >= opts.maxRetries ||
        !shouldRetry ||
        (requestedMs !== undefined && requestedMs > opts.maxDelayMs)
      ) {
        throw lastError;
      }

      const delayMs =
        requestedMs ?? calculateBackoff(attempt, opts.baseDelayMs, opts.maxDelayMs, opts.jitter);

      if (opts.onRetry) {
        opts.onRetry(lastError, attempt + 1, delayMs);
      } else {
        log.debug(
          `Retry ${attempt + 1}/${opts.maxRetries} after ${delayMs}ms: ${lastError.message}`
        );
      }

      await wait(delayMs);
    }
  }
}
