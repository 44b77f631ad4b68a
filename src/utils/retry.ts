import { ChainUnavailableError, RateLimitedError, getErrorMessage, isRetryable } from "./errors.js";
import type { Logger } from "./logger.js";

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Per-attempt timeout; a timed out attempt counts as `ChainUnavailableError` */
  timeoutMs?: number;
  logger?: Logger;
  /** Extra fields for the retry log line */
  context?: Record<string, unknown>;
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

/**
 * Rejects with `ChainUnavailableError` when `operation` does not settle within `timeoutMs`.
 * The underlying request is not aborted; the chain client's transport timeout does that.
 */
export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new ChainUnavailableError(`Chain call timed out after ${timeoutMs}ms`)),
      timeoutMs,
    );
  });
  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs `operation` until it succeeds, a non-retryable error is thrown, or
 * `maxAttempts` is reached. Delays double from `baseDelayMs` up to `maxDelayMs`;
 * a rate-limit hint from the provider takes precedence, capped at `maxDelayMs`.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 1; ; attempt += 1) {
    try {
      const pending = operation();
      return options.timeoutMs ? await withTimeout(pending, options.timeoutMs) : await pending;
    } catch (error: unknown) {
      if (!isRetryable(error) || attempt >= maxAttempts) {
        throw error;
      }

      const hinted = error instanceof RateLimitedError ? error.retryAfterMs : undefined;
      const delayMs =
        hinted !== undefined
          ? Math.min(hinted, options.maxDelayMs)
          : backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs);
      options.logger?.warn(
        { ...options.context, attempt, maxAttempts, delayMs, error: getErrorMessage(error) },
        "Chain call failed, retrying",
      );
      await sleep(delayMs);
    }
  }
}
