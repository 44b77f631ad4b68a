/**
 * Error taxonomy for the fetch/cache engine.
 *
 * Transient chain failures (`ChainUnavailableError`, `RateLimitedError`) are
 * retryable; everything else is surfaced to the caller as-is.
 */

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

export class FetcherError extends Error {
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FetcherError";
  }
}

/**
 * The node or provider could not answer (network, 5xx, timeout)
 */
export class ChainUnavailableError extends FetcherError {
  override readonly retryable = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ChainUnavailableError";
  }
}

/**
 * The provider throttled the request. `retryAfterMs` carries its backoff hint when it gave one.
 */
export class RateLimitedError extends FetcherError {
  override readonly retryable = true;

  constructor(
    message: string,
    public readonly retryAfterMs?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RateLimitedError";
  }
}

/**
 * The provider refused a log query because its block span or result set was too large.
 */
export class ResponseTooLargeError extends FetcherError {
  constructor(
    message: string,
    public readonly fromBlock?: number,
    public readonly toBlock?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ResponseTooLargeError";
  }
}

export class InvalidRangeError extends FetcherError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidRangeError";
  }
}

export class InconsistentRangeError extends FetcherError {
  constructor(
    message: string,
    public readonly blockNumber: number,
  ) {
    super(message);
    this.name = "InconsistentRangeError";
  }
}

export class StoreUnavailableError extends FetcherError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreUnavailableError";
  }
}

export class InvalidTokenError extends FetcherError {
  constructor(public readonly token: string) {
    super(`Could not find token \`${token}\``);
    this.name = "InvalidTokenError";
  }
}

export class ConfigError extends FetcherError {
  constructor(
    message: string,
    public readonly fieldErrors: Record<string, string[] | undefined>,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof FetcherError && error.retryable;
}
