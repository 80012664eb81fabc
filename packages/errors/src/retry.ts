import { AppError } from "./app-error.js";
import { CancelledError } from "./errors.js";

export interface RetryOptions {
  /** Total number of attempts, the first call included. Default: 3 */
  maxAttempts?: number;
  /** Base delay in milliseconds before the first retry. Default: 1000 */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds between retries. Default: 10000 */
  maxDelayMs?: number;
  /** Decides whether a failure is worth another attempt. Defaults to {@link isRetryable}. */
  shouldRetry?: (error: unknown) => boolean;
  /** Called before each backoff sleep. */
  onRetry?: (info: RetryAttemptInfo) => void;
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
}

export interface RetryAttemptInfo {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
}

export class RetryExhaustedError extends AppError {
  public readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super({
      message: cause instanceof Error ? cause.message : "Retry attempts exhausted",
      statusCode: AppError.isAppError(cause) ? cause.statusCode : 500,
      code: "RETRY_EXHAUSTED",
      cause,
      details: { attempts },
    });
    this.attempts = attempts;
  }
}

const DEFAULT_RETRY_OPTIONS = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
};

/**
 * Client errors (4xx) are NOT retried; server errors (5xx) and unknown errors ARE retried.
 */
export function isRetryable(error: unknown): boolean {
  if (AppError.isAppError(error)) {
    if (error.statusCode >= 400 && error.statusCode < 500) {
      return false;
    }
    return error.statusCode >= 500;
  }
  return true;
}

/**
 * delay = min(maxDelay, baseDelay * 2^attempt) * random(0.5, 1.0)
 */
export function calculateDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(maxDelayMs, exponentialDelay);
  const jitter = 0.5 + Math.random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic using exponential backoff and jitter.
 *
 * Resolves with the first success. Otherwise rejects with a
 * {@link RetryExhaustedError} carrying the attempt count and the last error as
 * `cause`. Cancellation through `signal` rejects with {@link CancelledError}.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: RetryOptions,
): Promise<T> {
  const maxAttempts = Math.max(1, options?.maxAttempts ?? DEFAULT_RETRY_OPTIONS.maxAttempts);
  const baseDelayMs = options?.baseDelayMs ?? DEFAULT_RETRY_OPTIONS.baseDelayMs;
  const maxDelayMs = options?.maxDelayMs ?? DEFAULT_RETRY_OPTIONS.maxDelayMs;
  const shouldRetry = options?.shouldRetry ?? isRetryable;
  const wait = options?.sleep ?? sleep;
  const signal = options?.signal;

  let attempt = 0;
  for (;;) {
    if (signal?.aborted) {
      throw new CancelledError();
    }
    attempt++;
    try {
      return await fn(attempt);
    } catch (error: unknown) {
      if (attempt >= maxAttempts || !shouldRetry(error)) {
        throw new RetryExhaustedError(attempt, error);
      }

      const delayMs = calculateDelay(attempt - 1, baseDelayMs, maxDelayMs);
      options?.onRetry?.({ attempt, maxAttempts, delayMs, error });
      await wait(delayMs);
    }
  }
}
