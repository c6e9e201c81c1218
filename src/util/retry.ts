/**
 * Retry with exponential backoff for calls to the embeddings/chat API.
 *
 * @module util/retry
 */

export interface RetryOptions {
  /** Total attempts including the first (default: 4) */
  maxAttempts?: number;
  /** Delay before the first retry in ms (default: 1000) */
  initialDelayMs?: number;
  /** Upper bound for a single delay in ms (default: 30000) */
  maxDelayMs?: number;
  backoffMultiplier?: number;
  /** Decides whether an error is worth another attempt */
  isRetryable?: (error: unknown) => boolean;
  /** Called before each wait */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Injectable for tests */
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_OPTIONS = {
  maxAttempts: 4,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

const RETRYABLE_STATUS = new Set([408, 409, 429, 500, 502, 503, 504]);

const RETRYABLE_MESSAGE_PATTERNS = [
  "rate limit",
  "timeout",
  "timed out",
  "network",
  "econnreset",
  "econnrefused",
  "etimedout",
  "enotfound",
  "socket hang up",
];

/**
 * Error thrown once every attempt has failed
 */
export class RetryExhaustedError extends Error {
  public override readonly cause: unknown;

  constructor(
    message: string,
    public readonly attempts: number,
    cause: unknown
  ) {
    super(message);
    this.name = "RetryExhaustedError";
    this.cause = cause;
  }
}

function statusOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("status" in error)) {
    return undefined;
  }
  const status = error.status;
  return typeof status === "number" ? status : undefined;
}

/**
 * Default classification: HTTP 408/409/429/5xx, or a message that looks like
 * a connection/timeout/rate-limit problem.
 */
export function isTransientError(error: unknown): boolean {
  const status = statusOf(error);
  if (status !== undefined) {
    return RETRYABLE_STATUS.has(status) || status >= 500;
  }
  if (!(error instanceof Error)) {
    return false;
  }
  const text = `${error.name} ${error.message}`.toLowerCase();
  return RETRYABLE_MESSAGE_PATTERNS.some((pattern) => text.includes(pattern));
}

export function backoffDelay(attempt: number, options: RetryOptions = {}): number {
  const initial = options.initialDelayMs ?? DEFAULT_RETRY_OPTIONS.initialDelayMs;
  const multiplier = options.backoffMultiplier ?? DEFAULT_RETRY_OPTIONS.backoffMultiplier;
  const max = options.maxDelayMs ?? DEFAULT_RETRY_OPTIONS.maxDelayMs;
  return Math.min(initial * Math.pow(multiplier, attempt - 1), max);
}

/**
 * `onRetry` hook that logs each retried attempt under a component tag
 */
export function logRetries(tag: string): NonNullable<RetryOptions["onRetry"]> {
  return (error, attempt, delayMs) => {
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`[${tag}] Attempt ${attempt} failed (${reason}); retrying in ${delayMs}ms`);
  };
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Run `fn`, retrying transient failures. Non-retryable errors are rethrown
 * as-is; exhaustion throws RetryExhaustedError wrapping the last error.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_RETRY_OPTIONS.maxAttempts);
  const isRetryable = options.isRetryable ?? isTransientError;
  const sleep = options.sleep ?? defaultSleep;

  let attempt = 0;
  for (;;) {
    attempt++;
    try {
      return await fn();
    } catch (error) {
      if (!isRetryable(error)) {
        throw error;
      }
      if (attempt >= maxAttempts) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new RetryExhaustedError(
          `Gave up after ${attempt} attempts: ${reason}`,
          attempt,
          error
        );
      }
      const delay = backoffDelay(attempt, options);
      options.onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }
}
