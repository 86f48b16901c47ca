import type { RetryOptions } from "./types.js";
import { ProviderError } from "./providers/types.js";

export const DEFAULT_RETRY: RetryOptions = {
  maxRetries: 2,
  backoffMs: 300,
  maxBackoffMs: 2000,
  jitter: 0.2,
};

const RETRYABLE_CODES = ["ETIMEDOUT", "ECONNRESET", "ENOTFOUND", "EAI_AGAIN"];

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function withJitter(value: number, jitter: number): number {
  const delta = value * jitter;
  return value + (Math.random() * 2 - 1) * delta;
}

function readStringField(error: object, field: "name" | "code"): string | undefined {
  const value: unknown = Reflect.get(error, field);
  return typeof value === "string" ? value : undefined;
}

/**
 * Transient failures only: HTTP 429 / 5xx, timeouts surfaced as AbortError,
 * and the usual network error codes (also when wrapped as `cause` by fetch).
 */
export function isRetryableError(error: unknown): boolean {
  if (!error || typeof error !== "object") {
    return false;
  }

  if (error instanceof ProviderError) {
    const status = error.status ?? 0;
    return status === 429 || status >= 500;
  }

  if (readStringField(error, "name") === "AbortError") {
    return true;
  }

  const code = readStringField(error, "code");
  if (code) {
    return RETRYABLE_CODES.includes(code);
  }

  const cause: unknown = Reflect.get(error, "cause");
  if (cause && cause !== error) {
    return isRetryableError(cause);
  }

  return false;
}

function backoffFor(
  error: unknown,
  attempt: number,
  retry: RetryOptions
): number {
  if (error instanceof ProviderError && error.retryAfterMs !== undefined) {
    return Math.min(error.retryAfterMs, retry.maxBackoffMs ?? error.retryAfterMs);
  }
  const rawBackoff = retry.backoffMs * Math.pow(2, attempt - 1);
  const cappedBackoff = Math.min(rawBackoff, retry.maxBackoffMs ?? rawBackoff);
  return retry.jitter ? withJitter(cappedBackoff, retry.jitter) : cappedBackoff;
}

/**
 * Retry policy wrapper. Timeouts are injected by the caller through `fn`;
 * once `signal` is aborted no further attempt is made.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: Partial<RetryOptions>,
  signal?: AbortSignal
): Promise<T> {
  const retry: RetryOptions = { ...DEFAULT_RETRY, ...(options ?? {}) };
  let attempt = 0;

  while (true) {
    try {
      return await fn();
    } catch (error) {
      attempt += 1;
      if (
        signal?.aborted ||
        attempt > retry.maxRetries ||
        !isRetryableError(error)
      ) {
        throw error;
      }
      await sleep(Math.max(0, backoffFor(error, attempt, retry)));
    }
  }
}
