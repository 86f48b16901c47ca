import type { ChatRequest, ChatResult, ProviderName } from "../types.js";

export interface LLMProvider {
  name: ProviderName;
  chat(request: ChatRequest): Promise<ChatResult>;
}

/** Failure reported by a provider; `status` is the HTTP status when there was a response. */
export class ProviderError extends Error {
  readonly provider: ProviderName;
  readonly status?: number;
  readonly code?: string;
  /** Parsed from a `Retry-After` header, when the provider sent one. */
  readonly retryAfterMs?: number;

  constructor(options: {
    provider: ProviderName;
    message: string;
    status?: number;
    code?: string;
    retryAfterMs?: number;
  }) {
    super(options.message);
    this.name = "ProviderError";
    this.provider = options.provider;
    this.status = options.status;
    this.code = options.code;
    this.retryAfterMs = options.retryAfterMs;
  }
}

/** Seconds form of `Retry-After` only; HTTP-date values are ignored. */
export function parseRetryAfter(header: string | null): number | undefined {
  if (!header) {
    return undefined;
  }
  const seconds = Number(header.trim());
  if (!Number.isFinite(seconds) || seconds < 0) {
    return undefined;
  }
  return seconds * 1000;
}
