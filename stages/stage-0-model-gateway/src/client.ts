/**
 * Prompt-in / text-out view of the gateway. The reasoning session only ever
 * sends one opaque prompt and reads back one completion.
 */

import type { ModelGateway } from "./types.js";

export interface CompletionOptions {
  signal?: AbortSignal;
  /** Overrides the client's default for this call. */
  maxTokens?: number;
}

export interface ModelClient {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export interface ModelClientDefaults {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

/** Raised once the gateway has given up (retries and fallbacks exhausted). */
export class ModelCommunicationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ModelCommunicationError";
  }
}

export function createGatewayModelClient(
  gateway: ModelGateway,
  defaults: ModelClientDefaults = {}
): ModelClient {
  return {
    async complete(prompt, options = {}) {
      try {
        const result = await gateway.chat({
          model: defaults.model,
          messages: [{ role: "user", content: prompt }],
          temperature: defaults.temperature,
          maxTokens: options.maxTokens ?? defaults.maxTokens,
          timeoutMs: defaults.timeoutMs,
          abortSignal: options.signal,
        });
        return result.content;
      } catch (err) {
        if (err instanceof ModelCommunicationError) {
          throw err;
        }
        const message = err instanceof Error ? err.message : String(err);
        throw new ModelCommunicationError(`Model request failed: ${message}`, {
          cause: err,
        });
      }
    },
  };
}
