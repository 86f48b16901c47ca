import { randomUUID } from "node:crypto";

import { createConsoleLogger } from "./logger.js";
import {
  createDeepSeekProvider,
  createOpenAIProvider,
} from "./providers/openai.js";
import type { LLMProvider } from "./providers/types.js";
import { withRetry } from "./retry.js";
import type {
  ChatRequest,
  ChatResult,
  ErrorLog,
  GatewayConfig,
  ModelGateway,
  ProviderName,
  RequestLogger,
} from "./types.js";

export const DEFAULT_MODEL_PROVIDER_MAP: Record<string, ProviderName> = {
  "gpt-4o-mini": "openai",
  "gpt-4o": "openai",
  "gpt-4.1-mini": "openai",
  "gpt-3.5-turbo": "openai",
  "deepseek-chat": "deepseek",
  "deepseek-reasoner": "deepseek",
};

function resolveTimeout(
  request: ChatRequest,
  config: GatewayConfig
): number | undefined {
  const requestTimeout = request.timeoutMs ?? Number.POSITIVE_INFINITY;
  const configTimeout = config.timeoutMs ?? Number.POSITIVE_INFINITY;
  const min = Math.min(requestTimeout, configTimeout);
  return Number.isFinite(min) ? min : undefined;
}

function createMergedSignal(
  abortSignal: AbortSignal | undefined,
  timeoutMs: number | undefined
): { signal?: AbortSignal; cancel?: () => void } {
  if (!abortSignal && !timeoutMs) {
    return {};
  }

  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;
  const onAbort = () => controller.abort();

  if (timeoutMs) {
    timeoutId = setTimeout(onAbort, timeoutMs);
  }

  if (abortSignal) {
    if (abortSignal.aborted) {
      controller.abort();
    } else {
      abortSignal.addEventListener("abort", onAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    cancel: () => {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
      abortSignal?.removeEventListener("abort", onAbort);
    },
  };
}

function buildProviderRegistry(
  config: GatewayConfig
): Map<ProviderName, LLMProvider> {
  const registry = new Map<ProviderName, LLMProvider>();

  if (config.providers.openai) {
    registry.set("openai", createOpenAIProvider(config.providers.openai));
  }
  if (config.providers.deepseek) {
    registry.set("deepseek", createDeepSeekProvider(config.providers.deepseek));
  }

  return registry;
}

function resolveProviderName(
  model: string,
  explicitProvider: ProviderName | undefined,
  modelProviderMap: Record<string, ProviderName>
): ProviderName {
  if (explicitProvider) {
    return explicitProvider;
  }

  const provider = modelProviderMap[model];
  if (!provider) {
    throw new Error(`No provider mapping found for model: ${model}`);
  }

  return provider;
}

function ensureProvider(
  registry: Map<ProviderName, LLMProvider>,
  providerName: ProviderName
): LLMProvider {
  const provider = registry.get(providerName);
  if (!provider) {
    throw new Error(`Provider not configured: ${providerName}`);
  }
  return provider;
}

function describeError(error: unknown): ErrorLog["error"] {
  if (!(error instanceof Error)) {
    return { name: "Error", message: String(error) };
  }
  const status: unknown = Reflect.get(error, "status");
  const code: unknown = Reflect.get(error, "code");
  return {
    name: error.name,
    message: error.message,
    status: typeof status === "number" ? status : undefined,
    code: typeof code === "string" ? code : undefined,
  };
}

function createLogger(config: GatewayConfig): RequestLogger {
  if (config.logger) {
    return config.logger;
  }
  return createConsoleLogger("info");
}

/**
 * Model gateway: resolves model -> provider, applies timeout and retry per
 * candidate, then falls back through `fallbackModels` in order.
 */
export function createModelGateway(config: GatewayConfig): ModelGateway {
  const modelProviderMap = {
    ...DEFAULT_MODEL_PROVIDER_MAP,
    ...(config.modelProviderMap ?? {}),
  };
  const registry = buildProviderRegistry(config);
  const logger = createLogger(config);

  async function chat(request: ChatRequest): Promise<ChatResult> {
    const model = request.model ?? config.defaultModel;
    if (!model) {
      throw new Error(
        "Model is required. Provide request.model or config.defaultModel."
      );
    }

    const modelsToTry = [
      model,
      ...(config.fallbackModels ?? []).filter((m) => m !== model),
    ];
    const timeoutMs = resolveTimeout(request, config);
    const requestId = request.requestId ?? randomUUID();

    let lastError: unknown;

    for (const candidate of modelsToTry) {
      request.abortSignal?.throwIfAborted();

      const providerName = resolveProviderName(
        candidate,
        request.provider,
        modelProviderMap
      );
      const provider = ensureProvider(registry, providerName);
      const attemptStart = Date.now();

      logger.logRequest({
        timestamp: new Date().toISOString(),
        requestId,
        model: candidate,
        provider: providerName,
        messageCount: request.messages.length,
        timeoutMs,
      });

      try {
        const attempt = async () => {
          const { signal, cancel } = createMergedSignal(
            request.abortSignal,
            timeoutMs
          );
          try {
            return await provider.chat({
              ...request,
              model: candidate,
              provider: providerName,
              requestId,
              abortSignal: signal,
            });
          } finally {
            cancel?.();
          }
        };

        const result = await withRetry(
          attempt,
          config.retry,
          request.abortSignal
        );

        logger.logResponse({
          timestamp: new Date().toISOString(),
          requestId,
          model: candidate,
          provider: providerName,
          durationMs: Date.now() - attemptStart,
          usage: result.usage,
          finishReason: result.finishReason,
        });

        return {
          ...result,
          model: candidate,
          provider: providerName,
          requestId,
        };
      } catch (error) {
        lastError = error;

        logger.logError({
          timestamp: new Date().toISOString(),
          requestId,
          model: candidate,
          provider: providerName,
          durationMs: Date.now() - attemptStart,
          error: describeError(error),
        });
      }
    }

    throw (
      lastError ?? new Error("Model gateway failed without an explicit error.")
    );
  }

  return { chat };
}
