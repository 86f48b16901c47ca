import type {
  ChatRequest,
  ChatResult,
  DeepSeekConfig,
  OpenAIConfig,
  ProviderName,
  Usage,
} from "../types.js";
import { ProviderError, parseRetryAfter, type LLMProvider } from "./types.js";

export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";
export const DEFAULT_DEEPSEEK_BASE_URL = "https://api.deepseek.com/v1";

interface CompletionPayload {
  choices?: Array<{
    message?: { content?: string | null };
    finish_reason?: string | null;
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
}

interface ErrorPayload {
  error?: { message?: string; code?: string | number | null; type?: string };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isCompletionPayload(value: unknown): value is CompletionPayload {
  return (
    isObject(value) &&
    (value.choices === undefined || Array.isArray(value.choices))
  );
}

function isErrorPayload(value: unknown): value is ErrorPayload {
  return isObject(value) && (value.error === undefined || isObject(value.error));
}

function buildHeaders(config: OpenAIConfig): Record<string, string> {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    Authorization: `Bearer ${config.apiKey}`,
  };

  if (config.organization) {
    headers["OpenAI-Organization"] = config.organization;
  }

  return headers;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return undefined;
  }
}

// The body can only be read once, so read it as text and try JSON on that.
async function parseErrorMessage(
  response: Response
): Promise<{ message: string; code?: string }> {
  const text = await response.text();
  const payload = parseJson(text);
  if (isErrorPayload(payload) && payload.error?.message) {
    const code = payload.error.code ?? payload.error.type;
    return {
      message: payload.error.message,
      code: code === null || code === undefined ? undefined : String(code),
    };
  }
  return { message: text || `Request failed with status ${response.status}` };
}

function toUsage(payload: CompletionPayload): Usage | undefined {
  if (!payload.usage) {
    return undefined;
  }
  return {
    inputTokens: payload.usage.prompt_tokens ?? 0,
    outputTokens: payload.usage.completion_tokens ?? 0,
    totalTokens: payload.usage.total_tokens ?? 0,
  };
}

async function callOpenAICompatible(
  providerName: ProviderName,
  request: ChatRequest,
  config: OpenAIConfig,
  defaultBaseUrl: string
): Promise<ChatResult> {
  if (!request.model) {
    throw new ProviderError({
      provider: providerName,
      message: "Model is required for OpenAI-compatible providers.",
    });
  }

  if (!config.apiKey) {
    throw new ProviderError({
      provider: providerName,
      message: "API key is required for OpenAI-compatible providers.",
    });
  }

  const baseUrl = config.baseUrl ?? defaultBaseUrl;
  const response = await fetch(`${baseUrl}/chat/completions`, {
    method: "POST",
    headers: buildHeaders(config),
    body: JSON.stringify({
      model: request.model,
      messages: request.messages,
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    }),
    signal: request.abortSignal,
  });

  if (!response.ok) {
    const errorDetails = await parseErrorMessage(response);
    throw new ProviderError({
      provider: providerName,
      message: errorDetails.message,
      status: response.status,
      code: errorDetails.code,
      retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
    });
  }

  const data: unknown = await response.json();
  if (!isCompletionPayload(data)) {
    throw new ProviderError({
      provider: providerName,
      message: "Unexpected completion payload.",
      status: response.status,
    });
  }

  const choice = data.choices?.[0];
  return {
    content: choice?.message?.content ?? "",
    role: "assistant",
    finishReason: choice?.finish_reason ?? undefined,
    usage: toUsage(data),
  };
}

export function createOpenAICompatibleProvider(
  providerName: ProviderName,
  config: OpenAIConfig,
  defaultBaseUrl: string
): LLMProvider {
  return {
    name: providerName,
    chat(request: ChatRequest) {
      return callOpenAICompatible(
        providerName,
        request,
        config,
        defaultBaseUrl
      );
    },
  };
}

export function createOpenAIProvider(config: OpenAIConfig): LLMProvider {
  return createOpenAICompatibleProvider(
    "openai",
    config,
    DEFAULT_OPENAI_BASE_URL
  );
}

// DeepSeek speaks the same chat-completions protocol; only the base URL differs.
export function createDeepSeekProvider(config: DeepSeekConfig): LLMProvider {
  return createOpenAICompatibleProvider(
    "deepseek",
    config,
    DEFAULT_DEEPSEEK_BASE_URL
  );
}
