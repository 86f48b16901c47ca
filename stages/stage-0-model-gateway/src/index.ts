export { createModelGateway, DEFAULT_MODEL_PROVIDER_MAP } from "./gateway.js";
export {
  createConsoleLogger,
  shouldLog,
  toJsonLine,
  type LogLevel,
} from "./logger.js";
export { DEFAULT_RETRY, isRetryableError, withRetry } from "./retry.js";
export {
  createGatewayModelClient,
  ModelCommunicationError,
} from "./client.js";
export type {
  CompletionOptions,
  ModelClient,
  ModelClientDefaults,
} from "./client.js";
export {
  DEFAULT_DEEPSEEK_BASE_URL,
  DEFAULT_OPENAI_BASE_URL,
} from "./providers/openai.js";
export { ProviderError } from "./providers/types.js";
export type {
  ChatRequest,
  ChatResult,
  DeepSeekConfig,
  GatewayConfig,
  Message,
  ModelGateway,
  OpenAIConfig,
  ProviderConfig,
  ProviderName,
  RequestLogger,
  RetryOptions,
  Role,
  Usage,
} from "./types.js";
