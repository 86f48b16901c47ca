export type ProviderName = "openai" | "deepseek";

export type Role = "system" | "user" | "assistant";

export interface Message {
  role: Role;
  content: string;
}

export interface ChatRequest {
  model?: string;
  provider?: ProviderName;
  messages: Message[];
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  abortSignal?: AbortSignal;
  requestId?: string;
}

export interface Usage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface ChatResult {
  content: string;
  role: "assistant";
  usage?: Usage;
  finishReason?: string;
  model?: string;
  provider?: ProviderName;
  requestId?: string;
}

export interface RetryOptions {
  maxRetries: number;
  backoffMs: number;
  maxBackoffMs?: number;
  jitter?: number;
}

export interface RequestLog {
  timestamp: string;
  requestId: string;
  model: string;
  provider: ProviderName;
  messageCount: number;
  timeoutMs?: number;
}

export interface ResponseLog {
  timestamp: string;
  requestId: string;
  model: string;
  provider: ProviderName;
  durationMs: number;
  usage?: Usage;
  finishReason?: string;
}

export interface ErrorLog {
  timestamp: string;
  requestId: string;
  model: string;
  provider: ProviderName;
  durationMs: number;
  error: {
    name: string;
    message: string;
    status?: number;
    code?: string;
  };
}

export interface RequestLogger {
  logRequest(entry: RequestLog): void;
  logResponse(entry: ResponseLog): void;
  logError(entry: ErrorLog): void;
}

export interface OpenAIConfig {
  apiKey: string;
  baseUrl?: string;
  organization?: string;
}

export interface DeepSeekConfig {
  apiKey: string;
  baseUrl?: string;
}

export interface ProviderConfig {
  openai?: OpenAIConfig;
  deepseek?: DeepSeekConfig;
}

export interface GatewayConfig {
  providers: ProviderConfig;
  defaultModel?: string;
  modelProviderMap?: Record<string, ProviderName>;
  fallbackModels?: string[];
  retry?: RetryOptions;
  timeoutMs?: number;
  logger?: RequestLogger;
}

export interface ModelGateway {
  chat(request: ChatRequest): Promise<ChatResult>;
}
