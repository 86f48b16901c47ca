import "dotenv/config";

import {
  DEFAULT_DEEPSEEK_BASE_URL,
  DEFAULT_OPENAI_BASE_URL,
  DEFAULT_RETRY,
  type GatewayConfig,
  type LogLevel,
  type ProviderConfig,
  type RequestLogger,
} from "../stages/stage-0-model-gateway/src/index.js";
import {
  compileValidator,
  type JsonSchema,
} from "../stages/stage-1-tool-system/src/index.js";

export interface ReasonerConfig {
  openaiApiKey?: string;
  openaiBaseUrl: string;
  openaiOrganization?: string;
  deepseekApiKey?: string;
  deepseekBaseUrl: string;
  defaultModel: string;
  fallbackModels: string[];
  logLevel: LogLevel;
  timeoutMs: number;
  maxRetries: number;
  maxToolRounds: number;
  temperature: number;
  maxTokens: number;
  followUpMaxTokens: number;
}

export class ConfigError extends Error {
  readonly errors: readonly string[];

  constructor(errors: string[]) {
    super(`Invalid configuration:\n${errors.map((e) => `  ${e}`).join("\n")}`);
    this.name = "ConfigError";
    this.errors = errors;
  }
}

const CONFIG_SCHEMA: JsonSchema = {
  type: "object",
  properties: {
    openaiApiKey: { type: "string", minLength: 1 },
    openaiBaseUrl: { type: "string", pattern: "^https?://" },
    openaiOrganization: { type: "string", minLength: 1 },
    deepseekApiKey: { type: "string", minLength: 1 },
    deepseekBaseUrl: { type: "string", pattern: "^https?://" },
    defaultModel: { type: "string", minLength: 1 },
    fallbackModels: { type: "array", items: { type: "string", minLength: 1 } },
    logLevel: { enum: ["silent", "error", "info"] },
    timeoutMs: { type: "integer", minimum: 1 },
    maxRetries: { type: "integer", minimum: 0 },
    maxToolRounds: { type: "integer", minimum: 0 },
    temperature: { type: "number", minimum: 0, maximum: 2 },
    maxTokens: { type: "integer", minimum: 1 },
    followUpMaxTokens: { type: "integer", minimum: 1 },
  },
  required: [
    "openaiBaseUrl",
    "deepseekBaseUrl",
    "defaultModel",
    "fallbackModels",
    "logLevel",
    "timeoutMs",
    "maxRetries",
    "maxToolRounds",
    "temperature",
    "maxTokens",
    "followUpMaxTokens",
  ],
};

const validateConfig = compileValidator(CONFIG_SCHEMA);

type Env = Record<string, string | undefined>;

function text(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

// Non-numeric text is kept as-is so the schema reports it.
function numeric(env: Env, key: string, fallback: number): number | string {
  const value = text(env, key);
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isNaN(parsed) ? value : parsed;
}

function list(env: Env, key: string): string[] {
  return (text(env, key) ?? "")
    .split(",")
    .map((m) => m.trim())
    .filter((m) => m !== "");
}

function isLogLevel(value: unknown): value is LogLevel {
  return value === "silent" || value === "error" || value === "info";
}

/** Read and validate settings from the environment (.env is loaded on import). */
export function loadConfig(env: Env = process.env): ReasonerConfig {
  const raw = {
    openaiApiKey: text(env, "OPENAI_API_KEY"),
    openaiBaseUrl: text(env, "OPENAI_BASE_URL") ?? DEFAULT_OPENAI_BASE_URL,
    openaiOrganization: text(env, "OPENAI_ORGANIZATION"),
    deepseekApiKey: text(env, "DEEPSEEK_API_KEY"),
    deepseekBaseUrl: text(env, "DEEPSEEK_BASE_URL") ?? DEFAULT_DEEPSEEK_BASE_URL,
    defaultModel: text(env, "DEFAULT_MODEL") ?? "gpt-4o-mini",
    fallbackModels: list(env, "FALLBACK_MODELS"),
    logLevel: text(env, "LOG_LEVEL") ?? "error",
    timeoutMs: numeric(env, "MODEL_TIMEOUT_MS", 30000),
    maxRetries: numeric(env, "MODEL_MAX_RETRIES", DEFAULT_RETRY.maxRetries),
    maxToolRounds: numeric(env, "MAX_TOOL_ROUNDS", 3),
    temperature: numeric(env, "TEMPERATURE", 0.1),
    maxTokens: numeric(env, "MAX_TOKENS", 800),
    followUpMaxTokens: numeric(env, "FOLLOW_UP_MAX_TOKENS", 300),
  };

  const errors = validateConfig(raw).errors ?? [];
  if (!raw.openaiApiKey && !raw.deepseekApiKey) {
    errors.push("No API key found. Set OPENAI_API_KEY or DEEPSEEK_API_KEY in .env.");
  }
  if (errors.length > 0) {
    throw new ConfigError(errors);
  }

  const {
    logLevel,
    timeoutMs,
    maxRetries,
    maxToolRounds,
    temperature,
    maxTokens,
    followUpMaxTokens,
  } = raw;
  if (
    !isLogLevel(logLevel) ||
    typeof timeoutMs !== "number" ||
    typeof maxRetries !== "number" ||
    typeof maxToolRounds !== "number" ||
    typeof temperature !== "number" ||
    typeof maxTokens !== "number" ||
    typeof followUpMaxTokens !== "number"
  ) {
    throw new ConfigError(["configuration did not match its schema"]);
  }

  return {
    ...raw,
    logLevel,
    timeoutMs,
    maxRetries,
    maxToolRounds,
    temperature,
    maxTokens,
    followUpMaxTokens,
  };
}

/** Providers come from whichever API keys are set; fallbacks never repeat the default model. */
export function buildGatewayConfig(
  config: ReasonerConfig,
  logger?: RequestLogger
): GatewayConfig {
  const providers: ProviderConfig = {};
  if (config.openaiApiKey) {
    providers.openai = {
      apiKey: config.openaiApiKey,
      baseUrl: config.openaiBaseUrl,
      organization: config.openaiOrganization,
    };
  }
  if (config.deepseekApiKey) {
    providers.deepseek = {
      apiKey: config.deepseekApiKey,
      baseUrl: config.deepseekBaseUrl,
    };
  }

  return {
    providers,
    defaultModel: config.defaultModel,
    fallbackModels: config.fallbackModels.filter(
      (m) => m !== config.defaultModel
    ),
    retry: { ...DEFAULT_RETRY, maxRetries: config.maxRetries },
    timeoutMs: config.timeoutMs,
    logger,
  };
}
