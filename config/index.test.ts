import { describe, expect, it } from "vitest";

import { buildGatewayConfig, ConfigError, loadConfig } from "./index.js";

const BASE_ENV = { OPENAI_API_KEY: "test-key" };

function configErrorOf(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) {
      return err;
    }
    throw err;
  }
  throw new Error("expected a ConfigError");
}

describe("loadConfig", () => {
  it("fills in defaults", () => {
    const config = loadConfig(BASE_ENV);
    expect(config).toEqual({
      openaiApiKey: "test-key",
      openaiBaseUrl: "https://api.openai.com/v1",
      openaiOrganization: undefined,
      deepseekApiKey: undefined,
      deepseekBaseUrl: "https://api.deepseek.com/v1",
      defaultModel: "gpt-4o-mini",
      fallbackModels: [],
      logLevel: "error",
      timeoutMs: 30000,
      maxRetries: 2,
      maxToolRounds: 3,
      temperature: 0.1,
      maxTokens: 800,
      followUpMaxTokens: 300,
    });
  });

  it("reads overrides and splits the fallback list", () => {
    const config = loadConfig({
      DEEPSEEK_API_KEY: "test-key",
      DEFAULT_MODEL: "deepseek-chat",
      FALLBACK_MODELS: " gpt-4o-mini , ,deepseek-reasoner",
      LOG_LEVEL: "info",
      MAX_TOOL_ROUNDS: "5",
      TEMPERATURE: "0",
    });
    expect(config.defaultModel).toBe("deepseek-chat");
    expect(config.fallbackModels).toEqual(["gpt-4o-mini", "deepseek-reasoner"]);
    expect(config.logLevel).toBe("info");
    expect(config.maxToolRounds).toBe(5);
    expect(config.temperature).toBe(0);
  });

  it("requires at least one API key", () => {
    const error = configErrorOf(() => loadConfig({}));
    expect(error.errors).toEqual([
      "No API key found. Set OPENAI_API_KEY or DEEPSEEK_API_KEY in .env.",
    ]);
  });

  it("rejects an unknown log level", () => {
    const error = configErrorOf(() =>
      loadConfig({ ...BASE_ENV, LOG_LEVEL: "verbose" })
    );
    expect(error.errors).toEqual([
      "/logLevel must be equal to one of the allowed values",
    ]);
  });

  it("lists every invalid number", () => {
    const error = configErrorOf(() =>
      loadConfig({ ...BASE_ENV, MODEL_TIMEOUT_MS: "soon", MAX_TOKENS: "1.5" })
    );
    expect(error.errors).toEqual([
      "/timeoutMs must be integer",
      "/maxTokens must be integer",
    ]);
    expect(error.message).toBe(
      "Invalid configuration:\n  /timeoutMs must be integer\n  /maxTokens must be integer"
    );
  });
});

describe("buildGatewayConfig", () => {
  it("configures only providers that have keys", () => {
    const config = loadConfig({
      ...BASE_ENV,
      FALLBACK_MODELS: "gpt-4o-mini,deepseek-chat",
      MODEL_MAX_RETRIES: "4",
    });
    const gateway = buildGatewayConfig(config);

    expect(gateway.providers).toEqual({
      openai: {
        apiKey: "test-key",
        baseUrl: "https://api.openai.com/v1",
        organization: undefined,
      },
    });
    expect(gateway.defaultModel).toBe("gpt-4o-mini");
    expect(gateway.fallbackModels).toEqual(["deepseek-chat"]);
    expect(gateway.retry).toEqual({
      maxRetries: 4,
      backoffMs: 300,
      maxBackoffMs: 2000,
      jitter: 0.2,
    });
    expect(gateway.timeoutMs).toBe(30000);
  });

  it("passes the OpenAI organization through", () => {
    const config = loadConfig({ ...BASE_ENV, OPENAI_ORGANIZATION: "org-test" });
    expect(buildGatewayConfig(config).providers.openai?.organization).toBe(
      "org-test"
    );
  });
});
