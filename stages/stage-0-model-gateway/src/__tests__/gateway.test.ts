import { afterEach, describe, expect, it, vi } from "vitest";

import { createModelGateway } from "../gateway.js";
import type { RequestLogger } from "../types.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function completion(content: string): Response {
  return jsonResponse({
    choices: [{ message: { content }, finish_reason: "stop" }],
    usage: { prompt_tokens: 12, completion_tokens: 4, total_tokens: 16 },
  });
}

function recordingLogger(): { entries: string[]; logger: RequestLogger } {
  const entries: string[] = [];
  return {
    entries,
    logger: {
      logRequest: (e) => entries.push(`request ${e.model}`),
      logResponse: (e) => entries.push(`response ${e.model}`),
      logError: (e) => entries.push(`error ${e.model} ${e.error.message}`),
    },
  };
}

const messages = [{ role: "user" as const, content: "hi" }];

describe("createModelGateway", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts to chat/completions and normalises the reply", async () => {
    const fetchMock = vi.fn().mockResolvedValue(completion("hello"));
    vi.stubGlobal("fetch", fetchMock);
    const { entries, logger } = recordingLogger();

    const gateway = createModelGateway({
      providers: {
        openai: { apiKey: "test-key", baseUrl: "http://model.test/v1" },
      },
      defaultModel: "gpt-4o-mini",
      logger,
    });

    const result = await gateway.chat({ messages, maxTokens: 50 });

    expect(result.content).toBe("hello");
    expect(result.usage).toEqual({
      inputTokens: 12,
      outputTokens: 4,
      totalTokens: 16,
    });
    expect(result.model).toBe("gpt-4o-mini");
    expect(result.provider).toBe("openai");
    expect(entries).toEqual(["request gpt-4o-mini", "response gpt-4o-mini"]);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://model.test/v1/chat/completions");
    expect(init.headers.Authorization).toBe("Bearer test-key");
    expect(JSON.parse(init.body)).toEqual({
      model: "gpt-4o-mini",
      messages,
      max_tokens: 50,
    });
  });

  it("sends the OpenAI organization header when configured", async () => {
    const fetchMock = vi.fn().mockResolvedValue(completion("ok"));
    vi.stubGlobal("fetch", fetchMock);

    const gateway = createModelGateway({
      providers: {
        openai: {
          apiKey: "test-key",
          baseUrl: "http://model.test/v1",
          organization: "org-test",
        },
      },
      defaultModel: "gpt-4o-mini",
      logger: recordingLogger().logger,
    });
    await gateway.chat({ messages });

    const [, init] = fetchMock.mock.calls[0];
    expect(init.headers["OpenAI-Organization"]).toBe("org-test");
  });

  it("retries a 503 and returns the recovered reply", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(
        jsonResponse({ error: { message: "upstream down" } }, 503)
      )
      .mockResolvedValueOnce(completion("recovered"));
    vi.stubGlobal("fetch", fetchMock);
    const { entries, logger } = recordingLogger();

    const gateway = createModelGateway({
      providers: { openai: { apiKey: "test-key" } },
      defaultModel: "gpt-4o-mini",
      retry: { maxRetries: 2, backoffMs: 0, jitter: 0 },
      logger,
    });

    const result = await gateway.chat({ messages });

    expect(result.content).toBe("recovered");
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(entries).toEqual(["request gpt-4o-mini", "response gpt-4o-mini"]);
  });

  it("surfaces a non-retryable provider error after one attempt", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(
        jsonResponse({ error: { message: "bad key", code: "invalid_api_key" } }, 401)
      );
    vi.stubGlobal("fetch", fetchMock);
    const { entries, logger } = recordingLogger();

    const gateway = createModelGateway({
      providers: { openai: { apiKey: "test-key" } },
      defaultModel: "gpt-4o-mini",
      retry: { maxRetries: 2, backoffMs: 0 },
      logger,
    });

    await expect(gateway.chat({ messages })).rejects.toMatchObject({
      name: "ProviderError",
      status: 401,
      code: "invalid_api_key",
      message: "bad key",
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(entries).toEqual([
      "request gpt-4o-mini",
      "error gpt-4o-mini bad key",
    ]);
  });

  it("falls back to the next model when the first one fails", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(
        jsonResponse({ error: { message: "model overloaded" } }, 400)
      )
      .mockResolvedValueOnce(completion("from fallback"));
    vi.stubGlobal("fetch", fetchMock);
    const { entries, logger } = recordingLogger();

    const gateway = createModelGateway({
      providers: {
        openai: { apiKey: "test-key", baseUrl: "http://openai.test/v1" },
        deepseek: { apiKey: "test-key", baseUrl: "http://deepseek.test/v1" },
      },
      defaultModel: "gpt-4o-mini",
      fallbackModels: ["deepseek-chat"],
      retry: { maxRetries: 0, backoffMs: 0 },
      logger,
    });

    const result = await gateway.chat({ messages });

    expect(result.content).toBe("from fallback");
    expect(result.model).toBe("deepseek-chat");
    expect(result.provider).toBe("deepseek");
    expect(fetchMock.mock.calls[1][0]).toBe(
      "http://deepseek.test/v1/chat/completions"
    );
    expect(entries).toEqual([
      "request gpt-4o-mini",
      "error gpt-4o-mini model overloaded",
      "request deepseek-chat",
      "response deepseek-chat",
    ]);
  });

  it("does not call the provider when the request is already aborted", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);
    const controller = new AbortController();
    controller.abort();

    const gateway = createModelGateway({
      providers: { openai: { apiKey: "test-key" } },
      defaultModel: "gpt-4o-mini",
      logger: recordingLogger().logger,
    });

    await expect(
      gateway.chat({ messages, abortSignal: controller.signal })
    ).rejects.toThrow();
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("rejects models without a provider mapping", async () => {
    const gateway = createModelGateway({
      providers: { openai: { apiKey: "test-key" } },
      defaultModel: "mystery-model",
      logger: recordingLogger().logger,
    });

    await expect(gateway.chat({ messages })).rejects.toThrow(
      "No provider mapping found for model: mystery-model"
    );
  });
});
