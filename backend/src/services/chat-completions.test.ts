import { describe, expect, it, vi } from "vitest";

import { createJsonResponse, createSilentLogger } from "../test-helpers/fakes.js";
import {
  ChatCompletionError,
  createChatCompletionClient,
  extractJson,
  truncateDeterministically,
} from "./chat-completions.js";

const completionPayload = (content: string) => {
  return {
    choices: [{ message: { content } }],
    usage: { prompt_tokens: 30, completion_tokens: 12, total_tokens: 42 },
  };
};

const request = {
  model: "gpt-4.1-mini",
  temperature: 0,
  messages: [{ role: "user" as const, content: "hello" }],
};

describe("createChatCompletionClient", () => {
  it("posts the request with bearer auth and returns the trimmed reply", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      createJsonResponse(completionPayload("  hi there \n"))
    );
    const logger = createSilentLogger();

    const complete = createChatCompletionClient({
      apiKey: "test-key",
      scope: "unit",
      baseUrl: "https://llm.example.test/v1/",
      fetchImpl,
      logger,
    });

    const reply = await complete({ ...request, jsonObject: true });

    expect(reply).toBe("hi there");
    expect(fetchImpl).toHaveBeenCalledTimes(1);

    const firstCall = fetchImpl.mock.calls[0];
    if (!firstCall) {
      throw new Error("Expected a fetch call");
    }

    const [url, init] = firstCall;
    expect(url).toBe("https://llm.example.test/v1/chat/completions");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-key",
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "gpt-4.1-mini",
      temperature: 0,
      messages: [{ role: "user", content: "hello" }],
      response_format: { type: "json_object" },
    });
    expect(logger.info).toHaveBeenCalledWith(
      expect.stringContaining("[unit] model=gpt-4.1-mini request_ms=")
    );
  });

  it("omits response_format for plain text requests", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => createJsonResponse(completionPayload("ok")));

    const complete = createChatCompletionClient({
      apiKey: "test-key",
      scope: "unit",
      fetchImpl,
      logger: createSilentLogger(),
    });

    await complete(request);

    const init = fetchImpl.mock.calls[0]?.[1];
    expect(JSON.parse(String(init?.body))).not.toHaveProperty("response_format");
  });

  it("retries 5xx responses with exponential backoff", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(createJsonResponse({ error: "busy" }, 503))
      .mockResolvedValueOnce(createJsonResponse({ error: "busy" }, 500))
      .mockResolvedValueOnce(createJsonResponse(completionPayload("third time")));
    const sleep = vi.fn(async (_ms: number) => undefined);
    const logger = createSilentLogger();

    const complete = createChatCompletionClient({
      apiKey: "test-key",
      scope: "unit",
      fetchImpl,
      sleep,
      logger,
    });

    await expect(complete(request)).resolves.toBe("third time");
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenNthCalledWith(1, 250);
    expect(sleep).toHaveBeenNthCalledWith(2, 500);
    expect(logger.warn).toHaveBeenCalledWith("[unit] retry_attempt=2 backoff_ms=250");
    expect(logger.warn).toHaveBeenCalledWith("[unit] retry_attempt=3 backoff_ms=500");
  });

  it("waits for Retry-After on 429", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(createJsonResponse({}, 429, { "Retry-After": "2" }))
      .mockResolvedValueOnce(createJsonResponse(completionPayload("done")));
    const sleep = vi.fn(async (_ms: number) => undefined);

    const complete = createChatCompletionClient({
      apiKey: "test-key",
      scope: "unit",
      fetchImpl,
      sleep,
      logger: createSilentLogger(),
    });

    await expect(complete(request)).resolves.toBe("done");
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it("does not retry client errors", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => createJsonResponse({}, 400));
    const sleep = vi.fn(async (_ms: number) => undefined);

    const complete = createChatCompletionClient({
      apiKey: "test-key",
      scope: "unit",
      fetchImpl,
      sleep,
      logger: createSilentLogger(),
    });

    const error = await complete(request).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ChatCompletionError);
    if (!(error instanceof ChatCompletionError)) {
      throw new Error("Expected ChatCompletionError");
    }
    expect(error.reason).toBe("http");
    expect(error.attempts).toBe(1);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("gives up on timeouts after the configured attempts", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new DOMException("timed out", "AbortError");
    });
    const sleep = vi.fn(async (_ms: number) => undefined);

    const complete = createChatCompletionClient({
      apiKey: "test-key",
      scope: "unit",
      fetchImpl,
      sleep,
      maxAttempts: 3,
      logger: createSilentLogger(),
    });

    const error = await complete(request).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ChatCompletionError);
    if (!(error instanceof ChatCompletionError)) {
      throw new Error("Expected ChatCompletionError");
    }
    expect(error.reason).toBe("timeout");
    expect(error.attempts).toBe(3);
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it("treats thrown fetch errors as network failures", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new TypeError("fetch failed");
    });

    const complete = createChatCompletionClient({
      apiKey: "test-key",
      scope: "unit",
      fetchImpl,
      sleep: vi.fn(async (_ms: number) => undefined),
      maxAttempts: 2,
      logger: createSilentLogger(),
    });

    await expect(complete(request)).rejects.toMatchObject({
      name: "ChatCompletionError",
      reason: "network",
      attempts: 2,
    });
  });
});

describe("extractJson", () => {
  it("strips code fences and surrounding prose", () => {
    expect(extractJson('```json\n{"a":1}\n```')).toBe('{"a":1}');
    expect(extractJson('Sure! {"a":{"b":2}} hope that helps')).toBe('{"a":{"b":2}}');
  });

  it("returns null when there is no object", () => {
    expect(extractJson("")).toBeNull();
    expect(extractJson("no braces here")).toBeNull();
    expect(extractJson("} backwards {")).toBeNull();
  });
});

describe("truncateDeterministically", () => {
  it("keeps short values and cuts long ones", () => {
    expect(truncateDeterministically("short", 10)).toBe("short");
    expect(truncateDeterministically("abcdefghij", 4)).toBe("abcd");
  });
});
