import type { ServiceLogger } from "../lib/logger.js";

type RetryableHttpError = {
  kind: "http";
  status: number;
  retryAfterMs: number | null;
};

type RetryableTimeoutError = {
  kind: "timeout";
};

type RetryableNetworkError = {
  kind: "network";
};

type RetryableError = RetryableHttpError | RetryableTimeoutError | RetryableNetworkError;

type OpenAiResponse = {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
};

export type ChatMessage = {
  role: "system" | "user";
  content: string;
};

export type ChatCompletionRequest = {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  jsonObject?: boolean;
};

export type ChatCompletionClientOptions = {
  apiKey: string;
  /** Prefix for log lines, e.g. "incident-classifier". */
  scope: string;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  requestTimeoutMs?: number;
  maxAttempts?: number;
  logger?: Pick<ServiceLogger, "info" | "warn">;
};

export type ChatCompletionClient = (request: ChatCompletionRequest) => Promise<string>;

export class ChatCompletionError extends Error {
  public constructor(
    message: string,
    public readonly reason: RetryableError["kind"],
    public readonly attempts: number
  ) {
    super(message);
    this.name = "ChatCompletionError";
  }
}

const DEFAULT_BASE_URL = "https://api.openai.com/v1";
const DEFAULT_TIMEOUT_MS = 25_000;
const DEFAULT_MAX_ATTEMPTS = 3;
const BASE_BACKOFF_MS = 250;

const sleep = async (ms: number): Promise<void> => {
  await new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });
};

const isObject = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

const isAbortError = (error: unknown): boolean => {
  return error instanceof Error && error.name === "AbortError";
};

const parseRetryAfterMs = (headerValue: string | null): number | null => {
  if (!headerValue) {
    return null;
  }

  const seconds = Number(headerValue);
  if (Number.isFinite(seconds) && seconds > 0) {
    return Math.floor(seconds * 1000);
  }

  return null;
};

const toRetryableError = (error: unknown): RetryableError | null => {
  if (!isObject(error)) {
    return null;
  }

  const kind = error.kind;
  if (kind === "timeout") {
    return { kind: "timeout" };
  }
  if (kind === "network") {
    return { kind: "network" };
  }

  if (kind === "http" && typeof error.status === "number") {
    const retryAfterMs =
      typeof error.retryAfterMs === "number" && Number.isFinite(error.retryAfterMs)
        ? error.retryAfterMs
        : null;

    return {
      kind: "http",
      status: error.status,
      retryAfterMs,
    };
  }

  return null;
};

const shouldRetry = (retryableError: RetryableError): boolean => {
  if (retryableError.kind === "timeout") {
    return true;
  }
  if (retryableError.kind === "network") {
    return true;
  }

  return retryableError.status === 429 || retryableError.status >= 500;
};

const calculateBackoff = (attempt: number, retryableError: RetryableError): number => {
  if (retryableError.kind === "http" && retryableError.retryAfterMs !== null) {
    return retryableError.retryAfterMs;
  }

  return BASE_BACKOFF_MS * 2 ** (attempt - 1);
};

const describeRetryable = (retryableError: RetryableError): string => {
  return retryableError.kind === "http"
    ? `http status=${retryableError.status}`
    : retryableError.kind;
};

/** Pulls the JSON object out of a reply that may be wrapped in prose or code fences. */
export const extractJson = (raw: string): string | null => {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return null;
  }

  const withoutFences = trimmed.replace(/^```(?:json)?\s*/i, "").replace(/\s*```$/, "");
  const start = withoutFences.indexOf("{");
  const end = withoutFences.lastIndexOf("}");

  if (start === -1 || end === -1 || end <= start) {
    return null;
  }

  return withoutFences.slice(start, end + 1);
};

export const truncateDeterministically = (value: string, maxChars: number): string => {
  if (value.length <= maxChars) {
    return value;
  }

  return value.slice(0, maxChars);
};

const buildRequestBody = (request: ChatCompletionRequest): Record<string, unknown> => {
  return {
    model: request.model,
    temperature: request.temperature,
    messages: request.messages,
    ...(request.jsonObject ? { response_format: { type: "json_object" } } : {}),
  };
};

/**
 * OpenAI chat completions over fetch. Retries 429, 5xx, timeouts and
 * network failures with exponential backoff; resolves to the reply text.
 */
export const createChatCompletionClient = (
  options: ChatCompletionClientOptions
): ChatCompletionClient => {
  const fetchImpl = options.fetchImpl ?? fetch;
  const sleepImpl = options.sleep ?? sleep;
  const now = options.now ?? (() => Date.now());
  const logger = options.logger ?? console;
  const baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
  const timeoutMs = options.requestTimeoutMs ?? DEFAULT_TIMEOUT_MS;
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const scope = options.scope;

  const requestOnce = async (request: ChatCompletionRequest): Promise<string> => {
    const controller = new AbortController();
    const timeout = setTimeout(() => {
      controller.abort();
    }, timeoutMs);
    const startedAt = now();

    try {
      const response = await fetchImpl(`${baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${options.apiKey}`,
        },
        body: JSON.stringify(buildRequestBody(request)),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw {
          kind: "http",
          status: response.status,
          retryAfterMs: parseRetryAfterMs(response.headers.get("retry-after")),
        } satisfies RetryableHttpError;
      }

      const payload = (await response.json().catch(() => null)) as OpenAiResponse | null;
      const content = payload?.choices?.[0]?.message?.content ?? "";

      logger.info(
        `[${scope}] model=${request.model} request_ms=${now() - startedAt} tokens_total=${payload?.usage?.total_tokens ?? 0} prompt_tokens=${payload?.usage?.prompt_tokens ?? 0} completion_tokens=${payload?.usage?.completion_tokens ?? 0}`
      );

      return content.trim();
    } catch (error) {
      if (isAbortError(error)) {
        throw { kind: "timeout" } satisfies RetryableTimeoutError;
      }

      const retryable = toRetryableError(error);
      if (retryable) {
        throw retryable;
      }

      throw { kind: "network" } satisfies RetryableNetworkError;
    } finally {
      clearTimeout(timeout);
    }
  };

  return async (request: ChatCompletionRequest): Promise<string> => {
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      try {
        return await requestOnce(request);
      } catch (error) {
        const retryableError = toRetryableError(error) ?? { kind: "network" };
        const hasNextAttempt = attempt < maxAttempts;

        if (!shouldRetry(retryableError) || !hasNextAttempt) {
          logger.warn(
            `[${scope}] request failed reason=${describeRetryable(retryableError)} attempts=${attempt}`
          );
          throw new ChatCompletionError(
            `Chat completion failed (${describeRetryable(retryableError)}) after ${attempt} attempt(s)`,
            retryableError.kind,
            attempt
          );
        }

        const backoffMs = calculateBackoff(attempt, retryableError);
        logger.warn(`[${scope}] retry_attempt=${attempt + 1} backoff_ms=${backoffMs}`);
        await sleepImpl(backoffMs);
      }
    }

    throw new ChatCompletionError("Chat completion failed", "network", maxAttempts);
  };
};
