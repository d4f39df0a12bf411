import {
  DEFAULT_BACKOFF,
  RetryableError,
  backoffDelay,
  isRetryableStatus,
  isTransientFailure,
  parseRetryAfter,
  sleep,
} from "./retry.js";
import type { BackoffPolicy } from "./retry.js";
import { appendExchange } from "./logger.js";
import { ApiError, InputError } from "./errors.js";
import { INTROSPECTION_QUERY, parseIntrospectionResult } from "./introspection.js";
import type { IntrospectionQuery } from "./types.js";

export interface FetchIntrospectionOptions {
  endpoint: string;
  headers?: Record<string, string>;
  /** Per-attempt timeout. */
  timeoutMs?: number;
  retries?: number;
  /** Delays between attempts; `retries` wins over `backoff.retries`. */
  backoff?: Partial<BackoffPolicy>;
  /** NDJSON file every exchange is appended to. */
  logPath?: string;
  /** Called before each wait; `retry` counts from 1. */
  onRetry?: (retry: number, delayMs: number, error: unknown) => void;
}

export const DEFAULT_TIMEOUT_MS = 30_000;

interface AttemptContext {
  endpoint: string;
  requestHeaders: Record<string, string>;
  body: string;
  timeoutMs: number;
  logPath?: string;
}

function isAbortError(error: unknown): boolean {
  return error instanceof DOMException && error.name === "AbortError";
}

function parseJsonBody(bodyText: string, endpoint: string): unknown {
  try {
    return JSON.parse(bodyText);
  } catch {
    throw new InputError(`error parsing response from ${endpoint}: body is not JSON`);
  }
}

/** Send the query once and return the body of a 2xx response. */
async function attemptIntrospection(ctx: AttemptContext, attempt: number): Promise<string> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), ctx.timeoutMs);
  const startTime = Date.now();

  try {
    const response = await fetch(ctx.endpoint, {
      method: "POST",
      headers: ctx.requestHeaders,
      body: ctx.body,
      signal: controller.signal,
    });
    const text = await response.text();

    const responseHeaders: Record<string, string> = {};
    response.headers.forEach((v, k) => {
      responseHeaders[k] = v;
    });

    if (ctx.logPath) {
      await appendExchange(ctx.logPath, {
        endpoint: ctx.endpoint,
        attempt,
        requestHeaders: ctx.requestHeaders,
        status: response.status,
        responseHeaders,
        body: text,
        durationMs: Date.now() - startTime,
      });
    }

    if (!response.ok) {
      const message = `HTTP ${response.status} ${response.statusText} from ${ctx.endpoint}`;
      if (isRetryableStatus(response.status)) {
        throw new RetryableError(
          message,
          response.status,
          parseRetryAfter(response.headers.get("retry-after"))
        );
      }
      throw new ApiError(message, response.status, response.statusText, text, responseHeaders);
    }

    return text;
  } catch (error: unknown) {
    if (isAbortError(error)) {
      throw new Error(
        `Introspection request to ${ctx.endpoint} timed out after ${ctx.timeoutMs / 1000}s`
      );
    }
    throw error;
  } finally {
    clearTimeout(timeout);
  }
}

/**
 * POST the introspection query to a GraphQL endpoint and return the
 * validated `data` payload. Busy responses (408, 429, 5xx) and connection
 * failures are sent again after a back-off.
 *
 * @throws {ApiError} for non-retryable HTTP failures
 * @throws {RetryableError} when busy responses outlast the retries
 * @throws {GraphQLResponseError} when the response carries GraphQL errors
 */
export async function fetchIntrospection(
  options: FetchIntrospectionOptions
): Promise<IntrospectionQuery> {
  const policy: BackoffPolicy = {
    ...DEFAULT_BACKOFF,
    ...options.backoff,
    ...(options.retries !== undefined ? { retries: options.retries } : {}),
  };
  const ctx: AttemptContext = {
    endpoint: options.endpoint,
    requestHeaders: {
      "Content-Type": "application/json",
      Accept: "application/json",
      ...options.headers,
    },
    body: JSON.stringify({
      query: INTROSPECTION_QUERY,
      operationName: "IntrospectionQuery",
    }),
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    logPath: options.logPath,
  };

  for (let attempt = 1; ; attempt++) {
    let bodyText: string;
    try {
      bodyText = await attemptIntrospection(ctx, attempt);
    } catch (error: unknown) {
      if (attempt > policy.retries || !isTransientFailure(error)) {
        throw error;
      }
      const retryAfterMs = error instanceof RetryableError ? error.retryAfterMs : undefined;
      const delay = backoffDelay(attempt, policy, retryAfterMs);
      options.onRetry?.(attempt, delay, error);
      await sleep(delay);
      continue;
    }
    return parseIntrospectionResult(parseJsonBody(bodyText, ctx.endpoint));
  }
}
