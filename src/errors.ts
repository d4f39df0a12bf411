import { RetryableError } from "./retry.js";

/** Conversion options that cannot be honoured, e.g. an unknown ID mapping. */
export class InvalidOptionError extends Error {
  constructor(
    message: string,
    public readonly option: string,
    public readonly value: unknown
  ) {
    super(message);
    this.name = "InvalidOptionError";
  }
}

/** Bad flag, environment variable or config file value. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Input document that could not be read or is not an introspection result. */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}

/**
 * Non-retryable HTTP failure from the GraphQL endpoint, carrying status,
 * raw body, and response headers.
 */
export class ApiError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly statusText: string,
    public readonly bodyText: string,
    public readonly responseHeaders: Record<string, string> = {}
  ) {
    super(message);
    this.name = "ApiError";
  }
}

/** The endpoint answered, but with a GraphQL `errors` array. */
export class GraphQLResponseError extends Error {
  constructor(public readonly messages: string[]) {
    super(`GraphQL error: ${messages[0] ?? "unknown error"}`);
    this.name = "GraphQLResponseError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Extract a human-readable error message from common error response formats:
 * - GraphQL: { errors: [{ message }] }
 * - RFC 7807 Problem Details: { title, detail }
 * - Generic: { error: { message } }, { error: "message" } or { message: "..." }
 */
export function extractErrorMessage(bodyText: string): string | undefined {
  if (!bodyText.trim()) return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(bodyText);
  } catch {
    return undefined;
  }

  if (!isRecord(parsed)) return undefined;

  if (Array.isArray(parsed.errors)) {
    const messages = parsed.errors
      .filter(isRecord)
      .map((e) => e.message)
      .filter((m): m is string => typeof m === "string");
    if (messages.length > 0) return messages.join("; ");
  }

  if (typeof parsed.detail === "string") {
    return typeof parsed.title === "string"
      ? `${parsed.title}: ${parsed.detail}`
      : parsed.detail;
  }

  if (isRecord(parsed.error) && typeof parsed.error.message === "string") {
    return parsed.error.message;
  }

  if (typeof parsed.error === "string") return parsed.error;
  if (typeof parsed.message === "string") return parsed.message;

  return undefined;
}

const MAX_RAW_BODY = 500;

/**
 * Render any thrown value as the single line the CLI prints to stderr.
 */
export function formatError(error: unknown): string {
  if (error instanceof ApiError) {
    const extracted = extractErrorMessage(error.bodyText);
    if (extracted) return `${error.message}: ${extracted}`;
    const body = error.bodyText.trim();
    if (!body) return error.message;
    return `${error.message}: ${
      body.length > MAX_RAW_BODY ? body.slice(0, MAX_RAW_BODY) + "..." : body
    }`;
  }
  if (error instanceof RetryableError) {
    return `${error.message} (retries exhausted)`;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}
