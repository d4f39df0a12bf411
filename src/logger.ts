import { appendFile } from "node:fs/promises";

/** One request/response round trip made while introspecting an endpoint. */
export interface IntrospectionExchange {
  endpoint: string;
  attempt: number;
  requestHeaders: Record<string, string>;
  status: number;
  responseHeaders: Record<string, string>;
  body: string;
  durationMs: number;
}

/** The NDJSON line written for an exchange. */
export interface ExchangeLogRecord {
  timestamp: string;
  operation: "IntrospectionQuery";
  endpoint: string;
  attempt: number;
  status: number;
  durationMs: number;
  requestHeaders: Record<string, string>;
  responseHeaders: Record<string, string>;
  bodyLength: number;
  body: string;
}

const SENSITIVE_HEADERS = new Set([
  "authorization",
  "x-api-key",
  "cookie",
  "set-cookie",
  "proxy-authorization",
]);

// A full introspection result runs to megabytes; the head is enough to debug
const MAX_LOGGED_BODY = 10_000;

export function maskHeaders(headers: Record<string, string>): Record<string, string> {
  const masked: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (SENSITIVE_HEADERS.has(key.toLowerCase())) {
      masked[key] = value.length > 4 ? value.slice(0, 4) + "****" : "****";
    } else {
      masked[key] = value;
    }
  }
  return masked;
}

function headOfBody(body: string): string {
  if (body.length <= MAX_LOGGED_BODY) return body;
  return body.slice(0, MAX_LOGGED_BODY) + `... [truncated, ${body.length} total chars]`;
}

export function toLogRecord(
  exchange: IntrospectionExchange,
  now: Date = new Date()
): ExchangeLogRecord {
  return {
    timestamp: now.toISOString(),
    operation: "IntrospectionQuery",
    endpoint: exchange.endpoint,
    attempt: exchange.attempt,
    status: exchange.status,
    durationMs: exchange.durationMs,
    requestHeaders: maskHeaders(exchange.requestHeaders),
    responseHeaders: maskHeaders(exchange.responseHeaders),
    bodyLength: exchange.body.length,
    body: headOfBody(exchange.body),
  };
}

/**
 * Append an exchange to the log at `logPath`. A log that cannot be written
 * produces a warning on stderr and the conversion goes on.
 */
export async function appendExchange(
  logPath: string,
  exchange: IntrospectionExchange
): Promise<void> {
  try {
    await appendFile(logPath, JSON.stringify(toLogRecord(exchange)) + "\n", "utf-8");
  } catch (error) {
    console.error(
      `Warning: could not write request log ${logPath}: ${
        error instanceof Error ? error.message : String(error)
      }`
    );
  }
}
