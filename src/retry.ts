/** How often and how patiently the fetcher re-sends a failed introspection. */
export interface BackoffPolicy {
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  retries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 10_000,
};

// Statuses a GraphQL gateway returns while the server is busy or restarting
const TRANSIENT_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

/** An HTTP response worth sending the introspection query again for. */
export class RetryableError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly retryAfterMs?: number
  ) {
    super(message);
    this.name = "RetryableError";
  }
}

export function isRetryableStatus(status: number): boolean {
  return TRANSIENT_STATUSES.has(status);
}

/**
 * `Retry-After` in either delta-seconds or HTTP-date form.
 */
export function parseRetryAfter(
  header: string | null,
  now: number = Date.now()
): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  const date = Date.parse(header);
  if (!isNaN(date)) return Math.max(0, date - now);
  return undefined;
}

export function isTransientFailure(error: unknown): boolean {
  // fetch rejects with TypeError when the connection fails
  return error instanceof RetryableError || error instanceof TypeError;
}

/**
 * Wait before retry number `retry` (from 1): the server's `Retry-After` when
 * it sent one, otherwise doubling from `baseDelayMs` plus jitter. Both are
 * capped at `maxDelayMs`.
 */
export function backoffDelay(
  retry: number,
  policy: BackoffPolicy,
  retryAfterMs?: number
): number {
  if (retryAfterMs !== undefined) {
    return Math.min(retryAfterMs, policy.maxDelayMs);
  }
  const exponential = policy.baseDelayMs * 2 ** (retry - 1);
  const jitter = Math.random() * policy.baseDelayMs;
  return Math.min(exponential + jitter, policy.maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
