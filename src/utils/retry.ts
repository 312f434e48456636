/**
 * Retry policy shared by the transport (HTTP status classification) and the
 * conversation driver (re-issuing a failed turn under a new requestId).
 */

export const MAX_RETRIES = 3;
export const RETRY_BASE_MS = 1000;

const RETRYABLE_STATUS = new Set([408, 429, 502, 503, 504, 529]);

export function isRetryable(status: number): boolean {
  return RETRYABLE_STATUS.has(status);
}

/**
 * Exponential backoff with jitter: base * 2^attempt plus [0, half of that).
 * A Retry-After header (seconds) wins when present and parseable.
 */
export function retryDelay(attempt: number, retryAfter?: string | null, baseMs: number = RETRY_BASE_MS): number {
  if (retryAfter) {
    const secs = Number(retryAfter);
    if (Number.isFinite(secs) && secs >= 0) return secs * 1000;
  }
  const base = baseMs * Math.pow(2, attempt);
  return base + Math.random() * (base / 2);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}
