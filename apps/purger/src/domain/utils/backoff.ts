/**
 * Pure utility functions for exponential backoff calculation.
 * These are fully unit-testable with no side effects.
 */

export interface BackoffOptions {
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Jitter factor 0-1 to add randomness (default: 0) */
  jitterFactor?: number;
}

const DEFAULT_BACKOFF_OPTIONS: Required<BackoffOptions> = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0,
};

/**
 * Calculate exponential backoff delay.
 *
 * @param attempt - The attempt number (0-indexed, so first retry is attempt 0)
 *
 * @example
 * // Default: 1s, 2s, 4s, 8s, 16s, 30s (capped)
 * calculateBackoff(0) // 1000
 * calculateBackoff(1) // 2000
 * calculateBackoff(5) // 30000 (capped)
 */
export function calculateBackoff(attempt: number, options?: BackoffOptions): number {
  // Explicit undefined in options falls back to the default
  const baseDelayMs = options?.baseDelayMs ?? DEFAULT_BACKOFF_OPTIONS.baseDelayMs;
  const maxDelayMs = options?.maxDelayMs ?? DEFAULT_BACKOFF_OPTIONS.maxDelayMs;
  const jitterFactor = options?.jitterFactor ?? DEFAULT_BACKOFF_OPTIONS.jitterFactor;

  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);

  if (jitterFactor > 0) {
    const jitter = cappedDelay * jitterFactor * Math.random();
    return Math.floor(cappedDelay + jitter);
  }

  return cappedDelay;
}

/**
 * Delay before the next provider attempt.
 * A provider's Retry-After wins when it asks for longer than our backoff,
 * but is still capped at maxDelayMs.
 */
export function calculateRetryDelay(
  attempt: number,
  retryAfterMs: number | undefined,
  options?: BackoffOptions
): number {
  const backoff = calculateBackoff(attempt, options);
  if (retryAfterMs === undefined || retryAfterMs <= backoff) {
    return backoff;
  }
  const maxDelayMs = options?.maxDelayMs ?? DEFAULT_BACKOFF_OPTIONS.maxDelayMs;
  return Math.min(retryAfterMs, maxDelayMs);
}

/**
 * Parse an HTTP Retry-After header (delta-seconds or HTTP-date) into ms.
 */
export function parseRetryAfter(value: string | null | undefined, now: Date = new Date()): number | undefined {
  if (!value) return undefined;

  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000);
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now.getTime());
}
