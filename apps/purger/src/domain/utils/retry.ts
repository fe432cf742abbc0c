/**
 * Retry strategy for provider submissions.
 * Fully testable with dependency injection for delays.
 *
 * Unlike a throw-based retry loop, provider adapters report failures as values,
 * so the caller decides per outcome whether another attempt is worthwhile.
 */

import { calculateRetryDelay } from "./backoff.js";

export interface RetryOptions<T> {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Base delay in ms between retries */
  baseDelayMs?: number;
  /** Maximum delay in ms */
  maxDelayMs?: number;
  /** Jitter factor 0-1 (default: 0) */
  jitterFactor?: number;
  /** Whether an outcome should be attempted again */
  shouldRetry: (outcome: T) => boolean;
  /** Provider-requested wait for an outcome, if any */
  retryAfterMs?: (outcome: T) => number | undefined;
  /** Callback for each retry attempt */
  onRetry?: (attempt: number, outcome: T, delayMs: number) => void;
}

export interface RetryResult<T> {
  outcome: T;
  attempts: number;
}

export interface DelayProvider {
  delay(ms: number): Promise<void>;
}

/**
 * Default delay provider using setTimeout.
 */
export class TimeoutDelayProvider implements DelayProvider {
  async delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Mock delay provider for testing (instant delays).
 */
export class InstantDelayProvider implements DelayProvider {
  public delays: number[] = [];

  async delay(ms: number): Promise<void> {
    this.delays.push(ms);
  }
}

/**
 * Run an attempt until it produces an outcome that should not be retried,
 * or the attempt ceiling is reached.
 *
 * @param attempt - Receives the 1-based attempt number
 *
 * @example
 * const { outcome, attempts } = await executeWithRetry(
 *   () => provider.submit(batch, ref),
 *   { maxAttempts: 5, shouldRetry: (r) => r.status === "failed" && isRetryableKind(r.errorKind) }
 * );
 */
export async function executeWithRetry<T>(
  attempt: (attemptNumber: number) => Promise<T>,
  options: RetryOptions<T>,
  delayProvider: DelayProvider = new TimeoutDelayProvider()
): Promise<RetryResult<T>> {
  const maxAttempts = Math.max(1, options.maxAttempts);
  let attemptNumber = 1;
  let outcome = await attempt(attemptNumber);

  while (attemptNumber < maxAttempts && options.shouldRetry(outcome)) {
    const delayMs = calculateRetryDelay(attemptNumber - 1, options.retryAfterMs?.(outcome), {
      baseDelayMs: options.baseDelayMs,
      maxDelayMs: options.maxDelayMs,
      jitterFactor: options.jitterFactor,
    });

    options.onRetry?.(attemptNumber, outcome, delayMs);
    await delayProvider.delay(delayMs);

    attemptNumber++;
    outcome = await attempt(attemptNumber);
  }

  return { outcome, attempts: attemptNumber };
}
