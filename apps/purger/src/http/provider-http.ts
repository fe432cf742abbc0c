import { createTimer, log } from "../logger.js";
import { parseRetryAfter } from "../domain/utils/backoff.js";
import {
  AuthenticationError,
  ProviderError,
  RateLimitError,
  TransientNetworkError,
  type InvalidationError,
} from "../errors.js";

// =============================================================================
// Provider HTTP Client
// =============================================================================
// Thin wrapper over fetch shared by every CDN adapter:
// - One bounded call per invocation (retries belong to the dispatcher)
// - Request timeout with AbortController, surfaced as TransientNetworkError
// - Status classification into the invalidation error taxonomy
//
// fetch is injectable so adapters are tested without a network.
// =============================================================================

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface ProviderHttpClientOptions {
  /** Per-call timeout (ms) */
  timeoutMs?: number;
  fetch?: FetchFn;
}

export interface ProviderHttpRequest {
  method: "POST" | "GET";
  url: string;
  headers?: Record<string, string>;
  body?: string;
}

export interface ProviderHttpResponse {
  ok: boolean;
  status: number;
  headers: Headers;
  text: string;
  latencyMs: number;
}

const DEFAULT_TIMEOUT_MS = 30000;

export class ProviderHttpClient {
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(options: ProviderHttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Issue a single request. Non-2xx responses are returned, not thrown;
   * timeouts and connection failures throw TransientNetworkError.
   */
  async send(request: ProviderHttpRequest): Promise<ProviderHttpResponse> {
    const timer = createTimer();
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchFn(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });
      const text = await response.text();
      const latencyMs = timer();

      log.provider.debug(
        { url: request.url, status: response.status, latencyMs: Math.round(latencyMs) },
        "provider response"
      );

      return { ok: response.ok, status: response.status, headers: response.headers, text, latencyMs };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TransientNetworkError(`Request timed out after ${this.timeoutMs}ms`, undefined, {
          cause: error,
        });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new TransientNetworkError(`Request failed: ${message}`, undefined, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Classify a provider HTTP status.
 *
 * - 2xx: null (success)
 * - 401, 403: authentication (permanent)
 * - 429: rate limit (transient, honours Retry-After)
 * - 408, 5xx: transient network
 * - 404 and other 4xx: provider (permanent)
 */
export function classifyHttpStatus(
  status: number,
  detail: string,
  retryAfterHeader?: string | null,
  now: Date = new Date()
): InvalidationError | null {
  if (status >= 200 && status < 300) {
    return null;
  }

  const message = detail ? `HTTP ${status}: ${detail}` : `HTTP ${status}`;

  if (status === 401 || status === 403) {
    return new AuthenticationError(message, status);
  }
  if (status === 429) {
    return new RateLimitError(message, parseRetryAfter(retryAfterHeader, now));
  }
  if (status === 408 || status >= 500) {
    return new TransientNetworkError(message, status);
  }
  return new ProviderError(message, status);
}

/**
 * Parse a JSON body, returning undefined for empty or non-JSON text.
 */
export function parseJsonBody(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Trim a provider body down to something safe to put in a log line or error. */
export function truncate(text: string, max = 300): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
