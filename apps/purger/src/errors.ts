/**
 * Error taxonomy for cache invalidation.
 *
 * Provider adapters never let these escape: they are caught at the adapter
 * boundary and turned into an InvalidationResult with the matching errorKind.
 * ValidationError is returned (not thrown) by the path validator.
 */

export type ErrorKind =
  | "validation"
  | "authentication"
  | "rate_limit"
  | "transient_network"
  | "provider"
  | "serialization"
  | "cancelled"
  /** Our own bookkeeping failed (result store unreachable, ...) */
  | "internal";

export abstract class InvalidationError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export interface PathIssue {
  index: number;
  path: string;
  reason: "empty" | "missing_leading_slash" | "control_character" | "invalid_unicode" | "not_a_string";
}

export class ValidationError extends InvalidationError {
  readonly kind = "validation" as const;
  readonly retryable = false;

  constructor(
    message: string,
    readonly issues: PathIssue[] = []
  ) {
    super(message);
  }
}

export class AuthenticationError extends InvalidationError {
  readonly kind = "authentication" as const;
  readonly retryable = false;

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class RateLimitError extends InvalidationError {
  readonly kind = "rate_limit" as const;
  readonly retryable = true;

  constructor(
    message: string,
    /** Provider-requested wait, from Retry-After */
    readonly retryAfterMs?: number
  ) {
    super(message);
  }
}

export class TransientNetworkError extends InvalidationError {
  readonly kind = "transient_network" as const;
  readonly retryable = true;

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ProviderError extends InvalidationError {
  readonly kind = "provider" as const;
  readonly retryable = false;

  constructor(
    message: string,
    readonly status?: number,
    readonly providerCode?: string
  ) {
    super(message);
  }
}

/** Internal defect: validated input that could not be encoded. Never retried. */
export class SerializationError extends InvalidationError {
  readonly kind = "serialization" as const;
  readonly retryable = false;
}

const RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set(["rate_limit", "transient_network"]);

export function isRetryableKind(kind: ErrorKind): boolean {
  return RETRYABLE_KINDS.has(kind);
}

/**
 * Map anything thrown inside an adapter to an InvalidationError.
 * Unknown errors from fetch (connection reset, DNS, abort) are transient.
 */
export function classifyError(error: unknown): InvalidationError {
  if (error instanceof InvalidationError) {
    return error;
  }

  if (error instanceof Error) {
    if (error.name === "AbortError" || error.name === "TimeoutError") {
      return new TransientNetworkError("Request timeout", undefined, { cause: error });
    }
    if (error.name === "TypeError") {
      // fetch() reports network failures as TypeError("fetch failed")
      return new TransientNetworkError(error.message, undefined, { cause: error });
    }
    return new ProviderError(error.message);
  }

  return new ProviderError(String(error));
}
