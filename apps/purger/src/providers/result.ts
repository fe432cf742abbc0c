/**
 * Helpers shared by the adapters for turning an outcome into an InvalidationResult.
 */

import { log } from "../logger.js";
import { classifyError, RateLimitError, type InvalidationError } from "../errors.js";
import type { InvalidationBatch, InvalidationResult } from "../types/domain.js";

export function succeededResult(batch: InvalidationBatch, providerReference: string): InvalidationResult {
  return {
    requestId: batch.requestId,
    batchIndex: batch.sequenceIndex,
    status: "succeeded",
    providerReference,
    errorKind: null,
    attemptCount: 1,
    timestamp: new Date(),
  };
}

export function failedResult(batch: InvalidationBatch, error: InvalidationError): InvalidationResult {
  const result: InvalidationResult = {
    requestId: batch.requestId,
    batchIndex: batch.sequenceIndex,
    status: "failed",
    providerReference: "",
    errorKind: error.kind,
    errorMessage: error.message,
    attemptCount: 1,
    timestamp: new Date(),
  };
  if (error instanceof RateLimitError && error.retryAfterMs !== undefined) {
    result.retryAfterMs = error.retryAfterMs;
  }
  return result;
}

/**
 * Run one provider call and convert whatever it throws into a failed result.
 * The call resolves to the provider reference on success.
 */
export async function runProviderCall(
  provider: string,
  batch: InvalidationBatch,
  call: () => Promise<string>
): Promise<InvalidationResult> {
  try {
    const providerReference = await call();
    return succeededResult(batch, providerReference);
  } catch (error) {
    const classified = classifyError(error);
    const context = {
      provider,
      requestId: batch.requestId,
      batchIndex: batch.sequenceIndex,
      errorKind: classified.kind,
      error: classified.message,
    };

    // A serialization failure means validated input could not be encoded
    if (classified.kind === "serialization") {
      log.provider.error(context, "batch could not be serialized");
    } else {
      log.provider.warn(context, "batch submission failed");
    }
    return failedResult(batch, classified);
  }
}
