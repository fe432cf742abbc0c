/**
 * Batch idempotency types.
 *
 * A batch is identified on the provider side by its per-batch caller
 * reference. A batch index only names the same paths under the same batch
 * size, so the store key is (providerType, target, batchSize, callerReference,
 * batchIndex).
 */

import type { ProviderType } from "../../types/domain.js";

export interface BatchKey {
  providerType: ProviderType;
  /** Distribution id, zone id, endpoint name or domain */
  target: string;
  /** Paths per batch in the layout the index refers to */
  batchSize: number;
  callerReference: string;
  batchIndex: number;
}

export type BatchRecord =
  | { status: "submitted" }
  | { status: "succeeded"; providerReference: string };

export type ClaimResult =
  | { claimed: true }
  | { claimed: false; existing: BatchRecord };

/**
 * Idempotency store interface for dependency injection.
 * Allows swapping Redis for an in-memory map in tests and single-node runs.
 */
export interface BatchIdempotencyStore {
  /**
   * Atomically mark a batch as submitted unless it already has a record.
   *
   * @param ttlMs - How long the in-flight claim is honoured
   */
  claim(key: BatchKey, ttlMs: number): Promise<ClaimResult>;

  /** Record the provider's acknowledgement. */
  complete(key: BatchKey, providerReference: string, ttlMs: number): Promise<void>;

  /** Drop the record so a later retry resubmits. */
  release(key: BatchKey): Promise<void>;
}

export function batchKeyString(key: BatchKey): string {
  return `purge:${key.providerType}:${key.target}:${key.batchSize}:${key.callerReference}:${key.batchIndex}`;
}
