import { randomUUID } from "node:crypto";
import { toCompactUtc } from "./time.js";

/**
 * New caller reference for a new logical request.
 * Retries of the same request must reuse the stored value instead.
 *
 * @example
 * generateCallerReference("edgepurge", new Date("2024-01-15T10:30:00Z"))
 * // "edgepurge-20240115T103000Z-8c0f3f2e-..."
 */
export function generateCallerReference(prefix: string, now: Date = new Date()): string {
  return `${prefix}-${toCompactUtc(now)}-${randomUUID()}`;
}

/**
 * Per-batch reference. Each batch of one request is a distinct provider-side
 * invalidation, while a retry of a batch maps to the same reference.
 */
export function batchCallerReference(callerReference: string, sequenceIndex: number): string {
  return `${callerReference}-${sequenceIndex}`;
}
