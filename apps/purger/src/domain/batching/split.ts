/**
 * Batch splitting - pure functions.
 * Divides a validated path list into provider-sized batches.
 */

import type { InvalidationBatch, ProviderType } from "../../types/domain.js";

/**
 * Provider limits - maximum paths per invalidation API request.
 * CloudFront's limit is documented and fixed; the others are defaults that
 * config may override.
 */
export const PROVIDER_LIMITS: Record<ProviderType, number> = {
  cloudfront: 3000,
  cloudflare: 30,
  "azure-front-door": 100,
  "azure-cdn": 100,
  sucuri: 20,
  fastly: 100,
  none: 10_000,
  mock: 1000,
};

export const CLOUDFRONT_MAX_PATHS = PROVIDER_LIMITS.cloudfront;

/**
 * Split paths into batches of at most `limit`, preserving order.
 *
 * @example
 * splitIntoBatches("req-1", ["/a", "/b", "/c"], 2)
 * // [{ sequenceIndex: 0, paths: ["/a", "/b"] }, { sequenceIndex: 1, paths: ["/c"] }]
 */
export function splitIntoBatches(
  requestId: string,
  paths: readonly string[],
  limit: number
): InvalidationBatch[] {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Batch limit must be a positive integer, got ${limit}`);
  }

  const batches: InvalidationBatch[] = [];
  for (let i = 0; i < paths.length; i += limit) {
    batches.push({
      requestId,
      sequenceIndex: batches.length,
      paths: paths.slice(i, i + limit),
    });
  }
  return batches;
}
