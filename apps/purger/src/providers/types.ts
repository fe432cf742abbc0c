/**
 * CDN provider abstraction layer.
 * Every adapter (CloudFront, Cloudflare, Azure Front Door, Sucuri, Fastly,
 * none, mock) sits behind this one interface; nothing else branches on
 * provider identity.
 */

import type { InvalidationBatch, InvalidationResult, ProviderType } from "../types/domain.js";

export interface CdnProvider {
  /** Provider name for logging */
  readonly name: string;

  readonly providerType: ProviderType;

  /** Distribution id, zone id, endpoint or domain: what the purge applies to */
  readonly target: string;

  /** Maximum paths accepted by one submit() call */
  readonly maxBatchSize: number;

  /**
   * Submit one batch. Never throws: every failure is reported through the
   * result's status and errorKind.
   */
  submit(batch: InvalidationBatch, callerReference: string): Promise<InvalidationResult>;

  /** Purge everything the target serves. Same contract as submit(). */
  purgeAll(batch: InvalidationBatch, callerReference: string): Promise<InvalidationResult>;
}
