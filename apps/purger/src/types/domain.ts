/**
 * Invalidation domain types - shared across validator, splitter, providers,
 * dispatcher and reporter.
 *
 * Provider credential shapes come from @edgepurge/db (single source of truth
 * for what is stored in cdn_settings).
 */

import type {
  CloudFrontConfig,
  CloudflareConfig,
  AzureFrontDoorConfig,
  AzureCdnConfig,
  SucuriConfig,
  FastlyConfig,
  MockConfig,
  ProviderType,
  RequestStatus,
  RequestScope,
  BatchResultStatus,
} from "@edgepurge/db";
import type { ErrorKind } from "../errors.js";

export type { ProviderType, RequestStatus, RequestScope, BatchResultStatus, ErrorKind };

// =============================================================================
// PROVIDER CONFIG (tagged union)
// =============================================================================

export type ProviderConfig =
  | { readonly providerType: "cloudfront"; readonly settings: Readonly<CloudFrontConfig> }
  | { readonly providerType: "cloudflare"; readonly settings: Readonly<CloudflareConfig> }
  | { readonly providerType: "azure-front-door"; readonly settings: Readonly<AzureFrontDoorConfig> }
  | { readonly providerType: "azure-cdn"; readonly settings: Readonly<AzureCdnConfig> }
  | { readonly providerType: "sucuri"; readonly settings: Readonly<SucuriConfig> }
  | { readonly providerType: "fastly"; readonly settings: Readonly<FastlyConfig> }
  | { readonly providerType: "mock"; readonly settings: Readonly<MockConfig> }
  | { readonly providerType: "none" };

// =============================================================================
// REQUEST / BATCH / RESULT
// =============================================================================

export interface InvalidationRequest {
  readonly id: string;
  readonly tenantId: string;
  readonly paths: readonly string[];
  /** Idempotency token. Reused on retry, never across logical requests. */
  readonly callerReference: string;
  readonly providerType: ProviderType;
  readonly scope: RequestScope;
  readonly createdAt: Date;
}

export interface InvalidationBatch {
  readonly requestId: string;
  readonly sequenceIndex: number;
  readonly paths: readonly string[];
}

/**
 * How a request's paths were cut into batches. A batch index only names the
 * same paths under the same layout.
 */
export interface BatchLayout {
  readonly providerType: ProviderType;
  readonly target: string;
  readonly batchSize: number;
}

export function sameLayout(a: BatchLayout, b: BatchLayout): boolean {
  return a.providerType === b.providerType && a.target === b.target && a.batchSize === b.batchSize;
}

export interface InvalidationResult {
  requestId: string;
  batchIndex: number;
  status: BatchResultStatus;
  /** Opaque id returned by the provider (e.g. CloudFront invalidation id) */
  providerReference: string;
  errorKind: ErrorKind | null;
  errorMessage?: string;
  /** Provider-requested wait before the next attempt */
  retryAfterMs?: number;
  attemptCount: number;
  timestamp: Date;
}

export interface RequestSummary {
  requestId: string;
  tenantId: string;
  providerType: ProviderType;
  scope: RequestScope;
  callerReference: string;
  status: RequestStatus;
  totalPaths: number;
  totalBatches: number;
  succeeded: number;
  failed: number;
  pending: number;
  results: InvalidationResult[];
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
}

export const TERMINAL_REQUEST_STATUSES: ReadonlySet<RequestStatus> = new Set([
  "succeeded",
  "partial_failure",
  "failed",
]);

export function isTerminalRequestStatus(status: RequestStatus): boolean {
  return TERMINAL_REQUEST_STATUSES.has(status);
}
