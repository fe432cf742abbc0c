import type { CdnProvider } from "../providers/types.js";
import type { ResultReporter } from "../services/result-reporter.js";
import {
  executeWithRetry,
  TimeoutDelayProvider,
  type DelayProvider,
} from "../domain/utils/retry.js";
import { splitIntoBatches } from "../domain/batching/split.js";
import { PURGE_ALL_PATH } from "../domain/paths/validate.js";
import type { BatchIdempotencyStore, BatchKey, ClaimResult } from "../domain/idempotency/index.js";
import { isRetryableKind } from "../errors.js";
import { createTimer, log, logFailure } from "../logger.js";
import {
  batchDuplicatesTotal,
  batchesTotal,
  batchRetriesTotal,
  batchSubmitDuration,
  requestDispatchDuration,
  requestsCompletedTotal,
  requestsInProgress,
} from "../metrics.js";
import { sameLayout } from "../types/domain.js";
import type {
  BatchLayout,
  InvalidationBatch,
  InvalidationRequest,
  InvalidationResult,
  RequestStatus,
  RequestSummary,
} from "../types/domain.js";

// =============================================================================
// Invalidation Dispatcher
// =============================================================================
// Drives one request through
//   created -> batching -> submitting -> succeeded | partial_failure | failed
//
// Batches go through a bounded worker pool. Each batch is claimed in the
// idempotency store first, so a retry of the same request (same caller
// reference) never resubmits a batch the provider already acknowledged.
// Provider failures never throw out of dispatch(); they end up as status,
// and so does a batch whose bookkeeping failed.
// =============================================================================

export interface DispatchRetryPolicy {
  /** Total attempts including the first */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** 0 disables jitter */
  jitterFactor: number;
}

export interface DispatcherOptions {
  provider: CdnProvider;
  reporter: ResultReporter;
  idempotency: BatchIdempotencyStore;
  retry: DispatchRetryPolicy;
  /** Batches submitted at once (default: 4) */
  concurrency?: number;
  /** How long an in-flight claim blocks other dispatchers */
  claimTtlMs?: number;
  /** How long a succeeded batch is remembered */
  recordTtlMs?: number;
  delayProvider?: DelayProvider;
}

export interface DispatchOptions {
  /** Aborting stops batches that have not started yet */
  signal?: AbortSignal;
  /**
   * Only these batch indexes are (re)submitted; the rest keep their results.
   * Ignored when the provider's layout differs from the stored one, since the
   * indexes would name other paths: every batch is submitted instead.
   */
  onlyBatches?: ReadonlySet<number>;
}

const DEFAULT_CONCURRENCY = 4;
const DEFAULT_CLAIM_TTL_MS = 10 * 60 * 1000;
const DEFAULT_RECORD_TTL_MS = 24 * 60 * 60 * 1000;

/**
 * Request status from the final batch results. A batch left "submitted" was
 * accepted by another dispatch of the same request and counts as accepted.
 */
export function aggregateStatus(results: readonly InvalidationResult[]): RequestStatus {
  const accepted = results.filter((r) => r.status === "succeeded" || r.status === "submitted").length;
  if (results.length > 0 && accepted === results.length) return "succeeded";
  return accepted > 0 ? "partial_failure" : "failed";
}

/**
 * Batches for a request. Purge-everything is always a single wildcard batch.
 */
export function batchesFor(request: InvalidationRequest, limit: number): InvalidationBatch[] {
  if (request.scope === "all") {
    return [{ requestId: request.id, sequenceIndex: 0, paths: [PURGE_ALL_PATH] }];
  }
  return splitIntoBatches(request.id, request.paths, limit);
}

/**
 * Run `worker` over `items` with at most `concurrency` in flight.
 */
async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<void>
): Promise<void> {
  let next = 0;
  const lanes = Array.from({ length: Math.min(concurrency, items.length) }, async () => {
    while (next < items.length) {
      const item = items[next++];
      await worker(item);
    }
  });
  await Promise.all(lanes);
}

export class InvalidationDispatcher {
  private readonly provider: CdnProvider;
  private readonly reporter: ResultReporter;
  private readonly idempotency: BatchIdempotencyStore;
  private readonly retry: DispatchRetryPolicy;
  private readonly concurrency: number;
  private readonly claimTtlMs: number;
  private readonly recordTtlMs: number;
  private readonly delayProvider: DelayProvider;

  constructor(options: DispatcherOptions) {
    this.provider = options.provider;
    this.reporter = options.reporter;
    this.idempotency = options.idempotency;
    this.retry = options.retry;
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
    this.claimTtlMs = options.claimTtlMs ?? DEFAULT_CLAIM_TTL_MS;
    this.recordTtlMs = options.recordTtlMs ?? DEFAULT_RECORD_TTL_MS;
    this.delayProvider = options.delayProvider ?? new TimeoutDelayProvider();
  }

  async dispatch(request: InvalidationRequest, options: DispatchOptions = {}): Promise<RequestSummary> {
    const timer = createTimer();
    const { signal, onlyBatches } = options;

    requestsInProgress.inc();
    try {
      const layout: BatchLayout = {
        providerType: this.provider.providerType,
        target: this.provider.target,
        batchSize: this.provider.maxBatchSize,
      };

      await this.reporter.recordStatus(request.id, "batching");
      const batches = batchesFor(request, layout.batchSize);
      const only = onlyBatches ? await this.reusableSelection(request, layout, onlyBatches) : null;
      const toSubmit = only ? batches.filter((batch) => only.has(batch.sequenceIndex)) : batches;

      if (!only) {
        await this.reporter.clearResults(request.id);
      }
      await this.reporter.recordStatus(request.id, "submitting", { totalBatches: batches.length, layout });
      for (const batch of toSubmit) {
        await this.reporter.recordResult(this.pendingResult(batch), batch.paths.length);
      }

      log.dispatch.info(
        {
          requestId: request.id,
          provider: this.provider.name,
          batches: batches.length,
          submitting: toSubmit.length,
          concurrency: this.concurrency,
        },
        "dispatching"
      );

      await runPool(toSubmit, this.concurrency, async (batch) => {
        try {
          if (signal?.aborted) {
            await this.recordCancelled(batch);
            return;
          }
          await this.submitBatch(request, batch, layout);
        } catch (error) {
          await this.recordInternalFailure(batch, error);
        }
      });

      return await this.finish(request, timer);
    } finally {
      requestsInProgress.dec();
    }
  }

  /**
   * The batch selection, if the stored results were cut the same way as now.
   */
  private async reusableSelection(
    request: InvalidationRequest,
    layout: BatchLayout,
    onlyBatches: ReadonlySet<number>
  ): Promise<ReadonlySet<number> | null> {
    const previous = await this.reporter.getLayout(request.id);
    if (previous && sameLayout(previous, layout)) {
      return onlyBatches;
    }
    log.dispatch.warn(
      { requestId: request.id, previous, current: layout },
      "batch layout changed, submitting every batch"
    );
    return null;
  }

  private async finish(request: InvalidationRequest, timer: () => number): Promise<RequestSummary> {
    const current = await this.reporter.getSummary(request.id);
    if (!current) {
      throw new Error(`Invalidation request ${request.id} disappeared during dispatch`);
    }

    const status = aggregateStatus(current.results);
    await this.reporter.recordStatus(request.id, status);

    const durationMs = timer();
    requestsCompletedTotal.inc({ provider: this.provider.name, status });
    requestDispatchDuration.observe({ provider: this.provider.name }, durationMs / 1000);

    const summary = await this.reporter.getSummary(request.id);
    const fields = {
      requestId: request.id,
      provider: this.provider.name,
      status,
      succeeded: current.succeeded,
      failed: current.failed,
      durationMs: Math.round(durationMs),
    };
    if (status === "succeeded") {
      log.dispatch.info(fields, "completed");
    } else {
      log.dispatch.warn(fields, "completed with failures");
    }
    return summary ?? { ...current, status };
  }

  private async submitBatch(
    request: InvalidationRequest,
    batch: InvalidationBatch,
    layout: BatchLayout
  ): Promise<void> {
    const timer = createTimer();
    const key: BatchKey = {
      providerType: layout.providerType,
      target: layout.target,
      batchSize: layout.batchSize,
      callerReference: request.callerReference,
      batchIndex: batch.sequenceIndex,
    };

    const claim = await this.claim(key);
    if (!claim.claimed) {
      const existing = claim.existing;
      batchDuplicatesTotal.inc({ provider: this.provider.name });
      log.dispatch.info(
        { requestId: request.id, batchIndex: batch.sequenceIndex, existing: existing.status },
        "duplicate batch skipped"
      );
      await this.reporter.recordResult(
        {
          ...this.pendingResult(batch),
          status: existing.status,
          providerReference: existing.status === "succeeded" ? existing.providerReference : "",
        },
        batch.paths.length
      );
      return;
    }

    // Until the claim is settled, any failure must free it for a later retry
    let settled = false;
    try {
      await this.reporter.recordResult(
        { ...this.pendingResult(batch), status: "submitted" },
        batch.paths.length
      );

      const call =
        request.scope === "all"
          ? () => this.provider.purgeAll(batch, request.callerReference)
          : () => this.provider.submit(batch, request.callerReference);

      const { outcome, attempts } = await executeWithRetry(
        call,
        {
          maxAttempts: this.retry.maxAttempts,
          baseDelayMs: this.retry.baseDelayMs,
          maxDelayMs: this.retry.maxDelayMs,
          jitterFactor: this.retry.jitterFactor,
          shouldRetry: (result) =>
            result.status === "failed" && result.errorKind !== null && isRetryableKind(result.errorKind),
          retryAfterMs: (result) => result.retryAfterMs,
          onRetry: (attempt, result, delayMs) => {
            batchRetriesTotal.inc({ provider: this.provider.name, error_kind: result.errorKind ?? "" });
            log.dispatch.warn(
              {
                requestId: request.id,
                batchIndex: batch.sequenceIndex,
                attempt,
                errorKind: result.errorKind,
                delayMs,
              },
              "retrying batch"
            );
          },
        },
        this.delayProvider
      );

      const result: InvalidationResult = { ...outcome, attemptCount: attempts, timestamp: new Date() };
      await this.settleClaim(key, result);
      settled = true;
      await this.reporter.recordResult(result, batch.paths.length);

      batchesTotal.inc({
        provider: this.provider.name,
        status: result.status,
        error_kind: result.errorKind ?? "",
      });
      batchSubmitDuration.observe({ provider: this.provider.name, status: result.status }, timer() / 1000);

      if (result.status === "failed") {
        log.dispatch.error(
          {
            requestId: request.id,
            batchIndex: batch.sequenceIndex,
            errorKind: result.errorKind,
            error: result.errorMessage,
            attempts,
          },
          "batch failed"
        );
      }
    } catch (error) {
      if (!settled) {
        await this.releaseClaim(key);
      }
      throw error;
    }
  }

  /**
   * Claim a batch. If the store is unreachable the batch is submitted anyway;
   * the per-batch caller reference still lets CloudFront drop a duplicate.
   */
  private async claim(key: BatchKey): Promise<ClaimResult> {
    try {
      return await this.idempotency.claim(key, this.claimTtlMs);
    } catch (error) {
      logFailure("cache", "idempotency claim failed", error, { ...key });
      return { claimed: true };
    }
  }

  private async settleClaim(key: BatchKey, result: InvalidationResult): Promise<void> {
    try {
      if (result.status === "succeeded") {
        await this.idempotency.complete(key, result.providerReference, this.recordTtlMs);
      } else {
        await this.idempotency.release(key);
      }
    } catch (error) {
      logFailure("cache", "idempotency update failed", error, { ...key, status: result.status });
    }
  }

  private async releaseClaim(key: BatchKey): Promise<void> {
    try {
      await this.idempotency.release(key);
    } catch (error) {
      logFailure("cache", "idempotency release failed", error, { ...key });
    }
  }

  /**
   * A batch whose bookkeeping threw is marked failed so the request can still
   * reach a terminal status and be retried.
   */
  private async recordInternalFailure(batch: InvalidationBatch, error: unknown): Promise<void> {
    logFailure("dispatch", "batch bookkeeping failed", error, {
      requestId: batch.requestId,
      batchIndex: batch.sequenceIndex,
    });
    batchesTotal.inc({ provider: this.provider.name, status: "failed", error_kind: "internal" });
    try {
      await this.reporter.recordResult(
        {
          ...this.pendingResult(batch),
          status: "failed",
          errorKind: "internal",
          errorMessage: error instanceof Error ? error.message : String(error),
        },
        batch.paths.length
      );
    } catch (recordError) {
      logFailure("dispatch", "could not record batch failure", recordError, {
        requestId: batch.requestId,
        batchIndex: batch.sequenceIndex,
      });
    }
  }

  private async recordCancelled(batch: InvalidationBatch): Promise<void> {
    log.dispatch.info({ requestId: batch.requestId, batchIndex: batch.sequenceIndex }, "batch cancelled");
    batchesTotal.inc({ provider: this.provider.name, status: "failed", error_kind: "cancelled" });
    await this.reporter.recordResult(
      {
        ...this.pendingResult(batch),
        status: "failed",
        errorKind: "cancelled",
        errorMessage: "Cancelled before submission",
      },
      batch.paths.length
    );
  }

  private pendingResult(batch: InvalidationBatch): InvalidationResult {
    return {
      requestId: batch.requestId,
      batchIndex: batch.sequenceIndex,
      status: "pending",
      providerReference: "",
      errorKind: null,
      attemptCount: 0,
      timestamp: new Date(),
    };
  }
}
