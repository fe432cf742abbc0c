import { randomUUID } from "node:crypto";
import { InvalidationDispatcher, type DispatchRetryPolicy } from "../dispatcher/dispatcher.js";
import type { ResultReporter } from "./result-reporter.js";
import type { ProviderConfigSource } from "./provider-config-source.js";
import { createCdnProvider, type BatchLimitOverrides, type TokenProvider } from "../providers/index.js";
import type { CdnProvider } from "../providers/types.js";
import type { ProviderHttpClient } from "../http/provider-http.js";
import type { BatchIdempotencyStore } from "../domain/idempotency/index.js";
import { isPurgeAllRequest, PURGE_ALL_PATH, validatePaths } from "../domain/paths/validate.js";
import { generateCallerReference } from "../domain/utils/caller-reference.js";
import type { DelayProvider } from "../domain/utils/retry.js";
import type { ValidationError } from "../errors.js";
import { log, logFailure, withTraceAsync, getTraceId } from "../logger.js";
import { requestsSubmittedTotal, validationRejectionsTotal } from "../metrics.js";
import type {
  BatchLayout,
  InvalidationRequest,
  ProviderConfig,
  RequestScope,
  RequestSummary,
} from "../types/domain.js";
import { isTerminalRequestStatus, sameLayout } from "../types/domain.js";

// =============================================================================
// Invalidation Service
// =============================================================================
// Inbound interface used by the publish pipeline (through the HTTP API):
// validate -> create request -> dispatch in the background.
//
// submit() returns as soon as the request is recorded; CDN latency never
// gates the caller unless it explicitly asks to wait.
// =============================================================================

export interface InvalidationServiceOptions {
  reporter: ResultReporter;
  providers: ProviderConfigSource;
  idempotency: BatchIdempotencyStore;
  http: ProviderHttpClient;
  retry: DispatchRetryPolicy;
  concurrency: number;
  callerReferencePrefix: string;
  batchLimits?: BatchLimitOverrides;
  claimTtlMs?: number;
  recordTtlMs?: number;
  /** Overrides for tests */
  delayProvider?: DelayProvider;
  tokens?: TokenProvider;
}

export interface SubmitOptions {
  /** Wait for a terminal status (bounded by timeoutMs) */
  wait?: boolean;
  timeoutMs?: number;
  scope?: RequestScope;
}

export type SubmitOutcome =
  | { accepted: false; error: ValidationError }
  | { accepted: true; requestId: string; summary?: RequestSummary; timedOut?: boolean };

export type CancelOutcome = "cancelled" | "not_found" | "not_running";
export type RetryOutcome =
  /** resubmitAll: the provider now cuts batches differently, so every batch goes again */
  | { status: "retrying"; failedBatches: number; resubmitAll: boolean }
  | { status: "not_found" }
  | { status: "running" }
  | { status: "nothing_to_retry" };

interface RunningDispatch {
  controller: AbortController;
  done: Promise<RequestSummary | null>;
}

const DEFAULT_WAIT_TIMEOUT_MS = 30000;

export class InvalidationService {
  private readonly running = new Map<string, RunningDispatch>();

  constructor(private readonly options: InvalidationServiceOptions) {}

  async submit(tenantId: string, rawPaths: readonly unknown[], options: SubmitOptions = {}): Promise<SubmitOutcome> {
    // A bare "/" or "root" in the list means the whole site
    const scope = options.scope ?? (isPurgeAllRequest(rawPaths) ? "all" : "paths");
    const validated = scope === "all" ? { success: true as const, value: [PURGE_ALL_PATH] } : validatePaths(rawPaths);

    if (!validated.success) {
      validationRejectionsTotal.inc();
      log.request.info({ tenantId, error: validated.error.message }, "rejected");
      return { accepted: false, error: validated.error };
    }

    const providerConfig = await this.options.providers.resolve(tenantId);
    const request: InvalidationRequest = {
      id: randomUUID(),
      tenantId,
      paths: validated.value,
      callerReference: generateCallerReference(this.options.callerReferencePrefix),
      providerType: providerConfig.providerType,
      scope,
      createdAt: new Date(),
    };

    await this.options.reporter.recordRequest(request);
    requestsSubmittedTotal.inc({ provider: request.providerType, scope });

    const run = this.start(request, this.createProvider(providerConfig));

    if (!options.wait) {
      return { accepted: true, requestId: request.id };
    }
    return this.waitFor(request.id, run, options.timeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS);
  }

  /** Purge everything the tenant's CDN serves. */
  async purgeEverything(tenantId: string, options: Omit<SubmitOptions, "scope"> = {}): Promise<SubmitOutcome> {
    return this.submit(tenantId, [PURGE_ALL_PATH], { ...options, scope: "all" });
  }

  /**
   * Abandon batches not yet submitted. Batches already with the provider
   * cannot be recalled and finish normally.
   */
  async cancel(requestId: string): Promise<CancelOutcome> {
    const running = this.running.get(requestId);
    if (running) {
      running.controller.abort();
      log.request.info({ requestId }, "cancel requested");
      return "cancelled";
    }
    const summary = await this.options.reporter.getSummary(requestId);
    return summary ? "not_running" : "not_found";
  }

  /**
   * Resubmit the failed batches of a finished request with its original
   * caller reference.
   */
  async retry(requestId: string): Promise<RetryOutcome> {
    if (this.running.has(requestId)) {
      return { status: "running" };
    }

    const request = await this.options.reporter.getRequest(requestId);
    const summary = await this.options.reporter.getSummary(requestId);
    if (!request || !summary) {
      return { status: "not_found" };
    }
    if (!isTerminalRequestStatus(summary.status)) {
      return { status: "running" };
    }

    const failed = new Set(summary.results.filter((r) => r.status === "failed").map((r) => r.batchIndex));
    if (failed.size === 0) {
      return { status: "nothing_to_retry" };
    }

    const provider = this.createProvider(await this.options.providers.resolve(request.tenantId));
    const layout: BatchLayout = {
      providerType: provider.providerType,
      target: provider.target,
      batchSize: provider.maxBatchSize,
    };
    const previous = await this.options.reporter.getLayout(requestId);
    const resubmitAll = !previous || !sameLayout(previous, layout);
    if (resubmitAll) {
      log.request.warn({ requestId, previous, current: layout }, "provider layout changed, resubmitting every batch");
    }

    log.request.info({ requestId, failedBatches: failed.size, resubmitAll }, "retrying");
    this.start(request, provider, resubmitAll ? undefined : failed);
    return { status: "retrying", failedBatches: failed.size, resubmitAll };
  }

  async getStatus(requestId: string): Promise<RequestSummary | null> {
    return this.options.reporter.getSummary(requestId);
  }

  async listRequests(tenantId: string, limit?: number): Promise<RequestSummary[]> {
    return this.options.reporter.listRequests(tenantId, { limit });
  }

  /** True while any dispatch is in progress */
  get activeDispatches(): number {
    return this.running.size;
  }

  /** Wait for all background dispatches (graceful shutdown). */
  async drain(): Promise<void> {
    await Promise.all([...this.running.values()].map((running) => running.done));
  }

  private createProvider(config: ProviderConfig): CdnProvider {
    return createCdnProvider(config, {
      http: this.options.http,
      batchLimits: this.options.batchLimits,
      tokens: this.options.tokens,
      delay: this.options.delayProvider,
    });
  }

  private start(
    request: InvalidationRequest,
    provider: CdnProvider,
    onlyBatches?: ReadonlySet<number>
  ): Promise<RequestSummary | null> {
    const controller = new AbortController();
    const dispatcher = new InvalidationDispatcher({
      provider,
      reporter: this.options.reporter,
      idempotency: this.options.idempotency,
      retry: this.options.retry,
      concurrency: this.options.concurrency,
      claimTtlMs: this.options.claimTtlMs,
      recordTtlMs: this.options.recordTtlMs,
      delayProvider: this.options.delayProvider,
    });

    // Background dispatch keeps the caller's trace id
    const traceId = getTraceId();
    const done = withTraceAsync(
      () => dispatcher.dispatch(request, { signal: controller.signal, onlyBatches }),
      traceId
    )
      .catch(async (error: unknown) => {
        logFailure("dispatch", "dispatch failed", error, { requestId: request.id });
        await this.markFailed(request.id);
        return null;
      })
      .finally(() => {
        this.running.delete(request.id);
      });

    this.running.set(request.id, { controller, done });
    return done;
  }

  /** Leave the request in a terminal state so it can be retried. */
  private async markFailed(requestId: string): Promise<void> {
    try {
      await this.options.reporter.recordStatus(requestId, "failed");
    } catch (error) {
      logFailure("dispatch", "could not mark request failed", error, { requestId });
    }
  }

  private async waitFor(
    requestId: string,
    run: Promise<RequestSummary | null>,
    timeoutMs: number
  ): Promise<SubmitOutcome> {
    let timeoutId: NodeJS.Timeout | undefined;
    const timeout = new Promise<"timeout">((resolve) => {
      timeoutId = setTimeout(() => resolve("timeout"), timeoutMs);
    });

    try {
      const outcome = await Promise.race([run, timeout]);
      if (outcome !== "timeout" && outcome !== null) {
        return { accepted: true, requestId, summary: outcome };
      }
      const summary = (await this.options.reporter.getSummary(requestId)) ?? undefined;
      return { accepted: true, requestId, summary, timedOut: outcome === "timeout" };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
