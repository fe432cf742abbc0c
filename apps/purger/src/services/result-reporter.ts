import { log } from "../logger.js";
import type {
  BatchLayout,
  InvalidationRequest,
  InvalidationResult,
  RequestStatus,
  RequestSummary,
} from "../types/domain.js";
import { isTerminalRequestStatus } from "../types/domain.js";

// =============================================================================
// Result Reporter
// =============================================================================
// Records request status and per-batch results as the dispatcher produces
// them, and answers "what happened to request X" for the API.
//
// Storage is pluggable: InMemoryResultStore for tests and single-node runs,
// PostgresResultStore (postgres-result-store.ts) when DATABASE_URL is set.
// =============================================================================

export interface StoredRequest {
  request: InvalidationRequest;
  status: RequestStatus;
  totalBatches: number;
  /** Layout of the last dispatch; unset until batching */
  layout?: BatchLayout;
  startedAt?: Date;
  completedAt?: Date;
}

export interface RequestStatusUpdate {
  status: RequestStatus;
  at: Date;
  totalBatches?: number;
  /** Also moves the request to the layout's provider */
  layout?: BatchLayout;
}

export interface ResultStore {
  insertRequest(request: InvalidationRequest): Promise<void>;
  updateRequest(requestId: string, update: RequestStatusUpdate): Promise<void>;
  /** Insert or replace the result for (requestId, batchIndex) */
  upsertResult(result: InvalidationResult, pathCount: number): Promise<void>;
  /** Drop every batch result (before a dispatch under a new layout) */
  deleteResults(requestId: string): Promise<void>;
  getRequest(requestId: string): Promise<StoredRequest | null>;
  getResults(requestId: string): Promise<InvalidationResult[]>;
  /** Most recent first */
  listRequestIds(tenantId: string, limit: number): Promise<string[]>;
}

/**
 * In-memory result store (tests and deployments without Postgres).
 */
export class InMemoryResultStore implements ResultStore {
  private requests = new Map<string, StoredRequest>();
  private results = new Map<string, Map<number, InvalidationResult>>();

  async insertRequest(request: InvalidationRequest): Promise<void> {
    this.requests.set(request.id, { request, status: "created", totalBatches: 0 });
    this.results.set(request.id, new Map());
  }

  async updateRequest(requestId: string, update: RequestStatusUpdate): Promise<void> {
    const stored = this.requests.get(requestId);
    if (!stored) return;

    stored.status = update.status;
    if (update.totalBatches !== undefined) stored.totalBatches = update.totalBatches;
    if (update.layout) {
      stored.layout = update.layout;
      stored.request = { ...stored.request, providerType: update.layout.providerType };
    }
    if (update.status === "batching" && !stored.startedAt) stored.startedAt = update.at;
    if (isTerminalRequestStatus(update.status)) {
      stored.completedAt = update.at;
    } else {
      stored.completedAt = undefined;
    }
  }

  async upsertResult(result: InvalidationResult): Promise<void> {
    let byBatch = this.results.get(result.requestId);
    if (!byBatch) {
      byBatch = new Map();
      this.results.set(result.requestId, byBatch);
    }
    byBatch.set(result.batchIndex, { ...result });
  }

  async deleteResults(requestId: string): Promise<void> {
    this.results.get(requestId)?.clear();
  }

  async getRequest(requestId: string): Promise<StoredRequest | null> {
    const stored = this.requests.get(requestId);
    return stored ? { ...stored } : null;
  }

  async getResults(requestId: string): Promise<InvalidationResult[]> {
    const byBatch = this.results.get(requestId);
    if (!byBatch) return [];
    return [...byBatch.values()].sort((a, b) => a.batchIndex - b.batchIndex);
  }

  async listRequestIds(tenantId: string, limit: number): Promise<string[]> {
    return [...this.requests.values()]
      .filter((stored) => stored.request.tenantId === tenantId)
      .sort((a, b) => b.request.createdAt.getTime() - a.request.createdAt.getTime())
      .slice(0, limit)
      .map((stored) => stored.request.id);
  }
}

/**
 * Aggregate a request and its batch results into the caller-facing summary.
 */
export function summarize(stored: StoredRequest, results: InvalidationResult[]): RequestSummary {
  const succeeded = results.filter((r) => r.status === "succeeded").length;
  const failed = results.filter((r) => r.status === "failed").length;

  return {
    requestId: stored.request.id,
    tenantId: stored.request.tenantId,
    providerType: stored.request.providerType,
    scope: stored.request.scope,
    callerReference: stored.request.callerReference,
    status: stored.status,
    totalPaths: stored.request.paths.length,
    totalBatches: stored.totalBatches,
    succeeded,
    failed,
    pending: Math.max(0, stored.totalBatches - succeeded - failed),
    results,
    createdAt: stored.request.createdAt,
    startedAt: stored.startedAt,
    completedAt: stored.completedAt,
  };
}

export class ResultReporter {
  constructor(private readonly store: ResultStore) {}

  async recordRequest(request: InvalidationRequest): Promise<void> {
    await this.store.insertRequest(request);
    log.request.info(
      {
        requestId: request.id,
        tenantId: request.tenantId,
        provider: request.providerType,
        scope: request.scope,
        paths: request.paths.length,
      },
      "created"
    );
  }

  async recordStatus(
    requestId: string,
    status: RequestStatus,
    options: { totalBatches?: number; layout?: BatchLayout; at?: Date } = {}
  ): Promise<void> {
    await this.store.updateRequest(requestId, {
      status,
      at: options.at ?? new Date(),
      totalBatches: options.totalBatches,
      layout: options.layout,
    });
    log.request.debug({ requestId, status }, "status");
  }

  async recordResult(result: InvalidationResult, pathCount: number): Promise<void> {
    await this.store.upsertResult(result, pathCount);
  }

  async clearResults(requestId: string): Promise<void> {
    await this.store.deleteResults(requestId);
  }

  /** Batch layout the stored results refer to */
  async getLayout(requestId: string): Promise<BatchLayout | null> {
    const stored = await this.store.getRequest(requestId);
    return stored?.layout ?? null;
  }

  async getSummary(requestId: string): Promise<RequestSummary | null> {
    const stored = await this.store.getRequest(requestId);
    if (!stored) return null;
    return summarize(stored, await this.store.getResults(requestId));
  }

  /** Stored request, including its path list and caller reference */
  async getRequest(requestId: string): Promise<InvalidationRequest | null> {
    const stored = await this.store.getRequest(requestId);
    return stored?.request ?? null;
  }

  async listRequests(tenantId: string, options: { limit?: number } = {}): Promise<RequestSummary[]> {
    const ids = await this.store.listRequestIds(tenantId, options.limit ?? 20);
    const summaries = await Promise.all(ids.map((id) => this.getSummary(id)));
    return summaries.filter((summary): summary is RequestSummary => summary !== null);
  }
}
