import { asc, desc, eq, sql } from "drizzle-orm";
import {
  invalidationRequests,
  invalidationResults,
  type Database,
  type InvalidationRequestRow,
  type InvalidationResultRow,
} from "@edgepurge/db";
import type { RequestStatusUpdate, ResultStore, StoredRequest } from "./result-reporter.js";
import type { ErrorKind, InvalidationRequest, InvalidationResult } from "../types/domain.js";
import { isTerminalRequestStatus } from "../types/domain.js";

const ERROR_KINDS: readonly ErrorKind[] = [
  "validation",
  "authentication",
  "rate_limit",
  "transient_network",
  "provider",
  "serialization",
  "cancelled",
  "internal",
];

function toErrorKind(value: string | null): ErrorKind | null {
  if (value === null) return null;
  return ERROR_KINDS.find((kind) => kind === value) ?? "provider";
}

function toStoredRequest(row: InvalidationRequestRow): StoredRequest {
  return {
    request: {
      id: row.id,
      tenantId: row.tenantId,
      paths: row.paths,
      callerReference: row.callerReference,
      providerType: row.provider,
      scope: row.scope,
      createdAt: row.createdAt,
    },
    status: row.status,
    totalBatches: row.totalBatches,
    layout:
      row.providerTarget !== null && row.batchSize !== null
        ? { providerType: row.provider, target: row.providerTarget, batchSize: row.batchSize }
        : undefined,
    startedAt: row.startedAt ?? undefined,
    completedAt: row.completedAt ?? undefined,
  };
}

function toResult(row: InvalidationResultRow): InvalidationResult {
  return {
    requestId: row.requestId,
    batchIndex: row.batchIndex,
    status: row.status,
    providerReference: row.providerReference,
    errorKind: toErrorKind(row.errorKind),
    errorMessage: row.errorMessage ?? undefined,
    attemptCount: row.attemptCount,
    timestamp: row.updatedAt,
  };
}

/**
 * UPDATE for one status change. started_at keeps the first dispatch's time
 * across retries.
 */
export function requestUpdateQuery(db: Database, requestId: string, update: RequestStatusUpdate) {
  const terminal = isTerminalRequestStatus(update.status);

  return db
    .update(invalidationRequests)
    .set({
      status: update.status,
      ...(update.totalBatches !== undefined && { totalBatches: update.totalBatches }),
      ...(update.layout && {
        provider: update.layout.providerType,
        providerTarget: update.layout.target,
        batchSize: update.layout.batchSize,
      }),
      ...(update.status === "batching" && {
        startedAt: sql`coalesce(${invalidationRequests.startedAt}, ${update.at})`,
      }),
      completedAt: terminal ? update.at : null,
      updatedAt: update.at,
    })
    .where(eq(invalidationRequests.id, requestId));
}

/**
 * Result store over invalidation_requests / invalidation_results.
 */
export class PostgresResultStore implements ResultStore {
  constructor(private readonly db: Database) {}

  async insertRequest(request: InvalidationRequest): Promise<void> {
    await this.db.insert(invalidationRequests).values({
      id: request.id,
      tenantId: request.tenantId,
      provider: request.providerType,
      scope: request.scope,
      callerReference: request.callerReference,
      paths: [...request.paths],
      totalPaths: request.paths.length,
      status: "created",
      createdAt: request.createdAt,
    });
  }

  async updateRequest(requestId: string, update: RequestStatusUpdate): Promise<void> {
    await requestUpdateQuery(this.db, requestId, update);
  }

  async upsertResult(result: InvalidationResult, pathCount: number): Promise<void> {
    const values = {
      status: result.status,
      providerReference: result.providerReference,
      errorKind: result.errorKind,
      errorMessage: result.errorMessage ?? null,
      attemptCount: result.attemptCount,
      updatedAt: result.timestamp,
    };

    await this.db
      .insert(invalidationResults)
      .values({ requestId: result.requestId, batchIndex: result.batchIndex, pathCount, ...values })
      .onConflictDoUpdate({
        target: [invalidationResults.requestId, invalidationResults.batchIndex],
        set: values,
      });
  }

  async deleteResults(requestId: string): Promise<void> {
    await this.db.delete(invalidationResults).where(eq(invalidationResults.requestId, requestId));
  }

  async getRequest(requestId: string): Promise<StoredRequest | null> {
    const row = await this.db.query.invalidationRequests.findFirst({
      where: eq(invalidationRequests.id, requestId),
    });
    return row ? toStoredRequest(row) : null;
  }

  async getResults(requestId: string): Promise<InvalidationResult[]> {
    const rows = await this.db.query.invalidationResults.findMany({
      where: eq(invalidationResults.requestId, requestId),
      orderBy: [asc(invalidationResults.batchIndex)],
    });
    return rows.map(toResult);
  }

  async listRequestIds(tenantId: string, limit: number): Promise<string[]> {
    const rows = await this.db
      .select({ id: invalidationRequests.id })
      .from(invalidationRequests)
      .where(eq(invalidationRequests.tenantId, tenantId))
      .orderBy(desc(invalidationRequests.createdAt))
      .limit(limit);
    return rows.map((row) => row.id);
  }
}
