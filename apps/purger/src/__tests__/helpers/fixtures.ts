import type { InvalidationBatch, InvalidationRequest } from "../../types/domain.js";

export function batchOf(paths: string[], sequenceIndex = 0, requestId = "req-1"): InvalidationBatch {
  return { requestId, sequenceIndex, paths };
}

export function requestOf(
  paths: string[],
  overrides: Partial<InvalidationRequest> = {}
): InvalidationRequest {
  return {
    id: "req-1",
    tenantId: "tenant-1",
    paths,
    callerReference: "test-20240115T103000Z-ref",
    providerType: "mock",
    scope: "paths",
    createdAt: new Date("2024-01-15T10:30:00Z"),
    ...overrides,
  };
}
