import { describe, it, expect, afterEach } from "vitest";
import { InvalidationService, type InvalidationServiceOptions } from "../../../services/invalidation-service.js";
import { InMemoryResultStore, ResultReporter } from "../../../services/result-reporter.js";
import {
  StaticProviderConfigSource,
  type ProviderConfigSource,
} from "../../../services/provider-config-source.js";
import { InMemoryIdempotencyStore } from "../../../domain/idempotency/index.js";
import { InstantDelayProvider } from "../../../domain/utils/retry.js";
import type { ProviderConfig } from "../../../types/domain.js";
import { fakeHttp } from "../../helpers/fake-fetch.js";
import { FlakyResultStore } from "../../helpers/flaky-result-store.js";

const mock = (mode: "success" | "fail"): ProviderConfig => ({
  providerType: "mock",
  settings: { mode, failureRate: 0, latencyMs: 0 },
});

/** Provider source whose answer can be changed between calls */
class SwitchableSource implements ProviderConfigSource {
  constructor(public current: ProviderConfig) {}

  async resolve(): Promise<ProviderConfig> {
    return this.current;
  }
}

const cloudflare: ProviderConfig = {
  providerType: "cloudflare",
  settings: { zoneId: "zone-1", apiToken: "test-token", siteUrl: "https://example.com" },
};

function createService(
  providers: ProviderConfigSource = new StaticProviderConfigSource({ providerType: "none" }),
  overrides: Partial<InvalidationServiceOptions> = {}
) {
  const { http, fetch } = fakeHttp({ status: 500 });
  const service = new InvalidationService({
    reporter: new ResultReporter(new InMemoryResultStore()),
    providers,
    idempotency: new InMemoryIdempotencyStore(),
    http,
    retry: { maxAttempts: 3, baseDelayMs: 10, maxDelayMs: 100, jitterFactor: 0 },
    concurrency: 2,
    callerReferencePrefix: "test",
    delayProvider: new InstantDelayProvider(),
    ...overrides,
  });
  return { service, fetch };
}

describe("InvalidationService", () => {
  let service: InvalidationService;

  afterEach(async () => {
    await service.drain();
  });

  describe("submit", () => {
    it("should reject invalid paths without creating a request", async () => {
      ({ service } = createService());

      const outcome = await service.submit("tenant-1", []);

      expect(outcome.accepted).toBe(false);
      if (outcome.accepted) return;
      expect(outcome.error.message).toBe("At least one path is required");
      expect(await service.listRequests("tenant-1")).toEqual([]);
    });

    it("should accept and dispatch in the background", async () => {
      ({ service } = createService());

      const outcome = await service.submit("tenant-1", ["/a.html", "/b.html"]);

      expect(outcome.accepted).toBe(true);
      if (!outcome.accepted) return;
      expect(outcome.summary).toBeUndefined();
      expect(service.activeDispatches).toBe(1);

      await service.drain();

      expect(service.activeDispatches).toBe(0);
      expect(await service.getStatus(outcome.requestId)).toMatchObject({
        status: "succeeded",
        providerType: "none",
        totalPaths: 2,
        totalBatches: 1,
      });
    });

    it("should wait for the final summary when asked", async () => {
      const created = createService();
      service = created.service;

      const outcome = await service.submit("tenant-1", ["/a.html", " /a.html", "/b.html"], { wait: true });

      expect(outcome.accepted).toBe(true);
      if (!outcome.accepted) return;
      expect(outcome.timedOut).toBeUndefined();
      expect(outcome.summary).toMatchObject({ status: "succeeded", totalPaths: 2, scope: "paths" });
      expect(outcome.summary?.callerReference).toMatch(/^test-\d{8}T\d{6}Z-/);
      expect(created.fetch).not.toHaveBeenCalled();
    });

    it("should treat a bare slash as purge-everything", async () => {
      ({ service } = createService());

      const outcome = await service.submit("tenant-1", ["/"], { wait: true });

      expect(outcome.accepted && outcome.summary?.scope).toBe("all");
    });
  });

  describe("purgeEverything", () => {
    it("should record a single wildcard path", async () => {
      ({ service } = createService());

      const outcome = await service.purgeEverything("tenant-1", { wait: true });

      expect(outcome.accepted).toBe(true);
      if (!outcome.accepted) return;
      expect(outcome.summary).toMatchObject({ scope: "all", totalPaths: 1, totalBatches: 1, status: "succeeded" });
    });
  });

  describe("retry", () => {
    it("should resubmit failed batches with the original caller reference", async () => {
      const source = new SwitchableSource(mock("fail"));
      ({ service } = createService(source));

      const first = await service.submit("tenant-1", ["/a.html"], { wait: true });
      if (!first.accepted) throw new Error("expected the request to be accepted");
      expect(first.summary).toMatchObject({ status: "failed", failed: 1 });
      expect(first.summary?.results[0]).toMatchObject({ errorKind: "transient_network", attemptCount: 3 });

      source.current = mock("success");
      const retried = await service.retry(first.requestId);
      await service.drain();

      expect(retried).toEqual({ status: "retrying", failedBatches: 1, resubmitAll: false });
      const summary = await service.getStatus(first.requestId);
      expect(summary).toMatchObject({ status: "succeeded", succeeded: 1, failed: 0 });
      expect(summary?.callerReference).toBe(first.summary?.callerReference);
    });

    it("should resubmit every path when the tenant moved to a provider with smaller batches", async () => {
      const source = new SwitchableSource(mock("fail"));
      const { http, fetch } = fakeHttp({
        status: 200,
        body: JSON.stringify({ success: true, errors: [], messages: [], result: { id: "purge-1" } }),
      });
      ({ service } = createService(source, { http, batchLimits: { cloudflare: 2 } }));

      const first = await service.submit("tenant-1", ["/a.html", "/b.html", "/c.html"], { wait: true });
      if (!first.accepted) throw new Error("expected the request to be accepted");
      expect(first.summary).toMatchObject({ status: "failed", totalBatches: 1 });

      source.current = cloudflare;
      const retried = await service.retry(first.requestId);
      await service.drain();

      expect(retried).toEqual({ status: "retrying", failedBatches: 1, resubmitAll: true });
      expect(fetch.mock.calls.map(([, init]) => init.body).sort()).toEqual([
        '{"files":["https://example.com/a.html","https://example.com/b.html"]}',
        '{"files":["https://example.com/c.html"]}',
      ]);
      expect(await service.getStatus(first.requestId)).toMatchObject({
        status: "succeeded",
        providerType: "cloudflare",
        totalBatches: 2,
        succeeded: 2,
        failed: 0,
      });
    });

    it("should retry a batch whose result could not be stored", async () => {
      const store = new FlakyResultStore();
      store.failNextUpsert((result) => result.status === "submitted");
      ({ service } = createService(undefined, { reporter: new ResultReporter(store) }));

      const first = await service.submit("tenant-1", ["/a.html"], { wait: true });
      if (!first.accepted) throw new Error("expected the request to be accepted");
      expect(first.summary).toMatchObject({ status: "failed", failed: 1 });
      expect(first.summary?.results[0]).toMatchObject({ errorKind: "internal", errorMessage: "connection reset" });

      expect(await service.retry(first.requestId)).toEqual({
        status: "retrying",
        failedBatches: 1,
        resubmitAll: false,
      });
      await service.drain();

      expect(await service.getStatus(first.requestId)).toMatchObject({ status: "succeeded", succeeded: 1 });
    });

    it("should end in failed when the dispatch itself breaks", async () => {
      const store = new FlakyResultStore();
      store.failNextResultsRead();
      ({ service } = createService(undefined, { reporter: new ResultReporter(store) }));

      const outcome = await service.submit("tenant-1", ["/a.html"]);
      if (!outcome.accepted) throw new Error("expected the request to be accepted");
      await service.drain();

      expect(await service.getStatus(outcome.requestId)).toMatchObject({ status: "failed" });
      expect(await service.retry(outcome.requestId)).toEqual({ status: "nothing_to_retry" });
    });

    it("should refuse while the request is still running", async () => {
      ({ service } = createService());

      const outcome = await service.submit("tenant-1", ["/a.html"]);
      if (!outcome.accepted) throw new Error("expected the request to be accepted");

      expect(await service.retry(outcome.requestId)).toEqual({ status: "running" });
    });

    it("should have nothing to retry after success", async () => {
      ({ service } = createService());

      const outcome = await service.submit("tenant-1", ["/a.html"], { wait: true });
      if (!outcome.accepted) throw new Error("expected the request to be accepted");

      expect(await service.retry(outcome.requestId)).toEqual({ status: "nothing_to_retry" });
    });

    it("should report unknown requests", async () => {
      ({ service } = createService());
      expect(await service.retry("3f1c0b5e-0000-4000-8000-000000000000")).toEqual({ status: "not_found" });
    });
  });

  describe("cancel", () => {
    it("should cancel a running dispatch", async () => {
      ({ service } = createService());

      const outcome = await service.submit("tenant-1", ["/a.html"]);
      if (!outcome.accepted) throw new Error("expected the request to be accepted");

      expect(await service.cancel(outcome.requestId)).toBe("cancelled");
      await service.drain();

      const summary = await service.getStatus(outcome.requestId);
      expect(["succeeded", "failed"]).toContain(summary?.status);
    });

    it("should not cancel a finished request", async () => {
      ({ service } = createService());

      const outcome = await service.submit("tenant-1", ["/a.html"], { wait: true });
      if (!outcome.accepted) throw new Error("expected the request to be accepted");

      expect(await service.cancel(outcome.requestId)).toBe("not_running");
    });

    it("should report unknown requests", async () => {
      ({ service } = createService());
      expect(await service.cancel("missing")).toBe("not_found");
    });
  });

  it("should list a tenant's requests", async () => {
    ({ service } = createService());

    await service.submit("tenant-1", ["/a.html"], { wait: true });
    await service.submit("tenant-2", ["/b.html"], { wait: true });

    const listed = await service.listRequests("tenant-1");
    expect(listed).toHaveLength(1);
    expect(listed[0].tenantId).toBe("tenant-1");
  });
});
