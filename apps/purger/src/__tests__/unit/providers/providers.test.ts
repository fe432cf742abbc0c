import { describe, it, expect } from "vitest";
import { AzureCdnProvider, createCdnProvider, MockCdnProvider, NoneProvider } from "../../../providers/index.js";
import { InstantDelayProvider } from "../../../domain/utils/retry.js";
import { fakeHttp } from "../../helpers/fake-fetch.js";
import { batchOf } from "../../helpers/fixtures.js";

describe("NoneProvider", () => {
  it("should succeed with an empty reference and no outbound call", async () => {
    const { http, fetch } = fakeHttp({ status: 500 });
    const provider = createCdnProvider({ providerType: "none" }, { http });

    const result = await provider.submit(batchOf(["/a.html", "/b.html"], 3), "ref-1");

    expect(provider).toBeInstanceOf(NoneProvider);
    expect(result).toMatchObject({
      requestId: "req-1",
      batchIndex: 3,
      status: "succeeded",
      providerReference: "",
      errorKind: null,
    });
    expect(fetch).not.toHaveBeenCalled();
  });

  it("should succeed for purge-all too", async () => {
    const result = await new NoneProvider().purgeAll(batchOf(["/*"]));
    expect(result.status).toBe("succeeded");
  });
});

describe("MockCdnProvider", () => {
  it("should number references in success mode", async () => {
    const provider = new MockCdnProvider({ mode: "success", latencyMs: 0 }, new InstantDelayProvider());

    const first = await provider.submit(batchOf(["/a"]), "ref-1");
    const second = await provider.submit(batchOf(["/b"], 1), "ref-1");

    expect(first.providerReference).toBe("mock-1");
    expect(second.providerReference).toBe("mock-2");
  });

  it("should fail transiently in fail mode", async () => {
    const provider = new MockCdnProvider({ mode: "fail", latencyMs: 0 }, new InstantDelayProvider());

    const result = await provider.submit(batchOf(["/a"]), "ref-1");

    expect(result).toMatchObject({
      status: "failed",
      errorKind: "transient_network",
      errorMessage: "Simulated failure",
    });
  });

  it("should fail below the failure rate in random mode", async () => {
    const delay = new InstantDelayProvider();
    const unlucky = new MockCdnProvider({ mode: "random", failureRate: 0.1, latencyMs: 0 }, delay, () => 0.05);
    const lucky = new MockCdnProvider({ mode: "random", failureRate: 0.1, latencyMs: 0 }, delay, () => 0.5);

    expect((await unlucky.submit(batchOf(["/a"]), "ref-1")).status).toBe("failed");
    expect((await lucky.submit(batchOf(["/a"]), "ref-1")).status).toBe("succeeded");
  });

  it("should simulate latency through the delay provider", async () => {
    const delay = new InstantDelayProvider();
    const provider = new MockCdnProvider({ mode: "success", latencyMs: 50 }, delay);

    await provider.purgeAll(batchOf(["/*"]), "ref-1");

    expect(delay.delays).toEqual([50]);
  });
});

describe("createCdnProvider", () => {
  const { http } = fakeHttp({ status: 200 });

  it("should apply configured batch limits", () => {
    const provider = createCdnProvider(
      { providerType: "cloudflare", settings: { zoneId: "zone-1", apiToken: "test-token" } },
      { http, batchLimits: { cloudflare: 10 } }
    );
    expect(provider.name).toBe("cloudflare");
    expect(provider.maxBatchSize).toBe(10);
  });

  it("should keep CloudFront at 3000", () => {
    const provider = createCdnProvider(
      {
        providerType: "cloudfront",
        settings: { distributionId: "E2EXAMPLE", accessKeyId: "test-key", secretAccessKey: "test-secret", region: "us-east-1" },
      },
      { http, batchLimits: { cloudflare: 10 } }
    );
    expect(provider.maxBatchSize).toBe(3000);
    expect(provider.target).toBe("E2EXAMPLE");
  });

  it("should use injected Azure tokens", () => {
    const provider = createCdnProvider(
      {
        providerType: "azure-front-door",
        settings: { subscriptionId: "sub-1", resourceGroup: "rg", profileName: "p", endpointName: "e" },
      },
      { http, tokens: { getToken: async () => "test-token" }, batchLimits: { "azure-front-door": 50 } }
    );
    expect(provider.target).toBe("p/e");
    expect(provider.maxBatchSize).toBe(50);
  });

  it("should build the classic Azure CDN provider", () => {
    const provider = createCdnProvider(
      {
        providerType: "azure-cdn",
        settings: { subscriptionId: "sub-1", resourceGroup: "rg", profileName: "p", endpointName: "e" },
      },
      { http, tokens: { getToken: async () => "test-token" }, batchLimits: { "azure-cdn": 25 } }
    );
    expect(provider).toBeInstanceOf(AzureCdnProvider);
    expect(provider.target).toBe("p/e");
    expect(provider.maxBatchSize).toBe(25);
  });

  it("should build the mock provider", () => {
    const provider = createCdnProvider(
      { providerType: "mock", settings: { mode: "success", failureRate: 0, latencyMs: 0 } },
      { http, delay: new InstantDelayProvider() }
    );
    expect(provider).toBeInstanceOf(MockCdnProvider);
  });
});
