import { describe, it, expect } from "vitest";
import { CloudflareProvider, cloudflareErrorDetail } from "../../../providers/cloudflare-provider.js";
import { fakeHttp } from "../../helpers/fake-fetch.js";
import { batchOf } from "../../helpers/fixtures.js";

const settings = { zoneId: "zone-1", apiToken: "test-token", siteUrl: "https://example.com" };

const ok = (id: string) => JSON.stringify({ success: true, errors: [], messages: [], result: { id } });

describe("CloudflareProvider", () => {
  it("should purge absolute URLs with a bearer token", async () => {
    const { http, fetch } = fakeHttp({ status: 200, body: ok("purge-1") });
    const provider = new CloudflareProvider(settings, { http });

    const result = await provider.submit(batchOf(["/a.html", "/b.html"]), "ref-1");

    expect(result).toMatchObject({ status: "succeeded", providerReference: "purge-1", errorKind: null });
    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe("https://api.cloudflare.com/client/v4/zones/zone-1/purge_cache");
    expect(init.headers).toEqual({ Authorization: "Bearer test-token", "Content-Type": "application/json" });
    expect(init.body).toBe('{"files":["https://example.com/a.html","https://example.com/b.html"]}');
  });

  it("should purge everything for purge-all", async () => {
    const { http, fetch } = fakeHttp({ status: 200, body: ok("purge-2") });
    const provider = new CloudflareProvider(settings, { http });

    const result = await provider.purgeAll(batchOf(["/*"]), "ref-1");

    expect(result.providerReference).toBe("purge-2");
    expect(fetch.mock.calls[0][1].body).toBe('{"purge_everything":true}');
  });

  it("should fail when the envelope reports success false", async () => {
    const { http } = fakeHttp({
      status: 200,
      body: JSON.stringify({ success: false, errors: [{ code: 1012, message: "Request must contain files" }] }),
    });
    const provider = new CloudflareProvider(settings, { http });

    const result = await provider.submit(batchOf(["/a.html"]), "ref-1");

    expect(result).toMatchObject({
      status: "failed",
      errorKind: "provider",
      errorMessage: "Cloudflare rejected the purge: 1012: Request must contain files",
    });
  });

  it("should carry Retry-After on 429", async () => {
    const { http } = fakeHttp({
      status: 429,
      body: JSON.stringify({ success: false, errors: [{ code: 971, message: "Please wait" }] }),
      headers: { "Retry-After": "30" },
    });
    const provider = new CloudflareProvider(settings, { http });

    const result = await provider.submit(batchOf(["/a.html"]), "ref-1");

    expect(result).toMatchObject({
      status: "failed",
      errorKind: "rate_limit",
      errorMessage: "HTTP 429: 971: Please wait",
      retryAfterMs: 30000,
    });
  });

  it("should treat 401 as authentication", async () => {
    const { http } = fakeHttp({ status: 401, body: "" });
    const result = await new CloudflareProvider(settings, { http }).submit(batchOf(["/a"]), "ref-1");
    expect(result).toMatchObject({ errorKind: "authentication", errorMessage: "HTTP 401" });
  });

  it("should take its batch size from options", () => {
    const { http } = fakeHttp({ status: 200 });
    expect(new CloudflareProvider(settings, { http }).maxBatchSize).toBe(30);
    expect(new CloudflareProvider(settings, { http, maxBatchSize: 10 }).maxBatchSize).toBe(10);
  });
});

describe("cloudflareErrorDetail", () => {
  it("should join code and message pairs", () => {
    expect(
      cloudflareErrorDetail({
        errors: [
          { code: 1, message: "first" },
          { code: 2, message: "second" },
        ],
      })
    ).toBe("1: first; 2: second");
  });

  it("should return an empty string without errors", () => {
    expect(cloudflareErrorDetail(undefined)).toBe("");
    expect(cloudflareErrorDetail({ success: true })).toBe("");
  });
});
