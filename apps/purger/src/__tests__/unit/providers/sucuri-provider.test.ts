import { describe, it, expect } from "vitest";
import { SucuriProvider } from "../../../providers/sucuri-provider.js";
import { fakeHttp } from "../../helpers/fake-fetch.js";
import { batchOf } from "../../helpers/fixtures.js";

const settings = { apiKey: "test-key", apiSecret: "test-secret", domain: "example.com" };
const CLEARED = JSON.stringify({ status: 1, action: "clear_cache", messages: ["Cache cleared"] });

describe("SucuriProvider", () => {
  it("should clear each file with a form post", async () => {
    const { http, fetch } = fakeHttp({ status: 200, body: CLEARED });
    const provider = new SucuriProvider(settings, { http });

    const result = await provider.submit(batchOf(["/a.html", "/b.html"]), "ref-1");

    expect(result).toMatchObject({ status: "succeeded", providerReference: "example.com:2 file(s)" });
    expect(fetch).toHaveBeenCalledTimes(2);
    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe("https://waf.sucuri.net/api?v2");
    expect(init.headers).toEqual({ "Content-Type": "application/x-www-form-urlencoded" });
    expect(init.body).toBe("k=test-key&s=test-secret&a=clear_cache&file=%2Fa.html");
    expect(fetch.mock.calls[1][1].body).toBe("k=test-key&s=test-secret&a=clear_cache&file=%2Fb.html");
  });

  it("should clear the whole cache for purge-all", async () => {
    const { http, fetch } = fakeHttp({ status: 200, body: CLEARED });
    const provider = new SucuriProvider(settings, { http });

    const result = await provider.purgeAll(batchOf(["/*"]), "ref-1");

    expect(result.providerReference).toBe("example.com:all");
    expect(fetch.mock.calls[0][1].body).toBe("k=test-key&s=test-secret&a=clear_cache");
  });

  it("should stop at the first rejected file", async () => {
    const { http, fetch } = fakeHttp({
      status: 200,
      body: JSON.stringify({ status: 0, messages: ["Invalid API key"] }),
    });
    const provider = new SucuriProvider(settings, { http });

    const result = await provider.submit(batchOf(["/a.html", "/b.html"]), "ref-1");

    expect(result).toMatchObject({
      status: "failed",
      errorKind: "provider",
      errorMessage: "Sucuri rejected the cache clear: Invalid API key",
    });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("should treat a 502 as transient", async () => {
    const { http } = fakeHttp({ status: 502, body: "Bad Gateway" });
    const result = await new SucuriProvider(settings, { http }).submit(batchOf(["/a.html"]), "ref-1");
    expect(result).toMatchObject({ errorKind: "transient_network", errorMessage: "HTTP 502: Bad Gateway" });
  });

  it("should default to 20 paths per batch", () => {
    expect(new SucuriProvider(settings, { http: fakeHttp({ status: 200 }).http }).maxBatchSize).toBe(20);
  });
});
