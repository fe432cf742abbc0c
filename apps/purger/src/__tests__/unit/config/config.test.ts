import { describe, it, expect } from "vitest";
import { parseConfig } from "@edgepurge/config";

describe("parseConfig", () => {
  it("should apply defaults", () => {
    const config = parseConfig({ API_KEY: "test-secret" });

    expect(config).toMatchObject({
      NODE_ENV: "development",
      PORT: 6010,
      CDN_PROVIDER: "none",
      AWS_REGION: "us-east-1",
      CLOUDFLARE_MAX_BATCH_SIZE: 30,
      AZURE_MAX_BATCH_SIZE: 100,
      SUCURI_MAX_BATCH_SIZE: 20,
      FASTLY_MAX_BATCH_SIZE: 100,
      DISPATCH_CONCURRENCY: 4,
      RETRY_MAX_ATTEMPTS: 5,
      RETRY_BASE_DELAY_MS: 1000,
      RETRY_MAX_DELAY_MS: 30000,
      RETRY_JITTER: true,
      IDEMPOTENCY_TTL_HOURS: 24,
      TENANT_SETTINGS_FROM_DB: false,
      CALLER_REFERENCE_PREFIX: "edgepurge",
    });
  });

  it("should require an API key", () => {
    expect(() => parseConfig({})).toThrow();
  });

  it("should parse string booleans", () => {
    expect(parseConfig({ API_KEY: "test-secret", RETRY_JITTER: "false" }).RETRY_JITTER).toBe(false);
    expect(parseConfig({ API_KEY: "test-secret", RETRY_JITTER: "TRUE" }).RETRY_JITTER).toBe(true);
  });

  it("should coerce numbers", () => {
    expect(parseConfig({ API_KEY: "test-secret", PORT: "8080" }).PORT).toBe(8080);
  });

  it("should treat empty strings as unset", () => {
    expect(parseConfig({ API_KEY: "test-secret", REDIS_URL: "", SUCURI_DOMAIN: "  " })).toMatchObject({
      REDIS_URL: undefined,
      SUCURI_DOMAIN: undefined,
    });
  });

  it("should reject an unknown provider", () => {
    expect(() => parseConfig({ API_KEY: "test-secret", CDN_PROVIDER: "akamai" })).toThrow();
  });

  it("should restrict the caller reference prefix", () => {
    expect(() => parseConfig({ API_KEY: "test-secret", CALLER_REFERENCE_PREFIX: "has space" })).toThrow(
      "letters, digits, '-' and '_' only"
    );
  });
});
