import { describe, it, expect } from "vitest";
import { parseConfig } from "@edgepurge/config";
import {
  ProviderConfigError,
  providerConfigFromEnv,
  StaticProviderConfigSource,
  toProviderConfig,
} from "../../../services/provider-config-source.js";

describe("providerConfigFromEnv", () => {
  it("should build a CloudFront config with the default region", () => {
    const config = parseConfig({
      API_KEY: "test-secret",
      CDN_PROVIDER: "cloudfront",
      CLOUDFRONT_DISTRIBUTION_ID: "E2EXAMPLE",
      AWS_ACCESS_KEY_ID: "test-key",
      AWS_SECRET_ACCESS_KEY: "test-secret",
    });

    const provider = providerConfigFromEnv(config);

    expect(provider).toEqual({
      providerType: "cloudfront",
      settings: {
        distributionId: "E2EXAMPLE",
        accessKeyId: "test-key",
        secretAccessKey: "test-secret",
        region: "us-east-1",
      },
    });
    expect(Object.isFrozen(provider)).toBe(true);
  });

  it("should name the missing settings", () => {
    const config = parseConfig({ API_KEY: "test-secret", CDN_PROVIDER: "cloudflare" });

    expect(() => providerConfigFromEnv(config)).toThrow(ProviderConfigError);
    expect(() => providerConfigFromEnv(config)).toThrow(
      "Invalid cloudflare settings (environment): zoneId: Required; apiToken: Required"
    );
  });

  it("should carry the Fastly soft purge flag", () => {
    const config = parseConfig({
      API_KEY: "test-secret",
      CDN_PROVIDER: "fastly",
      FASTLY_SERVICE_ID: "svc-1",
      FASTLY_API_TOKEN: "test-token",
      FASTLY_DOMAIN: "www.example.com",
      FASTLY_SOFT_PURGE: "true",
    });

    expect(providerConfigFromEnv(config)).toEqual({
      providerType: "fastly",
      settings: { serviceId: "svc-1", apiToken: "test-token", domain: "www.example.com", softPurge: true },
    });
  });

  it("should read the classic Azure CDN profile and endpoint", () => {
    const config = parseConfig({
      API_KEY: "test-secret",
      CDN_PROVIDER: "azure-cdn",
      AZURE_SUBSCRIPTION_ID: "sub-1",
      AZURE_RESOURCE_GROUP: "rg-web",
      AZURE_FRONT_DOOR_PROFILE: "afd-profile",
      AZURE_CDN_PROFILE: "cdn-profile",
      AZURE_CDN_ENDPOINT: "cdn-endpoint",
    });

    expect(providerConfigFromEnv(config)).toEqual({
      providerType: "azure-cdn",
      settings: {
        subscriptionId: "sub-1",
        resourceGroup: "rg-web",
        profileName: "cdn-profile",
        endpointName: "cdn-endpoint",
      },
    });
  });

  it("should need nothing for the none provider", () => {
    expect(providerConfigFromEnv(parseConfig({ API_KEY: "test-secret" }))).toEqual({ providerType: "none" });
  });
});

describe("toProviderConfig", () => {
  it("should fill mock defaults", () => {
    expect(toProviderConfig("mock", {}, "test")).toEqual({
      providerType: "mock",
      settings: { mode: "success", failureRate: 0.1, latencyMs: 50 },
    });
  });

  it("should validate classic Azure CDN settings", () => {
    expect(() =>
      toProviderConfig("azure-cdn", { subscriptionId: "sub-1", resourceGroup: "rg-web", profileName: "p" }, "test")
    ).toThrow("Invalid azure-cdn settings (test): endpointName: Required");
  });

  it("should name where invalid settings came from", () => {
    expect(() => toProviderConfig("sucuri", { apiKey: "test-key", apiSecret: "", domain: "example.com" }, "cdn_settings 7")).toThrow(
      "Invalid sucuri settings (cdn_settings 7): apiSecret: String must contain at least 1 character(s)"
    );
  });

  it("should reject settings that are not an object", () => {
    expect(() => toProviderConfig("cloudflare", null, "cdn_settings 1")).toThrow(
      "Invalid cloudflare settings (cdn_settings 1): settings: Expected object, received null"
    );
  });
});

describe("StaticProviderConfigSource", () => {
  it("should return the same config for every tenant", async () => {
    const source = new StaticProviderConfigSource({ providerType: "none" });
    expect(await source.resolve()).toBe(await source.resolve());
  });
});
