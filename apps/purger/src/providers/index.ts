import type { CdnProvider } from "./types.js";
import { CloudFrontProvider } from "./cloudfront-provider.js";
import { CloudflareProvider } from "./cloudflare-provider.js";
import {
  AzureCdnProvider,
  AzureFrontDoorProvider,
  AzureIdentityTokenProvider,
  createAzureCredential,
  type TokenProvider,
} from "./azure-provider.js";
import { SucuriProvider } from "./sucuri-provider.js";
import { FastlyProvider } from "./fastly-provider.js";
import { NoneProvider } from "./none-provider.js";
import { MockCdnProvider } from "./mock-provider.js";
import type { ProviderHttpClient } from "../http/provider-http.js";
import type { DelayProvider } from "../domain/utils/retry.js";
import type { TimeProvider } from "../domain/utils/time.js";
import type { ProviderConfig, ProviderType } from "../types/domain.js";
import { log } from "../logger.js";

export * from "./types.js";
export { CloudFrontProvider } from "./cloudfront-provider.js";
export { CloudflareProvider } from "./cloudflare-provider.js";
export {
  AzureCdnProvider,
  AzureFrontDoorProvider,
  AzureIdentityTokenProvider,
  createAzureCredential,
  type TokenProvider,
} from "./azure-provider.js";
export { SucuriProvider } from "./sucuri-provider.js";
export { FastlyProvider } from "./fastly-provider.js";
export { NoneProvider } from "./none-provider.js";
export { MockCdnProvider, type MockMode } from "./mock-provider.js";

/** Configurable batch sizes. CloudFront's 3000 is fixed and not listed. */
export type BatchLimitOverrides = Partial<
  Record<Extract<ProviderType, "cloudflare" | "azure-front-door" | "azure-cdn" | "sucuri" | "fastly">, number>
>;

export interface ProviderFactoryDeps {
  http: ProviderHttpClient;
  batchLimits?: BatchLimitOverrides;
  /** Azure token source; defaults to @azure/identity built from the settings */
  tokens?: TokenProvider;
  time?: TimeProvider;
  /** Latency simulation for the mock provider */
  delay?: DelayProvider;
}

/**
 * Build the adapter for a provider config.
 * The only place in the service that branches on provider identity.
 */
export function createCdnProvider(config: ProviderConfig, deps: ProviderFactoryDeps): CdnProvider {
  const limits = deps.batchLimits ?? {};
  let provider: CdnProvider;

  switch (config.providerType) {
    case "cloudfront":
      provider = new CloudFrontProvider(config.settings, { http: deps.http, time: deps.time });
      break;

    case "cloudflare":
      provider = new CloudflareProvider(config.settings, {
        http: deps.http,
        maxBatchSize: limits.cloudflare,
      });
      break;

    case "azure-front-door":
      provider = new AzureFrontDoorProvider(config.settings, {
        http: deps.http,
        tokens: deps.tokens ?? new AzureIdentityTokenProvider(createAzureCredential(config.settings)),
        maxBatchSize: limits["azure-front-door"],
      });
      break;

    case "azure-cdn":
      provider = new AzureCdnProvider(config.settings, {
        http: deps.http,
        tokens: deps.tokens ?? new AzureIdentityTokenProvider(createAzureCredential(config.settings)),
        maxBatchSize: limits["azure-cdn"],
      });
      break;

    case "sucuri":
      provider = new SucuriProvider(config.settings, {
        http: deps.http,
        maxBatchSize: limits.sucuri,
      });
      break;

    case "fastly":
      provider = new FastlyProvider(config.settings, {
        http: deps.http,
        maxBatchSize: limits.fastly,
      });
      break;

    case "mock":
      provider = new MockCdnProvider(config.settings, deps.delay);
      break;

    case "none":
      provider = new NoneProvider();
      break;
  }

  log.provider.debug(
    { provider: provider.name, target: provider.target, maxBatchSize: provider.maxBatchSize },
    "initialized"
  );
  return provider;
}
