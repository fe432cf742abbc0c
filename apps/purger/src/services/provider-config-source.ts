import { z } from "zod";
import { and, desc, eq } from "drizzle-orm";
import { cdnSettings, type Database, type ProviderType } from "@edgepurge/db";
import type { Config } from "@edgepurge/config";
import type { ProviderConfig } from "../types/domain.js";
import { log } from "../logger.js";

// =============================================================================
// Provider config resolution
// =============================================================================
// Single-tenant deployments take the provider from environment variables;
// multi-tenant ones read the active cdn_settings row per tenant. Either way the
// result is a frozen ProviderConfig shared read-only by every batch.
// =============================================================================

export class ProviderConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProviderConfigError";
  }
}

export interface ProviderConfigSource {
  resolve(tenantId: string): Promise<ProviderConfig>;
}

const nonEmpty = z.string().min(1);

const settingsSchemas = {
  cloudfront: z.object({
    distributionId: nonEmpty,
    accessKeyId: nonEmpty,
    secretAccessKey: nonEmpty,
    region: nonEmpty.default("us-east-1"),
  }),
  cloudflare: z.object({
    zoneId: nonEmpty,
    apiToken: nonEmpty,
    siteUrl: z.string().url().optional(),
  }),
  azure: z.object({
    subscriptionId: nonEmpty,
    resourceGroup: nonEmpty,
    profileName: nonEmpty,
    endpointName: nonEmpty,
    tenantId: nonEmpty.optional(),
    clientId: nonEmpty.optional(),
    clientSecret: nonEmpty.optional(),
  }),
  sucuri: z.object({
    apiKey: nonEmpty,
    apiSecret: nonEmpty,
    domain: nonEmpty,
  }),
  fastly: z.object({
    serviceId: nonEmpty,
    apiToken: nonEmpty,
    domain: nonEmpty,
    softPurge: z.boolean().default(false),
  }),
  mock: z.object({
    mode: z.enum(["success", "fail", "random"]).default("success"),
    failureRate: z.number().min(0).max(1).default(0.1),
    latencyMs: z.number().min(0).default(50),
  }),
};

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "settings"}: ${issue.message}`).join("; ");
}

function parseSettings<T extends z.ZodTypeAny>(
  providerType: ProviderType,
  schema: T,
  raw: unknown,
  origin: string
): Readonly<z.infer<T>> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ProviderConfigError(`Invalid ${providerType} settings (${origin}): ${describeIssues(parsed.error)}`);
  }
  return Object.freeze(parsed.data);
}

/**
 * Validate untyped settings (a cdn_settings.config column, or values picked
 * from env) into a tagged ProviderConfig.
 */
export function toProviderConfig(providerType: ProviderType, raw: unknown, origin: string): ProviderConfig {
  switch (providerType) {
    case "cloudfront":
      return Object.freeze({
        providerType,
        settings: parseSettings(providerType, settingsSchemas.cloudfront, raw, origin),
      });
    case "cloudflare":
      return Object.freeze({
        providerType,
        settings: parseSettings(providerType, settingsSchemas.cloudflare, raw, origin),
      });
    case "azure-front-door":
      return Object.freeze({
        providerType,
        settings: parseSettings(providerType, settingsSchemas.azure, raw, origin),
      });
    case "azure-cdn":
      return Object.freeze({
        providerType,
        settings: parseSettings(providerType, settingsSchemas.azure, raw, origin),
      });
    case "sucuri":
      return Object.freeze({
        providerType,
        settings: parseSettings(providerType, settingsSchemas.sucuri, raw, origin),
      });
    case "fastly":
      return Object.freeze({
        providerType,
        settings: parseSettings(providerType, settingsSchemas.fastly, raw, origin),
      });
    case "mock":
      return Object.freeze({
        providerType,
        settings: parseSettings(providerType, settingsSchemas.mock, raw, origin),
      });
    case "none":
      return Object.freeze({ providerType });
  }
}

/**
 * ProviderConfig for CDN_PROVIDER and its credential variables.
 * Throws ProviderConfigError naming the missing variables.
 */
export function providerConfigFromEnv(config: Config): ProviderConfig {
  const raw: Record<ProviderType, Record<string, unknown>> = {
    cloudfront: {
      distributionId: config.CLOUDFRONT_DISTRIBUTION_ID,
      accessKeyId: config.AWS_ACCESS_KEY_ID,
      secretAccessKey: config.AWS_SECRET_ACCESS_KEY,
      region: config.AWS_REGION,
    },
    cloudflare: {
      zoneId: config.CLOUDFLARE_ZONE_ID,
      apiToken: config.CLOUDFLARE_API_TOKEN,
      siteUrl: config.CLOUDFLARE_SITE_URL,
    },
    "azure-front-door": {
      subscriptionId: config.AZURE_SUBSCRIPTION_ID,
      resourceGroup: config.AZURE_RESOURCE_GROUP,
      profileName: config.AZURE_FRONT_DOOR_PROFILE,
      endpointName: config.AZURE_FRONT_DOOR_ENDPOINT,
      tenantId: config.AZURE_TENANT_ID,
      clientId: config.AZURE_CLIENT_ID,
      clientSecret: config.AZURE_CLIENT_SECRET,
    },
    "azure-cdn": {
      subscriptionId: config.AZURE_SUBSCRIPTION_ID,
      resourceGroup: config.AZURE_RESOURCE_GROUP,
      profileName: config.AZURE_CDN_PROFILE,
      endpointName: config.AZURE_CDN_ENDPOINT,
      tenantId: config.AZURE_TENANT_ID,
      clientId: config.AZURE_CLIENT_ID,
      clientSecret: config.AZURE_CLIENT_SECRET,
    },
    sucuri: {
      apiKey: config.SUCURI_API_KEY,
      apiSecret: config.SUCURI_API_SECRET,
      domain: config.SUCURI_DOMAIN,
    },
    fastly: {
      serviceId: config.FASTLY_SERVICE_ID,
      apiToken: config.FASTLY_API_TOKEN,
      domain: config.FASTLY_DOMAIN,
      softPurge: config.FASTLY_SOFT_PURGE,
    },
    mock: {
      mode: config.MOCK_MODE,
      failureRate: config.MOCK_FAILURE_RATE,
      latencyMs: config.MOCK_LATENCY_MS,
    },
    none: {},
  };

  return toProviderConfig(config.CDN_PROVIDER, raw[config.CDN_PROVIDER], "environment");
}

/**
 * Same provider for every tenant.
 */
export class StaticProviderConfigSource implements ProviderConfigSource {
  constructor(private readonly config: ProviderConfig) {}

  async resolve(): Promise<ProviderConfig> {
    return this.config;
  }
}

/**
 * Per-tenant provider from the active cdn_settings row. Tenants without a row
 * get the fallback (the environment provider).
 */
export class DatabaseProviderConfigSource implements ProviderConfigSource {
  constructor(
    private readonly db: Database,
    private readonly fallback: ProviderConfig
  ) {}

  async resolve(tenantId: string): Promise<ProviderConfig> {
    const row = await this.db.query.cdnSettings.findFirst({
      where: and(eq(cdnSettings.tenantId, tenantId), eq(cdnSettings.isActive, true)),
      orderBy: [desc(cdnSettings.updatedAt)],
    });

    if (!row) {
      log.request.debug({ tenantId, provider: this.fallback.providerType }, "no tenant cdn settings, using default");
      return this.fallback;
    }

    return toProviderConfig(row.provider, row.config, `cdn_settings ${row.id}`);
  }
}
