import { z } from "zod";

// =============================================================================
// Helpers
// =============================================================================

/**
 * Parse string booleans from environment variables.
 * z.coerce.boolean() treats any non-empty string as true, including "false"
 */
export const stringBoolean = z
  .union([z.boolean(), z.string()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    return val.toLowerCase() === "true";
  });

/** Empty strings from .env files count as "not set" */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val === undefined || val.trim() === "" ? undefined : val));

export const CDN_PROVIDER_TYPES = [
  "cloudfront",
  "cloudflare",
  "azure-front-door",
  "azure-cdn",
  "sucuri",
  "fastly",
  "none",
  "mock",
] as const;

// =============================================================================
// Config Schema - Grouped by Domain
// =============================================================================

export const configSchema = z.object({
  // ===========================================================================
  // Environment
  // ===========================================================================
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
  INSTANCE_ID: z.string().default("purger-1"),

  // ===========================================================================
  // HTTP API
  // ===========================================================================
  PORT: z.coerce.number().default(6010),
  API_KEY: z.string().min(1),
  MAX_REQUEST_SIZE_BYTES: z.coerce.number().default(5 * 1024 * 1024),

  // ===========================================================================
  // Storage
  // ===========================================================================
  /** Result persistence. In-memory results when unset. */
  DATABASE_URL: z.string().url().optional(),
  /** Caller-reference dedupe cache. In-memory when unset. */
  REDIS_URL: optionalString,
  IDEMPOTENCY_TTL_HOURS: z.coerce.number().min(1).default(24),
  /** Read per-tenant CDN settings from the cdn_settings table instead of env */
  TENANT_SETTINGS_FROM_DB: stringBoolean.default(false),

  // ===========================================================================
  // CDN Provider (single-tenant / default)
  // ===========================================================================
  CDN_PROVIDER: z.enum(CDN_PROVIDER_TYPES).default("none"),

  // CloudFront
  CLOUDFRONT_DISTRIBUTION_ID: optionalString,
  AWS_ACCESS_KEY_ID: optionalString,
  AWS_SECRET_ACCESS_KEY: optionalString,
  AWS_REGION: z.string().default("us-east-1"),

  // Cloudflare
  CLOUDFLARE_ZONE_ID: optionalString,
  CLOUDFLARE_API_TOKEN: optionalString,
  CLOUDFLARE_SITE_URL: z.string().url().optional(),

  // Azure (Front Door and classic CDN share subscription and credentials)
  AZURE_SUBSCRIPTION_ID: optionalString,
  AZURE_RESOURCE_GROUP: optionalString,
  AZURE_FRONT_DOOR_PROFILE: optionalString,
  AZURE_FRONT_DOOR_ENDPOINT: optionalString,
  AZURE_CDN_PROFILE: optionalString,
  AZURE_CDN_ENDPOINT: optionalString,
  AZURE_TENANT_ID: optionalString,
  AZURE_CLIENT_ID: optionalString,
  AZURE_CLIENT_SECRET: optionalString,

  // Sucuri
  SUCURI_API_KEY: optionalString,
  SUCURI_API_SECRET: optionalString,
  SUCURI_DOMAIN: optionalString,

  // Fastly
  FASTLY_SERVICE_ID: optionalString,
  FASTLY_API_TOKEN: optionalString,
  FASTLY_DOMAIN: optionalString,
  FASTLY_SOFT_PURGE: stringBoolean.default(false),

  // Mock provider (local development)
  MOCK_MODE: z.enum(["success", "fail", "random"]).default("success"),
  MOCK_FAILURE_RATE: z.coerce.number().min(0).max(1).default(0.1),
  MOCK_LATENCY_MS: z.coerce.number().default(50),

  // ===========================================================================
  // Batch limits (paths per provider request)
  // CloudFront is fixed at 3000 by the provider and not configurable.
  // ===========================================================================
  CLOUDFLARE_MAX_BATCH_SIZE: z.coerce.number().int().min(1).default(30),
  /** Front Door and classic CDN */
  AZURE_MAX_BATCH_SIZE: z.coerce.number().int().min(1).default(100),
  SUCURI_MAX_BATCH_SIZE: z.coerce.number().int().min(1).default(20),
  FASTLY_MAX_BATCH_SIZE: z.coerce.number().int().min(1).default(100),

  // ===========================================================================
  // Dispatch & Retry
  // ===========================================================================
  DISPATCH_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().min(100).default(30000),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(5),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(30000),
  RETRY_JITTER: stringBoolean.default(true),
  CALLER_REFERENCE_PREFIX: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, "letters, digits, '-' and '_' only")
    .default("edgepurge"),
});

export type Config = z.infer<typeof configSchema>;
export type CdnProviderType = (typeof CDN_PROVIDER_TYPES)[number];

/**
 * Parse config from an env-like record.
 * Throws ZodError on invalid input; callers decide whether to exit.
 */
export function parseConfig(env: Record<string, string | undefined>): Config {
  return configSchema.parse(env);
}
