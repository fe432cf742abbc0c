import { createDb } from "@edgepurge/db";
import { config } from "./config.js";
import { log } from "./logger.js";
import { buildApi } from "./api.js";
import { ProviderHttpClient } from "./http/provider-http.js";
import { InMemoryIdempotencyStore, type BatchIdempotencyStore } from "./domain/idempotency/index.js";
import { InMemoryResultStore, ResultReporter, type ResultStore } from "./services/result-reporter.js";
import { PostgresResultStore } from "./services/postgres-result-store.js";
import { createRedisClient, RedisIdempotencyStore } from "./services/redis-idempotency-store.js";
import {
  DatabaseProviderConfigSource,
  providerConfigFromEnv,
  StaticProviderConfigSource,
  type ProviderConfigSource,
} from "./services/provider-config-source.js";
import { InvalidationService } from "./services/invalidation-service.js";

const SHUTDOWN_TIMEOUT_MS = 30000;
const JITTER_FACTOR = 0.25;

const connection = config.DATABASE_URL ? createDb(config.DATABASE_URL) : null;
const db = connection?.db ?? null;
const redis = config.REDIS_URL ? createRedisClient(config.REDIS_URL) : null;

const resultStore: ResultStore = db ? new PostgresResultStore(db) : new InMemoryResultStore();
const idempotency: BatchIdempotencyStore = redis
  ? new RedisIdempotencyStore(redis)
  : new InMemoryIdempotencyStore();

let app: ReturnType<typeof buildApi> | undefined;
let service: InvalidationService | undefined;

try {
  const defaultProvider = providerConfigFromEnv(config);

  let providers: ProviderConfigSource;
  if (config.TENANT_SETTINGS_FROM_DB) {
    if (!db) {
      throw new Error("TENANT_SETTINGS_FROM_DB requires DATABASE_URL");
    }
    providers = new DatabaseProviderConfigSource(db, defaultProvider);
  } else {
    providers = new StaticProviderConfigSource(defaultProvider);
  }

  service = new InvalidationService({
    reporter: new ResultReporter(resultStore),
    providers,
    idempotency,
    http: new ProviderHttpClient({ timeoutMs: config.PROVIDER_TIMEOUT_MS }),
    retry: {
      maxAttempts: config.RETRY_MAX_ATTEMPTS,
      baseDelayMs: config.RETRY_BASE_DELAY_MS,
      maxDelayMs: config.RETRY_MAX_DELAY_MS,
      jitterFactor: config.RETRY_JITTER ? JITTER_FACTOR : 0,
    },
    concurrency: config.DISPATCH_CONCURRENCY,
    callerReferencePrefix: config.CALLER_REFERENCE_PREFIX,
    batchLimits: {
      cloudflare: config.CLOUDFLARE_MAX_BATCH_SIZE,
      "azure-front-door": config.AZURE_MAX_BATCH_SIZE,
      "azure-cdn": config.AZURE_MAX_BATCH_SIZE,
      sucuri: config.SUCURI_MAX_BATCH_SIZE,
      fastly: config.FASTLY_MAX_BATCH_SIZE,
    },
    // An in-flight claim outlives every attempt of one batch
    claimTtlMs: config.RETRY_MAX_ATTEMPTS * (config.PROVIDER_TIMEOUT_MS + config.RETRY_MAX_DELAY_MS),
    recordTtlMs: config.IDEMPOTENCY_TTL_HOURS * 60 * 60 * 1000,
  });

  app = buildApi({
    service,
    apiKey: config.API_KEY,
    bodyLimit: config.MAX_REQUEST_SIZE_BYTES,
    exposeErrors: config.NODE_ENV !== "production",
  });

  await app.listen({ port: config.PORT, host: "0.0.0.0" });

  log.system.info(
    {
      instanceId: config.INSTANCE_ID,
      port: config.PORT,
      provider: defaultProvider.providerType,
      results: db ? "postgres" : "memory",
      idempotency: redis ? "redis" : "memory",
      tenantSettings: config.TENANT_SETTINGS_FROM_DB ? "database" : "environment",
    },
    "purger started"
  );
} catch (err) {
  log.system.error({ error: err instanceof Error ? err.message : String(err) }, "startup failed");
  process.exit(1);
}

// Graceful shutdown with timeout protection
async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, name: string): Promise<T | void> {
  let timeoutId: NodeJS.Timeout | undefined;
  const timeout = new Promise<void>((_, reject) => {
    timeoutId = setTimeout(() => reject(new Error(`${name} timed out after ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } catch (error) {
    log.system.warn({ error: error instanceof Error ? error.message : String(error), component: name }, "shutdown timeout");
  } finally {
    clearTimeout(timeoutId);
  }
}

async function shutdown(): Promise<void> {
  log.system.info({}, "shutting down (30s timeout)");
  const shutdownStart = Date.now();

  // Phase 1: Stop accepting new requests
  if (app) await withTimeout(app.close(), 2000, "Fastify");

  // Phase 2: Let background dispatches finish so their results are recorded
  if (service) await withTimeout(service.drain(), 20000, "Dispatches");

  // Phase 3: Close connections
  if (redis) await withTimeout(redis.quit(), 2000, "Redis");
  if (connection) await withTimeout(connection.close(), 2000, "Postgres");

  log.system.info({ durationMs: Date.now() - shutdownStart }, "shutdown complete");
  process.exit(0);
}

// Force exit if graceful shutdown takes too long
let shutdownInProgress = false;
async function initiateShutdown(): Promise<void> {
  if (shutdownInProgress) {
    log.system.warn({}, "shutdown already in progress, forcing exit");
    process.exit(1);
  }
  shutdownInProgress = true;

  const forceExitTimer = setTimeout(() => {
    log.system.error({}, "shutdown timeout exceeded, forcing exit");
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forceExitTimer.unref();

  await shutdown();
}

process.on("SIGTERM", () => void initiateShutdown());
process.on("SIGINT", () => void initiateShutdown());
