import { Redis } from "ioredis";
import { log } from "../logger.js";
import {
  batchKeyString,
  type BatchIdempotencyStore,
  type BatchKey,
  type BatchRecord,
  type ClaimResult,
} from "../domain/idempotency/index.js";

/**
 * Redis client for the idempotency cache. Commands fail fast while
 * disconnected; the dispatcher then falls back to submitting.
 */
export function createRedisClient(url: string): Redis {
  const redis = new Redis(url, {
    enableOfflineQueue: false,
    maxRetriesPerRequest: 3,
    retryStrategy: (times) => Math.min(times * 100, 2000),
  });

  redis.on("connect", () => log.cache.info("Cache connected"));
  redis.on("error", (error) => log.cache.error({ error: error.message }, "Cache error"));
  redis.on("close", () => log.cache.info("Cache disconnected"));

  return redis;
}

function parseRecord(raw: string | null): BatchRecord | null {
  if (raw === null) return null;
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof value !== "object" || value === null || !("status" in value)) return null;
  if (value.status === "submitted") return { status: "submitted" };
  if (value.status === "succeeded" && "providerReference" in value && typeof value.providerReference === "string") {
    return { status: "succeeded", providerReference: value.providerReference };
  }
  return null;
}

/**
 * Idempotency store shared by every purger instance.
 * claim() is a single SET NX PX, so two instances cannot both win a batch.
 */
export class RedisIdempotencyStore implements BatchIdempotencyStore {
  constructor(private readonly redis: Redis) {}

  async claim(key: BatchKey, ttlMs: number): Promise<ClaimResult> {
    const id = batchKeyString(key);
    const submitted: BatchRecord = { status: "submitted" };

    const set = await this.redis.set(id, JSON.stringify(submitted), "PX", ttlMs, "NX");
    if (set === "OK") {
      return { claimed: true };
    }

    const existing = parseRecord(await this.redis.get(id));
    if (existing) {
      return { claimed: false, existing };
    }

    // Expired or unreadable between SET and GET: take it over
    await this.redis.set(id, JSON.stringify(submitted), "PX", ttlMs);
    return { claimed: true };
  }

  async complete(key: BatchKey, providerReference: string, ttlMs: number): Promise<void> {
    const record: BatchRecord = { status: "succeeded", providerReference };
    await this.redis.set(batchKeyString(key), JSON.stringify(record), "PX", ttlMs);
  }

  async release(key: BatchKey): Promise<void> {
    await this.redis.del(batchKeyString(key));
  }
}
