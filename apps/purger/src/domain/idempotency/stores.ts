/**
 * Idempotency store implementations without external dependencies.
 */

import type { TimeProvider } from "../utils/time.js";
import { SystemTimeProvider } from "../utils/time.js";
import {
  batchKeyString,
  type BatchIdempotencyStore,
  type BatchKey,
  type BatchRecord,
  type ClaimResult,
} from "./types.js";

/** Expired entries are dropped at most this often */
const SWEEP_INTERVAL_MS = 60_000;

interface Entry {
  record: BatchRecord;
  expiresAt: number;
}

/**
 * In-memory idempotency store (tests and single-instance deployments).
 */
export class InMemoryIdempotencyStore implements BatchIdempotencyStore {
  private entries = new Map<string, Entry>();
  private lastSweep: number;

  constructor(private time: TimeProvider = new SystemTimeProvider()) {
    this.lastSweep = time.now();
  }

  async claim(key: BatchKey, ttlMs: number): Promise<ClaimResult> {
    this.sweep();
    const existing = this.read(batchKeyString(key));
    if (existing) {
      return { claimed: false, existing };
    }
    this.entries.set(batchKeyString(key), {
      record: { status: "submitted" },
      expiresAt: this.time.now() + ttlMs,
    });
    return { claimed: true };
  }

  async complete(key: BatchKey, providerReference: string, ttlMs: number): Promise<void> {
    this.sweep();
    this.entries.set(batchKeyString(key), {
      record: { status: "succeeded", providerReference },
      expiresAt: this.time.now() + ttlMs,
    });
  }

  async release(key: BatchKey): Promise<void> {
    this.entries.delete(batchKeyString(key));
  }

  /** Current record for a key, if any (for testing) */
  get(key: BatchKey): BatchRecord | undefined {
    return this.read(batchKeyString(key));
  }

  /** Entries held, expired or not */
  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  // Completed keys are rarely read again, so expiry cannot rely on read()
  private sweep(): void {
    const now = this.time.now();
    if (now - this.lastSweep < SWEEP_INTERVAL_MS) return;
    this.lastSweep = now;
    for (const [id, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(id);
    }
  }

  private read(id: string): BatchRecord | undefined {
    const entry = this.entries.get(id);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.time.now()) {
      this.entries.delete(id);
      return undefined;
    }
    return entry.record;
  }
}
