import type { CdnProvider } from "./types.js";
import { failedResult, succeededResult } from "./result.js";
import { PROVIDER_LIMITS } from "../domain/batching/split.js";
import type { DelayProvider } from "../domain/utils/retry.js";
import { TimeoutDelayProvider } from "../domain/utils/retry.js";
import { TransientNetworkError } from "../errors.js";
import { log } from "../logger.js";
import type { MockConfig } from "@edgepurge/db";
import type { InvalidationBatch, InvalidationResult } from "../types/domain.js";

export type MockMode = MockConfig["mode"];

export interface MockProviderConfig {
  mode: MockMode;
  failureRate?: number; // 0-1, only used in "random" mode
  latencyMs?: number; // Simulate network delay
}

/**
 * Simulated CDN for local development and load tests.
 * Failures are reported as transient so the retry path gets exercised.
 */
export class MockCdnProvider implements CdnProvider {
  readonly name = "mock";
  readonly providerType = "mock" as const;
  readonly target = "mock";
  readonly maxBatchSize = PROVIDER_LIMITS.mock;

  private config: Required<MockProviderConfig>;
  private invalidationCounter = 0;

  constructor(
    config: MockProviderConfig,
    private readonly delay: DelayProvider = new TimeoutDelayProvider(),
    private readonly random: () => number = Math.random
  ) {
    this.config = {
      mode: config.mode,
      failureRate: config.failureRate ?? 0.1,
      latencyMs: config.latencyMs ?? 50,
    };
  }

  async submit(batch: InvalidationBatch, callerReference: string): Promise<InvalidationResult> {
    if (this.config.latencyMs > 0) {
      await this.delay.delay(this.config.latencyMs);
    }

    if (this.shouldFail()) {
      log.provider.debug({ provider: "mock", callerReference, batchIndex: batch.sequenceIndex }, "simulated failure");
      return failedResult(batch, new TransientNetworkError("Simulated failure"));
    }

    const reference = this.generateReference();
    log.provider.debug(
      { provider: "mock", callerReference, batchIndex: batch.sequenceIndex, paths: batch.paths.length, reference },
      "simulated invalidation"
    );
    return succeededResult(batch, reference);
  }

  async purgeAll(batch: InvalidationBatch, callerReference: string): Promise<InvalidationResult> {
    return this.submit(batch, callerReference);
  }

  private shouldFail(): boolean {
    switch (this.config.mode) {
      case "success":
        return false;
      case "fail":
        return true;
      case "random":
        return this.random() < this.config.failureRate;
    }
  }

  private generateReference(): string {
    this.invalidationCounter++;
    return `mock-${this.invalidationCounter}`;
  }
}
