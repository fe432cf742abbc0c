import type { CdnProvider } from "./types.js";
import { succeededResult } from "./result.js";
import { PROVIDER_LIMITS } from "../domain/batching/split.js";
import type { InvalidationBatch, InvalidationResult } from "../types/domain.js";

/**
 * Used when no CDN is configured. Every batch succeeds immediately with an
 * empty provider reference and no outbound call.
 */
export class NoneProvider implements CdnProvider {
  readonly name = "none";
  readonly providerType = "none" as const;
  readonly target = "";
  readonly maxBatchSize = PROVIDER_LIMITS.none;

  async submit(batch: InvalidationBatch): Promise<InvalidationResult> {
    return succeededResult(batch, "");
  }

  async purgeAll(batch: InvalidationBatch): Promise<InvalidationResult> {
    return succeededResult(batch, "");
  }
}
