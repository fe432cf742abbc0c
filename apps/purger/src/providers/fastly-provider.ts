/**
 * Fastly provider
 *
 * Single-URL purges, one call per path; purge-all goes to the service.
 */

import type { CdnProvider } from "./types.js";
import { runProviderCall } from "./result.js";
import {
  buildFastlyHeaders,
  fastlyPurgeAllUrl,
  fastlyPurgeUrl,
  type FastlyConfig,
} from "../domain/payload-builders/index.js";
import { PROVIDER_LIMITS } from "../domain/batching/split.js";
import {
  classifyHttpStatus,
  isRecord,
  parseJsonBody,
  truncate,
  type ProviderHttpClient,
} from "../http/provider-http.js";
import type { InvalidationBatch, InvalidationResult } from "../types/domain.js";

export interface FastlyProviderOptions {
  http: ProviderHttpClient;
  maxBatchSize?: number;
}

export class FastlyProvider implements CdnProvider {
  readonly name = "fastly";
  readonly providerType = "fastly" as const;
  readonly target: string;
  readonly maxBatchSize: number;

  private readonly http: ProviderHttpClient;

  constructor(
    private readonly settings: Readonly<FastlyConfig>,
    options: FastlyProviderOptions
  ) {
    this.target = settings.serviceId;
    this.http = options.http;
    this.maxBatchSize = options.maxBatchSize ?? PROVIDER_LIMITS.fastly;
  }

  async submit(batch: InvalidationBatch, _callerReference: string): Promise<InvalidationResult> {
    return runProviderCall(this.name, batch, async () => {
      for (const path of batch.paths) {
        await this.purge(fastlyPurgeUrl(this.settings.domain, path));
      }
      return `${this.settings.domain}:${batch.paths.length} url(s)`;
    });
  }

  async purgeAll(batch: InvalidationBatch, _callerReference: string): Promise<InvalidationResult> {
    return runProviderCall(this.name, batch, () => this.purge(fastlyPurgeAllUrl(this.settings.serviceId)));
  }

  private async purge(url: string): Promise<string> {
    const response = await this.http.send({
      method: "POST",
      url,
      headers: buildFastlyHeaders(this.settings),
    });

    const parsed = parseJsonBody(response.text);
    const detail =
      isRecord(parsed) && typeof parsed.msg === "string" ? parsed.msg : truncate(response.text);

    const classified = classifyHttpStatus(response.status, detail, response.headers.get("retry-after"));
    if (classified) throw classified;

    return isRecord(parsed) && typeof parsed.id === "string" ? parsed.id : "";
  }
}
