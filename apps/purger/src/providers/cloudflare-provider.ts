/**
 * Cloudflare provider
 *
 * POST /client/v4/zones/{zone}/purge_cache with a bearer API token.
 */

import type { CdnProvider } from "./types.js";
import { runProviderCall } from "./result.js";
import {
  buildCloudflarePurgeBody,
  buildCloudflarePurgeEverythingBody,
  cloudflarePurgeUrl,
  type CloudflareConfig,
  type CloudflarePurgeBody,
} from "../domain/payload-builders/index.js";
import { PROVIDER_LIMITS } from "../domain/batching/split.js";
import {
  classifyHttpStatus,
  isRecord,
  parseJsonBody,
  truncate,
  type ProviderHttpClient,
} from "../http/provider-http.js";
import { ProviderError } from "../errors.js";
import type { InvalidationBatch, InvalidationResult } from "../types/domain.js";

export interface CloudflareProviderOptions {
  http: ProviderHttpClient;
  maxBatchSize?: number;
}

/**
 * "code: message" pairs from a Cloudflare v4 envelope's errors array.
 */
export function cloudflareErrorDetail(body: unknown): string {
  if (!isRecord(body) || !Array.isArray(body.errors)) return "";
  return body.errors
    .filter(isRecord)
    .map((error) => `${String(error.code ?? "")}: ${String(error.message ?? "")}`)
    .join("; ");
}

export class CloudflareProvider implements CdnProvider {
  readonly name = "cloudflare";
  readonly providerType = "cloudflare" as const;
  readonly target: string;
  readonly maxBatchSize: number;

  private readonly http: ProviderHttpClient;

  constructor(
    private readonly settings: Readonly<CloudflareConfig>,
    options: CloudflareProviderOptions
  ) {
    this.target = settings.zoneId;
    this.http = options.http;
    this.maxBatchSize = options.maxBatchSize ?? PROVIDER_LIMITS.cloudflare;
  }

  async submit(batch: InvalidationBatch, _callerReference: string): Promise<InvalidationResult> {
    return runProviderCall(this.name, batch, () =>
      this.purge(buildCloudflarePurgeBody(batch.paths, this.settings))
    );
  }

  async purgeAll(batch: InvalidationBatch, _callerReference: string): Promise<InvalidationResult> {
    return runProviderCall(this.name, batch, () => this.purge(buildCloudflarePurgeEverythingBody()));
  }

  private async purge(body: CloudflarePurgeBody): Promise<string> {
    const response = await this.http.send({
      method: "POST",
      url: cloudflarePurgeUrl(this.settings.zoneId),
      headers: {
        Authorization: `Bearer ${this.settings.apiToken}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
    });

    const parsed = parseJsonBody(response.text);
    const detail = cloudflareErrorDetail(parsed) || truncate(response.text);

    const classified = classifyHttpStatus(response.status, detail, response.headers.get("retry-after"));
    if (classified) throw classified;

    if (!isRecord(parsed) || parsed.success !== true) {
      throw new ProviderError(`Cloudflare rejected the purge: ${detail}`, response.status);
    }

    const result = parsed.result;
    return isRecord(result) && typeof result.id === "string" ? result.id : "";
  }
}
