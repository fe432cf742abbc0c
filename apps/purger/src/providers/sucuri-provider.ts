/**
 * Sucuri WAF provider
 *
 * The API clears one file per call, so a batch becomes a sequence of calls.
 * The first failure stops the batch; files already cleared stay cleared,
 * and clearing them again on retry is harmless.
 */

import type { CdnProvider } from "./types.js";
import { runProviderCall } from "./result.js";
import {
  SUCURI_API_URL,
  buildSucuriClearCacheForm,
  type SucuriConfig,
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

export interface SucuriProviderOptions {
  http: ProviderHttpClient;
  maxBatchSize?: number;
}

function sucuriMessages(body: unknown): string {
  if (!isRecord(body) || !Array.isArray(body.messages)) return "";
  return body.messages.map(String).join("; ");
}

export class SucuriProvider implements CdnProvider {
  readonly name = "sucuri";
  readonly providerType = "sucuri" as const;
  readonly target: string;
  readonly maxBatchSize: number;

  private readonly http: ProviderHttpClient;

  constructor(
    private readonly settings: Readonly<SucuriConfig>,
    options: SucuriProviderOptions
  ) {
    this.target = settings.domain;
    this.http = options.http;
    this.maxBatchSize = options.maxBatchSize ?? PROVIDER_LIMITS.sucuri;
  }

  async submit(batch: InvalidationBatch, _callerReference: string): Promise<InvalidationResult> {
    return runProviderCall(this.name, batch, async () => {
      for (const path of batch.paths) {
        await this.clearCache(path);
      }
      return `${this.settings.domain}:${batch.paths.length} file(s)`;
    });
  }

  async purgeAll(batch: InvalidationBatch, _callerReference: string): Promise<InvalidationResult> {
    return runProviderCall(this.name, batch, async () => {
      await this.clearCache();
      return `${this.settings.domain}:all`;
    });
  }

  private async clearCache(path?: string): Promise<void> {
    const response = await this.http.send({
      method: "POST",
      url: SUCURI_API_URL,
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: buildSucuriClearCacheForm(this.settings, path).toString(),
    });

    const parsed = parseJsonBody(response.text);
    const detail = sucuriMessages(parsed) || truncate(response.text);

    const classified = classifyHttpStatus(response.status, detail, response.headers.get("retry-after"));
    if (classified) throw classified;

    // Sucuri answers 200 with status 0 for bad keys and unknown files alike
    if (!isRecord(parsed) || Number(parsed.status) !== 1) {
      throw new ProviderError(`Sucuri rejected the cache clear: ${detail}`, response.status);
    }
  }
}
