/**
 * Azure providers: Front Door (Standard/Premium) and classic Azure CDN.
 *
 * Both purge through the ARM management API with an OAuth bearer token from
 * @azure/identity. A 202 means the purge was accepted and runs on Azure's side.
 */

import { ClientSecretCredential, DefaultAzureCredential, type TokenCredential } from "@azure/identity";
import type { CdnProvider } from "./types.js";
import { runProviderCall } from "./result.js";
import {
  AZURE_MANAGEMENT_SCOPE,
  azureCdnPurgeUrl,
  azureFrontDoorPurgeUrl,
  buildAzureCdnPurgeBody,
  buildAzureFrontDoorPurgeBody,
  type AzurePurgeBody,
  type AzureCdnConfig,
  type AzureFrontDoorConfig,
} from "../domain/payload-builders/index.js";
import { PROVIDER_LIMITS } from "../domain/batching/split.js";
import { PURGE_ALL_PATH } from "../domain/paths/validate.js";
import {
  classifyHttpStatus,
  isRecord,
  parseJsonBody,
  truncate,
  type ProviderHttpClient,
} from "../http/provider-http.js";
import { AuthenticationError } from "../errors.js";
import type { InvalidationBatch, InvalidationResult } from "../types/domain.js";

/**
 * Source of bearer tokens. Injected so tests never reach Entra ID.
 */
export interface TokenProvider {
  getToken(scope: string): Promise<string>;
}

export class AzureIdentityTokenProvider implements TokenProvider {
  constructor(private readonly credential: TokenCredential) {}

  async getToken(scope: string): Promise<string> {
    const token = await this.credential.getToken(scope).catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      throw new AuthenticationError(`Azure token acquisition failed: ${message}`, undefined, { cause: error });
    });
    if (!token) {
      throw new AuthenticationError("Azure token acquisition returned no token");
    }
    return token.token;
  }
}

/**
 * Service principal when all three of tenant/client/secret are configured,
 * otherwise the default chain (managed identity, environment, CLI).
 */
export function createAzureCredential(settings: Readonly<AzureFrontDoorConfig>): TokenCredential {
  if (settings.tenantId && settings.clientId && settings.clientSecret) {
    return new ClientSecretCredential(settings.tenantId, settings.clientId, settings.clientSecret);
  }
  return new DefaultAzureCredential();
}

export interface AzureProviderOptions {
  http: ProviderHttpClient;
  tokens: TokenProvider;
  maxBatchSize?: number;
}

function azureErrorDetail(body: unknown): string {
  if (!isRecord(body) || !isRecord(body.error)) return "";
  const { code, message } = body.error;
  return [code, message].filter((part) => typeof part === "string").join(": ");
}

abstract class AzureManagementProvider implements CdnProvider {
  abstract readonly name: string;
  abstract readonly providerType: "azure-front-door" | "azure-cdn";
  readonly target: string;
  readonly maxBatchSize: number;

  private readonly http: ProviderHttpClient;
  private readonly tokens: TokenProvider;

  constructor(
    protected readonly settings: Readonly<AzureFrontDoorConfig>,
    options: AzureProviderOptions,
    defaultBatchSize: number
  ) {
    this.target = `${settings.profileName}/${settings.endpointName}`;
    this.http = options.http;
    this.tokens = options.tokens;
    this.maxBatchSize = options.maxBatchSize ?? defaultBatchSize;
  }

  protected abstract purgeUrl(): string;
  protected abstract purgeBody(paths: readonly string[]): AzurePurgeBody;

  async submit(batch: InvalidationBatch, _callerReference: string): Promise<InvalidationResult> {
    return runProviderCall(this.name, batch, () => this.purge(batch.paths));
  }

  async purgeAll(batch: InvalidationBatch, _callerReference: string): Promise<InvalidationResult> {
    return runProviderCall(this.name, batch, () => this.purge([PURGE_ALL_PATH]));
  }

  private async purge(paths: readonly string[]): Promise<string> {
    const token = await this.tokens.getToken(AZURE_MANAGEMENT_SCOPE);

    const response = await this.http.send({
      method: "POST",
      url: this.purgeUrl(),
      headers: {
        Authorization: `Bearer ${token}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(this.purgeBody(paths)),
    });

    const detail = azureErrorDetail(parseJsonBody(response.text)) || truncate(response.text);
    const classified = classifyHttpStatus(response.status, detail, response.headers.get("retry-after"));
    if (classified) throw classified;

    return (
      response.headers.get("x-ms-request-id") ??
      response.headers.get("azure-asyncoperation") ??
      ""
    );
  }
}

export class AzureFrontDoorProvider extends AzureManagementProvider {
  readonly name = "azure-front-door";
  readonly providerType = "azure-front-door" as const;

  constructor(settings: Readonly<AzureFrontDoorConfig>, options: AzureProviderOptions) {
    super(settings, options, PROVIDER_LIMITS["azure-front-door"]);
  }

  protected purgeUrl(): string {
    return azureFrontDoorPurgeUrl(this.settings);
  }

  protected purgeBody(paths: readonly string[]): AzurePurgeBody {
    return buildAzureFrontDoorPurgeBody(paths);
  }
}

/**
 * Classic Azure CDN endpoint (Microsoft.Cdn/profiles/{profile}/endpoints/{endpoint}).
 */
export class AzureCdnProvider extends AzureManagementProvider {
  readonly name = "azure-cdn";
  readonly providerType = "azure-cdn" as const;

  constructor(settings: Readonly<AzureCdnConfig>, options: AzureProviderOptions) {
    super(settings, options, PROVIDER_LIMITS["azure-cdn"]);
  }

  protected purgeUrl(): string {
    return azureCdnPurgeUrl(this.settings);
  }

  protected purgeBody(paths: readonly string[]): AzurePurgeBody {
    return buildAzureCdnPurgeBody(paths);
  }
}
