/**
 * Azure purge payload builders - pure functions.
 *
 * Front Door (Standard/Premium) and classic Azure CDN share the ARM purge
 * body; they differ in the endpoint resource and in how classic CDN widens
 * a root path to the wildcard.
 */

import type { AzureFrontDoorConfig } from "./types.js";

export const AZURE_MANAGEMENT_SCOPE = "https://management.azure.com/.default";
export const AZURE_CDN_API_VERSION = "2023-05-01";

const ROOT_PATHS: ReadonlySet<string> = new Set(["/", "/*"]);

export interface AzurePurgeBody {
  contentPaths: string[];
}

type EndpointSettings = Pick<
  AzureFrontDoorConfig,
  "subscriptionId" | "resourceGroup" | "profileName" | "endpointName"
>;

export function buildAzureFrontDoorPurgeBody(paths: readonly string[]): AzurePurgeBody {
  return { contentPaths: [...paths] };
}

/**
 * Classic CDN purges the whole endpoint when the batch names the root.
 */
export function buildAzureCdnPurgeBody(paths: readonly string[]): AzurePurgeBody {
  if (paths.some((path) => ROOT_PATHS.has(path))) {
    return { contentPaths: ["/*"] };
  }
  return { contentPaths: [...paths] };
}

function armPurgeUrl(settings: EndpointSettings, endpointCollection: "afdEndpoints" | "endpoints"): string {
  const segments = [
    "subscriptions",
    settings.subscriptionId,
    "resourceGroups",
    settings.resourceGroup,
    "providers",
    "Microsoft.Cdn",
    "profiles",
    settings.profileName,
    endpointCollection,
    settings.endpointName,
    "purge",
  ].map(encodeURIComponent);

  return `https://management.azure.com/${segments.join("/")}?api-version=${AZURE_CDN_API_VERSION}`;
}

/**
 * ARM endpoint for POST .../afdEndpoints/{endpoint}/purge
 */
export function azureFrontDoorPurgeUrl(settings: EndpointSettings): string {
  return armPurgeUrl(settings, "afdEndpoints");
}

/**
 * ARM endpoint for POST .../endpoints/{endpoint}/purge
 */
export function azureCdnPurgeUrl(settings: EndpointSettings): string {
  return armPurgeUrl(settings, "endpoints");
}
