/**
 * Cloudflare purge_cache payload builder - pure functions.
 */

import type { CloudflareConfig } from "./types.js";

export type CloudflarePurgeBody =
  | { files: string[] }
  | { purge_everything: true };

/**
 * Cloudflare matches purges against full URLs. When the zone's site URL is
 * known the paths are made absolute; otherwise they are sent as given.
 */
export function toCloudflareTarget(path: string, siteUrl?: string): string {
  if (!siteUrl) return path;
  return `${siteUrl.replace(/\/+$/, "")}${path}`;
}

export function buildCloudflarePurgeBody(
  paths: readonly string[],
  settings: Pick<CloudflareConfig, "siteUrl">
): CloudflarePurgeBody {
  return { files: paths.map((path) => toCloudflareTarget(path, settings.siteUrl)) };
}

export function buildCloudflarePurgeEverythingBody(): CloudflarePurgeBody {
  return { purge_everything: true };
}

export function cloudflarePurgeUrl(zoneId: string): string {
  return `https://api.cloudflare.com/client/v4/zones/${encodeURIComponent(zoneId)}/purge_cache`;
}
