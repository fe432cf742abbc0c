/**
 * Fastly purge payload builders - pure functions.
 *
 * Fastly purges single URLs by sending POST to api.fastly.com/purge/{host}{path};
 * the whole service is purged through /service/{id}/purge_all.
 */

import type { FastlyConfig } from "./types.js";

export const FASTLY_API_BASE = "https://api.fastly.com";

export function fastlyPurgeUrl(domain: string, path: string): string {
  // encodeURI leaves '#' alone, which would cut the path short
  const encoded = encodeURI(path).replace(/#/g, "%23");
  return `${FASTLY_API_BASE}/purge/${domain}${encoded}`;
}

export function fastlyPurgeAllUrl(serviceId: string): string {
  return `${FASTLY_API_BASE}/service/${encodeURIComponent(serviceId)}/purge_all`;
}

export function buildFastlyHeaders(
  settings: Pick<FastlyConfig, "apiToken" | "softPurge">
): Record<string, string> {
  const headers: Record<string, string> = {
    "Fastly-Key": settings.apiToken,
    Accept: "application/json",
  };
  if (settings.softPurge) {
    headers["Fastly-Soft-Purge"] = "1";
  }
  return headers;
}
