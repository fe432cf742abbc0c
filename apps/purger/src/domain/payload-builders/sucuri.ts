/**
 * Sucuri WAF cache-clear payload builder - pure functions.
 *
 * The API clears one file per call (or the whole cache when `file` is
 * omitted) and takes form-encoded parameters, not JSON.
 */

import type { SucuriConfig } from "./types.js";

export const SUCURI_API_URL = "https://waf.sucuri.net/api?v2";

export function buildSucuriClearCacheForm(
  settings: Pick<SucuriConfig, "apiKey" | "apiSecret">,
  path?: string
): URLSearchParams {
  const form = new URLSearchParams({
    k: settings.apiKey,
    s: settings.apiSecret,
    a: "clear_cache",
  });
  if (path !== undefined) {
    form.set("file", path);
  }
  return form;
}
