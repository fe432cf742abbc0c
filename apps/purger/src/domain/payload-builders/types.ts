/**
 * Types for payload building.
 *
 * Provider credential shapes are imported from @edgepurge/db (single source of truth).
 */

import type {
  CloudFrontConfig,
  CloudflareConfig,
  AzureFrontDoorConfig,
  AzureCdnConfig,
  SucuriConfig,
  FastlyConfig,
} from "@edgepurge/db";

export type {
  CloudFrontConfig,
  CloudflareConfig,
  AzureFrontDoorConfig,
  AzureCdnConfig,
  SucuriConfig,
  FastlyConfig,
};
