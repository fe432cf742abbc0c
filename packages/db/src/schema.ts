import {
  pgTable,
  uuid,
  varchar,
  text,
  timestamp,
  integer,
  boolean,
  jsonb,
  index,
  uniqueIndex,
  pgEnum,
} from "drizzle-orm/pg-core";
import { relations } from "drizzle-orm";

// Enums
export const providerTypeEnum = pgEnum("cdn_provider_type", [
  "cloudfront",
  "cloudflare",
  "azure-front-door",
  "azure-cdn",
  "sucuri",
  "fastly",
  "none",
  "mock",
]);

export const requestStatusEnum = pgEnum("invalidation_request_status", [
  "created",
  "batching",
  "submitting",
  "succeeded",
  "partial_failure",
  "failed",
]);

export const requestScopeEnum = pgEnum("invalidation_scope", ["paths", "all"]);

export const batchResultStatusEnum = pgEnum("invalidation_batch_status", [
  "pending",
  "submitted",
  "succeeded",
  "failed",
]);

// Per-tenant CDN settings (written by the CMS, read here)
export const cdnSettings = pgTable(
  "cdn_settings",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    tenantId: varchar("tenant_id", { length: 255 }).notNull(),
    provider: providerTypeEnum("provider").notNull(),
    config: jsonb("config").notNull().$type<ProviderConfigData>(),
    isActive: boolean("is_active").default(true).notNull(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => ({
    tenantIdx: index("cdn_settings_tenant_idx").on(table.tenantId, table.isActive),
  })
);

// One row per logical invalidation request
export const invalidationRequests = pgTable(
  "invalidation_requests",
  {
    id: uuid("id").primaryKey(),
    tenantId: varchar("tenant_id", { length: 255 }).notNull(),
    provider: providerTypeEnum("provider").notNull(),
    scope: requestScopeEnum("scope").default("paths").notNull(),
    callerReference: varchar("caller_reference", { length: 128 }).notNull(),
    paths: jsonb("paths").notNull().$type<string[]>(),
    totalPaths: integer("total_paths").notNull(),
    totalBatches: integer("total_batches").default(0).notNull(),
    // Batch layout of the last dispatch; batch indexes refer to it
    providerTarget: varchar("provider_target", { length: 255 }),
    batchSize: integer("batch_size"),
    status: requestStatusEnum("status").default("created").notNull(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    startedAt: timestamp("started_at"),
    completedAt: timestamp("completed_at"),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => ({
    tenantIdx: index("invalidation_requests_tenant_idx").on(table.tenantId, table.createdAt),
    statusIdx: index("invalidation_requests_status_idx").on(table.status),
    callerReferenceIdx: uniqueIndex("invalidation_requests_caller_reference_idx").on(
      table.callerReference
    ),
  })
);

// One row per batch; mutated as the batch moves towards a terminal state
export const invalidationResults = pgTable(
  "invalidation_results",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    requestId: uuid("request_id")
      .notNull()
      .references(() => invalidationRequests.id, { onDelete: "cascade" }),
    batchIndex: integer("batch_index").notNull(),
    pathCount: integer("path_count").notNull(),
    status: batchResultStatusEnum("status").default("pending").notNull(),
    providerReference: varchar("provider_reference", { length: 500 }).default("").notNull(),
    errorKind: varchar("error_kind", { length: 50 }),
    errorMessage: text("error_message"),
    attemptCount: integer("attempt_count").default(0).notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => ({
    requestBatchIdx: uniqueIndex("invalidation_results_request_batch_idx").on(
      table.requestId,
      table.batchIndex
    ),
    statusIdx: index("invalidation_results_status_idx").on(table.status),
  })
);

// Relations
export const invalidationRequestsRelations = relations(invalidationRequests, ({ many }) => ({
  results: many(invalidationResults),
}));

export const invalidationResultsRelations = relations(invalidationResults, ({ one }) => ({
  request: one(invalidationRequests, {
    fields: [invalidationResults.requestId],
    references: [invalidationRequests.id],
  }),
}));

// Config type definitions for cdn_settings.config
export type CloudFrontConfig = {
  distributionId: string;
  accessKeyId: string;
  secretAccessKey: string;
  region: string;
};

export type CloudflareConfig = {
  zoneId: string;
  apiToken: string;
  /** When set, paths are sent to Cloudflare as absolute URLs */
  siteUrl?: string;
};

export type AzureFrontDoorConfig = {
  subscriptionId: string;
  resourceGroup: string;
  profileName: string;
  endpointName: string;
  tenantId?: string;
  clientId?: string;
  clientSecret?: string;
};

/** Classic Azure CDN (Microsoft.Cdn/profiles/{profile}/endpoints/{endpoint}) */
export type AzureCdnConfig = AzureFrontDoorConfig;

export type SucuriConfig = {
  apiKey: string;
  apiSecret: string;
  domain: string;
};

export type FastlyConfig = {
  serviceId: string;
  apiToken: string;
  domain: string;
  softPurge: boolean;
};

export type MockConfig = {
  mode: "success" | "fail" | "random";
  failureRate: number;
  latencyMs: number;
};

export type ProviderConfigData =
  | CloudFrontConfig
  | CloudflareConfig
  | AzureFrontDoorConfig
  | SucuriConfig
  | FastlyConfig
  | MockConfig
  | Record<string, never>;

// Types
export type CdnSetting = typeof cdnSettings.$inferSelect;
export type NewCdnSetting = typeof cdnSettings.$inferInsert;
export type InvalidationRequestRow = typeof invalidationRequests.$inferSelect;
export type NewInvalidationRequestRow = typeof invalidationRequests.$inferInsert;
export type InvalidationResultRow = typeof invalidationResults.$inferSelect;
export type NewInvalidationResultRow = typeof invalidationResults.$inferInsert;

export type ProviderType = (typeof providerTypeEnum.enumValues)[number];
export type RequestStatus = (typeof requestStatusEnum.enumValues)[number];
export type RequestScope = (typeof requestScopeEnum.enumValues)[number];
export type BatchResultStatus = (typeof batchResultStatusEnum.enumValues)[number];
