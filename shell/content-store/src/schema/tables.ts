import { sqliteTable, text, integer, real, index } from "drizzle-orm/sqlite-core";
import type {
  AccountHealth,
  ArtifactStatus,
  BatchStatus,
  Platform,
  PlatformPolicy,
  PostStatus,
  PostingWindow,
  SafetyVerdict,
  Tier,
  TierDistribution,
} from "../schemas";

// Internal use only - the package exports domain types, not tables

export const artifacts = sqliteTable(
  "artifacts",
  {
    id: text("id").primaryKey(),
    avatarId: text("avatar_id").notNull(),
    batchId: text("batch_id"),
    templateId: text("template_id"),
    promptUsed: text("prompt_used").notNull(),
    tier: text("tier").$type<Tier>().notNull(),
    status: text("status").$type<ArtifactStatus>().notNull(),
    generationCostUsd: real("generation_cost_usd").notNull().default(0),
    generationLatencyMs: integer("generation_latency_ms").notNull().default(0),
    safetyVerdict: text("safety_verdict").$type<SafetyVerdict>(),
    safetyScore: real("safety_score"),
    safetyFlags: text("safety_flags", { mode: "json" })
      .$type<string[]>()
      .notNull(),
    storageLocator: text("storage_locator"),
    lastError: text("last_error"),
    metadata: text("metadata", { mode: "json" })
      .$type<Record<string, unknown>>()
      .notNull(),
    createdAt: integer("created_at").notNull(),
    updatedAt: integer("updated_at").notNull(),
  },
  (table) => ({
    avatarStatusIdx: index("idx_artifacts_avatar_status").on(
      table.avatarId,
      table.status,
    ),
    batchIdx: index("idx_artifacts_batch").on(table.batchId),
  }),
);

export const batches = sqliteTable("batches", {
  id: text("id").primaryKey(),
  avatarId: text("avatar_id").notNull(),
  requestedCount: integer("requested_count").notNull(),
  tierDistribution: text("tier_distribution", { mode: "json" })
    .$type<TierDistribution>()
    .notNull(),
  status: text("status").$type<BatchStatus>().notNull(),
  completedCount: integer("completed_count").notNull().default(0),
  failedCount: integer("failed_count").notNull().default(0),
  artifactIds: text("artifact_ids", { mode: "json" }).$type<string[]>().notNull(),
  cancelRequestedAt: integer("cancel_requested_at"),
  createdAt: integer("created_at").notNull(),
  updatedAt: integer("updated_at").notNull(),
  finishedAt: integer("finished_at"),
});

export const scheduledPosts = sqliteTable(
  "scheduled_posts",
  {
    id: text("id").primaryKey(),
    artifactId: text("artifact_id").notNull(),
    platformAccountId: text("platform_account_id").notNull(),
    platform: text("platform").$type<Platform>().notNull(),
    scheduledAt: integer("scheduled_at").notNull(),
    status: text("status").$type<PostStatus>().notNull(),
    attemptCount: integer("attempt_count").notNull().default(0),
    lastError: text("last_error"),
    publishingStartedAt: integer("publishing_started_at"),
    publishedAt: integer("published_at"),
    platformPostId: text("platform_post_id"),
    createdAt: integer("created_at").notNull(),
    updatedAt: integer("updated_at").notNull(),
  },
  (table) => ({
    dueIdx: index("idx_scheduled_posts_due").on(table.status, table.scheduledAt),
    accountIdx: index("idx_scheduled_posts_account").on(
      table.platformAccountId,
      table.status,
    ),
  }),
);

export const platformAccounts = sqliteTable("platform_accounts", {
  id: text("id").primaryKey(),
  avatarId: text("avatar_id").notNull(),
  platform: text("platform").$type<Platform>().notNull(),
  handle: text("handle"),
  timezone: text("timezone").notNull(),
  postingWindow: text("posting_window", { mode: "json" })
    .$type<PostingWindow>()
    .notNull(),
  policyOverrides: text("policy_overrides", { mode: "json" }).$type<
    Partial<PlatformPolicy>
  >(),
  createdAt: integer("created_at").notNull(),
  updatedAt: integer("updated_at").notNull(),
});

export const platformAccountHealth = sqliteTable("platform_account_health", {
  platformAccountId: text("platform_account_id").primaryKey(),
  consecutiveFailures: integer("consecutive_failures").notNull().default(0),
  backoffUntil: integer("backoff_until"),
  health: text("health").$type<AccountHealth>().notNull(),
  lastSuccessAt: integer("last_success_at"),
  lastFailureAt: integer("last_failure_at"),
  lastFailureRetryable: integer("last_failure_retryable", { mode: "boolean" }),
  version: integer("version").notNull(),
  updatedAt: integer("updated_at").notNull(),
});

export type ArtifactRow = typeof artifacts.$inferSelect;
export type BatchRow = typeof batches.$inferSelect;
export type ScheduledPostRow = typeof scheduledPosts.$inferSelect;
export type PlatformAccountRow = typeof platformAccounts.$inferSelect;
export type PlatformAccountHealthRow = typeof platformAccountHealth.$inferSelect;
