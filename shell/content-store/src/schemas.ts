import { z } from "@avatarflow/utils";

/**
 * Monetization tier an artifact targets. Immutable once the artifact exists.
 */
export const TierEnum = z.enum(["basic", "premium", "custom"]);
export type Tier = z.infer<typeof TierEnum>;

export const PlatformEnum = z.enum(["instagram", "tiktok", "twitter", "onlyfans"]);
export type Platform = z.infer<typeof PlatformEnum>;

export const SafetyVerdictEnum = z.enum(["safe", "borderline", "rejected"]);
export type SafetyVerdict = z.infer<typeof SafetyVerdictEnum>;

export const ArtifactStatusEnum = z.enum([
  "requested",
  "generating",
  "pending_safety",
  "safe",
  "borderline",
  "rejected",
  "eligible",
  "scheduled",
  "published",
  "failed",
]);
export type ArtifactStatus = z.infer<typeof ArtifactStatusEnum>;

export const ARTIFACT_STATUS = {
  REQUESTED: "requested" as const,
  GENERATING: "generating" as const,
  PENDING_SAFETY: "pending_safety" as const,
  SAFE: "safe" as const,
  BORDERLINE: "borderline" as const,
  REJECTED: "rejected" as const,
  ELIGIBLE: "eligible" as const,
  SCHEDULED: "scheduled" as const,
  PUBLISHED: "published" as const,
  FAILED: "failed" as const,
} as const;

export const BatchStatusEnum = z.enum([
  "queued",
  "running",
  "completed",
  "partially_failed",
  "failed",
  "cancelled",
]);
export type BatchStatus = z.infer<typeof BatchStatusEnum>;

export const BATCH_STATUS = {
  QUEUED: "queued" as const,
  RUNNING: "running" as const,
  COMPLETED: "completed" as const,
  PARTIALLY_FAILED: "partially_failed" as const,
  FAILED: "failed" as const,
  CANCELLED: "cancelled" as const,
} as const;

export const TERMINAL_BATCH_STATUSES: readonly BatchStatus[] = [
  "completed",
  "partially_failed",
  "failed",
  "cancelled",
];

export const PostStatusEnum = z.enum([
  "pending",
  "publishing",
  "published",
  "failed",
  "cancelled",
]);
export type PostStatus = z.infer<typeof PostStatusEnum>;

export const POST_STATUS = {
  PENDING: "pending" as const,
  PUBLISHING: "publishing" as const,
  PUBLISHED: "published" as const,
  FAILED: "failed" as const,
  CANCELLED: "cancelled" as const,
} as const;

/** Posts that occupy an (artifact, platform) pair */
export const ACTIVE_POST_STATUSES: readonly PostStatus[] = [
  "pending",
  "publishing",
];

export const AccountHealthEnum = z.enum(["healthy", "degraded", "suspended"]);
export type AccountHealth = z.infer<typeof AccountHealthEnum>;

export const ACCOUNT_HEALTH = {
  HEALTHY: "healthy" as const,
  DEGRADED: "degraded" as const,
  SUSPENDED: "suspended" as const,
} as const;

/**
 * Tier -> count. Counts must sum to the batch's requested count.
 */
export const tierDistributionSchema = z.record(
  TierEnum,
  z.number().int().nonnegative(),
);
export type TierDistribution = Partial<Record<Tier, number>>;

export const contentArtifactSchema = z.object({
  id: z.string(),
  avatarId: z.string(),
  batchId: z.string().nullable(),
  templateId: z.string().nullable(),
  promptUsed: z.string(),
  tier: TierEnum,
  status: ArtifactStatusEnum,
  generationCostUsd: z.number().nonnegative(),
  generationLatencyMs: z.number().nonnegative(),
  safetyVerdict: SafetyVerdictEnum.nullable(),
  safetyScore: z.number().nullable(),
  safetyFlags: z.array(z.string()),
  storageLocator: z.string().nullable(),
  lastError: z.string().nullable(),
  createdAt: z.number(),
  updatedAt: z.number(),
  metadata: z.record(z.unknown()),
});
export type ContentArtifact = z.infer<typeof contentArtifactSchema>;

export const generationBatchSchema = z.object({
  id: z.string(),
  avatarId: z.string(),
  requestedCount: z.number().int().positive(),
  tierDistribution: tierDistributionSchema,
  status: BatchStatusEnum,
  completedCount: z.number().int().nonnegative(),
  failedCount: z.number().int().nonnegative(),
  artifactIds: z.array(z.string()),
  cancelRequestedAt: z.number().nullable(),
  createdAt: z.number(),
  updatedAt: z.number(),
  finishedAt: z.number().nullable(),
});
export type GenerationBatch = z.infer<typeof generationBatchSchema>;

export const scheduledPostSchema = z.object({
  id: z.string(),
  artifactId: z.string(),
  platformAccountId: z.string(),
  platform: PlatformEnum,
  scheduledAt: z.number(),
  status: PostStatusEnum,
  attemptCount: z.number().int().nonnegative(),
  lastError: z.string().nullable(),
  publishingStartedAt: z.number().nullable(),
  publishedAt: z.number().nullable(),
  platformPostId: z.string().nullable(),
  createdAt: z.number(),
  updatedAt: z.number(),
});
export type ScheduledPost = z.infer<typeof scheduledPostSchema>;

export const platformAccountHealthSchema = z.object({
  platformAccountId: z.string(),
  consecutiveFailures: z.number().int().nonnegative(),
  backoffUntil: z.number().nullable(),
  health: AccountHealthEnum,
  lastSuccessAt: z.number().nullable(),
  lastFailureAt: z.number().nullable(),
  lastFailureRetryable: z.boolean().nullable(),
  version: z.number().int().nonnegative(),
  updatedAt: z.number(),
});
export type PlatformAccountHealth = z.infer<typeof platformAccountHealthSchema>;

/**
 * Local posting hours, [startHour, endHour) in the account's timezone
 */
export const postingWindowSchema = z
  .object({
    startHour: z.number().int().min(0).max(23),
    endHour: z.number().int().min(1).max(24),
  })
  .refine((window) => window.endHour > window.startHour, {
    message: "endHour must be after startHour",
  });
export type PostingWindow = z.infer<typeof postingWindowSchema>;

/**
 * Per-platform posting cadence
 */
export const platformPolicySchema = z.object({
  /** Cadence between consecutive posts before jitter */
  baseIntervalMs: z.number().int().positive(),
  /** Uniform jitter bound as a share of the base interval */
  jitterRatio: z.number().min(0).max(0.9),
  maxPostsPerDay: z.number().int().positive(),
});
export type PlatformPolicy = z.infer<typeof platformPolicySchema>;

export const platformAccountSchema = z.object({
  id: z.string(),
  avatarId: z.string(),
  platform: PlatformEnum,
  handle: z.string().nullable(),
  timezone: z.string().refine(isValidTimeZone, {
    message: "Unknown IANA timezone",
  }),
  postingWindow: postingWindowSchema,
  policyOverrides: platformPolicySchema.partial().nullable(),
  createdAt: z.number(),
  updatedAt: z.number(),
});
export type PlatformAccount = z.infer<typeof platformAccountSchema>;

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}
