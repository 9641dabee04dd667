import type {
  AccountHealth,
  ArtifactStatus,
  BatchStatus,
  ContentArtifact,
  GenerationBatch,
  Platform,
  PlatformAccount,
  PlatformAccountHealth,
  PostStatus,
  PostingWindow,
  PlatformPolicy,
  SafetyVerdict,
  ScheduledPost,
  Tier,
  TierDistribution,
} from "./schemas";

export interface NewArtifact {
  avatarId: string;
  batchId: string | null;
  templateId: string | null;
  promptUsed: string;
  tier: Tier;
  metadata?: Record<string, unknown>;
}

/**
 * Fields that may change alongside a status transition.
 * Undefined fields are left untouched. Tier is deliberately absent.
 */
export interface ArtifactPatch {
  generationCostUsd?: number;
  generationLatencyMs?: number;
  safetyVerdict?: SafetyVerdict;
  safetyScore?: number;
  safetyFlags?: string[];
  storageLocator?: string;
  lastError?: string | null;
  metadata?: Record<string, unknown>;
}

export interface NewBatch {
  avatarId: string;
  requestedCount: number;
  tierDistribution: TierDistribution;
}

export type BatchCounterField = "completedCount" | "failedCount";

export interface NewScheduledPost {
  artifactId: string;
  platformAccountId: string;
  platform: Platform;
  scheduledAt: number;
}

export interface ScheduledPostPatch {
  scheduledAt?: number;
  attemptCount?: number;
  lastError?: string | null;
  publishingStartedAt?: number | null;
  publishedAt?: number | null;
  platformPostId?: string | null;
}

export interface PlatformAccountInput {
  id: string;
  avatarId: string;
  platform: Platform;
  handle?: string | null;
  timezone: string;
  postingWindow: PostingWindow;
  policyOverrides?: Partial<PlatformPolicy> | null;
}

export type PlatformAccountHealthInput = Omit<
  PlatformAccountHealth,
  "version" | "updatedAt"
>;

export interface ListArtifactsOptions {
  /** Only artifacts last updated at or before this time */
  updatedBefore?: number;
  limit?: number;
}

export interface ListDuePostsOptions {
  platformAccountId?: string;
  limit?: number;
}

/**
 * Repository operations over artifacts, batches, scheduled posts and
 * platform accounts. Every status change is a guarded conditional update:
 * it succeeds only if the stored status still equals `from`, otherwise it
 * throws StorageConflictError and the caller re-reads.
 */
export interface IContentStore {
  createArtifact(input: NewArtifact): Promise<ContentArtifact>;
  getArtifact(id: string): Promise<ContentArtifact | null>;
  updateArtifactStatus(
    id: string,
    from: ArtifactStatus,
    to: ArtifactStatus,
    patch?: ArtifactPatch,
  ): Promise<ContentArtifact>;
  listEligibleArtifacts(avatarId: string): Promise<ContentArtifact[]>;
  listArtifactsByStatus(
    status: ArtifactStatus,
    options?: ListArtifactsOptions,
  ): Promise<ContentArtifact[]>;
  listBatchArtifacts(batchId: string): Promise<ContentArtifact[]>;

  createBatch(input: NewBatch): Promise<GenerationBatch>;
  getBatch(id: string): Promise<GenerationBatch | null>;
  appendBatchArtifact(batchId: string, artifactId: string): Promise<void>;
  incrementBatchCounter(
    batchId: string,
    field: BatchCounterField,
  ): Promise<GenerationBatch>;
  updateBatchStatus(
    id: string,
    from: BatchStatus,
    to: BatchStatus,
  ): Promise<GenerationBatch>;
  requestBatchCancel(id: string): Promise<GenerationBatch>;

  /** Throws DuplicateScheduleError if the artifact already has an active post on the platform */
  createScheduledPost(input: NewScheduledPost): Promise<ScheduledPost>;
  getScheduledPost(id: string): Promise<ScheduledPost | null>;
  updateScheduledPostStatus(
    id: string,
    from: PostStatus,
    to: PostStatus,
    patch?: ScheduledPostPatch,
  ): Promise<ScheduledPost>;
  /** Move a pending post to a new time; conflicts if it is no longer pending */
  reschedulePendingPost(id: string, scheduledAt: number): Promise<ScheduledPost>;
  listAccountPosts(
    platformAccountId: string,
    statuses: readonly PostStatus[],
  ): Promise<ScheduledPost[]>;
  listArtifactPosts(
    artifactId: string,
    statuses?: readonly PostStatus[],
  ): Promise<ScheduledPost[]>;
  /** Pending posts with scheduledAt <= now, earliest first */
  listDuePosts(now: number, options?: ListDuePostsOptions): Promise<ScheduledPost[]>;
  /** Accounts holding at least one due pending post, earliest due first */
  listDueAccountIds(now: number): Promise<string[]>;
  /** Publishing posts whose publish started at or before the cutoff */
  listStalledPosts(startedBefore: number): Promise<ScheduledPost[]>;
  listPostsByStatus(status: PostStatus): Promise<ScheduledPost[]>;

  upsertPlatformAccount(input: PlatformAccountInput): Promise<PlatformAccount>;
  getPlatformAccount(id: string): Promise<PlatformAccount | null>;
  listPlatformAccounts(avatarId: string): Promise<PlatformAccount[]>;

  getPlatformAccountHealth(
    platformAccountId: string,
  ): Promise<PlatformAccountHealth | null>;
  /**
   * Optimistic write. `expectedVersion` null inserts a new record; a number
   * must match the stored version. The stored version is then incremented.
   */
  upsertPlatformAccountHealth(
    record: PlatformAccountHealthInput,
    expectedVersion: number | null,
  ): Promise<PlatformAccountHealth>;
  listPlatformAccountHealth(filter?: {
    health?: AccountHealth;
  }): Promise<PlatformAccountHealth[]>;
}
