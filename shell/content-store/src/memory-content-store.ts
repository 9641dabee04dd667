import {
  DuplicateScheduleError,
  NotFoundError,
  StorageConflictError,
  createBatchId,
  createPrefixedId,
  systemClock,
} from "@avatarflow/utils";
import type { Clock } from "@avatarflow/utils";
import type {
  AccountHealth,
  ArtifactStatus,
  BatchStatus,
  ContentArtifact,
  GenerationBatch,
  PlatformAccount,
  PlatformAccountHealth,
  PostStatus,
  ScheduledPost,
} from "./schemas";
import { ACTIVE_POST_STATUSES, platformAccountSchema } from "./schemas";
import { applyArtifactPatch, applyPostPatch } from "./patch";
import {
  assertArtifactTransition,
  assertBatchTransition,
  assertPostTransition,
} from "./transitions";
import type {
  ArtifactPatch,
  BatchCounterField,
  IContentStore,
  ListArtifactsOptions,
  ListDuePostsOptions,
  NewArtifact,
  NewBatch,
  NewScheduledPost,
  PlatformAccountHealthInput,
  PlatformAccountInput,
  ScheduledPostPatch,
} from "./types";

/**
 * Single-process content store.
 *
 * Every method completes its read-check-write without awaiting in between,
 * so guarded updates are atomic on the event loop. Records are copied on
 * the way in and out.
 */
export class InMemoryContentStore implements IContentStore {
  private artifacts = new Map<string, ContentArtifact>();
  private batches = new Map<string, GenerationBatch>();
  private posts = new Map<string, ScheduledPost>();
  private accounts = new Map<string, PlatformAccount>();
  private health = new Map<string, PlatformAccountHealth>();

  constructor(private clock: Clock = systemClock) {}

  async createArtifact(input: NewArtifact): Promise<ContentArtifact> {
    const now = this.clock.now();
    const artifact: ContentArtifact = {
      id: createPrefixedId("art"),
      avatarId: input.avatarId,
      batchId: input.batchId,
      templateId: input.templateId,
      promptUsed: input.promptUsed,
      tier: input.tier,
      status: "requested",
      generationCostUsd: 0,
      generationLatencyMs: 0,
      safetyVerdict: null,
      safetyScore: null,
      safetyFlags: [],
      storageLocator: null,
      lastError: null,
      createdAt: now,
      updatedAt: now,
      metadata: input.metadata ?? {},
    };
    this.artifacts.set(artifact.id, artifact);
    return structuredClone(artifact);
  }

  async getArtifact(id: string): Promise<ContentArtifact | null> {
    const artifact = this.artifacts.get(id);
    return artifact ? structuredClone(artifact) : null;
  }

  async updateArtifactStatus(
    id: string,
    from: ArtifactStatus,
    to: ArtifactStatus,
    patch: ArtifactPatch = {},
  ): Promise<ContentArtifact> {
    assertArtifactTransition(from, to);
    const artifact = this.artifacts.get(id);
    if (!artifact) throw new NotFoundError("artifact", id);
    if (artifact.status !== from) {
      throw new StorageConflictError("artifact", id, {
        expected: from,
        actual: artifact.status,
      });
    }

    const updated: ContentArtifact = {
      ...applyArtifactPatch(artifact, patch),
      status: to,
      updatedAt: this.clock.now(),
    };
    this.artifacts.set(id, updated);
    return structuredClone(updated);
  }

  async listEligibleArtifacts(avatarId: string): Promise<ContentArtifact[]> {
    return this.sortedArtifacts().filter(
      (a) => a.avatarId === avatarId && a.status === "eligible",
    );
  }

  async listArtifactsByStatus(
    status: ArtifactStatus,
    options: ListArtifactsOptions = {},
  ): Promise<ContentArtifact[]> {
    const { updatedBefore, limit } = options;
    const matches = this.sortedArtifacts().filter(
      (a) =>
        a.status === status &&
        (updatedBefore === undefined || a.updatedAt <= updatedBefore),
    );
    return limit === undefined ? matches : matches.slice(0, limit);
  }

  async listBatchArtifacts(batchId: string): Promise<ContentArtifact[]> {
    const batch = this.batches.get(batchId);
    if (!batch) return [];
    return batch.artifactIds
      .map((id) => this.artifacts.get(id))
      .filter((a): a is ContentArtifact => a !== undefined)
      .map((a) => structuredClone(a));
  }

  async createBatch(input: NewBatch): Promise<GenerationBatch> {
    const now = this.clock.now();
    const batch: GenerationBatch = {
      id: createBatchId(now),
      avatarId: input.avatarId,
      requestedCount: input.requestedCount,
      tierDistribution: { ...input.tierDistribution },
      status: "queued",
      completedCount: 0,
      failedCount: 0,
      artifactIds: [],
      cancelRequestedAt: null,
      createdAt: now,
      updatedAt: now,
      finishedAt: null,
    };
    this.batches.set(batch.id, batch);
    return structuredClone(batch);
  }

  async getBatch(id: string): Promise<GenerationBatch | null> {
    const batch = this.batches.get(id);
    return batch ? structuredClone(batch) : null;
  }

  async appendBatchArtifact(batchId: string, artifactId: string): Promise<void> {
    const batch = this.requireBatch(batchId);
    if (batch.artifactIds.includes(artifactId)) return;
    const artifact = this.artifacts.get(artifactId);
    if (artifact && artifact.batchId !== null && artifact.batchId !== batchId) {
      throw new StorageConflictError("batch", batchId, {
        reason: `artifact ${artifactId} already belongs to batch ${artifact.batchId}`,
      });
    }
    for (const other of this.batches.values()) {
      if (other.id !== batchId && other.artifactIds.includes(artifactId)) {
        throw new StorageConflictError("batch", batchId, {
          reason: `artifact ${artifactId} already belongs to batch ${other.id}`,
        });
      }
    }
    this.batches.set(batchId, {
      ...batch,
      artifactIds: [...batch.artifactIds, artifactId],
      updatedAt: this.clock.now(),
    });
  }

  async incrementBatchCounter(
    batchId: string,
    field: BatchCounterField,
  ): Promise<GenerationBatch> {
    const batch = this.requireBatch(batchId);
    if (batch.completedCount + batch.failedCount >= batch.requestedCount) {
      throw new StorageConflictError("batch", batchId, {
        reason: "all units already resolved",
      });
    }
    const updated: GenerationBatch = {
      ...batch,
      completedCount:
        field === "completedCount" ? batch.completedCount + 1 : batch.completedCount,
      failedCount:
        field === "failedCount" ? batch.failedCount + 1 : batch.failedCount,
      updatedAt: this.clock.now(),
    };
    this.batches.set(batchId, updated);
    return structuredClone(updated);
  }

  async updateBatchStatus(
    id: string,
    from: BatchStatus,
    to: BatchStatus,
  ): Promise<GenerationBatch> {
    assertBatchTransition(from, to);
    const batch = this.requireBatch(id);
    if (batch.status !== from) {
      throw new StorageConflictError("batch", id, {
        expected: from,
        actual: batch.status,
      });
    }
    const now = this.clock.now();
    const terminal = to !== "running" && to !== "queued";
    const updated: GenerationBatch = {
      ...batch,
      status: to,
      updatedAt: now,
      finishedAt: terminal ? now : batch.finishedAt,
    };
    this.batches.set(id, updated);
    return structuredClone(updated);
  }

  async requestBatchCancel(id: string): Promise<GenerationBatch> {
    const batch = this.requireBatch(id);
    if (batch.cancelRequestedAt !== null) return structuredClone(batch);
    const now = this.clock.now();
    const updated: GenerationBatch = {
      ...batch,
      cancelRequestedAt: now,
      updatedAt: now,
    };
    this.batches.set(id, updated);
    return structuredClone(updated);
  }

  async createScheduledPost(input: NewScheduledPost): Promise<ScheduledPost> {
    const duplicate = [...this.posts.values()].some(
      (p) =>
        p.artifactId === input.artifactId &&
        p.platform === input.platform &&
        ACTIVE_POST_STATUSES.includes(p.status),
    );
    if (duplicate) {
      throw new DuplicateScheduleError(input.artifactId, input.platform);
    }

    const now = this.clock.now();
    const post: ScheduledPost = {
      id: createPrefixedId("post"),
      artifactId: input.artifactId,
      platformAccountId: input.platformAccountId,
      platform: input.platform,
      scheduledAt: input.scheduledAt,
      status: "pending",
      attemptCount: 0,
      lastError: null,
      publishingStartedAt: null,
      publishedAt: null,
      platformPostId: null,
      createdAt: now,
      updatedAt: now,
    };
    this.posts.set(post.id, post);
    return structuredClone(post);
  }

  async getScheduledPost(id: string): Promise<ScheduledPost | null> {
    const post = this.posts.get(id);
    return post ? structuredClone(post) : null;
  }

  async updateScheduledPostStatus(
    id: string,
    from: PostStatus,
    to: PostStatus,
    patch: ScheduledPostPatch = {},
  ): Promise<ScheduledPost> {
    assertPostTransition(from, to);
    const post = this.posts.get(id);
    if (!post) throw new NotFoundError("scheduled post", id);
    if (post.status !== from) {
      throw new StorageConflictError("scheduled post", id, {
        expected: from,
        actual: post.status,
      });
    }
    const updated: ScheduledPost = {
      ...applyPostPatch(post, patch),
      status: to,
      updatedAt: this.clock.now(),
    };
    this.posts.set(id, updated);
    return structuredClone(updated);
  }

  async reschedulePendingPost(
    id: string,
    scheduledAt: number,
  ): Promise<ScheduledPost> {
    const post = this.posts.get(id);
    if (!post) throw new NotFoundError("scheduled post", id);
    if (post.status !== "pending") {
      throw new StorageConflictError("scheduled post", id, {
        expected: "pending",
        actual: post.status,
      });
    }
    const updated: ScheduledPost = {
      ...post,
      scheduledAt,
      updatedAt: this.clock.now(),
    };
    this.posts.set(id, updated);
    return structuredClone(updated);
  }

  async listAccountPosts(
    platformAccountId: string,
    statuses: readonly PostStatus[],
  ): Promise<ScheduledPost[]> {
    return this.sortedPosts().filter(
      (p) =>
        p.platformAccountId === platformAccountId && statuses.includes(p.status),
    );
  }

  async listArtifactPosts(
    artifactId: string,
    statuses?: readonly PostStatus[],
  ): Promise<ScheduledPost[]> {
    return this.sortedPosts().filter(
      (p) =>
        p.artifactId === artifactId &&
        (statuses === undefined || statuses.includes(p.status)),
    );
  }

  async listDuePosts(
    now: number,
    options: ListDuePostsOptions = {},
  ): Promise<ScheduledPost[]> {
    const due = this.sortedPosts().filter(
      (p) =>
        p.status === "pending" &&
        p.scheduledAt <= now &&
        (options.platformAccountId === undefined ||
          p.platformAccountId === options.platformAccountId),
    );
    return options.limit === undefined ? due : due.slice(0, options.limit);
  }

  async listDueAccountIds(now: number): Promise<string[]> {
    const due = await this.listDuePosts(now);
    return Array.from(new Set(due.map((p) => p.platformAccountId)));
  }

  async listStalledPosts(startedBefore: number): Promise<ScheduledPost[]> {
    return this.sortedPosts().filter(
      (p) =>
        p.status === "publishing" &&
        p.publishingStartedAt !== null &&
        p.publishingStartedAt <= startedBefore,
    );
  }

  async listPostsByStatus(status: PostStatus): Promise<ScheduledPost[]> {
    return this.sortedPosts().filter((p) => p.status === status);
  }

  async upsertPlatformAccount(
    input: PlatformAccountInput,
  ): Promise<PlatformAccount> {
    const now = this.clock.now();
    const existing = this.accounts.get(input.id);
    const account = platformAccountSchema.parse({
      id: input.id,
      avatarId: input.avatarId,
      platform: input.platform,
      handle: input.handle ?? null,
      timezone: input.timezone,
      postingWindow: input.postingWindow,
      policyOverrides: input.policyOverrides ?? null,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    });
    this.accounts.set(account.id, account);
    return structuredClone(account);
  }

  async getPlatformAccount(id: string): Promise<PlatformAccount | null> {
    const account = this.accounts.get(id);
    return account ? structuredClone(account) : null;
  }

  async listPlatformAccounts(avatarId: string): Promise<PlatformAccount[]> {
    return [...this.accounts.values()]
      .filter((a) => a.avatarId === avatarId)
      .sort((a, b) => a.createdAt - b.createdAt || a.id.localeCompare(b.id))
      .map((a) => structuredClone(a));
  }

  async getPlatformAccountHealth(
    platformAccountId: string,
  ): Promise<PlatformAccountHealth | null> {
    const record = this.health.get(platformAccountId);
    return record ? structuredClone(record) : null;
  }

  async upsertPlatformAccountHealth(
    record: PlatformAccountHealthInput,
    expectedVersion: number | null,
  ): Promise<PlatformAccountHealth> {
    const existing = this.health.get(record.platformAccountId);
    const currentVersion = existing?.version ?? null;
    if (currentVersion !== expectedVersion) {
      throw new StorageConflictError(
        "platform account health",
        record.platformAccountId,
        { expectedVersion, actualVersion: currentVersion },
      );
    }
    const stored: PlatformAccountHealth = {
      ...record,
      version: (currentVersion ?? 0) + 1,
      updatedAt: this.clock.now(),
    };
    this.health.set(record.platformAccountId, stored);
    return structuredClone(stored);
  }

  async listPlatformAccountHealth(
    filter: { health?: AccountHealth } = {},
  ): Promise<PlatformAccountHealth[]> {
    return [...this.health.values()]
      .filter((h) => filter.health === undefined || h.health === filter.health)
      .sort((a, b) => a.platformAccountId.localeCompare(b.platformAccountId))
      .map((h) => structuredClone(h));
  }

  private requireBatch(id: string): GenerationBatch {
    const batch = this.batches.get(id);
    if (!batch) throw new NotFoundError("batch", id);
    return batch;
  }

  private sortedArtifacts(): ContentArtifact[] {
    return [...this.artifacts.values()]
      .sort((a, b) => a.createdAt - b.createdAt)
      .map((a) => structuredClone(a));
  }

  private sortedPosts(): ScheduledPost[] {
    return [...this.posts.values()]
      .sort((a, b) => a.scheduledAt - b.scheduledAt || a.createdAt - b.createdAt)
      .map((p) => structuredClone(p));
  }
}

