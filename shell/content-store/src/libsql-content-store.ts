import { and, asc, eq, inArray, lte, min, sql } from "drizzle-orm";
import type { Client } from "@libsql/client";
import {
  DuplicateScheduleError,
  Logger,
  NotFoundError,
  StorageConflictError,
  createBatchId,
  createPrefixedId,
  systemClock,
} from "@avatarflow/utils";
import type { Clock } from "@avatarflow/utils";
import { createContentDatabase, enableWALMode } from "./db";
import type { ContentStoreDB, ContentStoreDbConfig } from "./db";
import {
  artifacts,
  batches,
  platformAccountHealth,
  platformAccounts,
  scheduledPosts,
} from "./schema/tables";
import type {
  ArtifactRow,
  BatchRow,
  PlatformAccountHealthRow,
  PlatformAccountRow,
  ScheduledPostRow,
} from "./schema/tables";
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
import { platformAccountSchema } from "./schemas";
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
 * Content store backed by libSQL through drizzle.
 * Guarded updates are single UPDATE ... WHERE status = ? statements, so they
 * hold across processes sharing the database.
 */
export class LibSqlContentStore implements IContentStore {
  private db: ContentStoreDB;
  private client: Client;
  private logger: Logger;

  public static createFresh(
    config: ContentStoreDbConfig,
    logger?: Logger,
    clock?: Clock,
  ): LibSqlContentStore {
    return new LibSqlContentStore(
      config,
      logger ?? Logger.getInstance(),
      clock ?? systemClock,
    );
  }

  private constructor(
    config: ContentStoreDbConfig,
    logger: Logger,
    private clock: Clock,
  ) {
    const { db, client, url } = createContentDatabase(config);
    this.db = db;
    this.client = client;
    this.logger = logger.child("LibSqlContentStore");

    enableWALMode(client, url).catch((error) => {
      this.logger.warn("Failed to enable WAL mode (non-fatal)", error);
    });
  }

  public close(): void {
    this.client.close();
  }

  async createArtifact(input: NewArtifact): Promise<ContentArtifact> {
    const now = this.clock.now();
    const [row] = await this.db
      .insert(artifacts)
      .values({
        id: createPrefixedId("art"),
        avatarId: input.avatarId,
        batchId: input.batchId,
        templateId: input.templateId,
        promptUsed: input.promptUsed,
        tier: input.tier,
        status: "requested",
        generationCostUsd: 0,
        generationLatencyMs: 0,
        safetyFlags: [],
        metadata: input.metadata ?? {},
        createdAt: now,
        updatedAt: now,
      })
      .returning();
    if (!row) throw new Error("Artifact insert returned no row");
    return toArtifact(row);
  }

  async getArtifact(id: string): Promise<ContentArtifact | null> {
    const rows = await this.db
      .select()
      .from(artifacts)
      .where(eq(artifacts.id, id))
      .limit(1);
    const row = rows[0];
    return row ? toArtifact(row) : null;
  }

  async updateArtifactStatus(
    id: string,
    from: ArtifactStatus,
    to: ArtifactStatus,
    patch: ArtifactPatch = {},
  ): Promise<ContentArtifact> {
    assertArtifactTransition(from, to);

    let metadata: Record<string, unknown> | undefined;
    if (patch.metadata) {
      const current = await this.getArtifact(id);
      if (!current) throw new NotFoundError("artifact", id);
      metadata = { ...current.metadata, ...patch.metadata };
    }

    const rows = await this.db
      .update(artifacts)
      .set({
        status: to,
        generationCostUsd: patch.generationCostUsd,
        generationLatencyMs: patch.generationLatencyMs,
        safetyVerdict: patch.safetyVerdict,
        safetyScore: patch.safetyScore,
        safetyFlags: patch.safetyFlags,
        storageLocator: patch.storageLocator,
        lastError: patch.lastError,
        metadata,
        updatedAt: this.clock.now(),
      })
      .where(and(eq(artifacts.id, id), eq(artifacts.status, from)))
      .returning();

    const row = rows[0];
    if (row) return toArtifact(row);

    const existing = await this.getArtifact(id);
    if (!existing) throw new NotFoundError("artifact", id);
    throw new StorageConflictError("artifact", id, {
      expected: from,
      actual: existing.status,
    });
  }

  async listEligibleArtifacts(avatarId: string): Promise<ContentArtifact[]> {
    const rows = await this.db
      .select()
      .from(artifacts)
      .where(and(eq(artifacts.avatarId, avatarId), eq(artifacts.status, "eligible")))
      .orderBy(asc(artifacts.createdAt), asc(artifacts.id));
    return rows.map(toArtifact);
  }

  async listArtifactsByStatus(
    status: ArtifactStatus,
    options: ListArtifactsOptions = {},
  ): Promise<ContentArtifact[]> {
    const conditions = [eq(artifacts.status, status)];
    if (options.updatedBefore !== undefined) {
      conditions.push(lte(artifacts.updatedAt, options.updatedBefore));
    }
    const query = this.db
      .select()
      .from(artifacts)
      .where(and(...conditions))
      .orderBy(asc(artifacts.createdAt), asc(artifacts.id));
    const rows =
      options.limit === undefined ? await query : await query.limit(options.limit);
    return rows.map(toArtifact);
  }

  async listBatchArtifacts(batchId: string): Promise<ContentArtifact[]> {
    const batch = await this.getBatch(batchId);
    if (!batch || batch.artifactIds.length === 0) return [];
    const rows = await this.db
      .select()
      .from(artifacts)
      .where(inArray(artifacts.id, batch.artifactIds));
    const byId = new Map(rows.map((row) => [row.id, toArtifact(row)]));
    return batch.artifactIds
      .map((id) => byId.get(id))
      .filter((a): a is ContentArtifact => a !== undefined);
  }

  async createBatch(input: NewBatch): Promise<GenerationBatch> {
    const now = this.clock.now();
    const [row] = await this.db
      .insert(batches)
      .values({
        id: createBatchId(now),
        avatarId: input.avatarId,
        requestedCount: input.requestedCount,
        tierDistribution: input.tierDistribution,
        status: "queued",
        completedCount: 0,
        failedCount: 0,
        artifactIds: [],
        createdAt: now,
        updatedAt: now,
      })
      .returning();
    if (!row) throw new Error("Batch insert returned no row");
    return toBatch(row);
  }

  async getBatch(id: string): Promise<GenerationBatch | null> {
    const rows = await this.db
      .select()
      .from(batches)
      .where(eq(batches.id, id))
      .limit(1);
    const row = rows[0];
    return row ? toBatch(row) : null;
  }

  async appendBatchArtifact(batchId: string, artifactId: string): Promise<void> {
    const artifact = await this.getArtifact(artifactId);
    if (artifact && artifact.batchId !== null && artifact.batchId !== batchId) {
      throw new StorageConflictError("batch", batchId, {
        reason: `artifact ${artifactId} already belongs to batch ${artifact.batchId}`,
      });
    }

    // Single statement append keeps concurrent workers from losing ids
    const rows = await this.db
      .update(batches)
      .set({
        artifactIds: sql`json_insert(${batches.artifactIds}, '$[#]', ${artifactId})`,
        updatedAt: this.clock.now(),
      })
      .where(
        and(
          eq(batches.id, batchId),
          sql`not exists (select 1 from json_each(${batches.artifactIds}) where value = ${artifactId})`,
        ),
      )
      .returning({ id: batches.id });

    if (rows.length === 0 && !(await this.getBatch(batchId))) {
      throw new NotFoundError("batch", batchId);
    }
  }

  async incrementBatchCounter(
    batchId: string,
    field: BatchCounterField,
  ): Promise<GenerationBatch> {
    const increment =
      field === "completedCount"
        ? { completedCount: sql`${batches.completedCount} + 1` }
        : { failedCount: sql`${batches.failedCount} + 1` };

    const rows = await this.db
      .update(batches)
      .set({ ...increment, updatedAt: this.clock.now() })
      .where(
        and(
          eq(batches.id, batchId),
          sql`${batches.completedCount} + ${batches.failedCount} < ${batches.requestedCount}`,
        ),
      )
      .returning();

    const row = rows[0];
    if (row) return toBatch(row);

    if (!(await this.getBatch(batchId))) throw new NotFoundError("batch", batchId);
    throw new StorageConflictError("batch", batchId, {
      reason: "all units already resolved",
    });
  }

  async updateBatchStatus(
    id: string,
    from: BatchStatus,
    to: BatchStatus,
  ): Promise<GenerationBatch> {
    assertBatchTransition(from, to);
    const now = this.clock.now();
    const terminal = to !== "running" && to !== "queued";

    const rows = await this.db
      .update(batches)
      .set({
        status: to,
        updatedAt: now,
        ...(terminal ? { finishedAt: now } : {}),
      })
      .where(and(eq(batches.id, id), eq(batches.status, from)))
      .returning();

    const row = rows[0];
    if (row) return toBatch(row);

    const existing = await this.getBatch(id);
    if (!existing) throw new NotFoundError("batch", id);
    throw new StorageConflictError("batch", id, {
      expected: from,
      actual: existing.status,
    });
  }

  async requestBatchCancel(id: string): Promise<GenerationBatch> {
    const now = this.clock.now();
    await this.db
      .update(batches)
      .set({ cancelRequestedAt: now, updatedAt: now })
      .where(and(eq(batches.id, id), sql`${batches.cancelRequestedAt} is null`));

    const batch = await this.getBatch(id);
    if (!batch) throw new NotFoundError("batch", id);
    return batch;
  }

  async createScheduledPost(input: NewScheduledPost): Promise<ScheduledPost> {
    const now = this.clock.now();
    try {
      const [row] = await this.db
        .insert(scheduledPosts)
        .values({
          id: createPrefixedId("post"),
          artifactId: input.artifactId,
          platformAccountId: input.platformAccountId,
          platform: input.platform,
          scheduledAt: input.scheduledAt,
          status: "pending",
          attemptCount: 0,
          createdAt: now,
          updatedAt: now,
        })
        .returning();
      if (!row) throw new Error("Scheduled post insert returned no row");
      return toPost(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateScheduleError(input.artifactId, input.platform);
      }
      throw error;
    }
  }

  async getScheduledPost(id: string): Promise<ScheduledPost | null> {
    const rows = await this.db
      .select()
      .from(scheduledPosts)
      .where(eq(scheduledPosts.id, id))
      .limit(1);
    const row = rows[0];
    return row ? toPost(row) : null;
  }

  async updateScheduledPostStatus(
    id: string,
    from: PostStatus,
    to: PostStatus,
    patch: ScheduledPostPatch = {},
  ): Promise<ScheduledPost> {
    assertPostTransition(from, to);

    let rows: ScheduledPostRow[];
    try {
      rows = await this.db
        .update(scheduledPosts)
        .set({
          status: to,
          scheduledAt: patch.scheduledAt,
          attemptCount: patch.attemptCount,
          lastError: patch.lastError,
          publishingStartedAt: patch.publishingStartedAt,
          publishedAt: patch.publishedAt,
          platformPostId: patch.platformPostId,
          updatedAt: this.clock.now(),
        })
        .where(and(eq(scheduledPosts.id, id), eq(scheduledPosts.status, from)))
        .returning();
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new StorageConflictError("scheduled post", id, {
          reason: "another active post exists for this artifact and platform",
        });
      }
      throw error;
    }

    const row = rows[0];
    if (row) return toPost(row);

    const existing = await this.getScheduledPost(id);
    if (!existing) throw new NotFoundError("scheduled post", id);
    throw new StorageConflictError("scheduled post", id, {
      expected: from,
      actual: existing.status,
    });
  }

  async reschedulePendingPost(
    id: string,
    scheduledAt: number,
  ): Promise<ScheduledPost> {
    const rows = await this.db
      .update(scheduledPosts)
      .set({ scheduledAt, updatedAt: this.clock.now() })
      .where(and(eq(scheduledPosts.id, id), eq(scheduledPosts.status, "pending")))
      .returning();

    const row = rows[0];
    if (row) return toPost(row);

    const existing = await this.getScheduledPost(id);
    if (!existing) throw new NotFoundError("scheduled post", id);
    throw new StorageConflictError("scheduled post", id, {
      expected: "pending",
      actual: existing.status,
    });
  }

  async listAccountPosts(
    platformAccountId: string,
    statuses: readonly PostStatus[],
  ): Promise<ScheduledPost[]> {
    if (statuses.length === 0) return [];
    const rows = await this.db
      .select()
      .from(scheduledPosts)
      .where(
        and(
          eq(scheduledPosts.platformAccountId, platformAccountId),
          inArray(scheduledPosts.status, [...statuses]),
        ),
      )
      .orderBy(asc(scheduledPosts.scheduledAt), asc(scheduledPosts.createdAt));
    return rows.map(toPost);
  }

  async listArtifactPosts(
    artifactId: string,
    statuses?: readonly PostStatus[],
  ): Promise<ScheduledPost[]> {
    if (statuses && statuses.length === 0) return [];
    const rows = await this.db
      .select()
      .from(scheduledPosts)
      .where(
        statuses
          ? and(
              eq(scheduledPosts.artifactId, artifactId),
              inArray(scheduledPosts.status, [...statuses]),
            )
          : eq(scheduledPosts.artifactId, artifactId),
      )
      .orderBy(asc(scheduledPosts.scheduledAt), asc(scheduledPosts.createdAt));
    return rows.map(toPost);
  }

  async listDuePosts(
    now: number,
    options: ListDuePostsOptions = {},
  ): Promise<ScheduledPost[]> {
    const query = this.db
      .select()
      .from(scheduledPosts)
      .where(
        and(
          eq(scheduledPosts.status, "pending"),
          lte(scheduledPosts.scheduledAt, now),
          options.platformAccountId === undefined
            ? undefined
            : eq(scheduledPosts.platformAccountId, options.platformAccountId),
        ),
      )
      .orderBy(asc(scheduledPosts.scheduledAt), asc(scheduledPosts.createdAt));
    const rows =
      options.limit === undefined ? await query : await query.limit(options.limit);
    return rows.map(toPost);
  }

  async listDueAccountIds(now: number): Promise<string[]> {
    const rows = await this.db
      .select({ platformAccountId: scheduledPosts.platformAccountId })
      .from(scheduledPosts)
      .where(
        and(eq(scheduledPosts.status, "pending"), lte(scheduledPosts.scheduledAt, now)),
      )
      .groupBy(scheduledPosts.platformAccountId)
      .orderBy(asc(min(scheduledPosts.scheduledAt)));
    return rows.map((row) => row.platformAccountId);
  }

  async listStalledPosts(startedBefore: number): Promise<ScheduledPost[]> {
    const rows = await this.db
      .select()
      .from(scheduledPosts)
      .where(
        and(
          eq(scheduledPosts.status, "publishing"),
          lte(scheduledPosts.publishingStartedAt, startedBefore),
        ),
      )
      .orderBy(asc(scheduledPosts.scheduledAt), asc(scheduledPosts.createdAt));
    return rows.map(toPost);
  }

  async listPostsByStatus(status: PostStatus): Promise<ScheduledPost[]> {
    const rows = await this.db
      .select()
      .from(scheduledPosts)
      .where(eq(scheduledPosts.status, status))
      .orderBy(asc(scheduledPosts.scheduledAt), asc(scheduledPosts.createdAt));
    return rows.map(toPost);
  }

  async upsertPlatformAccount(
    input: PlatformAccountInput,
  ): Promise<PlatformAccount> {
    const now = this.clock.now();
    const existing = await this.getPlatformAccount(input.id);
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

    await this.db
      .insert(platformAccounts)
      .values(account)
      .onConflictDoUpdate({
        target: platformAccounts.id,
        set: {
          avatarId: account.avatarId,
          platform: account.platform,
          handle: account.handle,
          timezone: account.timezone,
          postingWindow: account.postingWindow,
          policyOverrides: account.policyOverrides,
          updatedAt: account.updatedAt,
        },
      });

    return account;
  }

  async getPlatformAccount(id: string): Promise<PlatformAccount | null> {
    const rows = await this.db
      .select()
      .from(platformAccounts)
      .where(eq(platformAccounts.id, id))
      .limit(1);
    const row = rows[0];
    return row ? toAccount(row) : null;
  }

  async listPlatformAccounts(avatarId: string): Promise<PlatformAccount[]> {
    const rows = await this.db
      .select()
      .from(platformAccounts)
      .where(eq(platformAccounts.avatarId, avatarId))
      .orderBy(asc(platformAccounts.createdAt), asc(platformAccounts.id));
    return rows.map(toAccount);
  }

  async getPlatformAccountHealth(
    platformAccountId: string,
  ): Promise<PlatformAccountHealth | null> {
    const rows = await this.db
      .select()
      .from(platformAccountHealth)
      .where(eq(platformAccountHealth.platformAccountId, platformAccountId))
      .limit(1);
    const row = rows[0];
    return row ? toHealth(row) : null;
  }

  async upsertPlatformAccountHealth(
    record: PlatformAccountHealthInput,
    expectedVersion: number | null,
  ): Promise<PlatformAccountHealth> {
    const now = this.clock.now();
    const values = {
      consecutiveFailures: record.consecutiveFailures,
      backoffUntil: record.backoffUntil,
      health: record.health,
      lastSuccessAt: record.lastSuccessAt,
      lastFailureAt: record.lastFailureAt,
      lastFailureRetryable: record.lastFailureRetryable,
      updatedAt: now,
    };

    const rows =
      expectedVersion === null
        ? await this.db
            .insert(platformAccountHealth)
            .values({
              platformAccountId: record.platformAccountId,
              ...values,
              version: 1,
            })
            .onConflictDoNothing()
            .returning()
        : await this.db
            .update(platformAccountHealth)
            .set({ ...values, version: expectedVersion + 1 })
            .where(
              and(
                eq(
                  platformAccountHealth.platformAccountId,
                  record.platformAccountId,
                ),
                eq(platformAccountHealth.version, expectedVersion),
              ),
            )
            .returning();

    const row = rows[0];
    if (row) return toHealth(row);

    const current = await this.getPlatformAccountHealth(record.platformAccountId);
    throw new StorageConflictError(
      "platform account health",
      record.platformAccountId,
      { expectedVersion, actualVersion: current?.version ?? null },
    );
  }

  async listPlatformAccountHealth(
    filter: { health?: AccountHealth } = {},
  ): Promise<PlatformAccountHealth[]> {
    const rows = await this.db
      .select()
      .from(platformAccountHealth)
      .where(
        filter.health === undefined
          ? undefined
          : eq(platformAccountHealth.health, filter.health),
      )
      .orderBy(asc(platformAccountHealth.platformAccountId));
    return rows.map(toHealth);
  }
}

function toArtifact(row: ArtifactRow): ContentArtifact {
  return {
    id: row.id,
    avatarId: row.avatarId,
    batchId: row.batchId,
    templateId: row.templateId,
    promptUsed: row.promptUsed,
    tier: row.tier,
    status: row.status,
    generationCostUsd: row.generationCostUsd,
    generationLatencyMs: row.generationLatencyMs,
    safetyVerdict: row.safetyVerdict,
    safetyScore: row.safetyScore,
    safetyFlags: row.safetyFlags,
    storageLocator: row.storageLocator,
    lastError: row.lastError,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    metadata: row.metadata,
  };
}

function toBatch(row: BatchRow): GenerationBatch {
  return {
    id: row.id,
    avatarId: row.avatarId,
    requestedCount: row.requestedCount,
    tierDistribution: row.tierDistribution,
    status: row.status,
    completedCount: row.completedCount,
    failedCount: row.failedCount,
    artifactIds: row.artifactIds,
    cancelRequestedAt: row.cancelRequestedAt,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    finishedAt: row.finishedAt,
  };
}

function toPost(row: ScheduledPostRow): ScheduledPost {
  return {
    id: row.id,
    artifactId: row.artifactId,
    platformAccountId: row.platformAccountId,
    platform: row.platform,
    scheduledAt: row.scheduledAt,
    status: row.status,
    attemptCount: row.attemptCount,
    lastError: row.lastError,
    publishingStartedAt: row.publishingStartedAt,
    publishedAt: row.publishedAt,
    platformPostId: row.platformPostId,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toAccount(row: PlatformAccountRow): PlatformAccount {
  return {
    id: row.id,
    avatarId: row.avatarId,
    platform: row.platform,
    handle: row.handle,
    timezone: row.timezone,
    postingWindow: row.postingWindow,
    policyOverrides: row.policyOverrides,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toHealth(row: PlatformAccountHealthRow): PlatformAccountHealth {
  return {
    platformAccountId: row.platformAccountId,
    consecutiveFailures: row.consecutiveFailures,
    backoffUntil: row.backoffUntil,
    health: row.health,
    lastSuccessAt: row.lastSuccessAt,
    lastFailureAt: row.lastFailureAt,
    lastFailureRetryable: row.lastFailureRetryable,
    version: row.version,
    updatedAt: row.updatedAt,
  };
}

/**
 * drizzle may wrap the driver error, so walk the cause chain
 */
function isUniqueViolation(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if (current.message.includes("UNIQUE constraint failed")) return true;
    current = current.cause;
  }
  return false;
}
