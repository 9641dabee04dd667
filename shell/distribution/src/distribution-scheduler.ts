/**
 * DistributionScheduler - Places eligible artifacts on platform accounts
 *
 * Each new post gets a slot from the planner: inside the account's local
 * posting hours, spaced from every committed post on the account, under the
 * daily cap and jittered around the platform cadence.
 */

import {
  AccountUnavailableError,
  DuplicateScheduleError,
  InvalidRequestError,
  KeyedMutex,
  NotFoundError,
  PipelineError,
  SchedulingWindowExhaustedError,
  getErrorMessage,
  systemClock,
  z,
} from "@avatarflow/utils";
import type { Clock, Logger, PipelineErrorCode } from "@avatarflow/utils";
import { SCHEDULABLE_ARTIFACT_STATUSES } from "@avatarflow/content-store";
import type {
  IContentStore,
  Platform,
  PostStatus,
  ScheduledPost,
} from "@avatarflow/content-store";
import type { HealthMonitor } from "@avatarflow/account-health";
import { distributionConfigSchema } from "./config";
import type { DistributionConfig, DistributionConfigInput } from "./config";
import { SlotAllocator } from "./slot-allocator";
import { markArtifactScheduled, releaseArtifactIfIdle } from "./artifact-status";
import { accountLockKey, artifactLockKey } from "./lock-keys";

export const targetWindowSchema = z
  .object({
    earliest: z.number().int().nonnegative().optional(),
    latest: z.number().int().nonnegative().optional(),
  })
  .refine(
    (window) =>
      window.earliest === undefined ||
      window.latest === undefined ||
      window.latest >= window.earliest,
    { message: "latest must not be before earliest" },
  );

/** Bounds for the publish time; both optional */
export type TargetWindow = z.infer<typeof targetWindowSchema>;

export interface DistributionSchedulerDeps {
  store: IContentStore;
  healthMonitor: HealthMonitor;
  logger: Logger;
  clock?: Clock;
  random?: () => number;
  /** Shared with the dispatch loop so both serialise on the same keys */
  mutex?: KeyedMutex;
  config?: DistributionConfigInput;
}

export interface BulkScheduleOptions {
  limit?: number;
  window?: TargetWindow;
}

export interface ScheduleFailure {
  artifactId: string;
  code: PipelineErrorCode | "UNKNOWN";
  error: string;
}

export interface BulkScheduleResult {
  scheduled: ScheduledPost[];
  failures: ScheduleFailure[];
}

export class DistributionScheduler {
  private store: IContentStore;
  private healthMonitor: HealthMonitor;
  private logger: Logger;
  private clock: Clock;
  private mutex: KeyedMutex;
  private config: DistributionConfig;
  private allocator: SlotAllocator;

  public static createFresh(deps: DistributionSchedulerDeps): DistributionScheduler {
    return new DistributionScheduler(deps);
  }

  private constructor(deps: DistributionSchedulerDeps) {
    this.store = deps.store;
    this.healthMonitor = deps.healthMonitor;
    this.logger = deps.logger.child("DistributionScheduler");
    this.clock = deps.clock ?? systemClock;
    this.mutex = deps.mutex ?? new KeyedMutex();
    this.config = distributionConfigSchema.parse(deps.config ?? {});
    this.allocator = new SlotAllocator(
      this.store,
      this.config,
      deps.random ?? Math.random,
    );
  }

  public getConfig(): DistributionConfig {
    return { ...this.config };
  }

  /**
   * Create a pending post for the artifact on the account.
   * Precondition failures leave no state behind.
   */
  public async scheduleArtifact(
    artifactId: string,
    platform: Platform,
    platformAccountId: string,
    targetWindow: TargetWindow = {},
  ): Promise<ScheduledPost> {
    const parsed = targetWindowSchema.safeParse(targetWindow);
    if (!parsed.success) {
      throw new InvalidRequestError(
        `Invalid target window: ${parsed.error.issues.map((i) => i.message).join(", ")}`,
      );
    }
    const window = parsed.data;

    return this.mutex.runExclusiveAll(
      [accountLockKey(platformAccountId), artifactLockKey(artifactId)],
      async () => {
        const account = await this.store.getPlatformAccount(platformAccountId);
        if (!account) throw new NotFoundError("platform account", platformAccountId);
        if (account.platform !== platform) {
          throw new InvalidRequestError(
            `Account ${platformAccountId} is a ${account.platform} account, not ${platform}`,
            { platformAccountId, platform },
          );
        }

        const artifact = await this.store.getArtifact(artifactId);
        if (!artifact) throw new NotFoundError("artifact", artifactId);
        if (artifact.avatarId !== account.avatarId) {
          throw new InvalidRequestError(
            `Artifact ${artifactId} does not belong to the account's avatar`,
            { artifactId, platformAccountId },
          );
        }
        if (!SCHEDULABLE_ARTIFACT_STATUSES.includes(artifact.status)) {
          throw new InvalidRequestError(
            `Artifact ${artifactId} is ${artifact.status} and cannot be scheduled`,
            { artifactId, status: artifact.status },
          );
        }

        const availability = await this.healthMonitor.checkAvailability(
          platformAccountId,
        );
        let backoffUntil = 0;
        if (!availability.available) {
          if (availability.reason === "suspended") {
            throw new AccountUnavailableError(platformAccountId, "suspended");
          }
          backoffUntil = availability.retryAt;
        }

        const active = await this.store.listArtifactPosts(artifactId, [
          "pending",
          "publishing",
        ]);
        if (active.some((post) => post.platform === platform)) {
          throw new DuplicateScheduleError(artifactId, platform);
        }

        const earliest = Math.max(
          this.clock.now(),
          window.earliest ?? 0,
          backoffUntil,
        );
        const scheduledAt = await this.allocator.allocate(account, {
          earliest,
          latest: window.latest ?? null,
        });

        const post = await this.store.createScheduledPost({
          artifactId,
          platformAccountId,
          platform,
          scheduledAt,
        });
        await markArtifactScheduled(this.store, artifactId);

        this.logger.info(`Scheduled ${artifactId} on ${platform}`, {
          postId: post.id,
          platformAccountId,
          scheduledAt: new Date(scheduledAt).toISOString(),
        });
        return post;
      },
    );
  }

  /**
   * Schedule the avatar's eligible artifacts on one account, oldest first.
   * Per-artifact precondition failures are collected; an unavailable
   * account or an exhausted window ends the run.
   */
  public async scheduleEligibleArtifacts(
    avatarId: string,
    platformAccountId: string,
    options: BulkScheduleOptions = {},
  ): Promise<BulkScheduleResult> {
    const account = await this.store.getPlatformAccount(platformAccountId);
    if (!account) throw new NotFoundError("platform account", platformAccountId);
    if (account.avatarId !== avatarId) {
      throw new InvalidRequestError(
        `Account ${platformAccountId} does not belong to avatar ${avatarId}`,
      );
    }
    if (options.limit !== undefined && options.limit < 1) {
      throw new InvalidRequestError("limit must be at least 1");
    }

    const eligible = await this.store.listEligibleArtifacts(avatarId);
    const candidates =
      options.limit === undefined ? eligible : eligible.slice(0, options.limit);

    const result: BulkScheduleResult = { scheduled: [], failures: [] };
    for (const artifact of candidates) {
      try {
        result.scheduled.push(
          await this.scheduleArtifact(
            artifact.id,
            account.platform,
            platformAccountId,
            options.window,
          ),
        );
      } catch (error) {
        if (!(error instanceof PipelineError)) throw error;
        result.failures.push({
          artifactId: artifact.id,
          code: error.code,
          error: getErrorMessage(error),
        });
        if (
          error instanceof AccountUnavailableError ||
          error instanceof SchedulingWindowExhaustedError
        ) {
          break;
        }
      }
    }

    this.logger.info(
      `Bulk scheduled ${result.scheduled.length} of ${candidates.length} artifacts for ${avatarId}`,
      { platformAccountId, failures: result.failures.length },
    );
    return result;
  }

  /**
   * Withdraw a pending post. A publish already under way cannot be
   * cancelled.
   */
  public async cancelScheduledPost(postId: string): Promise<ScheduledPost> {
    const post = await this.store.getScheduledPost(postId);
    if (!post) throw new NotFoundError("scheduled post", postId);
    if (post.status !== "pending") {
      throw new InvalidRequestError(
        `Post ${postId} is ${post.status}; only pending posts can be cancelled`,
        { postId, status: post.status },
      );
    }

    const cancelled = await this.store.updateScheduledPostStatus(
      postId,
      "pending",
      "cancelled",
    );
    await this.mutex.runExclusive(artifactLockKey(post.artifactId), () =>
      releaseArtifactIfIdle(this.store, post.artifactId),
    );

    this.logger.info(`Cancelled post ${postId}`, {
      artifactId: post.artifactId,
      platformAccountId: post.platformAccountId,
    });
    return cancelled;
  }

  public async getScheduledPost(postId: string): Promise<ScheduledPost | null> {
    return this.store.getScheduledPost(postId);
  }

  /**
   * Posts that failed permanently or ran out of attempts
   */
  public async listFailedPosts(): Promise<ScheduledPost[]> {
    return this.store.listPostsByStatus("failed");
  }

  public async listAccountPosts(
    platformAccountId: string,
    statuses: readonly PostStatus[] = ["pending", "publishing", "published"],
  ): Promise<ScheduledPost[]> {
    return this.store.listAccountPosts(platformAccountId, statuses);
  }
}
