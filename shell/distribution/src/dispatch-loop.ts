/**
 * DispatchLoop - Periodic sweep that publishes due posts
 *
 * One tick visits every account holding due pending posts or stalled
 * publishing posts and publishes at most one post per account. Accounts run
 * side by side; a single account is never published to concurrently.
 */

import {
  KeyedMutex,
  StorageConflictError,
  getErrorMessage,
  isRetryableError,
  systemClock,
  withTimeout,
} from "@avatarflow/utils";
import type { Clock, Logger } from "@avatarflow/utils";
import type {
  ContentArtifact,
  IContentStore,
  PlatformAccount,
  ScheduledPost,
} from "@avatarflow/content-store";
import type { HealthMonitor } from "@avatarflow/account-health";
import { distributionConfigSchema, resolvePlatformPolicy } from "./config";
import type { DistributionConfig, DistributionConfigInput } from "./config";
import type { PublisherRegistry, PlatformPublisher, PublishResult } from "./publisher";
import { CronerBackend } from "./scheduler-backend";
import type { ScheduledJob, SchedulerBackend } from "./scheduler-backend";
import { SlotAllocator } from "./slot-allocator";
import { minimumSpacingMs } from "./slot-planner";
import { markArtifactPublished, releaseArtifactIfIdle } from "./artifact-status";
import { accountLockKey, artifactLockKey } from "./lock-keys";

export interface PostPublishedEvent {
  post: ScheduledPost;
  result: PublishResult;
}

export interface PostFailedEvent {
  post: ScheduledPost;
  error: string;
  attemptCount: number;
  willRetry: boolean;
}

export interface DispatchReport {
  published: string[];
  retried: string[];
  failed: string[];
  /** Posts left pending because their account is unavailable or has no publisher */
  deferred: string[];
  /** Accounts whose previous tick was still running */
  skippedAccounts: string[];
}

export interface DispatchLoopDeps {
  store: IContentStore;
  healthMonitor: HealthMonitor;
  publishers: PublisherRegistry;
  logger: Logger;
  clock?: Clock;
  random?: () => number;
  mutex?: KeyedMutex;
  backend?: SchedulerBackend;
  config?: DistributionConfigInput;
  onPublished?: (event: PostPublishedEvent) => void;
  onFailed?: (event: PostFailedEvent) => void;
}

export class DispatchLoop {
  private store: IContentStore;
  private healthMonitor: HealthMonitor;
  private publishers: PublisherRegistry;
  private logger: Logger;
  private clock: Clock;
  private mutex: KeyedMutex;
  private backend: SchedulerBackend;
  private config: DistributionConfig;
  private allocator: SlotAllocator;
  private onPublished: ((event: PostPublishedEvent) => void) | undefined;
  private onFailed: ((event: PostFailedEvent) => void) | undefined;

  private job: ScheduledJob | null = null;
  private inFlight = new Set<string>();

  public static createFresh(deps: DispatchLoopDeps): DispatchLoop {
    return new DispatchLoop(deps);
  }

  private constructor(deps: DispatchLoopDeps) {
    this.store = deps.store;
    this.healthMonitor = deps.healthMonitor;
    this.publishers = deps.publishers;
    this.logger = deps.logger.child("DispatchLoop");
    this.clock = deps.clock ?? systemClock;
    this.mutex = deps.mutex ?? new KeyedMutex();
    this.config = distributionConfigSchema.parse(deps.config ?? {});
    this.backend =
      deps.backend ??
      new CronerBackend((error) =>
        this.logger.error("Dispatch job failed", { error: getErrorMessage(error) }),
      );
    this.allocator = new SlotAllocator(
      this.store,
      this.config,
      deps.random ?? Math.random,
    );
    this.onPublished = deps.onPublished;
    this.onFailed = deps.onFailed;
  }

  public start(): void {
    if (this.job) return;
    this.job = this.backend.scheduleInterval(this.config.dispatchIntervalMs, () =>
      this.runTick(),
    );
    this.logger.info("Dispatch loop started", {
      intervalMs: this.config.dispatchIntervalMs,
    });
  }

  public stop(): void {
    if (!this.job) return;
    this.job.stop();
    this.job = null;
    this.logger.info("Dispatch loop stopped");
  }

  public isRunning(): boolean {
    return this.job !== null;
  }

  /**
   * One sweep. Safe to call while an earlier sweep is still running:
   * accounts that sweep holds are skipped.
   */
  public async tick(): Promise<DispatchReport> {
    const now = this.clock.now();
    const stalled = await this.store.listStalledPosts(now - this.config.stallTimeoutMs);
    const dueAccounts = await this.store.listDueAccountIds(now);

    const stalledByAccount = new Map<string, ScheduledPost[]>();
    for (const post of stalled) {
      const posts = stalledByAccount.get(post.platformAccountId) ?? [];
      posts.push(post);
      stalledByAccount.set(post.platformAccountId, posts);
    }
    const accountIds = new Set([...stalledByAccount.keys(), ...dueAccounts]);

    const report: DispatchReport = {
      published: [],
      retried: [],
      failed: [],
      deferred: [],
      skippedAccounts: [],
    };

    await Promise.all(
      Array.from(accountIds, (accountId) =>
        this.processAccount(
          accountId,
          now,
          stalledByAccount.get(accountId) ?? [],
          report,
        ),
      ),
    );

    if (accountIds.size > 0) {
      this.logger.debug("Dispatch tick finished", {
        published: report.published.length,
        retried: report.retried.length,
        failed: report.failed.length,
        deferred: report.deferred.length,
      });
    }
    return report;
  }

  private async runTick(): Promise<void> {
    try {
      await this.tick();
    } catch (error) {
      this.logger.error("Dispatch tick failed", { error: getErrorMessage(error) });
    }
  }

  private async processAccount(
    accountId: string,
    now: number,
    stalled: ScheduledPost[],
    report: DispatchReport,
  ): Promise<void> {
    if (this.inFlight.has(accountId)) {
      report.skippedAccounts.push(accountId);
      return;
    }
    this.inFlight.add(accountId);

    try {
      const due = await this.store.listDuePosts(now, {
        platformAccountId: accountId,
        limit: this.config.dispatchBatchSize,
      });
      const posts = [...stalled, ...due];

      const availability = await this.healthMonitor.checkAvailability(accountId);
      if (!availability.available) {
        this.defer(posts, report);
        this.logger.debug(`Account ${accountId} unavailable, deferring`, {
          reason: availability.reason,
          retryAt: availability.retryAt,
        });
        return;
      }

      const account = await this.store.getPlatformAccount(accountId);
      if (!account) {
        this.defer(posts, report);
        this.logger.error(`Posts reference unknown account ${accountId}`);
        return;
      }

      const publisher = this.publishers.get(account.platform);
      if (!publisher) {
        this.defer(posts, report);
        this.logger.error(`No publisher registered for ${account.platform}`, {
          platformAccountId: accountId,
        });
        return;
      }

      for (const post of posts) {
        if (post.status === "publishing" && !publisher.supportsIdempotency) {
          await this.abandonStalled(post, report);
          continue;
        }
        const claimed = await this.claim(post);
        if (!claimed) continue;
        await this.publish(claimed, account, publisher, report);
        break;
      }
    } catch (error) {
      this.logger.error(`Dispatch failed for account ${accountId}`, {
        error: getErrorMessage(error),
      });
    } finally {
      this.inFlight.delete(accountId);
    }
  }

  private defer(posts: ScheduledPost[], report: DispatchReport): void {
    for (const post of posts) {
      if (post.status === "pending") report.deferred.push(post.id);
    }
  }

  /**
   * A lost publish on a platform that cannot deduplicate may already be
   * live, so it is failed for the operator instead of sent again.
   */
  private async abandonStalled(post: ScheduledPost, report: DispatchReport): Promise<void> {
    this.logger.warn(`Stalled publish ${post.id} cannot be retried safely`, {
      platform: post.platform,
      startedAt: post.publishingStartedAt,
    });
    try {
      await this.failPost(
        post,
        "Publish outcome unknown: the publish stalled and the platform cannot deduplicate a retry",
        false,
        report,
      );
    } catch (error) {
      if (!(error instanceof StorageConflictError)) throw error;
    }
  }

  /**
   * Move the post into publishing. A stalled publish is reclaimed with the
   * same idempotency key. Returns null when another worker got there first.
   */
  private async claim(post: ScheduledPost): Promise<ScheduledPost | null> {
    const patch = {
      attemptCount: post.attemptCount + 1,
      publishingStartedAt: this.clock.now(),
    };

    try {
      if (post.status === "pending") {
        return await this.store.updateScheduledPostStatus(
          post.id,
          "pending",
          "publishing",
          patch,
        );
      }

      this.logger.warn(`Reclaiming stalled publish ${post.id}`, {
        startedAt: post.publishingStartedAt,
        attemptCount: post.attemptCount,
      });
      return await this.store.updateScheduledPostStatus(
        post.id,
        "publishing",
        "publishing",
        patch,
      );
    } catch (error) {
      if (error instanceof StorageConflictError) return null;
      throw error;
    }
  }

  private async publish(
    post: ScheduledPost,
    account: PlatformAccount,
    publisher: PlatformPublisher,
    report: DispatchReport,
  ): Promise<void> {
    const artifact = await this.store.getArtifact(post.artifactId);
    if (!artifact) {
      // Not the account's fault; health is left alone
      await this.failPost(post, `Artifact ${post.artifactId} not found`, false, report);
      return;
    }

    const result = await this.callPublisher(post, artifact, publisher);
    if (result.success) {
      await this.handleSuccess(post, account, result, report);
    } else {
      await this.handleFailure(post, account, result, report);
    }
  }

  private async callPublisher(
    post: ScheduledPost,
    artifact: ContentArtifact,
    publisher: PlatformPublisher,
  ): Promise<PublishResult> {
    try {
      return await withTimeout(
        (signal) =>
          publisher.publish({ post, artifact, idempotencyKey: post.id, signal }),
        this.config.publishTimeoutMs,
        `Publish ${post.id}`,
      );
    } catch (error) {
      return {
        success: false,
        error: getErrorMessage(error),
        retryableError: isRetryableError(error),
      };
    }
  }

  private async handleSuccess(
    post: ScheduledPost,
    account: PlatformAccount,
    result: PublishResult,
    report: DispatchReport,
  ): Promise<void> {
    const now = this.clock.now();
    const published = await this.store.updateScheduledPostStatus(
      post.id,
      "publishing",
      "published",
      {
        publishedAt: now,
        platformPostId: result.platformPostId ?? null,
        lastError: null,
        publishingStartedAt: null,
      },
    );
    report.published.push(post.id);

    await this.healthMonitor.recordOutcome(account.id, true, false);
    await this.mutex.runExclusive(artifactLockKey(post.artifactId), () =>
      markArtifactPublished(this.store, post.artifactId),
    );

    this.logger.info(`Published ${post.id} on ${account.platform}`, {
      platformPostId: published.platformPostId,
      attemptCount: published.attemptCount,
    });
    this.notify(() => this.onPublished?.({ post: published, result }));

    await this.reslotCrowded(account, now);
  }

  /**
   * A post that went out late can land within the minimum spacing of
   * pending siblings, overdue or not; move those to fresh slots.
   */
  private async reslotCrowded(
    account: PlatformAccount,
    publishedAt: number,
  ): Promise<void> {
    const spacing = minimumSpacingMs(resolvePlatformPolicy(account, this.config));

    await this.mutex.runExclusive(accountLockKey(account.id), async () => {
      const pending = await this.store.listAccountPosts(account.id, ["pending"]);
      for (const sibling of pending) {
        if (sibling.scheduledAt >= publishedAt + spacing) continue;
        const scheduledAt = await this.allocator.allocate(account, {
          earliest: Math.max(publishedAt, sibling.scheduledAt),
          latest: null,
          excludePostId: sibling.id,
        });
        if (scheduledAt === sibling.scheduledAt) continue;
        try {
          await this.store.reschedulePendingPost(sibling.id, scheduledAt);
          this.logger.debug(`Re-slotted post ${sibling.id}`, {
            scheduledAt: new Date(scheduledAt).toISOString(),
          });
        } catch (error) {
          if (!(error instanceof StorageConflictError)) throw error;
        }
      }
    });
  }

  private async handleFailure(
    post: ScheduledPost,
    account: PlatformAccount,
    result: PublishResult,
    report: DispatchReport,
  ): Promise<void> {
    const now = this.clock.now();
    const error = result.error ?? "Publish failed";
    const health = await this.healthMonitor.recordOutcome(
      account.id,
      false,
      result.retryableError,
    );

    const willRetry =
      result.retryableError && post.attemptCount < this.config.maxPublishAttempts;

    if (willRetry) {
      const retried = await this.mutex.runExclusive(
        accountLockKey(account.id),
        async () => {
          const scheduledAt = await this.allocator.allocate(account, {
            earliest: Math.max(
              now + this.config.publishRetryDelayMs,
              health.backoffUntil ?? 0,
            ),
            latest: null,
            excludePostId: post.id,
          });
          return this.store.updateScheduledPostStatus(post.id, "publishing", "pending", {
            scheduledAt,
            lastError: error,
            publishingStartedAt: null,
          });
        },
      );
      report.retried.push(post.id);
      this.logger.warn(`Publish of ${post.id} failed, retrying`, {
        error,
        attemptCount: retried.attemptCount,
        scheduledAt: new Date(retried.scheduledAt).toISOString(),
      });
      this.notify(() =>
        this.onFailed?.({
          post: retried,
          error,
          attemptCount: retried.attemptCount,
          willRetry: true,
        }),
      );
      return;
    }

    await this.failPost(post, error, result.retryableError, report);
  }

  private async failPost(
    post: ScheduledPost,
    error: string,
    retryable: boolean,
    report: DispatchReport,
  ): Promise<void> {
    const failed = await this.store.updateScheduledPostStatus(
      post.id,
      "publishing",
      "failed",
      { lastError: error, publishingStartedAt: null },
    );
    report.failed.push(post.id);
    await this.mutex.runExclusive(artifactLockKey(post.artifactId), () =>
      releaseArtifactIfIdle(this.store, post.artifactId),
    );

    this.logger.error(`Publish of ${post.id} failed permanently`, {
      error,
      attemptCount: failed.attemptCount,
      retryable,
    });
    this.notify(() =>
      this.onFailed?.({
        post: failed,
        error,
        attemptCount: failed.attemptCount,
        willRetry: false,
      }),
    );
  }

  private notify(callback: () => void): void {
    try {
      callback();
    } catch (error) {
      this.logger.error("Dispatch callback threw", { error: getErrorMessage(error) });
    }
  }
}
