import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Mock } from "vitest";
import {
  KeyedMutex,
  ManualClock,
  PermanentProviderError,
  createSilentLogger,
} from "@avatarflow/utils";
import { InMemoryContentStore } from "@avatarflow/content-store";
import type { ScheduledPost } from "@avatarflow/content-store";
import { HealthMonitor } from "@avatarflow/account-health";
import { DistributionScheduler } from "../src/distribution-scheduler";
import { DispatchLoop } from "../src/dispatch-loop";
import type { DispatchLoopDeps, PostFailedEvent, PostPublishedEvent } from "../src/dispatch-loop";
import { PublisherRegistry } from "../src/publisher";
import type { PublishRequest, PublishResult } from "../src/publisher";
import { TestSchedulerBackend } from "../src/scheduler-backend";
import type { DistributionConfigInput } from "../src/config";
import { createArtifactIn, tiktokAccount } from "./helpers";

// 2025-03-10 08:00 in Mexico City
const MORNING = Date.UTC(2025, 2, 10, 14);
const FIRST_SLOT = Date.UTC(2025, 2, 10, 15, 18);

type PublishFn = (request: PublishRequest) => Promise<PublishResult>;

const published = (platformPostId: string): PublishResult => ({
  success: true,
  platformPostId,
  retryableError: false,
});

describe("DispatchLoop", () => {
  let clock: ManualClock;
  let store: InMemoryContentStore;
  let healthMonitor: HealthMonitor;
  let scheduler: DistributionScheduler;
  let publishers: PublisherRegistry;
  let publish: Mock<PublishFn>;
  let onPublished: Mock<(event: PostPublishedEvent) => void>;
  let onFailed: Mock<(event: PostFailedEvent) => void>;
  let mutex: KeyedMutex;

  beforeEach(async () => {
    clock = new ManualClock(MORNING);
    store = new InMemoryContentStore(clock);
    mutex = new KeyedMutex();
    healthMonitor = HealthMonitor.createFresh({
      store,
      logger: createSilentLogger(),
      clock,
    });
    scheduler = DistributionScheduler.createFresh({
      store,
      healthMonitor,
      logger: createSilentLogger(),
      clock,
      random: () => 0.5,
      mutex,
    });
    publish = vi.fn<PublishFn>(async () => published("tt-1"));
    onPublished = vi.fn<(event: PostPublishedEvent) => void>();
    onFailed = vi.fn<(event: PostFailedEvent) => void>();
    publishers = PublisherRegistry.createFresh();
    publishers.register({ platform: "tiktok", supportsIdempotency: true, publish });
    await store.upsertPlatformAccount(tiktokAccount());
  });

  function createLoop(
    config: DistributionConfigInput = {},
    overrides: Partial<DispatchLoopDeps> = {},
  ): DispatchLoop {
    return DispatchLoop.createFresh({
      store,
      healthMonitor,
      publishers,
      logger: createSilentLogger(),
      clock,
      random: () => 0.5,
      mutex,
      backend: new TestSchedulerBackend(),
      config,
      onPublished,
      onFailed,
      ...overrides,
    });
  }

  async function schedulePost(accountId = "acct-tt"): Promise<ScheduledPost> {
    const artifact = await createArtifactIn(store, "eligible");
    return scheduler.scheduleArtifact(artifact.id, "tiktok", accountId);
  }

  async function reload(post: ScheduledPost): Promise<ScheduledPost | null> {
    return store.getScheduledPost(post.id);
  }

  it("should publish a due post", async () => {
    const post = await schedulePost();
    clock.set(FIRST_SLOT);

    const report = await createLoop().tick();

    expect(report.published).toEqual([post.id]);
    expect(await reload(post)).toMatchObject({
      status: "published",
      publishedAt: FIRST_SLOT,
      platformPostId: "tt-1",
      attemptCount: 1,
      publishingStartedAt: null,
    });
    expect((await store.getArtifact(post.artifactId))?.status).toBe("published");
    expect(publish).toHaveBeenCalledTimes(1);
    expect(publish.mock.calls[0]?.[0].idempotencyKey).toBe(post.id);
    expect(onPublished).toHaveBeenCalledTimes(1);
    expect(await healthMonitor.getHealth("acct-tt")).toMatchObject({
      consecutiveFailures: 0,
      health: "healthy",
      lastSuccessAt: FIRST_SLOT,
    });
  });

  it("should leave posts that are not yet due", async () => {
    await schedulePost();
    clock.set(FIRST_SLOT - 1);

    const report = await createLoop().tick();

    expect(report.published).toEqual([]);
    expect(publish).not.toHaveBeenCalled();
  });

  it("should return a retryable failure to pending at a later slot", async () => {
    const post = await schedulePost();
    clock.set(FIRST_SLOT);
    publish.mockResolvedValueOnce({
      success: false,
      error: "rate limited",
      retryableError: true,
    });

    const report = await createLoop().tick();

    expect(report.retried).toEqual([post.id]);
    // now + 5 min retry delay, later than the 2 min health backoff
    expect(await reload(post)).toMatchObject({
      status: "pending",
      attemptCount: 1,
      lastError: "rate limited",
      scheduledAt: FIRST_SLOT + 5 * 60_000,
    });
    expect((await store.getArtifact(post.artifactId))?.status).toBe("scheduled");
    expect(onFailed).toHaveBeenCalledWith(
      expect.objectContaining({ willRetry: true, attemptCount: 1, error: "rate limited" }),
    );
    expect((await healthMonitor.getHealth("acct-tt"))?.consecutiveFailures).toBe(1);
  });

  it("should fail a post once its attempts are used up", async () => {
    const post = await schedulePost();
    publish.mockResolvedValue({ success: false, error: "timeout", retryableError: true });
    const loop = createLoop({ maxPublishAttempts: 2 });

    clock.set(FIRST_SLOT);
    await loop.tick();
    clock.set(FIRST_SLOT + 5 * 60_000);
    const report = await loop.tick();

    expect(report.failed).toEqual([post.id]);
    expect(await reload(post)).toMatchObject({ status: "failed", attemptCount: 2 });
    expect((await store.getArtifact(post.artifactId))?.status).toBe("eligible");
    expect(onFailed).toHaveBeenLastCalledWith(
      expect.objectContaining({ willRetry: false, attemptCount: 2 }),
    );
  });

  it("should fail a post immediately on a permanent error", async () => {
    const post = await schedulePost();
    clock.set(FIRST_SLOT);
    publish.mockRejectedValueOnce(new PermanentProviderError("content policy rejection"));

    const report = await createLoop().tick();

    expect(report.failed).toEqual([post.id]);
    expect(await reload(post)).toMatchObject({
      status: "failed",
      attemptCount: 1,
      lastError: "content policy rejection",
    });
    expect((await scheduler.listFailedPosts()).map((p) => p.id)).toEqual([post.id]);
    expect(await healthMonitor.getHealth("acct-tt")).toMatchObject({
      consecutiveFailures: 1,
      lastFailureRetryable: false,
    });
  });

  it("should treat a publish timeout as retryable", async () => {
    const post = await schedulePost();
    clock.set(FIRST_SLOT);
    const seen: { signal?: AbortSignal } = {};
    publish.mockImplementationOnce((request) => {
      seen.signal = request.signal;
      return new Promise<PublishResult>(() => {});
    });

    const report = await createLoop({ publishTimeoutMs: 20 }).tick();

    expect(report.retried).toEqual([post.id]);
    expect(seen.signal?.aborted).toBe(true);
    expect((await reload(post))?.lastError).toBe(
      `Publish ${post.id} timed out after 20ms`,
    );
  });

  it("should publish one post per account per tick and re-slot the overdue rest", async () => {
    const first = await schedulePost();
    const second = await schedulePost();
    const third = await schedulePost();
    // 16:00 local: all three are overdue
    const now = Date.UTC(2025, 2, 10, 22);
    clock.set(now);

    const report = await createLoop().tick();

    expect(report.published).toEqual([first.id]);
    expect(publish).toHaveBeenCalledTimes(1);
    // 3h after the post that just went out
    expect((await reload(second))?.scheduledAt).toBe(Date.UTC(2025, 2, 11, 1));
    // spacing pushes it past the 21:00 close, so the next window opening
    expect((await reload(third))?.scheduledAt).toBe(Date.UTC(2025, 2, 11, 15, 18));
  });

  it("should defer posts of an account in backoff or suspended", async () => {
    const post = await schedulePost();
    clock.set(FIRST_SLOT);
    await healthMonitor.suspendAccount("acct-tt");

    const report = await createLoop().tick();

    expect(report.deferred).toEqual([post.id]);
    expect(publish).not.toHaveBeenCalled();
    expect((await reload(post))?.status).toBe("pending");

    await healthMonitor.resetAccount("acct-tt");
    await healthMonitor.recordOutcome("acct-tt", false, true);
    expect((await createLoop().tick()).deferred).toEqual([post.id]);

    clock.advance(2 * 60_000);
    expect((await createLoop().tick()).published).toEqual([post.id]);
  });

  it("should keep publishing other accounts while one account's posts are deferred", async () => {
    await store.upsertPlatformAccount(tiktokAccount({ id: "acct-b" }));
    const blocked = await schedulePost();
    const other = await schedulePost("acct-b");
    await healthMonitor.suspendAccount("acct-tt");
    clock.set(FIRST_SLOT);

    const report = await createLoop({ dispatchBatchSize: 1 }).tick();

    expect(report.deferred).toEqual([blocked.id]);
    expect(report.published).toEqual([other.id]);
    expect((await reload(other))?.status).toBe("published");
  });

  it("should keep the minimum spacing after a post goes out late", async () => {
    const first = await schedulePost();
    const second = await schedulePost();
    expect(second.scheduledAt).toBe(Date.UTC(2025, 2, 10, 18, 18));
    await healthMonitor.suspendAccount("acct-tt");
    clock.set(FIRST_SLOT);
    await createLoop().tick();

    const lateAt = Date.UTC(2025, 2, 10, 17);
    clock.set(lateAt);
    await healthMonitor.resetAccount("acct-tt");
    const report = await createLoop().tick();

    expect(report.published).toEqual([first.id]);
    // 18:18 sat 78 min after the late publish; moved to a full interval later
    expect((await reload(second))?.scheduledAt).toBe(lateAt + 3 * 60 * 60_000);
  });

  it("should leave posts pending when no publisher handles the platform", async () => {
    const post = await schedulePost();
    clock.set(FIRST_SLOT);
    publishers.unregister("tiktok");

    const report = await createLoop().tick();

    expect(report.deferred).toEqual([post.id]);
    expect((await reload(post))?.status).toBe("pending");
  });

  it("should reclaim a stalled publish with the same idempotency key", async () => {
    const post = await schedulePost();
    clock.set(FIRST_SLOT);
    await store.updateScheduledPostStatus(post.id, "pending", "publishing", {
      attemptCount: 1,
      publishingStartedAt: FIRST_SLOT,
    });
    const loop = createLoop();

    clock.advance(5 * 60_000);
    expect((await loop.tick()).published).toEqual([]);

    clock.set(FIRST_SLOT + 10 * 60_000);
    const report = await loop.tick();

    expect(report.published).toEqual([post.id]);
    expect(publish.mock.calls[0]?.[0].idempotencyKey).toBe(post.id);
    expect((await reload(post))?.attemptCount).toBe(2);
  });

  it("should fail a stalled publish when the platform cannot deduplicate", async () => {
    publishers.register({ platform: "tiktok", supportsIdempotency: false, publish });
    const post = await schedulePost();
    clock.set(FIRST_SLOT);
    await store.updateScheduledPostStatus(post.id, "pending", "publishing", {
      attemptCount: 1,
      publishingStartedAt: FIRST_SLOT,
    });
    clock.set(FIRST_SLOT + 10 * 60_000);

    const report = await createLoop().tick();

    expect(report.failed).toEqual([post.id]);
    expect(publish).not.toHaveBeenCalled();
    expect(await reload(post)).toMatchObject({
      status: "failed",
      attemptCount: 1,
      publishingStartedAt: null,
      lastError:
        "Publish outcome unknown: the publish stalled and the platform cannot deduplicate a retry",
    });
    expect((await store.getArtifact(post.artifactId))?.status).toBe("eligible");
    expect(onFailed).toHaveBeenCalledWith(
      expect.objectContaining({ willRetry: false, attemptCount: 1 }),
    );
  });

  it("should never publish to one account from two overlapping ticks", async () => {
    await schedulePost();
    await schedulePost();
    clock.set(Date.UTC(2025, 2, 10, 18, 18));
    let release: () => void = () => {};
    publish.mockImplementationOnce(
      () =>
        new Promise<PublishResult>((resolve) => {
          release = (): void => resolve(published("tt-1"));
        }),
    );
    const loop = createLoop();

    const first = loop.tick();
    const second = await loop.tick();

    expect(second.skippedAccounts).toEqual(["acct-tt"]);
    await vi.waitFor(() => expect(publish).toHaveBeenCalledTimes(1));
    release();
    expect((await first).published).toHaveLength(1);
    expect(publish).toHaveBeenCalledTimes(1);
  });

  it("should keep going when a callback throws", async () => {
    const post = await schedulePost();
    clock.set(FIRST_SLOT);
    onPublished.mockImplementation(() => {
      throw new Error("listener failed");
    });

    const report = await createLoop().tick();

    expect(report.published).toEqual([post.id]);
  });

  it("should run on the scheduler backend while started", async () => {
    const backend = new TestSchedulerBackend();
    const post = await schedulePost();
    const loop = createLoop({}, { backend });

    loop.start();
    loop.start();
    expect(backend.getIntervalCount()).toBe(1);

    clock.set(FIRST_SLOT);
    await backend.tick();
    expect((await reload(post))?.status).toBe("published");

    loop.stop();
    expect(backend.getIntervalCount()).toBe(0);
    expect(loop.isRunning()).toBe(false);
  });
});
