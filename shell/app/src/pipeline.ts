/**
 * ContentPipeline - Wires the pipeline services around one content store
 *
 * The scheduler and the dispatch loop share a keyed mutex so scheduling and
 * publishing on the same account never interleave inside this process.
 */

import { KeyedMutex, getErrorMessage, systemClock } from "@avatarflow/utils";
import type { Clock, Logger, SleepFn } from "@avatarflow/utils";
import type {
  AccountHealth,
  ContentArtifact,
  GenerationBatch,
  IContentStore,
  Platform,
  PlatformAccount,
  PlatformAccountHealth,
  PlatformAccountInput,
  PostStatus,
  ScheduledPost,
} from "@avatarflow/content-store";
import { HealthMonitor } from "@avatarflow/account-health";
import { BatchOrchestrator, BorderlineReview } from "@avatarflow/batch-orchestrator";
import type {
  BatchSummary,
  GenerationProvider,
  SafetyGate,
  StartBatchRequest,
  TemplateSelector,
} from "@avatarflow/batch-orchestrator";
import {
  CronerBackend,
  DispatchLoop,
  DistributionScheduler,
  PublisherRegistry,
} from "@avatarflow/distribution";
import type {
  BulkScheduleOptions,
  BulkScheduleResult,
  DispatchReport,
  PlatformPublisher,
  PostFailedEvent,
  PostPublishedEvent,
  ScheduledJob,
  SchedulerBackend,
  TargetWindow,
} from "@avatarflow/distribution";
import { pipelineConfigSchema } from "./config";
import type { PipelineConfig, PipelineConfigInput } from "./config";

export interface ContentPipelineDeps {
  store: IContentStore;
  provider: GenerationProvider;
  safetyGate: SafetyGate;
  logger: Logger;
  config?: PipelineConfigInput;
  publishers?: PlatformPublisher[];
  clock?: Clock;
  random?: () => number;
  sleep?: SleepFn;
  backend?: SchedulerBackend;
  templateSelector?: TemplateSelector;
  onPublished?: (event: PostPublishedEvent) => void;
  onFailed?: (event: PostFailedEvent) => void;
}

export class ContentPipeline {
  private config: PipelineConfig;
  private logger: Logger;
  private store: IContentStore;
  private backend: SchedulerBackend;
  private maintenanceJob: ScheduledJob | null = null;

  private orchestrator: BatchOrchestrator;
  private review: BorderlineReview;
  private healthMonitor: HealthMonitor;
  private scheduler: DistributionScheduler;
  private dispatchLoop: DispatchLoop;
  private publishers: PublisherRegistry;

  public static createFresh(deps: ContentPipelineDeps): ContentPipeline {
    return new ContentPipeline(deps);
  }

  private constructor(deps: ContentPipelineDeps) {
    this.config = pipelineConfigSchema.parse(deps.config ?? {});
    this.logger = deps.logger.child("ContentPipeline");
    this.store = deps.store;

    const clock = deps.clock ?? systemClock;
    const random = deps.random ?? Math.random;
    const mutex = new KeyedMutex();

    this.backend =
      deps.backend ??
      new CronerBackend((error) =>
        this.logger.error("Scheduled job failed", { error: getErrorMessage(error) }),
      );

    this.publishers = PublisherRegistry.createFresh();
    for (const publisher of deps.publishers ?? []) {
      this.publishers.register(publisher);
    }

    this.healthMonitor = HealthMonitor.createFresh({
      store: this.store,
      logger: deps.logger,
      clock,
      config: this.config.health,
    });

    this.orchestrator = BatchOrchestrator.createFresh({
      store: this.store,
      provider: deps.provider,
      safetyGate: deps.safetyGate,
      logger: deps.logger,
      clock,
      sleep: deps.sleep,
      templateSelector: deps.templateSelector,
      config: this.config.generation,
    });

    this.review = new BorderlineReview({
      store: this.store,
      logger: deps.logger,
      clock,
      autoApproveAfterMs: this.config.generation.borderlineAutoApproveAfterMs,
    });

    this.scheduler = DistributionScheduler.createFresh({
      store: this.store,
      healthMonitor: this.healthMonitor,
      logger: deps.logger,
      clock,
      random,
      mutex,
      config: this.config.distribution,
    });

    this.dispatchLoop = DispatchLoop.createFresh({
      store: this.store,
      healthMonitor: this.healthMonitor,
      publishers: this.publishers,
      logger: deps.logger,
      clock,
      random,
      mutex,
      backend: this.backend,
      config: this.config.distribution,
      onPublished: deps.onPublished,
      onFailed: deps.onFailed,
    });
  }

  public getConfig(): PipelineConfig {
    return this.config;
  }

  /**
   * Start the dispatch loop and, when borderline auto-approval is
   * configured, the maintenance job
   */
  public start(): void {
    this.dispatchLoop.start();

    if (
      !this.maintenanceJob &&
      this.config.generation.borderlineAutoApproveAfterMs !== undefined
    ) {
      this.maintenanceJob = this.backend.scheduleCron(
        this.config.maintenanceCron,
        async () => {
          await this.promoteStaleBorderline();
        },
      );
    }

    this.logger.info(`${this.config.name} pipeline started`, {
      platforms: this.publishers.getRegisteredPlatforms(),
    });
  }

  /**
   * Stop periodic work and wait for queued generation to drain
   */
  public async stop(): Promise<void> {
    this.dispatchLoop.stop();
    this.maintenanceJob?.stop();
    this.maintenanceJob = null;
    await this.orchestrator.onIdle();
    this.logger.info(`${this.config.name} pipeline stopped`);
  }

  public isRunning(): boolean {
    return this.dispatchLoop.isRunning();
  }

  /** Run one dispatch sweep outside the periodic schedule */
  public async dispatchDuePosts(): Promise<DispatchReport> {
    return this.dispatchLoop.tick();
  }

  // Generation

  public async startBatch(request: StartBatchRequest): Promise<GenerationBatch> {
    return this.orchestrator.startBatch(request);
  }

  public async cancelBatch(batchId: string): Promise<GenerationBatch> {
    return this.orchestrator.cancelBatch(batchId);
  }

  public async waitForBatch(batchId: string): Promise<GenerationBatch> {
    return this.orchestrator.waitForBatch(batchId);
  }

  public async getBatch(batchId: string): Promise<GenerationBatch | null> {
    return this.orchestrator.getBatch(batchId);
  }

  public async listBatchArtifacts(batchId: string): Promise<ContentArtifact[]> {
    return this.orchestrator.listBatchArtifacts(batchId);
  }

  public async summarizeBatch(batchId: string): Promise<BatchSummary> {
    return this.orchestrator.summarizeBatch(batchId);
  }

  // Borderline review

  public async listBorderline(): Promise<ContentArtifact[]> {
    return this.review.listPending();
  }

  public async approveBorderline(artifactId: string): Promise<ContentArtifact> {
    return this.review.approve(artifactId);
  }

  public async rejectBorderline(artifactId: string): Promise<ContentArtifact> {
    return this.review.reject(artifactId);
  }

  public async promoteStaleBorderline(): Promise<ContentArtifact[]> {
    return this.review.promoteStale();
  }

  // Distribution

  public async registerAccount(input: PlatformAccountInput): Promise<PlatformAccount> {
    const account = await this.store.upsertPlatformAccount(input);
    this.logger.info(`Registered ${account.platform} account ${account.id}`, {
      avatarId: account.avatarId,
    });
    return account;
  }

  public async listAccounts(avatarId: string): Promise<PlatformAccount[]> {
    return this.store.listPlatformAccounts(avatarId);
  }

  public registerPublisher(publisher: PlatformPublisher): void {
    this.publishers.register(publisher);
  }

  public async scheduleArtifact(
    artifactId: string,
    platform: Platform,
    platformAccountId: string,
    targetWindow?: TargetWindow,
  ): Promise<ScheduledPost> {
    return this.scheduler.scheduleArtifact(
      artifactId,
      platform,
      platformAccountId,
      targetWindow,
    );
  }

  public async scheduleEligibleArtifacts(
    avatarId: string,
    platformAccountId: string,
    options?: BulkScheduleOptions,
  ): Promise<BulkScheduleResult> {
    return this.scheduler.scheduleEligibleArtifacts(
      avatarId,
      platformAccountId,
      options,
    );
  }

  public async cancelScheduledPost(postId: string): Promise<ScheduledPost> {
    return this.scheduler.cancelScheduledPost(postId);
  }

  public async getScheduledPost(postId: string): Promise<ScheduledPost | null> {
    return this.scheduler.getScheduledPost(postId);
  }

  public async listAccountPosts(
    platformAccountId: string,
    statuses?: readonly PostStatus[],
  ): Promise<ScheduledPost[]> {
    return this.scheduler.listAccountPosts(platformAccountId, statuses);
  }

  public async listFailedPosts(): Promise<ScheduledPost[]> {
    return this.scheduler.listFailedPosts();
  }

  // Account health

  /** Null for accounts that have never published */
  public async getAccountHealth(
    platformAccountId: string,
  ): Promise<PlatformAccountHealth | null> {
    return this.healthMonitor.getHealth(platformAccountId);
  }

  public async listAccountsByHealth(
    health: AccountHealth,
  ): Promise<PlatformAccountHealth[]> {
    return this.healthMonitor.listAccountsByHealth(health);
  }

  public async resetAccount(platformAccountId: string): Promise<PlatformAccountHealth> {
    return this.healthMonitor.resetAccount(platformAccountId);
  }

  public async suspendAccount(
    platformAccountId: string,
  ): Promise<PlatformAccountHealth> {
    return this.healthMonitor.suspendAccount(platformAccountId);
  }
}
