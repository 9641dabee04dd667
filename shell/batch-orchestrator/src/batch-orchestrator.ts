/**
 * BatchOrchestrator - Generates a batch of artifacts for one avatar
 *
 * Work items from every batch share one bounded pool, sized to the
 * generation provider's concurrent-call ceiling. Each item walks its
 * artifact through generation and safety classification and then bumps the
 * batch counters; the batch reaches its terminal status once every item has
 * resolved.
 */

import PQueue from "p-queue";
import {
  InvalidRequestError,
  NotFoundError,
  getErrorMessage,
  isRetryableError,
  sleep as defaultSleep,
  systemClock,
  withTimeout,
} from "@avatarflow/utils";
import type { Clock, Logger, SleepFn } from "@avatarflow/utils";
import {
  TERMINAL_BATCH_STATUSES,
  TierEnum,
  canTransitionArtifact,
  tierDistributionSchema,
} from "@avatarflow/content-store";
import type {
  BatchStatus,
  ContentArtifact,
  GenerationBatch,
  IContentStore,
} from "@avatarflow/content-store";
import { batchOrchestratorConfigSchema } from "./config";
import type { BatchOrchestratorConfig, BatchOrchestratorConfigInput } from "./config";
import { buildPrompt, getDefaultTemplateCatalog } from "./templates/template-catalog";
import { createRotatingTemplateSelector } from "./templates/template-selector";
import { summarizeBatch } from "./batch-summary";
import type { BatchSummary } from "./batch-summary";
import type {
  GenerationProvider,
  GenerationResult,
  SafetyClassification,
  SafetyGate,
  StartBatchRequest,
  TemplateSelector,
  WorkItem,
} from "./types";

/** Flag recorded when the safety gate itself fails */
export const CLASSIFIER_ERROR_FLAG = "classifier_error";

export interface BatchOrchestratorDeps {
  store: IContentStore;
  provider: GenerationProvider;
  safetyGate: SafetyGate;
  logger: Logger;
  clock?: Clock;
  sleep?: SleepFn;
  templateSelector?: TemplateSelector;
  config?: BatchOrchestratorConfigInput;
}

type GenerationOutcome =
  | { ok: true; result: GenerationResult; attempts: number }
  | { ok: false; error: string; attempts: number };

/**
 * Terminal status for a batch whose work items have all resolved
 */
export function resolveBatchStatus(
  batch: Pick<GenerationBatch, "requestedCount" | "completedCount">,
): BatchStatus {
  if (batch.completedCount === batch.requestedCount) return "completed";
  if (batch.completedCount === 0) return "failed";
  return "partially_failed";
}

export class BatchOrchestrator {
  private store: IContentStore;
  private provider: GenerationProvider;
  private safetyGate: SafetyGate;
  private logger: Logger;
  private clock: Clock;
  private sleep: SleepFn;
  private templateSelector: TemplateSelector;
  private config: BatchOrchestratorConfig;
  private queue: PQueue;

  private running = new Map<string, Promise<GenerationBatch>>();
  private cancelled = new Set<string>();

  public static createFresh(deps: BatchOrchestratorDeps): BatchOrchestrator {
    return new BatchOrchestrator(deps);
  }

  private constructor(deps: BatchOrchestratorDeps) {
    this.store = deps.store;
    this.provider = deps.provider;
    this.safetyGate = deps.safetyGate;
    this.logger = deps.logger.child("BatchOrchestrator");
    this.clock = deps.clock ?? systemClock;
    this.sleep = deps.sleep ?? defaultSleep;
    this.config = batchOrchestratorConfigSchema.parse(deps.config ?? {});
    this.templateSelector =
      deps.templateSelector ??
      createRotatingTemplateSelector(getDefaultTemplateCatalog());
    this.queue = new PQueue({ concurrency: this.config.concurrency });
  }

  public getConfig(): BatchOrchestratorConfig {
    return { ...this.config };
  }

  /**
   * Validate the request, create the batch and queue its work items.
   * Resolves once the batch is running; use waitForBatch for the outcome.
   */
  public async startBatch(request: StartBatchRequest): Promise<GenerationBatch> {
    const items = this.planWorkItems(request);

    const created = await this.store.createBatch({
      avatarId: request.avatarId,
      requestedCount: request.requestedCount,
      tierDistribution: request.tierDistribution,
    });
    const batch = await this.store.updateBatchStatus(created.id, "queued", "running");

    this.logger.info(`Batch ${batch.id} started`, {
      avatarId: batch.avatarId,
      requestedCount: batch.requestedCount,
      provider: this.provider.name,
    });

    const completion = this.runBatch(batch.id, request, items);
    this.running.set(batch.id, completion);
    completion.catch((error) => {
      this.logger.error(`Batch ${batch.id} could not be finalized`, error);
    });

    return batch;
  }

  /**
   * Stop dispatching new work items. Items already generating finish and
   * are recorded.
   */
  public async cancelBatch(batchId: string): Promise<GenerationBatch> {
    const batch = await this.store.getBatch(batchId);
    if (!batch) throw new NotFoundError("batch", batchId);
    if (TERMINAL_BATCH_STATUSES.includes(batch.status)) return batch;

    if (this.running.has(batchId)) this.cancelled.add(batchId);
    const updated = await this.store.requestBatchCancel(batchId);

    if (updated.status === "queued") {
      return this.store.updateBatchStatus(batchId, "queued", "cancelled");
    }

    this.logger.info(`Cancellation requested for batch ${batchId}`);
    return updated;
  }

  /**
   * Resolves with the batch once it reaches a terminal status
   */
  public async waitForBatch(batchId: string): Promise<GenerationBatch> {
    const running = this.running.get(batchId);
    if (running) return running;

    const batch = await this.store.getBatch(batchId);
    if (!batch) throw new NotFoundError("batch", batchId);
    return batch;
  }

  public async getBatch(batchId: string): Promise<GenerationBatch | null> {
    return this.store.getBatch(batchId);
  }

  public async listBatchArtifacts(batchId: string): Promise<ContentArtifact[]> {
    return this.store.listBatchArtifacts(batchId);
  }

  public async summarizeBatch(batchId: string): Promise<BatchSummary> {
    return summarizeBatch(this.store, batchId);
  }

  /**
   * Number of work items waiting for a free worker
   */
  public get pendingWorkItems(): number {
    return this.queue.size;
  }

  /**
   * Wait until every queued work item has finished
   */
  public async onIdle(): Promise<void> {
    await this.queue.onIdle();
    await Promise.allSettled([...this.running.values()]);
  }

  private planWorkItems(request: StartBatchRequest): WorkItem[] {
    if (request.avatarId.trim() === "") {
      throw new InvalidRequestError("avatarId is required");
    }
    if (!Number.isInteger(request.requestedCount) || request.requestedCount <= 0) {
      throw new InvalidRequestError("requestedCount must be a positive integer", {
        requestedCount: request.requestedCount,
      });
    }

    const distribution = tierDistributionSchema.safeParse(request.tierDistribution);
    if (!distribution.success) {
      throw new InvalidRequestError("Invalid tier distribution", {
        issues: distribution.error.issues.map((issue) => issue.message),
      });
    }

    const total = TierEnum.options.reduce(
      (sum, tier) => sum + (distribution.data[tier] ?? 0),
      0,
    );
    if (total !== request.requestedCount) {
      throw new InvalidRequestError(
        `Tier distribution sums to ${total} but requestedCount is ${request.requestedCount}`,
        { tierDistribution: request.tierDistribution },
      );
    }

    const selector = request.templateSelector ?? this.templateSelector;
    const customPrompt = request.customPrompt?.trim() ?? "";
    const usedTemplateIds: string[] = [];
    const items: WorkItem[] = [];

    for (const tier of TierEnum.options) {
      const count = distribution.data[tier] ?? 0;
      for (let i = 0; i < count; i++) {
        const index = items.length;
        const template = selector({ tier, index, usedTemplateIds });
        if (template) {
          usedTemplateIds.push(template.id);
          items.push({ index, tier, template, prompt: buildPrompt(template) });
        } else if (customPrompt !== "") {
          items.push({ index, tier, template: null, prompt: customPrompt });
        } else {
          throw new InvalidRequestError(
            `No template available for tier "${tier}" and no custom prompt given`,
            { tier },
          );
        }
      }
    }

    return items;
  }

  private async runBatch(
    batchId: string,
    request: StartBatchRequest,
    items: WorkItem[],
  ): Promise<GenerationBatch> {
    try {
      await Promise.all(
        items.map((item) =>
          this.queue.add(() => this.runWorkItem(batchId, request, item)),
        ),
      );
      return await this.finalizeBatch(batchId);
    } finally {
      this.running.delete(batchId);
      this.cancelled.delete(batchId);
    }
  }

  private async finalizeBatch(batchId: string): Promise<GenerationBatch> {
    const batch = await this.store.getBatch(batchId);
    if (!batch) throw new NotFoundError("batch", batchId);

    const unresolved =
      batch.requestedCount - batch.completedCount - batch.failedCount;
    const status: BatchStatus =
      unresolved > 0 && (batch.cancelRequestedAt !== null || this.cancelled.has(batchId))
        ? "cancelled"
        : resolveBatchStatus(batch);

    const finished = await this.store.updateBatchStatus(batchId, "running", status);
    this.logger.info(`Batch ${batchId} finished as ${status}`, {
      completedCount: finished.completedCount,
      failedCount: finished.failedCount,
      requestedCount: finished.requestedCount,
    });
    return finished;
  }

  private async isCancelled(batchId: string): Promise<boolean> {
    if (this.cancelled.has(batchId)) return true;
    const batch = await this.store.getBatch(batchId);
    if (batch && batch.cancelRequestedAt !== null) {
      this.cancelled.add(batchId);
      return true;
    }
    return false;
  }

  private async runWorkItem(
    batchId: string,
    request: StartBatchRequest,
    item: WorkItem,
  ): Promise<void> {
    if (await this.isCancelled(batchId)) {
      this.logger.debug(`Skipping item ${item.index} of cancelled batch ${batchId}`);
      return;
    }

    let artifact: ContentArtifact | null = null;
    let counted = false;

    try {
      artifact = await this.store.createArtifact({
        avatarId: request.avatarId,
        batchId,
        templateId: item.template?.id ?? null,
        promptUsed: item.prompt,
        tier: item.tier,
        metadata: {
          workItemIndex: item.index,
          ...(item.template ? { templateCategory: item.template.category } : {}),
        },
      });
      await this.store.appendBatchArtifact(batchId, artifact.id);
      artifact = await this.store.updateArtifactStatus(
        artifact.id,
        "requested",
        "generating",
      );

      const outcome = await this.generateWithRetry(artifact, request, item);
      if (!outcome.ok) {
        artifact = await this.store.updateArtifactStatus(
          artifact.id,
          "generating",
          "failed",
          {
            lastError: outcome.error,
            metadata: { generationAttempts: outcome.attempts },
          },
        );
        counted = true;
        await this.store.incrementBatchCounter(batchId, "failedCount");
        return;
      }

      artifact = await this.store.updateArtifactStatus(
        artifact.id,
        "generating",
        "pending_safety",
        {
          storageLocator: outcome.result.binaryLocator,
          generationCostUsd: outcome.result.costUsd,
          generationLatencyMs: outcome.result.latencyMs,
          metadata: { generationAttempts: outcome.attempts },
        },
      );

      const classification = await this.classify(artifact, outcome.result.binaryLocator);
      artifact = await this.store.updateArtifactStatus(
        artifact.id,
        "pending_safety",
        classification.verdict,
        {
          safetyVerdict: classification.verdict,
          safetyScore: classification.score,
          safetyFlags: classification.flags,
        },
      );

      if (classification.verdict === "safe") {
        artifact = await this.store.updateArtifactStatus(artifact.id, "safe", "eligible");
      }

      counted = true;
      await this.store.incrementBatchCounter(batchId, "completedCount");
    } catch (error) {
      this.logger.error(
        `Work item ${item.index} of batch ${batchId} failed unexpectedly`,
        error,
      );
      await this.recordUnexpectedFailure(batchId, artifact, counted, error);
    }
  }

  private async generateWithRetry(
    artifact: ContentArtifact,
    request: StartBatchRequest,
    item: WorkItem,
  ): Promise<GenerationOutcome> {
    const maxAttempts = this.config.maxGenerationAttempts;
    const templateParams: Record<string, unknown> = item.template
      ? {
          templateId: item.template.id,
          category: item.template.category,
          tier: item.tier,
          lighting: item.template.lighting,
          angle: item.template.angle,
          pose: item.template.pose,
          tags: item.template.tags,
        }
      : { tier: item.tier };

    let lastError = "Generation was not attempted";

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const startedAt = this.clock.now();
      try {
        const result = await withTimeout(
          (signal) =>
            this.provider.generate({
              prompt: item.prompt,
              templateParams,
              avatarModelRef: request.avatarModelRef,
              signal,
            }),
          this.config.generationTimeoutMs,
          `Generation for ${artifact.id}`,
        );
        this.logger.debug(`Generated ${artifact.id}`, {
          attempt,
          costUsd: result.costUsd,
          elapsedMs: this.clock.now() - startedAt,
        });
        return { ok: true, result, attempts: attempt };
      } catch (error) {
        lastError = getErrorMessage(error);
        const retryable = isRetryableError(error);
        this.logger.warn(
          `Generation attempt ${attempt}/${maxAttempts} failed for ${artifact.id}: ${lastError}`,
        );
        if (!retryable) return { ok: false, error: lastError, attempts: attempt };
        if (attempt < maxAttempts) {
          await this.sleep(this.config.generationRetryBaseMs * Math.pow(2, attempt - 1));
        }
      }
    }

    return { ok: false, error: lastError, attempts: maxAttempts };
  }

  private async classify(
    artifact: ContentArtifact,
    binaryLocator: string,
  ): Promise<SafetyClassification> {
    try {
      return await withTimeout(
        (signal) =>
          this.safetyGate.classify({
            binaryLocator,
            promptUsed: artifact.promptUsed,
            signal,
          }),
        this.config.classificationTimeoutMs,
        `Safety classification for ${artifact.id}`,
      );
    } catch (error) {
      // An unclassified artifact must never become eligible
      this.logger.warn(
        `Safety classification failed for ${artifact.id}, rejecting: ${getErrorMessage(error)}`,
      );
      return { verdict: "rejected", score: 1, flags: [CLASSIFIER_ERROR_FLAG] };
    }
  }

  private async recordUnexpectedFailure(
    batchId: string,
    artifact: ContentArtifact | null,
    counted: boolean,
    error: unknown,
  ): Promise<void> {
    if (artifact && canTransitionArtifact(artifact.status, "failed")) {
      try {
        await this.store.updateArtifactStatus(artifact.id, artifact.status, "failed", {
          lastError: getErrorMessage(error),
        });
      } catch (updateError) {
        this.logger.error(`Could not mark ${artifact.id} as failed`, updateError);
      }
    }

    if (!counted) {
      try {
        await this.store.incrementBatchCounter(batchId, "failedCount");
      } catch (counterError) {
        this.logger.error(`Could not count failure in batch ${batchId}`, counterError);
      }
    }
  }
}
