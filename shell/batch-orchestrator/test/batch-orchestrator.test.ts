import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Mock } from "vitest";
import {
  InvalidRequestError,
  ManualClock,
  PermanentProviderError,
  TransientProviderError,
  createSequenceRandom,
  createSilentLogger,
} from "@avatarflow/utils";
import { InMemoryContentStore } from "@avatarflow/content-store";
import { BatchOrchestrator, CLASSIFIER_ERROR_FLAG } from "../src/batch-orchestrator";
import type { BatchOrchestratorConfigInput } from "../src/config";
import { getDefaultTemplateCatalog } from "../src/templates/template-catalog";
import { createRotatingTemplateSelector } from "../src/templates/template-selector";
import type {
  GenerationRequest,
  GenerationResult,
  SafetyClassification,
  SafetyClassificationRequest,
  StartBatchRequest,
  TemplateSelector,
} from "../src/types";

const START = 1_700_000_000_000;

const safe: SafetyClassification = { verdict: "safe", score: 0.02, flags: [] };

function result(locator: string): GenerationResult {
  return { binaryLocator: locator, costUsd: 0.02, latencyMs: 1_000 };
}

const firstTemplate = createRotatingTemplateSelector(
  getDefaultTemplateCatalog(),
  createSequenceRandom([0]),
);

describe("BatchOrchestrator", () => {
  let clock: ManualClock;
  let store: InMemoryContentStore;
  let generate: Mock<(request: GenerationRequest) => Promise<GenerationResult>>;
  let classify: Mock<
    (request: SafetyClassificationRequest) => Promise<SafetyClassification>
  >;
  let sleep: Mock<(ms: number) => Promise<void>>;

  beforeEach(() => {
    clock = new ManualClock(START);
    store = new InMemoryContentStore(clock);
    let calls = 0;
    generate = vi.fn<(request: GenerationRequest) => Promise<GenerationResult>>(
      async () => result(`blob://${++calls}`),
    );
    classify = vi.fn<
      (request: SafetyClassificationRequest) => Promise<SafetyClassification>
    >(async () => safe);
    sleep = vi.fn<(ms: number) => Promise<void>>(async () => {});
  });

  function createOrchestrator(
    config: BatchOrchestratorConfigInput = {},
    templateSelector: TemplateSelector = firstTemplate,
  ): BatchOrchestrator {
    return BatchOrchestrator.createFresh({
      store,
      provider: { name: "fake", generate },
      safetyGate: { classify },
      logger: createSilentLogger(),
      clock,
      sleep,
      templateSelector,
      config,
    });
  }

  function request(overrides: Partial<StartBatchRequest> = {}): StartBatchRequest {
    return {
      avatarId: "avatar-1",
      avatarModelRef: "lora://avatar-1/v3",
      requestedCount: 3,
      tierDistribution: { basic: 3 },
      ...overrides,
    };
  }

  it("should end partially failed when two of ten generations fail permanently", async () => {
    let calls = 0;
    generate.mockImplementation(async () => {
      calls++;
      if (calls === 3 || calls === 7) {
        throw new PermanentProviderError("content policy violation");
      }
      return result(`blob://${calls}`);
    });
    const orchestrator = createOrchestrator();

    const started = await orchestrator.startBatch(
      request({ requestedCount: 10, tierDistribution: { basic: 6, premium: 4 } }),
    );
    expect(started.status).toBe("running");

    const batch = await orchestrator.waitForBatch(started.id);
    expect(batch.status).toBe("partially_failed");
    expect(batch.completedCount).toBe(8);
    expect(batch.failedCount).toBe(2);
    expect(batch.artifactIds).toHaveLength(10);
    expect(generate).toHaveBeenCalledTimes(10);

    const artifacts = await store.listBatchArtifacts(batch.id);
    const failed = artifacts.filter((a) => a.status === "failed");
    expect(failed).toHaveLength(2);
    expect(failed.map((a) => a.lastError)).toEqual([
      "content policy violation",
      "content policy violation",
    ]);
    expect(artifacts.filter((a) => a.status === "eligible")).toHaveLength(8);
  });

  it("should retry transient failures with exponential backoff", async () => {
    generate
      .mockRejectedValueOnce(new TransientProviderError("cold start"))
      .mockRejectedValueOnce(new TransientProviderError("rate limited"));
    const orchestrator = createOrchestrator();

    const started = await orchestrator.startBatch(
      request({ requestedCount: 1, tierDistribution: { basic: 1 } }),
    );
    const batch = await orchestrator.waitForBatch(started.id);

    expect(batch.status).toBe("completed");
    expect(generate).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([500, 1_000]);

    const [artifact] = await store.listBatchArtifacts(batch.id);
    expect(artifact?.status).toBe("eligible");
    expect(artifact?.metadata).toMatchObject({ generationAttempts: 3 });
  });

  it("should fail an item once its attempts are exhausted", async () => {
    generate.mockRejectedValue(new TransientProviderError("provider unavailable"));
    const orchestrator = createOrchestrator();

    const started = await orchestrator.startBatch(
      request({ requestedCount: 1, tierDistribution: { basic: 1 } }),
    );
    const batch = await orchestrator.waitForBatch(started.id);

    expect(batch.status).toBe("failed");
    expect(batch.completedCount).toBe(0);
    expect(batch.failedCount).toBe(1);
    expect(generate).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([500, 1_000]);

    const [artifact] = await store.listBatchArtifacts(batch.id);
    expect(artifact?.status).toBe("failed");
    expect(artifact?.lastError).toBe("provider unavailable");
    expect(artifact?.metadata).toMatchObject({ generationAttempts: 3 });
  });

  it("should treat a generation timeout as a failed attempt", async () => {
    generate.mockImplementation(() => new Promise<GenerationResult>(() => {}));
    const orchestrator = createOrchestrator({
      generationTimeoutMs: 20,
      maxGenerationAttempts: 1,
    });

    const started = await orchestrator.startBatch(
      request({ requestedCount: 1, tierDistribution: { basic: 1 } }),
    );
    const batch = await orchestrator.waitForBatch(started.id);

    expect(batch.status).toBe("failed");
    const [artifact] = await store.listBatchArtifacts(batch.id);
    expect(artifact?.lastError).toContain("timed out after 20ms");
    expect(generate.mock.calls[0]?.[0].signal.aborted).toBe(true);
  });

  it("should record each safety verdict and count rejected items as completed", async () => {
    classify
      .mockResolvedValueOnce(safe)
      .mockResolvedValueOnce({ verdict: "borderline", score: 0.4, flags: ["sexual"] })
      .mockResolvedValueOnce({ verdict: "rejected", score: 0.95, flags: ["violence"] });
    const orchestrator = createOrchestrator({ concurrency: 1 });

    const started = await orchestrator.startBatch(request());
    const batch = await orchestrator.waitForBatch(started.id);

    expect(batch.status).toBe("completed");
    expect(batch.completedCount).toBe(3);

    const artifacts = await store.listBatchArtifacts(batch.id);
    expect(artifacts.map((a) => a.status)).toEqual(["eligible", "borderline", "rejected"]);
    expect(artifacts.map((a) => a.safetyVerdict)).toEqual(["safe", "borderline", "rejected"]);
    expect(artifacts[1]?.safetyFlags).toEqual(["sexual"]);
    expect(artifacts[2]?.safetyScore).toBe(0.95);
  });

  it("should reject artifacts when the safety gate fails", async () => {
    classify.mockRejectedValue(new Error("moderation endpoint down"));
    const orchestrator = createOrchestrator();

    const started = await orchestrator.startBatch(
      request({ requestedCount: 1, tierDistribution: { basic: 1 } }),
    );
    const batch = await orchestrator.waitForBatch(started.id);

    expect(batch.status).toBe("completed");
    const [artifact] = await store.listBatchArtifacts(batch.id);
    expect(artifact?.status).toBe("rejected");
    expect(artifact?.safetyScore).toBe(1);
    expect(artifact?.safetyFlags).toEqual([CLASSIFIER_ERROR_FLAG]);
  });

  it("should build prompts from rotating templates", async () => {
    const orchestrator = createOrchestrator({ concurrency: 1 });

    const started = await orchestrator.startBatch(request());
    const batch = await orchestrator.waitForBatch(started.id);
    const artifacts = await store.listBatchArtifacts(batch.id);

    expect(artifacts.map((a) => a.templateId)).toEqual(["FIT-001", "FIT-002", "FIT-003"]);
    expect(artifacts[0]?.promptUsed).toBe(
      "athletic look in a sleek training outfit, indoor climbing gym, " +
        "bright overhead lighting, crisp detail, wide shot from below the wall, " +
        "chalked hands on a colorful hold, calm focus",
    );
    expect(generate.mock.calls[0]?.[0]).toMatchObject({
      avatarModelRef: "lora://avatar-1/v3",
      templateParams: { templateId: "FIT-001", category: "fitness", tier: "basic" },
    });
  });

  it("should use the custom prompt when the selector returns no template", async () => {
    const orchestrator = createOrchestrator({}, () => null);

    const started = await orchestrator.startBatch(
      request({
        requestedCount: 1,
        tierDistribution: { custom: 1 },
        customPrompt: "  portrait in a rainy neon street  ",
      }),
    );
    const batch = await orchestrator.waitForBatch(started.id);
    const [artifact] = await store.listBatchArtifacts(batch.id);

    expect(artifact?.templateId).toBeNull();
    expect(artifact?.promptUsed).toBe("portrait in a rainy neon street");
    expect(artifact?.tier).toBe("custom");
  });

  it("should validate the request before creating anything", async () => {
    const createBatch = vi.spyOn(store, "createBatch");
    const orchestrator = createOrchestrator();

    await expect(
      orchestrator.startBatch(request({ requestedCount: 3, tierDistribution: { basic: 2 } })),
    ).rejects.toThrow("Tier distribution sums to 2 but requestedCount is 3");
    await expect(
      orchestrator.startBatch(request({ requestedCount: 0, tierDistribution: {} })),
    ).rejects.toBeInstanceOf(InvalidRequestError);
    await expect(
      orchestrator.startBatch(
        request({ requestedCount: 1, tierDistribution: { basic: -1, premium: 2 } }),
      ),
    ).rejects.toBeInstanceOf(InvalidRequestError);
    await expect(
      createOrchestrator({}, () => null).startBatch(request()),
    ).rejects.toThrow('No template available for tier "basic" and no custom prompt given');

    expect(createBatch).not.toHaveBeenCalled();
  });

  it("should never run more generations at once than the pool allows", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    generate.mockImplementation(async () => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
      return result("blob://pooled");
    });
    const orchestrator = createOrchestrator({ concurrency: 2 });

    const started = await orchestrator.startBatch(
      request({ requestedCount: 6, tierDistribution: { basic: 6 } }),
    );
    const batch = await orchestrator.waitForBatch(started.id);

    expect(batch.completedCount).toBe(6);
    expect(maxInFlight).toBe(2);
  });

  it("should stop dispatching work after cancellation", async () => {
    let release: () => void = () => {};
    generate.mockImplementationOnce(
      () =>
        new Promise<GenerationResult>((resolve) => {
          release = () => resolve(result("blob://first"));
        }),
    );
    const orchestrator = createOrchestrator({ concurrency: 1 });

    const started = await orchestrator.startBatch(request());
    await vi.waitFor(() => expect(generate).toHaveBeenCalledTimes(1));

    const cancelling = await orchestrator.cancelBatch(started.id);
    expect(cancelling.cancelRequestedAt).toBe(START);
    release();

    const batch = await orchestrator.waitForBatch(started.id);
    expect(batch.status).toBe("cancelled");
    expect(batch.completedCount).toBe(1);
    expect(batch.failedCount).toBe(0);
    expect(batch.artifactIds).toHaveLength(1);
    expect(generate).toHaveBeenCalledTimes(1);
  });

  it("should run batches for several avatars with independent counters", async () => {
    const orchestrator = createOrchestrator();

    const a = await orchestrator.startBatch(request({ avatarId: "avatar-a" }));
    const b = await orchestrator.startBatch(
      request({ avatarId: "avatar-b", requestedCount: 2, tierDistribution: { premium: 2 } }),
    );

    const [doneA, doneB] = await Promise.all([
      orchestrator.waitForBatch(a.id),
      orchestrator.waitForBatch(b.id),
    ]);
    expect(doneA.completedCount).toBe(3);
    expect(doneB.completedCount).toBe(2);
    expect(await store.listEligibleArtifacts("avatar-a")).toHaveLength(3);
    expect(await store.listEligibleArtifacts("avatar-b")).toHaveLength(2);
  });

  it("should summarize cost, latency and outcomes", async () => {
    let calls = 0;
    generate.mockImplementation(async () => {
      calls++;
      if (calls === 3) throw new PermanentProviderError("bad prompt");
      return result(`blob://${calls}`);
    });
    const orchestrator = createOrchestrator({ concurrency: 1 });

    const started = await orchestrator.startBatch(
      request({ tierDistribution: { basic: 2, premium: 1 } }),
    );
    await orchestrator.waitForBatch(started.id);
    const summary = await orchestrator.summarizeBatch(started.id);

    expect(summary).toMatchObject({
      status: "partially_failed",
      requestedCount: 3,
      completedCount: 2,
      failedCount: 1,
      unresolvedCount: 0,
      totalCostUsd: 0.04,
      averageCostUsd: 0.02,
      totalLatencyMs: 2_000,
      averageLatencyMs: 1_000,
    });
    expect(summary.byTier).toEqual({ basic: 2, premium: 1, custom: 0 });
    expect(summary.byVerdict).toEqual({
      safe: 2,
      borderline: 0,
      rejected: 0,
      unclassified: 1,
    });
    expect(summary.byStatus).toEqual({ eligible: 2, failed: 1 });
  });
});
