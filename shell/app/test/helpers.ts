import { createSequenceRandom, createSilentLogger } from "@avatarflow/utils";
import type { Clock } from "@avatarflow/utils";
import type { IContentStore, PlatformAccountInput } from "@avatarflow/content-store";
import {
  createRotatingTemplateSelector,
  getDefaultTemplateCatalog,
} from "@avatarflow/batch-orchestrator";
import type { GenerationProvider } from "@avatarflow/batch-orchestrator";
import { ThresholdSafetyGate } from "@avatarflow/moderation-safety-gate";
import type { CategoryScores, ModerationClient } from "@avatarflow/moderation-safety-gate";
import type { PlatformPublisher, SchedulerBackend } from "@avatarflow/distribution";
import { ContentPipeline } from "../src/pipeline";
import type { PipelineConfigInput } from "../src/config";

// 2025-03-10 08:00 in Mexico City
export const MORNING = Date.UTC(2025, 2, 10, 14);

export const CLEAN: CategoryScores = {
  sexual: 0.01,
  violence: 0.01,
  hate: 0.01,
  self_harm: 0.01,
  harassment: 0.01,
};

/**
 * Provider returning blob://1, blob://2, ... in call order
 */
export function createFakeProvider(): GenerationProvider {
  let calls = 0;
  return {
    name: "fake",
    generate: async () => ({
      binaryLocator: `blob://${++calls}`,
      costUsd: 0.02,
      latencyMs: 1_000,
    }),
  };
}

/**
 * Moderation scores keyed by binary locator; unknown locators score clean
 */
export function createModerationClient(
  scores: Record<string, Partial<CategoryScores>> = {},
): ModerationClient {
  return {
    score: async (request) => ({ ...CLEAN, ...scores[request.binaryLocator] }),
  };
}

export function tiktokAccount(): PlatformAccountInput {
  return {
    id: "acct-tt",
    avatarId: "avatar-1",
    platform: "tiktok",
    handle: "@avatar.one",
    timezone: "America/Mexico_City",
    postingWindow: { startHour: 9, endHour: 21 },
  };
}

export interface TestPipelineOptions {
  store: IContentStore;
  clock: Clock;
  backend: SchedulerBackend;
  publishers?: PlatformPublisher[];
  moderation?: ModerationClient;
  config?: PipelineConfigInput;
}

export function createTestPipeline(options: TestPipelineOptions): ContentPipeline {
  const logger = createSilentLogger();
  return ContentPipeline.createFresh({
    store: options.store,
    provider: createFakeProvider(),
    safetyGate: new ThresholdSafetyGate(
      options.moderation ?? createModerationClient(),
      logger,
    ),
    logger,
    config: options.config,
    publishers: options.publishers,
    clock: options.clock,
    random: () => 0.5,
    sleep: async () => {},
    backend: options.backend,
    templateSelector: createRotatingTemplateSelector(
      getDefaultTemplateCatalog(),
      createSequenceRandom([0]),
    ),
  });
}
