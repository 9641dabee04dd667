export { ModerationCategoryEnum } from "./types";
export type { CategoryScores, ModerationCategory, ModerationClient } from "./types";
export {
  ThresholdSafetyGate,
  classifyScores,
  safetyThresholdsSchema,
} from "./threshold-safety-gate";
export type {
  SafetyThresholds,
  SafetyThresholdsInput,
} from "./threshold-safety-gate";
export {
  OpenAiModerationClient,
  openAiModerationConfigSchema,
} from "./openai-moderation-client";
export type {
  OpenAiModerationConfig,
  OpenAiModerationConfigInput,
} from "./openai-moderation-client";
