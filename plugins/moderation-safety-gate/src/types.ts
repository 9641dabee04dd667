import { z } from "@avatarflow/utils";
import type { SafetyClassificationRequest } from "@avatarflow/batch-orchestrator";

export const ModerationCategoryEnum = z.enum([
  "sexual",
  "violence",
  "hate",
  "self_harm",
  "harassment",
]);
export type ModerationCategory = z.infer<typeof ModerationCategoryEnum>;

/** Per-category likelihood in [0, 1] */
export type CategoryScores = Record<ModerationCategory, number>;

/**
 * Source of category scores for a generated image and its prompt
 */
export interface ModerationClient {
  score(request: SafetyClassificationRequest): Promise<CategoryScores>;
}
