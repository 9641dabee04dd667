import { getErrorMessage, z } from "@avatarflow/utils";
import type { Logger } from "@avatarflow/utils";
import { CLASSIFIER_ERROR_FLAG } from "@avatarflow/batch-orchestrator";
import type {
  SafetyClassification,
  SafetyClassificationRequest,
  SafetyGate,
} from "@avatarflow/batch-orchestrator";
import { ModerationCategoryEnum } from "./types";
import type { CategoryScores, ModerationClient } from "./types";

const thresholdsSchema = (defaults: CategoryScores) =>
  z
    .object({
      sexual: z.number().min(0).max(1).default(defaults.sexual),
      violence: z.number().min(0).max(1).default(defaults.violence),
      hate: z.number().min(0).max(1).default(defaults.hate),
      self_harm: z.number().min(0).max(1).default(defaults.self_harm),
      harassment: z.number().min(0).max(1).default(defaults.harassment),
    })
    .default({});

export const safetyThresholdsSchema = z
  .object({
    /** A score above any of these rejects the artifact */
    reject: thresholdsSchema({
      sexual: 0.9,
      violence: 0.7,
      hate: 0.5,
      self_harm: 0.5,
      harassment: 0.6,
    }),
    /** A score above any of these holds the artifact for review */
    borderline: thresholdsSchema({
      sexual: 0.6,
      violence: 0.3,
      hate: 0.1,
      self_harm: 0.1,
      harassment: 0.3,
    }),
  })
  .refine(
    (t) =>
      ModerationCategoryEnum.options.every(
        (category) => t.borderline[category] <= t.reject[category],
      ),
    { message: "borderline thresholds must not exceed reject thresholds" },
  );

export type SafetyThresholds = z.infer<typeof safetyThresholdsSchema>;
export type SafetyThresholdsInput = z.input<typeof safetyThresholdsSchema>;

/**
 * Verdict from category scores: any category over its reject threshold
 * rejects, any over its borderline threshold holds for review.
 */
export function classifyScores(
  scores: CategoryScores,
  thresholds: SafetyThresholds,
): SafetyClassification {
  const categories = ModerationCategoryEnum.options;
  const score = Math.max(...categories.map((category) => scores[category]));
  const flags = categories.filter(
    (category) => scores[category] > thresholds.borderline[category],
  );

  if (categories.some((category) => scores[category] > thresholds.reject[category])) {
    return { verdict: "rejected", score, flags };
  }
  if (flags.length > 0) {
    return { verdict: "borderline", score, flags };
  }
  return { verdict: "safe", score, flags };
}

export class ThresholdSafetyGate implements SafetyGate {
  private thresholds: SafetyThresholds;
  private logger: Logger;

  constructor(
    private client: ModerationClient,
    logger: Logger,
    thresholds: SafetyThresholdsInput = {},
  ) {
    this.thresholds = safetyThresholdsSchema.parse(thresholds);
    this.logger = logger.child("ThresholdSafetyGate");
  }

  async classify(request: SafetyClassificationRequest): Promise<SafetyClassification> {
    try {
      const scores = await this.client.score(request);
      const result = classifyScores(scores, this.thresholds);
      if (result.verdict !== "safe") {
        this.logger.debug(`Content classified ${result.verdict}`, {
          binaryLocator: request.binaryLocator,
          flags: result.flags,
        });
      }
      return result;
    } catch (error) {
      // Unclassified content is treated as rejected
      this.logger.warn("Moderation failed", {
        binaryLocator: request.binaryLocator,
        error: getErrorMessage(error),
      });
      return { verdict: "rejected", score: 1, flags: [CLASSIFIER_ERROR_FLAG] };
    }
  }
}
