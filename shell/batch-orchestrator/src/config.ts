import { z } from "@avatarflow/utils";

export const batchOrchestratorConfigSchema = z.object({
  /** Concurrent generation calls across all batches */
  concurrency: z.number().int().positive().default(4),
  generationTimeoutMs: z.number().int().positive().default(120_000),
  classificationTimeoutMs: z.number().int().positive().default(30_000),
  maxGenerationAttempts: z.number().int().positive().default(3),
  generationRetryBaseMs: z.number().int().nonnegative().default(500),
  /** Unset keeps borderline artifacts for manual review */
  borderlineAutoApproveAfterMs: z.number().int().positive().optional(),
});

export type BatchOrchestratorConfig = z.infer<typeof batchOrchestratorConfigSchema>;
export type BatchOrchestratorConfigInput = z.input<
  typeof batchOrchestratorConfigSchema
>;
