import { InvalidRequestError, LogLevel, parseLogLevel, z } from "@avatarflow/utils";
import type { ZodError } from "@avatarflow/utils";
import { batchOrchestratorConfigSchema } from "@avatarflow/batch-orchestrator";
import { distributionConfigSchema } from "@avatarflow/distribution";
import { healthMonitorConfigSchema } from "@avatarflow/account-health";

export const DEFAULT_DATABASE_URL = "file:./data/avatarflow.db";

export const pipelineConfigSchema = z.object({
  name: z.string().default("avatarflow"),
  version: z.string().default("0.1.0"),
  database: z
    .object({
      url: z.string().min(1).default(DEFAULT_DATABASE_URL),
      authToken: z.string().optional(),
    })
    .default({}),
  logLevel: z.nativeEnum(LogLevel).default(LogLevel.INFO),
  generation: batchOrchestratorConfigSchema.default({}),
  distribution: distributionConfigSchema.default({}),
  health: healthMonitorConfigSchema.default({}),
  /** Cron expression for housekeeping such as borderline auto-approval */
  maintenanceCron: z.string().default("*/5 * * * *"),
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;

/**
 * Type-safe helper for declaring a pipeline config in code
 */
export function defineConfig(config: PipelineConfigInput): PipelineConfigInput {
  return config;
}

const positiveInt = z.coerce.number().int().positive().optional();

const envSchema = z.object({
  AVATARFLOW_DATABASE_URL: z.string().min(1).optional(),
  AVATARFLOW_DATABASE_AUTH_TOKEN: z.string().min(1).optional(),
  AVATARFLOW_GENERATION_CONCURRENCY: positiveInt,
  AVATARFLOW_GENERATION_TIMEOUT_MS: positiveInt,
  AVATARFLOW_PUBLISH_TIMEOUT_MS: positiveInt,
  AVATARFLOW_DISPATCH_TICK_MS: positiveInt,
  AVATARFLOW_BORDERLINE_AUTO_APPROVE_MS: positiveInt,
  LOG_LEVEL: z.string().optional(),
});

type Env = Record<string, string | undefined>;

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join("; ");
}

/**
 * Build the pipeline config from environment variables layered over
 * `base`. Empty variables count as unset.
 */
export function loadPipelineConfig(
  env: Env = process.env,
  base: PipelineConfigInput = {},
): PipelineConfig {
  const present: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") present[key] = value;
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new InvalidRequestError(
      `Invalid environment: ${formatIssues(parsed.error)}`,
    );
  }
  const vars = parsed.data;

  const database: NonNullable<PipelineConfigInput["database"]> = {
    ...base.database,
  };
  if (vars.AVATARFLOW_DATABASE_URL) database.url = vars.AVATARFLOW_DATABASE_URL;
  if (vars.AVATARFLOW_DATABASE_AUTH_TOKEN) {
    database.authToken = vars.AVATARFLOW_DATABASE_AUTH_TOKEN;
  }

  const generation: NonNullable<PipelineConfigInput["generation"]> = {
    ...base.generation,
  };
  if (vars.AVATARFLOW_GENERATION_CONCURRENCY) {
    generation.concurrency = vars.AVATARFLOW_GENERATION_CONCURRENCY;
  }
  if (vars.AVATARFLOW_GENERATION_TIMEOUT_MS) {
    generation.generationTimeoutMs = vars.AVATARFLOW_GENERATION_TIMEOUT_MS;
  }
  if (vars.AVATARFLOW_BORDERLINE_AUTO_APPROVE_MS) {
    generation.borderlineAutoApproveAfterMs =
      vars.AVATARFLOW_BORDERLINE_AUTO_APPROVE_MS;
  }

  const distribution: NonNullable<PipelineConfigInput["distribution"]> = {
    ...base.distribution,
  };
  if (vars.AVATARFLOW_PUBLISH_TIMEOUT_MS) {
    distribution.publishTimeoutMs = vars.AVATARFLOW_PUBLISH_TIMEOUT_MS;
  }
  if (vars.AVATARFLOW_DISPATCH_TICK_MS) {
    distribution.dispatchIntervalMs = vars.AVATARFLOW_DISPATCH_TICK_MS;
  }

  const result = pipelineConfigSchema.safeParse({
    ...base,
    database,
    logLevel: parseLogLevel(vars.LOG_LEVEL, base.logLevel ?? LogLevel.INFO),
    generation,
    distribution,
  });

  if (!result.success) {
    throw new InvalidRequestError(
      `Invalid pipeline config: ${formatIssues(result.error)}`,
    );
  }
  return result.data;
}
