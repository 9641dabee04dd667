import { HOUR_MS, MINUTE_MS, z } from "@avatarflow/utils";
import { PlatformEnum, platformPolicySchema } from "@avatarflow/content-store";
import type { Platform, PlatformAccount, PlatformPolicy } from "@avatarflow/content-store";

export const DEFAULT_PLATFORM_POLICIES: Record<Platform, PlatformPolicy> = {
  instagram: { baseIntervalMs: 4 * HOUR_MS, jitterRatio: 0.2, maxPostsPerDay: 3 },
  tiktok: { baseIntervalMs: 3 * HOUR_MS, jitterRatio: 0.2, maxPostsPerDay: 5 },
  twitter: { baseIntervalMs: 1 * HOUR_MS, jitterRatio: 0.2, maxPostsPerDay: 10 },
  onlyfans: { baseIntervalMs: 6 * HOUR_MS, jitterRatio: 0.2, maxPostsPerDay: 2 },
};

export const distributionConfigSchema = z.object({
  /** Per-platform overrides of the default posting policy */
  platformPolicies: z
    .record(PlatformEnum, platformPolicySchema.partial())
    .default({}),
  dispatchIntervalMs: z.number().int().positive().default(MINUTE_MS),
  /** Due posts loaded per account per tick */
  dispatchBatchSize: z.number().int().positive().default(200),
  publishTimeoutMs: z.number().int().positive().default(MINUTE_MS),
  /** A publish running longer than this is considered lost and retried */
  stallTimeoutMs: z.number().int().positive().default(10 * MINUTE_MS),
  maxPublishAttempts: z.number().int().positive().default(5),
  /** Minimum delay before a retryable publish failure is attempted again */
  publishRetryDelayMs: z.number().int().nonnegative().default(5 * MINUTE_MS),
});

export type DistributionConfig = z.infer<typeof distributionConfigSchema>;
export type DistributionConfigInput = z.input<typeof distributionConfigSchema>;

function withDefined(
  base: PlatformPolicy,
  overrides: Partial<PlatformPolicy> | null | undefined,
): PlatformPolicy {
  if (!overrides) return base;
  return {
    baseIntervalMs: overrides.baseIntervalMs ?? base.baseIntervalMs,
    jitterRatio: overrides.jitterRatio ?? base.jitterRatio,
    maxPostsPerDay: overrides.maxPostsPerDay ?? base.maxPostsPerDay,
  };
}

/**
 * Platform default, then configured platform override, then account override
 */
export function resolvePlatformPolicy(
  account: Pick<PlatformAccount, "platform" | "policyOverrides">,
  config: Pick<DistributionConfig, "platformPolicies">,
): PlatformPolicy {
  const platformDefault = withDefined(
    DEFAULT_PLATFORM_POLICIES[account.platform],
    config.platformPolicies[account.platform],
  );
  return withDefined(platformDefault, account.policyOverrides);
}
