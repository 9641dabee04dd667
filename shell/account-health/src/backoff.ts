import type {
  AccountHealth,
  PlatformAccountHealth,
  PlatformAccountHealthInput,
} from "@avatarflow/content-store";
import type { HealthMonitorConfig } from "./config";

/**
 * Delay before an account may publish again after `consecutiveFailures` failures
 */
export function computeBackoffMs(
  consecutiveFailures: number,
  config: Pick<HealthMonitorConfig, "backoffBaseMs" | "backoffExponentCap">,
): number {
  const exponent = Math.min(consecutiveFailures, config.backoffExponentCap);
  return config.backoffBaseMs * Math.pow(2, exponent);
}

export function healthAfterFailure(
  previous: AccountHealth,
  consecutiveFailures: number,
  config: Pick<HealthMonitorConfig, "degradedThreshold" | "suspendedThreshold">,
): AccountHealth {
  if (previous === "suspended") return "suspended";
  if (consecutiveFailures >= config.suspendedThreshold) return "suspended";
  if (consecutiveFailures >= config.degradedThreshold) return "degraded";
  return previous;
}

export function initialHealth(platformAccountId: string): PlatformAccountHealthInput {
  return {
    platformAccountId,
    consecutiveFailures: 0,
    backoffUntil: null,
    health: "healthy",
    lastSuccessAt: null,
    lastFailureAt: null,
    lastFailureRetryable: null,
  };
}

export function applyOutcome(
  current: PlatformAccountHealth | PlatformAccountHealthInput,
  outcome: { success: boolean; retryable: boolean },
  now: number,
  config: HealthMonitorConfig,
): PlatformAccountHealthInput {
  const base: PlatformAccountHealthInput = {
    platformAccountId: current.platformAccountId,
    consecutiveFailures: current.consecutiveFailures,
    backoffUntil: current.backoffUntil,
    health: current.health,
    lastSuccessAt: current.lastSuccessAt,
    lastFailureAt: current.lastFailureAt,
    lastFailureRetryable: current.lastFailureRetryable,
  };

  if (outcome.success) {
    return {
      ...base,
      consecutiveFailures: 0,
      backoffUntil: null,
      // Suspension only clears through an explicit reset
      health: current.health === "suspended" ? "suspended" : "healthy",
      lastSuccessAt: now,
    };
  }

  const consecutiveFailures = current.consecutiveFailures + 1;
  return {
    ...base,
    consecutiveFailures,
    backoffUntil: now + computeBackoffMs(consecutiveFailures, config),
    health: healthAfterFailure(current.health, consecutiveFailures, config),
    lastFailureAt: now,
    lastFailureRetryable: outcome.retryable,
  };
}
