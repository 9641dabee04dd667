/**
 * HealthMonitor - Tracks publish outcomes per platform account
 *
 * Owns every write to PlatformAccountHealth. Writes are optimistic: the
 * record is re-read and the update retried when another instance got there
 * first.
 */

import { StorageConflictError, systemClock } from "@avatarflow/utils";
import type { Clock, Logger } from "@avatarflow/utils";
import type {
  AccountHealth,
  IContentStore,
  PlatformAccountHealth,
  PlatformAccountHealthInput,
} from "@avatarflow/content-store";
import { applyOutcome, initialHealth } from "./backoff";
import { healthMonitorConfigSchema } from "./config";
import type { HealthMonitorConfig, HealthMonitorConfigInput } from "./config";

export type HealthStore = Pick<
  IContentStore,
  | "getPlatformAccountHealth"
  | "upsertPlatformAccountHealth"
  | "listPlatformAccountHealth"
>;

export interface HealthMonitorDeps {
  store: HealthStore;
  logger: Logger;
  clock?: Clock;
  config?: HealthMonitorConfigInput;
}

export type AccountAvailability =
  | { available: true; health: AccountHealth }
  | { available: false; health: AccountHealth; reason: "suspended"; retryAt: null }
  | { available: false; health: AccountHealth; reason: "backoff"; retryAt: number };

export class HealthMonitor {
  private store: HealthStore;
  private logger: Logger;
  private clock: Clock;
  private config: HealthMonitorConfig;

  public static createFresh(deps: HealthMonitorDeps): HealthMonitor {
    return new HealthMonitor(deps);
  }

  private constructor(deps: HealthMonitorDeps) {
    this.store = deps.store;
    this.logger = deps.logger.child("HealthMonitor");
    this.clock = deps.clock ?? systemClock;
    this.config = healthMonitorConfigSchema.parse(deps.config ?? {});
  }

  public getConfig(): HealthMonitorConfig {
    return { ...this.config };
  }

  /**
   * Record the result of one publish attempt for an account
   */
  public async recordOutcome(
    platformAccountId: string,
    success: boolean,
    retryable: boolean,
  ): Promise<PlatformAccountHealth> {
    const now = this.clock.now();
    const { previous, updated } = await this.update(platformAccountId, (current) =>
      applyOutcome(current, { success, retryable }, now, this.config),
    );

    if (previous !== updated.health) {
      const details = {
        consecutiveFailures: updated.consecutiveFailures,
        backoffUntil: updated.backoffUntil,
      };
      if (updated.health === "healthy") {
        this.logger.info(`Account ${platformAccountId} recovered`, details);
      } else {
        this.logger.warn(`Account ${platformAccountId} is now ${updated.health}`, details);
      }
    } else if (!success) {
      this.logger.debug(`Publish failure recorded for ${platformAccountId}`, {
        consecutiveFailures: updated.consecutiveFailures,
        retryable,
      });
    }

    return updated;
  }

  public async getHealth(
    platformAccountId: string,
  ): Promise<PlatformAccountHealth | null> {
    return this.store.getPlatformAccountHealth(platformAccountId);
  }

  /**
   * Whether the account may publish or receive new posts right now.
   * Accounts without a record are healthy.
   */
  public async checkAvailability(
    platformAccountId: string,
  ): Promise<AccountAvailability> {
    const record = await this.store.getPlatformAccountHealth(platformAccountId);
    if (!record) return { available: true, health: "healthy" };

    if (record.health === "suspended") {
      return {
        available: false,
        health: record.health,
        reason: "suspended",
        retryAt: null,
      };
    }
    if (record.backoffUntil !== null && record.backoffUntil > this.clock.now()) {
      return {
        available: false,
        health: record.health,
        reason: "backoff",
        retryAt: record.backoffUntil,
      };
    }
    return { available: true, health: record.health };
  }

  /**
   * Operator reset: clears failures, backoff and suspension
   */
  public async resetAccount(platformAccountId: string): Promise<PlatformAccountHealth> {
    const { updated } = await this.update(platformAccountId, (current) => ({
      ...initialHealth(platformAccountId),
      lastSuccessAt: current.lastSuccessAt,
      lastFailureAt: current.lastFailureAt,
      lastFailureRetryable: current.lastFailureRetryable,
    }));
    this.logger.info(`Account ${platformAccountId} reset to healthy`);
    return updated;
  }

  /**
   * Operator suspension, e.g. after a platform-side ban notice
   */
  public async suspendAccount(
    platformAccountId: string,
  ): Promise<PlatformAccountHealth> {
    const { updated } = await this.update(platformAccountId, (current) => ({
      ...current,
      health: "suspended",
    }));
    this.logger.warn(`Account ${platformAccountId} suspended by operator`);
    return updated;
  }

  public async listAccountsByHealth(
    health: AccountHealth,
  ): Promise<PlatformAccountHealth[]> {
    return this.store.listPlatformAccountHealth({ health });
  }

  private async update(
    platformAccountId: string,
    mutate: (current: PlatformAccountHealthInput) => PlatformAccountHealthInput,
  ): Promise<{ previous: AccountHealth; updated: PlatformAccountHealth }> {
    for (let attempt = 1; attempt <= this.config.maxUpdateAttempts; attempt++) {
      const current = await this.store.getPlatformAccountHealth(platformAccountId);
      const base = current ?? initialHealth(platformAccountId);
      const next = mutate(base);

      try {
        const updated = await this.store.upsertPlatformAccountHealth(
          next,
          current?.version ?? null,
        );
        return { previous: base.health, updated };
      } catch (error) {
        if (!(error instanceof StorageConflictError)) throw error;
        this.logger.debug(
          `Health update conflict for ${platformAccountId}, attempt ${attempt}`,
        );
      }
    }

    throw new StorageConflictError("platform account health", platformAccountId, {
      attempts: this.config.maxUpdateAttempts,
    });
  }
}
