export { HealthMonitor } from "./health-monitor";
export type {
  AccountAvailability,
  HealthMonitorDeps,
  HealthStore,
} from "./health-monitor";
export { healthMonitorConfigSchema } from "./config";
export type { HealthMonitorConfig, HealthMonitorConfigInput } from "./config";
export { computeBackoffMs, healthAfterFailure } from "./backoff";
