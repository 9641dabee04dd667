export {
  DEFAULT_PLATFORM_POLICIES,
  distributionConfigSchema,
  resolvePlatformPolicy,
} from "./config";
export type { DistributionConfig, DistributionConfigInput } from "./config";

export {
  getZonedParts,
  getTimeZoneOffsetMs,
  zonedTimeToEpoch,
  localDayKey,
  postingWindowForDay,
  startOfNextLocalDay,
  windowLengthMs,
} from "./zoned-time";
export type { ZonedParts, WindowBounds } from "./zoned-time";

export { planSlot, minimumSpacingMs, jitteredIntervalMs } from "./slot-planner";
export type { SlotPlanInput } from "./slot-planner";
export { SlotAllocator, occupiedTimes } from "./slot-allocator";
export type { AllocateSlotOptions } from "./slot-allocator";

export { PublisherRegistry } from "./publisher";
export type { PlatformPublisher, PublishRequest, PublishResult } from "./publisher";

export { CronerBackend, TestSchedulerBackend } from "./scheduler-backend";
export type {
  ScheduledJob,
  SchedulerBackend,
  SchedulerCallback,
} from "./scheduler-backend";

export {
  markArtifactScheduled,
  markArtifactPublished,
  releaseArtifactIfIdle,
} from "./artifact-status";

export { DistributionScheduler, targetWindowSchema } from "./distribution-scheduler";
export type {
  BulkScheduleOptions,
  BulkScheduleResult,
  DistributionSchedulerDeps,
  ScheduleFailure,
  TargetWindow,
} from "./distribution-scheduler";

export { DispatchLoop } from "./dispatch-loop";
export type {
  DispatchLoopDeps,
  DispatchReport,
  PostFailedEvent,
  PostPublishedEvent,
} from "./dispatch-loop";
