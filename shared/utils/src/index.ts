/**
 * Shared utilities for the avatarflow workspaces
 */

// Logger
export { Logger, LogLevel, parseLogLevel } from "./logger";
export type { LoggerOptions } from "./logger";

// Test utilities
export {
  createSilentLogger,
  createTestLogger,
  ManualClock,
  createSequenceRandom,
} from "./test-utils";

// Zod
export { z, ZodError } from "./zod";
export type { ZodType, ZodSchema, ZodInfer, ZodInput, ZodOutput } from "./zod";

// ID generation
export { createId, createPrefixedId, createBatchId } from "./id";

// Time
export { systemClock, HOUR_MS, MINUTE_MS, DAY_MS } from "./clock";
export type { Clock } from "./clock";
export { withTimeout, sleep } from "./timeout";
export type { SleepFn } from "./timeout";

// Concurrency
export { KeyedMutex } from "./keyed-mutex";

// Errors
export { getErrorMessage } from "./error";
export {
  PipelineError,
  InvalidRequestError,
  SchedulingWindowExhaustedError,
  TransientProviderError,
  TimeoutError,
  PermanentProviderError,
  DuplicateScheduleError,
  AccountUnavailableError,
  StorageConflictError,
  NotFoundError,
  isRetryableError,
} from "./pipeline-errors";
export type { PipelineErrorCode } from "./pipeline-errors";
