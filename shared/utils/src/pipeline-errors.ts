/**
 * Error taxonomy shared by the generation and distribution services
 */

export type PipelineErrorCode =
  | "INVALID_REQUEST"
  | "TRANSIENT_PROVIDER_ERROR"
  | "PERMANENT_PROVIDER_ERROR"
  | "DUPLICATE_SCHEDULE"
  | "ACCOUNT_UNAVAILABLE"
  | "STORAGE_CONFLICT"
  | "NOT_FOUND";

export class PipelineError extends Error {
  constructor(
    public readonly code: PipelineErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "PipelineError";
  }
}

/**
 * Bad input. Never retried; raised before any work starts.
 */
export class InvalidRequestError extends PipelineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super("INVALID_REQUEST", message, context);
    this.name = "InvalidRequestError";
  }
}

/**
 * No slot satisfies spacing, posting hours and the daily cap before the
 * caller's window closes
 */
export class SchedulingWindowExhaustedError extends InvalidRequestError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.name = "SchedulingWindowExhaustedError";
  }
}

/**
 * Rate limits, outages, network failures. Retried with backoff.
 */
export class TransientProviderError extends PipelineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super("TRANSIENT_PROVIDER_ERROR", message, context);
    this.name = "TransientProviderError";
  }
}

/**
 * A call exceeded its caller-supplied timeout
 */
export class TimeoutError extends TransientProviderError {
  constructor(
    public readonly timeoutMs: number,
    operation: string,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, { timeoutMs });
    this.name = "TimeoutError";
  }
}

/**
 * Policy rejection, invalid credentials. Surfaced, never retried.
 */
export class PermanentProviderError extends PipelineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super("PERMANENT_PROVIDER_ERROR", message, context);
    this.name = "PermanentProviderError";
  }
}

export class DuplicateScheduleError extends PipelineError {
  constructor(artifactId: string, platform: string) {
    super(
      "DUPLICATE_SCHEDULE",
      `Artifact "${artifactId}" already has an active post on ${platform}`,
      { artifactId, platform },
    );
    this.name = "DuplicateScheduleError";
  }
}

export class AccountUnavailableError extends PipelineError {
  constructor(
    platformAccountId: string,
    reason: string,
    context?: Record<string, unknown>,
  ) {
    super(
      "ACCOUNT_UNAVAILABLE",
      `Platform account "${platformAccountId}" is unavailable: ${reason}`,
      { platformAccountId, ...context },
    );
    this.name = "AccountUnavailableError";
  }
}

/**
 * A guarded update lost a race. Re-read the entity and retry.
 */
export class StorageConflictError extends PipelineError {
  constructor(entity: string, id: string, context?: Record<string, unknown>) {
    super(
      "STORAGE_CONFLICT",
      `Concurrent update conflict on ${entity} "${id}"`,
      { entity, id, ...context },
    );
    this.name = "StorageConflictError";
  }
}

export class NotFoundError extends PipelineError {
  constructor(entity: string, id: string) {
    super("NOT_FOUND", `${entity} "${id}" not found`, { entity, id });
    this.name = "NotFoundError";
  }
}

/**
 * Transient and unclassified errors are retryable; permanent ones and
 * precondition failures are not.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof PipelineError) {
    return error.code === "TRANSIENT_PROVIDER_ERROR";
  }
  return true;
}
