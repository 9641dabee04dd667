import {
  PermanentProviderError,
  PipelineError,
  TransientProviderError,
  getErrorMessage,
  isRetryableError,
} from "@avatarflow/utils";
import type { PublishResult } from "@avatarflow/distribution";

/**
 * Rate limits and server errors are worth retrying; any other 4xx means the
 * request itself is wrong (bad token, policy rejection, invalid media).
 */
export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export function httpError(
  platform: string,
  status: number,
  detail: string,
): PipelineError {
  const message = `${platform} API error: ${status} - ${detail}`;
  return isRetryableStatus(status)
    ? new TransientProviderError(message, { status })
    : new PermanentProviderError(message, { status });
}

/**
 * Errors thrown by fetch itself (DNS, reset connections, aborts) are
 * transient; pipeline errors keep their own classification.
 */
export function toFailedPublish(error: unknown): PublishResult {
  return {
    success: false,
    error: getErrorMessage(error),
    retryableError: isRetryableError(error),
  };
}
