import { describe, it, expect } from "vitest";
import {
  AccountUnavailableError,
  DuplicateScheduleError,
  InvalidRequestError,
  PermanentProviderError,
  PipelineError,
  SchedulingWindowExhaustedError,
  StorageConflictError,
  TransientProviderError,
  isRetryableError,
} from "../src/pipeline-errors";
import { getErrorMessage } from "../src/error";

describe("pipeline errors", () => {
  it("should carry a code and context", () => {
    const error = new DuplicateScheduleError("art_1", "instagram");

    expect(error).toBeInstanceOf(PipelineError);
    expect(error.code).toBe("DUPLICATE_SCHEDULE");
    expect(error.context).toEqual({ artifactId: "art_1", platform: "instagram" });
    expect(error.message).toBe(
      'Artifact "art_1" already has an active post on instagram',
    );
  });

  it("should treat window exhaustion as an invalid request", () => {
    const error = new SchedulingWindowExhaustedError("no slot");

    expect(error).toBeInstanceOf(InvalidRequestError);
    expect(error.code).toBe("INVALID_REQUEST");
  });

  it("should classify retryability", () => {
    expect(isRetryableError(new TransientProviderError("rate limited"))).toBe(true);
    expect(isRetryableError(new Error("socket hang up"))).toBe(true);
    expect(isRetryableError(new PermanentProviderError("bad token"))).toBe(false);
    expect(isRetryableError(new InvalidRequestError("bad input"))).toBe(false);
    expect(isRetryableError(new StorageConflictError("artifact", "a1"))).toBe(false);
    expect(
      isRetryableError(new AccountUnavailableError("acc_1", "suspended")),
    ).toBe(false);
  });

  it("should extract messages from unknown values", () => {
    expect(getErrorMessage(new Error("boom"))).toBe("boom");
    expect(getErrorMessage("plain")).toBe("plain");
    expect(getErrorMessage(42)).toBe("42");
  });
});
