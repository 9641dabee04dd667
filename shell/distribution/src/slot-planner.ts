import { SchedulingWindowExhaustedError } from "@avatarflow/utils";
import type { PlatformPolicy, PostingWindow } from "@avatarflow/content-store";
import {
  localDayKey,
  postingWindowForDay,
  startOfNextLocalDay,
  windowLengthMs,
} from "./zoned-time";

export interface SlotPlanInput {
  /** No slot before this instant */
  earliest: number;
  /** No slot after this instant; null for unbounded */
  latest: number | null;
  timeZone: string;
  postingWindow: PostingWindow;
  policy: PlatformPolicy;
  /** Times already taken on the account (pending, publishing, published) */
  occupied: readonly number[];
  random: () => number;
}

const MAX_ITERATIONS = 10_000;

export function minimumSpacingMs(policy: PlatformPolicy): number {
  return Math.round(policy.baseIntervalMs * (1 - policy.jitterRatio));
}

/**
 * Base interval with uniform jitter in [-jitterRatio, +jitterRatio]
 */
export function jitteredIntervalMs(policy: PlatformPolicy, random: () => number): number {
  const offset = policy.jitterRatio * (2 * random() - 1);
  return Math.round(policy.baseIntervalMs * (1 + offset));
}

/**
 * Pick the earliest publish time at or after `earliest` that
 * - lies inside the account's local posting window,
 * - keeps at least the minimum spacing from every occupied time,
 * - leaves the local day under its post cap.
 * Throws SchedulingWindowExhaustedError when that time would pass `latest`.
 */
export function planSlot(input: SlotPlanInput): number {
  const { policy, timeZone, postingWindow, random } = input;
  const minSpacing = minimumSpacingMs(policy);
  const sorted = [...input.occupied].sort((a, b) => a - b);

  const perDay = new Map<string, number>();
  for (const time of sorted) {
    const key = localDayKey(time, timeZone);
    perDay.set(key, (perDay.get(key) ?? 0) + 1);
  }

  // Window openings are offset by up to jitterRatio of the base interval,
  // capped at half the window
  const openingJitterMs = Math.min(
    policy.baseIntervalMs * policy.jitterRatio,
    windowLengthMs(postingWindow) / 2,
  );
  const openWindow = (windowStart: number): number =>
    windowStart + Math.round(random() * openingJitterMs);

  let candidate = input.earliest;

  for (let i = 0; i < MAX_ITERATIONS; i++) {
    if (input.latest !== null && candidate > input.latest) {
      throw new SchedulingWindowExhaustedError(
        "No publish slot satisfies spacing, posting hours and the daily cap before the window closes",
        { earliest: input.earliest, latest: input.latest },
      );
    }

    const bounds = postingWindowForDay(candidate, postingWindow, timeZone);
    if (candidate < bounds.start) {
      candidate = openWindow(bounds.start);
      continue;
    }
    if (candidate >= bounds.end) {
      const nextDay = startOfNextLocalDay(candidate, timeZone);
      candidate = openWindow(postingWindowForDay(nextDay, postingWindow, timeZone).start);
      continue;
    }

    if ((perDay.get(localDayKey(candidate, timeZone)) ?? 0) >= policy.maxPostsPerDay) {
      const nextDay = startOfNextLocalDay(candidate, timeZone);
      candidate = openWindow(postingWindowForDay(nextDay, postingWindow, timeZone).start);
      continue;
    }

    const clash = sorted.find((time) => Math.abs(time - candidate) < minSpacing);
    if (clash !== undefined) {
      candidate = Math.max(
        clash + jitteredIntervalMs(policy, random),
        clash + minSpacing,
      );
      continue;
    }

    return candidate;
  }

  throw new SchedulingWindowExhaustedError("Slot search did not converge", {
    earliest: input.earliest,
  });
}
