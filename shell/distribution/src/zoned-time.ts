/**
 * Wall-clock helpers for IANA timezones, built on Intl.DateTimeFormat
 */

import { DAY_MS, HOUR_MS } from "@avatarflow/utils";
import type { PostingWindow } from "@avatarflow/content-store";

export interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

export function getZonedParts(epochMs: number, timeZone: string): ZonedParts {
  const parts: ZonedParts = { year: 0, month: 0, day: 0, hour: 0, minute: 0, second: 0 };
  for (const part of getFormatter(timeZone).formatToParts(new Date(epochMs))) {
    switch (part.type) {
      case "year":
      case "month":
      case "day":
      case "hour":
      case "minute":
      case "second":
        parts[part.type] = Number(part.value);
        break;
      default:
        break;
    }
  }
  return parts;
}

/**
 * Offset of the zone from UTC at the given instant, in ms (UTC-6 is -21600000)
 */
export function getTimeZoneOffsetMs(epochMs: number, timeZone: string): number {
  const p = getZonedParts(epochMs, timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  return asUtc - Math.floor(epochMs / 1000) * 1000;
}

/**
 * Instant at which the zone's wall clock shows the given local time.
 * Local times skipped by a DST jump resolve to the instant after the gap.
 */
export function zonedTimeToEpoch(
  local: Pick<ZonedParts, "year" | "month" | "day"> & Partial<ZonedParts>,
  timeZone: string,
): number {
  const wall = Date.UTC(
    local.year,
    local.month - 1,
    local.day,
    local.hour ?? 0,
    local.minute ?? 0,
    local.second ?? 0,
  );
  const firstOffset = getTimeZoneOffsetMs(wall, timeZone);
  const epoch = wall - firstOffset;
  const secondOffset = getTimeZoneOffsetMs(epoch, timeZone);
  if (secondOffset === firstOffset) return epoch;

  const corrected = wall - secondOffset;
  // Inside a DST gap neither offset round-trips; keep the later instant
  return getTimeZoneOffsetMs(corrected, timeZone) === secondOffset
    ? corrected
    : Math.max(epoch, corrected);
}

/**
 * Calendar day in the zone, as YYYY-MM-DD
 */
export function localDayKey(epochMs: number, timeZone: string): string {
  const { year, month, day } = getZonedParts(epochMs, timeZone);
  return `${year}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

export interface WindowBounds {
  start: number;
  end: number;
}

/**
 * Posting window on the local day containing `epochMs`
 */
export function postingWindowForDay(
  epochMs: number,
  window: PostingWindow,
  timeZone: string,
): WindowBounds {
  const { year, month, day } = getZonedParts(epochMs, timeZone);
  const start = zonedTimeToEpoch({ year, month, day, hour: window.startHour }, timeZone);
  const end =
    window.endHour === 24
      ? startOfNextLocalDay(epochMs, timeZone)
      : zonedTimeToEpoch({ year, month, day, hour: window.endHour }, timeZone);
  return { start, end };
}

/**
 * First instant of the local day after the one containing `epochMs`
 */
export function startOfNextLocalDay(epochMs: number, timeZone: string): number {
  const { year, month, day } = getZonedParts(epochMs, timeZone);
  // Noon avoids landing on the wrong day around DST changes
  const noonNextDay = zonedTimeToEpoch({ year, month, day, hour: 12 }, timeZone) + DAY_MS;
  const next = getZonedParts(noonNextDay, timeZone);
  return zonedTimeToEpoch({ year: next.year, month: next.month, day: next.day }, timeZone);
}

export function windowLengthMs(window: PostingWindow): number {
  return (window.endHour - window.startHour) * HOUR_MS;
}
