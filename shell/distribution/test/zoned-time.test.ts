import { describe, expect, it } from "vitest";
import { HOUR_MS } from "@avatarflow/utils";
import {
  getTimeZoneOffsetMs,
  localDayKey,
  postingWindowForDay,
  startOfNextLocalDay,
  zonedTimeToEpoch,
} from "../src/zoned-time";

const MEXICO_CITY = "America/Mexico_City";
const NEW_YORK = "America/New_York";
const BERLIN = "Europe/Berlin";

describe("zoned time", () => {
  it("should read the UTC offset of a zone", () => {
    expect(getTimeZoneOffsetMs(Date.UTC(2025, 2, 10, 15), MEXICO_CITY)).toBe(
      -6 * HOUR_MS,
    );
    expect(getTimeZoneOffsetMs(Date.UTC(2025, 6, 1, 12), NEW_YORK)).toBe(-4 * HOUR_MS);
  });

  it("should convert local wall time to an instant", () => {
    expect(
      zonedTimeToEpoch({ year: 2025, month: 3, day: 10, hour: 9 }, MEXICO_CITY),
    ).toBe(Date.UTC(2025, 2, 10, 15));
  });

  it("should use the offset in force after a DST change", () => {
    // New York moves to UTC-4 at 07:00 UTC on 2025-03-09
    expect(zonedTimeToEpoch({ year: 2025, month: 3, day: 9, hour: 5 }, NEW_YORK)).toBe(
      Date.UTC(2025, 2, 9, 9),
    );
  });

  it("should resolve a skipped local time to the instant after the gap", () => {
    expect(
      zonedTimeToEpoch({ year: 2025, month: 3, day: 9, hour: 2, minute: 30 }, NEW_YORK),
    ).toBe(Date.UTC(2025, 2, 9, 7, 30));
    expect(
      zonedTimeToEpoch({ year: 2025, month: 3, day: 30, hour: 2, minute: 30 }, BERLIN),
    ).toBe(Date.UTC(2025, 2, 30, 1, 30));
  });

  it("should key instants by their local calendar day", () => {
    // 03:00 UTC is still 21:00 the previous evening in Mexico City
    expect(localDayKey(Date.UTC(2025, 2, 11, 3), MEXICO_CITY)).toBe("2025-03-10");
    expect(localDayKey(Date.UTC(2025, 2, 11, 6), MEXICO_CITY)).toBe("2025-03-11");
  });

  it("should compute the posting window of the local day", () => {
    expect(
      postingWindowForDay(
        Date.UTC(2025, 2, 10, 20),
        { startHour: 9, endHour: 21 },
        MEXICO_CITY,
      ),
    ).toEqual({ start: Date.UTC(2025, 2, 10, 15), end: Date.UTC(2025, 2, 11, 3) });
  });

  it("should end a window closing at 24 at the next local midnight", () => {
    expect(
      postingWindowForDay(
        Date.UTC(2025, 2, 10, 20),
        { startHour: 18, endHour: 24 },
        MEXICO_CITY,
      ),
    ).toEqual({ start: Date.UTC(2025, 2, 11, 0), end: Date.UTC(2025, 2, 11, 6) });
  });

  it("should find the start of the next local day", () => {
    expect(startOfNextLocalDay(Date.UTC(2025, 2, 10, 20), MEXICO_CITY)).toBe(
      Date.UTC(2025, 2, 11, 6),
    );
    // The day after the spring-forward day starts at UTC-4
    expect(startOfNextLocalDay(Date.UTC(2025, 2, 9, 12), NEW_YORK)).toBe(
      Date.UTC(2025, 2, 10, 4),
    );
  });
});
