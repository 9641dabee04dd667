import { Logger, LogLevel } from "./logger";
import type { Clock } from "./clock";

/**
 * Create a silent logger for tests
 */
export function createSilentLogger(context?: string): Logger {
  return Logger.createFresh({
    level: LogLevel.NONE,
    ...(context ? { context } : {}),
  });
}

/**
 * Create a test logger with a specific log level
 * Useful for debugging tests
 */
export function createTestLogger(
  level: LogLevel = LogLevel.NONE,
  context?: string,
): Logger {
  return Logger.createFresh({
    level,
    ...(context ? { context } : {}),
  });
}

/**
 * Clock whose time only moves when a test says so
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start: number | Date = 0) {
    this.current = typeof start === "number" ? start : start.getTime();
  }

  now(): number {
    return this.current;
  }

  set(time: number | Date): void {
    this.current = typeof time === "number" ? time : time.getTime();
  }

  advance(ms: number): number {
    this.current += ms;
    return this.current;
  }
}

/**
 * Deterministic random source cycling through the given values
 */
export function createSequenceRandom(values: number[]): () => number {
  if (values.length === 0) {
    throw new Error("createSequenceRandom needs at least one value");
  }
  let index = 0;
  return (): number => {
    const value = values[index % values.length] ?? 0;
    index++;
    return value;
  };
}
