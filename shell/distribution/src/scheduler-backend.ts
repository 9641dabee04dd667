/**
 * Scheduler Backend - cron and interval scheduling behind one interface
 *
 * Production code uses croner; tests inject TestSchedulerBackend and fire
 * jobs by hand.
 */

import { Cron } from "croner";

export interface ScheduledJob {
  stop(): void;
}

export type SchedulerCallback = () => void | Promise<void>;

export interface SchedulerBackend {
  /**
   * @param expression - Cron expression (5 or 6 fields)
   */
  scheduleCron(expression: string, callback: SchedulerCallback): ScheduledJob;
  scheduleInterval(
    intervalMs: number,
    callback: SchedulerCallback,
  ): ScheduledJob;
  /** Throws if the expression is invalid */
  validateCron(expression: string): void;
}

/**
 * Callbacks must handle their own errors; a rejection here is only logged
 * by the caller-supplied handler.
 */
export class CronerBackend implements SchedulerBackend {
  constructor(
    private readonly onError: (error: unknown) => void = (): void => {},
  ) {}

  scheduleCron(expression: string, callback: SchedulerCallback): ScheduledJob {
    const job = new Cron(expression, { protect: true }, () => {
      this.run(callback);
    });
    return { stop: () => job.stop() };
  }

  scheduleInterval(
    intervalMs: number,
    callback: SchedulerCallback,
  ): ScheduledJob {
    const id = setInterval(() => {
      this.run(callback);
    }, intervalMs);
    return { stop: () => clearInterval(id) };
  }

  validateCron(expression: string): void {
    const testCron = new Cron(expression);
    testCron.stop();
  }

  private run(callback: SchedulerCallback): void {
    Promise.resolve()
      .then(callback)
      .catch(this.onError);
  }
}

/**
 * Deterministic backend: nothing fires until tick() is called, and
 * tick() resolves once every triggered callback has settled.
 */
export class TestSchedulerBackend implements SchedulerBackend {
  private cronJobs = new Map<string, SchedulerCallback>();
  private intervalJobs: Array<{ callback: SchedulerCallback; id: number }> = [];
  private nextId = 0;

  scheduleCron(expression: string, callback: SchedulerCallback): ScheduledJob {
    this.validateCron(expression);
    this.cronJobs.set(expression, callback);
    return {
      stop: (): void => {
        this.cronJobs.delete(expression);
      },
    };
  }

  scheduleInterval(
    _intervalMs: number,
    callback: SchedulerCallback,
  ): ScheduledJob {
    const id = this.nextId++;
    this.intervalJobs.push({ callback, id });
    return {
      stop: (): void => {
        this.intervalJobs = this.intervalJobs.filter((j) => j.id !== id);
      },
    };
  }

  validateCron(expression: string): void {
    const testCron = new Cron(expression);
    testCron.stop();
  }

  /**
   * @param cronExpression - Only trigger this cron; omit to trigger everything
   */
  async tick(cronExpression?: string): Promise<void> {
    const promises: Promise<void>[] = [];

    if (cronExpression) {
      const cb = this.cronJobs.get(cronExpression);
      if (cb) promises.push(Promise.resolve(cb()));
    } else {
      for (const cb of this.cronJobs.values()) {
        promises.push(Promise.resolve(cb()));
      }
      for (const job of this.intervalJobs) {
        promises.push(Promise.resolve(job.callback()));
      }
    }

    await Promise.all(promises);
  }

  async tickIntervals(): Promise<void> {
    await Promise.all(
      this.intervalJobs.map((job) => Promise.resolve(job.callback())),
    );
  }

  hasCron(expression: string): boolean {
    return this.cronJobs.has(expression);
  }

  getIntervalCount(): number {
    return this.intervalJobs.length;
  }
}
