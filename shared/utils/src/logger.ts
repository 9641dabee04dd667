/**
 * Logger used by every pipeline service.
 * Services receive a Logger and scope it with child("ServiceName").
 */

/**
 * Log levels
 */
export enum LogLevel {
  SILLY = 0,
  VERBOSE = 1,
  DEBUG = 2,
  INFO = 3,
  WARN = 4,
  ERROR = 5,
  NONE = 6, // Silent mode - no output
}

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
  useStderr?: boolean;
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  silly: LogLevel.SILLY,
  verbose: LogLevel.VERBOSE,
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  none: LogLevel.NONE,
  silent: LogLevel.NONE,
};

/**
 * Parse a level name such as "debug" (case-insensitive).
 * Unknown or missing names fall back to the given default.
 */
export function parseLogLevel(
  value: string | undefined,
  fallback: LogLevel = LogLevel.INFO,
): LogLevel {
  if (!value) return fallback;
  return LEVEL_NAMES[value.trim().toLowerCase()] ?? fallback;
}

/**
 * Logger implementation with Component Interface Standardization pattern
 */
export class Logger {
  private static instance: Logger | null = null;

  private level: LogLevel;
  private context: string | undefined;
  private useStderr: boolean;

  private constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.context = options.context;
    this.useStderr = options.useStderr ?? false;
  }

  /**
   * Get the singleton instance of Logger
   */
  public static getInstance(options?: LoggerOptions): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger(options);
    } else if (options?.level !== undefined) {
      Logger.instance.level = options.level;
    }
    return Logger.instance;
  }

  /**
   * Reset the singleton instance (primarily for testing)
   */
  public static resetInstance(): void {
    Logger.instance = null;
  }

  /**
   * Create a fresh instance without affecting the singleton
   */
  public static createFresh(options?: LoggerOptions): Logger {
    return new Logger(options);
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public getContext(): string | undefined {
    return this.context;
  }

  private formatMessage(message: string): string {
    const timestamp = new Date().toISOString();
    return this.context
      ? `[${timestamp}] [${this.context}] ${message}`
      : `[${timestamp}] ${message}`;
  }

  public silly(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.SILLY) {
      console.debug(this.formatMessage(message), ...args);
    }
  }

  public verbose(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.VERBOSE) {
      console.debug(this.formatMessage(message), ...args);
    }
  }

  public debug(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.DEBUG) {
      console.debug(this.formatMessage(message), ...args);
    }
  }

  public info(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.INFO) {
      if (this.useStderr) {
        console.error(this.formatMessage(message), ...args);
      } else {
        console.info(this.formatMessage(message), ...args);
      }
    }
  }

  public warn(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.WARN) {
      console.warn(this.formatMessage(message), ...args);
    }
  }

  public error(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.ERROR) {
      console.error(this.formatMessage(message), ...args);
    }
  }

  /**
   * Create a child logger. Contexts nest as "Parent:Child".
   */
  public child(context: string): Logger {
    return Logger.createFresh({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      useStderr: this.useStderr,
    });
  }
}
