import { ENV } from "./env";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Console logger that prefixes every line with a component tag, e.g. `[Polling] ...`.
 */
export class Logger {
  constructor(
    private readonly tag: string,
    private readonly level: LogLevel = ENV.logLevel
  ) {}

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled("debug")) console.debug(`[${this.tag}] ${message}`, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled("info")) console.log(`[${this.tag}] ${message}`, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled("warn")) console.warn(`[${this.tag}] ${message}`, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled("error")) console.error(`[${this.tag}] ${message}`, ...args);
  }
}

export function createLogger(tag: string): Logger {
  return new Logger(tag);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
