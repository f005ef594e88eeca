/**
 * Logger shared by every component. Services receive a Logger through their
 * constructor instead of reaching for console directly.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_ALIASES: Record<string, LogLevel> = {
  debug: "debug",
  info: "info",
  warn: "warn",
  warning: "warn",
  error: "error",
  critical: "error",
};

/**
 * Map a LOG_LEVEL string onto a level. Unknown or empty values fall back to info.
 */
export function resolveLogLevel(value?: string): LogLevel {
  if (!value) return "info";
  return LEVEL_ALIASES[value.trim().toLowerCase()] ?? "info";
}

/**
 * Console logger that prefixes messages with the service name and drops
 * anything below the configured level.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private serviceName: string,
    private level: LogLevel = "info"
  ) {}

  debug(message: string, ...args: unknown[]): void {
    if (!this.enabled("debug")) return;
    console.debug(`[${this.serviceName}] ${message}`, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (!this.enabled("info")) return;
    console.log(`[${this.serviceName}] ${message}`, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (!this.enabled("warn")) return;
    console.warn(`[${this.serviceName}] ${message}`, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (!this.enabled("error")) return;
    console.error(`[${this.serviceName}] ${message}`, ...args);
  }

  /**
   * Derive a logger for a sub-component, e.g. "ingestor:store"
   */
  child(component: string): ConsoleLogger {
    return new ConsoleLogger(`${this.serviceName}:${component}`, this.level);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }
}
