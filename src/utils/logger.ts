/**
 * Level-filtered console logger
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// debug and info share stdout; warn and error go to stderr
const SINKS: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.log(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export class Logger {
  private level: LogLevel;

  constructor(level: LogLevel = "info") {
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  debug(...args: unknown[]): void {
    this.write("debug", args);
  }

  info(...args: unknown[]): void {
    this.write("info", args);
  }

  warn(...args: unknown[]): void {
    this.write("warn", args);
  }

  error(...args: unknown[]): void {
    this.write("error", args);
  }

  private write(level: LogLevel, args: unknown[]): void {
    if (!this.isEnabled(level)) return;
    SINKS[level](`[${level.toUpperCase()}]`, ...args);
  }
}

// Level comes from LOG_LEVEL; an unknown value falls back to info
const envLevel = (process.env.LOG_LEVEL || "info").toLowerCase();
export const logger = new Logger(isLogLevel(envLevel) ? envLevel : "info");
