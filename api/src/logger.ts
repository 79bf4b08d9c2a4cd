export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LoggerOptions {
  /** Lowest level that is printed. */
  level: LogLevel;
  /** Suppress all output (tests). */
  quiet: boolean;
  timestamps: boolean;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "info",
  quiet: false,
  timestamps: false,
};

/**
 * Leveled console logger. debug/info go to stdout, warn/error to stderr.
 */
export class Logger {
  private options: LoggerOptions;

  constructor(options: Partial<LoggerOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  configure(options: Partial<LoggerOptions>): void {
    this.options = { ...this.options, ...options };
  }

  getOptions(): LoggerOptions {
    return { ...this.options };
  }

  debug(message: string, ...details: unknown[]): void {
    this.write("debug", message, details);
  }

  info(message: string, ...details: unknown[]): void {
    this.write("info", message, details);
  }

  warn(message: string, ...details: unknown[]): void {
    this.write("warn", message, details);
  }

  error(message: string, ...details: unknown[]): void {
    this.write("error", message, details);
  }

  private enabled(level: LogLevel): boolean {
    if (this.options.quiet) return false;
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.options.level);
  }

  private write(level: LogLevel, message: string, details: unknown[]): void {
    if (!this.enabled(level)) return;
    const prefix = this.options.timestamps ? `${new Date().toISOString()} [${level}]` : `[${level}]`;
    const line = `${prefix} ${message}`;
    if (level === "warn" || level === "error") {
      console.error(line, ...details);
    } else {
      console.log(line, ...details);
    }
  }
}

export const logger = new Logger({ quiet: process.env.NODE_ENV === "test" });
