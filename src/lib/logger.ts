import chalk from "chalk";

/**
 * Log levels from most to least verbose
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVEL_NAMES = ["debug", "info", "warn", "error", "silent"] as const;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Logger configuration
 */
interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
}

/**
 * Leveled logger with colored output
 *
 * Children share their parent's level, so configuring the root logger
 * (e.g. from the CLI's --verbose flag) also affects component loggers
 * created at import time.
 */
export class Logger {
  private ownLevel: LogLevel = "info";
  private prefix: string = "";

  constructor(private readonly parent?: Logger) {}

  /**
   * Configure the logger
   */
  configure(config: Partial<LoggerConfig>): void {
    if (config.level !== undefined) {
      this.ownLevel = config.level;
    }
    if (config.prefix !== undefined) {
      this.prefix = config.prefix;
    }
  }

  /**
   * Effective level, inherited from the root
   */
  get level(): LogLevel {
    return this.parent ? this.parent.level : this.ownLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private format(message: string): string {
    return this.prefix ? `${this.prefix} ${message}` : message;
  }

  /**
   * Debug level logging (gray)
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.debug(chalk.gray(this.format(message)), ...args);
    }
  }

  /**
   * Info level logging (default color)
   */
  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.info(this.format(message), ...args);
    }
  }

  /**
   * Warning level logging (yellow)
   */
  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.warn(chalk.yellow(this.format(message)), ...args);
    }
  }

  /**
   * Error level logging (red)
   */
  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(chalk.red(this.format(message)), ...args);
    }
  }

  /**
   * Success message (green)
   */
  success(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.info(chalk.green(this.format(message)), ...args);
    }
  }

  /**
   * Create a child logger with a prefix
   */
  child(prefix: string): Logger {
    const child = new Logger(this.parent ?? this);
    child.prefix = this.prefix ? `${this.prefix} ${prefix}` : prefix;
    return child;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
