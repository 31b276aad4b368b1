import chalk from "chalk";

/**
 * Log levels from most to least verbose
 */
export const LOG_LEVEL_NAMES = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Level-filtered logger with colored output.
 * Everything goes to stderr so formatted output on stdout stays clean.
 */
export class Logger {
  private level: LogLevel = "info";

  configure(config: { level?: LogLevel }): void {
    if (config.level !== undefined) {
      this.level = config.level;
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  /**
   * Debug level logging (gray)
   */
  debug(message: string): void {
    if (this.shouldLog("debug")) {
      console.error(chalk.gray(message));
    }
  }

  /**
   * Warning level logging (yellow)
   */
  warn(message: string): void {
    if (this.shouldLog("warn")) {
      console.error(chalk.yellow(message));
    }
  }
}

/**
 * Narrow an arbitrary string to a log level
 */
export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVEL_NAMES as readonly string[]).includes(value);
}

/**
 * Global logger instance
 */
export const logger = new Logger();
