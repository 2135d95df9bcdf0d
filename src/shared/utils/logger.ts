/**
 * @fileoverview Leveled, colourised console logger
 * @module shared/utils/logger
 */

import chalk from 'chalk';

// =============================================================================
// LOG LEVELS
// =============================================================================

/**
 * Log level enum.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/**
 * Names accepted in configuration and the LOG_LEVEL environment variable.
 */
export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

/**
 * Parses a level name case-insensitively, falling back to INFO.
 *
 * `WARNING` is accepted as an alias for `warn`.
 */
export function parseLogLevel(name: string | undefined): LogLevel {
  if (name === undefined) {
    return LogLevel.INFO;
  }
  const normalized = name.trim().toLowerCase();
  if (normalized === 'warning') {
    return LogLevel.WARN;
  }
  if (isLogLevelName(normalized)) {
    return LEVEL_BY_NAME[normalized];
  }
  return LogLevel.INFO;
}

function isLogLevelName(value: string): value is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LEVEL_BY_NAME, value);
}

// =============================================================================
// LOGGER CLASS
// =============================================================================

/**
 * Application logger.
 *
 * Children share the root's level, so `logger.setLevel()` after startup also
 * affects component loggers created earlier.
 *
 * @example
 * ```typescript
 * const log = logger.child('engine');
 * log.info('Candle closed: BTC/USDT');
 * // [2024-05-01T10:15:00.000Z] [sentinel:engine] [INFO] Candle closed: BTC/USDT
 * ```
 */
export class Logger {
  private ownLevel: LogLevel = LogLevel.INFO;
  private readonly prefix: string;
  private readonly parent: Logger | undefined;

  constructor(prefix = 'sentinel', parent?: Logger) {
    this.prefix = prefix;
    this.parent = parent;
  }

  setLevel(level: LogLevel): void {
    if (this.parent) {
      this.parent.setLevel(level);
      return;
    }
    this.ownLevel = level;
  }

  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.ownLevel;
  }

  getPrefix(): string {
    return this.prefix;
  }

  /**
   * Formats a log line with timestamp and prefix.
   */
  format(level: string, message: string, now: Date = new Date()): string {
    return `[${now.toISOString()}] [${this.prefix}] [${level}] ${message}`;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.getLevel() <= LogLevel.DEBUG) {
      console.warn(chalk.gray(this.format('DEBUG', message)), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.getLevel() <= LogLevel.INFO) {
      console.warn(chalk.blue(this.format('INFO', message)), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.getLevel() <= LogLevel.WARN) {
      console.warn(chalk.yellow(this.format('WARN', message)), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.getLevel() <= LogLevel.ERROR) {
      console.error(chalk.red(this.format('ERROR', message)), ...args);
    }
  }

  /**
   * Logs a success message (INFO level, green).
   */
  success(message: string, ...args: unknown[]): void {
    if (this.getLevel() <= LogLevel.INFO) {
      console.warn(chalk.green(this.format('SUCCESS', message)), ...args);
    }
  }

  /**
   * Creates a child logger with `${prefix}:${childPrefix}`.
   */
  child(childPrefix: string): Logger {
    return new Logger(`${this.prefix}:${childPrefix}`, this.parent ?? this);
  }
}

// =============================================================================
// SINGLETON EXPORT
// =============================================================================

/**
 * Default logger instance.
 */
export const logger = new Logger();
