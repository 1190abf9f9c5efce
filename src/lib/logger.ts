/**
 * Structured logging utility with log levels
 *
 * Usage:
 *   import { createLogger } from '@/lib/logger';
 *   const log = createLogger('BufferWindowManager');
 *   log.debug('Details here', { data });
 *   log.info('Operation complete');
 *   log.warn('Something unexpected');
 *   log.error('Failed', error);
 */

import { config, type LogLevelName } from './config';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

// Shared by the root logger and every child, so setLevel() reaches all of them
const threshold = { level: LEVELS_BY_NAME[config.logLevel] };

export class Logger {
  private readonly prefix: string;

  constructor(prefix = '') {
    this.prefix = prefix;
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= threshold.level;
  }

  private formatMessage(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.formatMessage(message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.info(this.formatMessage(message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage(message), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(this.formatMessage(message), ...args);
    }
  }

  /**
   * Create a child logger with a specific prefix
   */
  child(prefix: string): Logger {
    return new Logger(this.prefix ? `${this.prefix}:${prefix}` : prefix);
  }

  /**
   * Set the log level at runtime (affects every logger)
   */
  setLevel(level: LogLevel): void {
    threshold.level = level;
  }

  getLevel(): LogLevel {
    return threshold.level;
  }
}

// Root logger instance
export const logger = new Logger();

/**
 * Factory for creating module-specific loggers
 *
 * @example
 * const log = createLogger('ImageCache');
 * log.debug('Evicted entry');
 */
export function createLogger(module: string): Logger {
  return logger.child(module);
}
