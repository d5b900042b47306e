/**
 * Logging utility with levels and colors
 */

import chalk from 'chalk';
import type { LogContext, LogLevel, LogSink } from '../core/types.js';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  level?: LogLevel;
  quiet?: boolean;
}

/**
 * Render structured context as trailing key=value pairs
 */
export function formatContext(context?: LogContext): string {
  if (!context) return '';
  const pairs = Object.entries(context)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${String(v)}`);
  return pairs.length > 0 ? ` ${pairs.join(' ')}` : '';
}

/**
 * Logger class with configurable levels
 */
export class Logger implements LogSink {
  private level: LogLevel;
  private quiet: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.quiet = options.quiet ?? false;
  }

  /**
   * Set log level
   */
  setLevel(level: LogLevel) {
    this.level = level;
  }

  /**
   * Set quiet mode
   */
  setQuiet(quiet: boolean) {
    this.quiet = quiet;
  }

  /**
   * Check if level should be logged
   */
  private shouldLog(level: LogLevel): boolean {
    if (this.quiet) {
      return false;
    }
    return LEVELS[level] >= LEVELS[this.level];
  }

  log(level: LogLevel, message: string, context?: LogContext) {
    if (!this.shouldLog(level)) return;
    const suffix = chalk.gray(formatContext(context));

    switch (level) {
      case 'debug':
        console.log(chalk.gray(`[DEBUG] ${message}`) + suffix);
        break;
      case 'info':
        console.log(chalk.blue(`[INFO] ${message}`) + suffix);
        break;
      case 'warn':
        console.warn(chalk.yellow(`[WARN] ${message}`) + suffix);
        break;
      case 'error':
        console.error(chalk.red(`[ERROR] ${message}`) + suffix);
        break;
    }
  }

  debug(message: string, context?: LogContext) {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext) {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext) {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext) {
    this.log('error', message, context);
  }

  /**
   * Success log (always info level)
   */
  success(message: string, context?: LogContext) {
    if (this.shouldLog('info')) {
      console.log(chalk.green(`[✓] ${message}`) + chalk.gray(formatContext(context)));
    }
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

/**
 * Shared logger for the CLI; library callers pass their own sink
 */
export const logger = new Logger();
