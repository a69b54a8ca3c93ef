/**
 * Leveled console logging with per-module names.
 *
 * The level comes straight from LOG_LEVEL; unknown names fall back to INFO.
 */

import type { LogLevelName } from './config.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARNING = 2,
  ERROR = 3,
  SILENT = 4,
}

const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

export function parseLogLevel(level: LogLevelName | string): LogLevel {
  switch (level.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARNING':
      return LogLevel.WARNING;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}

export class Logger {
  readonly name: string;
  private minLevel: LogLevel;

  constructor(name: string, minLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL ?? 'INFO')) {
    this.name = name;
    this.minLevel = minLevel;
  }

  get level(): LogLevel {
    return this.minLevel;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && level >= this.minLevel;
  }

  formatMessage(level: string, message: string, color: string): string {
    const timestamp = new Date().toISOString();
    return `${colors.gray}${timestamp}${colors.reset} ${color}[${level}]${colors.reset} ${colors.cyan}${this.name}${colors.reset} ${message}`;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.isEnabled(LogLevel.DEBUG)) {
      console.log(this.formatMessage('DEBUG', message, colors.gray), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.isEnabled(LogLevel.INFO)) {
      console.log(this.formatMessage('INFO', message, colors.blue), ...args);
    }
  }

  warning(message: string, ...args: unknown[]): void {
    if (this.isEnabled(LogLevel.WARNING)) {
      console.warn(this.formatMessage('WARNING', message, colors.yellow), ...args);
    }
  }

  error(message: string, error?: unknown, ...args: unknown[]): void {
    if (!this.isEnabled(LogLevel.ERROR)) {
      return;
    }
    console.error(this.formatMessage('ERROR', message, colors.red), error, ...args);
    if (error instanceof Error && error.stack && process.env.NODE_ENV !== 'production') {
      console.error(colors.dim + error.stack + colors.reset);
    }
  }
}

/**
 * Create a logger for a module
 */
export function getLogger(name: string): Logger {
  return new Logger(name);
}

export const logger = getLogger('ade');
