import chalk from 'chalk';
import { appendFileSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { format } from 'node:util';
import { resolvePathConfig } from '../config/path-config.js';
import { getDataRoot } from './efb-home.js';
import { getErrorMessage } from './errors.js';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical'
}

export const LOG_DIR_NAME = '.logs';

class LogWriter {
  private logsDir: string | null = null;
  private logFileInitialized = false;

  /**
   * Initialize the log directory
   * Log file format: <data root>/.logs/efb-YYYY-MM-DD.log
   */
  private initializeLogFile(): void {
    if (this.logFileInitialized) return;
    this.logFileInitialized = true;

    try {
      const logsDir = join(getDataRoot(resolvePathConfig()), LOG_DIR_NAME);
      mkdirSync(logsDir, { recursive: true });
      this.logsDir = logsDir;
    } catch (error) {
      this.logsDir = null;
      console.warn(chalk.yellow(`⚠ File logging disabled: ${getErrorMessage(error)}`));
    }
  }

  /**
   * Debug mode controls console output of debug records, not file logging
   * @returns true if EFB_DEBUG is set to 'true' or '1'
   */
  isDebugMode(): boolean {
    return process.env.EFB_DEBUG === 'true' || process.env.EFB_DEBUG === '1';
  }

  /**
   * The file name carries the current date, so records roll over to a new
   * file at midnight (UTC)
   */
  getLogFilePath(): string | null {
    this.initializeLogFile();
    if (!this.logsDir) return null;

    const today = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
    return join(this.logsDir, `efb-${today}.log`);
  }

  /**
   * Append a record to the log file and echo it to the console.
   * Format: [ISO timestamp] [LEVEL] [name] message
   */
  write(level: LogLevel, name: string, message: string): void {
    const logFilePath = this.getLogFilePath();

    if (logFilePath) {
      const timestamp = new Date().toISOString();
      appendFileSync(logFilePath, `[${timestamp}] [${level.toUpperCase()}] [${name}] ${message}\n`);
    }

    const line = `[${name}] ${message}`;
    switch (level) {
      case LogLevel.DEBUG:
        if (this.isDebugMode()) {
          console.log(chalk.dim(`[DEBUG] ${line}`));
        }
        break;
      case LogLevel.INFO:
        // File only
        break;
      case LogLevel.WARNING:
        console.warn(chalk.yellow(`⚠ ${line}`));
        break;
      case LogLevel.ERROR:
        console.error(chalk.red(`✗ ${line}`));
        break;
      case LogLevel.CRITICAL:
        console.error(chalk.red.bold(`✗ ${line}`));
        break;
    }
  }

  reset(): void {
    this.logsDir = null;
    this.logFileInitialized = false;
  }
}

/**
 * Logger bound to a name. Messages take printf-style placeholders
 * (%s, %d, %j, %o); extra arguments are appended.
 */
export class Logger {
  constructor(
    readonly name: string,
    private readonly writer: LogWriter
  ) {}

  critical(message: string, ...args: unknown[]): void {
    this.writer.write(LogLevel.CRITICAL, this.name, format(message, ...args));
  }

  error(message: string, ...args: unknown[]): void {
    this.writer.write(LogLevel.ERROR, this.name, format(message, ...args));
  }

  warning(message: string, ...args: unknown[]): void {
    this.writer.write(LogLevel.WARNING, this.name, format(message, ...args));
  }

  info(message: string, ...args: unknown[]): void {
    this.writer.write(LogLevel.INFO, this.name, format(message, ...args));
  }

  debug(message: string, ...args: unknown[]): void {
    this.writer.write(LogLevel.DEBUG, this.name, format(message, ...args));
  }
}

const writer = new LogWriter();
const loggers = new Map<string, Logger>();

/**
 * Get the logger registered under a name, creating it on first use
 */
export function getLogger(name: string): Logger {
  let logger = loggers.get(name);
  if (!logger) {
    logger = new Logger(name, writer);
    loggers.set(name, logger);
  }
  return logger;
}

/**
 * Name-scoped pass-through to the logging backend
 *
 * @example
 * Logging.warning('efb.channel.irc', 'Reconnecting in %d seconds', 5);
 */
export const Logging = {
  critical(name: string, message: string, ...args: unknown[]): void {
    getLogger(name).critical(message, ...args);
  },

  error(name: string, message: string, ...args: unknown[]): void {
    getLogger(name).error(message, ...args);
  },

  warning(name: string, message: string, ...args: unknown[]): void {
    getLogger(name).warning(message, ...args);
  },

  info(name: string, message: string, ...args: unknown[]): void {
    getLogger(name).info(message, ...args);
  },

  debug(name: string, message: string, ...args: unknown[]): void {
    getLogger(name).debug(message, ...args);
  }
};

/**
 * Get the current log file path
 * @returns Log file path or null if file logging is disabled
 */
export function getLogFilePath(): string | null {
  return writer.getLogFilePath();
}

/**
 * Drop cached loggers and log file state (mainly for testing)
 */
export function resetLogging(): void {
  loggers.clear();
  writer.reset();
}
