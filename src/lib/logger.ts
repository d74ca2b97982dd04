/**
 * Logger utility for character-lens
 * Structured logging to the console and, optionally, to a log file
 */

import { mkdir, appendFile } from 'fs/promises';
import { dirname, join } from 'path';
import type { LogLevel, Logger as ILogger } from '../types/index.js';

const LOG_LEVELS = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
} as const;

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

export interface LoggerOptions {
  /** Directory for the log file; null disables file output */
  logDir?: string | null;
  logFile?: string;
  /** Overrides LOG_LEVEL from the environment */
  level?: LogLevel;
}

export class Logger implements ILogger {
  private readonly namespace: string;
  private readonly logPath: string | null;
  private readonly level: LogLevel;
  private directoryReady: Promise<void> | null = null;

  constructor(namespace: string = 'CharacterLens', options: LoggerOptions = {}) {
    this.namespace = namespace;

    const logDir = options.logDir === undefined ? 'logs' : options.logDir;
    this.logPath = logDir === null ? null : join(logDir, options.logFile ?? 'character-lens.log');

    const logLevelEnv = process.env.LOG_LEVEL?.toUpperCase() ?? 'INFO';
    this.level = options.level ?? (isLogLevel(logLevelEnv) ? logLevelEnv : 'INFO');
  }

  private formatMessage(level: LogLevel, message: string, args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const argsStr =
      args.length > 0 ? ' ' + args.map((arg) => this.formatArg(arg)).join(' ') : '';
    return `${timestamp} - ${this.namespace} - ${level} - ${message}${argsStr}`;
  }

  private formatArg(arg: unknown): string {
    if (arg instanceof Error) {
      return `${arg.name}: ${arg.message}`;
    }
    return typeof arg === 'object' ? JSON.stringify(arg) : String(arg);
  }

  private async log(level: LogLevel, message: string, args: unknown[]): Promise<void> {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) {
      return;
    }

    const formattedMessage = this.formatMessage(level, message, args);

    const consoleMethod =
      level === 'ERROR'
        ? console.error
        : level === 'WARN'
          ? console.warn
          : level === 'DEBUG'
            ? console.debug
            : console.log;
    consoleMethod(formattedMessage);

    if (!this.logPath) {
      return;
    }

    try {
      this.directoryReady ??= mkdir(dirname(this.logPath), { recursive: true }).then(
        () => undefined
      );
      await this.directoryReady;
      await appendFile(this.logPath, formattedMessage + '\n');
    } catch (err) {
      console.error(`Failed to write to log file: ${err}`);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    void this.log('DEBUG', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    void this.log('INFO', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    void this.log('WARN', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    void this.log('ERROR', message, args);
  }
}
