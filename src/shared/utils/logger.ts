/**
 * Logging utility using winston
 *
 * Console output goes to stderr so stdout carries only tool text.
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import fs from 'fs';
import path from 'path';
import type { ILogger } from '@whois-tools/agents';
import type { LoggingConfig, LogLevel } from '@/shared/config/schemas.js';

export type { LogLevel };

const LOG_LEVELS: ReadonlyArray<LogLevel> = ['error', 'warn', 'info', 'debug'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export class Logger implements ILogger {
  private logger: winston.Logger;
  private consoleTransport: winston.transport;
  private fileTransports: winston.transport[] = [];

  constructor(level: LogLevel = 'info') {
    this.consoleTransport = new winston.transports.Console({
      stderrLevels: [...LOG_LEVELS],
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    });

    this.logger = winston.createLogger({
      level,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports: [this.consoleTransport],
    });
  }

  /**
   * Apply loaded configuration: level and optional rotating file logs
   */
  configure(config: LoggingConfig): void {
    this.logger.level = config.level;
    if (config.fileLogging && this.fileTransports.length === 0) {
      this.enableFileLogging(config.logDir);
    }
  }

  get level(): string {
    return this.logger.level;
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  /**
   * Mute every transport (tests, or hosts that own stderr)
   */
  setSilent(silent: boolean): void {
    this.logger.silent = silent;
  }

  /**
   * Falls back to console-only logging when the directory cannot be created
   */
  private enableFileLogging(logDir: string): void {
    const absoluteLogDir = path.resolve(process.cwd(), logDir);

    try {
      fs.mkdirSync(absoluteLogDir, { recursive: true });
    } catch (error) {
      this.warn('Failed to create log directory, file logging disabled', {
        logDir: absoluteLogDir,
        error: error instanceof Error ? error.message : String(error),
      });
      return;
    }

    this.fileTransports = [
      new DailyRotateFile({
        dirname: absoluteLogDir,
        filename: '%DATE%-error.log',
        datePattern: 'YYYYMMDD',
        level: 'error',
        maxSize: '10m',
        maxFiles: '30d',
        zippedArchive: true,
      }),
      new DailyRotateFile({
        dirname: absoluteLogDir,
        filename: '%DATE%.log',
        datePattern: 'YYYYMMDD',
        maxSize: '10m',
        maxFiles: '30d',
        zippedArchive: true,
      }),
    ];
    for (const transport of this.fileTransports) {
      this.logger.add(transport);
    }
  }
}

const envLevel = process.env.LOG_LEVEL;

// Singleton instance
export const logger = new Logger(isLogLevel(envLevel) ? envLevel : 'info');
