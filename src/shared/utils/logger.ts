/**
 * Logging utility using winston
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import fs from 'fs';
import path from 'path';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerOptions {
  logDir?: string;
  level?: LogLevel;
  console?: boolean;
}

export class Logger {
  private logger: winston.Logger;
  private fileTransports: winston.transport[] = [];
  private consoleTransport: winston.transport;

  constructor(options: LoggerOptions = {}) {
    this.consoleTransport = new winston.transports.Console({
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    });

    this.logger = winston.createLogger({
      level: options.level ?? process.env.LOG_LEVEL ?? 'info',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports: options.console === false ? [] : [this.consoleTransport],
    });

    this.setLogDir(options.logDir ?? process.env.SWITCHBOARD_LOG_DIR ?? '.switchboard/logs');
  }

  /**
   * Point file logging at another directory. Falls back to console-only
   * logging if the directory cannot be created.
   */
  setLogDir(logDir: string): void {
    const absoluteLogDir = path.resolve(process.cwd(), logDir);

    for (const transport of this.fileTransports) {
      this.logger.remove(transport);
    }
    this.fileTransports = [];

    try {
      if (!fs.existsSync(absoluteLogDir)) {
        fs.mkdirSync(absoluteLogDir, { recursive: true });
      }
    } catch (error) {
      console.warn(
        `[Logger] Warning: Failed to create log directory at ${absoluteLogDir}. File logging disabled. Error: ${error}`
      );
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

  /**
   * Apply the `logging` section of a loaded config
   */
  configure(config: { level: LogLevel; dir: string; console: boolean }): void {
    this.setLevel(config.level);
    this.setLogDir(config.dir);
    if (config.console) {
      this.enableConsole();
    } else {
      this.disableConsole();
    }
  }

  get isFileLoggingEnabled(): boolean {
    return this.fileTransports.length > 0;
  }

  get level(): string {
    return this.logger.level;
  }

  setLevel(level: LogLevel): void {
    this.logger.level = level;
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

  disableConsole(): void {
    this.logger.remove(this.consoleTransport);
  }

  enableConsole(): void {
    if (!this.logger.transports.includes(this.consoleTransport)) {
      this.logger.add(this.consoleTransport);
    }
  }
}

// Singleton instance
export const logger = new Logger();
