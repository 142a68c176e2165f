/**
 * Structured Logger with Winston
 *
 * Features:
 * - Multiple log levels (error, warn, info, debug)
 * - File logging with daily rotation
 * - Console output for development
 * - Structured JSON logs
 * - Context injection (service, runId, strategy, etc)
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface LoggerConfig {
  /** Service name (backtest, runner, ...) */
  service: string;
  /** Log level */
  level?: LogLevel;
  /** Enable console output */
  console?: boolean;
  /** Enable file logging */
  file?: boolean;
  /** Log directory */
  logDir?: string;
  /** Drop every entry (tests) */
  silent?: boolean;
}

export interface LogContext {
  [key: string]: unknown;
}

/**
 * Narrow an arbitrary string (e.g. LOG_LEVEL) to a LogLevel
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const match = LOG_LEVELS.find((level) => level === value?.toLowerCase());
  return match ?? fallback;
}

/**
 * Logger class with structured logging
 */
export class Logger {
  private readonly logger: winston.Logger;
  readonly service: string;

  constructor(config: LoggerConfig | { service: string; logger: winston.Logger }) {
    this.service = config.service;
    this.logger = 'logger' in config ? config.logger : Logger.build(config);
  }

  private static build(config: LoggerConfig): winston.Logger {
    const logDir = config.logDir || path.join(process.cwd(), 'logs', config.service);
    const fileEnabled = config.file === true && !config.silent;
    if (fileEnabled) {
      fs.mkdirSync(logDir, { recursive: true });
    }

    const logFormat = winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.metadata({ fillExcept: ['message', 'level', 'timestamp', 'service'] }),
      winston.format.json()
    );

    // Console format (pretty print for dev)
    const consoleFormat = winston.format.combine(
      winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${String(timestamp)} [${String(service)}] ${level}: ${String(message)}${metaStr}`;
      })
    );

    const transports: winston.transport[] = [];

    if (config.console !== false || config.silent) {
      transports.push(new winston.transports.Console({ format: consoleFormat }));
    }

    if (fileEnabled) {
      transports.push(
        new DailyRotateFile({
          filename: path.join(logDir, `${config.service}-%DATE%.log`),
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '14d',
          format: logFormat,
        })
      );

      transports.push(
        new DailyRotateFile({
          filename: path.join(logDir, `${config.service}-error-%DATE%.log`),
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '30d',
          level: 'error',
          format: logFormat,
        })
      );
    }

    return winston.createLogger({
      level: config.level || 'info',
      silent: config.silent ?? false,
      defaultMeta: { service: config.service },
      transports,
    });
  }

  error(message: string, context?: LogContext): void {
    this.logger.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.logger.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.logger.log('debug', message, context);
  }

  /**
   * Create child logger with additional context
   */
  child(context: LogContext): Logger {
    return new Logger({ service: this.service, logger: this.logger.child(context) });
  }

  /**
   * Close logger and flush logs
   */
  async close(): Promise<void> {
    return new Promise((resolve) => {
      this.logger.once('finish', () => resolve());
      this.logger.end();
    });
  }
}

/**
 * Create a logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}

/**
 * Logger that drops everything; used by tests and library defaults
 */
export function createSilentLogger(service = 'test'): Logger {
  return new Logger({ service, silent: true });
}
