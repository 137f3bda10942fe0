import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { ILogger, LogContext } from '../core/interfaces/ILogger';
import { ErrorHandler } from './ErrorHandler';

export type LoggerEnvironment = 'development' | 'production' | 'test';

const MB = 1024 * 1024;

const PRESETS: Record<LoggerEnvironment, { level: string; defaultFile?: string }> = {
  development: { level: 'debug', defaultFile: './logs/wardline-dev.log' },
  production: { level: 'info', defaultFile: './logs/wardline.log' },
  test: { level: 'error' }
};

const jsonFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} [${level}]: ${String(message)}${rest}`;
  })
);

// The main log rotates across five files; errors are also copied to error.log.
function fileTransports(logFile: string, level: string): winston.transport[] {
  const dir = path.dirname(logFile);
  fs.mkdirSync(dir, { recursive: true });

  return [
    new winston.transports.File({ filename: logFile, level, format: jsonFormat, maxsize: 5 * MB, maxFiles: 5, tailable: true }),
    new winston.transports.File({ filename: path.join(dir, 'error.log'), level: 'error', format: jsonFormat, maxsize: 5 * MB, maxFiles: 3 })
  ];
}

function createWinston(level: string, logFile?: string): winston.Logger {
  const logger = winston.createLogger({
    level,
    format: jsonFormat,
    transports: [
      new winston.transports.Console({ level, format: consoleFormat }),
      ...(logFile ? fileTransports(logFile, level) : [])
    ],
    exitOnError: false
  });

  if (logFile) {
    const dir = path.dirname(logFile);
    logger.exceptions.handle(new winston.transports.File({ filename: path.join(dir, 'exceptions.log'), maxsize: 5 * MB, maxFiles: 2 }));
    logger.rejections.handle(new winston.transports.File({ filename: path.join(dir, 'rejections.log'), maxsize: 5 * MB, maxFiles: 2 }));
  }

  return logger;
}

/**
 * winston-backed logger. The root logger owns the ErrorHandler that reports
 * through it; child loggers only add context.
 */
export class Logger implements ILogger {
  private readonly winston: winston.Logger;
  private readonly errorHandler: ErrorHandler;

  constructor(logLevel: string = 'info', logFile?: string) {
    this.winston = createWinston(logLevel, logFile);
    this.errorHandler = new ErrorHandler(this);
  }

  static create(env: LoggerEnvironment = 'production', logFile?: string): Logger {
    const preset = PRESETS[env];
    return new Logger(preset.level, preset.defaultFile === undefined ? undefined : logFile ?? preset.defaultFile);
  }

  static resolveEnvironment(value: string | undefined): LoggerEnvironment {
    return value === 'development' || value === 'test' ? value : 'production';
  }

  getErrorHandler(): ErrorHandler {
    return this.errorHandler;
  }

  info(message: string, context?: LogContext): void {
    this.winston.info(message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.winston.warn(message, context);
  }

  error(message: string, context?: LogContext): void {
    this.winston.error(message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.winston.debug(message, context);
  }

  child(context: LogContext): ILogger {
    return new ChildLogger(this.winston.child(context));
  }

  close(): Promise<void> {
    return new Promise(resolve => {
      this.winston.on('finish', () => resolve());
      this.winston.end();
    });
  }
}

class ChildLogger implements ILogger {
  constructor(private readonly winston: winston.Logger) {}

  info(message: string, context?: LogContext): void {
    this.winston.info(message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.winston.warn(message, context);
  }

  error(message: string, context?: LogContext): void {
    this.winston.error(message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.winston.debug(message, context);
  }

  child(context: LogContext): ILogger {
    return new ChildLogger(this.winston.child(context));
  }

  // Transports belong to the root logger.
  close(): Promise<void> {
    return Promise.resolve();
  }
}
