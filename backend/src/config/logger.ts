/**
 * ============================================================================
 * FHIR PATIENT GATEWAY - LOGGING CONFIGURATION
 * ============================================================================
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { config } from './config';

export type LogMeta = Record<string, unknown>;

/**
 * Ensure log directory exists
 */
function ensureLogDirectory(): void {
  if (!fs.existsSync(config.logging.file.path)) {
    fs.mkdirSync(config.logging.file.path, { recursive: true });
  }
}

/**
 * Custom log format for development
 */
const developmentFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.colorize({ all: true }),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    let log = `${timestamp} [${level}]: ${message}`;

    if (stack) {
      log += `\n${stack}`;
    }

    if (Object.keys(meta).length > 0) {
      log += `\n${JSON.stringify(meta, null, 2)}`;
    }

    return log;
  })
);

/**
 * Custom log format for production
 */
const productionFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, ...rest }) =>
    JSON.stringify({
      '@timestamp': timestamp,
      ...rest,
    })
  )
);

/**
 * Create transports based on environment
 */
function createTransports(): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      level: config.logging.level,
      format: config.isDevelopment ? developmentFormat : productionFormat,
      silent: config.isTest,
    }),
  ];

  if (config.logging.file.enabled) {
    ensureLogDirectory();

    transports.push(
      new DailyRotateFile({
        filename: path.join(config.logging.file.path, 'combined-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        maxSize: config.logging.file.maxSize,
        maxFiles: config.logging.file.maxFiles,
        level: config.logging.level,
        format: productionFormat,
      })
    );

    transports.push(
      new DailyRotateFile({
        filename: path.join(config.logging.file.path, 'error-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        maxSize: config.logging.file.maxSize,
        maxFiles: config.logging.file.maxFiles,
        level: 'error',
        format: productionFormat,
      })
    );
  }

  return transports;
}

const baseLogger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: 'fhir-patient-gateway',
    environment: config.env,
    version: config.app.version,
  },
  transports: createTransports(),
  exitOnError: false,
});

/**
 * Enhanced logger with domain-specific helpers
 */
export class EnhancedLogger {
  private winston: winston.Logger;

  constructor(winstonLogger: winston.Logger) {
    this.winston = winstonLogger;
  }

  debug(message: string, meta?: LogMeta): void {
    this.winston.debug(message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.winston.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.winston.warn(message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.winston.error(message, meta);
  }

  http(message: string, meta?: LogMeta): void {
    this.winston.http(message, meta);
  }

  /**
   * API request/response logging
   */
  api(message: string, meta: {
    method: string;
    url: string;
    statusCode: number;
    duration: number;
    requestId?: string;
    ipAddress?: string;
    userAgent?: string;
  }): void {
    const level = meta.statusCode >= 400 ? 'warn' : 'info';

    this.winston.log(level, `API: ${message}`, {
      ...meta,
      apiEvent: true,
    });
  }

  /**
   * External service integration logging. Failures go out at error level.
   */
  integration(service: string, meta: {
    operation: string;
    duration?: number;
    success: boolean;
    statusCode?: number;
    error?: string;
    details?: LogMeta;
  }): void {
    const level = meta.success ? 'info' : 'error';

    this.winston.log(level, `INTEGRATION: ${service}`, {
      ...meta,
      integrationEvent: true,
    });
  }
}

const logger = new EnhancedLogger(baseLogger);

/**
 * Stream for Morgan HTTP logger
 */
export const morganStream = {
  write: (message: string): void => {
    logger.http(message.trim());
  },
};

export { logger };
export default logger;
