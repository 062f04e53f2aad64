/**
 * Schematic Agent - Logger
 *
 * Winston-based structured logging
 */

import winston from 'winston';
import { config } from '../config.js';

const { combine, timestamp, printf, colorize, errors } = winston.format;

export interface LogMetadata {
  operationId?: string;
  service?: string;
  operation?: string;
  iteration?: number;
  duration?: number;
  [key: string]: unknown;
}

const logFormat = printf(({ level, message, timestamp, stack, ...metadata }) => {
  const meta = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
  const stackTrace = stack ? `\n${stack}` : '';
  return `${timestamp} [${level}] ${message}${meta}${stackTrace}`;
});

const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === 'test',
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    logFormat
  ),
  defaultMeta: {
    service: config.serviceName,
    version: config.version,
  },
  transports: [
    // stderr keeps stdout free for CLI output
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'debug'],
      format: combine(
        colorize({ all: config.nodeEnv === 'development' }),
        logFormat
      ),
    }),
  ],
});

if (config.nodeEnv === 'production') {
  logger.add(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
    })
  );
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, error?: Error, metadata?: LogMetadata): void;
  child(defaultMetadata: LogMetadata): Logger;
}

function createLogger(defaultMetadata: LogMetadata = {}): Logger {
  return {
    debug(message: string, metadata?: LogMetadata): void {
      logger.debug(message, { ...defaultMetadata, ...metadata });
    },

    info(message: string, metadata?: LogMetadata): void {
      logger.info(message, { ...defaultMetadata, ...metadata });
    },

    warn(message: string, metadata?: LogMetadata): void {
      logger.warn(message, { ...defaultMetadata, ...metadata });
    },

    error(message: string, error?: Error, metadata?: LogMetadata): void {
      logger.error(message, {
        ...defaultMetadata,
        ...metadata,
        error: error?.message,
        stack: error?.stack,
      });
    },

    child(childMetadata: LogMetadata): Logger {
      return createLogger({ ...defaultMetadata, ...childMetadata });
    },
  };
}

export const log = createLogger();

export default log;
