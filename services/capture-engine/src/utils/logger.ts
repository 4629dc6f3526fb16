/**
 * Capture Rig - Logger
 *
 * Winston-based structured logging. Lines lead with the test and instrument
 * they concern: `<time> [level] <testId>/<instrumentId> message {meta}`.
 */

import winston from 'winston';
import { config } from '../config.js';

const { combine, timestamp, printf, colorize, errors } = winston.format;

export interface LogMetadata {
  testId?: string;
  instrumentId?: string;
  subsystem?: string;
  service?: string;
  operation?: string;
  duration?: number;
  [key: string]: unknown;
}

export interface LogLine {
  level: string;
  message: unknown;
  timestamp?: unknown;
  stack?: unknown;
  [key: string]: unknown;
}

export function formatLogLine({ level, message, timestamp, stack, testId, instrumentId, ...rest }: LogLine): string {
  const scope = [testId, instrumentId].filter((part) => typeof part === 'string' && part.length > 0).join('/');
  const metadata = Object.fromEntries(Object.entries(rest).filter(([, value]) => value !== undefined));
  const meta = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
  const stackTrace = typeof stack === 'string' ? `\n${stack}` : '';
  return `${String(timestamp)} [${level}]${scope ? ` ${scope}` : ''} ${String(message)}${meta}${stackTrace}`;
}

const logFormat = printf((info) => formatLogLine(info));

const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.logSilent,
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    logFormat
  ),
  defaultMeta: {
    service: config.serviceName,
  },
  transports: [
    new winston.transports.Console({
      format: combine(
        colorize({ all: config.nodeEnv === 'development' }),
        logFormat
      ),
    }),
  ],
});

/**
 * Mirror everything logged during a test run into the test directory so the
 * run log travels with the data. Returns a detach function.
 */
export function attachRunLogFile(filename: string): () => void {
  const transport = new winston.transports.File({
    filename,
    maxsize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  });
  logger.add(transport);
  return () => {
    logger.remove(transport);
    transport.close?.();
  };
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
