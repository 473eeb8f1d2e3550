import path from 'node:path';

import winston from 'winston';

import { config } from '../config/index.js';

type LogMetadata = Record<string, unknown>;

const logger = winston.createLogger({
  level: config.logging.level,
  silent: !config.logging.enabled,
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json()
  ),
  defaultMeta: { service: config.app.name },
});

if (config.logging.dir) {
  logger.add(
    new winston.transports.File({
      filename: path.join(config.logging.dir, 'combined.log'),
      maxsize: 5242880,
      maxFiles: 5,
    })
  );
  logger.add(
    new winston.transports.File({
      filename: path.join(config.logging.dir, 'error.log'),
      level: 'error',
      maxsize: 5242880,
      maxFiles: 5,
    })
  );
}

// stderr keeps stdout free for the CLI report.
logger.add(
  new winston.transports.Console({
    stderrLevels: ['error', 'warn', 'info', 'debug'],
    format:
      process.env['NODE_ENV'] === 'production'
        ? winston.format.json()
        : winston.format.combine(
            winston.format.colorize(),
            winston.format.simple()
          ),
  })
);

export function logInfo(message: string, meta?: LogMetadata): void {
  if (config.logging.enabled) logger.info(message, meta);
}

export function logWarn(message: string, meta?: LogMetadata): void {
  if (config.logging.enabled) logger.warn(message, meta);
}

export function logDebug(message: string, meta?: LogMetadata): void {
  if (config.logging.enabled) logger.debug(message, meta);
}

export function logError(message: string, error?: Error | LogMetadata): void {
  if (!config.logging.enabled) return;

  const errorMeta =
    error instanceof Error
      ? {
          error: error.message,
          code: Reflect.get(error, 'code'),
          stack: error.stack,
        }
      : error;
  logger.error(message, errorMeta);
}
