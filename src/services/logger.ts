import winston from 'winston';

import { config } from '../config/index.js';

const logger = winston.createLogger({
  level: config.logging.level,
  silent: !config.logging.enabled,
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json()
  ),
  defaultMeta: { service: config.server.name },
  transports: [new winston.transports.Console()],
});

if (process.env.NODE_ENV !== 'production') {
  logger.clear().add(
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
      ),
    })
  );
}

export function logInfo(message: string, meta?: Record<string, unknown>): void {
  logger.info(message, meta);
}

export function logWarn(message: string, meta?: Record<string, unknown>): void {
  logger.warn(message, meta);
}

export function logDebug(
  message: string,
  meta?: Record<string, unknown>
): void {
  logger.debug(message, meta);
}

export function logError(
  message: string,
  error?: Error | Record<string, unknown>
): void {
  const errorMeta =
    error instanceof Error
      ? { error: error.message, stack: error.stack }
      : error;
  logger.error(message, errorMeta);
}
