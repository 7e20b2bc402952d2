/**
 * Shared winston logger for the storage layer.
 * Level is taken from LOG_LEVEL (winston npm levels), defaulting to "info".
 */
import winston, { type Logger } from 'winston';
import { z } from 'zod';

const { combine, timestamp, printf, errors } = winston.format;

const logLevelSchema = z
  .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
  .catch('info');

export function resolveLogLevel(raw: string | undefined = process.env.LOG_LEVEL): string {
  return logLevelSchema.parse(raw?.trim().toLowerCase());
}

const logFormat = printf((info) => {
  const body = typeof info.stack === 'string' ? info.stack : String(info.message);
  return `[${String(info.timestamp)}] [${info.level.toUpperCase()}]: ${body}`;
});

export function createLogger(level = resolveLogLevel()): Logger {
  return winston.createLogger({
    level,
    format: combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), errors({ stack: true }), logFormat),
    transports: [new winston.transports.Console()],
  });
}

const logger = createLogger();

export default logger;
