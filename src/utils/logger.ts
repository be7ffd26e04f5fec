import pino from 'pino';
import { env } from '@/config/env';
import { REDACTED_LOG_PATHS } from '@/utils/redaction';

/**
 * Pino logger instance backing the HTTP request logger
 * In development: Pretty-printed for human readability
 * In production: JSON format for log aggregation systems
 */
export const logger = pino({
  level: env.LOG_LEVEL,
  redact: { paths: REDACTED_LOG_PATHS, censor: '[REDACTED]' },
  transport:
    env.NODE_ENV === 'development' && env.LOG_PRETTY
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});
