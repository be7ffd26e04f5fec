/**
 * Console Logger Adapter
 *
 * Logger implementation using pino for structured logging to stdout.
 *
 * Features:
 * - Structured JSON logging (parseable by log aggregators)
 * - Pretty printing in development (human-readable)
 * - Credential fields redacted before serialization
 */

import pino from 'pino';
import { env } from '@/config/env';
import { ILogger, LogMetadata } from '@/interfaces/ILogger';
import { REDACTED_LOG_PATHS } from '@/utils/redaction';

export class ConsoleLogger implements ILogger {
  private logger: pino.Logger;

  constructor(context?: string) {
    this.logger = pino({
      name: context || 'app',
      level: env.LOG_LEVEL,
      redact: { paths: REDACTED_LOG_PATHS, censor: '[REDACTED]' },
      // Pretty print in development for readability
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
    });
  }

  debug(messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger.debug(messageOrMetadata);
    } else {
      this.logger.debug(messageOrMetadata, message);
    }
  }

  info(messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger.info(messageOrMetadata);
    } else {
      this.logger.info(messageOrMetadata, message);
    }
  }

  warn(messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger.warn(messageOrMetadata);
    } else {
      this.logger.warn(messageOrMetadata, message);
    }
  }

  error(messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger.error(messageOrMetadata);
    } else {
      this.logger.error(messageOrMetadata, message);
    }
  }

  fatal(messageOrMetadata: string | LogMetadata, message?: string): void {
    if (typeof messageOrMetadata === 'string') {
      this.logger.fatal(messageOrMetadata);
    } else {
      this.logger.fatal(messageOrMetadata, message);
    }
  }
}
