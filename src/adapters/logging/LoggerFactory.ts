/**
 * Logger Factory
 *
 * Creates logger instances based on LOGGER_TYPE. Only the pino console
 * adapter ships today; log shipping happens outside the process.
 */

import { env } from '@/config/env';
import { ILogger, ILoggerFactory } from '@/interfaces/ILogger';
import { ConsoleLogger } from './ConsoleLogger';

export class LoggerFactory implements ILoggerFactory {
  createLogger(context?: string): ILogger {
    switch (env.LOGGER_TYPE) {
      case 'console':
      default:
        return new ConsoleLogger(context);
    }
  }
}

/**
 * Default logger instance for application use
 */
const factory = new LoggerFactory();
export const logger = factory.createLogger('app');

/**
 * Create named loggers for specific contexts
 */
export function createLogger(context: string): ILogger {
  return factory.createLogger(context);
}
