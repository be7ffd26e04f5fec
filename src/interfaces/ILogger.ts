/**
 * Logger Interface
 *
 * Abstraction for logging across the application. Services and middlewares
 * depend on this interface; the factory picks the concrete adapter.
 */

/**
 * Log metadata - structured data attached to log entries
 */
export type LogMetadata = Record<string, unknown>;

/**
 * Logger interface following common logging patterns (pino, winston, etc.)
 */
export interface ILogger {
  /**
   * Debug level - Detailed diagnostic information
   * Example: "Session validated", "Transaction committed"
   */
  debug(message: string): void;
  debug(metadata: LogMetadata, message: string): void;

  /**
   * Info level - Normal operations and audit trail
   * Example: "User registered", "Transfer completed", "User unlocked by admin"
   */
  info(message: string): void;
  info(metadata: LogMetadata, message: string): void;

  /**
   * Warn level - Security events and rejected operations
   * Example: "Account locked", "CSRF validation failed", "Rate limit exceeded"
   */
  warn(message: string): void;
  warn(metadata: LogMetadata, message: string): void;

  /**
   * Error level - Failed operations and data-integrity faults
   * Example: "Database connection failed", "Ciphertext failed authentication"
   */
  error(message: string): void;
  error(metadata: LogMetadata, message: string): void;

  /**
   * Fatal level - Unrecoverable errors causing shutdown
   */
  fatal(message: string): void;
  fatal(metadata: LogMetadata, message: string): void;
}

/**
 * Logger Factory Interface
 */
export interface ILoggerFactory {
  /**
   * Create a logger instance
   * @param context - Optional context name (e.g., "TransactionEngine", "Database")
   */
  createLogger(context?: string): ILogger;
}
