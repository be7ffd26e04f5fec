/**
 * Base Application Error
 *
 * Every error the API renders deliberately extends this class. Anything else
 * reaching the error handler is treated as an internal fault (500).
 *
 * - statusCode: HTTP status returned to the client
 * - code: stable machine-readable identifier
 * - isOperational: expected failure (validation, security, business rule)
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number = 500, code: string = 'INTERNAL_ERROR') {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = statusCode < 500;
    Object.setPrototypeOf(this, AppError.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Extra fields rendered next to code and message
   */
  public details(): Record<string, unknown> {
    return {};
  }
}
