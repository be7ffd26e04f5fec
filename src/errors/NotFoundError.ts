import { AppError } from './AppError';

/**
 * Not Found Error (404)
 * Thrown when a requested resource doesn't exist or isn't visible to the caller
 */
export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'NOT_FOUND');
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}
