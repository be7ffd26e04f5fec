import { AppError } from './AppError';

/**
 * Session Not Found (401)
 * No cookie, unknown token, revoked session or deactivated user
 */
export class SessionNotFoundError extends AppError {
  constructor(message: string = 'Authentication required') {
    super(message, 401, 'SESSION_NOT_FOUND');
    Object.setPrototypeOf(this, SessionNotFoundError.prototype);
  }
}

/**
 * Session Expired (401)
 */
export class SessionExpiredError extends AppError {
  constructor() {
    super('Session has expired. Please log in again.', 401, 'SESSION_EXPIRED');
    Object.setPrototypeOf(this, SessionExpiredError.prototype);
  }
}

/**
 * CSRF Validation Failure (403)
 * Rejected before any business logic runs
 */
export class CsrfValidationError extends AppError {
  constructor() {
    super('CSRF token missing or invalid', 403, 'CSRF_VALIDATION_FAILURE');
    Object.setPrototypeOf(this, CsrfValidationError.prototype);
  }
}

/**
 * Forbidden (403)
 * Session resolved but lacks the required role
 */
export class ForbiddenError extends AppError {
  constructor(message: string = 'Insufficient privileges') {
    super(message, 403, 'FORBIDDEN');
    Object.setPrototypeOf(this, ForbiddenError.prototype);
  }
}
