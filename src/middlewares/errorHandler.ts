import { Request, Response, NextFunction } from 'express';
import { AccountLockedError, AppError, RateLimitExceededError } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';

const REDACTED = '[REDACTED]';

/**
 * Request body fields never written to logs
 * Credentials, and the free-text/contact fields stored encrypted at rest
 */
const SENSITIVE_BODY_FIELDS = new Set([
  'password',
  'currentPassword',
  'newPassword',
  'description',
  'phone',
  'reason',
]);

/**
 * Sanitize request body for logging
 * Creates a copy with sensitive fields redacted
 */
export function sanitizeRequestBody(body: unknown): unknown {
  if (Array.isArray(body)) {
    return body.map((item) => sanitizeRequestBody(item));
  }
  if (!body || typeof body !== 'object') {
    return body;
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    sanitized[key] = SENSITIVE_BODY_FIELDS.has(key) ? REDACTED : sanitizeRequestBody(value);
  }
  return sanitized;
}

/**
 * body-parser rejects malformed JSON with a SyntaxError tagged entity.parse.failed
 */
function isMalformedJson(err: Error): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * Global error handler middleware
 *
 * Response shape: { success: false, error: { code, message, ...details } }
 * Internal faults (5xx) never expose their message; the full error is logged.
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (isMalformedJson(err)) {
    res.status(400).json({
      success: false,
      error: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' },
    });
    return;
  }

  const request = {
    method: req.method,
    url: req.originalUrl,
    userId: req.auth?.userId,
    body: sanitizeRequestBody(req.body),
  };

  if (err instanceof AppError && err.isOperational) {
    logger.warn(
      { error: { name: err.name, code: err.code, message: err.message }, request },
      'Request rejected'
    );

    if (err instanceof RateLimitExceededError) {
      res.setHeader('Retry-After', String(err.retryAfterSeconds));
    } else if (err instanceof AccountLockedError) {
      res.setHeader('Retry-After', String(err.remainingLockSeconds));
    }

    res.status(err.statusCode).json({
      success: false,
      error: {
        code: err.code,
        message: err.message,
        ...err.details(),
      },
    });
    return;
  }

  logger.error(
    {
      error: { name: err.name, message: err.message, stack: err.stack },
      request,
    },
    'Unhandled error'
  );

  res.status(500).json({
    success: false,
    error: {
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    },
  });
}
