import { Request, Response, NextFunction } from 'express';
import { SESSION_POLICY } from '@/config/businessRules';
import { csrfService } from '@/config/dependencies';
import { CsrfValidationError, SessionNotFoundError } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';
import { metrics } from '@/adapters/metrics/MetricsFactory';
import { getClientIp } from '@/utils/clientIp';

const SAFE_METHODS = new Set(['GET', 'HEAD', 'OPTIONS']);

/**
 * CSRF check for state-changing requests of an authenticated session
 * The token must arrive in the X-CSRFToken header and match the session's.
 */
export function csrfProtection(req: Request, _res: Response, next: NextFunction): void {
  if (SAFE_METHODS.has(req.method)) {
    next();
    return;
  }

  if (!req.authSession) {
    next(new SessionNotFoundError());
    return;
  }

  if (!csrfService.validate(req.authSession.session, req.get(SESSION_POLICY.CSRF_HEADER))) {
    logger.warn(
      {
        type: 'CSRF_VALIDATION_FAILURE',
        userId: req.auth?.userId,
        method: req.method,
        path: req.originalUrl,
        ip: getClientIp(req),
      },
      'CSRF validation failed'
    );
    metrics.incrementCounter('csrf_rejections_total');
    next(new CsrfValidationError());
    return;
  }

  next();
}
