import { Request, Response, NextFunction } from 'express';
import { ROLES } from '@/constants/banking';
import { ForbiddenError, SessionNotFoundError } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';
import { requireRole } from '@/services/authorization.service';

/**
 * Gate for admin-only routes
 */
export function requireAdmin(req: Request, _res: Response, next: NextFunction): void {
  if (!req.auth) {
    next(new SessionNotFoundError());
    return;
  }

  if (!requireRole(req.auth, ROLES.ADMIN)) {
    logger.warn({ userId: req.auth.userId, path: req.originalUrl }, 'Admin route denied');
    next(new ForbiddenError());
    return;
  }

  next();
}
