import { Request, Response, NextFunction, CookieOptions } from 'express';
import { env } from '@/config/env';
import { SESSION_POLICY } from '@/config/businessRules';
import { sessionService } from '@/config/dependencies';
import { AppError, SessionExpiredError, SessionNotFoundError } from '@/errors';
import { AuthContext } from '@/services/authorization.service';
import { ValidatedSession } from '@/services/session.service';

declare global {
  namespace Express {
    interface Request {
      /** Principal of a validated session cookie */
      auth?: AuthContext;
      /** Session row and user behind `auth` */
      authSession?: ValidatedSession;
      /** Why a presented cookie was not accepted */
      sessionError?: AppError;
    }
  }
}

const cookieOptions: CookieOptions = {
  httpOnly: true,
  secure: env.SESSION_COOKIE_SECURE,
  sameSite: 'lax',
  path: '/',
};

export function setSessionCookie(res: Response, token: string): void {
  res.cookie(SESSION_POLICY.COOKIE_NAME, token, {
    ...cookieOptions,
    maxAge: SESSION_POLICY.ABSOLUTE_TIMEOUT_MS,
  });
}

export function clearSessionCookie(res: Response): void {
  res.clearCookie(SESSION_POLICY.COOKIE_NAME, cookieOptions);
}

/**
 * Raw session token from the cookie, if any
 */
export function readSessionToken(req: Request): string | null {
  const value: unknown = req.cookies?.[SESSION_POLICY.COOKIE_NAME];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

/**
 * Resolve the session cookie into req.auth
 *
 * Never rejects the request by itself: anonymous requests continue, and an
 * expired or unknown cookie is cleared. Runs before the rate limiters so they
 * can recognize administrators; requireSession enforces authentication later.
 */
export async function resolveSession(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const token = readSessionToken(req);
    if (!token) {
      next();
      return;
    }

    const validated = await sessionService.validate(token);
    req.authSession = validated;
    req.auth = {
      userId: validated.user.id,
      username: validated.user.username,
      role: validated.user.role,
      isActive: validated.user.isActive,
      sessionId: validated.session.id,
    };
    next();
  } catch (error) {
    if (error instanceof SessionExpiredError || error instanceof SessionNotFoundError) {
      req.sessionError = error;
      clearSessionCookie(res);
      next();
      return;
    }
    next(error);
  }
}

/**
 * Reject requests without a valid session
 */
export function requireSession(req: Request, _res: Response, next: NextFunction): void {
  if (!req.auth) {
    next(req.sessionError ?? new SessionNotFoundError());
    return;
  }
  next();
}

/**
 * Principal of the current request, for controllers behind requireSession
 */
export function requireAuth(req: Request): AuthContext {
  if (!req.auth) {
    throw new SessionNotFoundError();
  }
  return req.auth;
}
