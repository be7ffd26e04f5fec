import { Request, Response, NextFunction } from 'express';
import { authService } from '@/config/dependencies';
import { registerSchema, loginSchema, changePasswordSchema } from '@/validators/auth.validator';
import { validate } from '@/validators/validate';
import { clearSessionCookie, readSessionToken, setSessionCookie } from '@/middlewares/session';
import { getClientContext } from '@/utils/clientIp';
import { SessionNotFoundError } from '@/errors';

/**
 * Auth Controller
 * Registration, login/logout, session introspection and password change
 */

/**
 * POST /api/v1/auth/register
 */
export async function register(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const input = validate(registerSchema, req.body, 'Invalid registration data');
    const user = await authService.register(input);

    res.status(201).json({ success: true, user });
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/auth/login
 * Sets the session cookie; the CSRF token is returned in the body
 */
export async function login(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { username, password } = validate(loginSchema, req.body, 'Invalid login data');
    const result = await authService.login(username, password, getClientContext(req));

    setSessionCookie(res, result.token);
    res.json({
      success: true,
      user: result.user,
      csrfToken: result.csrfToken,
      expiresAt: result.session.expiresAt,
    });
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/auth/logout
 */
export async function logout(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const token = readSessionToken(req);
    if (token) {
      await authService.logout(token);
    }

    clearSessionCookie(res);
    res.json({ success: true });
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/auth/session
 */
export function getSession(req: Request, res: Response, next: NextFunction): void {
  try {
    if (!req.authSession) {
      throw new SessionNotFoundError();
    }
    res.json({ success: true, ...authService.describeSession(req.authSession) });
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/auth/password
 * Other sessions of the user are revoked; the current one stays valid with
 * a rotated CSRF token
 */
export async function changePassword(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    if (!req.authSession) {
      throw new SessionNotFoundError();
    }
    const { currentPassword, newPassword } = validate(changePasswordSchema, req.body, 'Invalid password data');

    const csrfToken = await authService.changePassword(
      req.authSession,
      currentPassword,
      newPassword,
      getClientContext(req)
    );
    res.json({ success: true, csrfToken });
  } catch (error) {
    next(error);
  }
}
