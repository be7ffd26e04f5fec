import { Router } from 'express';
import * as authController from '@/controllers/auth.controller';
import { authRateLimiter } from '@/middlewares/rateLimiter';
import { requireSession } from '@/middlewares/session';
import { csrfProtection } from '@/middlewares/csrf';

const router = Router();

/**
 * POST /api/v1/auth/register
 * Authentication tier rate limit (5 requests/minute)
 */
router.post('/register', authRateLimiter, authController.register);

/**
 * POST /api/v1/auth/login
 * Authentication tier rate limit (5 requests/minute)
 */
router.post('/login', authRateLimiter, authController.login);

/**
 * POST /api/v1/auth/logout
 */
router.post('/logout', requireSession, csrfProtection, authController.logout);

/**
 * GET /api/v1/auth/session
 * Current user and CSRF token
 */
router.get('/session', requireSession, authController.getSession);

/**
 * POST /api/v1/auth/password
 */
router.post('/password', authRateLimiter, requireSession, csrfProtection, authController.changePassword);

export default router;
