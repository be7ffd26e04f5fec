import { Router } from 'express';
import authRoutes from './auth.routes';
import accountsRoutes from './accounts.routes';
import transfersRoutes from './transfers.routes';
import adminRoutes from './admin.routes';
import { getMetrics } from '@/api/controllers/metrics.controller';
import { resolveSession } from '@/middlewares/session';
import { globalRateLimiter } from '@/middlewares/rateLimiter';

const router = Router();

/**
 * API Routes
 * Base path: /api
 *
 * Versioning Strategy: /api/v1/*
 * - Health and metrics endpoints stay unversioned and are not rate limited
 */

router.get('/health', (_req, res) => {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    service: 'secure-bank-core',
    version: 'v1',
  });
});

router.get('/metrics', getMetrics);

// v1 API routes
const v1Router = Router();

// Session first so the limiters key on the user and exempt administrators
v1Router.use(resolveSession);
v1Router.use(globalRateLimiter);

v1Router.use('/auth', authRoutes);
v1Router.use('/accounts', accountsRoutes);
v1Router.use('/transfers', transfersRoutes);
v1Router.use('/admin', adminRoutes);

router.use('/v1', v1Router);

export default router;
