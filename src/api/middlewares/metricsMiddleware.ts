/**
 * HTTP Metrics Middleware
 *
 * Records per-request metrics into the shared metrics instance:
 * - http_requests_total{method,path,status}
 * - http_request_duration_ms{method,path}
 */

import { Request, Response, NextFunction } from 'express';
import { metrics } from '@/adapters/metrics/MetricsFactory';

const UNTRACKED_PATHS = new Set(['/api/metrics', '/api/health']);

/**
 * Normalize path to avoid cardinality explosion
 * Examples:
 * - /api/v1/accounts/123/transactions -> /api/v1/accounts/:id/transactions
 * - /api/v1/admin/users/7/unlock -> /api/v1/admin/users/:id/unlock
 */
export function normalizePath(path: string): string {
  return path
    .replace(/\/[a-f0-9]{8}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{12}/gi, '/:uuid')
    .replace(/\/\d+(?=\/|$)/g, '/:id');
}

/**
 * Middleware to track HTTP request metrics
 */
export function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const path = normalizePath(req.path || req.url);

  if (UNTRACKED_PATHS.has(path)) {
    next();
    return;
  }

  const startTime = Date.now();

  res.on('finish', () => {
    const method = req.method;
    metrics.incrementCounter('http_requests_total', 1, { method, path, status: res.statusCode });
    metrics.recordHistogram('http_request_duration_ms', Date.now() - startTime, { method, path });
  });

  next();
}
