/**
 * Rate Limiting Middleware
 *
 * express-rate-limit front end for RateLimiterService:
 * - globalRateLimiter: every /api/v1 route (health and metrics are mounted outside)
 * - authRateLimiter: login, registration and password change, after the global tier
 *
 * Counting is delegated to the service through a custom Store, so the same
 * sliding logs back both tiers whether RATE_LIMIT_STORE is memory or redis.
 * Requests from verified administrator sessions skip both tiers.
 */

import { rateLimit, ClientRateLimitInfo, Store } from 'express-rate-limit';
import { Request } from 'express';
import { env } from '@/config/env';
import { RATE_LIMIT_TIERS, RateLimitTier } from '@/constants/banking';
import { rateLimiterService } from '@/config/dependencies';
import { RateLimitExceededError } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';
import { metrics } from '@/adapters/metrics/MetricsFactory';
import { isRateLimitExempt } from '@/services/authorization.service';
import { RateLimiterService } from '@/services/rateLimiter.service';
import { getClientIp } from '@/utils/clientIp';

/**
 * Store adapter: one instance per tier
 */
export class RateLimiterServiceStore implements Store {
  public readonly localKeys: boolean;
  public readonly prefix: string;

  constructor(
    private service: RateLimiterService,
    private tier: RateLimitTier,
    shared: boolean
  ) {
    this.localKeys = !shared;
    this.prefix = `${tier}:`;
  }

  async increment(key: string): Promise<ClientRateLimitInfo> {
    const decision = await this.service.hit(this.tier, key);
    // Denied requests are not recorded by the service; report one over the limit
    const totalHits = decision.allowed ? decision.limit - decision.remaining : decision.limit + 1;
    return { totalHits, resetTime: new Date(decision.resetAtMs) };
  }

  async decrement(key: string): Promise<void> {
    await this.service.undo(this.tier, key);
  }

  async resetKey(key: string): Promise<void> {
    await this.service.reset(this.tier, key);
  }
}

/**
 * Rate-limit identity: the user for authenticated requests, else the client IP
 */
export function rateLimitIdentity(req: Request): string {
  return req.auth ? `user:${req.auth.userId}` : `ip:${getClientIp(req)}`;
}

function createTierLimiter(tier: RateLimitTier) {
  const config = rateLimiterService.getTierConfig(tier);

  return rateLimit({
    windowMs: config.windowMs,
    limit: config.maxRequests,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    store: new RateLimiterServiceStore(rateLimiterService, tier, env.RATE_LIMIT_STORE === 'redis'),
    keyGenerator: (req) => rateLimitIdentity(req),
    skip: (req) => isRateLimitExempt(req.auth),
    handler: (req, res, next, options) => {
      const retryAfter = Number(res.getHeader('Retry-After')) || Math.ceil(options.windowMs / 1000);

      logger.warn(
        {
          type: 'RATE_LIMIT_EXCEEDED',
          tier,
          identity: rateLimitIdentity(req),
          path: req.originalUrl,
          limit: config.maxRequests,
        },
        'Rate limit exceeded'
      );
      metrics.incrementCounter('rate_limit_denied_total', 1, { tier });

      next(new RateLimitExceededError(retryAfter));
    },
  });
}

/**
 * Global rate limiter (default 100 requests/hour per identity)
 */
export const globalRateLimiter = createTierLimiter(RATE_LIMIT_TIERS.GLOBAL);

/**
 * Authentication rate limiter (default 5 requests/minute per identity)
 */
export const authRateLimiter = createTierLimiter(RATE_LIMIT_TIERS.AUTH);
