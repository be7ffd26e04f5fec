import { RATE_LIMITS } from '@/config/businessRules';
import { RATE_LIMIT_TIERS, ROUTE_CLASSES, RateLimitTier, RouteClass } from '@/constants/banking';
import { IRateLimitStore } from '@/interfaces/IRateLimitStore';
import { Clock, systemClock } from '@/utils/clock';
import { AuthContext, isRateLimitExempt } from './authorization.service';

export interface RateLimitTierConfig {
  windowMs: number;
  maxRequests: number;
}

export type RateLimitConfig = Record<RateLimitTier, RateLimitTierConfig>;

export const DEFAULT_RATE_LIMITS: RateLimitConfig = {
  [RATE_LIMIT_TIERS.GLOBAL]: {
    windowMs: RATE_LIMITS.GLOBAL.WINDOW_MS,
    maxRequests: RATE_LIMITS.GLOBAL.MAX_REQUESTS,
  },
  [RATE_LIMIT_TIERS.AUTH]: {
    windowMs: RATE_LIMITS.AUTH.WINDOW_MS,
    maxRequests: RATE_LIMITS.AUTH.MAX_REQUESTS,
  },
};

export interface RateLimitDecision {
  allowed: boolean;
  /** Tier that denied the request (or the last tier checked when allowed) */
  tier: RateLimitTier | null;
  limit: number;
  remaining: number;
  /** Seconds until the oldest request in the window expires; 0 when allowed */
  retryAfterSeconds: number;
  resetAtMs: number;
}

const EXEMPT: RateLimitDecision = {
  allowed: true,
  tier: null,
  limit: Number.POSITIVE_INFINITY,
  remaining: Number.POSITIVE_INFINITY,
  retryAfterSeconds: 0,
  resetAtMs: 0,
};

/**
 * Rate Limiter
 *
 * Sliding-log ceilings keyed by (tier, identity):
 * - global: every route except health and metrics
 * - auth: login, registration and password change, checked after global
 * Verified administrator sessions are exempt from both.
 */
export class RateLimiterService {
  constructor(
    private store: IRateLimitStore,
    private limits: RateLimitConfig = DEFAULT_RATE_LIMITS,
    private clock: Clock = systemClock
  ) {}

  /**
   * Count one request against a single tier
   */
  async hit(tier: RateLimitTier, identity: string): Promise<RateLimitDecision> {
    const config = this.limits[tier];
    const nowMs = this.clock().getTime();
    const result = await this.store.hit(`${tier}:${identity}`, nowMs, config.windowMs, config.maxRequests);

    return {
      allowed: result.allowed,
      tier,
      limit: config.maxRequests,
      remaining: Math.max(0, config.maxRequests - result.count),
      retryAfterSeconds: result.allowed ? 0 : Math.max(1, Math.ceil((result.resetAtMs - nowMs) / 1000)),
      resetAtMs: result.resetAtMs,
    };
  }

  /**
   * Decide whether a request may proceed
   * @param identity - `user:<id>` for sessions, `ip:<addr>` otherwise
   */
  async allow(identity: string, routeClass: RouteClass, auth?: AuthContext | null): Promise<RateLimitDecision> {
    if (isRateLimitExempt(auth)) {
      return EXEMPT;
    }

    const global = await this.hit(RATE_LIMIT_TIERS.GLOBAL, identity);
    if (!global.allowed || routeClass !== ROUTE_CLASSES.AUTHENTICATION) {
      return global;
    }

    return this.hit(RATE_LIMIT_TIERS.AUTH, identity);
  }

  /**
   * Give back the last request counted for a tier (express-rate-limit decrement)
   */
  async undo(tier: RateLimitTier, identity: string): Promise<void> {
    await this.store.undo(`${tier}:${identity}`);
  }

  async reset(tier: RateLimitTier, identity: string): Promise<void> {
    await this.store.reset(`${tier}:${identity}`);
  }

  getTierConfig(tier: RateLimitTier): RateLimitTierConfig {
    return this.limits[tier];
  }
}
