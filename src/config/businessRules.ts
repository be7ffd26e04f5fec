/**
 * Business Rules Configuration
 *
 * Centralized configuration for security policies and limits.
 * Values that operators tune per deployment come from env.ts; the rest are
 * fixed here so validation schemas and services share one source.
 */

import { env } from './env';

/**
 * Transfer Limits
 *
 * - MAX_TRANSFER_AMOUNT: ceiling for a single transfer or deposit
 * - MAX_DESCRIPTION_LENGTH: free-text description cap (before encryption)
 */
export const TRANSFER_LIMITS = {
  MAX_TRANSFER_AMOUNT: '1000000.00',
  MAX_DESCRIPTION_LENGTH: 255,
  /** Decimal places accepted for monetary amounts */
  AMOUNT_SCALE: 2,
} as const;

/**
 * Pagination Limits
 */
export const PAGINATION_LIMITS = {
  DEFAULT_PAGE_SIZE: 50,
  MAX_PAGE_SIZE: 200,
} as const;

/**
 * Password Policy
 *
 * Enforced at registration and on every password change/reset.
 */
export const PASSWORD_POLICY = {
  MIN_LENGTH: 8,
  MAX_LENGTH: 128,
  ITERATIONS: env.PASSWORD_HASH_ITERATIONS,
} as const;

/**
 * Lockout Policy
 *
 * THRESHOLD failures inside WINDOW_MS lock the username for DURATION_MS,
 * measured from the failure that reached the threshold.
 */
export const LOCKOUT_POLICY = {
  THRESHOLD: env.LOCKOUT_THRESHOLD,
  WINDOW_MS: env.LOCKOUT_WINDOW_SECONDS * 1000,
  DURATION_MS: env.LOCKOUT_DURATION_SECONDS * 1000,
} as const;

/**
 * Rate Limiting Configuration
 *
 * - GLOBAL: every route except /api/health and /api/metrics
 * - AUTH: login, register and password change, on top of GLOBAL
 * Authenticated administrators are exempt from both tiers.
 */
export const RATE_LIMITS = {
  GLOBAL: {
    WINDOW_MS: env.RATE_LIMIT_GLOBAL_WINDOW_SECONDS * 1000,
    MAX_REQUESTS: env.RATE_LIMIT_GLOBAL_MAX,
  },
  AUTH: {
    WINDOW_MS: env.RATE_LIMIT_AUTH_WINDOW_SECONDS * 1000,
    MAX_REQUESTS: env.RATE_LIMIT_AUTH_MAX,
  },
} as const;

/**
 * Session Policy
 */
export const SESSION_POLICY = {
  IDLE_TIMEOUT_MS: env.SESSION_IDLE_TIMEOUT_SECONDS * 1000,
  ABSOLUTE_TIMEOUT_MS: env.SESSION_ABSOLUTE_TIMEOUT_SECONDS * 1000,
  COOKIE_NAME: 'sid',
  CSRF_HEADER: 'x-csrftoken',
} as const;

/**
 * Database Query Configuration
 */
export const DB_QUERY_LIMITS = {
  /**
   * Global statement timeout (10 seconds)
   * A transfer that times out before COMMIT is rolled back entirely
   */
  STATEMENT_TIMEOUT_MS: 10_000,

  /** Slow query threshold for logging (1 second) */
  SLOW_QUERY_THRESHOLD_MS: 1_000,
} as const;

export type TransferLimits = typeof TRANSFER_LIMITS;
export type PaginationLimits = typeof PAGINATION_LIMITS;
export type LockoutPolicy = typeof LOCKOUT_POLICY;
export type RateLimits = typeof RATE_LIMITS;
export type SessionPolicy = typeof SESSION_POLICY;
export type DBQueryLimits = typeof DB_QUERY_LIMITS;
