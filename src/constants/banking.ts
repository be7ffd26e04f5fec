/**
 * User roles
 * ADMIN satisfies every check that STANDARD satisfies
 */
export const ROLES = {
  STANDARD: 'standard',
  ADMIN: 'admin',
} as const;

/**
 * Account types
 * A user holds at most one active account of each type
 */
export const ACCOUNT_TYPES = {
  CHECKING: 'checking',
  SAVINGS: 'savings',
} as const;

/**
 * Account statuses
 */
export const ACCOUNT_STATUSES = {
  ACTIVE: 'active',
  DISABLED: 'disabled',
} as const;

/**
 * Transaction kinds
 * - TRANSFER: debit source, credit destination
 * - DEPOSIT: credit destination (admin cash-in, no source)
 * - REVERSAL: compensating record for a completed transfer
 */
export const TRANSACTION_KINDS = {
  TRANSFER: 'transfer',
  DEPOSIT: 'deposit',
  REVERSAL: 'reversal',
} as const;

/**
 * Transaction statuses
 * FAILED records are audit entries with no balance effect
 */
export const TRANSACTION_STATUSES = {
  COMPLETED: 'completed',
  FAILED: 'failed',
  REVERSED: 'reversed',
} as const;

/**
 * Login attempt outcomes
 * - LOCKED: attempt made while the username was locked (password not checked)
 * - ADMIN_RESET: administrator cleared the lock
 */
export const LOGIN_OUTCOMES = {
  SUCCESS: 'success',
  FAILURE: 'failure',
  LOCKED: 'locked',
  ADMIN_RESET: 'admin_reset',
} as const;

/**
 * Route classes used by the rate limiter
 */
export const ROUTE_CLASSES = {
  AUTHENTICATION: 'authentication',
  STANDARD: 'standard',
  ADMIN: 'admin',
} as const;

/**
 * Rate limit tiers
 */
export const RATE_LIMIT_TIERS = {
  GLOBAL: 'global',
  AUTH: 'auth',
} as const;

/** Length of generated account numbers */
export const ACCOUNT_NUMBER_LENGTH = 10;

// Type exports
export type Role = (typeof ROLES)[keyof typeof ROLES];
export type AccountType = (typeof ACCOUNT_TYPES)[keyof typeof ACCOUNT_TYPES];
export type AccountStatus = (typeof ACCOUNT_STATUSES)[keyof typeof ACCOUNT_STATUSES];
export type TransactionKind = (typeof TRANSACTION_KINDS)[keyof typeof TRANSACTION_KINDS];
export type TransactionStatus = (typeof TRANSACTION_STATUSES)[keyof typeof TRANSACTION_STATUSES];
export type LoginOutcome = (typeof LOGIN_OUTCOMES)[keyof typeof LOGIN_OUTCOMES];
export type RouteClass = (typeof ROUTE_CLASSES)[keyof typeof ROUTE_CLASSES];
export type RateLimitTier = (typeof RATE_LIMIT_TIERS)[keyof typeof RATE_LIMIT_TIERS];
