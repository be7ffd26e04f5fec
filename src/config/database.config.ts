/**
 * Database Connection Pool Configuration
 *
 * PostgreSQL pool settings. Login and transfer paths each hold a connection
 * for the length of one short transaction (advisory lock or row locks), so
 * the pool size bounds how many of those can run at once per instance.
 */

import { env } from './env';

export const DATABASE_POOL_CONFIG = {
  /**
   * Connections kept warm
   * Avoids connection setup latency on the first logins after idle periods
   */
  min: 2,

  /**
   * Maximum connections per instance
   * PostgreSQL default max_connections = 100; leave headroom for admin tools
   */
  max: env.DB_MAX_CONNECTIONS,

  /** Close connections idle for more than 5 minutes */
  idleTimeoutMillis: 300_000,

  /**
   * Connection acquisition timeout (10 seconds)
   * Fails the request before any transaction begins, so nothing is applied
   */
  connectionTimeoutMillis: 10_000,

  /** Recycle a connection after this many queries */
  maxUses: 7_500,
} as const;

export type DatabasePoolConfig = typeof DATABASE_POOL_CONFIG;
