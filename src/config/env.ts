import { cleanEnv, str, num, bool } from 'envalid';
import dotenv from 'dotenv';

// Load .env file
dotenv.config();

/**
 * Validated environment variables
 *
 * Using envalid for runtime validation and type safety:
 * - Validates types (string, number, boolean)
 * - Enforces choices for enums
 * - Provides devDefault values that only apply outside production
 * - Fails fast on startup if required vars are missing
 *
 * Production Safety:
 * - No production defaults for secrets (DB_PASSWORD, ENCRYPTION_KEY)
 * - RATE_LIMIT_STORE has no production default: running several instances
 *   against per-process counters must be a deliberate choice
 */
export const env = cleanEnv(process.env, {
  // ==========================================
  // Server Configuration
  // ==========================================
  NODE_ENV: str({
    choices: ['development', 'test', 'production'],
    default: 'development',
    desc: 'Application environment (affects logging, error handling, cookies)',
  }),
  PORT: num({
    default: 3000,
    desc: 'HTTP server port',
  }),
  TRUST_PROXY_HOPS: num({
    default: 0,
    desc: 'Number of reverse proxies in front of the app (0 = trust none)',
  }),
  CORS_ORIGIN: str({
    default: '',
    desc: 'Allowed browser origin for credentialed requests (empty disables CORS)',
    example: 'https://bank.example.com',
  }),

  // ==========================================
  // Database Configuration
  // ==========================================
  DB_HOST: str({
    default: 'localhost',
    desc: 'PostgreSQL host',
  }),
  DB_PORT: num({
    default: 5432,
    desc: 'PostgreSQL port',
  }),
  DB_NAME: str({
    default: 'secure_bank',
    desc: 'PostgreSQL database name',
  }),
  DB_USER: str({
    default: 'postgres',
    desc: 'PostgreSQL username',
  }),
  DB_PASSWORD: str({
    devDefault: 'postgres',
    desc: 'PostgreSQL password (REQUIRED in production)',
  }),
  DB_SSL: bool({
    default: false,
    desc: 'Use TLS for the PostgreSQL connection',
  }),
  DB_MAX_CONNECTIONS: num({
    default: 20,
    desc: 'Maximum database connection pool size',
  }),

  // ==========================================
  // Logging & Metrics
  // ==========================================
  LOG_LEVEL: str({
    choices: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
    default: 'info',
    desc: 'Minimum log level to output',
  }),
  LOG_PRETTY: bool({
    default: true,
    desc: 'Pretty-print logs in development (false for JSON logs)',
  }),
  LOGGER_TYPE: str({
    choices: ['console'],
    default: 'console',
    desc: 'Logger backend',
  }),
  METRICS_TYPE: str({
    choices: ['memory', 'noop'],
    default: 'memory',
    desc: 'Metrics backend (memory = exposed on /api/metrics)',
  }),

  // ==========================================
  // Encryption
  // ==========================================
  ENCRYPTION_KEY: str({
    devDefault: 'development-only-encryption-key-change-me',
    desc: 'Key material for field encryption (at least 32 characters)',
  }),

  // ==========================================
  // Credentials & Lockout
  // ==========================================
  PASSWORD_HASH_ITERATIONS: num({
    default: 310_000,
    desc: 'PBKDF2-SHA256 iteration count for new password hashes',
  }),
  LOCKOUT_THRESHOLD: num({
    default: 3,
    desc: 'Failed login attempts inside the window that lock an account',
  }),
  LOCKOUT_WINDOW_SECONDS: num({
    default: 1800,
    desc: 'Window over which failed attempts are counted',
  }),
  LOCKOUT_DURATION_SECONDS: num({
    default: 1800,
    desc: 'How long an account stays locked',
  }),

  // ==========================================
  // Rate Limiting
  // ==========================================
  RATE_LIMIT_STORE: str({
    choices: ['memory', 'redis'],
    devDefault: 'memory',
    desc: 'memory = per-process counters (single instance only), redis = shared counters',
  }),
  REDIS_URL: str({
    default: 'redis://localhost:6379',
    desc: 'Redis connection URL (used when RATE_LIMIT_STORE=redis)',
  }),
  RATE_LIMIT_GLOBAL_MAX: num({
    default: 100,
    desc: 'Requests allowed per identity in the global window',
  }),
  RATE_LIMIT_GLOBAL_WINDOW_SECONDS: num({
    default: 3600,
    desc: 'Global rate limit window',
  }),
  RATE_LIMIT_AUTH_MAX: num({
    default: 5,
    desc: 'Requests allowed per identity on authentication routes',
  }),
  RATE_LIMIT_AUTH_WINDOW_SECONDS: num({
    default: 60,
    desc: 'Authentication rate limit window',
  }),

  // ==========================================
  // Sessions
  // ==========================================
  SESSION_IDLE_TIMEOUT_SECONDS: num({
    default: 1800,
    desc: 'Sliding session lifetime extended by every authenticated request',
  }),
  SESSION_ABSOLUTE_TIMEOUT_SECONDS: num({
    default: 43_200,
    desc: 'Hard cap on a session lifetime regardless of activity',
  }),
  SESSION_COOKIE_SECURE: bool({
    default: true,
    desc: 'Mark the session cookie Secure (disable only for plain-HTTP development)',
  }),

  // ==========================================
  // Bootstrap Administrator
  // ==========================================
  ADMIN_USERNAME: str({
    default: 'admin',
    desc: 'Username of the administrator created at startup',
  }),
  ADMIN_EMAIL: str({
    default: 'admin@localhost',
    desc: 'Email of the bootstrap administrator',
  }),
  ADMIN_PASSWORD: str({
    default: '',
    desc: 'Password of the bootstrap administrator (empty = do not create one)',
  }),
});

export type Env = typeof env;
