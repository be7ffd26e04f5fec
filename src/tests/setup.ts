/**
 * Test environment
 * Runs before each test file, ahead of any module reading config/env.ts
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.METRICS_TYPE = 'memory';
process.env.RATE_LIMIT_STORE = 'memory';
process.env.ENCRYPTION_KEY = 'test-encryption-key-not-for-production';
// Fast hashing keeps login-heavy tests quick; production uses 310000
process.env.PASSWORD_HASH_ITERATIONS = '1000';
// One trusted hop lets each test pick its client IP through X-Forwarded-For
process.env.TRUST_PROXY_HOPS = '1';
process.env.SESSION_COOKIE_SECURE = 'false';
process.env.ADMIN_PASSWORD = '';
