/**
 * Redis Rate Limit Store
 *
 * Sliding logs kept in sorted sets (score = request time in ms). The Lua
 * script runs atomically on the server, so every instance sharing the Redis
 * sees one consistent count per key.
 */

import { randomUUID } from 'node:crypto';
import Redis from 'ioredis';
import { IRateLimitStore, RateLimitHit } from '@/interfaces/IRateLimitStore';
import { createLogger } from '@/adapters/logging/LoggerFactory';

const log = createLogger('RedisRateLimitStore');

const KEY_PREFIX = 'rate_limit:';

// KEYS[1] = log key; ARGV = now, window, limit, member
const HIT_SCRIPT = `
local key = KEYS[1]
local now = tonumber(ARGV[1])
local window = tonumber(ARGV[2])
local limit = tonumber(ARGV[3])

redis.call('ZREMRANGEBYSCORE', key, '-inf', now - window)
local count = redis.call('ZCARD', key)
local allowed = 0

if count < limit then
  redis.call('ZADD', key, now, ARGV[4])
  redis.call('PEXPIRE', key, window)
  count = count + 1
  allowed = 1
end

local oldest = redis.call('ZRANGE', key, 0, 0, 'WITHSCORES')
local reset = now
if oldest[2] then
  reset = tonumber(oldest[2]) + window
end

return {allowed, count, reset}
`;

export class RedisRateLimitStore implements IRateLimitStore {
  constructor(private client: Redis) {
    this.client.on('error', (err) => {
      log.error({ err: err.message }, 'Redis connection error');
    });
  }

  async hit(key: string, nowMs: number, windowMs: number, limit: number): Promise<RateLimitHit> {
    const reply = await this.client.eval(
      HIT_SCRIPT,
      1,
      KEY_PREFIX + key,
      nowMs,
      windowMs,
      limit,
      `${nowMs}:${randomUUID()}`
    );

    if (!Array.isArray(reply) || reply.length !== 3) {
      throw new Error('Unexpected reply from rate limit script');
    }

    const [allowed, count, resetAtMs] = reply.map((value: unknown) => Number(value));
    return {
      allowed: allowed === 1,
      count: count ?? 0,
      resetAtMs: resetAtMs ?? nowMs,
    };
  }

  async undo(key: string): Promise<void> {
    await this.client.zpopmax(KEY_PREFIX + key);
  }

  async reset(key: string): Promise<void> {
    await this.client.del(KEY_PREFIX + key);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
