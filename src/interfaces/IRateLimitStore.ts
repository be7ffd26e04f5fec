/**
 * Rate Limit Store Interface
 *
 * Sliding-log counters. Implementations must make hit() atomic per key:
 * prune, count, and record when under the limit, as one step.
 */

export interface RateLimitHit {
  /** Request accepted and recorded */
  allowed: boolean;
  /** Requests in the window after this hit (denied requests are not recorded) */
  count: number;
  /** Epoch ms at which the oldest request in the window expires (now when the window is empty) */
  resetAtMs: number;
}

export interface IRateLimitStore {
  hit(key: string, nowMs: number, windowMs: number, limit: number): Promise<RateLimitHit>;

  /**
   * Give back the most recent request recorded for a key
   */
  undo(key: string): Promise<void>;

  /**
   * Forget a key entirely
   */
  reset(key: string): Promise<void>;

  /**
   * Release connections / timers
   */
  close(): Promise<void>;
}
