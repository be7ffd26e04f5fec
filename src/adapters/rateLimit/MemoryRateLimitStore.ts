/**
 * In-Memory Rate Limit Store
 *
 * Per-process sliding logs. Correct only for a single instance: with several
 * instances each one counts separately (RATE_LIMIT_STORE=redis shares them).
 *
 * Node runs hit() to completion without yielding, which makes it atomic.
 */

import { IRateLimitStore, RateLimitHit } from '@/interfaces/IRateLimitStore';

const SWEEP_EVERY_HITS = 1_000;

export class MemoryRateLimitStore implements IRateLimitStore {
  private logs = new Map<string, { timestamps: number[]; windowMs: number }>();
  private hitsSinceSweep = 0;

  async hit(key: string, nowMs: number, windowMs: number, limit: number): Promise<RateLimitHit> {
    this.maybeSweep(nowMs);

    const entry = this.logs.get(key) ?? { timestamps: [], windowMs };
    entry.windowMs = windowMs;
    entry.timestamps = entry.timestamps.filter((t) => nowMs - t < windowMs);

    const allowed = entry.timestamps.length < limit;
    if (allowed) {
      entry.timestamps.push(nowMs);
    }
    this.logs.set(key, entry);

    const oldest = entry.timestamps[0];
    return {
      allowed,
      count: entry.timestamps.length,
      resetAtMs: oldest === undefined ? nowMs : oldest + windowMs,
    };
  }

  async undo(key: string): Promise<void> {
    this.logs.get(key)?.timestamps.pop();
  }

  async reset(key: string): Promise<void> {
    this.logs.delete(key);
  }

  async close(): Promise<void> {
    this.logs.clear();
  }

  // Drop keys whose whole log has aged out
  private maybeSweep(nowMs: number): void {
    this.hitsSinceSweep += 1;
    if (this.hitsSinceSweep < SWEEP_EVERY_HITS) return;
    this.hitsSinceSweep = 0;

    for (const [key, entry] of this.logs) {
      const newest = entry.timestamps[entry.timestamps.length - 1];
      if (newest === undefined || nowMs - newest >= entry.windowMs) {
        this.logs.delete(key);
      }
    }
  }
}
