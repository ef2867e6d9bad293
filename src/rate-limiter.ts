/**
 * Per-client sliding-window rate limiter
 *
 * Each key owns a queue of request timestamps. Stale entries are evicted
 * before every count, so the window slides with the clock instead of
 * resetting at fixed boundaries. Access happens on the event loop only,
 * which serialises every mutation of the shared map.
 */

import { TIME } from './constants.js';

export interface RateLimiterOptions {
  maxRequests: number;
  windowSeconds: number;
  /** Clock in milliseconds; tests substitute a simulated one */
  now?: () => number;
}

export class RateLimiter {
  private readonly requests = new Map<string, number[]>();
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly now: () => number;

  constructor(options: RateLimiterOptions) {
    this.maxRequests = options.maxRequests;
    this.windowMs = options.windowSeconds * TIME.MS_PER_SECOND;
    this.now = options.now ?? Date.now;
  }

  /**
   * Record a request for `key` if it still fits in the window
   *
   * A denied request leaves the queue untouched.
   */
  isAllowed(key: string): boolean {
    const now = this.now();
    const timestamps = this.evict(key, now);

    if (timestamps.length >= this.maxRequests) {
      return false;
    }

    timestamps.push(now);
    this.requests.set(key, timestamps);
    return true;
  }

  getRemainingRequests(key: string): number {
    const timestamps = this.evict(key, this.now());
    return Math.max(0, this.maxRequests - timestamps.length);
  }

  /**
   * Drop keys whose queues have fully expired
   *
   * Returns the number of keys removed.
   */
  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const key of [...this.requests.keys()]) {
      if (this.evict(key, now).length === 0) {
        removed++;
      }
    }
    return removed;
  }

  get trackedKeys(): number {
    return this.requests.size;
  }

  reset(key?: string): void {
    if (key === undefined) {
      this.requests.clear();
    } else {
      this.requests.delete(key);
    }
  }

  private evict(key: string, now: number): number[] {
    const timestamps = this.requests.get(key);
    if (!timestamps) {
      return [];
    }

    const cutoff = now - this.windowMs;
    let firstLive = 0;
    while (firstLive < timestamps.length && timestamps[firstLive] < cutoff) {
      firstLive++;
    }
    if (firstLive > 0) {
      timestamps.splice(0, firstLive);
    }

    if (timestamps.length === 0) {
      this.requests.delete(key);
    }
    return timestamps;
  }
}
