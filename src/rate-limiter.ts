/**
 * Maximum number of tracked senders to prevent memory exhaustion
 */
const MAX_TRACKED_SENDERS = 10000;

/**
 * Sliding-window rate limiter keyed by chat sender.
 *
 * Each sender keeps the timestamps of its recent accepted requests; a request
 * is accepted while fewer than `maxRequests` of them fall inside the window.
 * Rejected requests are not recorded.
 */
export class SenderRateLimiter {
  private windows: Map<string, number[]> = new Map();
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly now: () => number;

  constructor(maxRequests: number, windowMs: number, now: () => number = Date.now) {
    this.maxRequests = maxRequests;
    this.windowMs = windowMs;
    this.now = now;
  }

  /**
   * Check whether the sender may make another request, recording it if so
   */
  allow(sender: string): boolean {
    const now = this.now();
    const timestamps = this.prune(sender, now);

    if (timestamps.length >= this.maxRequests) {
      return false;
    }

    if (timestamps.length === 0) {
      // Re-insert so Map order tracks the least recently active sender
      this.windows.delete(sender);
      this.evictIfFull();
    }

    timestamps.push(now);
    this.windows.set(sender, timestamps);
    return true;
  }

  /**
   * Milliseconds until the sender's oldest request leaves the window (0 if a request would pass)
   */
  retryAfterMs(sender: string): number {
    const now = this.now();
    const timestamps = this.prune(sender, now);

    if (timestamps.length < this.maxRequests) {
      return 0;
    }

    return Math.max(0, timestamps[0] + this.windowMs - now);
  }

  /**
   * Drop senders whose windows hold no live timestamps
   */
  cleanup(): number {
    const now = this.now();
    let removed = 0;

    for (const sender of [...this.windows.keys()]) {
      if (this.prune(sender, now).length === 0) {
        removed++;
      }
    }

    return removed;
  }

  /**
   * Get current number of tracked senders
   */
  size(): number {
    return this.windows.size;
  }

  private prune(sender: string, now: number): number[] {
    const timestamps = this.windows.get(sender);
    if (!timestamps) {
      return [];
    }

    const cutoff = now - this.windowMs;
    const live = timestamps.filter((ts) => ts > cutoff);

    if (live.length === 0) {
      this.windows.delete(sender);
    } else if (live.length !== timestamps.length) {
      this.windows.set(sender, live);
    }

    return live;
  }

  private evictIfFull(): void {
    if (this.windows.size < MAX_TRACKED_SENDERS) {
      return;
    }

    // Map maintains insertion order, so first key is the oldest
    const oldestKey = this.windows.keys().next().value;
    if (oldestKey !== undefined) {
      this.windows.delete(oldestKey);
    }
  }
}
