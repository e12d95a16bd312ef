import { getLogger } from "./logger.js";
import { UsageCheck } from "./types.js";

const log = getLogger("usage");

export type UsageLimiterOptions = {
  limit: number;
  warningThreshold: number;
  windowMs: number;
  now?: () => number;
};

/**
 * Rolling-window request counter per user. Each check drops timestamps that
 * have left the window, so capacity returns one request at a time.
 */
export class UsageLimiter {
  private readonly requests = new Map<string, number[]>();
  private readonly now: () => number;

  constructor(private readonly options: UsageLimiterOptions) {
    this.now = options.now || Date.now;
  }

  canUse(userId: string): UsageCheck {
    const used = this.activeRequests(userId).length;
    const remaining = this.options.limit - used;

    if (remaining <= 0) {
      log.warn("Usage limit reached", { userId, used, limit: this.options.limit });
      return { allowed: false, remaining: 0, status: "limit_reached" };
    }
    if (used >= this.options.warningThreshold) {
      return { allowed: true, remaining, status: "limit_warning" };
    }
    return { allowed: true, remaining, status: "ok" };
  }

  recordUse(userId: string): number {
    const active = this.activeRequests(userId);
    active.push(this.now());
    this.requests.set(userId, active);

    const remaining = this.options.limit - active.length;
    log.info("Usage recorded", { userId, used: active.length, remaining });
    return remaining;
  }

  usage(userId: string): { used: number; limit: number } {
    return { used: this.activeRequests(userId).length, limit: this.options.limit };
  }

  /** When the oldest counted request leaves the window, in epoch ms; null with no requests. */
  nextExpiry(userId: string): number | null {
    const active = this.activeRequests(userId);
    if (active.length === 0) {
      return null;
    }
    return Math.min(...active) + this.options.windowMs;
  }

  /** Forgets users whose every request has expired. Returns how many were removed. */
  sweepStale(): number {
    const cutoff = this.now() - this.options.windowMs;
    let removed = 0;
    for (const [userId, timestamps] of this.requests.entries()) {
      if (timestamps.every((ts) => ts <= cutoff)) {
        this.requests.delete(userId);
        removed += 1;
      }
    }
    if (removed > 0) {
      log.debug("Removed stale usage entries", { removed });
    }
    return removed;
  }

  get trackedUsers(): number {
    return this.requests.size;
  }

  private activeRequests(userId: string): number[] {
    const timestamps = this.requests.get(userId);
    if (!timestamps) {
      return [];
    }
    const cutoff = this.now() - this.options.windowMs;
    const active = timestamps.filter((ts) => ts > cutoff);
    this.requests.set(userId, active);
    return active;
  }
}
