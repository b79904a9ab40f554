import { systemClock, type Clock } from "../utils/clock.js";

import type { SyncLogger } from "../logger.js";

const WINDOW_MS = 60_000;
// Start waiting this many calls before the ceiling
const HEADROOM = 10;

export interface RateLimiterSnapshot {
  calls: number;
  limit: number;
  msUntilReset: number;
}

/**
 * Fixed-window self-throttle for the identity service.
 *
 * Advisory only: it assumes a single caller and never rejects, it just
 * sleeps until the window turns over once the counter nears the limit.
 */
export class RateLimiter {
  private calls = 0;
  private resetAt: number;

  constructor(
    private logger: SyncLogger,
    private limit = 100,
    private clock: Clock = systemClock
  ) {
    this.resetAt = clock.now() + WINDOW_MS;
  }

  /**
   * Call before every request to the guarded service.
   * Resolves with the time spent waiting, in ms.
   */
  async admit(): Promise<number> {
    const now = this.clock.now();
    let waited = 0;

    if (now > this.resetAt) {
      this.calls = 0;
      this.resetAt = now + WINDOW_MS;
    }

    if (this.calls >= this.limit - HEADROOM) {
      const waitMs = this.resetAt - now;
      if (waitMs > 0) {
        this.logger.warn(
          { calls: this.calls, limit: this.limit, waitMs: Math.round(waitMs) },
          "Identity service limit close, waiting for the window to reset"
        );
        await this.clock.sleep(waitMs);
        waited = waitMs;
        this.calls = 0;
        this.resetAt = this.clock.now() + WINDOW_MS;
      }
    }

    this.calls++;
    return waited;
  }

  snapshot(): RateLimiterSnapshot {
    return {
      calls: this.calls,
      limit: this.limit,
      msUntilReset: Math.max(0, this.resetAt - this.clock.now()),
    };
  }
}
