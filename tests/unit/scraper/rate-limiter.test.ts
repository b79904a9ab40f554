import { describe, it, expect } from "vitest";

import { RateLimiter } from "../../../src/scraper/rate-limiter.js";
import { FakeClock } from "../../mocks/clock.js";
import { silentLogger } from "../../mocks/logger.js";

describe("scraper/rate-limiter", () => {
  it("should admit up to limit - 10 calls without waiting", async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(silentLogger, 20, clock);

    for (let i = 0; i < 10; i++) {
      expect(await limiter.admit()).toBe(0);
    }
    expect(clock.sleeps).toEqual([]);
    expect(limiter.snapshot().calls).toBe(10);
  });

  it("should wait for the window to reset once the headroom is used", async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(silentLogger, 20, clock);

    for (let i = 0; i < 10; i++) {
      await limiter.admit();
    }
    clock.advance(15_000);

    expect(await limiter.admit()).toBe(45_000);
    expect(clock.sleeps).toEqual([45_000]);
    expect(limiter.snapshot()).toEqual({ calls: 1, limit: 20, msUntilReset: 60_000 });
  });

  it("should start a new window after the old one expires", async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(silentLogger, 20, clock);

    for (let i = 0; i < 10; i++) {
      await limiter.admit();
    }
    clock.advance(60_001);

    expect(await limiter.admit()).toBe(0);
    expect(limiter.snapshot().calls).toBe(1);
  });

  it("should wait on call 91 at the default limit and not after the reset", async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(silentLogger, 100, clock);

    for (let i = 0; i < 90; i++) {
      expect(await limiter.admit()).toBe(0);
    }
    expect(clock.sleeps).toEqual([]);

    expect(await limiter.admit()).toBe(60_000);
    expect(await limiter.admit()).toBe(0);
    expect(clock.sleeps).toEqual([60_000]);
    expect(limiter.snapshot()).toEqual({ calls: 2, limit: 100, msUntilReset: 60_000 });
  });

  it("should never let a window exceed the limit", async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(silentLogger, 15, clock);
    const windows = new Map<number, number>();

    for (let i = 0; i < 40; i++) {
      await limiter.admit();
      const window = Math.floor(clock.now() / 60_000);
      windows.set(window, (windows.get(window) ?? 0) + 1);
    }

    expect(Math.max(...windows.values())).toBeLessThanOrEqual(15);
  });
});
