import type { Clock } from "../../src/utils/clock.js";

/**
 * Deterministic clock: sleep() resolves at once and advances monotonic
 * time. Wall time stays where it is set.
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];
  private elapsed = 0;

  constructor(private wall = new Date("2024-03-01T09:00:00.000Z")) {}

  now(): number {
    return this.elapsed;
  }

  wallTime(): Date {
    return new Date(this.wall.getTime());
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.advance(ms);
    await Promise.resolve();
  }

  advance(ms: number): void {
    this.elapsed += Math.max(0, ms);
  }

  setWallTime(date: Date): void {
    this.wall = date;
  }
}
