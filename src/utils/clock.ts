/**
 * Time source used for TTLs, rate-limit windows, backoff sleeps and
 * row timestamps. Tests swap in a fake that advances on sleep().
 */
export interface Clock {
  /** Monotonic milliseconds, only meaningful as a difference. */
  now(): number;
  /** Wall-clock time for persisted timestamps. */
  wallTime(): Date;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  wallTime: () => new Date(),
  sleep: (ms) =>
    ms > 0
      ? new Promise((resolve) => setTimeout(resolve, ms))
      : Promise.resolve(),
};
