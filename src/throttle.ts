/**
 * Minimum spacing between outbound requests.
 *
 * Requests run strictly one after another, so waiting until the interval
 * since the previous start has elapsed is enough to respect the API limits.
 * One Throttle is shared by every client of a run.
 */

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/** Default spacing between consecutive calls in ms */
export const DEFAULT_MIN_INTERVAL_MS = 1000;

export class Throttle {
  private lastStart: number | null = null;

  constructor(
    readonly minIntervalMs: number = DEFAULT_MIN_INTERVAL_MS,
    private readonly clock: Clock = systemClock
  ) {}

  /** Wait until a new call may start, then record its start time. */
  async wait(): Promise<void> {
    if (this.lastStart !== null) {
      const elapsed = this.clock.now() - this.lastStart;
      if (elapsed < this.minIntervalMs) {
        await this.clock.sleep(this.minIntervalMs - elapsed);
      }
    }
    this.lastStart = this.clock.now();
  }

  /** Run a call after waiting for its slot. */
  async schedule<T>(call: () => Promise<T>): Promise<T> {
    await this.wait();
    return call();
  }
}

/**
 * A fake clock for tests: sleeping advances time instantly.
 */
export class ManualClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}
