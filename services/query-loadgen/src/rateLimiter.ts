import { systemClock, type Clock } from './clock';

export interface RateLimiterOptions {
  ratePerSecond: number;
  clock?: Clock;
}

/**
 * Token bucket with a burst of one. Each caller reserves the next free slot
 * synchronously and then sleeps until it; slots are spaced `1000 / rate` ms
 * apart, so the aggregate rate holds however many callers share the limiter.
 * An idle limiter does not bank permits.
 */
export class RateLimiter {
  readonly ratePerSecond: number;
  readonly intervalMs: number;
  private readonly clock: Clock;
  private nextSlotMs: number | null = null;

  constructor(options: RateLimiterOptions) {
    if (!Number.isFinite(options.ratePerSecond) || options.ratePerSecond <= 0) {
      throw new RangeError(`ratePerSecond must be > 0, got ${options.ratePerSecond}`);
    }
    this.ratePerSecond = options.ratePerSecond;
    this.intervalMs = 1000 / options.ratePerSecond;
    this.clock = options.clock ?? systemClock;
  }

  /** Reserves a slot and returns how long the caller must wait for it. */
  reserveDelay(): number {
    const now = this.clock.now();
    const slot = this.nextSlotMs === null ? now : Math.max(now, this.nextSlotMs);
    this.nextSlotMs = slot + this.intervalMs;
    return slot - now;
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    const waitMs = this.reserveDelay();
    if (waitMs > 0) {
      await this.clock.sleep(waitMs, signal);
    }
    signal?.throwIfAborted();
  }
}
