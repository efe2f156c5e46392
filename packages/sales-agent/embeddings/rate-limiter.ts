// Sliding-window rate limiter for calls to the generation service.
// Keeps the timestamps of recent calls; a full window blocks the caller
// until the oldest timestamp ages out.

import { sleep, type Sleep } from '../utils/retry.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('RateLimiter');

export interface Clock {
  now(): number;
  sleep: Sleep;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

export class SlidingWindowRateLimiter {
  private timestamps: number[] = [];
  // Serializes acquirers so two callers cannot claim the same free slot
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly maxRequests: number,
    private readonly windowMs: number,
    private readonly clock: Clock = systemClock,
  ) {
    if (maxRequests < 1) throw new RangeError('maxRequests must be at least 1');
    if (windowMs <= 0) throw new RangeError('windowMs must be positive');
  }

  /** Resolves once a call may proceed; the call is recorded at that instant */
  acquire(): Promise<void> {
    const next = this.tail.then(() => this.waitForSlot());
    this.tail = next.catch((err: unknown) => {
      log.error('Rate limiter wait failed', { error: String(err) });
    });
    return next;
  }

  /** Calls recorded within the current window */
  inFlight(): number {
    this.prune(this.clock.now());
    return this.timestamps.length;
  }

  private async waitForSlot(): Promise<void> {
    for (;;) {
      const now = this.clock.now();
      this.prune(now);
      if (this.timestamps.length < this.maxRequests) {
        this.timestamps.push(now);
        return;
      }
      const waitMs = this.timestamps[0] + this.windowMs - now;
      log.debug(`Rate limit window full, waiting ${waitMs}ms`, { limit: this.maxRequests });
      await this.clock.sleep(waitMs);
    }
  }

  private prune(now: number): void {
    this.timestamps = this.timestamps.filter((t) => now - t < this.windowMs);
  }
}
