import { describe, it, expect } from 'vitest';
import { SlidingWindowRateLimiter, type Clock } from '../embeddings/rate-limiter.js';

/** Virtual clock: sleeping advances time instantly and records the wait */
function virtualClock(start = 0): Clock & { waits: number[]; advance(ms: number): void } {
  let t = start;
  const waits: number[] = [];
  return {
    waits,
    now: () => t,
    sleep: async (ms) => {
      waits.push(ms);
      t += ms;
    },
    advance(ms) {
      t += ms;
    },
  };
}

describe('SlidingWindowRateLimiter', () => {
  it('admits calls up to the limit without waiting', async () => {
    const clock = virtualClock();
    const limiter = new SlidingWindowRateLimiter(3, 60_000, clock);

    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();

    expect(clock.waits).toEqual([]);
    expect(limiter.inFlight()).toBe(3);
  });

  it('blocks until the oldest call leaves the window', async () => {
    const clock = virtualClock();
    const limiter = new SlidingWindowRateLimiter(2, 60_000, clock);

    await limiter.acquire(); // t=0
    clock.advance(10_000);
    await limiter.acquire(); // t=10s
    clock.advance(5_000);
    await limiter.acquire(); // full at t=15s, waits for the t=0 entry to expire

    expect(clock.waits).toEqual([45_000]);
    expect(clock.now()).toBe(60_000);
    expect(limiter.inFlight()).toBe(2);
  });

  it('prunes timestamps older than the window', async () => {
    const clock = virtualClock();
    const limiter = new SlidingWindowRateLimiter(1, 1_000, clock);

    await limiter.acquire();
    clock.advance(1_000);
    await limiter.acquire();

    expect(clock.waits).toEqual([]);
  });

  it('serializes concurrent acquirers', async () => {
    const clock = virtualClock();
    const limiter = new SlidingWindowRateLimiter(1, 1_000, clock);

    await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);

    expect(clock.waits).toEqual([1_000, 1_000]);
    expect(clock.now()).toBe(2_000);
  });

  it('rejects a non-positive configuration', () => {
    expect(() => new SlidingWindowRateLimiter(0, 1_000)).toThrow(RangeError);
    expect(() => new SlidingWindowRateLimiter(1, 0)).toThrow(RangeError);
  });
});
