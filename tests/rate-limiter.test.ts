import { describe, it, expect } from 'vitest';
import { RateLimiter, delay } from '../src/core/rate-limiter.js';

describe('RateLimiter', () => {
  it('allows immediate acquisition when tokens are available', async () => {
    const limiter = new RateLimiter(10);
    const start = Date.now();
    await limiter.acquire();
    const elapsed = Date.now() - start;
    expect(elapsed).toBeLessThan(10);
  });

  it('throttles when tokens are exhausted', async () => {
    const limiter = new RateLimiter(2);

    // Exhaust tokens
    await limiter.acquire();
    await limiter.acquire();

    // This should wait
    const start = Date.now();
    await limiter.acquire();
    const elapsed = Date.now() - start;
    expect(elapsed).toBeGreaterThan(100);
  });

  it('refills tokens over time', async () => {
    const limiter = new RateLimiter(10);

    for (let i = 0; i < 10; i++) {
      await limiter.acquire();
    }

    await new Promise(resolve => setTimeout(resolve, 200));

    const start = Date.now();
    await limiter.acquire();
    const elapsed = Date.now() - start;
    expect(elapsed).toBeLessThan(50);
  });

  it('lets an aborted waiter leave without blocking the queue', async () => {
    const limiter = new RateLimiter(1);
    await limiter.acquire();

    const controller = new AbortController();
    const waiting = limiter.acquire(controller.signal);
    controller.abort(new Error('cancelled'));
    await expect(waiting).rejects.toThrow('cancelled');

    // The next caller still gets a token once one refills
    await expect(limiter.acquire()).resolves.toBeUndefined();
  });
});

describe('delay', () => {
  it('rejects with the abort reason', async () => {
    const controller = new AbortController();
    const pending = delay(10_000, controller.signal);
    controller.abort(new Error('stop'));
    await expect(pending).rejects.toThrow('stop');
  });

  it('rejects at once when already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('already'));
    await expect(delay(10, controller.signal)).rejects.toThrow('already');
  });
});
