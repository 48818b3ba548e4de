import { describe, it, expect } from 'vitest';
import { AttemptTimeoutError, backoffDelay, withTimeout } from '../src/core/retry.js';

describe('backoffDelay', () => {
  const policy = { baseDelayMs: 100, random: () => 0 };

  it('grows exponentially', () => {
    expect(backoffDelay(0, policy)).toBe(100);
    expect(backoffDelay(1, policy)).toBe(200);
    expect(backoffDelay(3, policy)).toBe(800);
  });

  it('adds up to 10% jitter', () => {
    expect(backoffDelay(1, { baseDelayMs: 100, random: () => 0.5 })).toBe(210);
  });

  it('caps the delay', () => {
    expect(backoffDelay(20, policy)).toBe(10_000);
    expect(backoffDelay(5, { ...policy, maxDelayMs: 1000 })).toBe(1000);
  });

  it('never waits less than Retry-After', () => {
    expect(backoffDelay(0, policy, 3000)).toBe(3000);
    expect(backoffDelay(2, policy, 10)).toBe(400);
  });
});

describe('withTimeout', () => {
  it('resolves with the function result', async () => {
    await expect(withTimeout(async () => 42, 1000)).resolves.toBe(42);
  });

  it('rejects with AttemptTimeoutError when the attempt hangs', async () => {
    let seen: AbortSignal | undefined;
    const hang = (signal: AbortSignal) => {
      seen = signal;
      return new Promise<never>(() => undefined);
    };
    await expect(withTimeout(hang, 20)).rejects.toBeInstanceOf(AttemptTimeoutError);
    expect(seen?.aborted).toBe(true);
  });

  it('propagates the parent abort reason', async () => {
    const parent = new AbortController();
    const pending = withTimeout(() => new Promise<never>(() => undefined), 10_000, parent.signal);
    parent.abort(new Error('caller left'));
    await expect(pending).rejects.toThrow('caller left');
  });

  it('passes through errors from the function', async () => {
    await expect(withTimeout(async () => { throw new Error('boom'); }, 1000)).rejects.toThrow('boom');
  });
});
