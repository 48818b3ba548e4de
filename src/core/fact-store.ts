import type { FactKey, ResolvedFact } from './types.js';

/**
 * In-memory store of canonical facts with TTL expiry and single-flight fetches.
 *
 * At most one fetch per key is in flight at any time: concurrent callers
 * for the same key join the running fetch and all observe its outcome.
 * Failures are not cached, so the next caller after a failure starts over.
 *
 * A caller may bring its own AbortSignal. Aborting only detaches that
 * caller; the shared fetch is cancelled once every caller has left.
 */

interface Entry {
  value: ResolvedFact;
  expiresAt: number;
}

interface InFlight {
  promise: Promise<ResolvedFact>;
  controller: AbortController;
  waiters: number;
}

export type FetchFn = (signal: AbortSignal) => Promise<ResolvedFact>;

export interface FactStoreOptions {
  /** Clock in ms, injectable for tests */
  now?: () => number;
  maxEntries?: number;
}

export class FactStore {
  private readonly entries = new Map<string, Entry>();
  private readonly inflight = new Map<string, InFlight>();
  private readonly now: () => number;
  private readonly maxEntries: number;

  constructor(options: FactStoreOptions = {}) {
    this.now = options.now ?? Date.now;
    this.maxEntries = options.maxEntries ?? 10_000;
  }

  static keyOf(key: FactKey): string {
    return `${key.entity.toUpperCase()}|${key.concept}|${key.period}|${key.frequency}|${key.as_of}`;
  }

  /** Synchronous lookup; never waits on a fetch */
  get(key: FactKey): ResolvedFact | undefined {
    const k = FactStore.keyOf(key);
    const entry = this.entries.get(k);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(k);
      return undefined;
    }
    return entry.value;
  }

  put(key: FactKey, value: ResolvedFact, ttlMs: number): void {
    const k = FactStore.keyOf(key);
    // Re-insert so that Map order tracks recency of writes
    this.entries.delete(k);
    if (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next().value;
      if (oldest !== undefined) this.entries.delete(oldest);
    }
    this.entries.set(k, { value, expiresAt: this.now() + ttlMs });
  }

  invalidate(key: FactKey): boolean {
    return this.entries.delete(FactStore.keyOf(key));
  }

  async getOrFetch(key: FactKey, fetchFn: FetchFn, signal?: AbortSignal): Promise<ResolvedFact> {
    const hit = this.get(key);
    if (hit) return hit;

    const k = FactStore.keyOf(key);
    let flight = this.inflight.get(k);
    if (!flight) {
      const controller = new AbortController();
      const promise: Promise<ResolvedFact> = fetchFn(controller.signal).finally(() => {
        if (this.inflight.get(k)?.promise === promise) this.inflight.delete(k);
      });
      // Every waiter gets the rejection through join(); this handler only
      // keeps a flight whose waiters all left from surfacing as unhandled.
      promise.catch(() => undefined);
      flight = { promise, controller, waiters: 0 };
      this.inflight.set(k, flight);
    }

    return this.join(k, flight, signal);
  }

  private join(k: string, flight: InFlight, signal?: AbortSignal): Promise<ResolvedFact> {
    flight.waiters += 1;

    return new Promise<ResolvedFact>((resolve, reject) => {
      let settled = false;

      const onAbort = () => {
        if (settled) return;
        settled = true;
        flight.waiters -= 1;
        if (flight.waiters === 0) {
          if (this.inflight.get(k) === flight) this.inflight.delete(k);
          flight.controller.abort(signal?.reason);
        }
        reject(signal?.reason);
      };

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      flight.promise.then(
        value => {
          if (settled) return;
          settled = true;
          flight.waiters -= 1;
          signal?.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (err: unknown) => {
          if (settled) return;
          settled = true;
          flight.waiters -= 1;
          signal?.removeEventListener('abort', onAbort);
          reject(err);
        }
      );
    });
  }

  /** Number of keys with a fetch currently running */
  inFlightCount(): number {
    return this.inflight.size;
  }

  stats(): { entries: number; inFlight: number } {
    return { entries: this.entries.size, inFlight: this.inflight.size };
  }
}
