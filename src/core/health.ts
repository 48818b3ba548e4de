/**
 * Per-adapter health, fed by the router.
 *
 * An adapter that fails transiently `failureThreshold` times in a row is
 * degraded for `cooldownMs`: it moves behind healthy adapters in the chain
 * but is still tried. Any successful round trip resets it.
 */

export type AdapterStatus = 'healthy' | 'degraded';
export type OverallStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface AdapterHealth {
  id: string;
  tier: number;
  status: AdapterStatus;
  consecutive_failures: number;
  last_error: string | null;
  last_error_at: string | null;
  last_success_at: string | null;
}

interface HealthState {
  failures: number;
  lastError: string | null;
  lastErrorAt: number | null;
  lastSuccessAt: number | null;
  degradedUntil: number;
}

export interface HealthOptions {
  failureThreshold: number;
  cooldownMs: number;
  now?: () => number;
}

export interface Ranked {
  id: string;
  priorityTier: number;
}

export class HealthTracker {
  private readonly states = new Map<string, HealthState>();
  private readonly now: () => number;

  constructor(private readonly options: HealthOptions) {
    this.now = options.now ?? Date.now;
  }

  private state(id: string): HealthState {
    let s = this.states.get(id);
    if (!s) {
      s = { failures: 0, lastError: null, lastErrorAt: null, lastSuccessAt: null, degradedUntil: 0 };
      this.states.set(id, s);
    }
    return s;
  }

  recordSuccess(id: string): void {
    const s = this.state(id);
    s.failures = 0;
    s.degradedUntil = 0;
    s.lastSuccessAt = this.now();
  }

  recordFailure(id: string, message: string): void {
    const s = this.state(id);
    const now = this.now();
    s.failures += 1;
    s.lastError = message;
    s.lastErrorAt = now;
    if (s.failures >= this.options.failureThreshold) s.degradedUntil = now + this.options.cooldownMs;
  }

  status(id: string): AdapterStatus {
    return this.state(id).degradedUntil > this.now() ? 'degraded' : 'healthy';
  }

  /** Healthy adapters first, then by tier; registration order breaks ties */
  order<T extends Ranked>(adapters: T[]): T[] {
    return adapters
      .map((adapter, index) => ({ adapter, index, degraded: this.status(adapter.id) === 'degraded' ? 1 : 0 }))
      .sort((a, b) => a.degraded - b.degraded || a.adapter.priorityTier - b.adapter.priorityTier || a.index - b.index)
      .map(r => r.adapter);
  }

  snapshot(adapters: Ranked[]): AdapterHealth[] {
    const iso = (ms: number | null) => (ms === null ? null : new Date(ms).toISOString());
    return adapters.map(a => {
      const s = this.state(a.id);
      return {
        id: a.id,
        tier: a.priorityTier,
        status: this.status(a.id),
        consecutive_failures: s.failures,
        last_error: s.lastError,
        last_error_at: iso(s.lastErrorAt),
        last_success_at: iso(s.lastSuccessAt),
      };
    });
  }
}

export function overallStatus(adapters: AdapterHealth[]): OverallStatus {
  const healthy = adapters.filter(a => a.status === 'healthy').length;
  if (adapters.length > 0 && healthy === adapters.length) return 'healthy';
  return healthy > 0 ? 'degraded' : 'unhealthy';
}
