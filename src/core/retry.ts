/**
 * Per-attempt timeouts and exponential backoff for adapter calls.
 */

export interface BackoffPolicy {
  baseDelayMs: number;
  /** Default: 2 */
  multiplier?: number;
  /** Default: 10000 */
  maxDelayMs?: number;
  /** Source of jitter in [0, 1); injectable for tests */
  random?: () => number;
}

/** A single attempt ran past its own timeout (not the request deadline) */
export class AttemptTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Attempt timed out after ${timeoutMs}ms`);
    this.name = 'AttemptTimeoutError';
  }
}

/**
 * Delay before retry number `retry` (0-based): base * multiplier^retry plus
 * up to 10% jitter, capped, and never shorter than a server's Retry-After.
 */
export function backoffDelay(retry: number, policy: BackoffPolicy, retryAfterMs: number | null = null): number {
  const multiplier = policy.multiplier ?? 2;
  const maxDelayMs = policy.maxDelayMs ?? 10_000;
  const random = policy.random ?? Math.random;

  const base = policy.baseDelayMs * Math.pow(multiplier, retry);
  const jitter = base * 0.1 * random();
  const delay = Math.min(base + jitter, maxDelayMs);
  return retryAfterMs !== null ? Math.max(delay, retryAfterMs) : delay;
}

/**
 * Runs `fn` with a signal that aborts after `timeoutMs` or when `parent`
 * aborts. Settles as soon as the signal fires even if `fn` ignores it.
 * On timeout the rejection is an AttemptTimeoutError; on parent abort it
 * is the parent's reason.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new AttemptTimeoutError(timeoutMs)), timeoutMs);
  const onParentAbort = () => controller.abort(parent?.reason);

  if (parent?.aborted) controller.abort(parent.reason);
  else parent?.addEventListener('abort', onParentAbort, { once: true });

  try {
    return await new Promise<T>((resolve, reject) => {
      const { signal } = controller;
      if (signal.aborted) {
        reject(signal.reason);
        return;
      }
      signal.addEventListener('abort', () => reject(signal.reason), { once: true });
      fn(signal).then(resolve, reject);
    });
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
