import type { EntityRef, Fact, PeriodHint } from '../core/types.js';
import { AdapterError } from '../core/errors.js';

/**
 * Uniform contract for an upstream data source.
 *
 * `fetch` returns every candidate fact it found for the concept; the
 * router picks the canonical one. Failures throw AdapterError. Adapters
 * keep no cache and mutate nothing shared.
 */
export interface SourceAdapter {
  readonly id: string;
  readonly priorityTier: number;
  readonly supportedConcepts: ReadonlySet<string>;
  fetch(entity: EntityRef, concept: string, hint: PeriodHint, signal: AbortSignal): Promise<Fact[]>;
}

export type FetchFn = typeof globalThis.fetch;

/**
 * GET a JSON document, translating transport failures into AdapterErrors:
 * 404 → NotFound, 429 → RateLimited, 5xx and network errors → Unavailable,
 * other statuses and unparseable bodies → Malformed.
 */
export async function getJson(
  fetchFn: FetchFn,
  adapterId: string,
  url: string,
  init: { headers?: Record<string, string>; signal: AbortSignal }
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetchFn(url, { headers: init.headers, signal: init.signal });
  } catch (err) {
    if (init.signal.aborted) throw init.signal.reason;
    const message = err instanceof Error ? err.message : String(err);
    throw new AdapterError('Unavailable', `Network error: ${message}`, adapterId);
  }

  if (response.status === 404) throw new AdapterError('NotFound', `404 for ${redactUrl(url)}`, adapterId);
  if (response.status === 429) {
    const retryAfter = parseInt(response.headers.get('Retry-After') ?? '', 10);
    throw new AdapterError('RateLimited', 'Rate limited', adapterId, isNaN(retryAfter) ? null : retryAfter * 1000);
  }
  if (response.status >= 500) {
    throw new AdapterError('Unavailable', `HTTP ${response.status} from ${redactUrl(url)}`, adapterId);
  }
  if (!response.ok) {
    throw new AdapterError('Malformed', `HTTP ${response.status} from ${redactUrl(url)}`, adapterId);
  }

  try {
    return await response.json();
  } catch {
    throw new AdapterError('Malformed', `Unparseable JSON from ${redactUrl(url)}`, adapterId);
  }
}

/** Strips credentials from query strings before a URL reaches logs or errors */
export function redactUrl(url: string): string {
  return url.replace(/([?&](?:token|key|api_key|apikey)=)[^&]*/gi, '$1[REDACTED]');
}
