import type { Logger } from 'pino';
import type { ConceptDefinition, Fact, FactKey, PeriodHint, ResolvedFact } from './types.js';
import type { SourceAdapter } from '../adapters/types.js';
import type { AuditSink } from './ledger.js';
import type { Validator } from '../processing/validation.js';
import type { FactStore } from './fact-store.js';
import type { EntityRegistry } from './entities.js';
import { HealthTracker, type AdapterHealth } from './health.js';
import { AttemptTimeoutError, backoffDelay, withTimeout } from './retry.js';
import { delay } from './rate-limiter.js';
import {
  AdapterError,
  AmbiguousPeriodError,
  InvalidRequestError,
  NotFoundError,
  SourceUnavailableError,
  ValidationFailedError,
  type SourceAttempt,
} from './errors.js';
import { resolvePeriod, type PeriodResolution } from '../processing/period-resolver.js';
import { periodLabel, periodToken } from '../analysis/period-parser.js';
import { createChildLogger } from './logger.js';

/**
 * Routes fact requests across the adapter chain.
 *
 * Per key: Fact Store hit → done. Otherwise adapters are tried in order
 * (health first, then tier). Transient errors are retried with backoff;
 * NotFound and Malformed fall through to the next adapter at once. The
 * first candidate that resolves to one period and passes validation is
 * written through to the store. Rejected values are never cached.
 */

export interface RouterOptions {
  adapters: SourceAdapter[];
  store: FactStore;
  validator: Validator;
  concepts: (id: string) => ConceptDefinition | undefined;
  health: HealthTracker;
  entities?: EntityRegistry;
  ledger?: AuditSink;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  factTtlMs: number;
  liveFactTtlMs: number;
  random?: () => number;
  logger?: Logger;
}

export interface FactRequest {
  ticker: string;
  concept: string;
  hint: PeriodHint;
}

type AttemptResult =
  | { ok: true; facts: Fact[]; attempts: number }
  | { ok: false; error: AdapterError; attempts: number };

type SourceOutcome =
  | { ok: true; resolved: ResolvedFact }
  | { ok: false; attempt: SourceAttempt };

const isTransient = (d: SourceAttempt) => d.outcome === 'Unavailable' || d.outcome === 'RateLimited';

export class SourceRouter {
  private readonly log: Logger;

  constructor(private readonly options: RouterOptions) {
    this.log = options.logger ?? createChildLogger('router');
  }

  get adapters(): readonly SourceAdapter[] {
    return this.options.adapters;
  }

  async fetch(request: FactRequest, signal: AbortSignal): Promise<ResolvedFact> {
    const concept = this.options.concepts(request.concept);
    if (!concept) throw new InvalidRequestError(`Unknown concept "${request.concept}"`);

    const key: FactKey = {
      entity: request.ticker,
      concept: concept.id,
      period: periodToken(request.hint),
      frequency: request.hint.frequency,
      as_of: request.hint.as_of,
    };
    return this.options.store.getOrFetch(key, s => this.fetchFromSources(request, concept, key, s), signal);
  }

  health(): AdapterHealth[] {
    return this.options.health.snapshot(this.options.adapters);
  }

  // ── Fallback chain ───────────────────────────────────────────────────

  private async fetchFromSources(
    request: FactRequest,
    concept: ConceptDefinition,
    key: FactKey,
    signal: AbortSignal
  ): Promise<ResolvedFact> {
    const supporting = this.options.adapters.filter(a => a.supportedConcepts.has(concept.id));
    const chain = this.options.health.order(supporting);
    const what = `${concept.id} for ${request.ticker.toUpperCase()} (${key.period}, ${key.frequency})`;

    if (chain.length === 0) throw new NotFoundError(`No configured source provides ${concept.id}`);

    const diagnostics: SourceAttempt[] = [];
    for (const adapter of chain) {
      signal.throwIfAborted();
      const outcome = await this.trySource(adapter, request, concept, key, diagnostics.length > 0, signal);
      if (outcome.ok) return outcome.resolved;
      diagnostics.push(outcome.attempt);
    }

    const summary = diagnostics.map(d => `${d.source}: ${d.outcome} (${d.message})`).join('; ');
    if (diagnostics.every(isTransient)) {
      throw new SourceUnavailableError(`All sources failed for ${what}: ${summary}`, diagnostics);
    }
    if (diagnostics.some(d => d.outcome === 'Ambiguous')) {
      throw new AmbiguousPeriodError(`Could not resolve one period for ${what}: ${summary}`, diagnostics);
    }
    if (diagnostics.some(d => d.outcome === 'Rejected')) {
      throw new ValidationFailedError(`Every value for ${what} failed plausibility checks: ${summary}`, diagnostics);
    }
    if (diagnostics.some(isTransient)) {
      throw new SourceUnavailableError(`No usable source for ${what}: ${summary}`, diagnostics);
    }
    throw new NotFoundError(`No source has ${what}: ${summary}`, diagnostics);
  }

  private async trySource(
    adapter: SourceAdapter,
    request: FactRequest,
    concept: ConceptDefinition,
    key: FactKey,
    fallback: boolean,
    signal: AbortSignal
  ): Promise<SourceOutcome> {
    const fail = (outcome: SourceAttempt['outcome'], message: string, attempts: number): SourceOutcome =>
      ({ ok: false, attempt: { source: adapter.id, outcome, message, attempts } });

    const result = await this.fetchWithRetry(adapter, request, concept, signal);
    if (!result.ok) return fail(result.error.kind, result.error.message, result.attempts);

    let picked: PeriodResolution | null;
    try {
      picked = resolvePeriod(result.facts, request.hint, concept.aggregation);
    } catch (err) {
      if (err instanceof AmbiguousPeriodError) return fail('Ambiguous', err.message, result.attempts);
      throw err;
    }
    if (!picked) {
      return fail('NotFound', `no ${key.period} candidate among ${result.facts.length} facts`, result.attempts);
    }

    const { fact } = picked;
    const verdict = this.options.validator.validateFact(fact, concept, request.ticker);
    if (!verdict.ok) {
      this.options.store.invalidate(key);
      this.log.warn(
        { concept: concept.id, ticker: request.ticker, value: fact.value, source: adapter.id, reason: verdict.reason },
        'validation rejected fact'
      );
      this.audit(sink => sink.recordRejection(fact, verdict.reason));
      return fail('Rejected', verdict.reason, result.attempts);
    }

    const resolved: ResolvedFact = {
      fact,
      resolution: picked.resolution,
      source_tier: adapter.priorityTier,
      fallback_used: fallback,
    };
    this.writeThrough(key, resolved, concept);
    this.audit(sink => sink.recordFact(fact));
    this.options.entities?.register({ id: fact.entity_id, name: fact.entity_name, tickers: [request.ticker] });
    return { ok: true, resolved };
  }

  private async fetchWithRetry(
    adapter: SourceAdapter,
    request: FactRequest,
    concept: ConceptDefinition,
    signal: AbortSignal
  ): Promise<AttemptResult> {
    const { health, timeoutMs, maxRetries } = this.options;

    for (let attempt = 1; ; attempt++) {
      try {
        const facts = await withTimeout(
          s => adapter.fetch({ ticker: request.ticker }, concept.id, request.hint, s),
          timeoutMs,
          signal
        );
        health.recordSuccess(adapter.id);
        return { ok: true, facts, attempts: attempt };
      } catch (err) {
        if (signal.aborted) throw signal.reason;
        const error = toAdapterError(err, adapter.id);

        if (error.kind === 'NotFound') health.recordSuccess(adapter.id);
        else if (error.retryable) health.recordFailure(adapter.id, error.message);

        this.log.debug({ adapter: adapter.id, concept: concept.id, attempt, kind: error.kind }, error.message);

        if (!error.retryable || attempt > maxRetries) return { ok: false, error, attempts: attempt };

        const wait = backoffDelay(
          attempt - 1,
          { baseDelayMs: this.options.retryBaseDelayMs, random: this.options.random },
          error.retryAfterMs
        );
        this.log.info({ adapter: adapter.id, attempt, wait: Math.round(wait), kind: error.kind }, 'retrying adapter');
        await delay(wait, signal);
      }
    }
  }

  // ── Write-through ────────────────────────────────────────────────────

  private writeThrough(key: FactKey, resolved: ResolvedFact, concept: ConceptDefinition): void {
    const ttl = concept.live ? this.options.liveFactTtlMs : this.options.factTtlMs;
    const { store } = this.options;
    store.put(key, resolved, ttl);

    // A `latest` lookup also fills the explicit fiscal key it resolved to
    const { fact } = resolved;
    const canonical = periodLabel(fact.fiscal_year, key.frequency === 'Q' ? fact.fiscal_quarter : null);
    if (canonical !== key.period) store.put({ ...key, period: canonical }, resolved, ttl);
  }

  private audit(write: (sink: AuditSink) => void): void {
    const { ledger } = this.options;
    if (!ledger) return;
    try {
      write(ledger);
    } catch (err) {
      this.log.error({ err }, 'fact ledger write failed');
    }
  }
}

function toAdapterError(err: unknown, adapterId: string): AdapterError {
  if (err instanceof AdapterError) return err;
  if (err instanceof AttemptTimeoutError) return new AdapterError('Unavailable', err.message, adapterId);
  const message = err instanceof Error ? err.message : String(err);
  return new AdapterError('Malformed', `Unexpected adapter failure: ${message}`, adapterId);
}
