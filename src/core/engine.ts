/**
 * KPI calculation engine: the single public entry point.
 *
 * compute(ticker, metric, request) resolves the metric's input subgraph
 * through the source router, evaluates KPIs in topological order with
 * decimal arithmetic, and composes a KpiResult with full provenance.
 * Used by both the CLI and the HTTP API.
 */

import type { Decimal } from 'decimal.js';
import type { Logger } from 'pino';
import type { EngineConfig } from './config.js';
import type {
  ConceptDefinition,
  FactInput,
  KpiInput,
  KpiResult,
  PeriodHint,
  PeriodRequest,
  ResolvedFact,
  TraceStep,
} from './types.js';
import {
  DeadlineExceededError,
  EngineError,
  InsufficientHistoryError,
  InvalidRequestError,
  NotFoundError,
  UndefinedError,
  ValidationFailedError,
  type SourceAttempt,
} from './errors.js';
import { FactStore } from './fact-store.js';
import { FactLedger, NullLedger, type AuditSink } from './ledger.js';
import { EntityRegistry } from './entities.js';
import { HealthTracker, overallStatus, type AdapterHealth, type OverallStatus } from './health.js';
import { SourceRouter } from './source-router.js';
import { AttemptTimeoutError, withTimeout } from './retry.js';
import { createChildLogger } from './logger.js';
import type { FetchFn, SourceAdapter } from '../adapters/types.js';
import { buildAdapters } from '../adapters/registry.js';
import { KpiRegistry } from '../processing/kpi-registry.js';
import { CONCEPT_DEFINITIONS } from '../processing/concept-definitions.js';
import { KPI_DEFINITIONS, type KpiDefinition } from '../processing/kpi-definitions.js';
import { Validator } from '../processing/validation.js';
import { DivisionByZeroError, formatDecimal, sum, toDecimal } from '../processing/calculations.js';
import { hintFor, periodLabel, periodToken, trailingQuarters } from '../analysis/period-parser.js';
import { composeResult } from '../analysis/composer.js';

export interface EngineDeps {
  adapters?: SourceAdapter[];
  fetchFn?: FetchFn;
  store?: FactStore;
  ledger?: AuditSink;
  validator?: Validator;
  registry?: KpiRegistry;
  health?: HealthTracker;
  random?: () => number;
  logger?: Logger;
}

export interface ComputeOptions {
  /** Overrides the configured request deadline */
  deadlineMs?: number;
  /** Caller cancellation, e.g. a closed HTTP connection */
  signal?: AbortSignal;
}

export type ComputeOutcome =
  | { success: true; result: KpiResult }
  | { success: false; error: EngineError };

export interface EngineStatus {
  status: OverallStatus;
  adapters: AdapterHealth[];
  store: { entries: number; inFlight: number };
  entities: number;
}

const TICKER_RE = /^[A-Za-z][A-Za-z0-9.-]{0,9}$/;
const TTM_QUARTERS = 4;

/** Per-request evaluation state; the memo lives and dies with one compute() call */
interface Evaluation {
  ticker: string;
  request: PeriodRequest;
  signal: AbortSignal;
  memo: Map<string, Promise<ResolvedFact>>;
}

type BaseOutcome =
  | { ok: true; input: FactInput; value: Decimal }
  | { ok: false; error: NotFoundError };

export class KpiEngine {
  readonly registry: KpiRegistry;
  private readonly router: SourceRouter;
  private readonly store: FactStore;
  private readonly validator: Validator;
  private readonly entities: EntityRegistry;
  private readonly ledger: AuditSink;
  private readonly topTier: number;
  private readonly log: Logger;

  constructor(private readonly config: EngineConfig, deps: EngineDeps = {}) {
    this.log = deps.logger ?? createChildLogger('engine');
    this.registry = deps.registry ?? new KpiRegistry(CONCEPT_DEFINITIONS, KPI_DEFINITIONS);
    this.validator = deps.validator ?? Validator.fromFile(config.plausibilityPath);
    this.store = deps.store ?? new FactStore();
    this.ledger = deps.ledger ?? (config.ledgerPath ? new FactLedger(config.ledgerPath) : new NullLedger());
    this.entities = new EntityRegistry(this.ledger);

    const adapters = deps.adapters ?? buildAdapters(config, this.registry.conceptList(), deps.fetchFn);
    this.topTier = adapters.reduce((min, a) => Math.min(min, a.priorityTier), Infinity);

    this.router = new SourceRouter({
      adapters,
      store: this.store,
      validator: this.validator,
      concepts: id => this.registry.concept(id),
      health: deps.health ?? new HealthTracker({
        failureThreshold: config.healthFailureThreshold,
        cooldownMs: config.healthCooldownMs,
      }),
      entities: this.entities,
      ledger: this.ledger,
      timeoutMs: config.adapterTimeoutMs,
      maxRetries: config.adapterMaxRetries,
      retryBaseDelayMs: config.retryBaseDelayMs,
      factTtlMs: config.factTtlMs,
      liveFactTtlMs: config.liveFactTtlMs,
      random: deps.random,
    });

    this.log.debug({
      concepts: this.registry.conceptList().length,
      kpis: this.registry.kpiList().length,
      adapters: adapters.map(a => `${a.id}(tier ${a.priorityTier})`),
    }, 'engine ready');
  }

  /**
   * Compute one metric for one ticker. Returns the result or the engine
   * error that explains why there is none; anything else is a bug and throws.
   */
  async compute(ticker: string, metric: string, request: PeriodRequest, options: ComputeOptions = {}): Promise<ComputeOutcome> {
    const started = Date.now();
    const deadlineMs = options.deadlineMs ?? this.config.requestDeadlineMs;

    try {
      if (!TICKER_RE.test(ticker)) throw new InvalidRequestError(`Invalid ticker "${ticker}"`);
      if (!this.registry.has(metric)) {
        throw new InvalidRequestError(`Unknown metric "${metric}"`, this.registry.names());
      }

      const result = await withTimeout(
        signal => this.evaluate({ ticker: ticker.toUpperCase(), request, signal, memo: new Map() }, metric),
        deadlineMs,
        options.signal
      );

      this.log.info({
        metric, ticker, period: result.period_used, confidence: result.confidence, duration_ms: Date.now() - started,
      }, 'computed');
      return { success: true, result };
    } catch (err) {
      const error = err instanceof AttemptTimeoutError ? new DeadlineExceededError(deadlineMs) : err;
      if (error instanceof EngineError) {
        this.log.info({ metric, ticker, kind: error.kind, duration_ms: Date.now() - started }, error.message);
        return { success: false, error };
      }
      throw error;
    }
  }

  status(): EngineStatus {
    const adapters = this.router.health();
    return {
      status: overallStatus(adapters),
      adapters,
      store: this.store.stats(),
      entities: this.entities.size(),
    };
  }

  close(): void {
    if (this.ledger instanceof FactLedger) this.ledger.close();
  }

  // ── Evaluation ───────────────────────────────────────────────────────

  private async evaluate(ev: Evaluation, metric: string): Promise<KpiResult> {
    const order = this.registry.subgraph(metric);
    const bases = this.registry.baseInputs(metric);

    const hint = ev.request.period.kind === 'latest'
      ? await this.pinLatest(ev, bases)
      : hintFor(ev.request);
    const period = periodToken(hint);

    // All base inputs in parallel; outcomes are read back in topological order
    const settled = await Promise.allSettled(bases.map(name => this.baseInput(ev, name, hint)));
    const outcomes = new Map<string, BaseOutcome>();
    settled.forEach((s, i) => {
      if (s.status === 'fulfilled') outcomes.set(bases[i], s.value);
    });
    const firstFatal = settled.find((s): s is PromiseRejectedResult => s.status === 'rejected');
    if (firstFatal) throw firstFatal.reason;

    const values = new Map<string, Decimal>();
    const inputs = new Map<string, FactInput | KpiInput>();
    const undefinedBy = new Map<string, EngineError>();
    const steps = new Map<string, TraceStep>();

    for (const name of order) {
      const node = this.registry.node(name);
      if (!node) continue;

      if (node.kind === 'concept') {
        const outcome = outcomes.get(name);
        if (!outcome) continue;
        if (!outcome.ok) {
          undefinedBy.set(name, outcome.error);
          continue;
        }
        values.set(name, outcome.value);
        inputs.set(name, outcome.input);
        steps.set(name, {
          name,
          formula: ev.request.ttm && node.definition.aggregation === 'flow' ? 'sum of 4 quarters' : 'reported',
          value: outcome.input.value,
          period,
        });
        continue;
      }

      const def = node.definition;
      const missing = def.inputs.filter(i => undefinedBy.has(i));
      if (missing.length > 0) {
        const diagnostics = missing.flatMap(m => undefinedBy.get(m)?.diagnostics ?? []);
        undefinedBy.set(name, new UndefinedError(
          name,
          `${name} is undefined: ${missing.join(', ')} ${missing.length > 1 ? 'are' : 'is'} unavailable or undefined`,
          diagnostics
        ));
        continue;
      }

      let value: Decimal;
      try {
        value = this.applyFormula(def, values);
      } catch (err) {
        if (err instanceof DivisionByZeroError) {
          undefinedBy.set(name, new UndefinedError(name, `${name} is undefined: division by zero (${err.denominator} is 0)`));
          continue;
        }
        throw err;
      }

      const verdict = this.validator.validateKpi(name, value);
      if (!verdict.ok) throw new ValidationFailedError(`${name} failed plausibility checks: ${verdict.reason}`);

      steps.set(name, { name, formula: def.formula, value: formatDecimal(value, def.unit_type), period });
      const result = composeResult({
        name,
        ticker: ev.ticker,
        value,
        unit: def.unit,
        unit_type: def.unit_type,
        period_used: period,
        frequency: hint.frequency,
        ttm: ev.request.ttm,
        inputs: Object.fromEntries(def.inputs.map(i => [i, this.inputFor(inputs, i)])),
        trace: this.traceFor(name, steps),
        topTier: this.topTier,
      });
      values.set(name, value);
      inputs.set(name, { type: 'kpi', result });
    }

    const failure = undefinedBy.get(metric);
    if (failure) {
      const notFound = bases.map(b => undefinedBy.get(b)).filter((e): e is EngineError => e instanceof NotFoundError);
      if (notFound.length === bases.length) {
        throw new NotFoundError(
          `No data for ${ev.ticker} ${metric} (${period}): ${notFound.map(e => e.message).join('; ')}`,
          notFound.flatMap(e => e.diagnostics)
        );
      }
      throw failure;
    }

    const top = inputs.get(metric);
    if (!top) throw new NotFoundError(`No data for ${ev.ticker} ${metric} (${period})`);
    if (top.type === 'kpi') return top.result;

    const concept = this.registry.concept(metric);
    const value = values.get(metric);
    if (!concept || !value) throw new NotFoundError(`No data for ${ev.ticker} ${metric} (${period})`);
    return composeResult({
      name: metric,
      ticker: ev.ticker,
      value,
      unit: concept.unit,
      unit_type: concept.unit_type,
      period_used: period,
      frequency: hint.frequency,
      ttm: ev.request.ttm,
      inputs: { [metric]: top },
      trace: this.traceFor(metric, steps),
      topTier: this.topTier,
    });
  }

  /** Trace steps for the subgraph under `name`, inputs first */
  private traceFor(name: string, steps: Map<string, TraceStep>): TraceStep[] {
    return this.registry.subgraph(name)
      .map(n => steps.get(n))
      .filter((s): s is TraceStep => s !== undefined);
  }

  private inputFor(inputs: Map<string, FactInput | KpiInput>, name: string): FactInput | KpiInput {
    const input = inputs.get(name);
    if (!input) throw new Error(`Input ${name} evaluated out of order`);
    return input;
  }

  private applyFormula(def: KpiDefinition, values: Map<string, Decimal>): Decimal {
    const args: Record<string, Decimal> = {};
    for (const i of def.inputs) {
      const v = values.get(i);
      if (!v) throw new Error(`Input ${i} of ${def.name} evaluated out of order`);
      args[i] = v;
    }
    return def.compute(args);
  }

  // ── Period pinning ───────────────────────────────────────────────────

  /**
   * For `latest`, the first base input (topological order) that has data
   * decides the fiscal period; every other input is then fetched for that
   * explicit period, so one result never mixes periods.
   */
  private async pinLatest(ev: Evaluation, bases: string[]): Promise<PeriodHint> {
    const latest = hintFor(ev.request);
    const misses: NotFoundError[] = [];

    for (const name of bases) {
      let resolved: ResolvedFact;
      try {
        resolved = await this.fetchFact(ev, name, latest);
      } catch (err) {
        if (err instanceof NotFoundError) {
          misses.push(err);
          continue;
        }
        throw err;
      }

      const { fact } = resolved;
      const pinned: PeriodHint = {
        frequency: latest.frequency,
        fiscal_year: fact.fiscal_year,
        fiscal_quarter: latest.frequency === 'Q' ? fact.fiscal_quarter : null,
        as_of: latest.as_of,
      };
      // Reuse the pinning fetch for the explicit period
      ev.memo.set(`${name}@${periodToken(pinned)}`, Promise.resolve(resolved));
      return pinned;
    }

    throw new NotFoundError(
      `No data for ${ev.ticker} (latest ${latest.frequency}): ${misses.map(e => e.message).join('; ')}`,
      misses.flatMap(e => e.diagnostics)
    );
  }

  // ── Base inputs ──────────────────────────────────────────────────────

  private fetchFact(ev: Evaluation, concept: string, hint: PeriodHint): Promise<ResolvedFact> {
    const key = `${concept}@${periodToken(hint)}`;
    let pending = ev.memo.get(key);
    if (!pending) {
      pending = this.router.fetch({ ticker: ev.ticker, concept, hint }, ev.signal);
      ev.memo.set(key, pending);
    }
    return pending;
  }

  /** NotFound is an outcome (it makes dependents undefined); every other error is fatal */
  private async baseInput(ev: Evaluation, name: string, hint: PeriodHint): Promise<BaseOutcome> {
    const concept = this.registry.concept(name);
    if (!concept) throw new InvalidRequestError(`Unknown concept "${name}"`);

    try {
      if (ev.request.ttm && concept.aggregation === 'flow') return await this.ttmInput(ev, concept, hint);

      const resolved = await this.fetchFact(ev, name, hint);
      const value = toDecimal(resolved.fact.value);
      if (!value) throw new ValidationFailedError(`${name} value "${resolved.fact.value}" is not a number`);
      return {
        ok: true,
        value,
        input: { type: 'fact', name, value: resolved.fact.value, unit: resolved.fact.unit, period: periodToken(hint), facts: [resolved] },
      };
    } catch (err) {
      if (err instanceof NotFoundError) return { ok: false, error: err };
      throw err;
    }
  }

  /** Sum of the four fiscal quarters ending at the anchor; fewer than four is an error, never a partial sum */
  private async ttmInput(ev: Evaluation, concept: ConceptDefinition, anchor: PeriodHint): Promise<BaseOutcome> {
    if (anchor.fiscal_year === null || anchor.fiscal_quarter === null) {
      throw new InvalidRequestError('TTM requires a quarterly anchor period');
    }

    const quarters = trailingQuarters(anchor.fiscal_year, anchor.fiscal_quarter, TTM_QUARTERS);
    const settled = await Promise.allSettled(
      quarters.map(q => this.fetchFact(ev, concept.id, { ...anchor, fiscal_year: q.fiscal_year, fiscal_quarter: q.fiscal_quarter }))
    );

    const found: ResolvedFact[] = [];
    const missing: string[] = [];
    const diagnostics: SourceAttempt[] = [];
    settled.forEach((s, i) => {
      if (s.status === 'fulfilled') found.push(s.value);
      else if (s.reason instanceof NotFoundError) {
        missing.push(periodLabel(quarters[i].fiscal_year, quarters[i].fiscal_quarter));
        diagnostics.push(...s.reason.diagnostics);
      }
    });
    const fatal = settled.find((s): s is PromiseRejectedResult => s.status === 'rejected' && !(s.reason instanceof NotFoundError));
    if (fatal) throw fatal.reason;

    if (found.length === 0) {
      throw new NotFoundError(`No quarterly ${concept.id} for ${ev.ticker} up to ${periodToken(anchor)}`, diagnostics);
    }
    if (found.length < TTM_QUARTERS) {
      throw new InsufficientHistoryError(
        `TTM ${concept.id} for ${ev.ticker} needs ${TTM_QUARTERS} quarters; missing ${missing.join(', ')}`,
        found.length,
        TTM_QUARTERS
      );
    }

    const values: Decimal[] = [];
    for (const r of found) {
      const v = toDecimal(r.fact.value);
      if (!v) throw new ValidationFailedError(`${concept.id} value "${r.fact.value}" is not a number`);
      values.push(v);
    }
    const total = sum(values);

    // A TTM sum is a full year of flow; it must fit the annual band
    const verdict = this.validator.validateValue(concept, total, 'A', ev.ticker);
    if (!verdict.ok) throw new ValidationFailedError(`TTM ${concept.id} failed plausibility checks: ${verdict.reason}`);

    return {
      ok: true,
      value: total,
      input: {
        type: 'fact',
        name: concept.id,
        value: total.toFixed(),
        unit: concept.unit,
        period: `TTM ${periodToken(anchor)}`,
        facts: found,
      },
    };
  }
}

export function createEngine(config: EngineConfig, deps: EngineDeps = {}): KpiEngine {
  return new KpiEngine(config, deps);
}
