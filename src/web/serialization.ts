/**
 * Shared serialization helpers for the web API layer.
 * Converts engine results to JSON-safe objects and engine errors to
 * problem-details bodies.
 */

import type { FactInput, KpiInput, KpiResult } from '../core/types.js';
import type { EngineError } from '../core/errors.js';
import { InvalidRequestError } from '../core/errors.js';
import type { KpiRegistry } from '../processing/kpi-registry.js';
import type { EngineStatus } from '../core/engine.js';

// ── Error Mapping ─────────────────────────────────────────────────────

export const PROBLEM_CONTENT_TYPE = 'application/problem+json';

export interface ProblemDetails {
  type: string;
  title: string;
  detail: string;
  status: number;
  diagnostics?: Array<{ source: string; outcome: string; message: string; attempts: number }>;
  available?: string[];
}

export function errorToHttpStatus(error: EngineError): number {
  return error.status;
}

export function serializeProblem(error: EngineError): ProblemDetails {
  const body: ProblemDetails = {
    type: error.kind,
    title: error.title,
    detail: error.message,
    status: errorToHttpStatus(error),
  };
  if (error.diagnostics.length > 0) body.diagnostics = error.diagnostics;
  if (error instanceof InvalidRequestError && error.available.length > 0) body.available = error.available;
  return body;
}

export function internalProblem(): ProblemDetails {
  return { type: 'Internal', title: 'Internal server error', detail: 'Internal server error', status: 500 };
}

// ── Result Serializers ────────────────────────────────────────────────

function serializeInput(input: FactInput | KpiInput) {
  if (input.type === 'fact') {
    return {
      value: Number(input.value),
      unit: input.unit,
      period: input.period,
      sources: [...new Set(input.facts.map(f => f.fact.source_id))],
    };
  }
  return {
    value: Number(input.result.value),
    unit: input.result.unit,
    period: input.result.period_used,
    confidence: input.result.confidence,
  };
}

export function serializeKpiResult(r: KpiResult) {
  return {
    ticker: r.ticker,
    metric: r.kpi_name,
    value: Number(r.value),
    unit: r.unit,
    period: r.period_used,
    frequency: r.frequency,
    ttm: r.ttm,
    confidence: r.confidence,
    citations: r.citations,
    inputs: Object.fromEntries(Object.entries(r.inputs_used).map(([name, input]) => [name, serializeInput(input)])),
    trace: r.trace.map(s => ({ ...s, value: Number(s.value) })),
    quality_flags: r.quality_flags,
  };
}

export function serializeRegistry(registry: KpiRegistry) {
  return {
    concepts: registry.conceptList().map(c => ({
      id: c.id,
      display_name: c.display_name,
      statement_type: c.statement_type,
      unit: c.unit,
      aggregation: c.aggregation,
      live: c.live,
    })),
    kpis: registry.kpiList().map(k => ({
      name: k.name,
      display_name: k.display_name,
      description: k.description,
      inputs: k.inputs,
      formula: k.formula,
      unit: k.unit,
    })),
    evaluation_order: registry.kpiOrder(),
  };
}

export function serializeStatus(s: EngineStatus) {
  return {
    status: s.status,
    sources: s.adapters,
    fact_store: { entries: s.store.entries, in_flight: s.store.inFlight },
    entities: s.entities,
  };
}
