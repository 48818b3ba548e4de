import chalk from 'chalk';
import type { Confidence, FactInput, KpiInput, KpiResult, UnitKind } from '../core/types.js';
import type { EngineError } from '../core/errors.js';
import { InvalidRequestError } from '../core/errors.js';
import type { EngineStatus } from '../core/engine.js';
import type { KpiRegistry } from '../processing/kpi-registry.js';
import { serializeKpiResult } from '../web/serialization.js';
import { formatValue, padRight } from './format-utils.js';

/**
 * Terminal renderers for the CLI: one KPI result with its inputs,
 * calculation trace and citations, plus the registry and status listings.
 */

function confidenceLabel(c: Confidence): string {
  if (c === 'high') return chalk.green(c);
  if (c === 'medium') return chalk.yellow(c);
  return chalk.red(c);
}

function unitKindOf(unit: string): UnitKind {
  if (unit === 'ratio') return 'ratio';
  if (unit === 'shares') return 'shares';
  return 'currency';
}

function inputRow(name: string, input: FactInput | KpiInput): string[] {
  if (input.type === 'kpi') {
    const r = input.result;
    return [name, formatValue(r.value, r.unit_type), r.period_used, `derived (${r.confidence})`];
  }
  const sources = [...new Set(input.facts.map(f => f.fact.source_id))].join(', ');
  return [name, formatValue(input.value, unitKindOf(input.unit)), input.period, sources];
}

export function renderResult(result: KpiResult, displayName: string = result.kpi_name): string {
  const lines: string[] = [];

  const header = `${result.ticker} — ${displayName} (${result.ttm ? 'TTM ' : ''}${result.period_used})`;
  lines.push(chalk.bold(header));
  lines.push(chalk.dim('='.repeat(header.length)));
  lines.push('');
  lines.push(`  Value:       ${chalk.bold(formatValue(result.value, result.unit_type))} ${chalk.dim(`(${result.value} ${result.unit})`)}`);
  lines.push(`  Confidence:  ${confidenceLabel(result.confidence)}`);
  lines.push('');

  const rows = Object.entries(result.inputs_used).map(([name, input]) => inputRow(name, input));
  const widths = [0, 1, 2].map(col => Math.max(12, ...rows.map(r => r[col].length + 2)));
  lines.push(`  ${chalk.underline(padRight('Input', widths[0]))}${chalk.underline(padRight('Value', widths[1]))}${chalk.underline(padRight('Period', widths[2]))}${chalk.underline('Source')}`);
  for (const r of rows) {
    lines.push(`  ${padRight(r[0], widths[0])}${padRight(r[1], widths[1])}${padRight(r[2], widths[2])}${r[3]}`);
  }
  lines.push('');

  lines.push(chalk.dim('  -- Calculation ' + '-'.repeat(44)));
  for (const step of result.trace) {
    lines.push(chalk.dim(`  ${padRight(step.name, 28)}${padRight(step.formula, 34)}${step.value}`));
  }
  lines.push('');

  lines.push(chalk.dim('  -- Provenance ' + '-'.repeat(45)));
  for (const c of result.citations) {
    lines.push(chalk.dim(`  ${padRight(c.source, 20)}${padRight(c.period, 12)}${c.url}`));
  }
  if (result.quality_flags.length > 0) {
    lines.push(chalk.dim(`  Flags:    ${result.quality_flags.join(', ')}`));
  }

  return lines.join('\n');
}

export function renderResultJson(result: KpiResult): string {
  return JSON.stringify(serializeKpiResult(result), null, 2);
}

export function renderError(error: EngineError): string {
  const lines = [chalk.red(`${error.title}: ${error.message}`)];
  for (const d of error.diagnostics) {
    lines.push(chalk.dim(`  ${d.source}: ${d.outcome} after ${d.attempts} attempt${d.attempts === 1 ? '' : 's'} (${d.message})`));
  }
  if (error instanceof InvalidRequestError && error.available.length > 0) {
    lines.push(chalk.dim(`  Available: ${error.available.join(', ')}`));
  }
  return lines.join('\n');
}

export function renderRegistry(registry: KpiRegistry): string {
  const lines: string[] = [chalk.bold('\nBase Concepts\n')];
  for (const c of registry.conceptList()) {
    const tags = [c.aggregation, c.live ? 'live' : null].filter((t): t is string => t !== null).join(', ');
    lines.push(`  ${chalk.cyan(padRight(c.id, 30))}${padRight(c.display_name, 32)}${chalk.dim(tags)}`);
  }

  lines.push(chalk.bold('\nKPIs (evaluation order)\n'));
  for (const name of registry.kpiOrder()) {
    const k = registry.kpi(name);
    if (!k) continue;
    lines.push(`  ${chalk.cyan(padRight(k.name, 30))}${k.display_name}`);
    lines.push(`  ${''.padEnd(30)}${chalk.dim(`${k.formula}  [${k.unit}]`)}`);
  }
  lines.push('');
  return lines.join('\n');
}

export function renderStatus(status: EngineStatus): string {
  const color = status.status === 'healthy' ? chalk.green : status.status === 'degraded' ? chalk.yellow : chalk.red;
  const lines = [`\n  Overall: ${color(status.status)}\n`];
  for (const a of status.adapters) {
    const line = `  ${padRight(a.id, 22)}tier ${a.tier}  ${padRight(a.status, 10)}failures ${a.consecutive_failures}`;
    lines.push(a.status === 'healthy' ? line : chalk.yellow(line));
    if (a.last_error) lines.push(chalk.dim(`  ${''.padEnd(22)}last error: ${a.last_error}`));
  }
  lines.push(`\n  Fact store: ${status.store.entries} entries, ${status.store.inFlight} in flight`);
  lines.push(`  Entities:   ${status.entities}\n`);
  return lines.join('\n');
}
