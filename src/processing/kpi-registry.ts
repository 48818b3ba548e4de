import type { ConceptDefinition } from '../core/types.js';
import { KpiConfigurationError } from '../core/errors.js';
import type { KpiDefinition } from './kpi-definitions.js';

export type MetricNode =
  | { kind: 'concept'; name: string; definition: ConceptDefinition }
  | { kind: 'kpi'; name: string; definition: KpiDefinition };

/**
 * The KPI graph, built once at startup.
 *
 * Construction rejects duplicate names, unknown inputs and cycles with a
 * KpiConfigurationError, so a bad table never reaches request time.
 */
export class KpiRegistry {
  private readonly concepts = new Map<string, ConceptDefinition>();
  private readonly kpis = new Map<string, KpiDefinition>();
  /** Every node, inputs before dependents */
  private readonly topo: string[];

  constructor(concepts: ConceptDefinition[], kpis: KpiDefinition[]) {
    for (const c of concepts) {
      if (this.concepts.has(c.id)) throw new KpiConfigurationError(`Duplicate concept "${c.id}"`, [c.id]);
      this.concepts.set(c.id, c);
    }
    for (const k of kpis) {
      if (this.concepts.has(k.name) || this.kpis.has(k.name)) {
        throw new KpiConfigurationError(`Duplicate metric name "${k.name}"`, [k.name]);
      }
      this.kpis.set(k.name, k);
    }
    for (const k of kpis) {
      if (k.inputs.length === 0) throw new KpiConfigurationError(`KPI "${k.name}" has no inputs`, [k.name]);
      for (const input of k.inputs) {
        if (!this.concepts.has(input) && !this.kpis.has(input)) {
          throw new KpiConfigurationError(`KPI "${k.name}" depends on unknown input "${input}"`, [k.name, input]);
        }
      }
    }
    this.topo = this.sort();
  }

  // ── Topological sort ─────────────────────────────────────────────────

  private sort(): string[] {
    const order: string[] = [];
    const state = new Map<string, 'visiting' | 'done'>();

    const visit = (name: string, path: string[]) => {
      const s = state.get(name);
      if (s === 'done') return;
      if (s === 'visiting') {
        const cycle = [...path.slice(path.indexOf(name)), name];
        throw new KpiConfigurationError(`KPI dependency cycle: ${cycle.join(' -> ')}`, cycle);
      }
      state.set(name, 'visiting');
      for (const input of this.kpis.get(name)?.inputs ?? []) visit(input, [...path, name]);
      state.set(name, 'done');
      order.push(name);
    };

    for (const name of this.concepts.keys()) visit(name, []);
    for (const name of this.kpis.keys()) visit(name, []);
    return order;
  }

  // ── Lookup ───────────────────────────────────────────────────────────

  has(name: string): boolean {
    return this.concepts.has(name) || this.kpis.has(name);
  }

  node(name: string): MetricNode | undefined {
    const concept = this.concepts.get(name);
    if (concept) return { kind: 'concept', name, definition: concept };
    const kpi = this.kpis.get(name);
    if (kpi) return { kind: 'kpi', name, definition: kpi };
    return undefined;
  }

  concept(name: string): ConceptDefinition | undefined {
    return this.concepts.get(name);
  }

  kpi(name: string): KpiDefinition | undefined {
    return this.kpis.get(name);
  }

  /** All metric names, concepts first, in declaration order */
  names(): string[] {
    return [...this.concepts.keys(), ...this.kpis.keys()];
  }

  conceptList(): ConceptDefinition[] {
    return [...this.concepts.values()];
  }

  kpiList(): KpiDefinition[] {
    return [...this.kpis.values()];
  }

  /** KPI names in evaluation order */
  kpiOrder(): string[] {
    return this.topo.filter(n => this.kpis.has(n));
  }

  /**
   * The nodes `metric` transitively needs (itself included), in
   * topological order. Ordering follows the declared input order of each
   * formula, so the first entry is always the first base input reached.
   */
  subgraph(metric: string): string[] {
    const needed = new Set<string>();
    const order: string[] = [];
    const walk = (name: string) => {
      if (needed.has(name)) return;
      needed.add(name);
      for (const input of this.kpis.get(name)?.inputs ?? []) walk(input);
      order.push(name);
    };
    walk(metric);
    return order;
  }

  /** Base concepts under `metric`, in topological order */
  baseInputs(metric: string): string[] {
    return this.subgraph(metric).filter(n => this.concepts.has(n));
  }
}
