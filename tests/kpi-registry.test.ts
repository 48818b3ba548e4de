import { describe, it, expect } from 'vitest';
import { KpiRegistry } from '../src/processing/kpi-registry.js';
import { CONCEPT_DEFINITIONS, getConceptDefinition } from '../src/processing/concept-definitions.js';
import { KPI_DEFINITIONS, type KpiDefinition } from '../src/processing/kpi-definitions.js';
import { KpiConfigurationError } from '../src/core/errors.js';

function kpi(name: string, inputs: string[]): KpiDefinition {
  return {
    name,
    display_name: name,
    description: name,
    inputs,
    unit: 'USD',
    unit_type: 'currency',
    formula: inputs.join(' + '),
    compute: v => inputs.map(i => v[i]).reduce((a, b) => a.plus(b)),
  };
}

describe('KpiRegistry', () => {
  describe('built-in catalogue', () => {
    const registry = new KpiRegistry(CONCEPT_DEFINITIONS, KPI_DEFINITIONS);

    it('loads every concept and KPI', () => {
      expect(registry.conceptList()).toHaveLength(15);
      expect(registry.kpiList()).toHaveLength(14);
      expect(registry.has('grossMargin')).toBe(true);
      expect(registry.has('revenue')).toBe(true);
      expect(registry.has('priceToEarnings')).toBe(false);
    });

    it('orders KPIs after their inputs', () => {
      const order = registry.kpiOrder();
      expect(order.indexOf('grossProfit')).toBeLessThan(order.indexOf('grossMargin'));
      expect(order.indexOf('ebitda')).toBeLessThan(order.indexOf('ebitdaMargin'));
      expect(order.indexOf('freeCashFlow')).toBeLessThan(order.indexOf('fcfMargin'));
    });

    it('returns the subgraph in declared input order', () => {
      expect(registry.subgraph('grossMargin')).toEqual(['revenue', 'costOfRevenue', 'grossProfit', 'grossMargin']);
      expect(registry.baseInputs('grossMargin')).toEqual(['revenue', 'costOfRevenue']);
    });

    it('treats a base concept as its own subgraph', () => {
      expect(registry.subgraph('revenue')).toEqual(['revenue']);
      expect(registry.node('revenue')?.kind).toBe('concept');
      expect(registry.node('grossProfit')?.kind).toBe('kpi');
      expect(registry.node('nothing')).toBeUndefined();
    });

    it('lists concepts before KPIs', () => {
      const names = registry.names();
      expect(names[0]).toBe('revenue');
      expect(names.indexOf('marketCap')).toBeLessThan(names.indexOf('grossProfit'));
    });
  });

  describe('configuration errors', () => {
    const revenue = getConceptDefinition('revenue');
    const cost = getConceptDefinition('costOfRevenue');
    if (!revenue || !cost) throw new Error('catalogue is missing base concepts');

    it('rejects cycles with the cycle path', () => {
      const build = () => new KpiRegistry([revenue], [
        kpi('a', ['b']),
        kpi('b', ['c', 'revenue']),
        kpi('c', ['a']),
      ]);
      expect(build).toThrow(KpiConfigurationError);
      expect(build).toThrow('KPI dependency cycle: a -> b -> c -> a');
    });

    it('rejects self references', () => {
      expect(() => new KpiRegistry([revenue], [kpi('loop', ['loop'])])).toThrow('KPI dependency cycle: loop -> loop');
    });

    it('rejects unknown inputs', () => {
      expect(() => new KpiRegistry([revenue], [kpi('x', ['revenue', 'ghost'])]))
        .toThrow('KPI "x" depends on unknown input "ghost"');
    });

    it('rejects duplicates across concepts and KPIs', () => {
      expect(() => new KpiRegistry([revenue, cost], [kpi('revenue', ['costOfRevenue'])]))
        .toThrow('Duplicate metric name "revenue"');
      expect(() => new KpiRegistry([revenue, revenue], [])).toThrow('Duplicate concept "revenue"');
    });

    it('rejects KPIs with no inputs', () => {
      expect(() => new KpiRegistry([revenue], [kpi('empty', [])])).toThrow('KPI "empty" has no inputs');
    });
  });
});
