import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FactLedger, NullLedger } from '../src/core/ledger.js';
import { EntityRegistry } from '../src/core/entities.js';
import { makeFact } from './helpers.js';

describe('FactLedger', () => {
  let ledger: FactLedger;

  beforeEach(() => {
    ledger = new FactLedger(':memory:');
  });

  afterEach(() => {
    ledger.close();
  });

  it('starts empty', () => {
    expect(ledger.stats()).toEqual({ facts: 0, rejections: 0, entities: 0 });
  });

  it('keeps one row per retrieval so re-fetches preserve history', () => {
    ledger.recordFact(makeFact({ retrieved_at: '2024-12-01T00:00:00.000Z', value: '94930000000' }));
    ledger.recordFact(makeFact({ retrieved_at: '2025-11-01T00:00:00.000Z', value: '95100000000' }));
    // The same retrieval twice is one row
    ledger.recordFact(makeFact({ retrieved_at: '2025-11-01T00:00:00.000Z', value: '95100000000' }));

    const rows = ledger.history('0000320193', 'revenue', '2024-09-28', 'Q');
    expect(rows.map(r => r.value)).toEqual(['94930000000', '95100000000']);
    expect(ledger.stats().facts).toBe(2);
  });

  it('records rejections with their reason', () => {
    ledger.recordRejection(makeFact({ value: '1' }), '1 outside [20000000000, 120000000000] for AAPL revenue (Q)');
    expect(ledger.rejectionReasons('0000320193', 'revenue')).toEqual([
      '1 outside [20000000000, 120000000000] for AAPL revenue (Q)',
    ]);
    expect(ledger.stats().rejections).toBe(1);
  });

  it('registers each entity once', () => {
    const apple = { id: '0000320193', name: 'Apple Inc.', tickers: ['AAPL'] };
    expect(ledger.registerEntity(apple)).toBe(true);
    expect(ledger.registerEntity(apple)).toBe(false);
    expect(ledger.stats().entities).toBe(1);
  });
});

describe('EntityRegistry', () => {
  it('registers lazily and freezes entities', () => {
    const ledger = new FactLedger(':memory:');
    const entities = new EntityRegistry(ledger);

    expect(entities.register({ id: '0000320193', name: 'Apple Inc.', tickers: ['aapl'] })).toBe(true);
    expect(entities.register({ id: '0000320193', name: 'Renamed', tickers: ['AAPL'] })).toBe(false);

    const apple = entities.byTicker('AAPL');
    expect(apple?.name).toBe('Apple Inc.');
    expect(apple?.tickers).toEqual(['AAPL']);
    expect(Object.isFrozen(apple)).toBe(true);
    expect(entities.size()).toBe(1);
    expect(ledger.stats().entities).toBe(1);
    ledger.close();
  });

  it('works without a ledger', () => {
    const entities = new EntityRegistry(new NullLedger());
    entities.register({ id: '1', name: 'Example Corp', tickers: ['EXM'] });
    expect(entities.get('1')?.tickers).toEqual(['EXM']);
    expect(entities.byTicker('nope')).toBeUndefined();
  });
});
