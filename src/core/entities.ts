import type { Entity } from './types.js';
import type { AuditSink } from './ledger.js';

/**
 * Companies seen so far. An entity is registered the first time one of
 * its facts is accepted and is never modified afterwards.
 */
export class EntityRegistry {
  private readonly byId = new Map<string, Entity>();
  private readonly idByTicker = new Map<string, string>();

  constructor(private readonly sink?: AuditSink) {}

  /** Returns true when the entity was new */
  register(entity: Entity): boolean {
    if (this.byId.has(entity.id)) return false;
    const frozen: Entity = Object.freeze({
      id: entity.id,
      name: entity.name,
      tickers: entity.tickers.map(t => t.toUpperCase()),
    });
    this.byId.set(frozen.id, frozen);
    for (const t of frozen.tickers) this.idByTicker.set(t, frozen.id);
    this.sink?.registerEntity(frozen);
    return true;
  }

  get(id: string): Entity | undefined {
    return this.byId.get(id);
  }

  byTicker(ticker: string): Entity | undefined {
    const id = this.idByTicker.get(ticker.toUpperCase());
    return id === undefined ? undefined : this.byId.get(id);
  }

  size(): number {
    return this.byId.size;
  }
}
