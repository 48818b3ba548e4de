import Database from 'better-sqlite3';
import { dirname } from 'node:path';
import { mkdirSync, unlinkSync } from 'node:fs';
import type { Entity, Fact } from './types.js';

/**
 * SQLite audit ledger.
 *
 * Append-only record of every accepted fact (one row per retrieval, so
 * re-fetches keep history), every validation rejection, and each entity
 * the first time a fact for it is accepted.
 *
 * The ledger is never read on the request path. If the DB can't be
 * opened it is deleted and recreated; losing it only loses audit history.
 */

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS facts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    entity_id TEXT NOT NULL,
    concept TEXT NOT NULL,
    period_end TEXT NOT NULL,
    fiscal_year INTEGER NOT NULL,
    fiscal_quarter INTEGER,
    frequency TEXT NOT NULL,
    value TEXT NOT NULL,
    unit TEXT NOT NULL,
    source_id TEXT NOT NULL,
    url TEXT NOT NULL,
    retrieved_at TEXT NOT NULL,
    UNIQUE(entity_id, concept, period_end, frequency, source_id, retrieved_at)
  );
  CREATE INDEX IF NOT EXISTS facts_by_key ON facts (entity_id, concept, period_end, frequency);
  CREATE TABLE IF NOT EXISTS rejections (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    entity_id TEXT NOT NULL,
    concept TEXT NOT NULL,
    period_end TEXT NOT NULL,
    frequency TEXT NOT NULL,
    value TEXT NOT NULL,
    source_id TEXT NOT NULL,
    reason TEXT NOT NULL,
    rejected_at TEXT NOT NULL
  );
  CREATE TABLE IF NOT EXISTS entities (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    tickers TEXT NOT NULL,
    registered_at TEXT NOT NULL
  );
`;

export interface LedgerStats {
  facts: number;
  rejections: number;
  entities: number;
}

export interface StoredFactRow {
  entity_id: string;
  concept: string;
  period_end: string;
  frequency: string;
  value: string;
  source_id: string;
  retrieved_at: string;
}

/** The subset of the ledger the router writes to */
export interface AuditSink {
  recordFact(fact: Fact): void;
  recordRejection(fact: Fact, reason: string): void;
  registerEntity(entity: Entity): boolean;
}

export class FactLedger implements AuditSink {
  private readonly db: Database.Database;

  constructor(path: string) {
    this.db = FactLedger.open(path);
  }

  private static open(path: string): Database.Database {
    if (path !== ':memory:') mkdirSync(dirname(path), { recursive: true });

    try {
      return FactLedger.init(new Database(path));
    } catch {
      // Corrupted file: delete and recreate
      for (const suffix of ['', '-wal', '-shm']) {
        try { unlinkSync(path + suffix); } catch { /* already gone */ }
      }
      return FactLedger.init(new Database(path));
    }
  }

  private static init(db: Database.Database): Database.Database {
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 3000');
    db.exec(SCHEMA);
    return db;
  }

  recordFact(fact: Fact): void {
    this.db.prepare(`
      INSERT OR IGNORE INTO facts
        (entity_id, concept, period_end, fiscal_year, fiscal_quarter, frequency, value, unit, source_id, url, retrieved_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      fact.entity_id, fact.concept, fact.period_end, fact.fiscal_year, fact.fiscal_quarter,
      fact.frequency, fact.value, fact.unit, fact.source_id, fact.url, fact.retrieved_at
    );
  }

  recordRejection(fact: Fact, reason: string): void {
    this.db.prepare(`
      INSERT INTO rejections (entity_id, concept, period_end, frequency, value, source_id, reason, rejected_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      fact.entity_id, fact.concept, fact.period_end, fact.frequency,
      fact.value, fact.source_id, reason, new Date().toISOString()
    );
  }

  /** Returns true when the entity was not known before */
  registerEntity(entity: Entity): boolean {
    const result = this.db.prepare(`
      INSERT OR IGNORE INTO entities (id, name, tickers, registered_at) VALUES (?, ?, ?, ?)
    `).run(entity.id, entity.name, entity.tickers.join(','), new Date().toISOString());
    return result.changes > 0;
  }

  /** Full retrieval history for one fact key, oldest first */
  history(entityId: string, concept: string, periodEnd: string, frequency: string): StoredFactRow[] {
    return this.db.prepare(`
      SELECT entity_id, concept, period_end, frequency, value, source_id, retrieved_at
      FROM facts WHERE entity_id = ? AND concept = ? AND period_end = ? AND frequency = ?
      ORDER BY id
    `).all(entityId, concept, periodEnd, frequency) as StoredFactRow[];
  }

  rejectionReasons(entityId: string, concept: string): string[] {
    const rows = this.db.prepare(
      'SELECT reason FROM rejections WHERE entity_id = ? AND concept = ? ORDER BY id'
    ).all(entityId, concept) as Array<{ reason: string }>;
    return rows.map(r => r.reason);
  }

  stats(): LedgerStats {
    const count = (table: string) =>
      (this.db.prepare(`SELECT COUNT(*) as count FROM ${table}`).get() as { count: number }).count;
    return { facts: count('facts'), rejections: count('rejections'), entities: count('entities') };
  }

  close(): void {
    this.db.close();
  }
}

/** Used when LEDGER_PATH=off */
export class NullLedger implements AuditSink {
  recordFact(): void {}
  recordRejection(): void {}
  registerEntity(): boolean {
    return false;
  }
}
