import * as fs from 'fs';
import Database from 'better-sqlite3';
import { assertBeliefType, assertEpisodeType, assertMutationSource } from '../memory/entries.js';
import type { MemoryStore, MemoryStoreData } from '../memory/store.js';
import type {
  BeliefMemoryEntry,
  CanonicalFact,
  EpisodicMemoryEntry,
  LogFn,
  RelationshipEntry,
  WorldStateEntry,
} from '../memory/types.js';

interface BaseRow {
  id: string;
  source: string;
  category: string | null;
  created_at_ticks: number;
  sequence_number: number;
}

interface FactRow extends BaseRow {
  content: string;
  domain: string | null;
}

interface WorldStateRow extends BaseRow {
  key: string;
  value: string;
  modified_at_ticks: number;
  modification_count: number;
}

interface EpisodeRow extends BaseRow {
  description: string;
  episode_type: string;
  participant: string | null;
  significance: number;
  strength: number;
}

interface BeliefRow extends BaseRow {
  subject: string;
  content: string;
  belief_type: string;
  confidence: number;
  sentiment: number;
  evidence: string | null;
  is_contradicted: number;
  contradiction_reason: string | null;
}

interface RelationshipRow extends BaseRow {
  owner_npc_id: string;
  target_id: string;
  relationship_label: string;
  affinity: number;
  trust: number;
  familiarity: number;
}

function optional(value: string | null): string | undefined {
  return value ?? undefined;
}

function base(row: BaseRow) {
  return {
    id: row.id,
    source: assertMutationSource(row.source),
    category: optional(row.category),
    createdAtTicks: row.created_at_ticks,
    sequenceNumber: row.sequence_number,
  };
}

/**
 * SQLite snapshot of a MemoryStore. `save` replaces the stored snapshot in one
 * transaction; `load` restores entries verbatim and then re-derives the
 * store's next sequence number.
 */
export class MemoryDatabase {
  private db: Database.Database;

  constructor(dbPath: string, private onLog?: LogFn) {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.runMigrations();

    if (dbPath !== ':memory:') {
      try {
        fs.chmodSync(dbPath, 0o600);
      } catch (err) {
        this.onLog?.(`[db] Could not restrict permissions on ${dbPath}: ${String(err)}`);
      }
    }
  }

  private runMigrations(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS migrations (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT DEFAULT (datetime('now'))
      );
    `);

    const appliedMigrations = new Set(
      this.db.prepare<[], { name: string }>('SELECT name FROM migrations').all().map((row) => row.name)
    );

    // Migration 001: Initial schema
    if (!appliedMigrations.has('001_initial')) {
      this.db.exec(`
        CREATE TABLE canonical_facts (
          id TEXT PRIMARY KEY,
          content TEXT NOT NULL,
          domain TEXT,
          source TEXT NOT NULL,
          category TEXT,
          created_at_ticks INTEGER NOT NULL,
          sequence_number INTEGER NOT NULL
        );

        -- Keyed by the original-case key; lookups normalize in memory
        CREATE TABLE world_state (
          id TEXT PRIMARY KEY,
          key TEXT NOT NULL,
          value TEXT NOT NULL,
          source TEXT NOT NULL,
          category TEXT,
          created_at_ticks INTEGER NOT NULL,
          modified_at_ticks INTEGER NOT NULL,
          modification_count INTEGER NOT NULL DEFAULT 0,
          sequence_number INTEGER NOT NULL
        );

        -- Episode ids may repeat, so the sequence number is the key
        CREATE TABLE episodic_memories (
          sequence_number INTEGER PRIMARY KEY,
          id TEXT NOT NULL,
          description TEXT NOT NULL,
          episode_type TEXT NOT NULL CHECK (episode_type IN (
            'dialogue', 'observation', 'thought', 'event', 'learned_info'
          )),
          participant TEXT,
          significance REAL NOT NULL,
          strength REAL NOT NULL,
          source TEXT NOT NULL,
          category TEXT,
          created_at_ticks INTEGER NOT NULL
        );

        CREATE TABLE beliefs (
          id TEXT PRIMARY KEY,
          subject TEXT NOT NULL,
          content TEXT NOT NULL,
          belief_type TEXT NOT NULL CHECK (belief_type IN (
            'opinion', 'relationship', 'belief', 'assumption', 'preference'
          )),
          confidence REAL NOT NULL,
          sentiment REAL NOT NULL,
          evidence TEXT,
          is_contradicted INTEGER NOT NULL DEFAULT 0,
          contradiction_reason TEXT,
          source TEXT NOT NULL,
          category TEXT,
          created_at_ticks INTEGER NOT NULL,
          sequence_number INTEGER NOT NULL
        );

        CREATE TABLE relationships (
          id TEXT PRIMARY KEY,
          owner_npc_id TEXT NOT NULL,
          target_id TEXT NOT NULL,
          relationship_label TEXT NOT NULL,
          affinity REAL NOT NULL,
          trust REAL NOT NULL,
          familiarity REAL NOT NULL,
          source TEXT NOT NULL,
          category TEXT,
          created_at_ticks INTEGER NOT NULL,
          sequence_number INTEGER NOT NULL
        );

        CREATE INDEX idx_facts_seq ON canonical_facts(sequence_number);
        CREATE INDEX idx_state_seq ON world_state(sequence_number);
        CREATE INDEX idx_beliefs_seq ON beliefs(sequence_number);
        CREATE INDEX idx_relationships_seq ON relationships(sequence_number);
      `);

      this.db.prepare('INSERT INTO migrations (name) VALUES (?)').run('001_initial');
    }
  }

  close(): void {
    this.db.close();
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  save(store: MemoryStore): void {
    const data = store.exportData();

    this.transaction(() => {
      this.clear();

      const insertFact = this.db.prepare(`
        INSERT INTO canonical_facts (id, content, domain, source, category, created_at_ticks, sequence_number)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `);
      for (const fact of data.canonicalFacts) {
        insertFact.run(fact.id, fact.content, fact.domain ?? null, fact.source, fact.category ?? null,
          fact.createdAtTicks, fact.sequenceNumber);
      }

      const insertState = this.db.prepare(`
        INSERT INTO world_state (id, key, value, source, category, created_at_ticks, modified_at_ticks,
          modification_count, sequence_number)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `);
      for (const state of data.worldState) {
        insertState.run(state.id, state.key, state.value, state.source, state.category ?? null,
          state.createdAtTicks, state.modifiedAtTicks, state.modificationCount, state.sequenceNumber);
      }

      const insertEpisode = this.db.prepare(`
        INSERT INTO episodic_memories (sequence_number, id, description, episode_type, participant,
          significance, strength, source, category, created_at_ticks)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `);
      for (const memory of data.episodicMemories) {
        insertEpisode.run(memory.sequenceNumber, memory.id, memory.description, memory.episodeType,
          memory.participant ?? null, memory.significance, memory.strength, memory.source,
          memory.category ?? null, memory.createdAtTicks);
      }

      const insertBelief = this.db.prepare(`
        INSERT INTO beliefs (id, subject, content, belief_type, confidence, sentiment, evidence,
          is_contradicted, contradiction_reason, source, category, created_at_ticks, sequence_number)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `);
      for (const entry of data.beliefs) {
        insertBelief.run(entry.id, entry.subject, entry.content, entry.beliefType, entry.confidence,
          entry.sentiment, entry.evidence ?? null, entry.isContradicted ? 1 : 0,
          entry.contradictionReason ?? null, entry.source, entry.category ?? null,
          entry.createdAtTicks, entry.sequenceNumber);
      }

      const insertRelationship = this.db.prepare(`
        INSERT INTO relationships (id, owner_npc_id, target_id, relationship_label, affinity, trust,
          familiarity, source, category, created_at_ticks, sequence_number)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `);
      for (const entry of data.relationships) {
        insertRelationship.run(entry.id, entry.ownerNpcId, entry.targetId, entry.relationshipLabel,
          entry.affinity, entry.trust, entry.familiarity, entry.source, entry.category ?? null,
          entry.createdAtTicks, entry.sequenceNumber);
      }
    });

    this.onLog?.(`[db] Saved ${this.count()} entries`);
  }

  /**
   * Restores the persisted snapshot into `store` (normally an empty one) and
   * returns the store's next sequence number.
   */
  load(store: MemoryStore): number {
    store.restore(this.readAll());
    const next = store.recalculateNextSequenceNumber();
    this.onLog?.(`[db] Loaded ${this.count()} entries, next sequence ${next}`);
    return next;
  }

  readAll(): MemoryStoreData {
    return {
      canonicalFacts: this.readFacts(),
      worldState: this.readWorldState(),
      episodicMemories: this.readEpisodes(),
      beliefs: this.readBeliefs(),
      relationships: this.readRelationships(),
    };
  }

  count(): number {
    const row = this.db.prepare<[], { count: number }>(`
      SELECT
        (SELECT COUNT(*) FROM canonical_facts) +
        (SELECT COUNT(*) FROM world_state) +
        (SELECT COUNT(*) FROM episodic_memories) +
        (SELECT COUNT(*) FROM beliefs) +
        (SELECT COUNT(*) FROM relationships) AS count
    `).get();
    return row?.count ?? 0;
  }

  clear(): void {
    this.db.exec(`
      DELETE FROM canonical_facts;
      DELETE FROM world_state;
      DELETE FROM episodic_memories;
      DELETE FROM beliefs;
      DELETE FROM relationships;
    `);
  }

  private readFacts(): CanonicalFact[] {
    return this.db
      .prepare<[], FactRow>('SELECT * FROM canonical_facts ORDER BY sequence_number')
      .all()
      .map((row) => ({ ...base(row), content: row.content, domain: optional(row.domain) }));
  }

  private readWorldState(): WorldStateEntry[] {
    return this.db
      .prepare<[], WorldStateRow>('SELECT * FROM world_state ORDER BY sequence_number')
      .all()
      .map((row) => ({
        ...base(row),
        key: row.key,
        value: row.value,
        modifiedAtTicks: row.modified_at_ticks,
        modificationCount: row.modification_count,
      }));
  }

  private readEpisodes(): EpisodicMemoryEntry[] {
    return this.db
      .prepare<[], EpisodeRow>('SELECT * FROM episodic_memories ORDER BY sequence_number')
      .all()
      .map((row) => ({
        ...base(row),
        description: row.description,
        episodeType: assertEpisodeType(row.episode_type),
        participant: optional(row.participant),
        significance: row.significance,
        strength: row.strength,
      }));
  }

  private readBeliefs(): BeliefMemoryEntry[] {
    return this.db
      .prepare<[], BeliefRow>('SELECT * FROM beliefs ORDER BY sequence_number')
      .all()
      .map((row) => ({
        ...base(row),
        subject: row.subject,
        content: row.content,
        beliefType: assertBeliefType(row.belief_type),
        confidence: row.confidence,
        sentiment: row.sentiment,
        evidence: optional(row.evidence),
        isContradicted: row.is_contradicted === 1,
        contradictionReason: optional(row.contradiction_reason),
      }));
  }

  private readRelationships(): RelationshipEntry[] {
    return this.db
      .prepare<[], RelationshipRow>('SELECT * FROM relationships ORDER BY sequence_number')
      .all()
      .map((row) => ({
        ...base(row),
        ownerNpcId: row.owner_npc_id,
        targetId: row.target_id,
        relationshipLabel: row.relationship_label,
        affinity: row.affinity,
        trust: row.trust,
        familiarity: row.familiarity,
      }));
  }
}
