import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { MemoryStore } from '../../src/memory/store.js';
import { MemoryDatabase } from '../../src/persistence/database.js';

function tmpDb(): string {
  return path.join(os.tmpdir(), `recall-db-test-${Date.now()}-${Math.random().toString(36).slice(2)}.db`);
}

function populatedStore(): MemoryStore {
  let tick = 500;
  let id = 0;
  const store = new MemoryStore({ clock: { now: () => tick++ }, idGenerator: () => `id-${++id}` });

  store.addCanonicalFact('king', 'The king is Aldric', 'lore');
  store.setWorldState('Door', 'open');
  store.addEpisodicMemory({ description: 'Player: Hello', participant: 'Player', significance: 0.7 });
  store.addEpisodicMemory({ description: 'A storm passed', episodeType: 'observation', strength: 0.4 });
  store.setBelief('kind', { subject: 'player', content: 'the player is kind', confidence: 0.8, evidence: 'Helped me' })
    .markContradicted('Stole a hammer');
  store.setRelationship({ ownerNpcId: 'smith', targetId: 'player', relationshipLabel: 'friend', affinity: -0.25 }, 'smith');

  return store;
}

describe('MemoryDatabase', () => {
  let dbPath: string;
  let db: MemoryDatabase;

  beforeEach(() => {
    dbPath = tmpDb();
    db = new MemoryDatabase(dbPath);
  });

  afterEach(() => {
    db.close();
    for (const suffix of ['', '-journal', '-wal', '-shm']) {
      fs.rmSync(dbPath + suffix, { force: true });
    }
  });

  it('starts empty', () => {
    expect(db.count()).toBe(0);
  });

  it('round-trips every tier', () => {
    const original = populatedStore();
    db.save(original);

    const restored = new MemoryStore();
    const next = db.load(restored);

    expect(db.count()).toBe(6);
    expect(next).toBe(7);
    expect(restored.exportData()).toEqual(original.exportData());
    expect(restored.computeStateHash()).toBe(original.computeStateHash());
  });

  it('keeps contradiction state', () => {
    db.save(populatedStore());
    const restored = new MemoryStore();
    db.load(restored);

    const belief = restored.getBelief('KIND');
    expect(belief?.isContradicted).toBe(true);
    expect(belief?.contradictionReason).toBe('Stole a hammer');
    expect(belief?.confidence).toBe(0.8);
  });

  it('continues numbering after the highest restored sequence', () => {
    db.save(populatedStore());
    const restored = new MemoryStore();
    db.load(restored);

    const entry = restored.addEpisodicMemory({ description: 'After reload' });
    expect(entry.sequenceNumber).toBe(7);
  });

  it('replaces the previous snapshot on save', () => {
    db.save(populatedStore());
    const smaller = new MemoryStore();
    smaller.setWorldState('weather', 'rain');
    db.save(smaller);

    expect(db.count()).toBe(1);
    expect(db.readAll().worldState.map((s) => s.key)).toEqual(['weather']);
  });

  it('survives reopening', () => {
    db.save(populatedStore());
    db.close();

    db = new MemoryDatabase(dbPath);
    expect(db.count()).toBe(6);
  });

  it('keeps repeated episodic ids', () => {
    const store = new MemoryStore();
    store.addEpisodicMemory({ id: 'dup', description: 'one' });
    store.addEpisodicMemory({ id: 'dup', description: 'two' });
    db.save(store);

    expect(db.readAll().episodicMemories.map((m) => m.description)).toEqual(['one', 'two']);
  });

  it('clears every table', () => {
    db.save(populatedStore());
    db.clear();
    expect(db.count()).toBe(0);
  });

  it('logs saves and loads', () => {
    const logs: string[] = [];
    db.close();
    db = new MemoryDatabase(dbPath, (message) => logs.push(message));

    db.save(populatedStore());
    db.load(new MemoryStore());

    expect(logs).toEqual(['[db] Saved 6 entries', '[db] Loaded 6 entries, next sequence 7']);
  });
});
