import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryStore } from '../../src/memory/store.js';
import {
  getBeliefs,
  getCanonicalFacts,
  getConstraints,
  getDialogueHistory,
  getMemories,
  getRelationships,
  getWorldState,
} from '../../src/functions/context-functions.js';
import { Constraints, ConstraintSet } from '../../src/core/constraints.js';
import { StateSnapshotBuilder } from '../../src/core/snapshot.js';

describe('memory queries', () => {
  let store: MemoryStore;

  beforeEach(() => {
    let tick = 100;
    let id = 0;
    store = new MemoryStore({ clock: { now: () => tick++ }, idGenerator: () => `id-${++id}` });
  });

  describe('getMemories', () => {
    beforeEach(() => {
      store.addEpisodicMemory({ id: 'old', description: 'Old news', significance: 0.2 });
      store.addEpisodicMemory({ id: 'new', description: 'Player: Hi', episodeType: 'dialogue', participant: 'Player', significance: 0.8 });
      store.addEpisodicMemory({ id: 'faded', description: 'Faded', strength: 0.05 });
    });

    it('returns active memories newest first', () => {
      expect(getMemories(store)).toEqual([
        { id: 'new', content: 'Player: Hi', episodeType: 'dialogue', participant: 'Player', significance: 0.8, strength: 1 },
        { id: 'old', content: 'Old news', episodeType: 'dialogue', participant: undefined, significance: 0.2, strength: 1 },
      ]);
    });

    it('filters by significance and limits', () => {
      expect(getMemories(store, { minSignificance: 0.5 }).map((m) => m.id)).toEqual(['new']);
      expect(getMemories(store, { limit: 1 }).map((m) => m.id)).toEqual(['new']);
    });

    it('rejects invalid arguments', () => {
      expect(() => getMemories(store, { limit: -1 })).toThrow();
    });
  });

  describe('getBeliefs', () => {
    beforeEach(() => {
      store.setBelief('kind', { subject: 'Player', content: 'the player is kind', confidence: 0.8 });
      store.setBelief('rich', { subject: 'Merchant', content: 'the merchant is rich', confidence: 0.4 })
        .markContradicted('He begged for coin');
    });

    it('reports effective confidence', () => {
      const [kind, rich] = getBeliefs(store);
      expect(kind.effectiveConfidence).toBe(0.8);
      expect(rich.confidence).toBe(0.4);
      expect(rich.effectiveConfidence).toBe(0.2);
      expect(rich.isContradicted).toBe(true);
    });

    it('filters by subject, confidence and contradiction', () => {
      expect(getBeliefs(store, { subject: 'player' }).map((b) => b.id)).toEqual(['kind']);
      expect(getBeliefs(store, { minConfidence: 0.5 }).map((b) => b.id)).toEqual(['kind']);
      expect(getBeliefs(store, { includeContradicted: false }).map((b) => b.id)).toEqual(['kind']);
    });
  });

  it('reads world state by case-insensitive key', () => {
    store.setWorldState('Door', 'open');
    store.setWorldState('weather', 'rain');

    expect(getWorldState(store)).toEqual([
      { key: 'Door', value: 'open' },
      { key: 'weather', value: 'rain' },
    ]);
    expect(getWorldState(store, { keys: ['door', 'missing'] })).toEqual([{ key: 'Door', value: 'open' }]);
  });

  it('lists canonical facts by domain', () => {
    store.addCanonicalFact('king', 'The king is Aldric', 'lore');
    store.addCanonicalFact('river', 'The river runs east');

    expect(getCanonicalFacts(store, { domain: 'lore' })).toEqual([
      { id: 'king', fact: 'The king is Aldric', domain: 'lore', authority: 'canonical' },
    ]);
    expect(getCanonicalFacts(store)).toHaveLength(2);
  });

  it('lists relationships by owner', () => {
    store.setRelationship({ ownerNpcId: 'smith', targetId: 'player', relationshipLabel: 'friend', affinity: 0.6 }, 'smith');
    store.setRelationship({ ownerNpcId: 'guard', targetId: 'player', relationshipLabel: 'suspect' }, 'guard');

    expect(getRelationships(store, { ownerNpcId: 'SMITH' })).toEqual([
      { owner: 'smith', target: 'player', label: 'friend', affinity: 0.6, trust: 0.5, familiarity: 0 },
    ]);
    expect(getRelationships(store)).toHaveLength(2);
  });
});

describe('snapshot queries', () => {
  const snapshot = new StateSnapshotBuilder()
    .withConstraints(new ConstraintSet([
      Constraints.prohibition('no-spoilers', 'No spoilers', 'Never reveal the ending.'),
      Constraints.requirement('polite', 'Be polite', 'Address the player politely.'),
      Constraints.permission('quiet', 'Silent permission', ''),
    ]))
    .withDialogueHistory(['Player: Hello there', 'Smith: Welcome: to the forge', '*hammering*'])
    .build();

  it('groups constraint prompt injections', () => {
    expect(getConstraints(snapshot)).toEqual({
      prohibitions: ['Never reveal the ending.'],
      requirements: ['Address the player politely.'],
      permissions: [],
    });
  });

  it('splits dialogue lines at the first colon', () => {
    expect(getDialogueHistory(snapshot)).toEqual([
      { speaker: 'Player', text: 'Hello there' },
      { speaker: 'Smith', text: 'Welcome: to the forge' },
      { speaker: 'Unknown', text: '*hammering*' },
    ]);
  });

  it('returns the most recent lines up to the limit', () => {
    expect(getDialogueHistory(snapshot, { limit: 1 })).toEqual([{ speaker: 'Unknown', text: '*hammering*' }]);
    expect(getDialogueHistory(snapshot, { limit: 0 })).toEqual([]);
  });
});
