import { describe, it, expect, beforeEach } from 'vitest';
import { ZodError } from 'zod';
import { MemoryStore } from '../../src/memory/store.js';
import {
  ContextRetriever,
  RetrievedContext,
  calculateRelevance,
  extractKeywords,
  formatMemoriesForContext,
} from '../../src/memory/retriever.js';
import { StateSnapshotBuilder } from '../../src/core/snapshot.js';
import type { CreateEpisodicInput } from '../../src/memory/types.js';

function fixedStore(): MemoryStore {
  let id = 0;
  return new MemoryStore({ clock: { now: () => 1000 }, idGenerator: () => `id-${++id}` });
}

// Deterministic Fisher-Yates driven by a Park-Miller generator.
function shuffled<T>(items: readonly T[], seed: number): T[] {
  const result = [...items];
  let state = seed;
  for (let i = result.length - 1; i > 0; i--) {
    state = (state * 16807) % 2147483647;
    const j = state % (i + 1);
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

describe('relevance', () => {
  it('ignores words of three characters or fewer', () => {
    expect([...extractKeywords('Tell me about the dragon!')]).toEqual(['tell', 'about', 'dragon']);
  });

  it('scores keyword overlap over distinct query words', () => {
    expect(calculateRelevance('The dragon attacked the village', 'Tell me about the dragon', [])).toBeCloseTo(1 / 3, 10);
  });

  it('adds the topic boost on a case-insensitive substring match', () => {
    expect(calculateRelevance('The dragon attacked the village', 'Tell me about the dragon', ['VILLAGE']))
      .toBeCloseTo(1 / 3 + 0.3, 10);
  });

  it('caps at maxRelevance', () => {
    expect(calculateRelevance('dragon', 'dragon', ['dragon'])).toBe(1);
  });

  it('is zero for empty content or an empty query without topics', () => {
    expect(calculateRelevance('', 'dragon', ['dragon'])).toBe(0);
    expect(calculateRelevance('dragon', '', [])).toBe(0);
  });
});

describe('ContextRetriever', () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = fixedStore();
  });

  it('returns an empty context for an empty store', () => {
    const context = new ContextRetriever(store).retrieveContext(null, null);

    expect(context.totalCount).toBe(0);
    expect(context.hasContent).toBe(false);
  });

  it('rejects NaN weights', () => {
    expect(() => new ContextRetriever(store, { relevanceWeight: NaN })).toThrow(ZodError);
  });

  it('accepts out-of-range weights as given', () => {
    const retriever = new ContextRetriever(store, { significanceWeight: 5, maxBeliefs: -1 });
    expect(retriever.getConfig().significanceWeight).toBe(5);
    expect(retriever.getConfig().maxBeliefs).toBe(-1);
  });

  describe('canonical facts and world state', () => {
    beforeEach(() => {
      store.addCanonicalFact('king', 'The king is Aldric', 'lore');
      store.addCanonicalFact('river', 'The river runs east', 'geography');
      store.setWorldState('Door', 'open');
      store.setWorldState('weather', 'rain');
    });

    it('returns facts by id and state by key without topics', () => {
      const context = new ContextRetriever(store).retrieveContext('anything');

      expect(context.canonicalFacts).toEqual(['The king is Aldric', 'The river runs east']);
      expect(context.worldState).toEqual(['Door: open', 'weather: rain']);
    });

    it('filters facts by content or domain', () => {
      const retriever = new ContextRetriever(store);

      expect(retriever.retrieveContext('', ['LORE']).canonicalFacts).toEqual(['The king is Aldric']);
      expect(retriever.retrieveContext('', ['river']).canonicalFacts).toEqual(['The river runs east']);
    });

    it('matches world state keys case-insensitively', () => {
      const context = new ContextRetriever(store).retrieveContext('', ['door']);
      expect(context.worldState).toEqual(['Door: open']);
    });

    it('ignores empty topics', () => {
      const context = new ContextRetriever(store).retrieveContext('', ['']);
      expect(context.worldState).toHaveLength(2);
    });

    it('applies positive limits only', () => {
      const limited = new ContextRetriever(store, { maxCanonicalFacts: 1, maxWorldState: 1 }).retrieveContext('');
      expect(limited.canonicalFacts).toEqual(['The king is Aldric']);
      expect(limited.worldState).toEqual(['Door: open']);

      const unlimited = new ContextRetriever(store, { maxCanonicalFacts: 0, maxWorldState: -3 }).retrieveContext('');
      expect(unlimited.canonicalFacts).toHaveLength(2);
      expect(unlimited.worldState).toHaveLength(2);
    });

    it('rounds fractional limits down and accepts infinite ones', () => {
      const retriever = new ContextRetriever(store, {
        maxCanonicalFacts: 1.5,
        maxWorldState: Infinity,
        maxEpisodicMemories: 2.9,
      });
      store.addEpisodicMemory({ description: 'one' });
      store.addEpisodicMemory({ description: 'two' });
      store.addEpisodicMemory({ description: 'three' });

      const context = retriever.retrieveContext('');
      expect(context.canonicalFacts).toEqual(['The king is Aldric']);
      expect(context.worldState).toHaveLength(2);
      expect(context.episodicMemories).toHaveLength(2);
    });
  });

  describe('fact and state order', () => {
    function storeWith(order: readonly string[]): MemoryStore {
      const reordered = fixedStore();
      for (const letter of order) {
        reordered.addCanonicalFact(letter, `fact ${letter}`);
        reordered.setWorldState(`key-${letter}`, letter);
      }
      return reordered;
    }

    it('does not depend on insertion order before truncation', () => {
      const config = { maxCanonicalFacts: 2, maxWorldState: 2 };

      for (const order of [['a', 'b', 'c'], ['c', 'b', 'a'], ['b', 'c', 'a']]) {
        const context = new ContextRetriever(storeWith(order), config).retrieveContext('');
        expect(context.canonicalFacts).toEqual(['fact a', 'fact b']);
        expect(context.worldState).toEqual(['key-a: a', 'key-b: b']);
      }
    });

    it('orders world state by the stored key casing', () => {
      store.setWorldState('gate', 'shut');
      store.setWorldState('Tower', 'lit');

      expect(new ContextRetriever(store).retrieveContext('').worldState).toEqual(['Tower: lit', 'gate: shut']);
    });
  });

  describe('episodic ranking', () => {
    const entries: CreateEpisodicInput[] = [
      { id: 'e1', description: 'The dragon burned the mill', createdAtTicks: 100, significance: 0.9 },
      { id: 'e2', description: 'A merchant sold bread', createdAtTicks: 200, significance: 0.3 },
      { id: 'e3', description: 'The dragon flew north', createdAtTicks: 150, significance: 0.5 },
      { id: 'e4', description: 'Rain fell on the village', createdAtTicks: 200, significance: 0.3 },
      { id: 'e5', description: 'Bread was cheap', createdAtTicks: 200, significance: 0.3 },
    ];

    it('ranks by weighted score and breaks exact ties by id', () => {
      for (const entry of entries) store.addEpisodicMemory(entry);

      const context = new ContextRetriever(store, { maxEpisodicMemories: 4 }).retrieveContext('Where did the dragon go');

      expect(context.episodicMemories).toEqual([
        'The dragon burned the mill',
        'The dragon flew north',
        'A merchant sold bread',
        'Rain fell on the village',
      ]);
    });

    it('gives identical context for every insertion order', () => {
      const inserts: Array<(target: MemoryStore) => void> = [
        ...entries.map((entry) => (target: MemoryStore) => { target.addEpisodicMemory(entry); }),
        ...['a', 'b', 'c'].map((letter) => (target: MemoryStore) => {
          target.addCanonicalFact(`fact-${letter}`, `fact ${letter}`);
        }),
        ...['a', 'b', 'c'].map((letter) => (target: MemoryStore) => {
          target.setWorldState(`key-${letter}`, letter);
        }),
        (target) => { target.setBelief('b1', { subject: 'smith', content: 'the smith is honest', confidence: 0.6 }); },
        (target) => { target.setBelief('b2', { subject: 'guard', content: 'the guard is lazy', confidence: 0.6 }); },
        (target) => { target.setBelief('b3', { subject: 'dragon', content: 'the dragon is near', confidence: 0.9 }); },
      ];
      const config = { maxCanonicalFacts: 2, maxWorldState: 2, maxEpisodicMemories: 4, maxBeliefs: 2 };
      const results = new Set<string>();

      for (let seed = 1; seed <= 10; seed++) {
        const shuffledStore = fixedStore();
        for (const insert of shuffled(inserts, seed)) insert(shuffledStore);

        const context = new ContextRetriever(shuffledStore, config).retrieveContext('Where did the dragon go');
        results.add(JSON.stringify(context));
      }

      expect([...results]).toEqual([JSON.stringify({
        canonicalFacts: ['fact a', 'fact b'],
        worldState: ['key-a: a', 'key-b: b'],
        episodicMemories: [
          'The dragon burned the mill',
          'The dragon flew north',
          'A merchant sold bread',
          'Rain fell on the village',
        ],
        beliefs: ['I know that the dragon is near', 'I believe that the smith is honest'],
      })]);
    });

    it('orders scores that differ by less than 1e-9 the same way every time', () => {
      store.addEpisodicMemory({ id: 'a', description: 'lower', significance: 0.5 });
      store.addEpisodicMemory({ id: 'b', description: 'higher', significance: 0.5 + 5e-10 });
      const retriever = new ContextRetriever(store);

      for (let i = 0; i < 20; i++) {
        expect(retriever.retrieveContext('').episodicMemories).toEqual(['higher', 'lower']);
      }
    });

    it('breaks full ties by ascending sequence number', () => {
      for (const label of ['first', 'second', 'third']) {
        store.addEpisodicMemory({ id: 'same', description: label, createdAtTicks: 5, significance: 0.5 });
      }

      const scored = new ContextRetriever(store).rankEpisodicMemories('');
      expect(scored.map((s) => s.entry.description)).toEqual(['first', 'second', 'third']);
      expect(scored.map((s) => s.entry.sequenceNumber)).toEqual([1, 2, 3]);
    });

    it('compares ids by code point', () => {
      const ids = ['😀', '�', '日', 'é', 'z', 'Z'];
      for (const id of ids) {
        store.addEpisodicMemory({ id, description: id, createdAtTicks: 5 });
      }

      const context = new ContextRetriever(store, {
        relevanceWeight: 0,
        recencyWeight: 0,
        significanceWeight: 0,
      }).retrieveContext('');

      expect(context.episodicMemories).toEqual(['Z', 'z', 'é', '日', '�', '😀']);
    });

    it('falls back to the tie-break chain when all weights are zero', () => {
      store.addEpisodicMemory({ id: 'b', description: 'old', createdAtTicks: 100 });
      store.addEpisodicMemory({ id: 'c', description: 'new c', createdAtTicks: 200 });
      store.addEpisodicMemory({ id: 'a', description: 'new a', createdAtTicks: 200 });

      const context = new ContextRetriever(store, {
        relevanceWeight: 0,
        recencyWeight: 0,
        significanceWeight: 0,
      }).retrieveContext('new');

      expect(context.episodicMemories).toEqual(['new a', 'new c', 'old']);
    });

    it('keeps insertion order for equally significant memories', () => {
      for (let i = 1; i <= 5; i++) {
        store.addEpisodicMemory({ description: `Memory ${i}`, significance: 0.5 });
      }
      const retriever = new ContextRetriever(store, {
        significanceWeight: 1,
        recencyWeight: 0,
        relevanceWeight: 0,
        maxEpisodicMemories: 5,
      });

      const expected = ['Memory 1', 'Memory 2', 'Memory 3', 'Memory 4', 'Memory 5'];
      for (let i = 0; i < 5; i++) {
        expect(retriever.retrieveContext('unrelated').episodicMemories).toEqual(expected);
      }
    });

    it('excludes memories below the minimum strength', () => {
      store.addEpisodicMemory({ description: 'faded', strength: 0.05 });
      store.addEpisodicMemory({ description: 'edge', strength: 0.1 });

      expect(new ContextRetriever(store).retrieveContext('').episodicMemories).toEqual(['edge']);
    });

    it('truncates after sorting', () => {
      store.addEpisodicMemory({ id: 'x', description: 'minor', significance: 0.1 });
      store.addEpisodicMemory({ id: 'y', description: 'major', significance: 0.9 });

      const context = new ContextRetriever(store, { maxEpisodicMemories: 1 }).retrieveContext('');
      expect(context.episodicMemories).toEqual(['major']);
    });

    it('returns nothing for a non-positive limit', () => {
      store.addEpisodicMemory({ description: 'x' });
      expect(new ContextRetriever(store, { maxEpisodicMemories: 0 }).retrieveContext('').episodicMemories).toEqual([]);
    });

    it('lets decay change the ranking', () => {
      store.addEpisodicMemory({ id: 'a', description: 'strong', strength: 1, significance: 0.5 });
      store.addEpisodicMemory({ id: 'b', description: 'weak', strength: 0.12, significance: 0.5 });
      const retriever = new ContextRetriever(store);

      expect(retriever.retrieveContext('').episodicMemories).toEqual(['strong', 'weak']);
      store.applyEpisodicDecay();
      expect(retriever.retrieveContext('').episodicMemories).toEqual(['strong']);
    });
  });

  describe('belief ranking', () => {
    it('includes a belief exactly at the confidence threshold', () => {
      store.setBelief('at', { subject: 's', content: 'at threshold', confidence: 0.5 });
      store.setBelief('below', { subject: 's', content: 'below threshold', confidence: 0.49 });

      const context = new ContextRetriever(store, { minBeliefConfidence: 0.5 }).retrieveContext('');
      expect(context.beliefs).toEqual(['I believe that at threshold']);
    });

    it('excludes contradicted beliefs by default', () => {
      store.setBelief('b', { subject: 's', content: 'wrong', confidence: 0.9 }).markContradicted('disproved');

      expect(new ContextRetriever(store).retrieveContext('').beliefs).toEqual([]);
    });

    it('ranks a contradicted 0.9 belief below an uncontradicted 0.5 belief', () => {
      store.setBelief('strong', { subject: 'guard', content: 'the guard is loyal', confidence: 0.9 })
        .markContradicted('Seen taking a bribe');
      store.setBelief('modest', { subject: 'guard', content: 'the guard is tired', confidence: 0.5 });

      const retriever = new ContextRetriever(store, { includeContradictedBeliefs: true });
      const scored = retriever.rankBeliefs('');

      expect(scored.map((s) => s.entry.id)).toEqual(['modest', 'strong']);
      expect(scored[0].score).toBeCloseTo(0.4 * 0.5, 10);
      expect(scored[1].score).toBeCloseTo(0.4 * 0.45, 10);
      expect(retriever.retrieveContext('').beliefs).toEqual([
        'I believe that the guard is tired',
        '[Uncertain] I know that the guard is loyal',
      ]);
    });

    it('prefers relevant beliefs', () => {
      store.setBelief('a', { subject: 'x', content: 'bread is expensive', confidence: 0.6 });
      store.setBelief('b', { subject: 'x', content: 'dragons are dangerous', confidence: 0.6 });

      const context = new ContextRetriever(store).retrieveContext('Are dragons real?');
      expect(context.beliefs[0]).toBe('I believe that dragons are dangerous');
    });
  });

  it('logs through onLog', () => {
    const logs: string[] = [];
    new ContextRetriever(store, {}, { onLog: (m) => logs.push(m) }).retrieveContext('hello');

    expect(logs).toEqual([
      "[retrieval] Retrieving context for input: 'hello'",
      '[retrieval] Retrieved: 0 facts, 0 state, 0 episodes, 0 beliefs',
    ]);
  });
});

describe('RetrievedContext', () => {
  const context = new RetrievedContext({
    canonicalFacts: ['The king is Aldric'],
    worldState: ['door: open'],
    episodicMemories: ['Player: Hello'],
    beliefs: ['I know that the player is kind'],
  });

  it('formats sections for a prompt', () => {
    expect(formatMemoriesForContext(context)).toBe(
      '## Canonical Facts\n- The king is Aldric\n\n' +
      '## World State\n- door: open\n\n' +
      '## Memories\n- Player: Hello\n\n' +
      '## Beliefs\n- I know that the player is kind'
    );
  });

  it('folds into a snapshot builder', () => {
    const snapshot = context.applyTo(new StateSnapshotBuilder()).build();

    expect(snapshot.canonicalFacts).toEqual(['The king is Aldric']);
    expect(snapshot.worldState).toEqual(['door: open']);
    expect(snapshot.episodicMemories).toEqual(['Player: Hello']);
    expect(snapshot.beliefs).toEqual(['I know that the player is kind']);
    expect(snapshot.totalMemoryCount).toBe(4);
  });

  it('is immutable', () => {
    expect(Object.isFrozen(context.canonicalFacts)).toBe(true);
  });
});
