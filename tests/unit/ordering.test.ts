import { describe, it, expect } from 'vitest';
import {
  bySequence,
  compareOrdinal,
  compareScored,
  equalsIgnoreCase,
  normalizeKey,
  rankAndTake,
} from '../../src/memory/ordering.js';
import type { Rankable, Scored } from '../../src/memory/ordering.js';

function scored(id: string, score: number, createdAtTicks = 0, sequenceNumber = 0): Scored<Rankable> {
  return { entry: { id, createdAtTicks, sequenceNumber }, score };
}

describe('compareOrdinal', () => {
  it('orders by code point, not locale', () => {
    const ids = ['b', 'B', 'a', 'A', 'é'];
    expect([...ids].sort(compareOrdinal)).toEqual(['A', 'B', 'a', 'b', 'é']);
  });

  it('puts astral characters after the end of the BMP', () => {
    expect(compareOrdinal('\u{1F600}', '�')).toBe(1);
    expect(compareOrdinal('�', '\u{1F600}')).toBe(-1);
  });

  it('orders a prefix first', () => {
    expect(compareOrdinal('mem', 'memory')).toBe(-1);
    expect(compareOrdinal('memory', 'memory')).toBe(0);
  });
});

describe('compareScored', () => {
  it('applies score, then ticks, then id, then sequence', () => {
    const items = [
      scored('c', 0.5, 10, 4),
      scored('a', 0.5, 10, 3),
      scored('a', 0.5, 10, 1),
      scored('z', 0.5, 20, 2),
      scored('y', 0.9, 0, 5),
    ];

    const order = [...items].sort(compareScored).map((s) => `${s.entry.id}${s.entry.sequenceNumber}`);
    expect(order).toEqual(['y5', 'z2', 'a1', 'a3', 'c4']);
  });

  it('treats scores as exact', () => {
    const higher = scored('b', 0.3 + 1e-12);
    const lower = scored('a', 0.3);
    expect(compareScored(higher, lower)).toBe(-1);
  });
});

describe('rankAndTake', () => {
  it('truncates after sorting', () => {
    const ranked = rankAndTake([scored('a', 0.1), scored('b', 0.9), scored('c', 0.5)], 2);
    expect(ranked.map((s) => s.entry.id)).toEqual(['b', 'c']);
  });

  it('returns nothing for a non-positive limit', () => {
    expect(rankAndTake([scored('a', 1)], 0)).toEqual([]);
    expect(rankAndTake([scored('a', 1)], -5)).toEqual([]);
  });

  it('does not reorder its input', () => {
    const input = [scored('a', 0.1), scored('b', 0.9)];
    rankAndTake(input, 2);
    expect(input.map((s) => s.entry.id)).toEqual(['a', 'b']);
  });
});

describe('keys', () => {
  it('compares case-insensitively', () => {
    expect(normalizeKey('Door_Open')).toBe('door_open');
    expect(equalsIgnoreCase('GATE', 'gate')).toBe(true);
    expect(equalsIgnoreCase('gate', 'gates')).toBe(false);
  });

  it('sorts by sequence number', () => {
    const items = [{ sequenceNumber: 3 }, { sequenceNumber: 1 }, { sequenceNumber: 2 }];
    expect(bySequence(items).map((i) => i.sequenceNumber)).toEqual([1, 2, 3]);
  });
});
