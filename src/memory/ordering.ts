/**
 * Deterministic ordering primitives.
 *
 * Nothing observable may depend on Map/Set iteration order or on the host
 * locale. Candidates are materialized into arrays and sorted with the full
 * tie-break chain: score desc, createdAtTicks desc, id asc (ordinal),
 * sequenceNumber asc.
 */

export interface Rankable {
  readonly id: string;
  readonly createdAtTicks: number;
  readonly sequenceNumber: number;
}

export interface Scored<T extends Rankable> {
  entry: T;
  score: number;
}

/**
 * Case-insensitive identity for world-state keys, belief ids and relationship
 * owners. toLowerCase() uses the Unicode default mapping, not the host locale.
 */
export function normalizeKey(key: string): string {
  return key.toLowerCase();
}

export function equalsIgnoreCase(a: string, b: string): boolean {
  return normalizeKey(a) === normalizeKey(b);
}

/**
 * Ordinal string comparison by Unicode code point, which matches UTF-8 byte
 * order. Plain `<` on JS strings compares UTF-16 code units and would put
 * astral characters before U+E000..U+FFFF.
 */
export function compareOrdinal(a: string, b: string): number {
  const length = Math.min(a.length, b.length);

  for (let i = 0; i < length; i++) {
    if (a.charCodeAt(i) !== b.charCodeAt(i)) {
      const pointA = a.codePointAt(i) ?? 0;
      const pointB = b.codePointAt(i) ?? 0;
      return pointA < pointB ? -1 : 1;
    }
  }

  if (a.length === b.length) return 0;
  return a.length < b.length ? -1 : 1;
}

// Exact float comparison; ties fall through to the secondary keys, never to an epsilon.
export function compareScored<T extends Rankable>(a: Scored<T>, b: Scored<T>): number {
  if (a.score !== b.score) {
    return a.score > b.score ? -1 : 1;
  }

  if (a.entry.createdAtTicks !== b.entry.createdAtTicks) {
    return a.entry.createdAtTicks > b.entry.createdAtTicks ? -1 : 1;
  }

  const byId = compareOrdinal(a.entry.id, b.entry.id);
  if (byId !== 0) return byId;

  return compareSequence(a.entry, b.entry);
}

export function compareSequence(a: { sequenceNumber: number }, b: { sequenceNumber: number }): number {
  if (a.sequenceNumber === b.sequenceNumber) return 0;
  return a.sequenceNumber < b.sequenceNumber ? -1 : 1;
}

/**
 * Sort descending by score with the full tie-break chain, then truncate.
 * Truncation always happens after sorting.
 */
export function rankAndTake<T extends Rankable>(scored: Array<Scored<T>>, limit: number): Array<Scored<T>> {
  const sorted = [...scored].sort(compareScored);
  return sorted.slice(0, Math.max(0, Math.floor(limit)));
}

export function bySequence<T extends { sequenceNumber: number }>(items: Iterable<T>): T[] {
  return [...items].sort(compareSequence);
}
