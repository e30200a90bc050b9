import { equalsIgnoreCase, normalizeKey } from './ordering.js';
import type { CreateRelationshipInput, RelationshipEntry } from './types.js';

export interface RelationshipValidation {
  valid: boolean;
  field?: string;
  error?: string;
}

// Only the owning NPC may change its own relationship entries.
export function canModifyRelationship(
  entry: Pick<RelationshipEntry, 'ownerNpcId'>,
  npcId: string | undefined
): boolean {
  if (!npcId) return false;
  return equalsIgnoreCase(entry.ownerNpcId, npcId);
}

export function relationshipKey(ownerNpcId: string, targetId: string): string {
  return `${normalizeKey(ownerNpcId)}\u0000${normalizeKey(targetId)}`;
}

export function validateRelationshipEntry(input: CreateRelationshipInput): RelationshipValidation {
  if (!input.ownerNpcId || input.ownerNpcId.trim() === '') {
    return { valid: false, field: 'ownerNpcId', error: 'ownerNpcId is required' };
  }
  if (!input.targetId || input.targetId.trim() === '') {
    return { valid: false, field: 'targetId', error: 'targetId is required' };
  }
  if (!input.relationshipLabel || input.relationshipLabel.trim() === '') {
    return { valid: false, field: 'relationshipLabel', error: 'relationshipLabel is required' };
  }

  const ranges: Array<[keyof CreateRelationshipInput, number | undefined, number, number]> = [
    ['affinity', input.affinity, -1, 1],
    ['trust', input.trust, 0, 1],
    ['familiarity', input.familiarity, 0, 1],
  ];

  for (const [field, value, min, max] of ranges) {
    if (value === undefined) continue;
    if (!Number.isFinite(value) || value < min || value > max) {
      return {
        valid: false,
        field,
        error: `${field} must be between ${min} and ${max} (got ${value})`,
      };
    }
  }

  return { valid: true };
}

export function formatRelationship(entry: RelationshipEntry): string {
  return `${entry.ownerNpcId} -> ${entry.targetId}: ${entry.relationshipLabel} ` +
    `(affinity ${entry.affinity.toFixed(2)}, trust ${entry.trust.toFixed(2)}, familiarity ${entry.familiarity.toFixed(2)})`;
}
