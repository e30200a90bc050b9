import { InvalidEntryError } from './errors.js';
import {
  AUTHORITY_LEVELS,
  BELIEF_TYPES,
  EPISODE_TYPES,
  MUTATION_SOURCES,
  SOURCE_LEVELS,
} from './types.js';
import type {
  BeliefMemoryEntry,
  BeliefType,
  CreateBeliefInput,
  CreateEpisodicInput,
  EpisodeType,
  MemoryAuthority,
  MutationSource,
} from './types.js';

export type Mutable<T> = { -readonly [K in keyof T]: T[K] };

export const DEFAULT_CONTRADICTION_PENALTY = 0.5;

export function canMutate(target: MemoryAuthority, source: MutationSource): boolean {
  return SOURCE_LEVELS[source] >= AUTHORITY_LEVELS[target];
}

export function assertFinite(value: number, field: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidEntryError(field, `${field} must be a finite number (got ${String(value)})`);
  }
  return value;
}

export function clampUnit(value: number, field: string): number {
  return Math.min(1, Math.max(0, assertFinite(value, field)));
}

export function clampSigned(value: number, field: string): number {
  return Math.min(1, Math.max(-1, assertFinite(value, field)));
}

export function assertEpisodeType(value: string): EpisodeType {
  const match = EPISODE_TYPES.find((type) => type === value);
  if (!match) {
    throw new InvalidEntryError('episodeType', `Unknown episode type: ${value}`);
  }
  return match;
}

export function assertBeliefType(value: string): BeliefType {
  const match = BELIEF_TYPES.find((type) => type === value);
  if (!match) {
    throw new InvalidEntryError('beliefType', `Unknown belief type: ${value}`);
  }
  return match;
}

export function assertMutationSource(value: string): MutationSource {
  const match = MUTATION_SOURCES.find((source) => source === value);
  if (!match) {
    throw new InvalidEntryError('source', `Unknown mutation source: ${value}`);
  }
  return match;
}

export function assertText(value: string, field: string): string {
  if (typeof value !== 'string') {
    throw new InvalidEntryError(field, `${field} must be a string`);
  }
  return value;
}

// Episode factories

export function fromDialogue(speaker: string, text: string, significance: number = 0.5): CreateEpisodicInput {
  return {
    description: `${speaker}: ${text}`,
    episodeType: 'dialogue',
    participant: speaker,
    significance,
  };
}

export function fromObservation(observation: string, significance: number = 0.3): CreateEpisodicInput {
  return {
    description: observation,
    episodeType: 'observation',
    significance,
  };
}

export function fromLearnedInfo(info: string, source?: string, significance: number = 0.6): CreateEpisodicInput {
  return {
    description: info,
    episodeType: 'learned_info',
    participant: source,
    significance,
  };
}

// Belief factories

export function relationshipBelief(subject: string, relationship: string, sentiment: number = 0): CreateBeliefInput {
  return { subject, content: relationship, beliefType: 'relationship', sentiment, confidence: 0.7 };
}

export function opinion(
  subject: string,
  content: string,
  sentiment: number = 0,
  confidence: number = 0.5
): CreateBeliefInput {
  return { subject, content, beliefType: 'opinion', sentiment, confidence };
}

export function belief(
  subject: string,
  content: string,
  confidence: number = 0.5,
  evidence?: string
): CreateBeliefInput {
  return { subject, content, beliefType: 'belief', confidence, evidence };
}

/**
 * Confidence used for ranking and filtering. Stored confidence is never
 * touched; contradiction only applies the penalty here.
 */
export function effectiveConfidence(
  entry: Pick<BeliefMemoryEntry, 'confidence' | 'isContradicted'>,
  penalty: number = DEFAULT_CONTRADICTION_PENALTY
): number {
  return entry.isContradicted ? entry.confidence * penalty : entry.confidence;
}

export function beliefStatement(entry: Pick<BeliefMemoryEntry, 'confidence' | 'content'>): string {
  let prefix: string;
  if (entry.confidence >= 0.8) prefix = 'I know that';
  else if (entry.confidence >= 0.5) prefix = 'I believe that';
  else if (entry.confidence >= 0.3) prefix = 'I think that';
  else prefix = "I'm not sure, but";

  return `${prefix} ${entry.content}`;
}

export function formatBeliefSummary(
  entry: Pick<BeliefMemoryEntry, 'confidence' | 'content' | 'isContradicted'>
): string {
  const statement = beliefStatement(entry);
  return entry.isContradicted ? `[Uncertain] ${statement}` : statement;
}

/**
 * Live view of a stored belief. Reads always reflect the store; the only
 * writes allowed are the sanctioned mutations below.
 */
export class BeliefHandle {
  constructor(private readonly record: Mutable<BeliefMemoryEntry>) {}

  get id(): string { return this.record.id; }
  get subject(): string { return this.record.subject; }
  get content(): string { return this.record.content; }
  get beliefType(): BeliefType { return this.record.beliefType; }
  get confidence(): number { return this.record.confidence; }
  get sentiment(): number { return this.record.sentiment; }
  get evidence(): string | undefined { return this.record.evidence; }
  get isContradicted(): boolean { return this.record.isContradicted; }
  get contradictionReason(): string | undefined { return this.record.contradictionReason; }
  get createdAtTicks(): number { return this.record.createdAtTicks; }
  get sequenceNumber(): number { return this.record.sequenceNumber; }
  get source(): MutationSource { return this.record.source; }

  markContradicted(reason: string): void {
    this.record.isContradicted = true;
    this.record.contradictionReason = assertText(reason, 'reason');
  }

  adjustSentiment(delta: number): void {
    this.record.sentiment = clampSigned(this.record.sentiment + assertFinite(delta, 'delta'), 'sentiment');
  }

  update(content: string, confidence: number, evidence?: string): void {
    this.record.content = assertText(content, 'content');
    this.record.confidence = clampUnit(confidence, 'confidence');
    if (evidence !== undefined) {
      this.record.evidence = evidence;
    }
  }

  toEntry(): BeliefMemoryEntry {
    return Object.freeze({ ...this.record });
  }

  toString(): string {
    return formatBeliefSummary(this.record);
  }
}
