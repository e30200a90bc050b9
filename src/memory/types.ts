// Four-tiered NPC memory: canonical facts (immutable lore), world state (mutable
// key/value), episodic memories (decaying event history), beliefs (can be wrong).

export type MemoryAuthority = 'canonical' | 'world_state' | 'episodic' | 'belief';
export type MutationSource = 'designer' | 'game_system' | 'validated_output' | 'llm_suggestion';

export const AUTHORITY_LEVELS: Record<MemoryAuthority, number> = {
  canonical: 100,
  world_state: 75,
  episodic: 50,
  belief: 25,
};

export const SOURCE_LEVELS: Record<MutationSource, number> = {
  designer: 100,
  game_system: 75,
  validated_output: 50,
  llm_suggestion: 25,
};

export const EPISODE_TYPES = ['dialogue', 'observation', 'thought', 'event', 'learned_info'] as const;
export type EpisodeType = typeof EPISODE_TYPES[number];

export const BELIEF_TYPES = ['opinion', 'relationship', 'belief', 'assumption', 'preference'] as const;
export type BeliefType = typeof BELIEF_TYPES[number];

export const MUTATION_SOURCES: readonly MutationSource[] = [
  'designer',
  'game_system',
  'validated_output',
  'llm_suggestion',
];

export interface BaseEntry {
  readonly id: string;
  readonly createdAtTicks: number;
  readonly sequenceNumber: number;
  readonly source: MutationSource;
  readonly category?: string;
}

export interface CanonicalFact extends BaseEntry {
  readonly content: string;
  readonly domain?: string;
}

export interface WorldStateEntry extends BaseEntry {
  readonly key: string;
  readonly value: string;
  readonly modifiedAtTicks: number;
  readonly modificationCount: number;
}

export interface EpisodicMemoryEntry extends BaseEntry {
  readonly description: string;
  readonly episodeType: EpisodeType;
  readonly participant?: string;
  readonly significance: number;
  readonly strength: number;
}

export interface BeliefMemoryEntry extends BaseEntry {
  readonly subject: string;
  readonly content: string;
  readonly beliefType: BeliefType;
  readonly confidence: number;
  readonly sentiment: number;
  readonly evidence?: string;
  readonly isContradicted: boolean;
  readonly contradictionReason?: string;
}

export interface RelationshipEntry extends BaseEntry {
  readonly ownerNpcId: string;
  readonly targetId: string;
  readonly relationshipLabel: string;
  readonly affinity: number;
  readonly trust: number;
  readonly familiarity: number;
}

export interface CreateEpisodicInput {
  description: string;
  episodeType?: EpisodeType;
  id?: string;
  participant?: string;
  significance?: number;
  strength?: number;
  createdAtTicks?: number;
  category?: string;
}

export interface CreateBeliefInput {
  subject: string;
  content: string;
  beliefType?: BeliefType;
  confidence?: number;
  sentiment?: number;
  evidence?: string;
  createdAtTicks?: number;
  category?: string;
}

export interface CreateRelationshipInput {
  ownerNpcId: string;
  targetId: string;
  relationshipLabel: string;
  affinity?: number;
  trust?: number;
  familiarity?: number;
}

export interface MemoryStatistics {
  canonicalFactCount: number;
  worldStateCount: number;
  episodicMemoryCount: number;
  activeEpisodicCount: number;
  beliefCount: number;
  activeBeliefCount: number;
  relationshipCount: number;
  nextSequenceNumber: number;
}

// Monotonic integer clock; Date.now() by default, fixed in tests.
export interface Clock {
  now(): number;
}

export type IdGenerator = () => string;

export type LogFn = (message: string) => void;
