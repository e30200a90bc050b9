import { createHash } from 'crypto';
import { nanoid } from 'nanoid';
import { DuplicateIdError, InvalidEntryError, MutationAuthorityError } from './errors.js';
import {
  BeliefHandle,
  assertBeliefType,
  assertEpisodeType,
  assertFinite,
  assertMutationSource,
  assertText,
  beliefStatement,
  canMutate,
  clampSigned,
  clampUnit,
  fromDialogue,
} from './entries.js';
import type { Mutable } from './entries.js';
import { bySequence, equalsIgnoreCase, normalizeKey } from './ordering.js';
import { canModifyRelationship, relationshipKey, validateRelationshipEntry } from './relationships.js';
import type {
  BeliefMemoryEntry,
  CanonicalFact,
  Clock,
  CreateBeliefInput,
  CreateEpisodicInput,
  CreateRelationshipInput,
  EpisodicMemoryEntry,
  IdGenerator,
  LogFn,
  MemoryAuthority,
  MemoryStatistics,
  MutationSource,
  RelationshipEntry,
  WorldStateEntry,
} from './types.js';

export const ACTIVE_STRENGTH_THRESHOLD = 0.1;
export const DEFAULT_DECAY_RATE = 0.05;

export interface MemoryStoreOptions {
  clock?: Clock;
  idGenerator?: IdGenerator;
  episodicDecayRate?: number;
  // Reject mutations whose source ranks below the target memory's authority.
  enforceAuthority?: boolean;
  onLog?: LogFn;
}

// Plain data dump used by the persistence layer.
export interface MemoryStoreData {
  canonicalFacts: CanonicalFact[];
  worldState: WorldStateEntry[];
  episodicMemories: EpisodicMemoryEntry[];
  beliefs: BeliefMemoryEntry[];
  relationships: RelationshipEntry[];
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

function freeze<T extends object>(record: T): T {
  return Object.freeze({ ...record });
}

/**
 * Sole writer of NPC memory state. Assigns ids, timestamps and monotonic
 * sequence numbers to every entry and hands out read-only copies.
 *
 * One store per NPC; there is no internal locking, so callers serialize
 * mutation and retrieval per instance.
 */
export class MemoryStore {
  private readonly canonicalFacts = new Map<string, Mutable<CanonicalFact>>();
  private readonly worldState = new Map<string, Mutable<WorldStateEntry>>();
  private readonly episodicMemories: Array<Mutable<EpisodicMemoryEntry>> = [];
  private readonly beliefs = new Map<string, Mutable<BeliefMemoryEntry>>();
  private readonly relationships = new Map<string, Mutable<RelationshipEntry>>();

  private readonly clock: Clock;
  private readonly idGenerator: IdGenerator;
  private readonly decayRate: number;
  private readonly enforceAuthority: boolean;
  private readonly onLog?: LogFn;

  private sequence = 1;

  constructor(options: MemoryStoreOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.idGenerator = options.idGenerator ?? (() => nanoid());
    // Negative rates would grow strength; decay only ever reduces it.
    this.decayRate = Math.max(0, assertFinite(options.episodicDecayRate ?? DEFAULT_DECAY_RATE, 'episodicDecayRate'));
    this.enforceAuthority = options.enforceAuthority ?? false;
    this.onLog = options.onLog;
  }

  get nextSequenceNumber(): number {
    return this.sequence;
  }

  get episodicDecayRate(): number {
    return this.decayRate;
  }

  // ---------------------------------------------------------------------------
  // Canonical facts
  // ---------------------------------------------------------------------------

  addCanonicalFact(
    id: string,
    content: string,
    domain?: string,
    source: MutationSource = 'designer'
  ): CanonicalFact {
    this.authorize('canonical', source);
    assertText(id, 'id');
    assertText(content, 'content');

    if (this.canonicalFacts.has(id)) {
      throw new DuplicateIdError('Canonical fact', id);
    }

    const entry: Mutable<CanonicalFact> = {
      id,
      content,
      domain,
      source,
      createdAtTicks: this.clock.now(),
      sequenceNumber: this.sequence++,
    };

    this.canonicalFacts.set(id, entry);
    this.log(`Added canonical fact: ${id} = '${content}' (seq=${entry.sequenceNumber})`);

    return freeze(entry);
  }

  removeCanonicalFact(id: string): boolean {
    const removed = this.canonicalFacts.delete(id);
    if (removed) {
      this.log(`Removed canonical fact: ${id}`);
    }
    return removed;
  }

  getCanonicalFact(id: string): CanonicalFact | undefined {
    const entry = this.canonicalFacts.get(id);
    return entry ? freeze(entry) : undefined;
  }

  getCanonicalFacts(domain?: string): CanonicalFact[] {
    return bySequence(this.canonicalFacts.values())
      .filter((fact) => domain === undefined || fact.domain === domain)
      .map(freeze);
  }

  isCanonicalFact(id: string): boolean {
    return this.canonicalFacts.has(id);
  }

  /**
   * Negation-pattern check of a statement against every canonical fact.
   * Returns the first contradicted fact in insertion order.
   */
  findContradictedFact(statement: string): CanonicalFact | undefined {
    const lowerStatement = statement.toLowerCase();

    for (const fact of bySequence(this.canonicalFacts.values())) {
      const lowerFact = fact.content.toLowerCase();
      // An empty fact would match every negation.
      if (lowerFact.trim() === '') continue;

      const prefixed =
        lowerStatement.includes(`not ${lowerFact}`) ||
        lowerStatement.includes(`isn't ${lowerFact}`) ||
        lowerStatement.includes(`never ${lowerFact}`);

      const suffixed =
        lowerStatement.includes(`${lowerFact} is not`) ||
        lowerStatement.includes(`${lowerFact} isn't`);

      // "X is Y" restated as "X is not Y"
      const inserted = lowerFact.includes(' is ') && (
        lowerStatement === lowerFact.split(' is ').join(' is not ') ||
        lowerStatement === lowerFact.split(' is ').join(" isn't ")
      );

      if (prefixed || suffixed || inserted) {
        return freeze(fact);
      }
    }

    return undefined;
  }

  // ---------------------------------------------------------------------------
  // World state
  // ---------------------------------------------------------------------------

  setWorldState(key: string, value: string, source: MutationSource = 'game_system'): WorldStateEntry {
    this.authorize('world_state', source);
    assertText(key, 'key');
    assertText(value, 'value');

    const normalized = normalizeKey(key);
    const now = this.clock.now();
    const existing = this.worldState.get(normalized);

    if (existing) {
      existing.value = value;
      existing.source = source;
      existing.modifiedAtTicks = now;
      existing.modificationCount++;
      this.log(`Updated world state: ${existing.key} = '${value}' (source=${source})`);
      return freeze(existing);
    }

    const entry: Mutable<WorldStateEntry> = {
      id: this.idGenerator(),
      key,
      value,
      source,
      createdAtTicks: now,
      modifiedAtTicks: now,
      modificationCount: 0,
      sequenceNumber: this.sequence++,
    };

    this.worldState.set(normalized, entry);
    this.log(`Added world state: ${key} = '${value}' (seq=${entry.sequenceNumber})`);

    return freeze(entry);
  }

  getWorldState(key: string): WorldStateEntry | undefined {
    const entry = this.worldState.get(normalizeKey(key));
    return entry ? freeze(entry) : undefined;
  }

  getAllWorldState(): WorldStateEntry[] {
    return bySequence(this.worldState.values()).map(freeze);
  }

  // ---------------------------------------------------------------------------
  // Episodic memory
  // ---------------------------------------------------------------------------

  /**
   * Appends an episode. A caller-supplied createdAtTicks or id is kept as is;
   * otherwise the store's clock and id generator fill them in.
   */
  addEpisodicMemory(input: CreateEpisodicInput, source: MutationSource = 'validated_output'): EpisodicMemoryEntry {
    this.authorize('episodic', source);

    const entry: Mutable<EpisodicMemoryEntry> = {
      id: input.id ?? this.idGenerator(),
      description: assertText(input.description, 'description'),
      episodeType: assertEpisodeType(input.episodeType ?? 'dialogue'),
      participant: input.participant,
      significance: clampUnit(input.significance ?? 0.5, 'significance'),
      strength: clampUnit(input.strength ?? 1, 'strength'),
      category: input.category,
      source,
      createdAtTicks: input.createdAtTicks !== undefined
        ? assertFinite(input.createdAtTicks, 'createdAtTicks')
        : this.clock.now(),
      sequenceNumber: this.sequence++,
    };

    this.episodicMemories.push(entry);
    this.log(`Added episodic memory: '${entry.description}' (seq=${entry.sequenceNumber})`);

    return freeze(entry);
  }

  addDialogue(
    speaker: string,
    text: string,
    significance: number = 0.5,
    source: MutationSource = 'validated_output'
  ): EpisodicMemoryEntry {
    return this.addEpisodicMemory(fromDialogue(speaker, text, significance), source);
  }

  /**
   * Subtracts one fixed decay step from every episode that still has strength.
   * Not time-scaled and never deletes; returns the number of entries changed.
   */
  applyEpisodicDecay(): number {
    let changed = 0;

    for (const memory of this.episodicMemories) {
      if (memory.strength <= 0) continue;

      const next = Math.max(0, memory.strength - this.decayRate);
      if (next !== memory.strength) {
        memory.strength = next;
        changed++;
      }
    }

    this.log(`Applied episodic decay to ${changed} memories (rate=${this.decayRate})`);
    return changed;
  }

  reinforceEpisodicMemory(id: string, amount: number = 0.2): boolean {
    const boost = Math.max(0, assertFinite(amount, 'amount'));
    let found = false;

    for (const memory of this.episodicMemories) {
      if (memory.id !== id) continue;
      memory.strength = Math.min(1, memory.strength + boost);
      found = true;
    }

    return found;
  }

  getEpisodicMemories(): EpisodicMemoryEntry[] {
    return bySequence(this.episodicMemories).map(freeze);
  }

  // Newest first; ties on timestamp keep insertion order.
  getActiveEpisodicMemories(strengthThreshold: number = ACTIVE_STRENGTH_THRESHOLD): EpisodicMemoryEntry[] {
    return this.episodicMemories
      .filter((memory) => memory.strength > strengthThreshold)
      .sort((a, b) => {
        if (a.createdAtTicks !== b.createdAtTicks) {
          return a.createdAtTicks > b.createdAtTicks ? -1 : 1;
        }
        return a.sequenceNumber - b.sequenceNumber;
      })
      .map(freeze);
  }

  getRecentMemories(count: number): EpisodicMemoryEntry[] {
    return this.getActiveEpisodicMemories().slice(0, Math.max(0, count));
  }

  // ---------------------------------------------------------------------------
  // Beliefs
  // ---------------------------------------------------------------------------

  /**
   * Upserts a belief by case-insensitive id. A belief that negates a canonical
   * fact is stored already marked as contradicted.
   */
  setBelief(id: string, input: CreateBeliefInput, source: MutationSource = 'validated_output'): BeliefHandle {
    this.authorize('belief', source);
    assertText(id, 'id');

    const entry: Mutable<BeliefMemoryEntry> = {
      id,
      subject: assertText(input.subject, 'subject'),
      content: assertText(input.content, 'content'),
      beliefType: assertBeliefType(input.beliefType ?? 'opinion'),
      confidence: clampUnit(input.confidence ?? 0.5, 'confidence'),
      sentiment: clampSigned(input.sentiment ?? 0, 'sentiment'),
      evidence: input.evidence,
      category: input.category,
      isContradicted: false,
      source,
      createdAtTicks: input.createdAtTicks !== undefined
        ? assertFinite(input.createdAtTicks, 'createdAtTicks')
        : this.clock.now(),
      sequenceNumber: this.sequence++,
    };

    const contradicted = this.findContradictedFact(entry.content);
    if (contradicted) {
      entry.isContradicted = true;
      entry.contradictionReason = `Contradicts canonical fact: ${contradicted.content}`;
      this.log(`Belief contradicts canonical fact: '${entry.content}' vs '${contradicted.content}'`);
    }

    this.beliefs.set(normalizeKey(id), entry);
    this.log(`Set belief: ${id} = '${entry.content}' (seq=${entry.sequenceNumber})`);

    return new BeliefHandle(entry);
  }

  getBelief(id: string): BeliefHandle | undefined {
    const entry = this.beliefs.get(normalizeKey(id));
    return entry ? new BeliefHandle(entry) : undefined;
  }

  removeBelief(id: string): boolean {
    return this.beliefs.delete(normalizeKey(id));
  }

  getAllBeliefs(): BeliefMemoryEntry[] {
    return bySequence(this.beliefs.values()).map(freeze);
  }

  getActiveBeliefs(): BeliefMemoryEntry[] {
    return this.getAllBeliefs().filter((entry) => !entry.isContradicted);
  }

  getBeliefsAbout(subject: string): BeliefMemoryEntry[] {
    return this.getAllBeliefs().filter((entry) => equalsIgnoreCase(entry.subject, subject));
  }

  // ---------------------------------------------------------------------------
  // Relationships
  // ---------------------------------------------------------------------------

  setRelationship(
    input: CreateRelationshipInput,
    authorizingNpcId: string,
    source: MutationSource = 'validated_output'
  ): RelationshipEntry {
    this.authorize('belief', source);

    if (!canModifyRelationship(input, authorizingNpcId)) {
      throw new MutationAuthorityError(
        `NPC '${authorizingNpcId}' cannot modify relationship owned by '${input.ownerNpcId}'`
      );
    }

    const validation = validateRelationshipEntry(input);
    if (!validation.valid) {
      throw new InvalidEntryError(validation.field ?? 'relationship', validation.error ?? 'Invalid relationship');
    }

    const key = relationshipKey(input.ownerNpcId, input.targetId);
    const existing = this.relationships.get(key);

    if (existing) {
      existing.relationshipLabel = input.relationshipLabel;
      existing.affinity = input.affinity ?? existing.affinity;
      existing.trust = input.trust ?? existing.trust;
      existing.familiarity = input.familiarity ?? existing.familiarity;
      existing.source = source;
      this.log(`Updated relationship: ${existing.ownerNpcId} -> ${existing.targetId} = '${input.relationshipLabel}'`);
      return freeze(existing);
    }

    const entry: Mutable<RelationshipEntry> = {
      id: this.idGenerator(),
      ownerNpcId: input.ownerNpcId,
      targetId: input.targetId,
      relationshipLabel: input.relationshipLabel,
      affinity: input.affinity ?? 0,
      trust: input.trust ?? 0.5,
      familiarity: input.familiarity ?? 0,
      source,
      createdAtTicks: this.clock.now(),
      sequenceNumber: this.sequence++,
    };

    this.relationships.set(key, entry);
    this.log(`Added relationship: ${entry.ownerNpcId} -> ${entry.targetId} (seq=${entry.sequenceNumber})`);

    return freeze(entry);
  }

  getRelationship(ownerNpcId: string, targetId: string): RelationshipEntry | undefined {
    const entry = this.relationships.get(relationshipKey(ownerNpcId, targetId));
    return entry ? freeze(entry) : undefined;
  }

  getRelationships(ownerNpcId?: string): RelationshipEntry[] {
    return bySequence(this.relationships.values())
      .filter((entry) => ownerNpcId === undefined || equalsIgnoreCase(entry.ownerNpcId, ownerNpcId))
      .map(freeze);
  }

  // ---------------------------------------------------------------------------
  // Unified access
  // ---------------------------------------------------------------------------

  getAllMemoriesForPrompt(maxEpisodic: number = 10, includeContradictedBeliefs: boolean = false): string[] {
    const lines: string[] = [];

    for (const fact of this.getCanonicalFacts()) {
      lines.push(`[Fact] ${fact.content}`);
    }

    for (const state of this.getAllWorldState()) {
      lines.push(`[State] ${state.key}: ${state.value}`);
    }

    for (const episode of this.getRecentMemories(maxEpisodic)) {
      lines.push(`[Memory] ${episode.description}`);
    }

    const beliefs = includeContradictedBeliefs ? this.getAllBeliefs() : this.getActiveBeliefs();
    for (const entry of beliefs) {
      const prefix = entry.isContradicted ? '[Uncertain] ' : '';
      lines.push(`${prefix}${beliefStatement(entry)}`);
    }

    return lines;
  }

  canMutate(target: MemoryAuthority, source: MutationSource): boolean {
    return canMutate(target, source);
  }

  clearAll(): void {
    this.canonicalFacts.clear();
    this.worldState.clear();
    this.episodicMemories.length = 0;
    this.beliefs.clear();
    this.relationships.clear();
    this.sequence = 1;
    this.log('All memories cleared');
  }

  // ---------------------------------------------------------------------------
  // Persistence support
  // ---------------------------------------------------------------------------

  /**
   * Resets the counter to max(existing sequence numbers) + 1. Must run after a
   * bulk restore, before any new mutation, or numbers would collide.
   */
  recalculateNextSequenceNumber(): number {
    let max = 0;

    const all: Array<Iterable<{ sequenceNumber: number }>> = [
      this.canonicalFacts.values(),
      this.worldState.values(),
      this.episodicMemories,
      this.beliefs.values(),
      this.relationships.values(),
    ];

    for (const entries of all) {
      for (const entry of entries) {
        if (entry.sequenceNumber > max) max = entry.sequenceNumber;
      }
    }

    this.sequence = max + 1;
    this.log(`Recalculated next sequence number: ${this.sequence}`);
    return this.sequence;
  }

  exportData(): MemoryStoreData {
    return {
      canonicalFacts: this.getCanonicalFacts(),
      worldState: this.getAllWorldState(),
      episodicMemories: this.getEpisodicMemories(),
      beliefs: this.getAllBeliefs(),
      relationships: this.getRelationships(),
    };
  }

  /**
   * Inserts previously persisted entries verbatim, keeping their ids,
   * timestamps and sequence numbers. Does not touch the sequence counter.
   */
  restore(data: Partial<MemoryStoreData>): void {
    for (const fact of data.canonicalFacts ?? []) {
      if (this.canonicalFacts.has(fact.id)) {
        throw new DuplicateIdError('Canonical fact', fact.id);
      }
      this.canonicalFacts.set(fact.id, { ...fact, source: assertMutationSource(fact.source) });
    }

    for (const state of data.worldState ?? []) {
      this.worldState.set(normalizeKey(state.key), { ...state, source: assertMutationSource(state.source) });
    }

    for (const memory of data.episodicMemories ?? []) {
      this.episodicMemories.push({
        ...memory,
        episodeType: assertEpisodeType(memory.episodeType),
        significance: clampUnit(memory.significance, 'significance'),
        strength: clampUnit(memory.strength, 'strength'),
        source: assertMutationSource(memory.source),
      });
    }

    for (const entry of data.beliefs ?? []) {
      this.beliefs.set(normalizeKey(entry.id), {
        ...entry,
        beliefType: assertBeliefType(entry.beliefType),
        confidence: clampUnit(entry.confidence, 'confidence'),
        sentiment: clampSigned(entry.sentiment, 'sentiment'),
        source: assertMutationSource(entry.source),
      });
    }

    for (const entry of data.relationships ?? []) {
      this.relationships.set(relationshipKey(entry.ownerNpcId, entry.targetId), {
        ...entry,
        source: assertMutationSource(entry.source),
      });
    }

    this.log('Restored persisted memory entries');
  }

  getStatistics(): MemoryStatistics {
    return {
      canonicalFactCount: this.canonicalFacts.size,
      worldStateCount: this.worldState.size,
      episodicMemoryCount: this.episodicMemories.length,
      activeEpisodicCount: this.episodicMemories.filter((m) => m.strength > ACTIVE_STRENGTH_THRESHOLD).length,
      beliefCount: this.beliefs.size,
      activeBeliefCount: [...this.beliefs.values()].filter((b) => !b.isContradicted).length,
      relationshipCount: this.relationships.size,
      nextSequenceNumber: this.sequence,
    };
  }

  /**
   * SHA-256 over a sequence-ordered dump of every entry. Equal hashes mean the
   * deterministic state of two stores is identical.
   */
  computeStateHash(): string {
    const lines: string[] = [`NextSequenceNumber:${this.sequence}`];

    for (const fact of this.getCanonicalFacts()) {
      lines.push(`F|${fact.id}|${fact.content}|${fact.domain ?? ''}|${fact.createdAtTicks}|${fact.sequenceNumber}`);
    }
    for (const state of this.getAllWorldState()) {
      lines.push(`W|${state.key}|${state.value}|${state.source}|${state.createdAtTicks}|${state.sequenceNumber}`);
    }
    for (const memory of this.getEpisodicMemories()) {
      lines.push(
        `E|${memory.id}|${memory.description}|${memory.strength.toFixed(6)}|` +
        `${memory.createdAtTicks}|${memory.sequenceNumber}`
      );
    }
    for (const entry of this.getAllBeliefs()) {
      lines.push(
        `B|${entry.id}|${entry.content}|${entry.confidence.toFixed(6)}|${entry.isContradicted}|` +
        `${entry.createdAtTicks}|${entry.sequenceNumber}`
      );
    }
    for (const entry of this.getRelationships()) {
      lines.push(`R|${entry.ownerNpcId}|${entry.targetId}|${entry.relationshipLabel}|${entry.sequenceNumber}`);
    }

    return createHash('sha256').update(lines.join('\n'), 'utf8').digest('hex');
  }

  private authorize(target: MemoryAuthority, source: MutationSource): void {
    assertMutationSource(source);
    if (this.enforceAuthority && !canMutate(target, source)) {
      throw new MutationAuthorityError(`Source '${source}' lacks authority to modify ${target} memory`);
    }
  }

  private log(message: string): void {
    this.onLog?.(`[memory] ${message}`);
  }
}
