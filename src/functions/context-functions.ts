import { z } from 'zod';
import type { StateSnapshot } from '../core/snapshot.js';
import { effectiveConfidence } from '../memory/entries.js';
import { equalsIgnoreCase } from '../memory/ordering.js';
import type { MemoryStore } from '../memory/store.js';

// Read-only queries an agent can issue mid-generation. Results are plain
// JSON-ready objects.

export const GetMemoriesArgsSchema = z.object({
  limit: z.number().int().min(0).optional().default(10).describe('Maximum number of memories to return'),
  minSignificance: z.number().min(0).max(1).optional().default(0).describe('Minimum significance (0-1)'),
});

export const GetBeliefsArgsSchema = z.object({
  limit: z.number().int().min(0).optional().default(10).describe('Maximum number of beliefs to return'),
  minConfidence: z.number().min(0).max(1).optional().default(0).describe('Minimum stored confidence (0-1)'),
  subject: z.string().optional().describe('Only beliefs about this subject'),
  includeContradicted: z.boolean().optional().default(true).describe('Include contradicted beliefs'),
});

export const GetWorldStateArgsSchema = z.object({
  keys: z.array(z.string()).optional().describe('Specific world state keys to retrieve'),
});

export const GetCanonicalFactsArgsSchema = z.object({
  domain: z.string().optional().describe('Only facts in this domain'),
});

export const GetRelationshipsArgsSchema = z.object({
  ownerNpcId: z.string().optional().describe('Only relationships held by this NPC'),
});

export const GetDialogueHistoryArgsSchema = z.object({
  limit: z.number().int().min(0).optional().default(10).describe('Maximum number of lines to return'),
});

export type GetMemoriesArgs = z.input<typeof GetMemoriesArgsSchema>;
export type GetBeliefsArgs = z.input<typeof GetBeliefsArgsSchema>;
export type GetWorldStateArgs = z.input<typeof GetWorldStateArgsSchema>;
export type GetCanonicalFactsArgs = z.input<typeof GetCanonicalFactsArgsSchema>;
export type GetRelationshipsArgs = z.input<typeof GetRelationshipsArgsSchema>;
export type GetDialogueHistoryArgs = z.input<typeof GetDialogueHistoryArgsSchema>;

export interface MemoryResult {
  id: string;
  content: string;
  episodeType: string;
  participant?: string;
  significance: number;
  strength: number;
}

export interface BeliefResult {
  id: string;
  subject: string;
  content: string;
  confidence: number;
  effectiveConfidence: number;
  sentiment: number;
  isContradicted: boolean;
}

export interface WorldStateResult {
  key: string;
  value: string;
}

export interface CanonicalFactResult {
  id: string;
  fact: string;
  domain?: string;
  authority: 'canonical';
}

export interface RelationshipResult {
  owner: string;
  target: string;
  label: string;
  affinity: number;
  trust: number;
  familiarity: number;
}

export interface ConstraintsResult {
  prohibitions: string[];
  requirements: string[];
  permissions: string[];
}

export interface DialogueLineResult {
  speaker: string;
  text: string;
}

/**
 * Active episodic memories, newest first, at or above the significance
 * threshold.
 */
export function getMemories(store: MemoryStore, args: GetMemoriesArgs = {}): MemoryResult[] {
  const { limit, minSignificance } = GetMemoriesArgsSchema.parse(args);

  return store
    .getActiveEpisodicMemories()
    .filter((memory) => memory.significance >= minSignificance)
    .slice(0, limit)
    .map((memory) => ({
      id: memory.id,
      content: memory.description,
      episodeType: memory.episodeType,
      participant: memory.participant,
      significance: memory.significance,
      strength: memory.strength,
    }));
}

export function getBeliefs(store: MemoryStore, args: GetBeliefsArgs = {}): BeliefResult[] {
  const { limit, minConfidence, subject, includeContradicted } = GetBeliefsArgsSchema.parse(args);
  const beliefs = subject === undefined ? store.getAllBeliefs() : store.getBeliefsAbout(subject);

  return beliefs
    .filter((entry) => includeContradicted || !entry.isContradicted)
    .filter((entry) => entry.confidence >= minConfidence)
    .slice(0, limit)
    .map((entry) => ({
      id: entry.id,
      subject: entry.subject,
      content: entry.content,
      confidence: entry.confidence,
      effectiveConfidence: effectiveConfidence(entry),
      sentiment: entry.sentiment,
      isContradicted: entry.isContradicted,
    }));
}

// Requested keys match case-insensitively; no keys means every entry.
export function getWorldState(store: MemoryStore, args: GetWorldStateArgs = {}): WorldStateResult[] {
  const keys = (GetWorldStateArgsSchema.parse(args).keys ?? []).filter((key) => key.length > 0);

  return store
    .getAllWorldState()
    .filter((state) => keys.length === 0 || keys.some((key) => equalsIgnoreCase(key, state.key)))
    .map((state) => ({ key: state.key, value: state.value }));
}

export function getCanonicalFacts(store: MemoryStore, args: GetCanonicalFactsArgs = {}): CanonicalFactResult[] {
  const { domain } = GetCanonicalFactsArgsSchema.parse(args);

  return store.getCanonicalFacts(domain).map((fact) => ({
    id: fact.id,
    fact: fact.content,
    domain: fact.domain,
    authority: 'canonical',
  }));
}

export function getRelationships(store: MemoryStore, args: GetRelationshipsArgs = {}): RelationshipResult[] {
  const { ownerNpcId } = GetRelationshipsArgsSchema.parse(args);

  return store.getRelationships(ownerNpcId).map((entry) => ({
    owner: entry.ownerNpcId,
    target: entry.targetId,
    label: entry.relationshipLabel,
    affinity: entry.affinity,
    trust: entry.trust,
    familiarity: entry.familiarity,
  }));
}

// Prompt injections grouped by constraint type; empty injections are skipped.
export function getConstraints(snapshot: StateSnapshot): ConstraintsResult {
  const constraints = snapshot.constraints;
  const injections = (list: typeof constraints.all) =>
    list.map((constraint) => constraint.promptInjection).filter((text) => text.length > 0);

  return {
    prohibitions: injections(constraints.prohibitions),
    requirements: injections(constraints.requirements),
    permissions: injections(constraints.permissions),
  };
}

/**
 * The last `limit` history lines, split into speaker and text at the first
 * colon. Lines without a speaker get 'Unknown'.
 */
export function getDialogueHistory(snapshot: StateSnapshot, args: GetDialogueHistoryArgs = {}): DialogueLineResult[] {
  const { limit } = GetDialogueHistoryArgsSchema.parse(args);
  const history = limit > 0 ? snapshot.dialogueHistory.slice(-limit) : [];

  return history.map((line) => {
    const colon = line.indexOf(':');
    if (colon > 0) {
      return { speaker: line.slice(0, colon).trim(), text: line.slice(colon + 1).trim() };
    }
    return { speaker: 'Unknown', text: line };
  });
}
