import { ContextRetrievalConfigSchema, DEFAULT_RETRIEVAL_CONFIG } from '../config/index.js';
import type { ContextRetrievalConfig } from '../config/index.js';
import type { StateSnapshotBuilder } from '../core/snapshot.js';
import { effectiveConfidence, formatBeliefSummary } from './entries.js';
import { compareOrdinal, compareSequence, equalsIgnoreCase, rankAndTake } from './ordering.js';
import type { Scored } from './ordering.js';
import type { MemoryStore } from './store.js';
import type {
  BeliefMemoryEntry,
  CanonicalFact,
  EpisodicMemoryEntry,
  LogFn,
  WorldStateEntry,
} from './types.js';

const WORD_SEPARATORS = /[ .,!?]+/;
const MIN_KEYWORD_LENGTH = 4;

export interface RelevanceOptions {
  topicBoost: number;
  maxRelevance: number;
}

export interface RetrieverOptions {
  onLog?: LogFn;
}

/**
 * Distinct lowercased words longer than three characters. Shorter words act
 * as stop words.
 */
export function extractKeywords(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(WORD_SEPARATORS)
      .filter((word) => word.length >= MIN_KEYWORD_LENGTH)
  );
}

export function matchesTopics(content: string, topics: readonly string[]): boolean {
  if (!content || topics.length === 0) return false;

  const lowerContent = content.toLowerCase();
  return topics.some((topic) => lowerContent.includes(topic.toLowerCase()));
}

/**
 * Keyword overlap ratio (matched query words / query words) plus a boost when
 * any topic appears in the content, capped at maxRelevance.
 */
export function calculateRelevance(
  content: string,
  query: string,
  topics: readonly string[],
  options: RelevanceOptions = DEFAULT_RETRIEVAL_CONFIG
): number {
  if (!content) return 0;

  const queryWords = extractKeywords(query);
  const contentWords = extractKeywords(content);

  let score = 0;
  if (queryWords.size > 0) {
    let overlap = 0;
    for (const word of queryWords) {
      if (contentWords.has(word)) overlap++;
    }
    score = overlap / queryWords.size;
  }

  if (matchesTopics(content, topics)) {
    score += options.topicBoost;
  }

  return Math.min(options.maxRelevance, score);
}

function normalizeTopics(topics: readonly string[] | null | undefined): string[] {
  return (topics ?? []).filter((topic) => typeof topic === 'string' && topic.length > 0);
}

// Limits of zero or less mean no limit; fractional limits round down.
function takePositive<T>(items: T[], limit: number): T[] {
  return limit > 0 ? items.slice(0, Math.floor(limit)) : items;
}

function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength) + '...';
}

export class RetrievedContext {
  readonly canonicalFacts: readonly string[];
  readonly worldState: readonly string[];
  readonly episodicMemories: readonly string[];
  readonly beliefs: readonly string[];

  constructor(parts: {
    canonicalFacts?: readonly string[];
    worldState?: readonly string[];
    episodicMemories?: readonly string[];
    beliefs?: readonly string[];
  } = {}) {
    this.canonicalFacts = Object.freeze([...(parts.canonicalFacts ?? [])]);
    this.worldState = Object.freeze([...(parts.worldState ?? [])]);
    this.episodicMemories = Object.freeze([...(parts.episodicMemories ?? [])]);
    this.beliefs = Object.freeze([...(parts.beliefs ?? [])]);
  }

  get totalCount(): number {
    return this.canonicalFacts.length + this.worldState.length +
      this.episodicMemories.length + this.beliefs.length;
  }

  get hasContent(): boolean {
    return this.totalCount > 0;
  }

  applyTo(builder: StateSnapshotBuilder): StateSnapshotBuilder {
    return builder
      .withCanonicalFacts(this.canonicalFacts)
      .withWorldState(this.worldState)
      .withEpisodicMemories(this.episodicMemories)
      .withBeliefs(this.beliefs);
  }
}

/**
 * Ranks the store into a bounded, reproducible context bundle.
 *
 * Same store state + same query/topics + same config => identical output,
 * order included. Every category is materialized into an array and sorted
 * with the full tie-break chain before truncation.
 */
export class ContextRetriever {
  private config: ContextRetrievalConfig;

  constructor(
    private store: MemoryStore,
    config: Partial<ContextRetrievalConfig> = {},
    private options: RetrieverOptions = {}
  ) {
    this.config = ContextRetrievalConfigSchema.parse({ ...DEFAULT_RETRIEVAL_CONFIG, ...config });
  }

  getConfig(): ContextRetrievalConfig {
    return { ...this.config };
  }

  setConfig(config: Partial<ContextRetrievalConfig>): void {
    this.config = ContextRetrievalConfigSchema.parse({ ...this.config, ...config });
  }

  retrieveContext(query?: string | null, topics?: readonly string[] | null): RetrievedContext {
    const input = query ?? '';
    const topicList = normalizeTopics(topics);

    this.log(`Retrieving context for input: '${truncate(input, 50)}'`);

    const result = new RetrievedContext({
      canonicalFacts: this.selectCanonicalFacts(topicList).map((fact) => fact.content),
      worldState: this.selectWorldState(topicList).map((state) => `${state.key}: ${state.value}`),
      episodicMemories: this.rankEpisodicMemories(input, topicList).map((s) => s.entry.description),
      beliefs: this.rankBeliefs(input, topicList).map((s) => formatBeliefSummary(s.entry)),
    });

    this.log(
      `Retrieved: ${result.canonicalFacts.length} facts, ${result.worldState.length} state, ` +
      `${result.episodicMemories.length} episodes, ${result.beliefs.length} beliefs`
    );

    return result;
  }

  /**
   * Facts matching a topic (by content or domain) when topics are given,
   * otherwise all facts; ordered by id (ordinal), then sequence number;
   * limit applies when > 0.
   */
  selectCanonicalFacts(topics?: readonly string[] | null): CanonicalFact[] {
    const topicList = normalizeTopics(topics);
    let facts = this.store.getCanonicalFacts();

    if (topicList.length > 0) {
      facts = facts.filter((fact) =>
        matchesTopics(fact.content, topicList) ||
        (fact.domain !== undefined && topicList.some((topic) => equalsIgnoreCase(topic, fact.domain ?? '')))
      );
    }

    return takePositive(
      facts.sort((a, b) => compareOrdinal(a.id, b.id) || compareSequence(a, b)),
      this.config.maxCanonicalFacts
    );
  }

  selectWorldState(topics?: readonly string[] | null): WorldStateEntry[] {
    const topicList = normalizeTopics(topics);
    let states = this.store.getAllWorldState();

    if (topicList.length > 0) {
      states = states.filter((state) => matchesTopics(`${state.key}: ${state.value}`, topicList));
    }

    return takePositive(
      states.sort((a, b) => compareOrdinal(a.key, b.key) || compareSequence(a, b)),
      this.config.maxWorldState
    );
  }

  rankEpisodicMemories(query?: string | null, topics?: readonly string[] | null): Array<Scored<EpisodicMemoryEntry>> {
    const input = query ?? '';
    const topicList = normalizeTopics(topics);

    const scored = this.store
      .getEpisodicMemories()
      .filter((memory) => memory.strength >= this.config.minEpisodicStrength)
      .map((memory) => ({ entry: memory, score: this.scoreEpisodicMemory(memory, input, topicList) }));

    return rankAndTake(scored, this.config.maxEpisodicMemories);
  }

  rankBeliefs(query?: string | null, topics?: readonly string[] | null): Array<Scored<BeliefMemoryEntry>> {
    const input = query ?? '';
    const topicList = normalizeTopics(topics);

    const scored = this.store
      .getAllBeliefs()
      .filter((entry) => this.passesBeliefFilter(entry))
      .map((entry) => ({ entry, score: this.scoreBelief(entry, input, topicList) }));

    return rankAndTake(scored, this.config.maxBeliefs);
  }

  scoreEpisodicMemory(memory: EpisodicMemoryEntry, query: string, topics: readonly string[]): number {
    const relevance = calculateRelevance(memory.description, query, topics, this.config);

    return (this.config.relevanceWeight * relevance) +
      (this.config.recencyWeight * memory.strength) +
      (this.config.significanceWeight * memory.significance);
  }

  scoreBelief(entry: BeliefMemoryEntry, query: string, topics: readonly string[]): number {
    const relevance = calculateRelevance(entry.content, query, topics, this.config);
    const confidence = effectiveConfidence(entry, this.config.contradictionPenalty);

    return (this.config.beliefRelevanceWeight * relevance) +
      (this.config.beliefConfidenceWeight * confidence);
  }

  // Contradicted beliefs only pass when explicitly allowed; they then rank with the penalty applied.
  private passesBeliefFilter(entry: BeliefMemoryEntry): boolean {
    if (entry.isContradicted && !this.config.includeContradictedBeliefs) {
      return false;
    }
    return entry.confidence >= this.config.minBeliefConfidence;
  }

  private log(message: string): void {
    this.options.onLog?.(`[retrieval] ${message}`);
  }
}

export function formatMemoriesForContext(context: RetrievedContext): string {
  const sections: string[] = [];

  if (context.canonicalFacts.length > 0) {
    sections.push(`## Canonical Facts\n${context.canonicalFacts.map((fact) => `- ${fact}`).join('\n')}`);
  }

  if (context.worldState.length > 0) {
    sections.push(`## World State\n${context.worldState.map((state) => `- ${state}`).join('\n')}`);
  }

  if (context.episodicMemories.length > 0) {
    sections.push(`## Memories\n${context.episodicMemories.map((memory) => `- ${memory}`).join('\n')}`);
  }

  if (context.beliefs.length > 0) {
    sections.push(`## Beliefs\n${context.beliefs.map((entry) => `- ${entry}`).join('\n')}`);
  }

  return sections.join('\n\n');
}
