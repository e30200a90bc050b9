import { nanoid } from 'nanoid';
import { ConstraintSet } from './constraints.js';

export type TriggerReason =
  | 'player_utterance'
  | 'zone_trigger'
  | 'time_trigger'
  | 'quest_trigger'
  | 'npc_interaction'
  | 'world_event'
  | 'custom';

// Why the NPC is being asked to speak.
export interface InteractionContext {
  readonly triggerReason: TriggerReason;
  readonly npcId?: string;
  readonly triggerId?: string;
  readonly playerInput?: string;
  readonly triggerPrompt?: string;
  readonly gameTime: number;
  readonly sceneName?: string;
  readonly interactionCount: number;
  readonly tags?: readonly string[];
}

export function createInteractionContext(fields: Partial<InteractionContext> = {}): InteractionContext {
  return Object.freeze({
    triggerReason: 'player_utterance',
    gameTime: 0,
    interactionCount: 0,
    ...fields,
    tags: fields.tags ? Object.freeze([...fields.tags]) : undefined,
  });
}

export function fromPlayerUtterance(npcId: string, playerInput: string, gameTime: number = 0): InteractionContext {
  return createInteractionContext({ triggerReason: 'player_utterance', npcId, playerInput, gameTime });
}

export function fromZoneTrigger(
  npcId: string,
  triggerId: string,
  triggerPrompt: string,
  gameTime: number = 0
): InteractionContext {
  return createInteractionContext({ triggerReason: 'zone_trigger', npcId, triggerId, triggerPrompt, gameTime });
}

interface SnapshotFields {
  snapshotId: string;
  createdAt: Date;
  context: InteractionContext;
  constraints: ConstraintSet;
  canonicalFacts: readonly string[];
  worldState: readonly string[];
  episodicMemories: readonly string[];
  beliefs: readonly string[];
  dialogueHistory: readonly string[];
  systemPrompt: string;
  playerInput: string;
  attemptNumber: number;
  maxAttempts: number;
  metadata: Readonly<Record<string, string>>;
}

function frozenList(items: readonly string[]): readonly string[] {
  return Object.freeze([...items]);
}

/**
 * Immutable bundle of everything the prompt builder needs for one attempt.
 * Every field is copied on the way in, so later changes to the source arrays
 * or the store never leak into an existing snapshot.
 */
export class StateSnapshot {
  readonly snapshotId: string;
  readonly createdAt: Date;
  readonly context: InteractionContext;
  readonly canonicalFacts: readonly string[];
  readonly worldState: readonly string[];
  readonly episodicMemories: readonly string[];
  readonly beliefs: readonly string[];
  readonly dialogueHistory: readonly string[];
  readonly systemPrompt: string;
  readonly playerInput: string;
  readonly attemptNumber: number;
  readonly maxAttempts: number;
  readonly metadata: Readonly<Record<string, string>>;

  private readonly constraintSet: ConstraintSet;

  constructor(fields: SnapshotFields) {
    this.snapshotId = fields.snapshotId;
    this.createdAt = new Date(fields.createdAt.getTime());
    this.context = createInteractionContext(fields.context);
    this.constraintSet = fields.constraints.clone();
    this.canonicalFacts = frozenList(fields.canonicalFacts);
    this.worldState = frozenList(fields.worldState);
    this.episodicMemories = frozenList(fields.episodicMemories);
    this.beliefs = frozenList(fields.beliefs);
    this.dialogueHistory = frozenList(fields.dialogueHistory);
    this.systemPrompt = fields.systemPrompt;
    this.playerInput = fields.playerInput;
    this.attemptNumber = fields.attemptNumber;
    this.maxAttempts = fields.maxAttempts;
    this.metadata = Object.freeze({ ...fields.metadata });
  }

  // A copy, so callers cannot add constraints to a built snapshot.
  get constraints(): ConstraintSet {
    return this.constraintSet.clone();
  }

  get totalMemoryCount(): number {
    return this.canonicalFacts.length + this.worldState.length +
      this.episodicMemories.length + this.beliefs.length;
  }

  get canRetry(): boolean {
    return this.attemptNumber < this.maxAttempts;
  }

  /**
   * Next attempt: fresh id, attempt number + 1, constraints merged with the
   * extra set (union by id), everything else copied by value.
   */
  forRetry(additionalConstraints?: ConstraintSet | null): StateSnapshot {
    return new StateSnapshot({
      ...this.fields(),
      snapshotId: nanoid(),
      createdAt: new Date(),
      attemptNumber: this.attemptNumber + 1,
      constraints: this.constraintSet.merge(additionalConstraints),
    });
  }

  getAllMemoryForPrompt(): string[] {
    return [
      ...this.canonicalFacts.map((fact) => `[Fact] ${fact}`),
      ...this.worldState.map((state) => `[State] ${state}`),
      ...this.episodicMemories.map((memory) => `[Memory] ${memory}`),
      ...this.beliefs,
    ];
  }

  toString(): string {
    return `StateSnapshot[${this.snapshotId}] Attempt ${this.attemptNumber + 1}/${this.maxAttempts}, ` +
      `${this.totalMemoryCount} memories, ${this.constraintSet.count} constraints`;
  }

  private fields(): SnapshotFields {
    return {
      snapshotId: this.snapshotId,
      createdAt: this.createdAt,
      context: this.context,
      constraints: this.constraintSet,
      canonicalFacts: this.canonicalFacts,
      worldState: this.worldState,
      episodicMemories: this.episodicMemories,
      beliefs: this.beliefs,
      dialogueHistory: this.dialogueHistory,
      systemPrompt: this.systemPrompt,
      playerInput: this.playerInput,
      attemptNumber: this.attemptNumber,
      maxAttempts: this.maxAttempts,
      metadata: this.metadata,
    };
  }
}

export const DEFAULT_MAX_ATTEMPTS = 3;

export class StateSnapshotBuilder {
  private context: InteractionContext = createInteractionContext();
  private constraints = new ConstraintSet();
  private canonicalFacts: string[] = [];
  private worldState: string[] = [];
  private episodicMemories: string[] = [];
  private beliefs: string[] = [];
  private dialogueHistory: string[] = [];
  private systemPrompt = '';
  private playerInput = '';
  private attemptNumber = 0;
  private maxAttempts = DEFAULT_MAX_ATTEMPTS;
  private metadata: Record<string, string> = {};

  withContext(context: InteractionContext): this {
    this.context = context;
    return this;
  }

  withConstraints(constraints: ConstraintSet): this {
    this.constraints = constraints.clone();
    return this;
  }

  withCanonicalFacts(facts: Iterable<string>): this {
    this.canonicalFacts.push(...facts);
    return this;
  }

  withWorldState(state: Iterable<string>): this {
    this.worldState.push(...state);
    return this;
  }

  withEpisodicMemories(memories: Iterable<string>): this {
    this.episodicMemories.push(...memories);
    return this;
  }

  withBeliefs(beliefs: Iterable<string>): this {
    this.beliefs.push(...beliefs);
    return this;
  }

  withDialogueHistory(history: Iterable<string>): this {
    this.dialogueHistory.push(...history);
    return this;
  }

  withSystemPrompt(prompt: string): this {
    this.systemPrompt = prompt;
    return this;
  }

  withPlayerInput(input: string): this {
    this.playerInput = input;
    return this;
  }

  withAttemptNumber(attempt: number): this {
    this.attemptNumber = attempt;
    return this;
  }

  withMaxAttempts(maxAttempts: number): this {
    this.maxAttempts = maxAttempts;
    return this;
  }

  withMetadata(key: string, value: string): this {
    this.metadata[key] = value;
    return this;
  }

  build(): StateSnapshot {
    return new StateSnapshot({
      snapshotId: nanoid(),
      createdAt: new Date(),
      context: this.context,
      constraints: this.constraints,
      canonicalFacts: this.canonicalFacts,
      worldState: this.worldState,
      episodicMemories: this.episodicMemories,
      beliefs: this.beliefs,
      dialogueHistory: this.dialogueHistory,
      systemPrompt: this.systemPrompt,
      playerInput: this.playerInput,
      attemptNumber: this.attemptNumber,
      maxAttempts: this.maxAttempts,
      metadata: this.metadata,
    });
  }
}
