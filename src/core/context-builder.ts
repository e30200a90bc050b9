import type { ContextRetriever, RetrievedContext } from '../memory/retriever.js';
import type { LogFn } from '../memory/types.js';
import type { ConstraintSet } from './constraints.js';
import { DEFAULT_MAX_ATTEMPTS, StateSnapshotBuilder } from './snapshot.js';
import type { InteractionContext, StateSnapshot } from './snapshot.js';

export interface ContextBuilderConfig {
  systemPrompt: string;
  maxAttempts: number;
  historyTokens: number;       // Budget for dialogue history lines
}

export const DEFAULT_CONTEXT_BUILDER_CONFIG: ContextBuilderConfig = {
  systemPrompt: '',
  maxAttempts: DEFAULT_MAX_ATTEMPTS,
  historyTokens: 1000,
};

export interface BuildOptions {
  topics?: readonly string[];
  constraints?: ConstraintSet;
  dialogueHistory?: readonly string[];
  metadata?: Record<string, string>;
}

export interface BuiltSnapshot {
  snapshot: StateSnapshot;
  retrieved: RetrievedContext;
  tokenEstimate: number;
}

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

// The text that drives relevance scoring for an interaction.
export function queryFor(context: InteractionContext): string {
  return context.playerInput ?? context.triggerPrompt ?? '';
}

/**
 * Keeps the most recent history lines that fit the token budget, oldest first.
 */
export function truncateHistory(history: readonly string[], maxTokens: number): string[] {
  const result: string[] = [];
  let totalTokens = 0;

  for (let i = history.length - 1; i >= 0; i--) {
    const lineTokens = estimateTokens(history[i]);
    if (totalTokens + lineTokens > maxTokens) break;
    result.unshift(history[i]);
    totalTokens += lineTokens;
  }

  return result;
}

export class ContextBuilder {
  private config: ContextBuilderConfig;

  constructor(
    private retriever: ContextRetriever,
    config: Partial<ContextBuilderConfig> = {},
    private onLog?: LogFn
  ) {
    this.config = { ...DEFAULT_CONTEXT_BUILDER_CONFIG, ...config };
  }

  /**
   * Retrieves context for the interaction and folds it into a first-attempt
   * snapshot.
   */
  build(context: InteractionContext, options: BuildOptions = {}): BuiltSnapshot {
    const query = queryFor(context);
    const retrieved = this.retriever.retrieveContext(query, options.topics);
    const history = truncateHistory(options.dialogueHistory ?? [], this.config.historyTokens);

    const builder = new StateSnapshotBuilder()
      .withContext(context)
      .withSystemPrompt(this.config.systemPrompt)
      .withPlayerInput(context.playerInput ?? '')
      .withDialogueHistory(history)
      .withMaxAttempts(this.config.maxAttempts);

    if (options.constraints) {
      builder.withConstraints(options.constraints);
    }
    for (const [key, value] of Object.entries(options.metadata ?? {})) {
      builder.withMetadata(key, value);
    }

    const snapshot = retrieved.applyTo(builder).build();

    const tokenEstimate = [
      snapshot.systemPrompt,
      snapshot.playerInput,
      ...snapshot.dialogueHistory,
      ...snapshot.getAllMemoryForPrompt(),
      ...snapshot.constraints.all.map((constraint) => constraint.promptInjection),
    ].reduce((sum, text) => sum + estimateTokens(text), 0);

    this.onLog?.(`[context] Built ${snapshot.toString()} (~${tokenEstimate} tokens)`);

    return { snapshot, retrieved, tokenEstimate };
  }

  getConfig(): ContextBuilderConfig {
    return { ...this.config };
  }

  setConfig(config: Partial<ContextBuilderConfig>): void {
    this.config = { ...this.config, ...config };
  }
}
