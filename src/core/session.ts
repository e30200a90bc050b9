import { findProjectRoot, getMemoryDbPath, loadConfig } from '../config/index.js';
import type { Config } from '../config/index.js';
import { ContextRetriever } from '../memory/retriever.js';
import { MemoryStore } from '../memory/store.js';
import type { LogFn } from '../memory/types.js';
import { MemoryDatabase } from '../persistence/database.js';
import { ContextBuilder } from './context-builder.js';

/**
 * One NPC's memory opened from a project directory: config, a store loaded
 * from the project's database, and the retrieval pipeline over it.
 */
export class RecallSession {
  readonly config: Config;
  readonly store: MemoryStore;
  readonly retriever: ContextRetriever;
  readonly contextBuilder: ContextBuilder;

  private readonly db: MemoryDatabase;

  constructor(readonly projectRoot: string, onLog?: LogFn) {
    this.config = loadConfig(projectRoot);
    this.store = new MemoryStore({
      episodicDecayRate: this.config.memory.episodicDecayRate,
      enforceAuthority: this.config.memory.enforceAuthority,
      onLog,
    });
    this.db = new MemoryDatabase(getMemoryDbPath(projectRoot), onLog);
    this.db.load(this.store);

    this.retriever = new ContextRetriever(this.store, this.config.retrieval, { onLog });
    this.contextBuilder = new ContextBuilder(this.retriever, {
      systemPrompt: this.config.snapshot.systemPrompt,
      maxAttempts: this.config.snapshot.maxAttempts,
    }, onLog);
  }

  save(): void {
    this.db.save(this.store);
  }

  close(): void {
    this.db.close();
  }
}

export function openSession(projectRoot?: string, onLog?: LogFn): RecallSession {
  const root = projectRoot ?? findProjectRoot();
  if (!root) {
    throw new Error('Not in an npc-recall project. Run `recall init` first.');
  }
  return new RecallSession(root, onLog);
}

/**
 * Runs `fn` against a freshly loaded session, saving afterwards when `mutate`
 * is set. The database is closed either way.
 */
export function withSession<T>(
  fn: (session: RecallSession) => T,
  options: { projectRoot?: string; mutate?: boolean; onLog?: LogFn } = {}
): T {
  const session = openSession(options.projectRoot, options.onLog);
  try {
    const result = fn(session);
    if (options.mutate) {
      session.save();
    }
    return result;
  } finally {
    session.close();
  }
}
