export * from './memory/index.js';
export * from './core/constraints.js';
export * from './core/snapshot.js';
export * from './core/context-builder.js';
export * from './core/session.js';
export * from './persistence/database.js';
export * from './functions/context-functions.js';
export {
  ConfigSchema,
  ContextRetrievalConfigSchema,
  DEFAULT_RETRIEVAL_CONFIG,
  loadConfig,
  saveConfig,
  initProject,
  findProjectRoot,
} from './config/index.js';
export type { Config, ContextRetrievalConfig, MemoryConfig, SnapshotConfig } from './config/index.js';
export { VERSION } from './version.js';
