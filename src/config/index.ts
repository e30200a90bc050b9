import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';

// Weights and limits are used as given (out-of-range values are not rejected);
// only non-numbers and NaN fail validation.
export const ContextRetrievalConfigSchema = z.object({
  maxCanonicalFacts: z.number().default(0),
  maxWorldState: z.number().default(0),
  maxEpisodicMemories: z.number().default(10),
  maxBeliefs: z.number().default(10),
  minEpisodicStrength: z.number().default(0.1),
  minBeliefConfidence: z.number().default(0.5),
  includeContradictedBeliefs: z.boolean().default(false),
  relevanceWeight: z.number().default(0.4),
  recencyWeight: z.number().default(0.4),
  significanceWeight: z.number().default(0.2),
  beliefRelevanceWeight: z.number().default(0.6),
  beliefConfidenceWeight: z.number().default(0.4),
  contradictionPenalty: z.number().default(0.5),
  topicBoost: z.number().default(0.3),
  maxRelevance: z.number().default(1.0),
});

export const MemoryConfigSchema = z.object({
  episodicDecayRate: z.number().min(0).default(0.05),
  enforceAuthority: z.boolean().default(false),
});

export const SnapshotConfigSchema = z.object({
  maxAttempts: z.number().int().positive().default(3),
  systemPrompt: z.string().default(''),
});

export const ConfigSchema = z.object({
  version: z.number().default(1),
  npcId: z.string().default('npc'),
  retrieval: ContextRetrievalConfigSchema.default({}),
  memory: MemoryConfigSchema.default({}),
  snapshot: SnapshotConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ContextRetrievalConfig = z.infer<typeof ContextRetrievalConfigSchema>;
export type MemoryConfig = z.infer<typeof MemoryConfigSchema>;
export type SnapshotConfig = z.infer<typeof SnapshotConfigSchema>;

export const DEFAULT_RETRIEVAL_CONFIG: ContextRetrievalConfig = ContextRetrievalConfigSchema.parse({});

export const RECALL_DIR = '.recall';
export const CONFIG_FILE = 'config.json';
export const MEMORY_DB = 'memory.db';

export function findProjectRoot(startDir: string = process.cwd()): string | null {
  let currentDir = startDir;

  while (currentDir !== path.dirname(currentDir)) {
    const recallPath = path.join(currentDir, RECALL_DIR);
    if (fs.existsSync(recallPath) && fs.statSync(recallPath).isDirectory()) {
      return currentDir;
    }
    currentDir = path.dirname(currentDir);
  }

  return null;
}

export function getRecallPath(projectRoot?: string): string {
  const root = projectRoot ?? findProjectRoot();
  if (!root) {
    throw new Error('Not in an npc-recall project. Run `recall init` first.');
  }
  return path.join(root, RECALL_DIR);
}

export function getConfigPath(projectRoot?: string): string {
  return path.join(getRecallPath(projectRoot), CONFIG_FILE);
}

export function getMemoryDbPath(projectRoot?: string): string {
  return path.join(getRecallPath(projectRoot), MEMORY_DB);
}

export function loadConfig(projectRoot?: string): Config {
  const configPath = getConfigPath(projectRoot);

  if (!fs.existsSync(configPath)) {
    return ConfigSchema.parse({});
  }

  try {
    const rawConfig: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    return ConfigSchema.parse(rawConfig);
  } catch {
    // Corrupt or invalid config - fall back to defaults
    return ConfigSchema.parse({});
  }
}

export function saveConfig(config: Config, projectRoot?: string): void {
  const configPath = getConfigPath(projectRoot);
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2), { mode: 0o600 });
}

export function initProject(
  targetDir: string = process.cwd(),
  force: boolean = false,
  npcId?: string
): void {
  const recallPath = path.join(targetDir, RECALL_DIR);

  if (fs.existsSync(recallPath) && !force) {
    throw new Error('npc-recall already initialized. Use --force to reinitialize.');
  }

  fs.mkdirSync(recallPath, { recursive: true, mode: 0o700 });

  const defaultConfig = ConfigSchema.parse(npcId ? { npcId } : {});
  fs.writeFileSync(
    path.join(recallPath, CONFIG_FILE),
    JSON.stringify(defaultConfig, null, 2),
    { mode: 0o600 }
  );

  fs.writeFileSync(path.join(recallPath, '.gitignore'), `# npc-recall local files
memory.db
memory.db-journal
memory.db-wal
`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function setConfigValue(key: string, value: string, projectRoot?: string): void {
  const config: Record<string, unknown> = { ...loadConfig(projectRoot) };
  const keys = key.split('.');

  let current: Record<string, unknown> = config;
  for (let i = 0; i < keys.length - 1; i++) {
    const next = current[keys[i]];
    if (!isRecord(next)) {
      throw new Error(`Invalid config key: ${key}`);
    }
    const copy = { ...next };
    current[keys[i]] = copy;
    current = copy;
  }

  const lastKey = keys[keys.length - 1];
  if (!(lastKey in current)) {
    throw new Error(`Invalid config key: ${key}`);
  }

  const existingValue = current[lastKey];
  if (typeof existingValue === 'number') {
    current[lastKey] = parseFloat(value);
  } else if (typeof existingValue === 'boolean') {
    current[lastKey] = value === 'true';
  } else {
    current[lastKey] = value;
  }

  const validated = ConfigSchema.parse(config);
  saveConfig(validated, projectRoot);
}

export function getConfigValue(key: string, projectRoot?: string): unknown {
  const config = loadConfig(projectRoot);
  const keys = key.split('.');

  let current: unknown = config;
  for (const k of keys) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[k];
  }

  return current;
}
