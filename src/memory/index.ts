/**
 * NPC memory
 *
 * Four tiers, in descending authority:
 * 1. Canonical facts: immutable lore
 * 2. World state: mutable key/value game state
 * 3. Episodic memories: event history that decays
 * 4. Beliefs: subjective and possibly wrong
 */

export * from './types.js';
export * from './errors.js';
export * from './entries.js';
export * from './ordering.js';
export * from './relationships.js';
export * from './store.js';
export * from './retriever.js';
