/**
 * Terminal formatting helpers
 */

import chalk from 'chalk';
import { effectiveConfidence, formatBeliefSummary } from '../memory/entries.js';
import { formatRelationship } from '../memory/relationships.js';
import type {
  BeliefMemoryEntry,
  CanonicalFact,
  EpisodicMemoryEntry,
  LogFn,
  RelationshipEntry,
  WorldStateEntry,
} from '../memory/types.js';

export const icons = {
  fact: '\u{1F4DC}',      // scroll - canonical lore
  state: '\u{1F30D}',     // globe - world state
  memory: '\u{1F4AD}',    // thought balloon - episodes
  belief: '\u{1F914}',    // thinking face - beliefs
  relation: '\u{1F91D}',  // handshake - relationships
  dot: '\u{2022}',
};

export function success(message: string): string {
  return chalk.green('✓') + ' ' + message;
}

export function error(message: string): string {
  return chalk.red('✗') + ' ' + message;
}

export function warning(message: string): string {
  return chalk.yellow('⚠') + ' ' + message;
}

export function info(message: string): string {
  return chalk.blue('ℹ') + ' ' + message;
}

export function header(text: string, emoji?: string): string {
  const decoration = chalk.gray('─'.repeat(40));
  const prefix = emoji ? emoji + ' ' : '';
  return `\n${decoration}\n${prefix}${chalk.bold.cyan(text)}\n${decoration}\n`;
}

export function keyValue(key: string, value: string, keyWidth?: number): string {
  const width = keyWidth ?? 15;
  return `${chalk.cyan(key.padEnd(width))} ${value}`;
}

export function dim(text: string): string {
  return chalk.gray(text);
}

export function emptyState(message: string, hint?: string): void {
  console.log();
  console.log(chalk.gray(`   ${message}`));
  if (hint) {
    console.log(chalk.gray.dim(`   ${hint}`));
  }
  console.log();
}

export function formatFact(fact: CanonicalFact): string {
  const domain = fact.domain ? chalk.gray(` (${fact.domain})`) : '';
  return `${icons.fact} ${chalk.magenta(`[${fact.id}]`)} ${chalk.white(fact.content)}${domain}`;
}

export function formatState(state: WorldStateEntry): string {
  return `${icons.state} ${chalk.cyan(state.key)} = ${chalk.white(state.value)} ` +
    chalk.dim(`(${state.source}, ${state.modificationCount} changes)`);
}

export function formatEpisode(memory: EpisodicMemoryEntry): string {
  const strength = memory.strength.toFixed(2);
  const color = memory.strength >= 0.5 ? chalk.green : memory.strength > 0.1 ? chalk.yellow : chalk.red;
  return `${icons.memory} ${chalk.white(memory.description)}\n   ` +
    chalk.dim(`${memory.episodeType} | significance ${memory.significance.toFixed(2)} | `) +
    color(`strength ${strength}`);
}

export function formatBelief(entry: BeliefMemoryEntry): string {
  const summary = entry.isContradicted ? chalk.yellow(formatBeliefSummary(entry)) : chalk.white(formatBeliefSummary(entry));
  let output = `${icons.belief} ${chalk.blue(`[${entry.id}]`)} ${summary}`;
  output += `\n   ${chalk.dim(`about ${entry.subject} | confidence ${effectiveConfidence(entry).toFixed(2)}`)}`;
  if (entry.contradictionReason) {
    output += `\n   ${chalk.yellow(`→ ${entry.contradictionReason}`)}`;
  }
  return output;
}

export function formatRelation(entry: RelationshipEntry): string {
  return `${icons.relation} ${chalk.white(formatRelationship(entry))}`;
}

let verbose = false;

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

/**
 * Log sink for the core: dimmed lines on stderr, only with --verbose.
 * stdout stays clean for piping and the MCP stdio transport.
 */
export const cliLog: LogFn = (message) => {
  if (verbose) {
    console.error(dim(message));
  }
};

export function fail(err: unknown): never {
  console.error(error(err instanceof Error ? err.message : String(err)));
  process.exit(1);
}
