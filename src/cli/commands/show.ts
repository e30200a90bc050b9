/**
 * Show what an NPC remembers
 *
 * - recall show → every memory kind
 * - recall show beliefs → one kind
 * - recall show stats → counts
 */

import { Command, Argument } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { withSession } from '../../core/session.js';
import type { MemoryStoreData } from '../../memory/store.js';
import type { MemoryStatistics } from '../../memory/types.js';
import {
  emptyState,
  fail,
  formatBelief,
  formatEpisode,
  formatFact,
  formatRelation,
  formatState,
  header,
  icons,
  keyValue,
  cliLog,
} from '../ui.js';

const SECTIONS = ['facts', 'state', 'memories', 'beliefs', 'relationships', 'stats'] as const;
type Section = typeof SECTIONS[number];

function printSection<T>(title: string, icon: string, items: readonly T[], format: (item: T) => string): void {
  console.log(header(`${title} (${items.length})`, icon));
  if (items.length === 0) {
    console.log(chalk.gray('   (none)'));
    return;
  }
  for (const item of items) {
    console.log(`  ${format(item)}`);
  }
}

function printStats(stats: MemoryStatistics): void {
  console.log(header('Memory statistics'));
  console.log(keyValue('Facts', String(stats.canonicalFactCount), 20));
  console.log(keyValue('World state', String(stats.worldStateCount), 20));
  console.log(keyValue('Episodes', `${stats.episodicMemoryCount} (${stats.activeEpisodicCount} active)`, 20));
  console.log(keyValue('Beliefs', `${stats.beliefCount} (${stats.activeBeliefCount} active)`, 20));
  console.log(keyValue('Relationships', String(stats.relationshipCount), 20));
  console.log(keyValue('Next sequence', String(stats.nextSequenceNumber), 20));
}

function print(section: Section | undefined, data: MemoryStoreData, stats: MemoryStatistics): void {
  const all = section === undefined;

  if (all || section === 'facts') printSection('Canonical facts', icons.fact, data.canonicalFacts, formatFact);
  if (all || section === 'state') printSection('World state', icons.state, data.worldState, formatState);
  if (all || section === 'memories') printSection('Episodic memories', icons.memory, data.episodicMemories, formatEpisode);
  if (all || section === 'beliefs') printSection('Beliefs', icons.belief, data.beliefs, formatBelief);
  if (all || section === 'relationships') {
    printSection('Relationships', icons.relation, data.relationships, formatRelation);
  }
  if (section === 'stats') printStats(stats);
  console.log();
}

export const showCommand = new Command('show')
  .description('Show what the NPC remembers')
  .addArgument(new Argument('[section]', 'What to show').choices(SECTIONS))
  .action((section) => {
    try {
      const { data, stats } = withSession(
        (session) => ({ data: session.store.exportData(), stats: session.store.getStatistics() }),
        { onLog: cliLog }
      );

      const total = data.canonicalFacts.length + data.worldState.length + data.episodicMemories.length +
        data.beliefs.length + data.relationships.length;

      if (total === 0 && section !== 'stats') {
        emptyState('No memories yet.', 'Add your first fact: recall fact king "The king is Aldric"');
        return;
      }

      print(section, data, stats);
    } catch (err) {
      fail(err);
    }
  });
