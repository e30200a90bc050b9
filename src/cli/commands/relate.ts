import { Command } from '@commander-js/extra-typings';
import { withSession } from '../../core/session.js';
import { cliLog, fail, formatRelation, success } from '../ui.js';
import { parseNumber } from './parse.js';

export const relateCommand = new Command('relate')
  .description('Set how an NPC relates to someone')
  .argument('<target>', 'Who the relationship is with')
  .argument('<label...>', 'Relationship label, e.g. "trusted friend"')
  .option('-o, --owner <npc>', 'NPC holding the relationship (defaults to the project NPC)')
  .option('--as <npc>', 'NPC making the change (defaults to the project NPC)')
  .option('-a, --affinity <n>', 'Affinity from -1 to 1', parseNumber)
  .option('-t, --trust <n>', 'Trust from 0 to 1', parseNumber)
  .option('-f, --familiarity <n>', 'Familiarity from 0 to 1', parseNumber)
  .action((target, label, options) => {
    try {
      const entry = withSession((session) => {
        const owner = options.owner ?? session.config.npcId;
        return session.store.setRelationship({
          ownerNpcId: owner,
          targetId: target,
          relationshipLabel: label.join(' '),
          affinity: options.affinity,
          trust: options.trust,
          familiarity: options.familiarity,
        }, options.as ?? session.config.npcId);
      }, { mutate: true, onLog: cliLog });

      console.log(success('Relationship set'));
      console.log(`   ${formatRelation(entry)}`);
    } catch (err) {
      fail(err);
    }
  });
