import { Command, Option } from '@commander-js/extra-typings';
import { withSession } from '../../core/session.js';
import { BELIEF_TYPES } from '../../memory/types.js';
import { cliLog, fail, formatBelief, success, warning } from '../ui.js';
import { parseNumber } from './parse.js';

export const believeCommand = new Command('believe')
  .description('Set a belief the NPC holds (may be wrong)')
  .argument('<id>', 'Belief id (case-insensitive; an existing belief is replaced)')
  .argument('<content...>', 'What the NPC believes')
  .requiredOption('-s, --subject <subject>', 'Who or what the belief is about')
  .addOption(new Option('-t, --type <type>', 'Belief type').choices(BELIEF_TYPES).default('opinion' as const))
  .option('-c, --confidence <n>', 'Confidence from 0 to 1', parseNumber)
  .option('--sentiment <n>', 'Sentiment from -1 to 1', parseNumber)
  .option('-e, --evidence <text>', 'What the belief is based on')
  .action((id, content, options) => {
    try {
      const entry = withSession((session) => session.store.setBelief(id, {
        subject: options.subject,
        content: content.join(' '),
        beliefType: options.type,
        confidence: options.confidence,
        sentiment: options.sentiment,
        evidence: options.evidence,
      }, 'validated_output').toEntry(), { mutate: true, onLog: cliLog });

      if (entry.isContradicted) {
        console.log(warning('Belief stored, but it contradicts a canonical fact'));
      } else {
        console.log(success('Belief stored'));
      }
      console.log(`   ${formatBelief(entry)}`);
    } catch (err) {
      fail(err);
    }
  });
