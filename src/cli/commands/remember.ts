import { Command, Option } from '@commander-js/extra-typings';
import { withSession } from '../../core/session.js';
import { EPISODE_TYPES } from '../../memory/types.js';
import { cliLog, fail, formatEpisode, success } from '../ui.js';
import { parseNumber } from './parse.js';

export const rememberCommand = new Command('remember')
  .description('Record an episodic memory')
  .argument('<text...>', 'What happened')
  .option('-s, --speaker <name>', 'Record as dialogue spoken by this speaker')
  .addOption(new Option('-t, --type <type>', 'Episode type').choices(EPISODE_TYPES))
  .option('--significance <n>', 'Importance from 0 to 1', parseNumber)
  .action((text, options) => {
    try {
      const entry = withSession((session) => {
        const body = text.join(' ');
        if (options.speaker) {
          return session.store.addDialogue(options.speaker, body, options.significance ?? 0.5, 'validated_output');
        }
        return session.store.addEpisodicMemory({
          description: body,
          episodeType: options.type ?? 'event',
          significance: options.significance,
        }, 'validated_output');
      }, { mutate: true, onLog: cliLog });

      console.log(success('Remembered'));
      console.log(`   ${formatEpisode(entry)}`);
    } catch (err) {
      fail(err);
    }
  });
