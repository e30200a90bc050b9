import { Command } from '@commander-js/extra-typings';
import { withSession } from '../../core/session.js';
import { cliLog, fail, formatBelief, success } from '../ui.js';

export const contradictCommand = new Command('contradict')
  .description('Mark a belief as contradicted')
  .argument('<id>', 'Belief id')
  .argument('<reason...>', 'Why the belief is wrong')
  .action((id, reason) => {
    try {
      const entry = withSession((session) => {
        const handle = session.store.getBelief(id);
        if (!handle) {
          throw new Error(`Belief not found: ${id}`);
        }
        handle.markContradicted(reason.join(' '));
        return handle.toEntry();
      }, { mutate: true, onLog: cliLog });

      console.log(success(`Belief '${entry.id}' marked as contradicted`));
      console.log(`   ${formatBelief(entry)}`);
    } catch (err) {
      fail(err);
    }
  });
