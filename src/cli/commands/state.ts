import { Command } from '@commander-js/extra-typings';
import { withSession } from '../../core/session.js';
import { cliLog, emptyState, fail, formatState, success } from '../ui.js';

export const stateCommand = new Command('state')
  .description('Read or set a world state value')
  .argument('<key>', 'State key (case-insensitive)')
  .argument('[value...]', 'New value; omit to read the current one')
  .action((key, value) => {
    try {
      if (value.length === 0) {
        const entry = withSession((session) => session.store.getWorldState(key), { onLog: cliLog });
        if (!entry) {
          emptyState(`No world state for '${key}'.`);
          return;
        }
        console.log(formatState(entry));
        return;
      }

      const entry = withSession(
        (session) => session.store.setWorldState(key, value.join(' '), 'game_system'),
        { mutate: true, onLog: cliLog }
      );
      console.log(success(`${entry.key} = ${entry.value}`));
    } catch (err) {
      fail(err);
    }
  });
