import { Command } from '@commander-js/extra-typings';
import { withSession } from '../../core/session.js';
import { cliLog, fail, success } from '../ui.js';
import { parseCount } from './parse.js';

export const decayCommand = new Command('decay')
  .description('Apply episodic memory decay')
  .option('-n, --steps <n>', 'Number of decay steps to apply', parseCount, 1)
  .action((options) => {
    try {
      const { changed, rate } = withSession((session) => {
        let total = 0;
        for (let i = 0; i < options.steps; i++) {
          total += session.store.applyEpisodicDecay();
        }
        return { changed: total, rate: session.store.episodicDecayRate };
      }, { mutate: true, onLog: cliLog });

      console.log(success(`Applied ${options.steps} decay step(s) at rate ${rate}: ${changed} update(s)`));
    } catch (err) {
      fail(err);
    }
  });
