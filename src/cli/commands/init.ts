import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { getMemoryDbPath, initProject, RECALL_DIR } from '../../config/index.js';
import { MemoryDatabase } from '../../persistence/database.js';
import { cliLog, dim, fail, success } from '../ui.js';

export const initCommand = new Command('init')
  .description('Initialize npc-recall in the current directory')
  .option('-f, --force', 'Overwrite existing configuration')
  .option('--npc <id>', 'Id of the NPC whose memory this project holds')
  .action((options) => {
    const cwd = process.cwd();

    try {
      initProject(cwd, options.force ?? false, options.npc);
      // Create the schema up front so the first read sees an empty store.
      new MemoryDatabase(getMemoryDbPath(cwd), cliLog).close();
    } catch (err) {
      fail(err);
    }

    console.log();
    console.log(success(`Initialized ${chalk.bold(RECALL_DIR)} in ${cwd}`));
    console.log();
    console.log(dim('  Next steps:'));
    console.log(dim(`    ${chalk.cyan('recall fact')} king "The king is Aldric"`));
    console.log(dim(`    ${chalk.cyan('recall state')} door_status open`));
    console.log(dim(`    ${chalk.cyan('recall context')} "Who rules this land?"`));
    console.log();
  });
