import { Command } from '@commander-js/extra-typings';
import { VERSION } from '../version.js';
import { believeCommand } from './commands/believe.js';
import { configCommand } from './commands/config.js';
import { contextCommand } from './commands/context.js';
import { contradictCommand } from './commands/contradict.js';
import { decayCommand } from './commands/decay.js';
import { factCommand } from './commands/fact.js';
import { initCommand } from './commands/init.js';
import { mcpCommand } from './commands/mcp.js';
import { relateCommand } from './commands/relate.js';
import { rememberCommand } from './commands/remember.js';
import { showCommand } from './commands/show.js';
import { stateCommand } from './commands/state.js';
import { setVerbose } from './ui.js';

export const program = new Command()
  .name('recall')
  .description('npc-recall - deterministic memory and context retrieval for NPC dialogue')
  .version(VERSION)
  .option('-v, --verbose', 'Log memory and retrieval activity to stderr');

program.hook('preAction', (thisCommand) => {
  setVerbose(thisCommand.opts().verbose === true);
});

// Project setup
program.addCommand(initCommand);
program.addCommand(configCommand);

// Authoring memory
program.addCommand(factCommand);
program.addCommand(stateCommand);
program.addCommand(rememberCommand);
program.addCommand(believeCommand);
program.addCommand(contradictCommand);
program.addCommand(relateCommand);
program.addCommand(decayCommand);

// Reading memory
program.addCommand(contextCommand);
program.addCommand(showCommand);

// Serving memory to LLM clients
program.addCommand(mcpCommand);

program.action(() => {
  program.help();
});
