import { Command } from '@commander-js/extra-typings';
import { withSession } from '../../core/session.js';
import { fromPlayerUtterance } from '../../core/snapshot.js';
import { formatMemoriesForContext } from '../../memory/retriever.js';
import { cliLog, dim, emptyState, fail } from '../ui.js';

export const contextCommand = new Command('context')
  .description('Show the ranked context the NPC would see for an input')
  .argument('[query...]', 'What the player says')
  .option('-t, --topic <topic...>', 'Topic filters')
  .option('--json', 'Print the snapshot memory lines as JSON')
  .action((query, options) => {
    try {
      const result = withSession((session) => session.contextBuilder.build(
        fromPlayerUtterance(session.config.npcId, query.join(' ')),
        { topics: options.topic }
      ), { onLog: cliLog });

      const { snapshot, retrieved } = result;

      if (options.json) {
        console.log(JSON.stringify(snapshot.getAllMemoryForPrompt(), null, 2));
        return;
      }

      if (!retrieved.hasContent) {
        emptyState('No memories to retrieve.', 'Add some with: recall fact, recall state, recall remember');
        return;
      }

      console.log(formatMemoriesForContext(retrieved));
      console.log();
      console.log(dim(`${snapshot.toString()} (~${result.tokenEstimate} tokens)`));
    } catch (err) {
      fail(err);
    }
  });
