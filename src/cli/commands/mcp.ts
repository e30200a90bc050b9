import { Command } from '@commander-js/extra-typings';
import { findProjectRoot } from '../../config/index.js';
import { runMcpServer } from '../../mcp/server.js';
import { VERSION } from '../../version.js';
import { fail } from '../ui.js';

export const mcpCommand = new Command('mcp')
  .description('Serve this NPC\'s memory over MCP (stdio)')
  .action(async () => {
    const root = findProjectRoot();
    if (!root) {
      fail(new Error('Not in an npc-recall project. Run `recall init` first.'));
    }

    try {
      await runMcpServer(root, VERSION);
    } catch (err) {
      fail(err);
    }
  });
