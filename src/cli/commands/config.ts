import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import {
  findProjectRoot,
  getConfigValue,
  initProject,
  loadConfig,
  setConfigValue,
} from '../../config/index.js';
import { fail, success, warning } from '../ui.js';

function requireProjectRoot(): string {
  const root = findProjectRoot();
  if (!root) {
    fail(new Error('Not in an npc-recall project. Run `recall init` first.'));
  }
  return root;
}

export const configCommand = new Command('config')
  .description('Manage npc-recall configuration');

// recall config get [key]
configCommand
  .command('get')
  .argument('[key]', 'Config key (e.g., retrieval.maxBeliefs)')
  .description('Get configuration value(s)')
  .action((key) => {
    const root = requireProjectRoot();

    try {
      if (key) {
        const value = getConfigValue(key, root);
        if (value === undefined) {
          fail(new Error(`Unknown config key: ${key}`));
        }
        console.log(formatValue(value));
      } else {
        console.log(JSON.stringify(loadConfig(root), null, 2));
      }
    } catch (err) {
      fail(err);
    }
  });

// recall config set <key> <value>
configCommand
  .command('set')
  .argument('<key>', 'Config key (e.g., retrieval.maxBeliefs)')
  .argument('<value>', 'New value')
  .description('Set a configuration value')
  .action((key, value) => {
    const root = requireProjectRoot();

    try {
      setConfigValue(key, value, root);
      console.log(success(`Set ${key} = ${value}`));
    } catch (err) {
      fail(err);
    }
  });

// recall config list
configCommand
  .command('list')
  .description('List all configuration values')
  .action(() => {
    const root = requireProjectRoot();

    try {
      printConfigTree(loadConfig(root), '');
    } catch (err) {
      fail(err);
    }
  });

// recall config reset
configCommand
  .command('reset')
  .description('Reset configuration to defaults')
  .option('-y, --yes', 'Skip confirmation')
  .action((options) => {
    const root = requireProjectRoot();

    if (!options.yes) {
      console.log(warning('This will reset all configuration to defaults.'));
      console.log(chalk.gray('Use --yes to skip this confirmation.'));
      return;
    }

    try {
      const { npcId } = loadConfig(root);
      initProject(root, true, npcId);
      console.log(success('Configuration reset to defaults'));
    } catch (err) {
      fail(err);
    }
  });

function formatValue(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value, null, 2);
  }
  return String(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function printConfigTree(obj: Record<string, unknown>, prefix: string): void {
  for (const [key, value] of Object.entries(obj)) {
    const fullKey = prefix ? `${prefix}.${key}` : key;

    if (isRecord(value)) {
      console.log(chalk.bold(`${fullKey}:`));
      printConfigTree(value, fullKey);
    } else {
      console.log(`  ${chalk.cyan(fullKey)} = ${chalk.white(formatValue(value))}`);
    }
  }
}
