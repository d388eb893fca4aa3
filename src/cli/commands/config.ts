import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import {
  loadConfig,
  setConfigValue,
  getConfigValue,
  findProjectRoot,
  initProject,
  isRecord,
} from '../../config/index.js';

function requireRoot(): string {
  const root = findProjectRoot();
  if (!root) {
    console.error(chalk.red('Not in a Banline project. Run `banline init` first.'));
    process.exit(1);
  }
  return root;
}

export const configCommand = new Command('config')
  .description('Manage Banline configuration');

// banline config get [key]
configCommand
  .command('get')
  .argument('[key]', 'Config key (e.g., classifier.banThreshold)')
  .description('Get configuration value(s)')
  .action((key) => {
    const root = requireRoot();

    try {
      if (key) {
        const value = getConfigValue(key, root);
        if (value === undefined) {
          console.error(chalk.red(`Unknown config key: ${key}`));
          process.exit(1);
        }
        console.log(formatValue(value));
      } else {
        console.log(JSON.stringify(loadConfig(root), null, 2));
      }
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red(`Error: ${error.message}`));
      }
      process.exit(1);
    }
  });

// banline config set <key> <value>
configCommand
  .command('set')
  .argument('<key>', 'Config key (e.g., training.epochs)')
  .argument('<value>', 'New value')
  .description('Set a configuration value')
  .action((key, value) => {
    const root = requireRoot();

    try {
      setConfigValue(key, value, root);
      console.log(chalk.green(`✓ Set ${key} = ${value}`));
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red(`Error: ${error.message}`));
      }
      process.exit(1);
    }
  });

// banline config list
configCommand
  .command('list')
  .description('List all configuration values')
  .action(() => {
    const root = requireRoot();
    printConfigTree(loadConfig(root), '');
  });

// banline config reset
configCommand
  .command('reset')
  .description('Reset configuration to defaults')
  .option('-y, --yes', 'Skip confirmation')
  .action((options) => {
    const root = requireRoot();

    if (!options.yes) {
      console.log(chalk.yellow('This will reset all configuration to defaults.'));
      console.log(chalk.gray('Use --yes to skip this confirmation.'));
      return;
    }

    try {
      initProject(root, true);
      console.log(chalk.green('✓ Configuration reset to defaults'));
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red(`Error: ${error.message}`));
      }
      process.exit(1);
    }
  });

function formatValue(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value, null, 2);
  }
  return String(value);
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
