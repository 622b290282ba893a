import { emptyState } from '@stratoform/state';
import chalk from 'chalk';
import { Command } from 'commander';

import { getStateManager, resolveStatePath } from '../context';

interface InitOptions {
  state?: string;
}

export function createInitCommand(): Command {
  return new Command('init')
    .description('Initialize a new Stratoform workspace')
    .option('--state <path>', 'Path to state file')
    .action(async (options: InitOptions) => {
      const statePath = resolveStatePath(options.state);

      console.log(chalk.blue('Initializing Stratoform workspace...'));

      try {
        const manager = getStateManager(options.state);
        const existing = await manager.read();
        const count = Object.keys(existing.resources).length;
        if (count > 0) {
          console.log(chalk.yellow(`${statePath} already tracks ${count} resource(s); leaving it untouched.`));
          return;
        }

        await manager.write(emptyState());
        console.log(chalk.green(`✓ Initialized ${statePath}`));

        console.log(chalk.green('\nStratoform initialized successfully!'));
      } catch (error) {
        console.error(chalk.red('Failed to initialize workspace:'), error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });
}
