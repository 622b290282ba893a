import chalk from 'chalk';
import { Command } from 'commander';

import { createProvider, getStateManager } from '../context';

interface RefreshOptions {
  state?: string;
  subscription?: string;
}

export function createRefreshCommand(): Command {
  return new Command('refresh')
    .description('Update the state with the current attributes of every resource')
    .option('--state <path>', 'Path to state file')
    .option('--subscription <id>', 'Subscription to manage resources in')
    .action(async (options: RefreshOptions) => {
      try {
        const provider = createProvider(options.subscription);
        const manager = getStateManager(options.state);

        await manager.update(async (state) => {
          for (const address of Object.keys(state.resources).sort()) {
            const resource = state.resources[address];
            const attributes = await provider.read(resource.id, resource.resourceType);

            if (attributes === null) {
              delete state.resources[address];
              console.log(chalk.yellow(`${address}: no longer exists, removed from state`));
              continue;
            }

            resource.attributes = attributes;
            console.log(`${address}: refreshed [id=${resource.id}]`);
          }
        });
      } catch (error) {
        console.error(chalk.red('Refresh failed:'), error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });
}
