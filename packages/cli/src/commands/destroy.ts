import chalk from 'chalk';
import { Command } from 'commander';

import { parseDuration } from '../config';
import { createProvider, getStateManager } from '../context';
import { confirmAction } from './confirm';

interface DestroyOptions {
  yes?: boolean;
  timeout?: string;
  state?: string;
  subscription?: string;
}

export function createDestroyCommand(): Command {
  return new Command('destroy')
    .description('Delete a managed resource and remove it from the state')
    .argument('<address>', 'Resource address')
    .option('-y, --yes', 'Approve the deletion automatically')
    .option('--timeout <duration>', 'How long to wait for the deletion, e.g. 90m')
    .option('--state <path>', 'Path to state file')
    .option('--subscription <id>', 'Subscription to manage resources in')
    .action(async (address: string, options: DestroyOptions) => {
      try {
        const manager = getStateManager(options.state);
        const state = await manager.read();
        const resource = state.resources[address];
        if (!resource) throw new Error(`Resource not found in state: ${address}`);

        const timeouts = options.timeout === undefined ? undefined : { delete: parseDuration(options.timeout, '--timeout') };
        const provider = createProvider(options.subscription);

        console.log(chalk.bold('\nStratoform will perform the following actions:\n'));
        console.log(`  ${chalk.red('-')} ${address}`);

        const confirmed = await confirmAction(`Do you really want to destroy ${address}?`, options.yes ?? false);
        if (!confirmed) {
          console.log(chalk.yellow('Destroy cancelled.'));
          return;
        }

        console.log(chalk.blue(`${address}: destroying... [id=${resource.id}]`));
        await provider.delete(resource.id, resource.resourceType, timeouts);

        await manager.update((current) => {
          delete current.resources[address];
        });
        console.log(chalk.green(`${address}: destruction complete`));
      } catch (error) {
        console.error(chalk.red('Destroy failed:'), error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });
}
