import type { IResource } from '@stratoform/contracts';
import chalk from 'chalk';
import { Command } from 'commander';

import { parseAddress } from '../address';
import { getStateManager } from '../context';

interface StateOptions {
  state?: string;
}

export const SENSITIVE_PLACEHOLDER = '(sensitive)';

function formatAttributes(resource: IResource): string[] {
  const sensitive = new Set(resource.sensitiveAttributes ?? []);
  return Object.entries(resource.attributes).map(([key, value]) => `  ${key} = ${sensitive.has(key) ? SENSITIVE_PLACEHOLDER : JSON.stringify(value)}`);
}

export function createStateCommand(): Command {
  const command = new Command('state').description('Advanced state management');

  command
    .command('list')
    .description('List resources in the state')
    .option('--state <path>', 'Path to state file')
    .action(async (options: StateOptions) => {
      try {
        const state = await getStateManager(options.state).read();

        if (Object.keys(state.resources).length === 0) {
          console.log('The state file is empty.');
          return;
        }

        for (const key of Object.keys(state.resources).sort()) console.log(key);
      } catch (error) {
        console.error(chalk.red('Error listing state:'), error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });

  command
    .command('show')
    .description('Show a resource in the state')
    .argument('<address>', 'Resource address')
    .option('--state <path>', 'Path to state file')
    .action(async (address: string, options: StateOptions) => {
      try {
        const state = await getStateManager(options.state).read();
        const resource = state.resources[address];
        if (!resource) throw new Error(`Resource not found: ${address}`);

        console.log(chalk.bold(`# ${address}:`));
        console.log(`resource "${resource.resourceType}" "${resource.name}" {`);
        console.log(`  id = ${JSON.stringify(resource.id)}`);
        for (const line of formatAttributes(resource)) console.log(line);
        console.log('}');
      } catch (error) {
        console.error(chalk.red('Error showing resource:'), error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });

  command
    .command('mv')
    .description('Move an item in the state')
    .argument('<source>', 'Source address')
    .argument('<destination>', 'Destination address')
    .option('--state <path>', 'Path to state file')
    .action(async (source: string, destination: string, options: StateOptions) => {
      try {
        const target = parseAddress(destination);

        await getStateManager(options.state).update((state) => {
          const resource = state.resources[source];
          if (!resource) throw new Error(`Source resource not found: ${source}`);
          if (state.resources[destination]) throw new Error(`Destination resource already exists: ${destination}`);
          if (resource.resourceType !== target.type) throw new Error(`Cannot move ${source} to ${destination}: resource types differ`);

          console.log(chalk.yellow(`Moving ${source} to ${destination}...`));
          state.resources[destination] = { ...resource, name: target.name };
          delete state.resources[source];
        });

        console.log(chalk.green('Successfully moved resource.'));
      } catch (error) {
        console.error(chalk.red('Error moving resource:'), error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });

  command
    .command('rm')
    .description('Stop tracking a resource without deleting it')
    .argument('<address>', 'Resource address')
    .option('--state <path>', 'Path to state file')
    .action(async (address: string, options: StateOptions) => {
      try {
        const manager = getStateManager(options.state);
        const state = await manager.read();

        if (!state.resources[address]) {
          console.log(chalk.yellow(`Resource not found in state: ${address}`));
          return;
        }

        console.log(chalk.yellow(`Removing ${address}...`));
        await manager.update((current) => {
          delete current.resources[address];
        });
        console.log(chalk.green('Successfully removed resource.'));
      } catch (error) {
        console.error(chalk.red('Error removing resource:'), error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });

  return command;
}
