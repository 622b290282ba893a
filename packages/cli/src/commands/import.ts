import { sensitiveAttributes } from '@stratoform/provider-azure';
import chalk from 'chalk';
import { Command } from 'commander';

import { parseAddress } from '../address';
import { createProvider, getStateManager } from '../context';

interface ImportOptions {
  state?: string;
  subscription?: string;
}

export function createImportCommand(): Command {
  return new Command('import')
    .description('Bring an existing resource under management')
    .argument('<address>', 'Resource address, e.g. azure_relay_namespace.example')
    .argument('<id>', 'Resource ID in the management API')
    .option('--state <path>', 'Path to state file')
    .option('--subscription <id>', 'Subscription to manage resources in')
    .action(async (address: string, id: string, options: ImportOptions) => {
      try {
        const { type, name } = parseAddress(address);
        const provider = createProvider(options.subscription);
        const manager = getStateManager(options.state);

        console.log(chalk.blue(`${address}: importing from ID "${id}"...`));
        await manager.update(async (state) => {
          if (state.resources[address]) throw new Error(`Resource already managed: ${address}`);

          const attributes = await provider.importState(id, type);
          const schema = await provider.getSchema(type);
          state.resources[address] = { id, type: 'Resource', resourceType: type, name, attributes, sensitiveAttributes: sensitiveAttributes(schema) };
        });

        console.log(chalk.green('Import successful!'));
      } catch (error) {
        console.error(chalk.red('Import failed:'), error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });
}
