import type { IProvider, IResource } from '@stratoform/contracts';
import { replacementTriggers, sensitiveAttributes } from '@stratoform/provider-azure';
import type { IState, StateManager } from '@stratoform/state';
import chalk from 'chalk';
import { Command } from 'commander';
import path from 'node:path';

import { type ConfiguredResource, DEFAULT_CONFIG_FILE, loadConfigFile } from '../config';
import { createProvider, getStateManager } from '../context';
import { confirmAction } from './confirm';

interface ApplyOptions {
  yes?: boolean;
  state?: string;
  subscription?: string;
}

interface Change {
  resource: ConfiguredResource;
  existing?: IResource;
  /** Changed attributes that force the existing resource to be destroyed and created again */
  replace: string[];
}

async function planChanges(provider: IProvider, resources: ConfiguredResource[], state: IState): Promise<Change[]> {
  const changes: Change[] = [];
  for (const resource of resources) {
    const existing = state.resources[resource.address];
    const replace = existing ? replacementTriggers(await provider.getSchema(resource.type), existing.attributes, resource.attributes) : [];
    changes.push({ resource, existing, replace });
  }
  return changes;
}

function changeSymbol({ existing, replace }: Change): string {
  if (!existing) return chalk.green('+');
  if (replace.length > 0) return `${chalk.red('-')}/${chalk.green('+')}`;
  return chalk.yellow('~');
}

function displayChanges(changes: Change[]): void {
  console.log(chalk.bold('\nStratoform will perform the following actions:\n'));
  for (const change of changes) {
    const reason = change.replace.length > 0 ? ` (forces replacement: ${change.replace.join(', ')})` : '';
    console.log(`  ${changeSymbol(change)} ${change.resource.address}${reason}`);
  }
}

async function record(manager: StateManager, provider: IProvider, resource: ConfiguredResource, id: string, attributes: Record<string, unknown>): Promise<void> {
  const schema = await provider.getSchema(resource.type);
  await manager.update((state) => {
    state.resources[resource.address] = {
      id,
      type: 'Resource',
      resourceType: resource.type,
      name: resource.name,
      attributes,
      sensitiveAttributes: sensitiveAttributes(schema),
    };
  });
}

async function applyChange(manager: StateManager, provider: IProvider, { resource, existing, replace }: Change): Promise<void> {
  let id: string;
  if (existing && replace.length > 0) {
    console.log(chalk.blue(`${resource.address}: destroying for replacement...`));
    await provider.delete(existing.id, resource.type, resource.timeouts);
    await manager.update((state) => {
      delete state.resources[resource.address];
    });

    console.log(chalk.blue(`${resource.address}: creating...`));
    id = await provider.create(resource.type, resource.attributes, resource.timeouts);
    await record(manager, provider, resource, id, resource.attributes);
  } else if (existing) {
    console.log(chalk.blue(`${resource.address}: updating...`));
    id = existing.id;
    await provider.update(id, resource.type, resource.attributes, resource.timeouts);
  } else {
    console.log(chalk.blue(`${resource.address}: creating...`));
    id = await provider.create(resource.type, resource.attributes, resource.timeouts);
    // Track the new resource before reading it back so a failed read does not orphan it
    await record(manager, provider, resource, id, resource.attributes);
  }

  const attributes = await provider.read(id, resource.type);
  if (attributes === null) throw new Error(`${resource.address} (${id}) was not found after apply`);

  await record(manager, provider, resource, id, attributes);
  console.log(chalk.green(`${resource.address}: done [id=${id}]`));
}

async function executeApply(configPath: string, options: ApplyOptions): Promise<void> {
  const resources = await loadConfigFile(configPath);
  const provider = createProvider(options.subscription);
  const manager = getStateManager(options.state);

  console.log(chalk.blue('Validating configuration...'));
  for (const resource of resources) await provider.validate(resource.type, resource.attributes);

  if (resources.length === 0) {
    console.log(chalk.green('No resources to apply.'));
    return;
  }

  const changes = await planChanges(provider, resources, await manager.read());
  displayChanges(changes);

  const confirmed = await confirmAction('Do you want to perform these actions?', options.yes ?? false);
  if (!confirmed) {
    console.log(chalk.yellow('Apply cancelled.'));
    return;
  }

  console.log('');
  for (const change of changes) await applyChange(manager, provider, change);

  console.log(chalk.green(`\nApply complete! Resources: ${changes.length} processed.`));
}

export function createApplyCommand(): Command {
  return new Command('apply')
    .description('Create or update the resources in a configuration file')
    .argument('[config]', 'Configuration file', DEFAULT_CONFIG_FILE)
    .option('-y, --yes', 'Approve changes automatically')
    .option('--state <path>', 'Path to state file')
    .option('--subscription <id>', 'Subscription to manage resources in')
    .action(async (configFile: string, options: ApplyOptions) => {
      try {
        await executeApply(path.resolve(process.cwd(), configFile), options);
      } catch (error) {
        console.error(chalk.red('Apply failed:'), error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });
}
