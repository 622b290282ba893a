import { Command } from 'commander';

import { createApplyCommand } from './commands/apply';
import { createDestroyCommand } from './commands/destroy';
import { createImportCommand } from './commands/import';
import { createInitCommand } from './commands/init';
import { createRefreshCommand } from './commands/refresh';
import { createStateCommand } from './commands/state';

const program = new Command();

program.name('stratoform').description('Declarative management of machine learning workspaces and relay namespaces').version('0.1.0');

program.addCommand(createInitCommand());
program.addCommand(createApplyCommand());
program.addCommand(createRefreshCommand());
program.addCommand(createImportCommand());
program.addCommand(createDestroyCommand());
program.addCommand(createStateCommand());

await program.parseAsync();
