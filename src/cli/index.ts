import { Command } from 'commander';
import { runCommand } from './run.js';
import { syncCommand } from './sync.js';
import { checkCommand } from './check.js';
import { statusCommand } from './status.js';
import { manifestCommand } from './manifest.js';
import { initCommand } from './init.js';

export const program = new Command()
  .name('launch-sync')
  .description('Keep an application in step with its published manifest, then launch it')
  .version('0.1.0');

program.addCommand(runCommand, { isDefault: true });
program.addCommand(syncCommand);
program.addCommand(checkCommand);
program.addCommand(statusCommand);
program.addCommand(manifestCommand);
program.addCommand(initCommand);
