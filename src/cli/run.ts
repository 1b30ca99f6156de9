import { Command } from 'commander';
import chalk from 'chalk';
import * as readline from 'node:readline/promises';
import { stdin, stdout } from 'node:process';
import { SyncEngine } from '../sync/engine.js';
import { launchClient } from '../launcher.js';
import { describeTransportError } from './messages.js';
import { createProgressPrinter } from './progress.js';
import { attachVerboseLogging, fail, resolveConfig, withConfigOptions, type ConfigOptions } from './options.js';
import type { SyncOutcome } from '../types.js';

interface RunOptions extends ConfigOptions {
  launch: boolean;
}

async function ask(prompt: string): Promise<string> {
  const rl = readline.createInterface({ input: stdin, output: stdout });
  const answer = await rl.question(prompt);
  rl.close();
  return answer;
}

async function confirmRetry(): Promise<boolean> {
  if (!stdin.isTTY) return false;
  const answer = (await ask('Retry? [Y/n] ')).trim().toLowerCase();
  return answer === '' || answer === 'y' || answer === 'yes';
}

export async function syncWithProgress(engine: SyncEngine): Promise<SyncOutcome> {
  const printer = createProgressPrinter();
  try {
    return await engine.runSync(printer.onProgress);
  } finally {
    printer.finish();
  }
}

export const runCommand = withConfigOptions(new Command('run'))
  .description('Bring the application files up to date, then start the client')
  .option('--no-launch', 'Only update the files')
  .action(async (opts: RunOptions) => {
    try {
      const config = await resolveConfig(opts);
      const engine = new SyncEngine(config);
      if (opts.verbose) attachVerboseLogging(engine);

      console.log(chalk.bold('Checking for updates...'));
      let outcome = await syncWithProgress(engine);
      while (outcome.status === 'error') {
        console.error(chalk.red(describeTransportError(outcome.error)));
        if (!(await confirmRetry())) {
          process.exit(1);
        }
        outcome = await syncWithProgress(engine);
      }

      if (outcome.downloaded.length > 0) {
        console.log(chalk.green(`Updated ${outcome.downloaded.length} file(s).`));
      } else {
        console.log(chalk.green('Already up to date.'));
      }

      if (!opts.launch) return;

      const pid = await launchClient(config);
      if (pid === null) {
        console.log(chalk.dim('No client executable configured; nothing to launch.'));
      } else {
        console.log(chalk.dim(`Client started (PID: ${pid}).`));
      }
    } catch (err) {
      fail(err);
    }
  });
