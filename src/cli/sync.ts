import { Command } from 'commander';
import chalk from 'chalk';
import { SyncEngine } from '../sync/engine.js';
import { describeTransportError } from './messages.js';
import { attachVerboseLogging, fail, resolveConfig, withConfigOptions, type ConfigOptions } from './options.js';
import { syncWithProgress } from './run.js';

interface SyncOptions extends ConfigOptions {
  json?: boolean;
}

export const syncCommand = withConfigOptions(new Command('sync'))
  .description('Run a single update pass without starting the client')
  .option('--json', 'Output the outcome as JSON')
  .action(async (opts: SyncOptions) => {
    try {
      const config = await resolveConfig(opts);
      const engine = new SyncEngine(config);

      if (opts.json) {
        const outcome = await engine.runSync();
        if (outcome.status === 'done') {
          console.log(JSON.stringify({ status: 'done', downloaded: outcome.downloaded }, null, 2));
          return;
        }
        console.log(JSON.stringify({
          status: 'error',
          phase: outcome.phase,
          error: { name: outcome.error.name, message: outcome.error.message },
        }, null, 2));
        process.exit(1);
      }

      if (opts.verbose) attachVerboseLogging(engine);
      const outcome = await syncWithProgress(engine);
      if (outcome.status === 'error') {
        console.error(chalk.red(describeTransportError(outcome.error)));
        process.exit(1);
      }

      console.log(chalk.green(`Sync complete: ${outcome.downloaded.length} file(s) downloaded.`));
      for (const path of outcome.downloaded) {
        console.log(`  ${chalk.blue('download')}  ${path}`);
      }
    } catch (err) {
      fail(err);
    }
  });
