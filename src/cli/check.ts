import { Command } from 'commander';
import chalk from 'chalk';
import { SyncEngine } from '../sync/engine.js';
import { describeTransportError } from './messages.js';
import { fail, resolveConfig, withConfigOptions, type ConfigOptions } from './options.js';

interface CheckOptions extends ConfigOptions {
  json?: boolean;
}

export const checkCommand = withConfigOptions(new Command('check'))
  .description('List the files an update would download, without changing anything')
  .option('--json', 'Output as JSON')
  .action(async (opts: CheckOptions) => {
    try {
      const config = await resolveConfig(opts);
      const outcome = await new SyncEngine(config).check();

      if (outcome.status === 'error') {
        console.error(chalk.red(describeTransportError(outcome.error)));
        process.exit(1);
      }

      if (opts.json) {
        console.log(JSON.stringify({ stale: outcome.stale }, null, 2));
        return;
      }

      const total = outcome.manifest.files.size;
      if (outcome.stale.length === 0) {
        console.log(chalk.green(`All ${total} file(s) are up to date.`));
        return;
      }

      console.log(chalk.yellow(`${outcome.stale.length} of ${total} file(s) need downloading:`));
      for (const path of outcome.stale) {
        console.log(`  - ${path}`);
      }
    } catch (err) {
      fail(err);
    }
  });
