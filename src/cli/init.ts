import { Command } from 'commander';
import chalk from 'chalk';
import { access } from 'node:fs/promises';
import { defaultLauncherConfigFile, getConfigPath, saveConfig } from '../config.js';
import { fail } from './options.js';

interface InitOptions {
  config: string;
  manifestUrl?: string;
  executable?: string;
  force?: boolean;
}

export const initCommand = new Command('init')
  .description('Write a launcher.toml with default settings')
  .option('-c, --config <path>', 'Where to write the config', getConfigPath())
  .option('--manifest-url <url>', 'Manifest URL to record')
  .option('--executable <path>', 'Client executable, relative to the app directory')
  .option('-f, --force', 'Overwrite an existing config')
  .action(async (opts: InitOptions) => {
    try {
      let exists = true;
      try {
        await access(opts.config);
      } catch {
        exists = false;
      }

      if (exists && !opts.force) {
        console.log(chalk.yellow(`${opts.config} already exists. Use --force to overwrite.`));
        return;
      }

      const config = defaultLauncherConfigFile();
      if (opts.manifestUrl) config.server.manifestUrl = opts.manifestUrl;
      if (opts.executable) config.client.executable = opts.executable;

      await saveConfig(opts.config, config);
      console.log(chalk.green(`Wrote ${opts.config}`));
    } catch (err) {
      fail(err);
    }
  });
