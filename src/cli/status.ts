import { Command } from 'commander';
import chalk from 'chalk';
import { access } from 'node:fs/promises';
import { ManifestStore } from '../sync/manifest-store.js';
import { getAppDir, getClientExecutablePath, getLocalManifestPath } from '../utils/paths.js';
import { fail, resolveConfig, withConfigOptions, type ConfigOptions } from './options.js';

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export const statusCommand = withConfigOptions(new Command('status'))
  .description('Show launcher configuration and local sync state')
  .action(async (opts: ConfigOptions) => {
    try {
      const config = await resolveConfig(opts);
      const manifestPath = getLocalManifestPath(config);

      console.log('');
      console.log(chalk.bold('Launcher Status'));
      console.log(chalk.dim('─'.repeat(40)));
      console.log(`  Manifest URL:   ${config.server.manifestUrl}`);
      console.log(`  App directory:  ${getAppDir(config)}`);
      console.log(`  Local manifest: ${manifestPath}`);
      console.log(`  Timeout:        ${config.server.timeoutMs}ms`);

      console.log('');
      console.log(chalk.bold('  Sync State'));
      if (await fileExists(manifestPath)) {
        const local = await new ManifestStore(manifestPath).load();
        const count = local.files.size;
        console.log(`    ${chalk.green(`${count} file(s) recorded`)}`);
        if (local.downloadUrl) {
          console.log(`    Source: ${local.downloadUrl}`);
        }
      } else {
        console.log(chalk.dim('    No local manifest yet; the next sync checks every file.'));
      }

      console.log('');
      console.log(chalk.bold('  Client'));
      const executable = getClientExecutablePath(config);
      if (!executable) {
        console.log(chalk.dim('    No executable configured'));
      } else if (await fileExists(executable)) {
        console.log(`    ${executable} ${chalk.green('(present)')}`);
      } else {
        console.log(`    ${executable} ${chalk.red('(missing)')}`);
      }
      console.log('');
    } catch (err) {
      fail(err);
    }
  });
