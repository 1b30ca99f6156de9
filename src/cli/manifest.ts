import { Command } from 'commander';
import chalk from 'chalk';
import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { buildManifest } from '../sync/manifest-builder.js';
import { serializeManifest } from '../sync/manifest.js';
import { fail } from './options.js';

interface ManifestOptions {
  downloadUrl: string;
  output?: string;
}

export const manifestCommand = new Command('manifest')
  .description('Hash a release directory into a manifest for publishing')
  .argument('<dir>', 'Release directory')
  .requiredOption('-u, --download-url <url>', 'Base URL the files are served from')
  .option('-o, --output <file>', 'Write to a file instead of stdout')
  .action(async (dir: string, opts: ManifestOptions) => {
    try {
      const manifest = await buildManifest(resolve(dir), opts.downloadUrl.replace(/\/+$/, ''));
      const json = serializeManifest(manifest);

      if (!opts.output) {
        process.stdout.write(json);
        return;
      }

      await writeFile(opts.output, json, 'utf-8');
      console.error(chalk.green(`Wrote ${manifest.files.size} file(s) to ${opts.output}`));
    } catch (err) {
      fail(err);
    }
  });
