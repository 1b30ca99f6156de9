import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigPath, loadConfig, type LauncherConfig } from '../config.js';
import type { SyncEngine } from '../sync/engine.js';
import type { Manifest, StateChangeEvent } from '../types.js';

export interface ConfigOptions {
  config?: string;
  manifestUrl?: string;
  verbose?: boolean;
}

export function withConfigOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to launcher.toml', getConfigPath())
    .option('--manifest-url <url>', 'Override the manifest URL from the config')
    .option('-v, --verbose', 'Print each sync phase');
}

export async function resolveConfig(opts: ConfigOptions): Promise<LauncherConfig> {
  const config = await loadConfig(opts.config ?? getConfigPath());
  if (opts.manifestUrl) {
    config.server.manifestUrl = opts.manifestUrl;
  }
  return config;
}

export function attachVerboseLogging(engine: SyncEngine): void {
  engine.on('state', (event: StateChangeEvent) => {
    console.log(chalk.dim(`  [${event.from} -> ${event.to}]`));
  });
  engine.on('previous-manifest', (manifest: Manifest) => {
    console.log(chalk.dim(`  Previous manifest lists ${manifest.files.size} file(s)`));
  });
}

export function fail(err: unknown): never {
  console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
  process.exit(1);
}
