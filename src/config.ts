import { parse, stringify } from 'smol-toml';
import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError, errorMessage } from './sync/errors.js';
import { describeIssues } from './sync/manifest.js';
import { resolveFrom } from './utils/paths.js';

export const CONFIG_FILE_NAME = 'launcher.toml';

export interface LauncherConfig {
  server: {
    manifestUrl: string;
    timeoutMs: number;
  };
  paths: {
    /** Absolute after loading. */
    appDir: string;
    /** Absolute after loading. */
    manifestPath: string;
  };
  client: {
    /** Relative to `paths.appDir`; empty disables launching. */
    executable: string;
    args: string[];
  };
}

const configSchema = z.object({
  server: z
    .object({
      manifestUrl: z.string().url().default('http://localhost:8080/manifest.json'),
      timeoutMs: z.number().int().positive().default(30000),
    })
    .default({}),
  paths: z
    .object({
      appDir: z.string().min(1).default('app'),
      manifestPath: z.string().min(1).default('manifest_local.json'),
    })
    .default({}),
  client: z
    .object({
      executable: z.string().default(''),
      args: z.array(z.string()).default([]),
    })
    .default({}),
});

/** The config file's shape, before path resolution. */
export type LauncherConfigFile = z.infer<typeof configSchema>;

export function getConfigPath(baseDir: string = process.cwd()): string {
  return join(baseDir, CONFIG_FILE_NAME);
}

function resolvePaths(raw: LauncherConfigFile, baseDir: string): LauncherConfig {
  return {
    server: { ...raw.server },
    paths: {
      appDir: resolveFrom(baseDir, raw.paths.appDir),
      manifestPath: resolveFrom(baseDir, raw.paths.manifestPath),
    },
    client: { executable: raw.client.executable, args: [...raw.client.args] },
  };
}

export function getDefaultConfig(baseDir: string = process.cwd()): LauncherConfig {
  return resolvePaths(configSchema.parse({}), baseDir);
}

/**
 * Reads the TOML config at `configPath`. A missing file gives the defaults;
 * relative paths resolve against the file's directory.
 */
export async function loadConfig(configPath: string = getConfigPath()): Promise<LauncherConfig> {
  const baseDir = dirname(resolve(configPath));

  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch {
    return getDefaultConfig(baseDir);
  }

  let table: unknown;
  try {
    table = parse(raw);
  } catch (err) {
    throw new ConfigError(configPath, errorMessage(err), { cause: err });
  }

  const parsed = configSchema.safeParse(table);
  if (!parsed.success) {
    throw new ConfigError(configPath, describeIssues(parsed.error));
  }
  return resolvePaths(parsed.data, baseDir);
}

export async function saveConfig(configPath: string, config: LauncherConfigFile): Promise<void> {
  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, stringify(config), 'utf-8');
}

export function defaultLauncherConfigFile(): LauncherConfigFile {
  return configSchema.parse({});
}
