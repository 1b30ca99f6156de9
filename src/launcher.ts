import { spawn } from 'node:child_process';
import { access, constants } from 'node:fs/promises';
import type { LauncherConfig } from './config.js';
import { getAppDir, getClientExecutablePath } from './utils/paths.js';

export class ClientNotFoundError extends Error {
  public readonly executablePath: string;

  constructor(executablePath: string) {
    super(`Client executable not found: ${executablePath}`);
    this.name = 'ClientNotFoundError';
    this.executablePath = executablePath;
  }
}

/**
 * Starts the configured client detached from this process. Returns its pid,
 * or null when no executable is configured.
 */
export async function launchClient(config: LauncherConfig): Promise<number | null> {
  const executable = getClientExecutablePath(config);
  if (!executable) return null;

  try {
    await access(executable, constants.F_OK);
  } catch {
    throw new ClientNotFoundError(executable);
  }

  const child = spawn(executable, config.client.args, {
    cwd: getAppDir(config),
    detached: true,
    stdio: 'ignore',
  });

  await new Promise<void>((resolve, reject) => {
    child.once('spawn', () => resolve());
    child.once('error', reject);
  });
  child.unref();
  return child.pid ?? null;
}
