import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { tmpdir } from 'node:os';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { ClientNotFoundError, launchClient } from '../src/launcher.js';
import type { LauncherConfig } from '../src/config.js';

let tmpDir: string;

function configWith(executable: string, args: string[] = []): LauncherConfig {
  return {
    server: { manifestUrl: 'http://x/manifest.json', timeoutMs: 1000 },
    paths: { appDir: tmpDir, manifestPath: join(tmpDir, 'manifest_local.json') },
    client: { executable, args },
  };
}

beforeEach(async () => {
  tmpDir = await mkdtemp(join(tmpdir(), 'launch-sync-launcher-test-'));
});

afterEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
});

describe('launchClient', () => {
  it('does nothing when no executable is configured', async () => {
    expect(await launchClient(configWith(''))).toBeNull();
  });

  it('throws ClientNotFoundError for a missing executable', async () => {
    await expect(launchClient(configWith('Client.exe'))).rejects.toMatchObject({
      name: 'ClientNotFoundError',
      executablePath: join(tmpDir, 'Client.exe'),
      message: `Client executable not found: ${join(tmpDir, 'Client.exe')}`,
    });
    await expect(launchClient(configWith('Client.exe'))).rejects.toBeInstanceOf(ClientNotFoundError);
  });

  it('starts the executable detached and returns its pid', async () => {
    const pid = await launchClient(configWith(process.execPath, ['-e', '']));
    expect(typeof pid).toBe('number');
  });
});
