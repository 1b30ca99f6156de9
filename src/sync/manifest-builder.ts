import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { hashFile } from './hasher.js';
import { relativePath } from '../utils/paths.js';
import type { FileDigests, RemoteManifest } from '../types.js';

async function discoverFiles(dir: string, base: string): Promise<string[]> {
  const paths: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    if (entry.name.startsWith('.') || entry.name.endsWith('.part')) continue;
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      paths.push(...(await discoverFiles(full, base)));
    } else if (entry.isFile()) {
      paths.push(relativePath(base, full));
    }
  }
  return paths;
}

/** Hashes every regular file under `rootDir` into a publishable manifest. */
export async function buildManifest(rootDir: string, downloadUrl: string): Promise<RemoteManifest> {
  const paths = (await discoverFiles(rootDir, rootDir)).sort();
  const files: FileDigests = new Map();
  for (const path of paths) {
    files.set(path, await hashFile(join(rootDir, path)));
  }
  return { downloadUrl, files };
}
