import { stat } from 'node:fs/promises';
import { IOError, errorMessage } from './errors.js';
import { hashFile, type FileHasher } from './hasher.js';
import { resolveInside } from '../utils/paths.js';
import type { Manifest } from '../types.js';

async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (err) {
    if (err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
      return false;
    }
    throw new IOError(`Cannot stat ${path}: ${errorMessage(err)}`, path, { cause: err });
  }
}

/**
 * Paths of `remote` that are missing under `localDir` or whose content does
 * not hash to the remote digest, in manifest order. Every present file is
 * rehashed; local files the manifest does not list are ignored.
 */
export async function diffManifest(
  localDir: string,
  remote: Manifest,
  hasher: FileHasher = hashFile,
): Promise<string[]> {
  const stale: string[] = [];
  for (const [relPath, remoteDigest] of remote.files) {
    const absolutePath = resolveInside(localDir, relPath);
    if (!(await isRegularFile(absolutePath))) {
      stale.push(relPath);
      continue;
    }
    if ((await hasher(absolutePath)) !== remoteDigest) {
      stale.push(relPath);
    }
  }
  return stale;
}
