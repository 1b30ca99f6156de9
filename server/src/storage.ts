import fs from 'node:fs';
import path from 'node:path';

function releasePath(rootDir: string, filePath: string): string {
  const root = path.resolve(rootDir);
  const resolved = path.resolve(root, filePath);
  if (!resolved.startsWith(root + path.sep)) {
    throw new Error('Invalid file path: directory traversal detected');
  }
  return resolved;
}

/** Contents of a published file, or null when it is absent or not a regular file. */
export async function loadReleaseFile(rootDir: string, filePath: string): Promise<Buffer | null> {
  const dest = releasePath(rootDir, filePath);
  try {
    const stats = await fs.promises.stat(dest);
    if (!stats.isFile()) return null;
    return await fs.promises.readFile(dest);
  } catch {
    return null;
  }
}
