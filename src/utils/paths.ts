import { isAbsolute, join, relative, resolve, sep } from 'node:path';
import type { LauncherConfig } from '../config.js';

export function getAppDir(config: LauncherConfig): string {
  return config.paths.appDir;
}

export function getLocalManifestPath(config: LauncherConfig): string {
  return config.paths.manifestPath;
}

export function getClientExecutablePath(config: LauncherConfig): string | null {
  if (!config.client.executable) return null;
  return resolve(config.paths.appDir, config.client.executable);
}

/**
 * Manifest paths are forward-slash relative paths with no `.`/`..` or empty
 * segments, backslashes, NUL bytes or drive prefixes.
 */
export function isValidRelativePath(filePath: string): boolean {
  if (filePath.length === 0 || filePath.includes('\0') || filePath.includes('\\')) {
    return false;
  }
  if (filePath.startsWith('/') || /^[a-zA-Z]:/.test(filePath)) {
    return false;
  }
  return filePath.split('/').every((segment) => segment !== '' && segment !== '.' && segment !== '..');
}

export function resolveInside(baseDir: string, filePath: string): string {
  const root = resolve(baseDir);
  const resolved = resolve(root, filePath);
  if (!resolved.startsWith(root + sep)) {
    throw new Error(`Invalid file path: ${filePath} escapes ${root}`);
  }
  return resolved;
}

export function toPosixPath(filePath: string): string {
  return filePath.split(sep).join('/');
}

export function relativePath(baseDir: string, absolutePath: string): string {
  return toPosixPath(relative(baseDir, absolutePath));
}

export function partialPath(destPath: string): string {
  return `${destPath}.part`;
}

export function resolveFrom(baseDir: string, filePath: string): string {
  return isAbsolute(filePath) ? filePath : join(baseDir, filePath);
}
