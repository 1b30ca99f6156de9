import { z } from 'zod';
import { isValidRelativePath } from '../utils/paths.js';
import type { FileDigests, Manifest, RemoteManifest } from '../types.js';

export const SHA256_HEX = /^[0-9a-f]{64}$/;

const relativePathSchema = z
  .string()
  .refine(isValidRelativePath, { message: 'must be a relative forward-slash path' });

const digestSchema = z
  .string()
  .regex(SHA256_HEX, { message: 'must be a SHA-256 digest (64 lowercase hex characters)' });

export const remoteManifestSchema = z
  .object({
    download_url: z.string().min(1),
    files: z.record(relativePathSchema, digestSchema),
  })
  .transform(
    (raw): RemoteManifest => ({ downloadUrl: raw.download_url, files: new Map(Object.entries(raw.files)) }),
  );

// Digests in the local copy are not format-checked.
export const localManifestSchema = z
  .object({
    download_url: z.string().optional(),
    files: z.record(z.string(), z.string()),
  })
  .transform((raw): Manifest => {
    const manifest: Manifest = { files: new Map(Object.entries(raw.files)) };
    if (raw.download_url !== undefined) manifest.downloadUrl = raw.download_url;
    return manifest;
  });

export function emptyManifest(): Manifest {
  return { files: new Map() };
}

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Re-keys `files` in `order`, the key sequence of the source document.
 * Paths missing from `order` keep their place after the ordered ones.
 */
export function reorderDigests(files: FileDigests, order: readonly string[]): FileDigests {
  const ordered: FileDigests = new Map();
  for (const path of order) {
    const digest = files.get(path);
    if (digest !== undefined && !ordered.has(path)) ordered.set(path, digest);
  }
  for (const [path, digest] of files) {
    if (!ordered.has(path)) ordered.set(path, digest);
  }
  return ordered;
}

function sortedDigests(files: FileDigests): Record<string, string> {
  const entries = [...files].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(entries);
}

/** Stable JSON: keys sorted at every level, four-space indent, trailing newline. */
export function serializeManifest(manifest: Manifest): string {
  const files = sortedDigests(manifest.files);
  const wire =
    manifest.downloadUrl !== undefined
      ? { download_url: manifest.downloadUrl, files }
      : { files };
  return JSON.stringify(wire, null, 4) + '\n';
}
