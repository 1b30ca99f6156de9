import { readFile, writeFile, rename, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { IOError, errorMessage } from './errors.js';
import { emptyManifest, localManifestSchema, serializeManifest } from './manifest.js';
import type { Manifest } from '../types.js';

export class ManifestStore {
  private readonly manifestPath: string;

  constructor(manifestPath: string) {
    this.manifestPath = manifestPath;
  }

  get path(): string {
    return this.manifestPath;
  }

  /**
   * Missing, unreadable, malformed and wrongly-shaped files all load as the
   * empty manifest, so a first run and a corrupted state look the same.
   */
  async load(): Promise<Manifest> {
    let raw: string;
    try {
      raw = await readFile(this.manifestPath, 'utf-8');
    } catch {
      return emptyManifest();
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return emptyManifest();
    }

    const parsed = localManifestSchema.safeParse(json);
    return parsed.success ? parsed.data : emptyManifest();
  }

  async save(manifest: Manifest): Promise<void> {
    const tmpPath = `${this.manifestPath}.tmp`;
    try {
      await mkdir(dirname(this.manifestPath), { recursive: true });
      await writeFile(tmpPath, serializeManifest(manifest), 'utf-8');
      await rename(tmpPath, this.manifestPath);
    } catch (err) {
      throw new IOError(
        `Failed to save manifest ${this.manifestPath}: ${errorMessage(err)}`,
        this.manifestPath,
        { cause: err },
      );
    }
  }
}
