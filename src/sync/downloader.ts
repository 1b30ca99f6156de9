import { mkdir, open, rename, type FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';
import { IOError, errorMessage } from './errors.js';
import { CHUNK_SIZE } from './hasher.js';
import type { UpdateClient } from './client.js';
import { partialPath, resolveInside } from '../utils/paths.js';
import type { ProgressCallback, RemoteManifest } from '../types.js';

export function fileUrl(downloadUrl: string, relPath: string): string {
  return `${downloadUrl}/${relPath.split('/').map(encodeURIComponent).join('/')}`;
}

export function filePercent(received: number, total: number): number {
  return Math.min(100, Math.floor((received * 100) / total));
}

/** Batch-wide percentage for file `index` (1-based) of `count`. */
export function overallPercent(index: number, count: number, percentOfFile: number): number {
  return Math.floor(((index - 1) * 100 + percentOfFile) / count);
}

function* slices(chunk: Uint8Array): Generator<Uint8Array> {
  for (let offset = 0; offset < chunk.length; offset += CHUNK_SIZE) {
    yield chunk.subarray(offset, offset + CHUNK_SIZE);
  }
}

async function localIo<T>(action: string, path: string, op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (err) {
    throw new IOError(`Failed to ${action} ${path}: ${errorMessage(err)}`, path, { cause: err });
  }
}

export class Downloader {
  private readonly client: UpdateClient;

  constructor(client: UpdateClient) {
    this.client = client;
  }

  /**
   * Downloads `paths` one after another into `destDir`. The first failure
   * aborts the batch: network failures throw DnsError/HttpError, local ones
   * IOError. Progress fires per chunk for files with a Content-Length.
   */
  async downloadAll(
    remote: RemoteManifest,
    paths: readonly string[],
    destDir: string,
    onProgress?: ProgressCallback,
  ): Promise<void> {
    const count = paths.length;
    for (const [i, relPath] of paths.entries()) {
      await this.downloadFile(remote.downloadUrl, relPath, destDir, (percentOfFile) => {
        onProgress?.(overallPercent(i + 1, count, percentOfFile), relPath);
      });
    }
  }

  private async downloadFile(
    downloadUrl: string,
    relPath: string,
    destDir: string,
    report: (percentOfFile: number) => void,
  ): Promise<void> {
    const destPath = resolveInside(destDir, relPath);
    const tmpPath = partialPath(destPath);

    await localIo('create directory for', destPath, () => mkdir(dirname(destPath), { recursive: true }));
    const handle: FileHandle = await localIo('open', tmpPath, () => open(tmpPath, 'w'));

    try {
      const download = await this.client.openDownload(fileUrl(downloadUrl, relPath));
      const total = download.contentLength;
      let received = 0;

      for await (const chunk of download.chunks) {
        for (const piece of slices(chunk)) {
          await localIo('write', tmpPath, () => handle.write(piece));
          received += piece.length;
          if (total) {
            report(filePercent(received, total));
          }
        }
      }
    } catch (err) {
      // Keep the transfer error over any close failure.
      await handle.close().catch(() => undefined);
      throw err;
    }

    await localIo('close', tmpPath, () => handle.close());
    await localIo('move into place', destPath, () => rename(tmpPath, destPath));
  }
}
