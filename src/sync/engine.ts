import { EventEmitter } from 'node:events';
import { UpdateClient } from './client.js';
import { diffManifest } from './diff.js';
import { Downloader } from './downloader.js';
import { SyncInProgressError, isTransportError } from './errors.js';
import { ManifestStore } from './manifest-store.js';
import type { LauncherConfig } from '../config.js';
import type {
  CheckOutcome,
  Manifest,
  ProgressCallback,
  SyncOutcome,
  StateChangeEvent,
  SyncPhase,
} from '../types.js';
import { getAppDir, getLocalManifestPath } from '../utils/paths.js';

export const MANIFEST_LABEL = 'manifest';
export const COMPLETE_LABEL = 'complete';

export interface SyncEngineDeps {
  client?: UpdateClient;
  store?: ManifestStore;
  downloader?: Downloader;
}

/**
 * Runs update passes: fetch manifest, diff, download, persist.
 *
 * Emits `state` ({ from, to }) on every phase change and `previous-manifest`
 * with the local manifest loaded for the pass.
 */
export class SyncEngine extends EventEmitter {
  private readonly config: LauncherConfig;
  private readonly client: UpdateClient;
  private readonly store: ManifestStore;
  private readonly downloader: Downloader;
  private current: SyncPhase = 'idle';
  private running = false;

  constructor(config: LauncherConfig, deps: SyncEngineDeps = {}) {
    super();
    this.config = config;
    this.client = deps.client ?? new UpdateClient({ timeoutMs: config.server.timeoutMs });
    this.store = deps.store ?? new ManifestStore(getLocalManifestPath(config));
    this.downloader = deps.downloader ?? new Downloader(this.client);
  }

  get phase(): SyncPhase {
    return this.current;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * One full pass. Network failures come back as an `error` outcome and leave
   * the local manifest untouched; local filesystem failures are thrown.
   */
  async runSync(onProgress?: ProgressCallback): Promise<SyncOutcome> {
    this.acquire();
    try {
      this.transition('idle');
      this.transition('fetching-manifest');
      onProgress?.(0, MANIFEST_LABEL);

      const fetched = await this.client.fetchManifest(this.config.server.manifestUrl);
      if (!fetched.ok) {
        this.transition('error');
        return { status: 'error', phase: 'fetching-manifest', error: fetched.error };
      }
      const remote = fetched.manifest;

      const previous = await this.store.load();
      this.emit('previous-manifest', previous);

      this.transition('diffing');
      const stale = await diffManifest(getAppDir(this.config), remote);

      if (stale.length > 0) {
        this.transition('downloading');
        try {
          await this.downloader.downloadAll(remote, stale, getAppDir(this.config), onProgress);
        } catch (err) {
          if (!isTransportError(err)) throw err;
          this.transition('error');
          return { status: 'error', phase: 'downloading', error: err };
        }
      }

      this.transition('persisting');
      await this.store.save(remote);

      this.transition('done');
      onProgress?.(100, COMPLETE_LABEL);
      return { status: 'done', manifest: remote, downloaded: stale };
    } catch (err) {
      this.transition('idle');
      throw err;
    } finally {
      this.running = false;
    }
  }

  /** Fetch and diff only; nothing is written. */
  async check(): Promise<CheckOutcome> {
    this.acquire();
    try {
      const fetched = await this.client.fetchManifest(this.config.server.manifestUrl);
      if (!fetched.ok) {
        return { status: 'error', error: fetched.error };
      }
      const stale = await diffManifest(getAppDir(this.config), fetched.manifest);
      return { status: 'ok', manifest: fetched.manifest, stale };
    } finally {
      this.running = false;
    }
  }

  async loadLocalManifest(): Promise<Manifest> {
    return this.store.load();
  }

  private acquire(): void {
    if (this.running) {
      throw new SyncInProgressError();
    }
    this.running = true;
  }

  private transition(to: SyncPhase): void {
    const from = this.current;
    if (from === to) return;
    this.current = to;
    const event: StateChangeEvent = { from, to };
    this.emit('state', event);
  }
}
