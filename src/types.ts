import type { DnsError, HttpError } from './sync/errors.js';

/** Relative path (forward slashes) to SHA-256 hex digest, in published order. */
export type FileDigests = Map<string, string>;

export interface Manifest {
  files: FileDigests;
  downloadUrl?: string;
}

export interface RemoteManifest extends Manifest {
  downloadUrl: string;
}

export type SyncPhase =
  | 'idle'
  | 'fetching-manifest'
  | 'diffing'
  | 'downloading'
  | 'persisting'
  | 'done'
  | 'error';

export type TransportError = DnsError | HttpError;

export type ProgressCallback = (percent: number, label: string) => void;

export type ManifestFetchResult =
  | { ok: true; manifest: RemoteManifest }
  | { ok: false; error: TransportError };

export type SyncOutcome =
  | { status: 'done'; manifest: RemoteManifest; downloaded: string[] }
  | { status: 'error'; phase: 'fetching-manifest' | 'downloading'; error: TransportError };

export type CheckOutcome =
  | { status: 'ok'; manifest: RemoteManifest; stale: string[] }
  | { status: 'error'; error: TransportError };

export interface StateChangeEvent {
  from: SyncPhase;
  to: SyncPhase;
}
