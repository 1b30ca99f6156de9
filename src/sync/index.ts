export { SyncEngine, MANIFEST_LABEL, COMPLETE_LABEL } from './engine.js';
export type { SyncEngineDeps } from './engine.js';
export { UpdateClient, DEFAULT_TIMEOUT_MS } from './client.js';
export type { FetchLike, DownloadStream, UpdateClientOptions } from './client.js';
export { ManifestStore } from './manifest-store.js';
export { Downloader, fileUrl, overallPercent } from './downloader.js';
export { diffManifest } from './diff.js';
export { hashFile, hashBytes, CHUNK_SIZE } from './hasher.js';
export { buildManifest } from './manifest-builder.js';
export { serializeManifest, emptyManifest } from './manifest.js';
export {
  DnsError,
  HttpError,
  IOError,
  SyncInProgressError,
  ConfigError,
  isTransportError,
} from './errors.js';
