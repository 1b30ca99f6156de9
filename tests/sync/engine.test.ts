import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { tmpdir } from 'node:os';
import { access, mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createPublisherApp } from '../../server/src/app.js';
import { UpdateClient, type FetchLike } from '../../src/sync/client.js';
import { Downloader } from '../../src/sync/downloader.js';
import { SyncEngine } from '../../src/sync/engine.js';
import { DnsError, HttpError, IOError, SyncInProgressError } from '../../src/sync/errors.js';
import { hashBytes } from '../../src/sync/hasher.js';
import { ManifestStore } from '../../src/sync/manifest-store.js';
import { serializeManifest } from '../../src/sync/manifest.js';
import type { LauncherConfig } from '../../src/config.js';
import type { Manifest, StateChangeEvent } from '../../src/types.js';
import {
  EMPTY_SHA256,
  HELLO_SHA256,
  bytesResponse,
  dnsFailure,
  droppingResponse,
  jsonResponse,
  routeFetch,
} from '../helpers/fake-fetch.js';

const MANIFEST_URL = 'http://x/manifest.json';
const BASE = 'http://x/files';

let tmpDir: string;
let releaseDir: string;
let config: LauncherConfig;

function publisherFetch(): FetchLike {
  const app = createPublisherApp({ rootDir: releaseDir, downloadUrl: BASE });
  return async (input, init) => app.request(input, init);
}

function makeEngine(fetch: FetchLike) {
  const client = new UpdateClient({ fetch, timeoutMs: 5000 });
  const downloader = new Downloader(client);
  const engine = new SyncEngine(config, { client, downloader });
  const states: string[] = [];
  const progress: Array<[number, string]> = [];
  engine.on('state', (event: StateChangeEvent) => states.push(event.to));
  const onProgress = (percent: number, label: string) => {
    progress.push([percent, label]);
  };
  return { engine, downloader, states, progress, onProgress };
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

beforeEach(async () => {
  tmpDir = await mkdtemp(join(tmpdir(), 'launch-sync-engine-test-'));
  releaseDir = join(tmpDir, 'release');
  await mkdir(releaseDir);
  config = {
    server: { manifestUrl: MANIFEST_URL, timeoutMs: 5000 },
    paths: { appDir: join(tmpDir, 'app'), manifestPath: join(tmpDir, 'manifest_local.json') },
    client: { executable: '', args: [] },
  };
});

afterEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
});

describe('SyncEngine.runSync', () => {
  it('fetches, downloads and persists on a first run', async () => {
    await writeFile(join(releaseDir, 'a.txt'), 'hello');
    const { engine, states, progress, onProgress } = makeEngine(publisherFetch());

    const outcome = await engine.runSync(onProgress);

    const expected = { downloadUrl: BASE, files: new Map([['a.txt', HELLO_SHA256]]) };
    expect(outcome).toEqual({ status: 'done', manifest: expected, downloaded: ['a.txt'] });
    expect(await readFile(join(tmpDir, 'app', 'a.txt'), 'utf-8')).toBe('hello');
    expect(await readFile(config.paths.manifestPath, 'utf-8')).toBe(serializeManifest(expected));
    expect(states).toEqual(['fetching-manifest', 'diffing', 'downloading', 'persisting', 'done']);
    expect(engine.phase).toBe('done');
    expect(progress[0]).toEqual([0, 'manifest']);
    expect(progress).toContainEqual([100, 'a.txt']);
    expect(progress.at(-1)).toEqual([100, 'complete']);
  });

  it('skips the download step when everything matches', async () => {
    await writeFile(join(releaseDir, 'a.txt'), 'hello');
    const { engine, downloader, states } = makeEngine(publisherFetch());
    await engine.runSync();

    const spy = vi.spyOn(downloader, 'downloadAll');
    states.length = 0;
    const outcome = await engine.runSync();

    expect(outcome).toMatchObject({ status: 'done', downloaded: [] });
    expect(spy).not.toHaveBeenCalled();
    expect(states).toEqual(['idle', 'fetching-manifest', 'diffing', 'persisting', 'done']);
  });

  it('downloads only files that changed on the server', async () => {
    await writeFile(join(releaseDir, 'a.txt'), 'hello');
    await writeFile(join(releaseDir, 'b.txt'), 'first');
    const { engine } = makeEngine(publisherFetch());
    await engine.runSync();

    await writeFile(join(releaseDir, 'b.txt'), 'second');
    const outcome = await engine.runSync();

    expect(outcome).toMatchObject({ status: 'done', downloaded: ['b.txt'] });
    expect(await readFile(join(tmpDir, 'app', 'b.txt'), 'utf-8')).toBe('second');
  });

  it('repairs a local file modified since the last sync', async () => {
    await writeFile(join(releaseDir, 'a.txt'), 'hello');
    const { engine } = makeEngine(publisherFetch());
    await engine.runSync();

    await writeFile(join(tmpDir, 'app', 'a.txt'), 'tampered');
    const outcome = await engine.runSync();

    expect(outcome).toMatchObject({ status: 'done', downloaded: ['a.txt'] });
    expect(await readFile(join(tmpDir, 'app', 'a.txt'), 'utf-8')).toBe('hello');
  });

  it('downloads in the order the published manifest lists files', async () => {
    const body = `{"download_url":"${BASE}","files":{"b.txt":"${hashBytes('bee')}","10":"${hashBytes('ten')}"}}`;
    const { fetch, calls } = routeFetch({
      [MANIFEST_URL]: () => new Response(body, { status: 200 }),
      [`${BASE}/b.txt`]: () => bytesResponse(['bee']),
      [`${BASE}/10`]: () => bytesResponse(['ten']),
    });
    const { engine } = makeEngine(fetch);

    const outcome = await engine.runSync();

    expect(outcome).toMatchObject({ status: 'done', downloaded: ['b.txt', '10'] });
    expect(calls).toEqual([MANIFEST_URL, `${BASE}/b.txt`, `${BASE}/10`]);
  });

  it('stops with a DnsError when the manifest host is unreachable', async () => {
    const fetch: FetchLike = async () => {
      throw dnsFailure('x');
    };
    const { engine, states } = makeEngine(fetch);

    const outcome = await engine.runSync();

    expect(outcome.status).toBe('error');
    if (outcome.status !== 'error') return;
    expect(outcome.phase).toBe('fetching-manifest');
    expect(outcome.error).toBeInstanceOf(DnsError);
    expect(states).toEqual(['fetching-manifest', 'error']);
    expect(await exists(config.paths.manifestPath)).toBe(false);
  });

  it('leaves the local manifest untouched when a download fails midway', async () => {
    const store = new ManifestStore(config.paths.manifestPath);
    await store.save({ files: new Map([['old.txt', EMPTY_SHA256]]) });
    const before = await readFile(config.paths.manifestPath, 'utf-8');

    const { fetch, calls } = routeFetch({
      [MANIFEST_URL]: () =>
        jsonResponse({
          download_url: BASE,
          files: { '1.txt': hashBytes('one'), '2.txt': hashBytes('two'), '3.txt': hashBytes('three') },
        }),
      [`${BASE}/1.txt`]: () => bytesResponse(['one']),
      [`${BASE}/2.txt`]: () => droppingResponse('t', 3),
      [`${BASE}/3.txt`]: () => bytesResponse(['three']),
    });
    const { engine } = makeEngine(fetch);

    const outcome = await engine.runSync();

    expect(outcome).toMatchObject({ status: 'error', phase: 'downloading' });
    if (outcome.status === 'error') {
      expect(outcome.error).toBeInstanceOf(HttpError);
    }
    expect(engine.phase).toBe('error');
    expect(calls).toEqual([MANIFEST_URL, `${BASE}/1.txt`, `${BASE}/2.txt`]);
    expect(await readFile(config.paths.manifestPath, 'utf-8')).toBe(before);
  });

  it('succeeds on a retry after a failed pass', async () => {
    await writeFile(join(releaseDir, 'a.txt'), 'hello');
    const publisher = publisherFetch();
    let attempts = 0;
    const fetch: FetchLike = async (input, init) => {
      attempts++;
      if (attempts === 1) throw dnsFailure('x');
      return publisher(input, init);
    };
    const { engine } = makeEngine(fetch);

    expect((await engine.runSync()).status).toBe('error');
    const outcome = await engine.runSync();

    expect(outcome).toMatchObject({ status: 'done', downloaded: ['a.txt'] });
  });

  it('treats a corrupt local manifest as no previous state', async () => {
    await writeFile(join(releaseDir, 'a.txt'), 'hello');
    await writeFile(config.paths.manifestPath, '{not json');
    const { engine } = makeEngine(publisherFetch());
    const previous: Manifest[] = [];
    engine.on('previous-manifest', (manifest: Manifest) => previous.push(manifest));

    const outcome = await engine.runSync();

    expect(outcome.status).toBe('done');
    expect(previous).toEqual([{ files: new Map() }]);
  });

  it('propagates local filesystem failures', async () => {
    await writeFile(join(releaseDir, 'a.txt'), 'hello');
    await writeFile(config.paths.appDir, 'a file where the app directory should be');
    const { engine } = makeEngine(publisherFetch());

    await expect(engine.runSync()).rejects.toBeInstanceOf(IOError);
    expect(engine.phase).toBe('idle');
    expect(engine.isRunning).toBe(false);
    expect(await exists(config.paths.manifestPath)).toBe(false);
  });

  it('rejects a second pass while one is running', async () => {
    await writeFile(join(releaseDir, 'a.txt'), 'hello');
    const { engine } = makeEngine(publisherFetch());

    const first = engine.runSync();
    expect(engine.isRunning).toBe(true);
    await expect(engine.runSync()).rejects.toBeInstanceOf(SyncInProgressError);
    expect((await first).status).toBe('done');
  });
});

describe('SyncEngine.check', () => {
  it('lists stale files without writing anything', async () => {
    await writeFile(join(releaseDir, 'a.txt'), 'hello');
    const { engine } = makeEngine(publisherFetch());

    const outcome = await engine.check();

    expect(outcome).toMatchObject({ status: 'ok', stale: ['a.txt'] });
    expect(await exists(join(tmpDir, 'app', 'a.txt'))).toBe(false);
    expect(await exists(config.paths.manifestPath)).toBe(false);
  });

  it('returns the transport error', async () => {
    const { fetch } = routeFetch({ [MANIFEST_URL]: () => jsonResponse({ detail: 'Maintenance' }, 503) });
    const { engine } = makeEngine(fetch);

    const outcome = await engine.check();

    expect(outcome).toMatchObject({ status: 'error' });
    if (outcome.status === 'error') {
      expect(outcome.error).toMatchObject({ status: 503, message: 'Maintenance' });
    }
  });
});
