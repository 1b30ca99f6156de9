import type { ReadableStream, ReadableStreamDefaultReader } from 'node:stream/web';
import { DnsError, HttpError, errorMessage, isTransportError } from './errors.js';
import { documentKeyOrder } from './json-keys.js';
import { describeIssues, remoteManifestSchema, reorderDigests } from './manifest.js';
import type { ManifestFetchResult, TransportError } from '../types.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface UpdateClientOptions {
  /** Idle timeout: time to headers, then the longest gap between body chunks. */
  timeoutMs?: number;
  fetch?: FetchLike;
}

export interface DownloadStream {
  /** Declared Content-Length, or null when the server sent none. */
  contentLength: number | null;
  chunks: AsyncIterable<Uint8Array>;
}

export const DEFAULT_TIMEOUT_MS = 30_000;

const DNS_ERROR_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EAI_NONAME']);

class IdleTimer {
  private readonly controller = new AbortController();
  private readonly ms: number;
  private handle: ReturnType<typeof setTimeout> | null = null;
  expired = false;

  constructor(ms: number) {
    this.ms = ms;
    this.reset();
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  reset(): void {
    this.clear();
    this.handle = setTimeout(() => {
      this.expired = true;
      this.controller.abort();
    }, this.ms);
  }

  clear(): void {
    if (this.handle) {
      clearTimeout(this.handle);
      this.handle = null;
    }
  }
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function hostnameOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return url;
  }
}

function extractDetail(text: string): string | null {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof json === 'object' && json !== null && 'detail' in json && json.detail != null) {
    return typeof json.detail === 'string' ? json.detail : JSON.stringify(json.detail);
  }
  return null;
}

async function* emptyChunks(): AsyncGenerator<Uint8Array> {
  yield* [];
}

function parseContentLength(header: string | null): number | null {
  if (header === null || header.trim() === '') return null;
  const value = Number(header);
  return Number.isSafeInteger(value) && value >= 0 ? value : null;
}

/**
 * HTTP side of an update pass. Failures come back as {@link DnsError} or
 * {@link HttpError}; nothing here retries.
 */
export class UpdateClient {
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: UpdateClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async fetchManifest(url: string): Promise<ManifestFetchResult> {
    const timer = new IdleTimer(this.timeoutMs);
    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: timer.signal,
      });

      if (!response.ok) {
        return { ok: false, error: await this.responseError(response) };
      }

      const text = await response.text();
      let json: unknown;
      try {
        json = JSON.parse(text);
      } catch {
        return { ok: false, error: new HttpError(response.status, 'Invalid manifest: body is not JSON') };
      }

      const parsed = remoteManifestSchema.safeParse(json);
      if (!parsed.success) {
        return {
          ok: false,
          error: new HttpError(response.status, `Invalid manifest: ${describeIssues(parsed.error)}`),
        };
      }
      const manifest = parsed.data;
      return {
        ok: true,
        manifest: { ...manifest, files: reorderDigests(manifest.files, documentKeyOrder(text, 'files')) },
      };
    } catch (err) {
      return { ok: false, error: this.toTransportError(err, url, timer) };
    } finally {
      timer.clear();
    }
  }

  /** Throws {@link DnsError} or {@link HttpError}, also from the chunk iterator. */
  async openDownload(url: string): Promise<DownloadStream> {
    const timer = new IdleTimer(this.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(url, { method: 'GET', signal: timer.signal });
    } catch (err) {
      timer.clear();
      throw this.toTransportError(err, url, timer);
    }

    if (!response.ok) {
      const error = await this.responseError(response);
      timer.clear();
      throw error;
    }

    const contentLength = parseContentLength(response.headers.get('Content-Length'));
    const body: ReadableStream<Uint8Array> | null = response.body;
    if (!body) {
      timer.clear();
      return { contentLength, chunks: emptyChunks() };
    }
    return { contentLength, chunks: this.readChunks(body, url, timer) };
  }

  private async *readChunks(
    body: ReadableStream<Uint8Array>,
    url: string,
    timer: IdleTimer,
  ): AsyncGenerator<Uint8Array> {
    const reader = body.getReader();
    let finished = false;
    try {
      while (true) {
        const chunk = await this.readNext(reader, url, timer);
        if (chunk === null) {
          finished = true;
          return;
        }
        timer.reset();
        yield chunk;
      }
    } finally {
      timer.clear();
      if (!finished) {
        // Consumer stopped early or the read failed; release the connection.
        await reader.cancel().catch(() => undefined);
      }
      reader.releaseLock();
    }
  }

  private async readNext(
    reader: ReadableStreamDefaultReader<Uint8Array>,
    url: string,
    timer: IdleTimer,
  ): Promise<Uint8Array | null> {
    try {
      const result = await reader.read();
      return result.done ? null : result.value;
    } catch (err) {
      throw this.toTransportError(err, url, timer);
    }
  }

  private async responseError(response: Response): Promise<HttpError> {
    const text = await response.text().catch(() => '');
    const message = extractDetail(text) ?? (text || response.statusText || `HTTP ${response.status}`);
    return new HttpError(response.status, message);
  }

  private toTransportError(err: unknown, url: string, timer: IdleTimer): TransportError {
    if (isTransportError(err)) return err;
    if (timer.expired) {
      return new HttpError(0, `Request to ${url} timed out after ${this.timeoutMs}ms`, { cause: err });
    }
    const code = errorCode(err) ?? errorCode(err instanceof Error ? err.cause : undefined);
    if (code !== undefined && DNS_ERROR_CODES.has(code)) {
      return new DnsError(url, hostnameOf(url), { cause: err });
    }
    return new HttpError(0, `Request to ${url} failed: ${errorMessage(err)}`, { cause: err });
  }
}
