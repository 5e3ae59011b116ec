/**
 * Content-addressed download cache for remote stock clips.
 *
 * The cache key is sha256(url); an existing file is returned as-is without
 * touching the network. Concurrent requests for one URL share a download.
 */
import * as fs from 'fs';
import * as path from 'path';
import { env } from '../config.js';
import { logger, errorMessage } from '../utils/logger.js';
import { hashString } from '../utils/hash.js';
import { NonRetryableError, withRetry } from '../utils/retry.js';
import { MediaFetchError } from '../pipeline/errors.js';

export type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export interface MediaAcquirerOptions {
  cacheDir: string;
  fetchImpl?: FetchLike;
  timeoutMs?: number;
  attempts?: number;
  retryDelayMs?: number;
}

const DEFAULT_EXTENSION = '.mp4';

/** Extension of the URL path (query and fragment ignored), else `.mp4`. */
export function extensionFromUrl(url: string): string {
  const pathname = URL.canParse(url) ? new URL(url).pathname : (url.split(/[?#]/)[0] ?? '');
  const ext = path.posix.extname(pathname);
  return /^\.[A-Za-z0-9]{1,8}$/.test(ext) ? ext.toLowerCase() : DEFAULT_EXTENSION;
}

export class MediaAcquirer {
  private readonly inFlight = new Map<string, Promise<string>>();
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly attempts: number;
  private readonly retryDelayMs: number;

  constructor(private readonly options: MediaAcquirerOptions) {
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs ?? env.MEDIA_FETCH_TIMEOUT_MS;
    this.attempts = options.attempts ?? env.MEDIA_FETCH_ATTEMPTS;
    this.retryDelayMs = options.retryDelayMs ?? 1_000;
    fs.mkdirSync(options.cacheDir, { recursive: true });
  }

  cachePathFor(url: string): string {
    return path.join(this.options.cacheDir, `${hashString(url)}${extensionFromUrl(url)}`);
  }

  async acquire(url: string): Promise<string> {
    const dest = this.cachePathFor(url);
    if (fs.existsSync(dest)) return dest;

    const pending = this.inFlight.get(dest);
    if (pending) return pending;

    const download = this.download(url, dest).finally(() => this.inFlight.delete(dest));
    this.inFlight.set(dest, download);
    return download;
  }

  private async download(url: string, dest: string): Promise<string> {
    logger.info('MediaAcquirer: downloading clip', { url });
    let bytes: Buffer;
    try {
      bytes = await withRetry(() => this.fetchOnce(url), {
        maxAttempts: this.attempts,
        baseDelayMs: this.retryDelayMs,
        label: 'media download',
      });
    } catch (err) {
      throw new MediaFetchError(url, `Media download failed for ${url}: ${errorMessage(err)}`, { cause: err });
    }

    const tmp = `${dest}.${process.pid}.part`;
    fs.writeFileSync(tmp, bytes);
    fs.renameSync(tmp, dest);
    logger.info('MediaAcquirer: cached clip', { url, dest, bytes: bytes.length });
    return dest;
  }

  private async fetchOnce(url: string): Promise<Buffer> {
    const res = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    if (!res.ok) {
      const message = `HTTP ${res.status}`;
      // client errors will not fix themselves
      if (res.status >= 400 && res.status < 500) throw new NonRetryableError(message);
      throw new Error(message);
    }
    return Buffer.from(await res.arrayBuffer());
  }
}
