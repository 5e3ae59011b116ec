import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { extensionFromUrl, MediaAcquirer, type FetchLike } from './acquire.js';
import { MediaFetchError } from '../pipeline/errors.js';

describe('extensionFromUrl', () => {
  it('takes the extension from the URL path only', () => {
    expect(extensionFromUrl('https://cdn.test/a/clip.MOV?x=1.gif')).toBe('.mov');
    expect(extensionFromUrl('https://cdn.test/stream')).toBe('.mp4');
    expect(extensionFromUrl('relative/clip.webm#t=3')).toBe('.webm');
  });
});

describe('MediaAcquirer', () => {
  let cacheDir: string;

  beforeEach(() => {
    cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), 'media-cache-'));
  });

  afterEach(() => {
    fs.rmSync(cacheDir, { recursive: true, force: true });
  });

  const okFetch = () =>
    vi.fn<FetchLike>(async () => {
      await new Promise((r) => setTimeout(r, 10));
      return new Response('clip-bytes', { status: 200 });
    });

  it('downloads once and serves later requests from the cache', async () => {
    const fetchImpl = okFetch();
    const acquirer = new MediaAcquirer({ cacheDir, fetchImpl, attempts: 1 });
    const url = 'https://cdn.test/b-roll/forest.mp4';

    const first = await acquirer.acquire(url);
    const second = await acquirer.acquire(url);

    expect(first).toBe(second);
    expect(first).toBe(acquirer.cachePathFor(url));
    expect(fs.readFileSync(first, 'utf-8')).toBe('clip-bytes');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('shares one download between concurrent requests', async () => {
    const fetchImpl = okFetch();
    const acquirer = new MediaAcquirer({ cacheDir, fetchImpl, attempts: 1 });
    const url = 'https://cdn.test/b-roll/river.mp4';

    const [a, b] = await Promise.all([acquirer.acquire(url), acquirer.acquire(url)]);

    expect(a).toBe(b);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('does not retry client errors', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response('missing', { status: 404 }));
    const acquirer = new MediaAcquirer({ cacheDir, fetchImpl, attempts: 3, retryDelayMs: 1 });

    await expect(acquirer.acquire('https://cdn.test/gone.mp4')).rejects.toBeInstanceOf(MediaFetchError);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fs.readdirSync(cacheDir)).toEqual([]);
  });

  it('retries server errors', async () => {
    const fetchImpl = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockResolvedValueOnce(new Response('late-bytes', { status: 200 }));
    const acquirer = new MediaAcquirer({ cacheDir, fetchImpl, attempts: 3, retryDelayMs: 1 });

    const dest = await acquirer.acquire('https://cdn.test/flaky.mp4');

    expect(fs.readFileSync(dest, 'utf-8')).toBe('late-bytes');
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });
});
