import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  createOpenAiNarrator,
  estimateNarrationSeconds,
  narrationCacheKey,
  normalizeVoiceProfile,
  type NarratorMedia,
} from './voice.js';

describe('normalizeVoiceProfile', () => {
  it('accepts profile names and raw voice names', () => {
    expect(normalizeVoiceProfile('News')).toBe('news');
    expect(normalizeVoiceProfile(' shimmer ')).toBe('shimmer');
  });

  it('matches a profile named inside the id', () => {
    expect(normalizeVoiceProfile('late-night-satire-v2')).toBe('satire');
  });

  it('defaults to documentary', () => {
    expect(normalizeVoiceProfile(null)).toBe('documentary');
    expect(normalizeVoiceProfile('robot')).toBe('documentary');
  });
});

describe('estimateNarrationSeconds', () => {
  it('assumes 2.5 words per second with a two second floor', () => {
    expect(estimateNarrationSeconds('one two three four five six seven eight nine ten')).toBe(4);
    expect(estimateNarrationSeconds('short')).toBe(2);
    expect(estimateNarrationSeconds('')).toBe(2);
  });
});

describe('narrationCacheKey', () => {
  it('depends on both profile and text', () => {
    const key = narrationCacheKey('hello', 'news');
    expect(key).toMatch(/^[0-9a-f]{64}$/);
    expect(narrationCacheKey('hello', 'news')).toBe(key);
    expect(narrationCacheKey('hello', 'kids')).not.toBe(key);
    expect(narrationCacheKey('hello!', 'news')).not.toBe(key);
  });
});

describe('createOpenAiNarrator', () => {
  let cacheDir: string;

  beforeEach(() => {
    cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tts-cache-'));
  });

  afterEach(() => {
    fs.rmSync(cacheDir, { recursive: true, force: true });
  });

  const fakeMedia = (): NarratorMedia => ({
    probeDuration: vi.fn(async () => null),
    writeSilence: vi.fn(async (outputPath: string) => {
      fs.writeFileSync(outputPath, '');
    }),
  });

  it('reuses cached narration without synthesizing again', async () => {
    const text = 'one two three four five six';
    const cached = path.join(cacheDir, `${narrationCacheKey(text, 'news')}.mp3`);
    fs.writeFileSync(cached, 'not really audio');

    const narrate = createOpenAiNarrator(cacheDir, fakeMedia());
    const narration = await narrate(text, 'news anchor');

    expect(narration).toEqual({ audioPath: cached, durationSeconds: 2.4 });
  });

  it('writes a silent WAV track for blank narration text', async () => {
    const media = fakeMedia();
    const narrate = createOpenAiNarrator(cacheDir, media);
    const expected = path.join(cacheDir, `${narrationCacheKey('  ', 'documentary')}.wav`);

    const narration = await narrate('  ', null);

    expect(media.writeSilence).toHaveBeenCalledWith(expected, 2);
    expect(narration).toEqual({ audioPath: expected, durationSeconds: 2 });
  });

  it('reuses a silent track already on disk', async () => {
    const media = fakeMedia();
    const narrate = createOpenAiNarrator(cacheDir, media);

    const first = await narrate('', 'kids');
    const second = await narrate('', 'kids');

    expect(media.writeSilence).toHaveBeenCalledTimes(1);
    expect(second).toEqual(first);
  });
});
