import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { aspectFillFilter, buildSceneClip, buildSceneClipArgs } from './compositor.js';
import { MediaFetchError, MissingAudioError } from '../pipeline/errors.js';

describe('aspectFillFilter', () => {
  it('scales to cover the frame and crops the overflow', () => {
    expect(aspectFillFilter('square')).toBe('scale=1080:1080:force_original_aspect_ratio=increase,crop=1080:1080');
  });
});

describe('buildSceneClipArgs', () => {
  it('holds the last frame when the background is shorter than the narration', () => {
    const args = buildSceneClipArgs({
      mediaPath: '/cache/clip.mp4',
      audioPath: '/tts/a.mp3',
      duration: 3.5,
      orientation: 'landscape',
      destPath: '/work/scene_000.mp4',
      sourceDuration: 2,
    });

    expect(args.slice(0, 6)).toEqual(['-t', '3.500', '-i', '/cache/clip.mp4', '-i', '/tts/a.mp3']);
    expect(args[args.indexOf('-vf') + 1]).toBe(
      'scale=1920:1080:force_original_aspect_ratio=increase,crop=1920:1080,tpad=stop_mode=clone:stop_duration=1.500',
    );
    expect(args).toContain('-shortest');
    expect(args[args.indexOf('-r') + 1]).toBe('30');
    expect(args[args.length - 1]).toBe('/work/scene_000.mp4');
  });

  it('does not pad a background that is long enough', () => {
    const args = buildSceneClipArgs({
      mediaPath: '/cache/clip.mp4',
      audioPath: '/tts/a.mp3',
      duration: 2,
      orientation: 'landscape',
      destPath: '/work/scene_000.mp4',
      sourceDuration: 10,
    });
    expect(args[args.indexOf('-vf') + 1]).not.toContain('tpad');
  });

  it('generates a flat colour frame without a background, honouring the minimum length', () => {
    const args = buildSceneClipArgs({
      mediaPath: null,
      audioPath: '/tts/a.mp3',
      duration: 0.01,
      orientation: 'portrait',
      destPath: '/work/scene_001.mp4',
      sourceDuration: null,
    });

    expect(args).toContain('color=c=0x141414:s=1080x1920:d=0.100');
    expect(args.slice(0, 2)).toEqual(['-i', '/tts/a.mp3']);
  });
});

describe('buildSceneClip', () => {
  it('fails with MissingAudioError before invoking ffmpeg', async () => {
    const attempt = buildSceneClip(null, '/nonexistent/narration.mp3', 2, 'landscape', '/tmp/work/scene_001.mp4');
    await expect(attempt).rejects.toBeInstanceOf(MissingAudioError);
    await expect(attempt).rejects.toThrow('Audio track missing for scene scene_001: /nonexistent/narration.mp3');
  });

  it('fails with MediaFetchError when the named background clip is not on disk', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'compositor-'));
    const audioPath = path.join(dir, 'narration.mp3');
    fs.writeFileSync(audioPath, 'audio');
    const mediaPath = path.join(dir, 'gone.mp4');

    try {
      const attempt = buildSceneClip(mediaPath, audioPath, 2, 'landscape', path.join(dir, 'scene_000.mp4'));
      await expect(attempt).rejects.toBeInstanceOf(MediaFetchError);
      await expect(attempt).rejects.toThrow(`Background clip missing: ${mediaPath}`);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
