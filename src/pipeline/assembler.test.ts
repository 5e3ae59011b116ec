import { afterEach, beforeEach, describe, it, expect, vi, type Mock } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { assembleTimeline, finalVideoPath, type AssemblyStages } from './assembler.js';
import { CancellationToken, NEVER_CANCELLED } from './cancellation.js';
import { RenderCancelled } from './errors.js';

describe('finalVideoPath', () => {
  it('names the file after the project key', () => {
    expect(finalVideoPath(path.join('renders', 'promo'), 'promo')).toBe(path.join('renders', 'promo', 'promo_final.mp4'));
  });
});

describe('assembleTimeline', () => {
  let dir: string;
  let clips: string[];
  let stages: AssemblyStages;
  let concatenate: Mock<AssemblyStages['concatenate']>;
  let burnSubtitles: Mock<AssemblyStages['burnSubtitles']>;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'assemble-'));
    clips = ['b', 'a'].map((name) => {
      const file = path.join(dir, `${name}.mp4`);
      fs.writeFileSync(file, name);
      return file;
    });
    concatenate = vi.fn<AssemblyStages['concatenate']>(async (paths, _list, out) => {
      fs.writeFileSync(out, paths.map((p) => fs.readFileSync(p, 'utf-8')).join('|'));
    });
    burnSubtitles = vi.fn<AssemblyStages['burnSubtitles']>(async (video, _subs, out) => {
      fs.writeFileSync(out, `${fs.readFileSync(video, 'utf-8')}+subs`);
    });
    stages = { concatenate, burnSubtitles };
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const target = () => ({ workDir: path.join(dir, 'job_1'), finalPath: path.join(dir, 'out', 'promo_final.mp4') });

  it('concatenates in the given order and burns in subtitles', async () => {
    const subs = path.join(dir, 'captions.ass');
    fs.writeFileSync(subs, '[Script Info]\n');

    const finalPath = await assembleTimeline(clips, subs, target(), NEVER_CANCELLED, stages);

    expect(finalPath).toBe(target().finalPath);
    expect(fs.readFileSync(finalPath, 'utf-8')).toBe('b|a+subs');
    expect(concatenate).toHaveBeenCalledWith(
      clips,
      path.join(dir, 'job_1', 'concat.txt'),
      path.join(dir, 'job_1', 'concat.mp4'),
    );
    expect(burnSubtitles).toHaveBeenCalledWith(path.join(dir, 'job_1', 'concat.mp4'), subs, finalPath);
  });

  it('promotes the concatenated file when the subtitle track is empty or absent', async () => {
    const empty = path.join(dir, 'empty.ass');
    fs.writeFileSync(empty, '');

    const finalPath = await assembleTimeline(clips, empty, target(), NEVER_CANCELLED, stages);

    expect(fs.readFileSync(finalPath, 'utf-8')).toBe('b|a');
    expect(fs.existsSync(path.join(dir, 'job_1', 'concat.mp4'))).toBe(false);
    expect(burnSubtitles).not.toHaveBeenCalled();

    await assembleTimeline(clips, null, target(), NEVER_CANCELLED, stages);
    expect(burnSubtitles).not.toHaveBeenCalled();
  });

  it('stops before burn-in when a stop was requested', async () => {
    const token = new CancellationToken();
    token.request('paused');
    const subs = path.join(dir, 'captions.ass');
    fs.writeFileSync(subs, '[Script Info]\n');

    await expect(assembleTimeline(clips, subs, target(), token, stages)).rejects.toBeInstanceOf(RenderCancelled);
    expect(concatenate).toHaveBeenCalledTimes(1);
    expect(burnSubtitles).not.toHaveBeenCalled();
    expect(fs.existsSync(target().finalPath)).toBe(false);
  });
});
