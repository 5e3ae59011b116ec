import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { LocalJobFiles } from './local.js';
import type { Job } from './jobs.js';

const job = (id: string, projectId: string | null, status: Job['status'] = 'queued'): Job => ({
  id,
  projectId,
  status,
  progress: 0,
  videoUrl: null,
  error: null,
});

describe('LocalJobFiles', () => {
  let dir: string;
  let files: LocalJobFiles;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'renders-'));
    files = new LocalJobFiles(dir);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads back a written job', () => {
    files.writeJob(job('j1', 'promo', 'rendering'));
    expect(files.readJob('j1')).toEqual(job('j1', 'promo', 'rendering'));
    expect(fs.readdirSync(dir)).toEqual(['j1.json']);
  });

  it('returns null for missing or corrupt records', () => {
    expect(files.readJob('absent')).toBeNull();
    fs.writeFileSync(files.jobPath('broken'), '{not json');
    expect(files.readJob('broken')).toBeNull();
    fs.writeFileSync(files.jobPath('wrong'), JSON.stringify({ id: 'wrong', status: 'exploded' }));
    expect(files.readJob('wrong')).toBeNull();
  });

  it('keeps only string entries in the project index', () => {
    fs.writeFileSync(files.indexPath, JSON.stringify({ promo: 'j1', bad: 5, empty: '' }));
    expect(files.readIndex()).toEqual({ promo: 'j1' });

    files.writeIndex({ promo: 'j2' });
    expect(files.readIndex()).toEqual({ promo: 'j2' });
  });

  it('finds the most recently written job for a project', () => {
    files.writeJob(job('older', 'promo', 'failed'));
    files.writeJob(job('newer', 'promo', 'completed'));
    files.writeJob(job('other', 'teaser'));
    files.writeIndex({ promo: 'older' });
    fs.utimesSync(files.jobPath('older'), 1_000, 1_000);
    fs.utimesSync(files.jobPath('newer'), 2_000, 2_000);

    expect(files.findLatestForProject('promo')?.id).toBe('newer');
    expect(files.findLatestForProject('teaser')?.id).toBe('other');
    expect(files.findLatestForProject('missing')).toBeNull();
  });
});
