/**
 * Local job persistence: one JSON file per job plus the project index file,
 * both under the renders directory. Files are written through a temp file and
 * renamed into place so a crash never leaves a half-written record.
 */
import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../utils/logger.js';
import { parseJob, parseProjectIndex, type Job, type ProjectIndex } from './jobs.js';

const INDEX_FILE = '_project_index.json';

export class LocalJobFiles {
  constructor(readonly rendersDir: string) {
    fs.mkdirSync(rendersDir, { recursive: true });
  }

  jobPath(jobId: string): string {
    return path.join(this.rendersDir, `${jobId}.json`);
  }

  get indexPath(): string {
    return path.join(this.rendersDir, INDEX_FILE);
  }

  readJob(jobId: string): Job | null {
    return parseJob(readJson(this.jobPath(jobId)));
  }

  writeJob(job: Job): void {
    writeJsonAtomic(this.jobPath(job.id), job);
  }

  readIndex(): ProjectIndex {
    return parseProjectIndex(readJson(this.indexPath));
  }

  writeIndex(index: ProjectIndex): void {
    writeJsonAtomic(this.indexPath, index);
  }

  /**
   * Most recently written job record for a project, found by scanning every
   * job file. Unreadable files are skipped.
   */
  findLatestForProject(projectId: string): Job | null {
    let best: { job: Job; mtimeMs: number } | null = null;
    for (const name of fs.readdirSync(this.rendersDir)) {
      if (!name.endsWith('.json') || name.startsWith('_')) continue;
      const file = path.join(this.rendersDir, name);
      const job = parseJob(readJson(file));
      if (!job || job.projectId !== projectId) continue;
      const { mtimeMs } = fs.statSync(file);
      if (!best || mtimeMs > best.mtimeMs) best = { job, mtimeMs };
    }
    return best?.job ?? null;
  }
}

function readJson(file: string): unknown {
  if (!fs.existsSync(file)) return null;
  try {
    return JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    logger.warn('LocalJobFiles: unreadable JSON — ignoring', { file, err });
    return null;
  }
}

function writeJsonAtomic(file: string, value: unknown): void {
  const tmp = `${file}.${process.pid}.tmp`;
  fs.writeFileSync(tmp, JSON.stringify(value), 'utf-8');
  fs.renameSync(tmp, file);
}
