/**
 * Scratch retention — removes per-job working directories (`job_<id>`) once
 * they are older than the retention window. Final videos are never touched.
 */
import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../utils/logger.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Returns the removed directories. */
export function purgeScratchDirs(rendersDir: string, maxAgeDays: number, now: number = Date.now()): string[] {
  if (!fs.existsSync(rendersDir)) return [];
  const cutoff = now - maxAgeDays * DAY_MS;
  const removed: string[] = [];

  for (const project of fs.readdirSync(rendersDir, { withFileTypes: true })) {
    if (!project.isDirectory()) continue;
    const projectDir = path.join(rendersDir, project.name);
    for (const entry of fs.readdirSync(projectDir, { withFileTypes: true })) {
      if (!entry.isDirectory() || !entry.name.startsWith('job_')) continue;
      const dir = path.join(projectDir, entry.name);
      if (fs.statSync(dir).mtimeMs >= cutoff) continue;
      fs.rmSync(dir, { recursive: true, force: true });
      removed.push(dir);
    }
  }

  logger.info('Retention: scratch purge complete', { rendersDir, removed: removed.length, maxAgeDays });
  return removed;
}
