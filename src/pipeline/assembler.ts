/**
 * Timeline assembly — concatenates ordered scene clips and burns in the
 * subtitle track.
 *
 * Concatenation is a stream copy; only burn-in re-encodes. Without subtitles
 * the concatenated file is promoted to the final path as-is.
 */
import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../utils/logger.js';
import { burnSubtitles, concatenateClips } from '../media/ffmpeg.js';
import type { CancellationSignal } from './cancellation.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface AssemblyStages {
  concatenate: typeof concatenateClips;
  burnSubtitles: typeof burnSubtitles;
}

export interface AssemblyTarget {
  /** Scratch directory for the intermediate file and concat list. */
  workDir: string;
  finalPath: string;
}

export const DEFAULT_ASSEMBLY_STAGES: AssemblyStages = { concatenate: concatenateClips, burnSubtitles };

/** `<projectDir>/<projectKey>_final.mp4` */
export function finalVideoPath(projectDir: string, projectKey: string): string {
  return path.join(projectDir, `${projectKey}_final.mp4`);
}

function hasContent(file: string | null): file is string {
  return file !== null && fs.existsSync(file) && fs.statSync(file).size > 0;
}

// ── Public API ─────────────────────────────────────────────────────────────────

/**
 * Concatenate `orderedClipPaths` exactly in the order given, then burn in the
 * subtitle track when there is a non-empty one. Returns the final path.
 */
export async function assembleTimeline(
  orderedClipPaths: readonly string[],
  subtitlePath: string | null,
  target: AssemblyTarget,
  signal: CancellationSignal,
  stages: AssemblyStages = DEFAULT_ASSEMBLY_STAGES,
): Promise<string> {
  const { workDir, finalPath } = target;
  fs.mkdirSync(workDir, { recursive: true });
  fs.mkdirSync(path.dirname(finalPath), { recursive: true });

  const intermediate = path.join(workDir, 'concat.mp4');
  await stages.concatenate(orderedClipPaths, path.join(workDir, 'concat.txt'), intermediate);

  signal.throwIfStopped('subtitle burn-in');

  if (hasContent(subtitlePath)) {
    await stages.burnSubtitles(intermediate, subtitlePath, finalPath);
  } else {
    logger.info('Assembler: no subtitles — promoting concatenated file', { finalPath });
    fs.renameSync(intermediate, finalPath);
  }

  logger.info('Assembler: final video ready', { finalPath, clips: orderedClipPaths.length });
  return finalPath;
}
