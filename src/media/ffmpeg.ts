/**
 * Core FFmpeg operations — probing, concatenation and subtitle burn-in.
 *
 * Commands run asynchronously so several scenes can encode at once. Every
 * ffmpeg failure surfaces as a CompositionError carrying stderr verbatim.
 */
import { execFile } from 'child_process';
import { promisify } from 'util';
import * as fs from 'fs';
import { env } from '../config.js';
import { logger } from '../utils/logger.js';
import { CompositionError } from '../pipeline/errors.js';

const execFileAsync = promisify(execFile);

const MAX_BUFFER = 32 * 1024 * 1024;

// ── Helpers ────────────────────────────────────────────────────────────────────

function stderrOf(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'stderr' in err) {
    const { stderr } = err;
    if (typeof stderr === 'string') return stderr.trim();
    if (Buffer.isBuffer(stderr)) return stderr.toString('utf-8').trim();
  }
  return '';
}

export async function runFfmpeg(args: string[], label: string): Promise<void> {
  logger.debug(`FFmpeg [${label}]`, { args });
  try {
    await execFileAsync(env.FFMPEG_PATH, ['-y', '-hide_banner', ...args], { maxBuffer: MAX_BUFFER });
  } catch (err) {
    throw new CompositionError(label, stderrOf(err) || `ffmpeg failed: ${String(err)}`);
  }
}

/** Returns trimmed stdout, or null when ffprobe exits non-zero. */
export async function runFfprobe(args: string[], label: string): Promise<string | null> {
  logger.debug(`FFprobe [${label}]`, { args });
  try {
    const { stdout } = await execFileAsync(env.FFPROBE_PATH, args, { maxBuffer: MAX_BUFFER });
    return stdout.trim();
  } catch (err) {
    logger.debug(`FFprobe [${label}] failed`, { stderr: stderrOf(err) });
    return null;
  }
}

/** Escape a value for use inside an ffmpeg filtergraph option. */
export function escapeFilterValue(s: string): string {
  return s.replace(/\\/g, '/').replace(/[:'[\],;]/g, '\\$&');
}

/** Concat demuxer list file body; single quotes in paths are shell-style escaped. */
export function buildConcatList(clipPaths: readonly string[]): string {
  return clipPaths.map((p) => `file '${p.replace(/'/g, "'\\''")}'`).join('\n') + '\n';
}

// ── Public API ─────────────────────────────────────────────────────────────────

/** Container duration in seconds, or null when it cannot be probed. */
export async function probeDuration(mediaPath: string): Promise<number | null> {
  const raw = await runFfprobe(
    ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', mediaPath],
    'probeDuration',
  );
  if (raw === null) return null;
  const value = parseFloat(raw);
  return Number.isFinite(value) ? value : null;
}

/**
 * Concatenate clips with the concat demuxer and stream copy. All clips must
 * share codec, resolution and frame rate; order is exactly the order given.
 */
export async function concatenateClips(
  clipPaths: readonly string[],
  listPath: string,
  outputPath: string,
): Promise<void> {
  logger.info('FFmpeg: concatenating clips', { count: clipPaths.length, outputPath });
  if (clipPaths.length === 0) throw new CompositionError('concatenateClips', 'no clips provided');

  fs.writeFileSync(listPath, buildConcatList(clipPaths), 'utf-8');
  await runFfmpeg(
    ['-f', 'concat', '-safe', '0', '-i', listPath, '-c', 'copy', '-movflags', '+faststart', outputPath],
    'concatenateClips',
  );
  logger.info('FFmpeg: concatenation complete', { outputPath });
}

/** Burn an ASS subtitle file into the video. Re-encodes video, copies audio. */
export async function burnSubtitles(
  videoPath: string,
  subtitlePath: string,
  outputPath: string,
): Promise<void> {
  logger.info('FFmpeg: burning subtitles', { subtitlePath, outputPath });
  await runFfmpeg(
    [
      '-i', videoPath,
      '-vf', `subtitles=${escapeFilterValue(subtitlePath)}`,
      '-c:v', 'libx264', '-preset', 'veryfast', '-crf', '20', '-pix_fmt', 'yuv420p',
      '-c:a', 'copy',
      '-movflags', '+faststart',
      outputPath,
    ],
    'burnSubtitles',
  );
}

/** Silent mono 16-bit PCM; outputPath must carry a .wav extension. */
export function silenceArgs(outputPath: string, seconds: number): string[] {
  return ['-f', 'lavfi', '-i', 'anullsrc=r=24000:cl=mono', '-t', seconds.toFixed(3), '-c:a', 'pcm_s16le', outputPath];
}

/** Silent track of the given length, for scenes with no narration text. */
export async function writeSilence(outputPath: string, seconds: number): Promise<void> {
  await runFfmpeg(silenceArgs(outputPath, seconds), 'writeSilence');
}
