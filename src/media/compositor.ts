/**
 * Scene compositing — one fixed-size, constant-frame-rate clip per scene.
 *
 * The narration audio governs clip length. A background clip is aspect-filled
 * to the frame, trimmed to the scene duration, and its last frame held when it
 * runs short; without one a flat colour is generated.
 */
import * as fs from 'fs';
import * as path from 'path';
import { FRAME_RATE, RENDER_DEFAULTS, TARGET_RESOLUTIONS, type Orientation } from '../config.js';
import { logger } from '../utils/logger.js';
import { MediaFetchError, MissingAudioError } from '../pipeline/errors.js';
import { probeDuration, runFfmpeg } from './ffmpeg.js';

// ── Arg builders ──────────────────────────────────────────────────────────────

function encodeTail(destPath: string): string[] {
  return [
    '-r', String(FRAME_RATE),
    '-c:v', 'libx264', '-preset', 'veryfast', '-crf', '20', '-pix_fmt', 'yuv420p',
    '-c:a', 'aac', '-ar', '24000', '-ac', '1',
    '-shortest',
    destPath,
  ];
}

/** scale up until the frame is covered, then crop the overflow (no letterbox). */
export function aspectFillFilter(orientation: Orientation): string {
  const { width, height } = TARGET_RESOLUTIONS[orientation];
  return `scale=${width}:${height}:force_original_aspect_ratio=increase,crop=${width}:${height}`;
}

export interface SceneClipPlan {
  mediaPath: string | null;
  audioPath: string;
  duration: number;
  orientation: Orientation;
  destPath: string;
  /** Probed length of the background clip, when known. */
  sourceDuration: number | null;
}

export function buildSceneClipArgs(plan: SceneClipPlan): string[] {
  const { mediaPath, audioPath, orientation, destPath, sourceDuration } = plan;
  const duration = Math.max(plan.duration, RENDER_DEFAULTS.minSceneSeconds);
  const durationStr = duration.toFixed(3);
  const fill = aspectFillFilter(orientation);

  if (mediaPath) {
    let filters = fill;
    if (sourceDuration !== null && sourceDuration < duration) {
      const pad = duration - sourceDuration;
      filters += `,tpad=stop_mode=clone:stop_duration=${pad.toFixed(3)}`;
    }
    return [
      '-t', durationStr, '-i', mediaPath,
      '-i', audioPath,
      '-vf', filters,
      '-map', '0:v:0', '-map', '1:a:0',
      ...encodeTail(destPath),
    ];
  }

  const { width, height } = TARGET_RESOLUTIONS[orientation];
  return [
    '-i', audioPath,
    '-f', 'lavfi', '-i', `color=c=${RENDER_DEFAULTS.backgroundColor}:s=${width}x${height}:d=${durationStr}`,
    '-map', '1:v:0', '-map', '0:a:0',
    '-vf', fill,
    ...encodeTail(destPath),
  ];
}

// ── Public API ─────────────────────────────────────────────────────────────────

/**
 * Render one scene clip to destPath and return it.
 * Throws MissingAudioError when the narration file is absent, and
 * MediaFetchError when a background clip was named but is not on disk.
 */
export async function buildSceneClip(
  mediaPath: string | null,
  audioPath: string,
  duration: number,
  orientation: Orientation,
  destPath: string,
): Promise<string> {
  if (!audioPath || !fs.existsSync(audioPath)) {
    throw new MissingAudioError(audioPath, path.basename(destPath, path.extname(destPath)));
  }

  if (mediaPath && !fs.existsSync(mediaPath)) {
    throw new MediaFetchError(mediaPath, `Background clip missing: ${mediaPath}`);
  }
  const background = mediaPath || null;
  const sourceDuration = background ? await probeDuration(background) : null;

  logger.info('Compositor: building scene clip', {
    destPath,
    duration,
    orientation,
    background: background ?? 'flat colour',
  });

  await runFfmpeg(
    buildSceneClipArgs({ mediaPath: background, audioPath, duration, orientation, destPath, sourceDuration }),
    'buildSceneClip',
  );
  return destPath;
}
