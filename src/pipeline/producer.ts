/**
 * Scene producer — per-scene narration, caption timing and clip rendering,
 * fanned out over a bounded worker pool.
 *
 * Results are collected by submission index; callers re-impose scene order
 * with orderScenes() before anything order-sensitive happens.
 */
import * as path from 'path';
import { RENDER_DEFAULTS, type Orientation } from '../config.js';
import { logger, errorMessage } from '../utils/logger.js';
import { mapPool, type Settled } from '../utils/pool.js';
import type { CaptionWord } from '../captions/words.js';
import type { NarrationSynthesizer } from '../ai/voice.js';
import type { CaptionTimer } from '../ai/transcribe.js';
import type { CancellationSignal } from './cancellation.js';
import type { RenderProject, SceneSpec } from './project.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface PreparedScene extends SceneSpec {
  audioPath: string;
  /** Narration length in seconds; authoritative for scene pacing. */
  audioDuration: number;
}

export type SceneClipBuilder = (
  mediaPath: string | null,
  audioPath: string,
  duration: number,
  orientation: Orientation,
  destPath: string,
) => Promise<string>;

export interface PreparationStages {
  synthesize: NarrationSynthesizer;
  transcribe: CaptionTimer;
}

export interface ClipStages {
  acquireMedia: (url: string) => Promise<string>;
  buildClip: SceneClipBuilder;
}

export interface PoolRun {
  concurrency: number;
  signal: CancellationSignal;
  /** Fraction of scenes settled so far, 0–1. */
  onProgress?: (fraction: number) => void;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

/** First rejection in submission order, else the fulfilled values. */
function unwrapSettled<R>(settled: readonly Settled<R>[], stage: string): R[] {
  const values: R[] = [];
  for (const result of settled) {
    if (result.status === 'rejected') throw result.reason;
    if (result.status === 'skipped') throw new Error(`${stage}: scene was never started`);
    values.push(result.value);
  }
  return values;
}

/** Narration length when known, else the declared duration, else the default. */
function sceneSeconds(narrated: number, declared: number | null): number {
  if (Number.isFinite(narrated) && narrated > 0) return narrated;
  return declared !== null && declared > 0 ? declared : RENDER_DEFAULTS.sceneDurationSeconds;
}

async function timeCaptions(
  scene: SceneSpec,
  audioPath: string,
  transcribe: CaptionTimer,
): Promise<CaptionWord[]> {
  if (scene.captions.length) return scene.captions;
  try {
    return await transcribe(audioPath, scene.text);
  } catch (err) {
    logger.warn('Producer: caption timing failed — continuing without captions', {
      scene: scene.label,
      error: errorMessage(err),
    });
    return [];
  }
}

// ── Public API ─────────────────────────────────────────────────────────────────

/**
 * Narrate and caption every scene. Completion order is arbitrary; the result
 * is indexed by submission position. Stops starting new scenes once a stop is
 * requested and then throws RenderCancelled. A narration failure fails the
 * batch; a caption failure leaves that scene with no words.
 */
export async function prepareScenes(
  project: RenderProject,
  stages: PreparationStages,
  run: PoolRun,
): Promise<PreparedScene[]> {
  const total = project.scenes.length;
  const settled = await mapPool(
    project.scenes,
    async (scene): Promise<PreparedScene> => {
      const narration = await stages.synthesize(scene.text, scene.voice ?? project.voiceModel);
      const captions = await timeCaptions(scene, narration.audioPath, stages.transcribe);
      return {
        ...scene,
        audioPath:     narration.audioPath,
        audioDuration: sceneSeconds(narration.durationSeconds, scene.declaredDuration),
        captions,
      };
    },
    {
      concurrency: run.concurrency,
      shouldStop:  () => run.signal.isStopRequested,
      onSettled:   (index, completed) => {
        logger.debug('Producer: scene prepared', { index, completed, total });
        run.onProgress?.(completed / total);
      },
    },
  );

  run.signal.throwIfStopped('scene preparation');
  return unwrapSettled(settled, 'prepareScenes');
}

/**
 * Render one clip per ordered scene into workDir. The returned paths follow
 * the order of `scenes`, whatever order the clips finished in.
 */
export async function renderSceneClips(
  scenes: readonly PreparedScene[],
  orientation: Orientation,
  workDir: string,
  stages: ClipStages,
  run: PoolRun,
): Promise<string[]> {
  const total = scenes.length;
  const settled = await mapPool(
    scenes,
    async (scene, position) => {
      const mediaPath = scene.mediaUrl ? await stages.acquireMedia(scene.mediaUrl) : null;
      const dest = path.join(workDir, `scene_${String(position + 1).padStart(3, '0')}.mp4`);
      return stages.buildClip(mediaPath, scene.audioPath, scene.audioDuration, orientation, dest);
    },
    {
      concurrency: run.concurrency,
      shouldStop:  () => run.signal.isStopRequested,
      onSettled:   (_index, completed) => run.onProgress?.(completed / total),
    },
  );

  run.signal.throwIfStopped('final assembly');
  return unwrapSettled(settled, 'renderSceneClips');
}
