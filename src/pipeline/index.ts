/**
 * Render pipeline for one job.
 *
 * Coordinates scene preparation, scene ordering, subtitle track, clip
 * rendering, timeline assembly and URL resolution. Job state lives in the
 * orchestrator; this module only reports progress and returns the result.
 */
import * as path from 'path';
import { logger, errorMessage } from '../utils/logger.js';
import { shortToken } from '../utils/hash.js';
import { writeSubtitleTrack } from '../captions/track.js';
import { buildSceneClip } from '../media/compositor.js';
import { assembleTimeline, DEFAULT_ASSEMBLY_STAGES, finalVideoPath, type AssemblyStages } from './assembler.js';
import {
  prepareScenes,
  renderSceneClips,
  type ClipStages,
  type PreparationStages,
} from './producer.js';
import { orderScenes, type RenderProject } from './project.js';
import type { CancellationSignal } from './cancellation.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface RenderStages extends PreparationStages, ClipStages, AssemblyStages {
  /** Public URL of the uploaded artifact, or null to serve it locally. */
  uploadArtifact: (filePath: string, projectKey: string) => Promise<string | null>;
}

export interface RenderEnvironment {
  rendersDir: string;
  sceneWorkers: number;
  publicVideoBase: string;
  stages: RenderStages;
}

export interface RenderRequest {
  jobId: string;
  project: RenderProject;
}

export interface RenderResult {
  projectKey: string;
  finalPath: string;
  videoUrl: string;
}

export type ProgressReporter = (progress: number) => void;

// ── Progress milestones ───────────────────────────────────────────────────────

export const PROGRESS = {
  started:          5,
  prepared:         50,
  subtitles:        60,
  clipsRendered:    85,
  assembled:        90,
  completed:        100,
} as const;

const between = (from: number, to: number, fraction: number) => Math.round(from + (to - from) * fraction);

// ── Helpers ───────────────────────────────────────────────────────────────────

/** Filesystem-safe project key; the job id when the project has none. */
export function projectKeyFor(req: RenderRequest): string {
  const safe = (req.project.projectId ?? '').replace(/[^A-Za-z0-9_-]/g, '_').replace(/^_+|_+$/g, '');
  return safe || req.jobId;
}

export function localVideoUrl(base: string, projectKey: string, fileName: string): string {
  return `${base.replace(/\/+$/, '')}/${projectKey}/${fileName}?v=${shortToken()}`;
}

async function resolveVideoUrl(
  finalPath: string,
  projectKey: string,
  renderEnv: RenderEnvironment,
): Promise<string> {
  try {
    const uploaded = await renderEnv.stages.uploadArtifact(finalPath, projectKey);
    if (uploaded) {
      logger.info('Pipeline: artifact uploaded', { projectKey, url: uploaded });
      return uploaded;
    }
  } catch (err) {
    logger.warn('Pipeline: artifact upload failed — serving locally', { projectKey, error: errorMessage(err) });
  }
  return localVideoUrl(renderEnv.publicVideoBase, projectKey, path.basename(finalPath));
}

// ── Main render ───────────────────────────────────────────────────────────────

/**
 * Render one project:
 * 1. Prepare scenes (narration + caption timing) on the bounded pool.
 * 2. Restore declared scene order.
 * 3. Write the subtitle track over the ordered scenes.
 * 4. Render scene clips on the bounded pool.
 * 5. Concatenate and burn in subtitles.
 * 6. Resolve the public URL.
 *
 * Throws RenderCancelled when the signal is raised at a checkpoint.
 */
export async function runRender(
  req: RenderRequest,
  renderEnv: RenderEnvironment,
  signal: CancellationSignal,
  report: ProgressReporter = () => undefined,
): Promise<RenderResult> {
  const { project, jobId } = req;
  const projectKey = projectKeyFor(req);
  const projectDir = path.join(renderEnv.rendersDir, projectKey);
  const workDir = path.join(projectDir, `job_${jobId}`);
  const concurrency = Math.max(1, Math.min(renderEnv.sceneWorkers, project.scenes.length));

  logger.info('Pipeline: render started', { jobId, projectKey, scenes: project.scenes.length, concurrency });

  // ── Step 1: Scene preparation ──────────────────────────────────────────────
  const prepared = await prepareScenes(project, renderEnv.stages, {
    concurrency,
    signal,
    onProgress: (f) => report(between(PROGRESS.started, PROGRESS.prepared, f)),
  });
  report(PROGRESS.prepared);

  // ── Step 2: Restore declared order ─────────────────────────────────────────
  const ordered = orderScenes(prepared);
  logger.debug('Pipeline: scene order', { jobId, order: ordered.map((s) => s.label) });

  // ── Step 3: Subtitle track ─────────────────────────────────────────────────
  const subtitlePath = writeSubtitleTrack(
    ordered.map((s) => ({ text: s.text, duration: s.audioDuration, captions: s.captions })),
    project.captionStyle,
    project.orientation,
    path.join(workDir, 'captions.ass'),
  );
  report(PROGRESS.subtitles);

  // ── Step 4: Scene clips ────────────────────────────────────────────────────
  const clips = await renderSceneClips(ordered, project.orientation, workDir, renderEnv.stages, {
    concurrency,
    signal,
    onProgress: (f) => report(between(PROGRESS.subtitles, PROGRESS.clipsRendered, f)),
  });

  // ── Step 5: Timeline assembly ──────────────────────────────────────────────
  const finalPath = await assembleTimeline(
    clips,
    subtitlePath,
    { workDir, finalPath: finalVideoPath(projectDir, projectKey) },
    signal,
    renderEnv.stages,
  );
  report(PROGRESS.assembled);

  // ── Step 6: Public URL ─────────────────────────────────────────────────────
  const videoUrl = await resolveVideoUrl(finalPath, projectKey, renderEnv);
  logger.info('Pipeline: render finished', { jobId, projectKey, videoUrl });
  return { projectKey, finalPath, videoUrl };
}

/** Production stages: OpenAI narration and timing, ffmpeg composition. */
export function defaultStages(opts: {
  synthesize: RenderStages['synthesize'];
  transcribe: RenderStages['transcribe'];
  acquireMedia: RenderStages['acquireMedia'];
  uploadArtifact: RenderStages['uploadArtifact'];
}): RenderStages {
  return { ...opts, buildClip: buildSceneClip, ...DEFAULT_ASSEMBLY_STAGES };
}
