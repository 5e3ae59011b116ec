/**
 * Render job records — status model, validation, and the Supabase mirror of
 * jobs and the project→job index.
 */
import { z } from 'zod';
import { dbSelectAll, dbSelectOne, dbUpsert, type Row } from './client.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export const JOB_STATUSES = [
  'queued',
  'rendering',
  'cancelling',
  'pausing',
  'completed',
  'failed',
  'cancelled',
  'paused',
] as const;

export type JobStatus = typeof JOB_STATUSES[number];

export type StopStatus = Extract<JobStatus, 'cancelled' | 'paused'>;

const TERMINAL: ReadonlySet<JobStatus> = new Set<JobStatus>(['completed', 'failed', 'cancelled', 'paused']);

export const isTerminal = (status: JobStatus): boolean => TERMINAL.has(status);

/** Interim marker shown while an in-flight job winds down. */
export const interimStatusFor = (stop: StopStatus): JobStatus =>
  stop === 'cancelled' ? 'cancelling' : 'pausing';

export const JobSchema = z.object({
  id:        z.string().min(1),
  projectId: z.string().nullish().transform(v => v ?? null),
  status:    z.enum(JOB_STATUSES),
  progress:  z.number().min(0).max(100).catch(0),
  videoUrl:  z.string().nullish().transform(v => v ?? null),
  error:     z.string().nullish().transform(v => v ?? null),
});

export type Job = z.output<typeof JobSchema>;

export type JobPatch = Partial<Omit<Job, 'id'>>;

/** project id → most recent job id */
export type ProjectIndex = Record<string, string>;

export function parseJob(value: unknown): Job | null {
  const parsed = JobSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/** Keeps only string→string entries. */
export function parseProjectIndex(value: unknown): ProjectIndex {
  const index: ProjectIndex = {};
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return index;
  for (const [projectId, jobId] of Object.entries(value)) {
    if (typeof jobId === 'string' && jobId) index[projectId] = jobId;
  }
  return index;
}

// ─── Supabase mirror ──────────────────────────────────────────────────────────

const JOBS_TABLE = 'render_jobs';
const INDEX_TABLE = 'render_project_index';

const JobRowSchema = z.object({
  id:         z.string(),
  project_id: z.string().nullable(),
  status:     z.enum(JOB_STATUSES),
  progress:   z.coerce.number(),
  video_url:  z.string().nullable(),
  error:      z.string().nullable(),
});

function toJobRow(job: Job): Row {
  return {
    id:         job.id,
    project_id: job.projectId,
    status:     job.status,
    progress:   Math.round(job.progress),
    video_url:  job.videoUrl,
    error:      job.error,
    updated_at: new Date().toISOString(),
  };
}

export async function putRemoteJob(job: Job): Promise<void> {
  await dbUpsert(JOBS_TABLE, [toJobRow(job)], 'id');
}

export async function getRemoteJob(id: string): Promise<Job | null> {
  const row = await dbSelectOne(JOBS_TABLE, 'id', id);
  const parsed = JobRowSchema.safeParse(row);
  if (!parsed.success) return null;
  const r = parsed.data;
  return parseJob({
    id:        r.id,
    projectId: r.project_id,
    status:    r.status,
    progress:  r.progress,
    videoUrl:  r.video_url,
    error:     r.error,
  });
}

export async function putRemoteIndex(index: ProjectIndex): Promise<void> {
  const updatedAt = new Date().toISOString();
  const rows = Object.entries(index).map(([projectId, jobId]) => ({
    project_id: projectId,
    job_id:     jobId,
    updated_at: updatedAt,
  }));
  await dbUpsert(INDEX_TABLE, rows, 'project_id');
}

export async function getRemoteIndex(): Promise<ProjectIndex> {
  const rows = await dbSelectAll(INDEX_TABLE);
  const index: ProjectIndex = {};
  for (const row of rows) {
    const projectId = row['project_id'];
    const jobId = row['job_id'];
    if (typeof projectId === 'string' && typeof jobId === 'string' && jobId) {
      index[projectId] = jobId;
    }
  }
  return index;
}
