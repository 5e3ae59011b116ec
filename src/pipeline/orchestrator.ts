/**
 * Render job orchestrator.
 *
 * Accepts render requests, runs them one at a time in submission order, and
 * keeps every job's state in memory, in a local JSON file and (when
 * configured) in the durable store. Each transition is persisted before the
 * update returns, so a restarted process can answer `get` / `getByProject`
 * with the last recorded state.
 *
 * The job table and project index are only touched inside `lock`.
 */
import * as path from 'path';
import { logger, errorMessage } from '../utils/logger.js';
import { newToken } from '../utils/hash.js';
import { Mutex } from '../utils/mutex.js';
import { LocalJobFiles } from '../db/local.js';
import {
  interimStatusFor,
  isTerminal,
  type Job,
  type JobPatch,
  type JobStatus,
  type ProjectIndex,
  type StopStatus,
} from '../db/jobs.js';
import type { DurableStore } from '../db/store.js';
import { CancellationToken } from './cancellation.js';
import { RenderCancelled } from './errors.js';
import { parseProject, type RenderProject } from './project.js';
import { PROGRESS, runRender, type RenderStages } from './index.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface OrchestratorOptions {
  /** Root output directory; job files and renders live under `<outputDir>/renders`. */
  outputDir: string;
  stages: RenderStages;
  sceneWorkers: number;
  publicVideoBase: string;
  store?: DurableStore | null;
  /** Called after a job is recorded as failed. */
  onFailure?: (job: Job) => Promise<void> | void;
}

const INTERIM: ReadonlySet<JobStatus> = new Set<JobStatus>(['cancelling', 'pausing']);

const copy = (job: Job): Job => ({ ...job });

// ── Orchestrator ──────────────────────────────────────────────────────────────

export class RenderOrchestrator {
  readonly rendersDir: string;
  private readonly files: LocalJobFiles;
  private readonly store: DurableStore | null;
  private readonly jobs = new Map<string, Job>();
  private readonly tokens = new Map<string, CancellationToken>();
  private readonly lock = new Mutex();
  private index: ProjectIndex;
  private queue: Promise<void> = Promise.resolve();

  private constructor(private readonly options: OrchestratorOptions, index: ProjectIndex) {
    this.rendersDir = path.join(options.outputDir, 'renders');
    this.files = new LocalJobFiles(this.rendersDir);
    this.store = options.store ?? null;
    this.index = index;
  }

  /**
   * Build an orchestrator over `outputDir`, loading the local project index
   * and filling gaps from the durable store's index.
   */
  static async open(options: OrchestratorOptions): Promise<RenderOrchestrator> {
    const files = new LocalJobFiles(path.join(options.outputDir, 'renders'));
    const index = files.readIndex();

    if (options.store) {
      try {
        const remote = await options.store.getIndex();
        for (const [projectId, jobId] of Object.entries(remote)) {
          if (!(projectId in index)) index[projectId] = jobId;
        }
      } catch (err) {
        logger.warn('Orchestrator: remote index unavailable — using local index', { error: errorMessage(err) });
      }
    }

    logger.info('Orchestrator: ready', { outputDir: options.outputDir, indexedProjects: Object.keys(index).length });
    return new RenderOrchestrator(options, index);
  }

  // ── Public API ──────────────────────────────────────────────────────────────

  /**
   * Record a queued job for the project and schedule it behind earlier jobs.
   * Returns at once. Throws a ZodError when the payload shape is invalid.
   */
  async submit(payload: unknown): Promise<Job> {
    const project = parseProject(payload);
    const job: Job = {
      id:        newToken(),
      projectId: project.projectId,
      status:    'queued',
      progress:  0,
      videoUrl:  null,
      error:     null,
    };

    await this.lock.runExclusive(async () => {
      this.jobs.set(job.id, job);
      this.tokens.set(job.id, new CancellationToken());
      await this.persistJob(job);
      if (job.projectId) {
        this.index[job.projectId] = job.id;
        await this.persistIndex();
      }
    });

    logger.info('Orchestrator: job queued', { jobId: job.id, projectId: job.projectId, scenes: project.scenes.length });

    this.queue = this.queue
      .then(() => this.execute(job.id, project))
      .catch((err) => logger.error('Orchestrator: job worker crashed', { jobId: job.id, err }));

    return copy(job);
  }

  /** In-memory state, else the local record, else the durable store. */
  async get(jobId: string): Promise<Job | null> {
    const held = await this.lock.runExclusive(() => this.loadLocal(jobId));
    if (held) return held;

    const remote = await this.fetchRemote(jobId);
    if (!remote) {
      logger.debug('Orchestrator: job not found', { jobId });
      return null;
    }
    return this.lock.runExclusive(() => {
      if (!this.jobs.has(remote.id)) this.files.writeJob(remote);
      return this.admit(remote);
    });
  }

  /**
   * Latest job for a project: project index first, then a scan of job files
   * (repairing the index), then the durable store.
   */
  async getByProject(projectId: string): Promise<Job | null> {
    const indexed = await this.lock.runExclusive(() => this.index[projectId] ?? null);
    if (indexed) {
      const job = await this.get(indexed);
      if (job) return job;
      logger.warn('Orchestrator: index points at a missing job — rescanning', { projectId, jobId: indexed });
    }

    const scanned = await this.lock.runExclusive(async () => {
      const found = this.files.findLatestForProject(projectId);
      if (found) {
        const job = this.admit(found);
        this.index[projectId] = job.id;
        await this.persistIndex();
        return job;
      }
      if (indexed && this.index[projectId] === indexed) {
        delete this.index[projectId];
        await this.persistIndex();
      }
      return null;
    });
    if (scanned) {
      logger.info('Orchestrator: project index repaired from job files', { projectId, jobId: scanned.id });
      return scanned;
    }

    if (!this.store) return null;
    try {
      const remoteIndex = await this.store.getIndex();
      const remoteJobId = remoteIndex[projectId];
      if (!remoteJobId) return null;
      const job = await this.get(remoteJobId);
      if (!job) return null;
      await this.lock.runExclusive(async () => {
        this.index[projectId] = job.id;
        await this.persistIndex();
      });
      return job;
    } catch (err) {
      logger.warn('Orchestrator: remote project lookup failed', { projectId, error: errorMessage(err) });
      return null;
    }
  }

  /**
   * Ask a job to stop as `target`. Terminal jobs are returned unchanged. A job
   * with a worker in this process moves to its interim status and stops at its
   * next checkpoint; a job no worker owns (left over from an earlier process)
   * is finalised at once.
   */
  async requestStop(jobId: string, target: StopStatus): Promise<Job | null> {
    const job = await this.get(jobId);
    if (!job) return null;

    return this.lock.runExclusive(async () => {
      const current = this.jobs.get(jobId);
      if (!current || isTerminal(current.status)) return current ? copy(current) : null;

      const token = this.tokens.get(jobId);
      if (!token) {
        logger.warn('Orchestrator: stopping orphaned job', { jobId, status: current.status, target });
        return this.applyLocked(jobId, { status: target });
      }

      token.request(target);
      logger.info('Orchestrator: stop requested', { jobId, target });
      return this.applyLocked(jobId, { status: interimStatusFor(target) });
    });
  }

  /** Resolves once every job submitted so far has settled. */
  async idle(): Promise<void> {
    let current: Promise<void>;
    do {
      current = this.queue;
      await current;
    } while (current !== this.queue);
  }

  // ── Execution ───────────────────────────────────────────────────────────────

  private async execute(jobId: string, project: RenderProject): Promise<void> {
    const token = this.tokens.get(jobId) ?? new CancellationToken();
    try {
      token.throwIfStopped('before start');
      await this.update(jobId, { status: 'rendering', progress: PROGRESS.started });

      const result = await runRender(
        { jobId, project },
        {
          rendersDir:      this.rendersDir,
          sceneWorkers:    this.options.sceneWorkers,
          publicVideoBase: this.options.publicVideoBase,
          stages:          this.options.stages,
        },
        token,
        (progress) => this.reportProgress(jobId, progress),
      );

      const stop = token.stopStatus;
      if (stop) {
        await this.finishStopped(jobId, stop);
      } else {
        await this.update(jobId, { status: 'completed', progress: PROGRESS.completed, videoUrl: result.videoUrl });
        logger.info('Orchestrator: job completed', { jobId, videoUrl: result.videoUrl });
      }
    } catch (err) {
      const stop = err instanceof RenderCancelled ? err.stopStatus : token.stopStatus;
      if (stop) {
        await this.finishStopped(jobId, stop);
      } else {
        await this.fail(jobId, err);
      }
    } finally {
      this.tokens.delete(jobId);
    }
  }

  private async finishStopped(jobId: string, status: StopStatus): Promise<void> {
    await this.update(jobId, { status });
    logger.info('Orchestrator: job stopped', { jobId, status });
  }

  private async fail(jobId: string, err: unknown): Promise<void> {
    const message = errorMessage(err) || 'Render failed';
    logger.error('Orchestrator: job failed', { jobId, err });
    const job = await this.update(jobId, { status: 'failed', progress: PROGRESS.completed, error: message });
    if (job && job.status === 'failed' && this.options.onFailure) {
      try {
        await this.options.onFailure(job);
      } catch (hookErr) {
        logger.warn('Orchestrator: failure hook threw', { jobId, error: errorMessage(hookErr) });
      }
    }
  }

  private reportProgress(jobId: string, progress: number): void {
    this.update(jobId, { progress }).catch((err) =>
      logger.warn('Orchestrator: progress update failed', { jobId, error: errorMessage(err) }),
    );
  }

  // ── State updates ───────────────────────────────────────────────────────────

  private update(jobId: string, patch: JobPatch): Promise<Job | null> {
    return this.lock.runExclusive(() => this.applyLocked(jobId, patch));
  }

  /**
   * The only place a job changes. Terminal jobs are never touched; an interim
   * stop marker is only replaced by a terminal status. `videoUrl` is kept for
   * completed jobs only and `error` for failed jobs only.
   */
  private async applyLocked(jobId: string, patch: JobPatch): Promise<Job | null> {
    const current = this.jobs.get(jobId);
    if (!current) {
      logger.warn('Orchestrator: update for unknown job ignored', { jobId });
      return null;
    }
    if (isTerminal(current.status)) {
      logger.debug('Orchestrator: update after terminal status ignored', { jobId, status: current.status });
      return copy(current);
    }

    let status = patch.status ?? current.status;
    if (INTERIM.has(current.status) && !isTerminal(status)) status = current.status;

    const next: Job = {
      ...current,
      ...patch,
      id: current.id,
      status,
      progress: Math.min(100, Math.max(0, patch.progress ?? current.progress)),
    };
    next.videoUrl = status === 'completed' ? next.videoUrl : null;
    next.error = status === 'failed' ? next.error : null;

    this.jobs.set(jobId, next);
    await this.persistJob(next);
    return copy(next);
  }

  // ── Lookup helpers (call with lock held) ────────────────────────────────────

  private loadLocal(jobId: string): Job | null {
    const held = this.jobs.get(jobId);
    if (held) return copy(held);
    const stored = this.files.readJob(jobId);
    if (!stored) return null;
    logger.info('Orchestrator: job rehydrated from local record', { jobId, status: stored.status });
    return this.admit(stored);
  }

  /** Put a rehydrated record in memory unless a newer copy is already held. */
  private admit(job: Job): Job {
    const held = this.jobs.get(job.id);
    if (held) return copy(held);
    this.jobs.set(job.id, job);
    return copy(job);
  }

  private async fetchRemote(jobId: string): Promise<Job | null> {
    if (!this.store) return null;
    try {
      const job = await this.store.getJob(jobId);
      if (job) logger.info('Orchestrator: job rehydrated from durable store', { jobId, status: job.status });
      return job;
    } catch (err) {
      logger.warn('Orchestrator: durable store lookup failed', { jobId, error: errorMessage(err) });
      return null;
    }
  }

  // ── Persistence (call with lock held) ───────────────────────────────────────

  private async persistJob(job: Job): Promise<void> {
    this.files.writeJob(job);
    if (!this.store) return;
    try {
      await this.store.putJob(job);
    } catch (err) {
      logger.warn('Orchestrator: remote job mirror failed', { jobId: job.id, error: errorMessage(err) });
    }
  }

  private async persistIndex(): Promise<void> {
    this.files.writeIndex(this.index);
    if (!this.store) return;
    try {
      await this.store.putIndex(this.index);
    } catch (err) {
      logger.warn('Orchestrator: remote index mirror failed', { error: errorMessage(err) });
    }
  }
}
