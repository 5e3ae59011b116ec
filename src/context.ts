/**
 * Process-level wiring, built once at startup and handed to every entry point.
 *
 * Owns one RenderOrchestrator per output directory: the first caller for a
 * directory opens it, later callers share the same instance.
 */
import * as path from 'path';
import { env, type Env } from './config.js';
import { createDurableStore, type DurableStore } from './db/store.js';
import { MediaAcquirer } from './media/acquire.js';
import { createOpenAiNarrator } from './ai/voice.js';
import { transcribeWordTimings } from './ai/transcribe.js';
import { defaultStages, type RenderStages } from './pipeline/index.js';
import { RenderOrchestrator } from './pipeline/orchestrator.js';
import { alertOperator, escapeHtml } from './monitoring/telegram.js';

export interface RenderContextOptions {
  config?: Env;
  store?: DurableStore | null;
  /** Replaces the production stages for an output directory (used by tests). */
  stagesFor?: (outputDir: string) => RenderStages;
}

export class RenderContext {
  readonly config: Env;
  private readonly store: DurableStore | null;
  private readonly orchestrators = new Map<string, Promise<RenderOrchestrator>>();

  constructor(private readonly options: RenderContextOptions = {}) {
    this.config = options.config ?? env;
    this.store = options.store !== undefined ? options.store : createDurableStore();
  }

  /** The orchestrator for `outputDir` (default: OUTPUT_DIR). */
  orchestrator(outputDir: string = this.config.OUTPUT_DIR): Promise<RenderOrchestrator> {
    const key = path.resolve(outputDir);
    let pending = this.orchestrators.get(key);
    if (!pending) {
      pending = RenderOrchestrator.open({
        outputDir:       key,
        stages:          this.options.stagesFor?.(key) ?? this.productionStages(key),
        sceneWorkers:    this.config.SCENE_WORKERS,
        publicVideoBase: this.config.PUBLIC_VIDEO_BASE,
        store:           this.store,
        onFailure:       (job) => alertOperator('failure', `Render job <code>${job.id}</code> failed: ${escapeHtml(job.error ?? 'unknown error')}`),
      });
      this.orchestrators.set(key, pending);
      // a failed open is not cached
      void pending.catch(() => this.orchestrators.delete(key));
    }
    return pending;
  }

  private productionStages(outputDir: string): RenderStages {
    const cacheDir = path.join(outputDir, 'cache');
    const acquirer = new MediaAcquirer({ cacheDir: path.join(cacheDir, 'media') });
    const store = this.store;
    return defaultStages({
      synthesize:     createOpenAiNarrator(path.join(cacheDir, 'tts')),
      transcribe:     transcribeWordTimings,
      acquireMedia:   (url) => acquirer.acquire(url),
      uploadArtifact: (filePath, projectKey) =>
        store ? store.uploadArtifact(filePath, projectKey) : Promise.resolve(null),
    });
  }
}
