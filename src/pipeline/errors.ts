/**
 * Render failure taxonomy.
 *
 * Only CaptionTimingError is recovered locally (empty captions). RenderCancelled
 * is control flow: it carries the stop status the job must end in and is never
 * recorded as a failure.
 */
import type { StopStatus } from '../db/jobs.js';

export class MediaFetchError extends Error {
  constructor(public readonly url: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MediaFetchError';
  }
}

export class MissingAudioError extends Error {
  constructor(public readonly audioPath: string, sceneLabel: string) {
    super(`Audio track missing for scene ${sceneLabel}: ${audioPath}`);
    this.name = 'MissingAudioError';
  }
}

export class CaptionTimingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CaptionTimingError';
  }
}

export class CompositionError extends Error {
  constructor(public readonly step: string, message: string) {
    super(message);
    this.name = 'CompositionError';
  }
}

export class RenderCancelled extends Error {
  constructor(public readonly stopStatus: StopStatus, checkpoint: string) {
    super(`Render ${stopStatus} at ${checkpoint}`);
    this.name = 'RenderCancelled';
  }
}
