import { RenderCancelled } from './errors.js';
import type { StopStatus } from '../db/jobs.js';

/** Read side of a stop request, handed to every render stage. */
export interface CancellationSignal {
  readonly isStopRequested: boolean;
  readonly stopStatus: StopStatus | null;
  throwIfStopped(checkpoint: string): void;
}

/**
 * Cooperative stop signal for one job. Stages poll it at their checkpoints;
 * nothing is interrupted mid-step. A later request replaces the stop status
 * (pause then cancel ends as cancelled).
 */
export class CancellationToken implements CancellationSignal {
  private requested: StopStatus | null = null;

  request(status: StopStatus): void {
    this.requested = status;
  }

  get stopStatus(): StopStatus | null {
    return this.requested;
  }

  get isStopRequested(): boolean {
    return this.requested !== null;
  }

  throwIfStopped(checkpoint: string): void {
    if (this.requested) throw new RenderCancelled(this.requested, checkpoint);
  }
}

/** A signal that never fires, for stages run outside a job. */
export const NEVER_CANCELLED: CancellationSignal = {
  isStopRequested: false,
  stopStatus: null,
  throwIfStopped: () => undefined,
};
