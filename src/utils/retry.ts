/**
 * Exponential-backoff retry for transient network work (media downloads).
 */
import { logger, errorMessage } from './logger.js';

/** Throw this to give up at once, e.g. on an HTTP 4xx. */
export class NonRetryableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NonRetryableError';
  }
}

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs?: number;
  backoffFactor?: number;
  label?: string;
  isRetryable?: (err: unknown) => boolean;
}

export const isTransient = (err: unknown): boolean => !(err instanceof NonRetryableError);

/** Wait before the attempt after `attempt`. */
export function backoffDelay(attempt: number, baseDelayMs = 1_000, backoffFactor = 2): number {
  return baseDelayMs * backoffFactor ** (attempt - 1);
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const { maxAttempts, label = 'operation', isRetryable = isTransient } = opts;
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= maxAttempts || !isRetryable(err)) throw err;
      const delay = backoffDelay(attempt, opts.baseDelayMs, opts.backoffFactor);
      logger.warn(`Retry: ${label} attempt ${attempt}/${maxAttempts} failed — next in ${delay}ms`, {
        error: errorMessage(err),
      });
      await sleep(delay);
    }
  }
}
