import { createChildLogger } from '@tessera/shared/src/logger.js';
import { CancelledError, StageError } from '@tessera/shared/src/utils/errors.js';
import type { PipelineStage } from '@tessera/shared/src/utils/errors.js';

const log = createChildLogger('orchestration:retry');

export interface StageRetryOptions {
  readonly stage: PipelineStage;
  readonly retryCount: number;
  readonly baseDelayMs: number;
  readonly signal?: AbortSignal;
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

export function computeBackoffMs(
  attempt: number,
  baseDelayMs: number,
  random: () => number = Math.random,
): number {
  const exponential = baseDelayMs * Math.pow(2, attempt);
  const jitter = random() * baseDelayMs;
  return exponential + jitter;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError('Operation was cancelled during retry backoff'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs one pipeline stage, retrying it when it fails with a transient
 * model error. Everything else propagates on the first failure.
 */
export async function withStageRetry<T>(
  operation: () => Promise<T>,
  options: StageRetryOptions,
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    throwIfAborted(options.signal);
    try {
      return await operation();
    } catch (error) {
      if (!(error instanceof StageError) || !error.isRetryable || attempt >= options.retryCount) {
        throw error;
      }

      const delayMs = computeBackoffMs(attempt, options.baseDelayMs);
      log.warn(
        {
          stage: options.stage,
          attempt: attempt + 1,
          retryCount: options.retryCount,
          delayMs: Math.round(delayMs),
          error: error.message,
        },
        'Transient stage failure, retrying',
      );
      await sleep(delayMs, options.signal);
    }
  }
}
