import { describe, it, expect, vi } from 'vitest';
import {
  CancelledError,
  ConsolidationError,
  RateLimitError,
  TransportError,
} from '@tessera/shared/src/utils/errors.js';
import { computeBackoffMs, sleep, withStageRetry } from './stage-retry.js';

const options = { stage: 'consolidation', retryCount: 1, baseDelayMs: 0 } as const;

describe('computeBackoffMs', () => {
  it('should double the base delay per attempt and add jitter', () => {
    expect(computeBackoffMs(0, 1000, () => 0)).toBe(1000);
    expect(computeBackoffMs(1, 1000, () => 0)).toBe(2000);
    expect(computeBackoffMs(1, 1000, () => 0.5)).toBe(2500);
  });
});

describe('sleep', () => {
  it('should reject with CancelledError when aborted while waiting', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });
});

describe('withStageRetry', () => {
  it('should return the first successful result', async () => {
    const operation = vi.fn().mockResolvedValue('done');
    await expect(withStageRetry(operation, options)).resolves.toBe('done');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should retry a transient stage failure up to the retry count', async () => {
    const transient = new ConsolidationError('failed', new RateLimitError('slow down'));
    const operation = vi.fn().mockRejectedValueOnce(transient).mockResolvedValue('done');

    await expect(withStageRetry(operation, options)).resolves.toBe('done');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('should give up after the retry count is spent', async () => {
    const transient = new ConsolidationError('failed', new TransportError('503', true));
    const operation = vi.fn().mockRejectedValue(transient);

    await expect(withStageRetry(operation, options)).rejects.toBe(transient);
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('should not retry permanent or foreign failures', async () => {
    const permanent = new ConsolidationError('failed', new TransportError('401', false));
    const foreign = new RangeError('bad input');

    const first = vi.fn().mockRejectedValue(permanent);
    const second = vi.fn().mockRejectedValue(foreign);

    await expect(withStageRetry(first, options)).rejects.toBe(permanent);
    await expect(withStageRetry(second, options)).rejects.toBe(foreign);
    expect(first).toHaveBeenCalledTimes(1);
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('should not start when the signal is already aborted', async () => {
    const operation = vi.fn().mockResolvedValue('done');

    await expect(
      withStageRetry(operation, { ...options, signal: AbortSignal.abort() }),
    ).rejects.toBeInstanceOf(CancelledError);
    expect(operation).not.toHaveBeenCalled();
  });
});
