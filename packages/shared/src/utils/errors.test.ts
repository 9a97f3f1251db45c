import { describe, it, expect } from 'vitest';
import {
  CancelledError,
  FinalizationError,
  GenerationError,
  LlmError,
  RateLimitError,
  TesseraError,
  TimeoutError,
  TransportError,
  toError,
} from './errors.js';

describe('error hierarchy', () => {
  it('should mark rate limits and timeouts as transient', () => {
    expect(new RateLimitError('slow down').isTransient).toBe(true);
    expect(new TimeoutError('too slow', 500).isTransient).toBe(true);
    expect(new TransportError('denied', false).isTransient).toBe(false);
  });

  it('should keep codes and the base class', () => {
    const error = new TimeoutError('too slow', 500);
    expect(error).toBeInstanceOf(LlmError);
    expect(error).toBeInstanceOf(TesseraError);
    expect(error.code).toBe('TIMEOUT_ERROR');
    expect(new CancelledError().code).toBe('CANCELLED');
  });

  it('should derive stage retryability from the wrapped cause', () => {
    expect(new GenerationError('failed', new TimeoutError('too slow', 500)).isRetryable).toBe(true);
    expect(new FinalizationError('failed', new TransportError('denied', false)).isRetryable).toBe(false);
    expect(new FinalizationError('failed', new Error('other')).isRetryable).toBe(false);
    expect(new FinalizationError('failed').isRetryable).toBe(false);
  });
});

describe('toError', () => {
  it('should wrap non-error values', () => {
    const original = new Error('boom');
    expect(toError(original)).toBe(original);
    expect(toError('boom').message).toBe('boom');
  });
});
