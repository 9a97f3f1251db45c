export class TesseraError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'TesseraError';
  }
}

/**
 * Failure reported by a language-model provider. `isTransient` marks failures
 * a caller may retry after backing off.
 */
export class LlmError extends TesseraError {
  constructor(
    message: string,
    public readonly isTransient: boolean,
    cause?: Error,
    code = 'LLM_ERROR',
  ) {
    super(message, code, cause);
    this.name = 'LlmError';
  }
}

export class TransportError extends LlmError {
  constructor(message: string, isTransient: boolean, cause?: Error) {
    super(message, isTransient, cause, 'TRANSPORT_ERROR');
    this.name = 'TransportError';
  }
}

export class RateLimitError extends LlmError {
  constructor(message: string, cause?: Error) {
    super(message, true, cause, 'RATE_LIMIT_ERROR');
    this.name = 'RateLimitError';
  }
}

export class TimeoutError extends LlmError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
    cause?: Error,
  ) {
    super(message, true, cause, 'TIMEOUT_ERROR');
    this.name = 'TimeoutError';
  }
}

export type PipelineStage = 'internal-knowledge' | 'consolidation' | 'finalization';

export class StageError extends TesseraError {
  constructor(
    message: string,
    public readonly stage: PipelineStage,
    code: string,
    cause?: Error,
  ) {
    super(message, code, cause);
    this.name = 'StageError';
  }

  get isRetryable(): boolean {
    return this.cause instanceof LlmError && this.cause.isTransient;
  }
}

export class GenerationError extends StageError {
  constructor(message: string, cause?: Error) {
    super(message, 'internal-knowledge', 'GENERATION_ERROR', cause);
    this.name = 'GenerationError';
  }
}

export class ConsolidationError extends StageError {
  constructor(message: string, cause?: Error) {
    super(message, 'consolidation', 'CONSOLIDATION_ERROR', cause);
    this.name = 'ConsolidationError';
  }
}

export class FinalizationError extends StageError {
  constructor(message: string, cause?: Error) {
    super(message, 'finalization', 'FINALIZATION_ERROR', cause);
    this.name = 'FinalizationError';
  }
}

export class CancelledError extends TesseraError {
  constructor(message = 'Operation was cancelled', cause?: Error) {
    super(message, 'CANCELLED', cause);
    this.name = 'CancelledError';
  }
}

export class SchemaValidationError extends TesseraError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends TesseraError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
