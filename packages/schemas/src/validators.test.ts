import { describe, it, expect } from 'vitest';
import { validatePipelineConfig } from './validators.js';
import { SchemaValidationError } from '@tessera/shared/src/utils/errors.js';

describe('validatePipelineConfig', () => {
  const minimal = {
    llm: { provider: 'mock', model: 'mock-model' },
  };

  it('should fill in defaults for a minimal configuration', () => {
    const config = validatePipelineConfig(minimal);

    expect(config.llm.location).toBe('europe-west1');
    expect(config.llm.temperature).toBe(0);
    expect(config.pipeline).toEqual({
      maxGeneratedPassages: 1,
      retryCount: 0,
      retryBaseDelayMs: 1000,
    });
    expect(config.consolidation).toEqual({ grouper: 'llm', similarityThreshold: 0.3 });
    expect(config.finalization).toEqual({
      highConfidenceThreshold: 0.5,
      conflictConfidenceCap: 0.45,
    });
  });

  it('should require an apiKey for the openai provider', () => {
    try {
      validatePipelineConfig({ llm: { provider: 'openai', model: 'gpt-4o-mini' } });
      expect.unreachable('expected validation to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaValidationError);
      if (error instanceof SchemaValidationError) {
        expect(error.validationErrors).toEqual(["llm.apiKey: apiKey required for provider 'openai'"]);
      }
    }
  });

  it('should require a projectId for the vertex provider', () => {
    expect(() =>
      validatePipelineConfig({ llm: { provider: 'vertex', model: 'gemini-2.0-flash' } }),
    ).toThrow(SchemaValidationError);
  });

  it('should accept a vertex configuration with a project', () => {
    const config = validatePipelineConfig({
      llm: { provider: 'vertex', model: 'gemini-2.0-flash', projectId: 'test-project' },
    });
    expect(config.llm.projectId).toBe('test-project');
  });

  it('should reject an unknown provider', () => {
    expect(() => validatePipelineConfig({ llm: { provider: 'other', model: 'x' } })).toThrow(
      SchemaValidationError,
    );
  });

  it('should reject a retry count above one', () => {
    expect(() => validatePipelineConfig({ ...minimal, pipeline: { retryCount: 2 } })).toThrow(
      SchemaValidationError,
    );
  });

  it('should reject more than twenty generated passages', () => {
    expect(() =>
      validatePipelineConfig({ ...minimal, pipeline: { maxGeneratedPassages: 21 } }),
    ).toThrow(SchemaValidationError);
  });

  it('should reject a conflict cap that is not below the confidence threshold', () => {
    try {
      validatePipelineConfig({
        ...minimal,
        finalization: { highConfidenceThreshold: 0.5, conflictConfidenceCap: 0.5 },
      });
      expect.unreachable('expected validation to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaValidationError);
      if (error instanceof SchemaValidationError) {
        expect(error.validationErrors).toEqual([
          'finalization.conflictConfidenceCap: conflictConfidenceCap must be below highConfidenceThreshold',
        ]);
      }
    }
  });

  it('should accept the lexical grouper', () => {
    const config = validatePipelineConfig({
      ...minimal,
      consolidation: { grouper: 'lexical', similarityThreshold: 0.5 },
    });
    expect(config.consolidation.grouper).toBe('lexical');
    expect(config.consolidation.similarityThreshold).toBe(0.5);
  });
});
