import type { ZodError } from 'zod';
import { SchemaValidationError } from '@tessera/shared/src/utils/errors.js';
import { PipelineConfigSchema } from './pipeline-config.schema.js';
import type { PipelineConfig } from './pipeline-config.schema.js';

export function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validatePipelineConfig(data: unknown): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid pipeline configuration', formatZodErrors(result.error));
  }

  return result.data;
}
