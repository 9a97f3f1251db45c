import type { z } from 'zod';
import { tryExtractJson } from './json-extraction.js';

export type ParsedOutput<T> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly errors: readonly string[] };

/**
 * Extracts JSON from raw model output and validates it against `schema`.
 * Never throws; every stage gets exactly one model call, so there is no
 * correction round here.
 */
export function parseModelOutput<T extends z.ZodTypeAny>(
  content: string,
  schema: T,
): ParsedOutput<z.infer<T>> {
  const extracted = tryExtractJson(content);
  if (!extracted.found) {
    return { success: false, errors: ['No JSON value found in model output'] };
  }

  const result = schema.safeParse(extracted.value);
  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((e: z.ZodIssue) => `${e.path.join('.')}: ${e.message}`),
  };
}
