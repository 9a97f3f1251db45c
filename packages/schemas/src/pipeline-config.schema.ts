import { z } from 'zod';

export const llmProviders = ['openai', 'vertex', 'mock'] as const;
export type LlmProvider = (typeof llmProviders)[number];

export const LlmSettingsSchema = z
  .object({
    provider: z.enum(llmProviders),
    model: z.string().min(1),
    apiKey: z.string().min(1).optional(),
    projectId: z.string().min(1).optional(),
    location: z.string().min(1).default('europe-west1'),
    temperature: z.number().min(0).max(2).default(0),
    maxTokens: z.number().int().positive().optional(),
    timeoutMs: z.number().int().positive().optional(),
  })
  .superRefine((data, ctx) => {
    if (data.provider === 'openai' && !data.apiKey) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['apiKey'],
        message: "apiKey required for provider 'openai'",
      });
    }
    if (data.provider === 'vertex' && !data.projectId) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['projectId'],
        message: "projectId required for provider 'vertex'",
      });
    }
  });

const PipelineSettingsSchema = z.object({
  maxGeneratedPassages: z.number().int().min(0).max(20).default(1),
  /** Retries per stage for transient model failures. */
  retryCount: z.number().int().min(0).max(1).default(0),
  retryBaseDelayMs: z.number().int().min(0).default(1000),
});

const ConsolidationSettingsSchema = z.object({
  grouper: z.enum(['llm', 'lexical']).default('llm'),
  similarityThreshold: z.number().min(0).max(1).default(0.3),
});

const FinalizationSettingsSchema = z
  .object({
    highConfidenceThreshold: z.number().min(0).max(1).default(0.5),
    conflictConfidenceCap: z.number().min(0).max(1).default(0.45),
  })
  .refine((data) => data.conflictConfidenceCap < data.highConfidenceThreshold, {
    path: ['conflictConfidenceCap'],
    message: 'conflictConfidenceCap must be below highConfidenceThreshold',
  });

export const PipelineConfigSchema = z.object({
  $schema: z.string().optional(),
  llm: LlmSettingsSchema,
  pipeline: PipelineSettingsSchema.default({}),
  consolidation: ConsolidationSettingsSchema.default({}),
  finalization: FinalizationSettingsSchema.default({}),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type LlmSettings = z.infer<typeof LlmSettingsSchema>;
export type PipelineSettings = z.infer<typeof PipelineSettingsSchema>;
export type ConsolidationSettings = z.infer<typeof ConsolidationSettingsSchema>;
export type FinalizationSettings = z.infer<typeof FinalizationSettingsSchema>;
