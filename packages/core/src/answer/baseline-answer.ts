import { createChildLogger } from '@tessera/shared/src/logger.js';
import type { LlmClient } from '../llm/llm-client.js';

const log = createChildLogger('answer:baseline');

const SYSTEM_PROMPT = 'Answer the question concisely from what you know. Do not explain your reasoning.';

/** Plain single-call answer with no evidence, used to compare against the pipeline. */
export interface BaselineAnswerer {
  answer(question: string, signal?: AbortSignal): Promise<string>;
}

export function createBaselineAnswerer(llmClient: LlmClient): BaselineAnswerer {
  return {
    async answer(question: string, signal?: AbortSignal): Promise<string> {
      const response = await llmClient.invoke({
        systemPrompt: SYSTEM_PROMPT,
        userMessage: `Question: ${question}`,
        options: { signal },
      });
      log.debug({ responseLength: response.content.length }, 'Baseline answer received');
      return response.content.trim();
    },
  };
}
