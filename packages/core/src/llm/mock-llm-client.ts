import { createChildLogger } from '@tessera/shared/src/logger.js';
import { CancelledError } from '@tessera/shared/src/utils/errors.js';
import type { LlmClient, LlmRequest, LlmResponse } from './llm-client.js';

const log = createChildLogger('llm:mock');

const PASSAGE_LINE = /^\[P(\d+)\]\s*(?:\((?:INTERNAL|EXTERNAL)\)\s*)?(.*)$/gm;
const FIRST_CLUSTER_LINE = /^\[C1\]\s*(.*)$/m;

function createGroupingResponse(userMessage: string): string {
  const groups = [...userMessage.matchAll(PASSAGE_LINE)].map((match) => ({
    passages: [Number(match[1])],
    consensus: match[2].trim(),
    conflictsWith: [],
  }));
  return JSON.stringify({ groups });
}

function createAnswerResponse(userMessage: string): string {
  const first = FIRST_CLUSTER_LINE.exec(userMessage);
  return JSON.stringify({
    answer: first ? first[1].trim() : '',
    confidence: 0.5,
    citations: first ? ['C1'] : [],
    conflictAcknowledged: false,
  });
}

export function createMockResponse(request: LlmRequest): string {
  const prompt = request.systemPrompt.toLowerCase();

  if (prompt.includes('internal knowledge')) {
    return 'UNKNOWN';
  }
  if (prompt.includes('consolidat')) {
    return createGroupingResponse(request.userMessage);
  }
  if (prompt.includes('final answer')) {
    return createAnswerResponse(request.userMessage);
  }

  return JSON.stringify({ result: 'Mock LLM response' });
}

/**
 * Offline client with canned answers keyed on the stage prompt. Output depends
 * only on the request, so repeated runs are identical.
 */
export function createMockClient(): LlmClient {
  log.info('Using mock LLM client');

  return {
    invoke(request: LlmRequest): Promise<LlmResponse> {
      if (request.options?.signal?.aborted) {
        return Promise.reject(new CancelledError('Mock LLM invocation was cancelled'));
      }

      log.debug({ systemPromptLength: request.systemPrompt.length }, 'Mock LLM invocation');

      return Promise.resolve({
        content: createMockResponse(request),
        tokenUsage: { input: 100, output: 50 },
      });
    },
  };
}
