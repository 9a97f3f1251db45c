import { describe, it, expect, vi } from 'vitest';
import { validatePipelineConfig } from '@tessera/schemas/src/validators.js';
import type { PipelineConfig } from '@tessera/schemas/src/pipeline-config.schema.js';
import {
  CancelledError,
  ConsolidationError,
  GenerationError,
  TransportError,
} from '@tessera/shared/src/utils/errors.js';
import type { LlmRequest, LlmResponse } from '../llm/llm-client.js';
import { createMockResponse } from '../llm/mock-llm-client.js';
import { INSUFFICIENT_INFORMATION } from '../answer/answer-finalizer.js';
import { createPipeline } from './pipeline.js';

const CAPITAL_QUESTION = 'What is the capital of France?';
const CORROBORATING_DOCS = [
  'Paris is the capital and largest city of France.',
  "The city of Paris serves as France's capital, located in the north.",
];
const CONFLICTING_DOCS = ['The capital of France is Paris.', 'The capital of France is Lyon.'];

function makeConfig(overrides: Record<string, unknown> = {}): PipelineConfig {
  return validatePipelineConfig({
    llm: { provider: 'mock', model: 'mock-model' },
    pipeline: { retryBaseDelayMs: 0 },
    ...overrides,
  });
}

function createStubLlm() {
  const invoke = vi.fn(
    (request: LlmRequest): Promise<LlmResponse> =>
      Promise.resolve({ content: createMockResponse(request) }),
  );
  return { client: { invoke }, invoke };
}

function promptsOf(invoke: ReturnType<typeof createStubLlm>['invoke']): string[] {
  return invoke.mock.calls.map(([request]) => request.systemPrompt.split('\n')[0]);
}

describe('createPipeline', () => {
  it('should merge corroborating documents and answer with a citation', async () => {
    const { client } = createStubLlm();
    const pipeline = createPipeline({
      llmClient: client,
      config: makeConfig({ consolidation: { grouper: 'lexical' } }),
    });

    const result = await pipeline.runDetailed(CAPITAL_QUESTION, CORROBORATING_DOCS);

    expect(result.internalPassages).toEqual([]);
    expect(result.consolidation.clusters).toHaveLength(1);
    expect(result.consolidation.clusters[0].passages.map((p) => p.id)).toEqual([
      'external-0',
      'external-1',
    ]);
    expect(result.answer.text).toContain('Paris');
    expect(result.answer.confidence).toBeGreaterThanOrEqual(0.5);
    expect(result.answer.citations.map((c) => c.clusterId)).toEqual(['cluster-0']);
  });

  it('should keep contradicting documents apart and surface the conflict', async () => {
    const { client } = createStubLlm();
    const config = makeConfig({ consolidation: { grouper: 'lexical' } });
    const pipeline = createPipeline({ llmClient: client, config });

    const result = await pipeline.runDetailed(CAPITAL_QUESTION, CONFLICTING_DOCS);

    expect(result.consolidation.clusters.map((c) => c.conflictsWith)).toEqual([
      ['cluster-1'],
      ['cluster-0'],
    ]);
    expect(result.answer.conflicting).toBe(true);
    expect(result.answer.confidence).toBeLessThan(config.finalization.highConfidenceThreshold);
    expect(result.answer.text).toBe(
      'The capital of France is Paris. Conflicting evidence: "The capital of France is Lyon." [C2]',
    );
  });

  it('should call the model once per stage, in order', async () => {
    const { client, invoke } = createStubLlm();
    const pipeline = createPipeline({ llmClient: client, config: makeConfig() });

    const answer = await pipeline.answerQuestion(CAPITAL_QUESTION, CORROBORATING_DOCS);

    expect(promptsOf(invoke)).toEqual([
      'You recall internal knowledge that helps answer a question. Do not consult or invent documents.',
      'You consolidate evidence passages for a question into consistency groups.',
      expect.stringMatching(/^You write the final answer/),
    ]);
    expect(answer.text).toBe('Paris is the capital and largest city of France.');
  });

  it('should skip generation when no internal passages are requested', async () => {
    const { client, invoke } = createStubLlm();
    const pipeline = createPipeline({ llmClient: client, config: makeConfig() });

    await pipeline.answerQuestion(CAPITAL_QUESTION, CORROBORATING_DOCS, 0);

    expect(invoke).toHaveBeenCalledTimes(2);
  });

  it('should produce identical results for identical runs', async () => {
    const { client } = createStubLlm();
    const pipeline = createPipeline({ llmClient: client, config: makeConfig() });

    const first = await pipeline.runDetailed(CAPITAL_QUESTION, CONFLICTING_DOCS, 2);
    const second = await pipeline.runDetailed(CAPITAL_QUESTION, CONFLICTING_DOCS, 2);

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  it('should answer with insufficient information when there is no evidence', async () => {
    const { client, invoke } = createStubLlm();
    const pipeline = createPipeline({ llmClient: client, config: makeConfig() });

    const answer = await pipeline.answerQuestion(CAPITAL_QUESTION, []);

    expect(answer).toEqual({
      text: INSUFFICIENT_INFORMATION,
      confidence: 0,
      citations: [],
      conflicting: false,
      notes: [],
    });
    expect(invoke).toHaveBeenCalledTimes(1);
  });

  it('should retry a stage once after a transient failure', async () => {
    const { client, invoke } = createStubLlm();
    invoke.mockRejectedValueOnce(new TransportError('Service Unavailable', true));
    const pipeline = createPipeline({
      llmClient: client,
      config: makeConfig({ pipeline: { retryCount: 1, retryBaseDelayMs: 0 } }),
    });

    const answer = await pipeline.answerQuestion(CAPITAL_QUESTION, CORROBORATING_DOCS, 0);

    expect(answer.citations).toHaveLength(1);
    expect(invoke).toHaveBeenCalledTimes(3);
  });

  it('should not retry when retries are disabled', async () => {
    const { client, invoke } = createStubLlm();
    invoke.mockRejectedValueOnce(new TransportError('Service Unavailable', true));
    const pipeline = createPipeline({ llmClient: client, config: makeConfig() });

    await expect(
      pipeline.answerQuestion(CAPITAL_QUESTION, CORROBORATING_DOCS, 0),
    ).rejects.toBeInstanceOf(ConsolidationError);
    expect(invoke).toHaveBeenCalledTimes(1);
  });

  it('should not retry a permanent failure', async () => {
    const cause = new TransportError('Invalid credentials', false);
    const { client, invoke } = createStubLlm();
    invoke.mockRejectedValueOnce(cause);
    const pipeline = createPipeline({
      llmClient: client,
      config: makeConfig({ pipeline: { retryCount: 1, retryBaseDelayMs: 0 } }),
    });

    const failure = await pipeline
      .answerQuestion(CAPITAL_QUESTION, CORROBORATING_DOCS)
      .catch((e: unknown) => e);

    expect(failure).toBeInstanceOf(GenerationError);
    expect(failure).toMatchObject({ stage: 'internal-knowledge', cause });
    expect(invoke).toHaveBeenCalledTimes(1);
  });

  it('should reject an already cancelled run without calling the model', async () => {
    const { client, invoke } = createStubLlm();
    const pipeline = createPipeline({ llmClient: client, config: makeConfig() });

    await expect(
      pipeline.answerQuestion(CAPITAL_QUESTION, CORROBORATING_DOCS, 1, {
        signal: AbortSignal.abort(),
      }),
    ).rejects.toBeInstanceOf(CancelledError);
    expect(invoke).not.toHaveBeenCalled();
  });

  it('should stop before the next stage once cancelled', async () => {
    const controller = new AbortController();
    const { client, invoke } = createStubLlm();
    invoke.mockImplementationOnce((request: LlmRequest) => {
      controller.abort();
      return Promise.resolve({ content: createMockResponse(request) });
    });
    const pipeline = createPipeline({ llmClient: client, config: makeConfig() });

    await expect(
      pipeline.answerQuestion(CAPITAL_QUESTION, CORROBORATING_DOCS, 1, {
        signal: controller.signal,
      }),
    ).rejects.toBeInstanceOf(CancelledError);
    expect(invoke).toHaveBeenCalledTimes(1);
  });

  it('should reject a negative passage budget', async () => {
    const { client } = createStubLlm();
    const pipeline = createPipeline({ llmClient: client, config: makeConfig() });

    await expect(
      pipeline.answerQuestion(CAPITAL_QUESTION, CORROBORATING_DOCS, -1),
    ).rejects.toBeInstanceOf(RangeError);
  });
});
