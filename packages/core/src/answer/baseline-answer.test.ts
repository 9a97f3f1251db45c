import { describe, it, expect, vi } from 'vitest';
import type { LlmClient } from '../llm/llm-client.js';
import { RateLimitError } from '@tessera/shared/src/utils/errors.js';
import { createBaselineAnswerer } from './baseline-answer.js';

describe('createBaselineAnswerer', () => {
  it('should answer with the trimmed model text in one call', async () => {
    const llm: LlmClient = { invoke: vi.fn().mockResolvedValue({ content: '  Paris.\n' }) };

    const answer = await createBaselineAnswerer(llm).answer('What is the capital of France?');

    expect(answer).toBe('Paris.');
    expect(llm.invoke).toHaveBeenCalledTimes(1);
    expect(llm.invoke).toHaveBeenCalledWith(
      expect.objectContaining({ userMessage: 'Question: What is the capital of France?' }),
    );
  });

  it('should pass the abort signal to the model', async () => {
    const llm: LlmClient = { invoke: vi.fn().mockResolvedValue({ content: 'Paris.' }) };
    const controller = new AbortController();

    await createBaselineAnswerer(llm).answer('q', controller.signal);

    expect(llm.invoke).toHaveBeenCalledWith(
      expect.objectContaining({ options: { signal: controller.signal } }),
    );
  });

  it('should propagate model failures', async () => {
    const failure = new RateLimitError('Rate limited');
    const llm: LlmClient = { invoke: vi.fn().mockRejectedValue(failure) };

    await expect(createBaselineAnswerer(llm).answer('q')).rejects.toBe(failure);
  });
});
