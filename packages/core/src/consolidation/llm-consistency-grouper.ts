import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { Passage } from '@tessera/shared/src/types/knowledge.types.js';
import { createChildLogger } from '@tessera/shared/src/logger.js';
import { CancelledError, ConsolidationError, toError } from '@tessera/shared/src/utils/errors.js';
import type { LlmClient, LlmResponse } from '../llm/llm-client.js';
import { parseModelOutput } from '../llm/parse-model-output.js';
import { parseReference } from './consistency-grouper.js';
import type { ConsistencyGrouper, GroupingOutcome, ProposedGroup } from './consistency-grouper.js';

const log = createChildLogger('consolidation:llm-grouper');

const ReferenceSchema = z.union([z.number(), z.string()]);

export const GroupItemSchema = z.object({
  passages: z.array(ReferenceSchema).min(1),
  consensus: z.string().default(''),
  conflictsWith: z.array(ReferenceSchema).default([]),
});

export const GroupingResultSchema = z.object({
  groups: z.array(GroupItemSchema),
});

export const GroupingResultJsonSchema = zodToJsonSchema(GroupingResultSchema, {
  name: 'GroupingResult',
  $refStrategy: 'none',
});

// Items are validated one by one so a single malformed group does not sink the rest.
const GroupingEnvelopeSchema = z.object({
  groups: z.array(z.unknown()),
});

const SYSTEM_PROMPT = `You consolidate evidence passages for a question into consistency groups.

Each passage is labelled [P<n>] and marked INTERNAL (recalled by a model) or EXTERNAL (a retrieved document).

1. Group passages that are mutually consistent and relevant to the question.
2. Write one consensus statement per group that every member supports.
3. Put a passage that cannot be reconciled with any other passage in a group of its own.
4. For each group, list the groups whose claims directly contradict it.

Groups are numbered G1, G2, ... in the order you list them. Never merge contradicting passages into one group.

Respond with a JSON object:
{"groups": [{"passages": [1, 2], "consensus": "...", "conflictsWith": [2]}, {"passages": [3], "consensus": "...", "conflictsWith": [1]}]}`;

function formatPassage(passage: Passage, index: number): string {
  return `[P${String(index + 1)}] (${passage.provenance.toUpperCase()}) ${passage.text}`;
}

function toReferences(references: readonly (number | string)[]): number[] {
  return references
    .map(parseReference)
    .filter((index): index is number => index !== undefined);
}

export function readGroupingResponse(content: string): GroupingOutcome {
  const envelope = parseModelOutput(content, GroupingEnvelopeSchema);
  if (!envelope.success) {
    return { status: 'unparsable', reason: envelope.errors.join('; ') };
  }

  // Keep the model's group numbering so conflict references can be remapped.
  const kept: { readonly position: number; readonly item: z.infer<typeof GroupItemSchema> }[] = [];
  envelope.data.groups.forEach((raw, position) => {
    const item = GroupItemSchema.safeParse(raw);
    if (item.success && toReferences(item.data.passages).length > 0) {
      kept.push({ position, item: item.data });
    }
  });

  if (kept.length === 0) {
    return { status: 'unparsable', reason: 'No usable group in model output' };
  }

  const newIndex = new Map(kept.map((entry, index) => [entry.position, index]));
  const groups: ProposedGroup[] = kept.map(({ item }) => ({
    passageIndices: toReferences(item.passages),
    consensus: item.consensus.trim(),
    conflictsWith: toReferences(item.conflictsWith)
      .map((position) => newIndex.get(position))
      .filter((index): index is number => index !== undefined),
  }));

  const dropped = envelope.data.groups.length - kept.length;
  if (dropped > 0) {
    log.warn({ dropped, kept: kept.length }, 'Dropped malformed group items');
  }

  return { status: 'grouped', groups };
}

export function createLlmConsistencyGrouper(llmClient: LlmClient): ConsistencyGrouper {
  return {
    name: 'llm',

    async group(
      question: string,
      passages: readonly Passage[],
      signal?: AbortSignal,
    ): Promise<GroupingOutcome> {
      const userMessage = `Question: ${question}\n\nPassages:\n${passages.map(formatPassage).join('\n')}`;

      let response: LlmResponse;
      try {
        response = await llmClient.invoke({
          systemPrompt: SYSTEM_PROMPT,
          userMessage,
          jsonSchema: GroupingResultJsonSchema,
          options: { signal },
        });
      } catch (error) {
        if (error instanceof CancelledError) {
          throw error;
        }
        const cause = toError(error);
        throw new ConsolidationError(`Passage grouping failed: ${cause.message}`, cause);
      }

      return readGroupingResponse(response.content);
    },
  };
}
