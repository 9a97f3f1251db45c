import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type {
  Answer,
  Citation,
  KnowledgeCluster,
} from '@tessera/shared/src/types/knowledge.types.js';
import type { FinalizationSettings } from '@tessera/schemas/src/pipeline-config.schema.js';
import { createChildLogger } from '@tessera/shared/src/logger.js';
import { CancelledError, FinalizationError, toError } from '@tessera/shared/src/utils/errors.js';
import type { LlmClient, LlmResponse } from '../llm/llm-client.js';
import { parseModelOutput } from '../llm/parse-model-output.js';
import { parseReference } from '../consolidation/consistency-grouper.js';
import { readConfidence } from './confidence.js';
import { rankClusters } from './rank-clusters.js';

const log = createChildLogger('stage:finalizer');

export const INSUFFICIENT_INFORMATION = 'Insufficient information to answer the question.';

const DEFAULT_CONFLICT_CONFIDENCE_CAP = 0.45;

export const AnswerResultSchema = z.object({
  answer: z.string(),
  confidence: z.number().min(0).max(1),
  citations: z.array(z.string()),
  conflictAcknowledged: z.boolean(),
});

export const AnswerResultJsonSchema = zodToJsonSchema(AnswerResultSchema, {
  name: 'AnswerResult',
  $refStrategy: 'none',
});

// What is actually accepted back: confidence and citations are repaired afterwards.
const AnswerResponseSchema = z.object({
  answer: z.string(),
  confidence: z.unknown(),
  citations: z.array(z.union([z.number(), z.string()])).catch([]),
  conflictAcknowledged: z.boolean().catch(false),
});

const SYSTEM_PROMPT = `You write the final answer to a question using clusters of evidence. Each cluster [C<n>] states a consensus claim and how many passages support it, split into internal passages (recalled by a model) and external passages (retrieved documents). The passages behind each cluster are listed under it; use their details, such as dates and qualifiers, that the consensus leaves out.

1. Select or synthesise the best-supported answer. Never blend contradicting claims into a claim no cluster supports.
2. Score confidence between 0 and 1 by corroboration strength. More supporting passages and support from both internal and external passages raise confidence; unresolved contradictions lower it.
3. Cite the clusters your answer relies on as "C1", "C2", and so on.
4. When clusters contradict each other, either present the conflict in the answer or prefer the cluster supported by both kinds of passage. Set conflictAcknowledged to true when the answer presents the conflict.

Respond with a JSON object:
{"answer": "...", "confidence": 0.7, "citations": ["C1"], "conflictAcknowledged": false}`;

export interface AnswerFinalizer {
  finalize(
    question: string,
    clusters: readonly KnowledgeCluster[],
    signal?: AbortSignal,
  ): Promise<Answer>;
}

export type AnswerFinalizerOptions = Partial<Pick<FinalizationSettings, 'conflictConfidenceCap'>>;

function label(position: number): string {
  return `C${String(position + 1)}`;
}

export function formatClusters(clusters: readonly KnowledgeCluster[]): string {
  const labels = new Map(clusters.map((cluster, index) => [cluster.id, label(index)]));

  return clusters
    .map((cluster, index) => {
      const { internal, external } = cluster.provenance;
      const lines = [
        `[${label(index)}] ${cluster.consensus}`,
        `    support: ${String(cluster.passages.length)} passages (${String(internal)} internal, ${String(external)} external)`,
      ];
      if (cluster.conflictsWith.length > 0) {
        const rivals = cluster.conflictsWith.map((id) => labels.get(id) ?? id);
        lines.push(`    contradicts: ${rivals.join(', ')}`);
      }
      for (const passage of cluster.passages) {
        lines.push(`    - ${passage.id} (${passage.provenance}): ${passage.text}`);
      }
      return lines.join('\n');
    })
    .join('\n');
}

function resolveCitation(
  reference: number | string,
  clusters: readonly KnowledgeCluster[],
): KnowledgeCluster | undefined {
  if (typeof reference === 'string') {
    const trimmed = reference.trim();
    const byId = clusters.find((cluster) => cluster.id === trimmed);
    if (byId || trimmed.startsWith('cluster-')) {
      return byId;
    }
  }
  const position = parseReference(reference);
  return position === undefined ? undefined : clusters[position];
}

export function resolveCitations(
  references: readonly (number | string)[],
  clusters: readonly KnowledgeCluster[],
): { readonly citations: Citation[]; readonly unknown: string[] } {
  const citations: Citation[] = [];
  const unknown: string[] = [];
  const seen = new Set<string>();

  for (const reference of references) {
    const cluster = resolveCitation(reference, clusters);
    if (!cluster) {
      unknown.push(String(reference));
      continue;
    }
    if (seen.has(cluster.id)) continue;
    seen.add(cluster.id);
    citations.push({
      clusterId: cluster.id,
      consensus: cluster.consensus,
      passageIds: cluster.passages.map((p) => p.id),
    });
  }

  return { citations, unknown };
}

interface ModelAnswer {
  readonly answer: string;
  readonly confidence?: unknown;
  readonly citations: readonly (number | string)[];
  readonly conflictAcknowledged: boolean;
  readonly fromRawText: boolean;
}

function readModelAnswer(content: string, notes: string[]): ModelAnswer {
  const parsed = parseModelOutput(content, AnswerResponseSchema);
  if (parsed.success) {
    return { ...parsed.data, fromRawText: false };
  }

  notes.push(`Model output was not a valid answer object (${parsed.errors.join('; ')}); using its raw text`);
  return {
    answer: content,
    confidence: 0,
    citations: [],
    conflictAcknowledged: false,
    fromRawText: true,
  };
}

/**
 * Applies the deterministic answer policy to a model response: confidence
 * repair, citation resolution and the conflict cap.
 */
export function buildAnswer(
  content: string,
  clusters: readonly KnowledgeCluster[],
  conflictConfidenceCap: number = DEFAULT_CONFLICT_CONFIDENCE_CAP,
): Answer {
  const notes: string[] = [];
  const model = readModelAnswer(content, notes);
  const conflicting = clusters.some((cluster) => cluster.conflictsWith.length > 0);

  let text = model.answer.trim();
  if (text.length === 0) {
    notes.push('Model returned a blank answer');
    return { text: INSUFFICIENT_INFORMATION, confidence: 0, citations: [], conflicting, notes };
  }

  let confidence = 0;
  if (!model.fromRawText) {
    const reading = readConfidence(model.confidence);
    confidence = reading.value;
    if (reading.note) notes.push(reading.note);
  }

  const { citations, unknown } = resolveCitations(model.citations, clusters);
  if (unknown.length > 0) {
    notes.push(`Dropped unknown citations: ${unknown.join(', ')}`);
  }

  if (conflicting) {
    if (confidence > conflictConfidenceCap) {
      notes.push(
        `Confidence lowered from ${String(confidence)} to ${String(conflictConfidenceCap)} because evidence conflicts`,
      );
      confidence = conflictConfidenceCap;
    }

    if (!model.conflictAcknowledged) {
      const cited = new Set(citations.map((c) => c.clusterId));
      const positions = new Map(clusters.map((cluster, index) => [cluster.id, index]));
      const rivals = rankClusters(clusters).filter(
        (cluster) => cluster.conflictsWith.length > 0 && !cited.has(cluster.id),
      );
      if (rivals.length > 0) {
        const evidence = rivals
          .map((cluster) => `"${cluster.consensus}" [${label(positions.get(cluster.id) ?? 0)}]`)
          .join('; ');
        text = `${text} Conflicting evidence: ${evidence}`;
      }
    }
  }

  return { text, confidence, citations, conflicting, notes };
}

export function createAnswerFinalizer(
  llmClient: LlmClient,
  options: AnswerFinalizerOptions = {},
): AnswerFinalizer {
  const conflictConfidenceCap = options.conflictConfidenceCap ?? DEFAULT_CONFLICT_CONFIDENCE_CAP;

  return {
    async finalize(
      question: string,
      clusters: readonly KnowledgeCluster[],
      signal?: AbortSignal,
    ): Promise<Answer> {
      if (clusters.length === 0) {
        log.info('No evidence clusters, answering with insufficient information');
        return {
          text: INSUFFICIENT_INFORMATION,
          confidence: 0,
          citations: [],
          conflicting: false,
          notes: [],
        };
      }

      log.info({ clusterCount: clusters.length }, 'Finalizing answer');

      let response: LlmResponse;
      try {
        response = await llmClient.invoke({
          systemPrompt: SYSTEM_PROMPT,
          userMessage: `Question: ${question}\n\nEvidence clusters:\n${formatClusters(clusters)}`,
          jsonSchema: AnswerResultJsonSchema,
          options: { signal },
        });
      } catch (error) {
        if (error instanceof CancelledError) {
          throw error;
        }
        const cause = toError(error);
        throw new FinalizationError(`Answer finalization failed: ${cause.message}`, cause);
      }

      const answer = buildAnswer(response.content, clusters, conflictConfidenceCap);

      log.info(
        {
          confidence: answer.confidence,
          citationCount: answer.citations.length,
          conflicting: answer.conflicting,
          noteCount: answer.notes.length,
        },
        'Answer finalized',
      );

      return answer;
    },
  };
}
