import { StateGraph, START, END } from '@langchain/langgraph';
import type { Answer, Passage } from '@tessera/shared/src/types/knowledge.types.js';
import type { PipelineRunResult, RunOptions } from '@tessera/shared/src/types/pipeline.types.js';
import type { PipelineConfig } from '@tessera/schemas/src/pipeline-config.schema.js';
import type { PipelineStage } from '@tessera/shared/src/utils/errors.js';
import { createChildLogger } from '@tessera/shared/src/logger.js';
import type { LlmClient } from '../llm/llm-client.js';
import { createExternalPassages } from '../knowledge/passages.js';
import { createInternalKnowledgeGenerator } from '../knowledge/internal-knowledge-generator.js';
import type { ConsistencyGrouper } from '../consolidation/consistency-grouper.js';
import { createLlmConsistencyGrouper } from '../consolidation/llm-consistency-grouper.js';
import { createLexicalConsistencyGrouper } from '../consolidation/lexical-consistency-grouper.js';
import { createKnowledgeConsolidator } from '../consolidation/knowledge-consolidator.js';
import { createAnswerFinalizer } from '../answer/answer-finalizer.js';
import { PipelineGraphAnnotation, type PipelineGraphState } from './pipeline-state.js';
import { withStageRetry } from './stage-retry.js';

const log = createChildLogger('orchestration:pipeline');

export interface PipelineDependencies {
  readonly llmClient: LlmClient;
  readonly config: PipelineConfig;
  /** Overrides the grouper selected by `config.consolidation.grouper`. */
  readonly grouper?: ConsistencyGrouper;
}

export interface Pipeline {
  answerQuestion(
    question: string,
    retrievedDocs: readonly string[],
    maxGeneratedPassages?: number,
    options?: RunOptions,
  ): Promise<Answer>;
  runDetailed(
    question: string,
    retrievedDocs: readonly string[],
    maxGeneratedPassages?: number,
    options?: RunOptions,
  ): Promise<PipelineRunResult>;
}

export function createGrouper(config: PipelineConfig, llmClient: LlmClient): ConsistencyGrouper {
  if (config.consolidation.grouper === 'lexical') {
    return createLexicalConsistencyGrouper({
      similarityThreshold: config.consolidation.similarityThreshold,
    });
  }
  return createLlmConsistencyGrouper(llmClient);
}

export function createPipeline(deps: PipelineDependencies): Pipeline {
  const { llmClient, config } = deps;
  const grouper = deps.grouper ?? createGrouper(config, llmClient);

  log.info(
    { provider: config.llm.provider, model: config.llm.model, grouper: grouper.name },
    'Initializing answer pipeline',
  );

  const generator = createInternalKnowledgeGenerator(llmClient);
  const consolidator = createKnowledgeConsolidator(grouper);
  const finalizer = createAnswerFinalizer(llmClient, {
    conflictConfidenceCap: config.finalization.conflictConfidenceCap,
  });

  const runStage = <T>(
    stage: PipelineStage,
    signal: AbortSignal | undefined,
    operation: () => Promise<T>,
  ): Promise<T> =>
    withStageRetry(operation, {
      stage,
      retryCount: config.pipeline.retryCount,
      baseDelayMs: config.pipeline.retryBaseDelayMs,
      signal,
    });

  const generateInternalNode = async (
    state: PipelineGraphState,
  ): Promise<Partial<PipelineGraphState>> => {
    const internalPassages = await runStage('internal-knowledge', state.signal, () =>
      generator.generate(state.question, state.maxGeneratedPassages, state.signal),
    );
    return { internalPassages };
  };

  const consolidateNode = async (
    state: PipelineGraphState,
  ): Promise<Partial<PipelineGraphState>> => {
    const pool: Passage[] = [...state.internalPassages, ...state.externalPassages];
    const consolidation = await runStage('consolidation', state.signal, () =>
      consolidator.consolidate(state.question, pool, state.signal),
    );
    return { consolidation };
  };

  const finalizeNode = async (state: PipelineGraphState): Promise<Partial<PipelineGraphState>> => {
    const clusters = state.consolidation?.clusters ?? [];
    const answer = await runStage('finalization', state.signal, () =>
      finalizer.finalize(state.question, clusters, state.signal),
    );
    return { answer };
  };

  const graph = new StateGraph(PipelineGraphAnnotation)
    .addNode('generateInternal', generateInternalNode)
    .addNode('consolidate', consolidateNode)
    .addNode('finalize', finalizeNode)
    .addEdge(START, 'generateInternal')
    .addEdge('generateInternal', 'consolidate')
    .addEdge('consolidate', 'finalize')
    .addEdge('finalize', END)
    .compile();

  async function runDetailed(
    question: string,
    retrievedDocs: readonly string[],
    maxGeneratedPassages: number = config.pipeline.maxGeneratedPassages,
    options: RunOptions = {},
  ): Promise<PipelineRunResult> {
    const startedAt = Date.now();
    log.info(
      { questionLength: question.length, docCount: retrievedDocs.length, maxGeneratedPassages },
      'Running answer pipeline',
    );

    const result = await graph.invoke({
      question,
      retrievedDocs,
      maxGeneratedPassages,
      signal: options.signal,
      externalPassages: createExternalPassages(retrievedDocs),
      internalPassages: [],
      consolidation: undefined,
      answer: undefined,
    });

    const { consolidation, answer } = result;
    if (!consolidation || !answer) {
      throw new Error('Answer pipeline finished without reaching the finalization stage');
    }

    log.info(
      {
        durationMs: Date.now() - startedAt,
        clusterCount: consolidation.clusters.length,
        confidence: answer.confidence,
        conflicting: answer.conflicting,
      },
      'Pipeline complete',
    );

    return {
      input: { question, retrievedDocs, maxGeneratedPassages },
      internalPassages: result.internalPassages,
      externalPassages: result.externalPassages,
      consolidation,
      answer,
    };
  }

  return {
    runDetailed,

    async answerQuestion(
      question: string,
      retrievedDocs: readonly string[],
      maxGeneratedPassages?: number,
      options?: RunOptions,
    ): Promise<Answer> {
      const result = await runDetailed(question, retrievedDocs, maxGeneratedPassages, options);
      return result.answer;
    },
  };
}
