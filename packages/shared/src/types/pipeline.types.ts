import type { Answer, ConsolidationResult, Passage } from './knowledge.types.js';

export interface QuestionInput {
  readonly question: string;
  readonly retrievedDocs: readonly string[];
  readonly maxGeneratedPassages: number;
}

export interface RunOptions {
  readonly signal?: AbortSignal;
}

export interface PipelineRunResult {
  readonly input: QuestionInput;
  readonly internalPassages: readonly Passage[];
  readonly externalPassages: readonly Passage[];
  readonly consolidation: ConsolidationResult;
  readonly answer: Answer;
}
