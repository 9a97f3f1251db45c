import { Annotation } from '@langchain/langgraph';
import type {
  Answer,
  ConsolidationResult,
  Passage,
} from '@tessera/shared/src/types/knowledge.types.js';

export const PipelineGraphAnnotation = Annotation.Root({
  question: Annotation<string>,
  retrievedDocs: Annotation<readonly string[]>,
  maxGeneratedPassages: Annotation<number>,
  signal: Annotation<AbortSignal | undefined>,
  externalPassages: Annotation<readonly Passage[]>,
  internalPassages: Annotation<readonly Passage[]>,
  consolidation: Annotation<ConsolidationResult | undefined>,
  answer: Annotation<Answer | undefined>,
});

export type PipelineGraphState = typeof PipelineGraphAnnotation.State;
