import type { Passage } from '@tessera/shared/src/types/knowledge.types.js';
import { createChildLogger } from '@tessera/shared/src/logger.js';
import { CancelledError, GenerationError, toError } from '@tessera/shared/src/utils/errors.js';
import type { LlmClient, LlmResponse } from '../llm/llm-client.js';
import { createInternalPassages } from './passages.js';

const log = createChildLogger('stage:internal-knowledge');

export const UNKNOWN_MARKER = 'UNKNOWN';

const LIST_MARKER = /^(?:\d+[.)]|[-*•])\s+/;
const UNKNOWN_SENTINEL = /^(?:unknown|i don['’]t know|i do not know)\.?$/i;
const QUOTED = /^["“'‘](.*)["”'’]$/;

export interface InternalKnowledgeGenerator {
  generate(question: string, maxPassages: number, signal?: AbortSignal): Promise<readonly Passage[]>;
}

/**
 * Reads one statement line. The unknown sentinel parses to `undefined` so the
 * marker text never reaches later stages.
 */
export function parseStatement(line: string): string | undefined {
  let text = line.trim().replace(LIST_MARKER, '').trim();
  const quoted = QUOTED.exec(text);
  if (quoted) {
    text = quoted[1].trim();
  }
  if (text.length === 0 || UNKNOWN_SENTINEL.test(text)) {
    return undefined;
  }
  return text;
}

export function parseStatements(content: string): string[] {
  const lines = content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  // Once the model numbers its statements, unnumbered lines are commentary.
  const marked = lines.filter((line) => LIST_MARKER.test(line));
  const candidates = marked.length > 0 ? marked : lines;

  return candidates
    .map(parseStatement)
    .filter((statement): statement is string => statement !== undefined);
}

function buildSystemPrompt(maxPassages: number): string {
  return `You recall internal knowledge that helps answer a question. Do not consult or invent documents.

Write at most ${String(maxPassages)} short, self-contained statements. Each statement must be verifiable on its own, without the question or the other statements.

Format:
- One statement per line, numbered "1.", "2.", and so on.
- If you cannot support a statement with confidence, write ${UNKNOWN_MARKER} on that line instead.
- If you know nothing relevant, reply with the single word ${UNKNOWN_MARKER}.
- Do not add explanations, headings or sources.`;
}

export function createInternalKnowledgeGenerator(llmClient: LlmClient): InternalKnowledgeGenerator {
  return {
    async generate(
      question: string,
      maxPassages: number,
      signal?: AbortSignal,
    ): Promise<readonly Passage[]> {
      if (!Number.isInteger(maxPassages) || maxPassages < 0) {
        throw new RangeError(
          `maxPassages must be a non-negative integer, got ${String(maxPassages)}`,
        );
      }
      if (maxPassages === 0) {
        log.debug('Internal knowledge generation skipped');
        return [];
      }

      log.info({ questionLength: question.length, maxPassages }, 'Generating internal knowledge');

      let response: LlmResponse;
      try {
        response = await llmClient.invoke({
          systemPrompt: buildSystemPrompt(maxPassages),
          userMessage: `Question: ${question}`,
          options: { signal },
        });
      } catch (error) {
        if (error instanceof CancelledError) {
          throw error;
        }
        const cause = toError(error);
        throw new GenerationError(`Internal knowledge generation failed: ${cause.message}`, cause);
      }

      const statements = parseStatements(response.content).slice(0, maxPassages);
      const passages = createInternalPassages(statements);

      log.info(
        { passageCount: passages.length, responseLength: response.content.length },
        'Internal knowledge generated',
      );

      return passages;
    },
  };
}
