import type { Passage } from '@tessera/shared/src/types/knowledge.types.js';

/** A grouping proposal over passage and group positions, both 0-based. */
export interface ProposedGroup {
  readonly passageIndices: readonly number[];
  readonly consensus: string;
  readonly conflictsWith: readonly number[];
}

export type GroupingOutcome =
  | { readonly status: 'grouped'; readonly groups: readonly ProposedGroup[] }
  | { readonly status: 'unparsable'; readonly reason: string };

export interface ConsistencyGrouper {
  readonly name: string;
  group(
    question: string,
    passages: readonly Passage[],
    signal?: AbortSignal,
  ): Promise<GroupingOutcome>;
}

/**
 * Turns a 1-based label such as `2`, `"P2"` or `"G2"` into a 0-based
 * position. Returns `undefined` when no positive integer can be read.
 */
export function parseReference(reference: number | string): number | undefined {
  const value = typeof reference === 'number' ? reference : Number(/\d+/.exec(reference)?.[0]);
  return Number.isInteger(value) && value >= 1 ? value - 1 : undefined;
}
