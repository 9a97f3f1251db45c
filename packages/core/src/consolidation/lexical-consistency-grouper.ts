import type { Passage } from '@tessera/shared/src/types/knowledge.types.js';
import { jaccardSimilarity } from '@tessera/shared/src/utils/math.js';
import { createChildLogger } from '@tessera/shared/src/logger.js';
import type { ConsistencyGrouper, GroupingOutcome, ProposedGroup } from './consistency-grouper.js';

const log = createChildLogger('consolidation:lexical-grouper');

const DEFAULT_SIMILARITY_THRESHOLD = 0.3;

const STOPWORDS = new Set([
  'a', 'an', 'the', 'and', 'or', 'but', 'if', 'then', 'so',
  'is', 'are', 'was', 'were', 'be', 'been', 'being', 'has', 'have', 'had',
  'do', 'does', 'did', 'of', 'in', 'on', 'at', 'to', 'for', 'from', 'by',
  'with', 'as', 'into', 'about', 'that', 'this', 'these', 'those', 'it',
  'its', 'which', 'who', 'what', 'there', 'their', 'also', 'than',
]);

const NEGATIONS = new Set(['not', 'no', 'never', 'none', 'nor', 'neither', 'cannot']);

const TOKEN = /[\p{L}\p{N}]+(?:['’][\p{L}]+)*/gu;

export interface PassageTerms {
  readonly content: ReadonlySet<string>;
  readonly key: ReadonlySet<string>;
  readonly negated: boolean;
}

function isNegation(token: string): boolean {
  return NEGATIONS.has(token) || /n['’]t$/.test(token);
}

export function extractTerms(text: string): PassageTerms {
  const content = new Set<string>();
  const key = new Set<string>();
  let negated = false;

  for (const raw of text.match(TOKEN) ?? []) {
    const lower = raw.toLowerCase();
    if (isNegation(lower)) {
      negated = true;
      continue;
    }
    const term = lower.replace(/['’]s$/, '');
    if (STOPWORDS.has(term)) {
      continue;
    }
    content.add(term);
    if (/^[\p{Lu}\p{N}]/u.test(raw)) {
      key.add(term);
    }
  }

  return { content, key, negated };
}

function hasTermMissingFrom(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  for (const term of a) {
    if (!b.has(term)) return true;
  }
  return false;
}

export type PairRelation = 'consistent' | 'conflicting' | 'unrelated';

/**
 * Passages on the same topic conflict when each names something the other
 * does not, or when exactly one of them is negated.
 */
export function relatePassages(a: PassageTerms, b: PassageTerms, threshold: number): PairRelation {
  if (jaccardSimilarity(a.content, b.content) < threshold) {
    return 'unrelated';
  }
  const divergentKeys = hasTermMissingFrom(a.key, b.key) && hasTermMissingFrom(b.key, a.key);
  return divergentKeys || a.negated !== b.negated ? 'conflicting' : 'consistent';
}

export interface LexicalGrouperOptions {
  readonly similarityThreshold?: number;
}

export function groupLexically(
  passages: readonly Passage[],
  threshold: number = DEFAULT_SIMILARITY_THRESHOLD,
): ProposedGroup[] {
  const terms = passages.map((p) => extractTerms(p.text));
  const relation = (i: number, j: number): PairRelation => relatePassages(terms[i], terms[j], threshold);

  const members: number[][] = [];
  passages.forEach((_passage, index) => {
    const target = members.find(
      (group) =>
        group.some((other) => relation(index, other) === 'consistent') &&
        !group.some((other) => relation(index, other) === 'conflicting'),
    );
    if (target) {
      target.push(index);
    } else {
      members.push([index]);
    }
  });

  return members.map((group, groupIndex) => ({
    passageIndices: group,
    consensus: passages[group[0]].text,
    conflictsWith: members
      .map((other, otherIndex) => ({ other, otherIndex }))
      .filter(
        ({ other, otherIndex }) =>
          otherIndex !== groupIndex &&
          group.some((i) => other.some((j) => relation(i, j) === 'conflicting')),
      )
      .map(({ otherIndex }) => otherIndex),
  }));
}

/** Deterministic grouping by word overlap, for offline runs and tests. */
export function createLexicalConsistencyGrouper(
  options: LexicalGrouperOptions = {},
): ConsistencyGrouper {
  const threshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;

  return {
    name: 'lexical',

    group(_question: string, passages: readonly Passage[]): Promise<GroupingOutcome> {
      const groups = groupLexically(passages, threshold);
      log.debug({ passageCount: passages.length, groupCount: groups.length, threshold }, 'Lexical grouping');
      return Promise.resolve({ status: 'grouped', groups });
    },
  };
}
