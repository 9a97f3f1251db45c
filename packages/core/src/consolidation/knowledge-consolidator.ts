import type {
  ConsolidationResult,
  KnowledgeCluster,
  Passage,
} from '@tessera/shared/src/types/knowledge.types.js';
import { createChildLogger } from '@tessera/shared/src/logger.js';
import {
  CancelledError,
  ConsolidationError,
  StageError,
  toError,
} from '@tessera/shared/src/utils/errors.js';
import { countProvenance } from '../knowledge/passages.js';
import type { ConsistencyGrouper, GroupingOutcome, ProposedGroup } from './consistency-grouper.js';

const log = createChildLogger('consolidation:consolidator');

export interface KnowledgeConsolidator {
  consolidate(
    question: string,
    passages: readonly Passage[],
    signal?: AbortSignal,
  ): Promise<ConsolidationResult>;
}

interface DraftCluster {
  readonly members: readonly number[];
  readonly consensus: string;
  /** Key of the draft in the conflict map. */
  readonly key?: number;
}

function buildClusters(
  passages: readonly Passage[],
  drafts: readonly DraftCluster[],
  conflicts: ReadonlyMap<number, ReadonlySet<number>> = new Map(),
): KnowledgeCluster[] {
  const ordered = [...drafts].sort((a, b) => a.members[0] - b.members[0]);
  const clusterOfKey = new Map<number, number>();
  ordered.forEach((draft, index) => {
    if (draft.key !== undefined) {
      clusterOfKey.set(draft.key, index);
    }
  });

  return ordered.map((draft, index) => {
    const members = draft.members.map((i) => passages[i]);
    const conflictIds =
      draft.key === undefined
        ? []
        : [...(conflicts.get(draft.key) ?? [])]
            .map((key) => clusterOfKey.get(key))
            .filter((cluster): cluster is number => cluster !== undefined && cluster !== index)
            .sort((a, b) => a - b)
            .map((cluster) => `cluster-${String(cluster)}`);

    return {
      id: `cluster-${String(index)}`,
      passages: members,
      consensus: draft.consensus,
      provenance: countProvenance(members),
      conflictsWith: conflictIds,
    };
  });
}

export function singletonClusters(passages: readonly Passage[]): KnowledgeCluster[] {
  return buildClusters(
    passages,
    passages.map((passage, index) => ({ members: [index], consensus: passage.text })),
  );
}

/**
 * Turns a grouping proposal into a partition of `passages`: every passage ends
 * up in exactly one cluster, and conflict links are symmetric.
 */
export function normalizeGroups(
  passages: readonly Passage[],
  groups: readonly ProposedGroup[],
): KnowledgeCluster[] {
  const cleaned = groups.map((group) => [
    ...new Set(
      group.passageIndices.filter((i) => Number.isInteger(i) && i >= 0 && i < passages.length),
    ),
  ]);

  const claims = new Array<number>(passages.length).fill(0);
  for (const indices of cleaned) {
    for (const i of indices) claims[i]++;
  }

  const conflicts = new Map<number, Set<number>>();
  const link = (from: number, to: number): void => {
    const set = conflicts.get(from) ?? new Set<number>();
    set.add(to);
    conflicts.set(from, set);
  };
  groups.forEach((group, groupIndex) => {
    for (const other of group.conflictsWith) {
      if (other !== groupIndex && other >= 0 && other < groups.length) {
        link(groupIndex, other);
        link(other, groupIndex);
      }
    }
  });

  const drafts: DraftCluster[] = [];
  cleaned.forEach((indices, groupIndex) => {
    // A passage claimed by several groups is ambiguous and falls back to its own cluster.
    const members = indices.filter((i) => claims[i] === 1).sort((a, b) => a - b);
    if (members.length === 0) return;

    // A group that contradicts itself has no consensus: its members are split
    // into singletons that conflict with each other.
    if (members.length > 1 && groups[groupIndex].conflictsWith.includes(groupIndex)) {
      const keys = members.map((i) => groups.length + i);
      members.forEach((i, position) => {
        drafts.push({ members: [i], consensus: passages[i].text, key: keys[position] });
        for (const other of keys) {
          if (other !== keys[position]) link(keys[position], other);
        }
      });
      log.warn({ group: groupIndex, memberCount: members.length }, 'Group contradicts itself, splitting its members');
      return;
    }

    const consensus = groups[groupIndex].consensus.trim();
    drafts.push({
      members,
      consensus: consensus.length > 0 ? consensus : passages[members[0]].text,
      key: groupIndex,
    });
  });

  passages.forEach((passage, index) => {
    if (claims[index] !== 1) {
      drafts.push({ members: [index], consensus: passage.text });
    }
  });

  return buildClusters(passages, drafts, conflicts);
}

function toResult(passages: readonly Passage[], outcome: GroupingOutcome): ConsolidationResult {
  if (outcome.status === 'unparsable') {
    log.warn({ reason: outcome.reason, passageCount: passages.length }, 'Grouping unparsable, using one cluster per passage');
    return { clusters: singletonClusters(passages), degraded: true };
  }
  return { clusters: normalizeGroups(passages, outcome.groups), degraded: false };
}

export function createKnowledgeConsolidator(grouper: ConsistencyGrouper): KnowledgeConsolidator {
  return {
    async consolidate(
      question: string,
      passages: readonly Passage[],
      signal?: AbortSignal,
    ): Promise<ConsolidationResult> {
      if (passages.length === 0) {
        log.debug('No passages to consolidate');
        return { clusters: [], degraded: false };
      }

      log.info({ passageCount: passages.length, grouper: grouper.name }, 'Consolidating passages');

      let outcome: GroupingOutcome;
      try {
        outcome = await grouper.group(question, passages, signal);
      } catch (error) {
        if (error instanceof CancelledError || error instanceof StageError) {
          throw error;
        }
        const cause = toError(error);
        throw new ConsolidationError(`Passage grouping failed: ${cause.message}`, cause);
      }

      const result = toResult(passages, outcome);
      log.info(
        {
          clusterCount: result.clusters.length,
          conflictingClusters: result.clusters.filter((c) => c.conflictsWith.length > 0).length,
          degraded: result.degraded,
        },
        'Consolidation complete',
      );
      return result;
    },
  };
}
