import type { KnowledgeCluster, Passage } from '@tessera/shared/src/types/knowledge.types.js';

let nextPassage = 0;

/** Builds a cluster fixture with the given number of internal and external passages. */
export function makeCluster(
  index: number,
  consensus: string,
  support: { internal?: number; external?: number } = {},
  conflictsWith: readonly number[] = [],
): KnowledgeCluster {
  const internal = support.internal ?? 0;
  const external = support.external ?? 1;
  const passages: Passage[] = [];
  for (let i = 0; i < internal; i++) {
    passages.push({ id: `internal-${String(nextPassage++)}`, text: consensus, provenance: 'internal', sourceIndex: i });
  }
  for (let i = 0; i < external; i++) {
    passages.push({ id: `external-${String(nextPassage++)}`, text: consensus, provenance: 'external', sourceIndex: i });
  }
  return {
    id: `cluster-${String(index)}`,
    passages,
    consensus,
    provenance: { internal, external },
    conflictsWith: conflictsWith.map((other) => `cluster-${String(other)}`),
  };
}
