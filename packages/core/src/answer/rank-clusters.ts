import type { KnowledgeCluster } from '@tessera/shared/src/types/knowledge.types.js';
import { isProvenanceDiverse } from '../knowledge/passages.js';

/**
 * Orders clusters by corroboration: support from both provenances first, then
 * more supporting passages, then original order.
 */
export function rankClusters(clusters: readonly KnowledgeCluster[]): KnowledgeCluster[] {
  return clusters
    .map((cluster, index) => ({ cluster, index }))
    .sort((a, b) => {
      const diversity =
        Number(isProvenanceDiverse(b.cluster.provenance)) -
        Number(isProvenanceDiverse(a.cluster.provenance));
      if (diversity !== 0) return diversity;
      const support = b.cluster.passages.length - a.cluster.passages.length;
      if (support !== 0) return support;
      return a.index - b.index;
    })
    .map(({ cluster }) => cluster);
}
