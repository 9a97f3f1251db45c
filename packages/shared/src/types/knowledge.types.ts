export type Provenance = 'internal' | 'external';

export interface Passage {
  readonly id: string;
  readonly text: string;
  readonly provenance: Provenance;
  /** Generation index for internal passages, document index for external ones. */
  readonly sourceIndex: number;
}

export interface ProvenanceBreakdown {
  readonly internal: number;
  readonly external: number;
}

export interface KnowledgeCluster {
  readonly id: string;
  readonly passages: readonly Passage[];
  readonly consensus: string;
  readonly provenance: ProvenanceBreakdown;
  /** Ids of clusters whose claims directly contradict this one. */
  readonly conflictsWith: readonly string[];
}

export interface ConsolidationResult {
  readonly clusters: readonly KnowledgeCluster[];
  /** Set when the grouping could not be parsed and every passage became its own cluster. */
  readonly degraded: boolean;
}

export interface Citation {
  readonly clusterId: string;
  readonly consensus: string;
  readonly passageIds: readonly string[];
}

export interface Answer {
  readonly text: string;
  readonly confidence: number;
  readonly citations: readonly Citation[];
  readonly conflicting: boolean;
  readonly notes: readonly string[];
}
