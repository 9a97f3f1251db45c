import type {
  Passage,
  Provenance,
  ProvenanceBreakdown,
} from '@tessera/shared/src/types/knowledge.types.js';

function createPassages(texts: readonly string[], provenance: Provenance): Passage[] {
  return texts.map((text, index) => ({
    id: `${provenance}-${String(index)}`,
    text,
    provenance,
    sourceIndex: index,
  }));
}

/** Wraps retrieved documents as external passages, keeping their order. */
export function createExternalPassages(docs: readonly string[]): Passage[] {
  return createPassages(docs, 'external');
}

export function createInternalPassages(statements: readonly string[]): Passage[] {
  return createPassages(statements, 'internal');
}

export function countProvenance(passages: readonly Passage[]): ProvenanceBreakdown {
  let internal = 0;
  let external = 0;
  for (const passage of passages) {
    if (passage.provenance === 'internal') {
      internal++;
    } else {
      external++;
    }
  }
  return { internal, external };
}

export function isProvenanceDiverse(breakdown: ProvenanceBreakdown): boolean {
  return breakdown.internal > 0 && breakdown.external > 0;
}
