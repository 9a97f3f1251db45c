import { describe, it, expect } from 'vitest';
import {
  countProvenance,
  createExternalPassages,
  createInternalPassages,
  isProvenanceDiverse,
} from './passages.js';

describe('createExternalPassages', () => {
  it('should keep document order and index ids from zero', () => {
    expect(createExternalPassages(['Doc A', 'Doc B'])).toEqual([
      { id: 'external-0', text: 'Doc A', provenance: 'external', sourceIndex: 0 },
      { id: 'external-1', text: 'Doc B', provenance: 'external', sourceIndex: 1 },
    ]);
  });
});

describe('countProvenance', () => {
  it('should count internal and external passages', () => {
    const passages = [
      ...createInternalPassages(['x']),
      ...createExternalPassages(['y', 'z']),
    ];
    const breakdown = countProvenance(passages);

    expect(breakdown).toEqual({ internal: 1, external: 2 });
    expect(isProvenanceDiverse(breakdown)).toBe(true);
  });

  it('should report a single-source breakdown as not diverse', () => {
    expect(isProvenanceDiverse(countProvenance(createExternalPassages(['y'])))).toBe(false);
  });
});
