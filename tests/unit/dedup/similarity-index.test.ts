/**
 * SimilarityIndex tests
 */

import { describe, it, expect } from 'vitest';
import { SimilarityIndex } from '../../../src/services/dedup/similarity-index.js';
import { IndexInconsistencyError } from '../../../src/services/signature/similarity.js';
import type { AcceptedEntry, Signature } from '../../../src/models/signature.js';
import { basicCard, semanticSignature } from '../../setup/fixtures.js';

function entry(front: string, signature: Signature): AcceptedEntry {
  return { candidate: basicCard(front, ''), normalizedText: front.toLowerCase(), signature };
}

describe('SimilarityIndex', () => {
  it('should start empty with the given backend', () => {
    const index = new SimilarityIndex('semantic');
    expect(index.size).toBe(0);
    expect(index.backend).toBe('semantic');
  });

  it('should return matches at or above the threshold, closest first', () => {
    const index = new SimilarityIndex('semantic');
    index.insert(entry('far', semanticSignature([0, 1])));
    index.insert(entry('near', semanticSignature([1, 1])));
    index.insert(entry('same', semanticSignature([1, 0])));

    const matches = index.candidatesNear(semanticSignature([1, 0]), 0.5);

    expect(matches.map((m) => m.entry.normalizedText)).toEqual(['same', 'near']);
    expect(matches[0].similarity).toBeCloseTo(1, 6);
    expect(matches[1].similarity).toBeCloseTo(Math.SQRT1_2, 6);
  });

  it('should keep insertion order for equal scores', () => {
    const index = new SimilarityIndex('semantic');
    index.insert(entry('first', semanticSignature([2, 0])));
    index.insert(entry('second', semanticSignature([3, 0])));

    const matches = index.candidatesNear(semanticSignature([1, 0]), 0.9);

    expect(matches.map((m) => m.entry.normalizedText)).toEqual(['first', 'second']);
  });

  it('should see an insert on the very next lookup', () => {
    const index = new SimilarityIndex('semantic');
    expect(index.candidatesNear(semanticSignature([1, 0]), 0.85)).toEqual([]);

    index.insert(entry('one', semanticSignature([1, 0])));

    expect(index.candidatesNear(semanticSignature([1, 0]), 0.85)).toHaveLength(1);
  });

  it('should never match degenerate signatures', () => {
    const index = new SimilarityIndex('semantic');
    index.insert(entry('empty', semanticSignature([0, 0])));
    index.insert(entry('real', semanticSignature([1, 0])));

    expect(index.candidatesNear(semanticSignature([0, 0]), 0)).toEqual([]);
    expect(index.candidatesNear(semanticSignature([1, 0]), 0).map((m) => m.entry.normalizedText)).toEqual([
      'real',
    ]);
  });

  it('should reject a signature from another backend', () => {
    const index = new SimilarityIndex('lexical');

    expect(() => index.insert(entry('x', semanticSignature([1, 0])))).toThrow(IndexInconsistencyError);
    expect(() => index.candidatesNear(semanticSignature([1, 0]), 0.5)).toThrow(
      'Cannot lookup a semantic signature in a lexical index'
    );
  });

  it('should re-sign every entry for a new backend', () => {
    const index = new SimilarityIndex('semantic');
    index.insert(entry('alpha', semanticSignature([1, 0])));
    index.insert(entry('beta', semanticSignature([0, 1])));

    index.resign('lexical', (e) => ({ backend: 'lexical', terms: [[e.normalizedText, 1]], norm: 1 }));

    expect(index.backend).toBe('lexical');
    expect(index.entries().map((e) => e.signature)).toEqual([
      { backend: 'lexical', terms: [['alpha', 1]], norm: 1 },
      { backend: 'lexical', terms: [['beta', 1]], norm: 1 },
    ]);
    expect(index.entries()[0].candidate.fields[0].value).toBe('alpha');
  });

  it('should refuse a re-signing that yields the wrong backend', () => {
    const index = new SimilarityIndex('semantic');
    index.insert(entry('alpha', semanticSignature([1, 0])));

    expect(() => index.resign('lexical', (e) => e.signature)).toThrow(
      'Re-signing produced a semantic signature for a lexical index'
    );
    expect(index.backend).toBe('semantic');
  });
});
