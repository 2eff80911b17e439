/**
 * Signature comparison
 *
 * Cosine similarity for both backends. Comparing signatures from different
 * backends is a contract violation: scores are on different scales, so the
 * result would be meaningless. It throws IndexInconsistencyError, which the
 * pipeline treats as fatal.
 *
 * @module services/signature/similarity
 */

import { isDegenerate } from '../../models/signature.js';
import type { LexicalSignature, SemanticSignature, Signature } from '../../models/signature.js';
import { clampUnit, dot } from '../../utils/math.js';

export class IndexInconsistencyError extends Error {
  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'IndexInconsistencyError';
    Error.captureStackTrace?.(this, IndexInconsistencyError);
  }
}

/**
 * Throw unless the two signatures can be compared
 */
export function assertComparable(a: Signature, b: Signature): void {
  if (a.backend !== b.backend) {
    throw new IndexInconsistencyError(
      `Cannot compare ${a.backend} signature with ${b.backend} signature`,
      { left: a.backend, right: b.backend }
    );
  }
  if (a.backend === 'semantic' && b.backend === 'semantic') {
    if (a.vector.length !== b.vector.length || a.model !== b.model) {
      throw new IndexInconsistencyError(
        `Cannot compare embeddings from ${a.model} (${a.vector.length}d) and ${b.model} (${b.vector.length}d)`,
        { leftModel: a.model, rightModel: b.model }
      );
    }
  }
}

function lexicalCosine(a: LexicalSignature, b: LexicalSignature): number {
  // Both term lists are sorted, so a merge walk finds the shared terms.
  let i = 0;
  let j = 0;
  let sum = 0;
  while (i < a.terms.length && j < b.terms.length) {
    const [termA, weightA] = a.terms[i];
    const [termB, weightB] = b.terms[j];
    if (termA === termB) {
      sum += weightA * weightB;
      i++;
      j++;
    } else if (termA < termB) {
      i++;
    } else {
      j++;
    }
  }
  return sum / (a.norm * b.norm);
}

function semanticCosine(a: SemanticSignature, b: SemanticSignature): number {
  return dot(a.vector, b.vector) / (a.norm * b.norm);
}

/**
 * Cosine similarity in [-1, 1]. Degenerate signatures score 0 against
 * everything, including each other.
 *
 * @throws IndexInconsistencyError when the backends differ
 */
export function cosineSimilarity(a: Signature, b: Signature): number {
  assertComparable(a, b);
  if (isDegenerate(a) || isDegenerate(b)) {
    return 0;
  }
  if (a.backend === 'lexical' && b.backend === 'lexical') {
    return clampUnit(lexicalCosine(a, b));
  }
  if (a.backend === 'semantic' && b.backend === 'semantic') {
    return clampUnit(semanticCosine(a, b));
  }
  return 0;
}
