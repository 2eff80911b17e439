/**
 * Signature model - comparable representation of a candidate's text
 *
 * Signatures are a tagged union on `backend`. Scores from the two backends
 * live on different scales, so only signatures with the same tag may be
 * compared (see services/signature/similarity).
 *
 * @module models/signature
 */

import type { Candidate } from './candidate.js';

export type SignatureBackend = 'lexical' | 'semantic';

/** Backend preference accepted from configuration */
export type SignatureBackendPreference = 'auto' | SignatureBackend;

/**
 * Sparse TF-IDF vector. Terms are sorted by code point so two signatures
 * built from the same text are byte-identical.
 */
export interface LexicalSignature {
  readonly backend: 'lexical';
  readonly terms: ReadonlyArray<readonly [term: string, weight: number]>;
  readonly norm: number;
}

/**
 * Dense sentence-encoder vector.
 */
export interface SemanticSignature {
  readonly backend: 'semantic';
  readonly model: string;
  readonly vector: Float32Array;
  readonly norm: number;
}

export type Signature = LexicalSignature | SemanticSignature;

/**
 * A candidate that passed the decision engine, with the text and signature
 * it was judged by.
 */
export interface AcceptedEntry {
  readonly candidate: Candidate;
  readonly normalizedText: string;
  readonly signature: Signature;
}

/**
 * A zero-norm signature carries no comparable information (empty text,
 * stopwords only). It never matches and is never matched.
 */
export function isDegenerate(signature: Signature): boolean {
  return !(signature.norm > 0) || !Number.isFinite(signature.norm);
}
