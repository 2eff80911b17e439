/**
 * SimilarityIndex - accepted entries of the current run
 *
 * Linear scan over every accepted entry. Inserts are visible to the very
 * next lookup. All entries share one backend; mixing backends throws
 * IndexInconsistencyError.
 *
 * @module services/dedup/similarity-index
 */

import { isDegenerate } from '../../models/signature.js';
import type { AcceptedEntry, Signature, SignatureBackend } from '../../models/signature.js';
import { cosineSimilarity, IndexInconsistencyError } from '../signature/similarity.js';

export interface Match {
  entry: AcceptedEntry;
  similarity: number;
}

export class SimilarityIndex {
  private readonly items: AcceptedEntry[] = [];
  private currentBackend: SignatureBackend;

  constructor(backend: SignatureBackend) {
    this.currentBackend = backend;
  }

  get backend(): SignatureBackend {
    return this.currentBackend;
  }

  get size(): number {
    return this.items.length;
  }

  entries(): readonly AcceptedEntry[] {
    return this.items;
  }

  insert(entry: AcceptedEntry): void {
    this.assertBackend(entry.signature, 'insert');
    this.items.push(entry);
  }

  /**
   * Entries with similarity >= threshold, closest first. Ties keep
   * insertion order.
   */
  candidatesNear(signature: Signature, threshold: number): Match[] {
    this.assertBackend(signature, 'lookup');
    if (isDegenerate(signature)) {
      return [];
    }

    const matches: Match[] = [];
    for (const entry of this.items) {
      if (isDegenerate(entry.signature)) continue;
      const similarity = cosineSimilarity(signature, entry.signature);
      if (similarity >= threshold) {
        matches.push({ entry, similarity });
      }
    }
    // Array.prototype.sort is stable, so equal scores stay in insertion order
    return matches.sort((a, b) => b.similarity - a.similarity);
  }

  /**
   * Replace every signature with one from another backend. Used when the
   * run falls back from semantic to lexical signatures.
   */
  resign(backend: SignatureBackend, sign: (entry: AcceptedEntry) => Signature): void {
    const resigned = this.items.map((entry) => {
      const signature = sign(entry);
      if (signature.backend !== backend) {
        throw new IndexInconsistencyError(
          `Re-signing produced a ${signature.backend} signature for a ${backend} index`,
          { candidateId: entry.candidate.id }
        );
      }
      return { ...entry, signature };
    });
    this.items.splice(0, this.items.length, ...resigned);
    this.currentBackend = backend;
  }

  private assertBackend(signature: Signature, operation: string): void {
    if (signature.backend !== this.currentBackend) {
      throw new IndexInconsistencyError(
        `Cannot ${operation} a ${signature.backend} signature in a ${this.currentBackend} index`,
        { indexBackend: this.currentBackend, signatureBackend: signature.backend, size: this.size }
      );
    }
  }
}
