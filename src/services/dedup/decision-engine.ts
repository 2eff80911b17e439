/**
 * Duplicate Decision Engine
 *
 * Accepts or rejects one candidate at a time against the similarity index.
 * `decide` is synchronous: the lookup and the insert of an accepted entry
 * happen without yielding, so no other decision can slip in between them.
 *
 * Tie-break: when several accepted entries reach the threshold, the
 * rejection reports the one with the highest similarity (earliest inserted
 * among equal scores).
 *
 * @module services/dedup/decision-engine
 */

import type { Candidate } from '../../models/candidate.js';
import { previewCandidate } from '../../models/candidate.js';
import { isDegenerate } from '../../models/signature.js';
import type { AcceptedEntry, Signature } from '../../models/signature.js';
import { normalizeCandidate } from '../normalize/text-normalizer.js';
import { SimilarityThreshold, ValidationError } from '../../utils/validation.js';
import type { Match, SimilarityIndex } from './similarity-index.js';

export const DEFAULT_SIMILARITY_THRESHOLD = 0.85;

export interface DecisionOptions {
  /** Similarity at or above which a candidate is a duplicate (default 0.85) */
  threshold?: number;
  /** Accept without looking anything up; the entry is still indexed */
  allowDuplicates?: boolean;
}

export type Decision =
  | {
      verdict: 'accept';
      entry: AcceptedEntry;
      /** True when the signature carried no comparable information */
      degenerate: boolean;
      /** True when accepted because duplicates are allowed */
      forced: boolean;
    }
  | {
      verdict: 'reject';
      candidate: Candidate;
      bestMatch: Match;
    };

export interface DecisionStats {
  accepted: number;
  rejected: number;
  degenerate: number;
  forced: number;
}

/**
 * @throws ValidationError when the threshold is outside [0, 1] or not a number
 */
export function validateThreshold(threshold: number): number {
  const result = SimilarityThreshold.safeParse(threshold);
  if (!result.success || Number.isNaN(threshold)) {
    throw new ValidationError(
      `Similarity threshold must be a number between 0 and 1, got ${String(threshold)}`
    );
  }
  return result.data;
}

export class DuplicateDecisionEngine {
  private readonly counters: DecisionStats = { accepted: 0, rejected: 0, degenerate: 0, forced: 0 };
  private readonly defaultThreshold: number;

  constructor(
    private readonly index: SimilarityIndex,
    options: { threshold?: number } = {}
  ) {
    this.defaultThreshold = validateThreshold(options.threshold ?? DEFAULT_SIMILARITY_THRESHOLD);
  }

  get stats(): DecisionStats {
    return { ...this.counters };
  }

  decide(candidate: Candidate, signature: Signature, options: DecisionOptions = {}): Decision {
    const threshold =
      options.threshold === undefined ? this.defaultThreshold : validateThreshold(options.threshold);
    const entry: AcceptedEntry = Object.freeze({
      candidate,
      normalizedText: normalizeCandidate(candidate).text,
      signature,
    });

    if (options.allowDuplicates) {
      this.index.insert(entry);
      this.counters.accepted++;
      this.counters.forced++;
      return { verdict: 'accept', entry, degenerate: isDegenerate(signature), forced: true };
    }

    if (isDegenerate(signature)) {
      // insert() still checks the backend
      this.index.insert(entry);
      this.counters.accepted++;
      this.counters.degenerate++;
      console.error(
        `[Dedup] degenerate signature (DEGENERATE_INPUT), kept without comparison: ` +
          `"${previewCandidate(candidate)}" (candidate ${candidate.id})`
      );
      return { verdict: 'accept', entry, degenerate: true, forced: false };
    }

    const matches = this.index.candidatesNear(signature, threshold);
    if (matches.length > 0) {
      const bestMatch = matches[0];
      this.counters.rejected++;
      console.error(
        `[Dedup] Rejected duplicate (similarity ${bestMatch.similarity.toFixed(3)} >= ${threshold}): ` +
          `"${previewCandidate(candidate)}" matches "${previewCandidate(bestMatch.entry.candidate)}"`
      );
      return { verdict: 'reject', candidate, bestMatch };
    }

    this.index.insert(entry);
    this.counters.accepted++;
    return { verdict: 'accept', entry, degenerate: false, forced: false };
  }
}
