/**
 * Candidate card model
 *
 * A candidate is one generated flashcard awaiting the duplicate decision.
 * Candidates are frozen on creation; editing one means creating a new
 * candidate (and therefore deriving a new signature).
 *
 * @module models/candidate
 */

import { v4 as uuidv4 } from 'uuid';

export type CandidateKind = 'cloze' | 'basic';

export interface CandidateField {
  readonly name: string;
  readonly value: string;
}

export interface Candidate {
  readonly id: string;
  readonly kind: CandidateKind;
  readonly fields: readonly CandidateField[];
  /** Identity of the SourceItem this card was generated from */
  readonly sourceId: string;
  readonly createdAt: string;
}

/** Field names per card kind, in note-model order */
export const CANDIDATE_FIELD_NAMES: Record<CandidateKind, readonly [string, string]> = {
  cloze: ['Text', 'Extra'],
  basic: ['Front', 'Back'],
};

interface CreateCandidateOptions {
  kind: CandidateKind;
  values: readonly string[];
  sourceId: string;
  id?: string;
  createdAt?: string;
}

/**
 * Create an immutable candidate. Values are matched to the kind's field
 * names by position; missing values become empty strings.
 */
export function createCandidate(options: CreateCandidateOptions): Candidate {
  const names = CANDIDATE_FIELD_NAMES[options.kind];
  const fields = Object.freeze(
    names.map((name, i) => Object.freeze({ name, value: (options.values[i] ?? '').trim() }))
  );
  return Object.freeze({
    id: options.id ?? uuidv4(),
    kind: options.kind,
    fields,
    sourceId: options.sourceId,
    createdAt: options.createdAt ?? new Date().toISOString(),
  });
}

/**
 * True when at least one field carries text
 */
export function hasContent(candidate: Candidate): boolean {
  return candidate.fields.some((f) => f.value.trim().length > 0);
}

/**
 * Short single-line preview for log output
 */
export function previewCandidate(candidate: Candidate, maxLength = 80): string {
  const text = candidate.fields
    .map((f) => f.value)
    .filter((v) => v.length > 0)
    .join(' | ')
    .replace(/\s+/g, ' ');
  return text.length > maxLength ? `${text.slice(0, maxLength - 3)}...` : text;
}
