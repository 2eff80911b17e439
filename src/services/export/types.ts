/**
 * Export collaborator contract
 */

import type { Candidate } from '../../models/candidate.js';

export interface ExportContext {
  deck: string;
  /** Source title, attached to each card as a tag or trailing field */
  title: string;
  /** Let the sink accept cards it considers duplicates */
  allowDuplicates?: boolean;
}

export interface ExportFailure {
  candidateId: string;
  reason: string;
}

export interface ExportReport {
  exported: number;
  failures: ExportFailure[];
  /** Where the cards went, e.g. the AnkiConnect URL or the output files */
  destination: string;
}

export interface CardExporter {
  readonly name: string;
  export(cards: readonly Candidate[], context: ExportContext): Promise<ExportReport>;
}
