/**
 * Processed-item ledger model
 *
 * @module models/ledger
 */

import type { SourceOrigin } from './source-item.js';

export type LedgerStatus = 'exported' | 'all_duplicates' | 'no_candidates';

export interface LedgerOutcome {
  status: LedgerStatus;
  generated: number;
  accepted: number;
  rejected: number;
  exportFailures: number;
  deck: string;
}

export interface LedgerRecord {
  sourceId: string;
  origin: SourceOrigin;
  title: string;
  processedAt: string;
  outcome: LedgerOutcome;
}

/**
 * Durable skip-vs-process gate. The pipeline checks it before generation and
 * writes it once every candidate of a source has been decided.
 */
export interface Ledger {
  hasProcessed(sourceId: string): boolean;
  markProcessed(record: LedgerRecord): void;
  getRecord(sourceId: string): LedgerRecord | null;
}

/**
 * Derive the ledger status from decision counts
 */
export function outcomeStatus(generated: number, accepted: number): LedgerStatus {
  if (generated === 0) return 'no_candidates';
  return accepted === 0 ? 'all_duplicates' : 'exported';
}
