/**
 * SqliteLedger - durable record of processed sources
 *
 * The ledger is the only skip-vs-process gate. A mark is committed (WAL,
 * synchronous = FULL) before markProcessed returns; if the write fails the
 * caller gets a LedgerWriteError and the source stays unmarked.
 *
 * @module services/storage/ledger
 */

import { z } from 'zod';
import type { Ledger, LedgerRecord } from '../../models/ledger.js';
import type { SourceOrigin } from '../../models/source-item.js';
import { StateDatabase, StorageError, StorageErrorCode } from './database.js';

export class LedgerWriteError extends Error {
  constructor(
    message: string,
    public readonly sourceId: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'LedgerWriteError';
    Error.captureStackTrace?.(this, LedgerWriteError);
  }
}

const LedgerRowSchema = z.object({
  source_id: z.string(),
  origin_kind: z.enum(['url', 'file']),
  origin: z.string(),
  title: z.string(),
  processed_at: z.string(),
  status: z.enum(['exported', 'all_duplicates', 'no_candidates']),
  generated: z.number().int(),
  accepted: z.number().int(),
  rejected: z.number().int(),
  export_failures: z.number().int(),
  deck: z.string(),
});

type LedgerRow = z.infer<typeof LedgerRowSchema>;

function rowToRecord(raw: unknown): LedgerRecord {
  const parsed = LedgerRowSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StorageError(
      `Corrupt processed_sources row: ${parsed.error.message}`,
      StorageErrorCode.CORRUPT_ROW
    );
  }
  const row: LedgerRow = parsed.data;
  const origin: SourceOrigin =
    row.origin_kind === 'url' ? { kind: 'url', url: row.origin } : { kind: 'file', path: row.origin };
  return {
    sourceId: row.source_id,
    origin,
    title: row.title,
    processedAt: row.processed_at,
    outcome: {
      status: row.status,
      generated: row.generated,
      accepted: row.accepted,
      rejected: row.rejected,
      exportFailures: row.export_failures,
      deck: row.deck,
    },
  };
}

export class SqliteLedger implements Ledger {
  constructor(private readonly database: StateDatabase) {}

  hasProcessed(sourceId: string): boolean {
    const row: unknown = this.database
      .getConnection()
      .prepare('SELECT 1 FROM processed_sources WHERE source_id = ?')
      .get(sourceId);
    return row !== undefined;
  }

  /**
   * Insert or replace the record for `record.sourceId`.
   *
   * @throws LedgerWriteError if the row could not be committed
   */
  markProcessed(record: LedgerRecord): void {
    const originValue = record.origin.kind === 'url' ? record.origin.url : record.origin.path;
    try {
      this.database
        .getConnection()
        .prepare(
          `INSERT INTO processed_sources
             (source_id, origin_kind, origin, title, processed_at, status,
              generated, accepted, rejected, export_failures, deck)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT(source_id) DO UPDATE SET
             origin_kind = excluded.origin_kind,
             origin = excluded.origin,
             title = excluded.title,
             processed_at = excluded.processed_at,
             status = excluded.status,
             generated = excluded.generated,
             accepted = excluded.accepted,
             rejected = excluded.rejected,
             export_failures = excluded.export_failures,
             deck = excluded.deck`
        )
        .run(
          record.sourceId,
          record.origin.kind,
          originValue,
          record.title,
          record.processedAt,
          record.outcome.status,
          record.outcome.generated,
          record.outcome.accepted,
          record.outcome.rejected,
          record.outcome.exportFailures,
          record.outcome.deck
        );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Ledger] Failed to mark ${record.sourceId} processed: ${message}`);
      throw new LedgerWriteError(
        `Failed to record ${record.sourceId} as processed: ${message}`,
        record.sourceId,
        error
      );
    }
  }

  getRecord(sourceId: string): LedgerRecord | null {
    const row: unknown = this.database
      .getConnection()
      .prepare('SELECT * FROM processed_sources WHERE source_id = ?')
      .get(sourceId);
    return row === undefined ? null : rowToRecord(row);
  }

  /**
   * All records, most recently processed first
   */
  list(limit?: number): LedgerRecord[] {
    const rows: unknown[] = this.database
      .getConnection()
      .prepare('SELECT * FROM processed_sources ORDER BY processed_at DESC, source_id ASC LIMIT ?')
      .all(limit ?? -1);
    return rows.map(rowToRecord);
  }

  /**
   * Remove a record so the source is processed again next run
   *
   * @returns true if a record was removed
   */
  forget(sourceId: string): boolean {
    const result = this.database
      .getConnection()
      .prepare('DELETE FROM processed_sources WHERE source_id = ?')
      .run(sourceId);
    return result.changes > 0;
  }

  count(): number {
    const row: unknown = this.database
      .getConnection()
      .prepare('SELECT COUNT(*) AS n FROM processed_sources')
      .get();
    const n: unknown = typeof row === 'object' && row !== null ? Reflect.get(row, 'n') : 0;
    return typeof n === 'number' ? n : 0;
  }
}
