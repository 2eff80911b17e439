/**
 * AcceptedCardStore - accepted cards carried across runs
 *
 * Stores each accepted candidate with its normalized text. The next run
 * re-signs the stored texts with whatever backend it selected, so
 * persisted cards never carry a stale signature.
 *
 * @module services/storage/accepted-card-store
 */

import { z } from 'zod';
import type { Candidate } from '../../models/candidate.js';
import { createCandidate } from '../../models/candidate.js';
import type { AcceptedEntry } from '../../models/signature.js';
import { StateDatabase, StorageError, StorageErrorCode } from './database.js';

export interface StoredCard {
  candidate: Candidate;
  normalizedText: string;
  acceptedAt: string;
}

const FieldsSchema = z.array(z.object({ name: z.string(), value: z.string() }));

const CardRowSchema = z.object({
  id: z.string(),
  source_id: z.string(),
  kind: z.enum(['cloze', 'basic']),
  fields_json: z.string(),
  normalized_text: z.string(),
  created_at: z.string(),
  accepted_at: z.string(),
});

function rowToStoredCard(raw: unknown): StoredCard {
  const row = CardRowSchema.safeParse(raw);
  if (!row.success) {
    throw new StorageError(`Corrupt accepted_cards row: ${row.error.message}`, StorageErrorCode.CORRUPT_ROW);
  }
  let fieldsValue: unknown;
  try {
    fieldsValue = JSON.parse(row.data.fields_json);
  } catch (error) {
    throw new StorageError(
      `Corrupt fields_json for card ${row.data.id}`,
      StorageErrorCode.CORRUPT_ROW,
      error
    );
  }
  const fields = FieldsSchema.safeParse(fieldsValue);
  if (!fields.success) {
    throw new StorageError(
      `Corrupt fields_json for card ${row.data.id}: ${fields.error.message}`,
      StorageErrorCode.CORRUPT_ROW
    );
  }

  return {
    candidate: createCandidate({
      id: row.data.id,
      kind: row.data.kind,
      values: fields.data.map((f) => f.value),
      sourceId: row.data.source_id,
      createdAt: row.data.created_at,
    }),
    normalizedText: row.data.normalized_text,
    acceptedAt: row.data.accepted_at,
  };
}

export class AcceptedCardStore {
  constructor(private readonly database: StateDatabase) {}

  /**
   * Persist accepted entries in one transaction. Re-saving an id is a no-op.
   */
  saveMany(entries: readonly AcceptedEntry[]): void {
    if (entries.length === 0) return;
    const acceptedAt = new Date().toISOString();
    const stmt = this.database
      .getConnection()
      .prepare(
        `INSERT INTO accepted_cards (id, source_id, kind, fields_json, normalized_text, created_at, accepted_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(id) DO NOTHING`
      );
    this.database.transaction(() => {
      for (const { candidate, normalizedText } of entries) {
        stmt.run(
          candidate.id,
          candidate.sourceId,
          candidate.kind,
          JSON.stringify(candidate.fields),
          normalizedText,
          candidate.createdAt,
          acceptedAt
        );
      }
    });
  }

  /**
   * Every stored card, oldest first (the order they were accepted in)
   */
  loadAll(): StoredCard[] {
    const rows: unknown[] = this.database
      .getConnection()
      .prepare('SELECT * FROM accepted_cards ORDER BY accepted_at ASC, rowid ASC')
      .all();
    return rows.map(rowToStoredCard);
  }

  count(): number {
    const row: unknown = this.database
      .getConnection()
      .prepare('SELECT COUNT(*) AS n FROM accepted_cards')
      .get();
    const n: unknown = typeof row === 'object' && row !== null ? Reflect.get(row, 'n') : 0;
    return typeof n === 'number' ? n : 0;
  }
}
