/**
 * SQL schema for the run state database
 *
 * Two tables: the processed-source ledger and the accepted cards that seed
 * the similarity index on the next run.
 *
 * @module services/storage/schema
 */

/** Current schema version */
export const SCHEMA_VERSION = 1;

/**
 * Pragmas applied on every open. synchronous = FULL makes each committed
 * ledger mark durable before the pipeline moves on.
 */
export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA synchronous = FULL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA busy_timeout = 5000',
] as const;

export const CREATE_SCHEMA_VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS schema_version (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

/**
 * One row per source that completed the pipeline. Upserted by source_id.
 */
export const CREATE_PROCESSED_SOURCES_TABLE = `
CREATE TABLE IF NOT EXISTS processed_sources (
  source_id TEXT PRIMARY KEY,
  origin_kind TEXT NOT NULL CHECK (origin_kind IN ('url', 'file')),
  origin TEXT NOT NULL,
  title TEXT NOT NULL,
  processed_at TEXT NOT NULL,
  status TEXT NOT NULL CHECK (status IN ('exported', 'all_duplicates', 'no_candidates')),
  generated INTEGER NOT NULL DEFAULT 0,
  accepted INTEGER NOT NULL DEFAULT 0,
  rejected INTEGER NOT NULL DEFAULT 0,
  export_failures INTEGER NOT NULL DEFAULT 0,
  deck TEXT NOT NULL
)
`;

/**
 * Accepted cards. Signatures are not stored: they depend on the backend
 * and corpus of the run that loads them.
 */
export const CREATE_ACCEPTED_CARDS_TABLE = `
CREATE TABLE IF NOT EXISTS accepted_cards (
  id TEXT PRIMARY KEY,
  source_id TEXT NOT NULL,
  kind TEXT NOT NULL CHECK (kind IN ('cloze', 'basic')),
  fields_json TEXT NOT NULL,
  normalized_text TEXT NOT NULL,
  created_at TEXT NOT NULL,
  accepted_at TEXT NOT NULL
)
`;

export const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_processed_sources_processed_at ON processed_sources(processed_at)',
  'CREATE INDEX IF NOT EXISTS idx_accepted_cards_source_id ON accepted_cards(source_id)',
  'CREATE INDEX IF NOT EXISTS idx_accepted_cards_accepted_at ON accepted_cards(accepted_at)',
] as const;

export const TABLE_DEFINITIONS = [
  CREATE_SCHEMA_VERSION_TABLE,
  CREATE_PROCESSED_SOURCES_TABLE,
  CREATE_ACCEPTED_CARDS_TABLE,
] as const;
