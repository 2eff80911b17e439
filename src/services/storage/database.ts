/**
 * StateDatabase - SQLite file holding the ledger and accepted cards
 *
 * Opened once at run start and closed at run end. All SQL goes through
 * prepared statements.
 *
 * @module services/storage/database
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import {
  CREATE_INDEXES,
  DATABASE_PRAGMAS,
  SCHEMA_VERSION,
  TABLE_DEFINITIONS,
} from './schema.js';

export enum StorageErrorCode {
  OPEN_FAILED = 'OPEN_FAILED',
  PRAGMA_FAILED = 'PRAGMA_FAILED',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  CORRUPT_ROW = 'CORRUPT_ROW',
  DATABASE_CLOSED = 'DATABASE_CLOSED',
}

export class StorageError extends Error {
  constructor(
    message: string,
    public readonly code: StorageErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'StorageError';
  }
}

function configurePragmas(db: Database.Database): void {
  for (const pragma of DATABASE_PRAGMAS) {
    try {
      db.exec(pragma);
    } catch (error) {
      throw new StorageError(`Failed to set pragma: ${pragma}`, StorageErrorCode.PRAGMA_FAILED, error);
    }
  }
}

/**
 * Version stamped in schema_version, or 0 for a fresh file
 */
export function readSchemaVersion(db: Database.Database): number {
  const row: unknown = db.prepare('SELECT version FROM schema_version WHERE id = 1').get();
  if (typeof row === 'object' && row !== null) {
    const version: unknown = Reflect.get(row, 'version');
    if (typeof version === 'number') return version;
  }
  return 0;
}

function initializeSchema(db: Database.Database): void {
  // Version is stamped last, so a crash mid-init leaves version 0 and a clean re-init
  db.transaction(() => {
    for (const sql of TABLE_DEFINITIONS) db.exec(sql);
    for (const sql of CREATE_INDEXES) db.exec(sql);

    const now = new Date().toISOString();
    db.prepare(
      `INSERT INTO schema_version (id, version, created_at, updated_at) VALUES (1, ?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET version = excluded.version, updated_at = excluded.updated_at`
    ).run(SCHEMA_VERSION, now, now);
  })();
}

export class StateDatabase {
  private readonly db: Database.Database;
  private readonly path: string;
  private closed = false;

  private constructor(db: Database.Database, path: string) {
    this.db = db;
    this.path = path;
  }

  /**
   * Open (creating if needed) the state database at `dbPath`.
   * Pass ':memory:' for a throwaway database.
   *
   * @throws StorageError if the file cannot be opened or was written by a newer schema
   */
  static open(dbPath: string): StateDatabase {
    if (dbPath !== ':memory:') {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true, mode: 0o700 });
      }
    }

    let db: Database.Database;
    try {
      db = new Database(dbPath);
    } catch (error) {
      throw new StorageError(
        `Failed to open state database at ${dbPath}: ${error instanceof Error ? error.message : String(error)}`,
        StorageErrorCode.OPEN_FAILED,
        error
      );
    }

    try {
      configurePragmas(db);
      db.exec(TABLE_DEFINITIONS[0]);
      const version = readSchemaVersion(db);
      if (version > SCHEMA_VERSION) {
        throw new StorageError(
          `State database ${dbPath} has schema version ${version}, newer than supported ${SCHEMA_VERSION}`,
          StorageErrorCode.SCHEMA_MISMATCH
        );
      }
      initializeSchema(db);
    } catch (error) {
      db.close();
      if (error instanceof StorageError) throw error;
      throw new StorageError(
        `Failed to initialize state database at ${dbPath}: ${error instanceof Error ? error.message : String(error)}`,
        StorageErrorCode.OPEN_FAILED,
        error
      );
    }

    return new StateDatabase(db, dbPath);
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  getPath(): string {
    return this.path;
  }

  /**
   * Underlying connection for the stores built on this database
   *
   * @throws StorageError after close()
   */
  getConnection(): Database.Database {
    if (this.closed) {
      throw new StorageError(`State database ${this.path} is closed`, StorageErrorCode.DATABASE_CLOSED);
    }
    return this.db;
  }

  transaction<T>(fn: () => T): T {
    return this.getConnection().transaction(fn)();
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      this.db.pragma('optimize');
    } catch (error) {
      console.error(
        '[StateDatabase] pragma optimize failed:',
        error instanceof Error ? error.message : String(error)
      );
    }
    this.db.close();
  }
}
