/**
 * Storage test helpers: a state database in a fresh temp directory
 */

import { join } from 'path';
import { StateDatabase } from '../../../src/services/storage/database.js';
import type { LedgerRecord } from '../../../src/models/ledger.js';
import { cleanupTempDir, createTempDir } from '../../setup/fixtures.js';

export interface TestDatabase {
  dir: string;
  path: string;
  db: StateDatabase;
  cleanup(): void;
}

export function createTestDatabase(): TestDatabase {
  const dir = createTempDir('state');
  const path = join(dir, 'nested', 'state.db');
  const db = StateDatabase.open(path);
  return {
    dir,
    path,
    db,
    cleanup: () => {
      db.close();
      cleanupTempDir(dir);
    },
  };
}

export function ledgerRecord(sourceId: string, overrides: Partial<LedgerRecord> = {}): LedgerRecord {
  return {
    sourceId,
    origin: { kind: 'url', url: `https://example.test/${sourceId}` },
    title: `Article ${sourceId}`,
    processedAt: '2024-05-01T10:00:00.000Z',
    outcome: {
      status: 'exported',
      generated: 4,
      accepted: 3,
      rejected: 1,
      exportFailures: 0,
      deck: 'Default',
    },
    ...overrides,
  };
}
