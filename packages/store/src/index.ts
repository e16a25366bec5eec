// ── Database & Migrations ────────────────────────────────────────
export { openDatabase, getDatabase, closeDatabase, createTestDatabase, _resetSingleton, DEFAULT_DB_PATH, IN_MEMORY } from './database.js';
export type { DatabaseOptions } from './database.js';
export { runMigrations, getCurrentVersion } from './migrations.js';
export type { Migration } from './migrations.js';
export { allMigrations } from './migrations/index.js';

// ── Repositories ─────────────────────────────────────────────────
export { VectorRepository } from './repositories/vector.repository.js';
export type { VectorEntryRow, VectorEntryData } from './repositories/vector.repository.js';

export { ConversationRepository } from './repositories/conversation.repository.js';
export type { ConversationRow, ConversationTurnRow } from './repositories/conversation.repository.js';

// ── Store ────────────────────────────────────────────────────────

import type Database from 'better-sqlite3';
import { getDatabase } from './database.js';
import { VectorRepository } from './repositories/vector.repository.js';
import { ConversationRepository } from './repositories/conversation.repository.js';

export interface SemantixStore {
  db: Database.Database;
  vectors: VectorRepository;
  conversations: ConversationRepository;
}

/**
 * Open (or create) the process-wide database and return the repositories.
 *
 * @param dbPath - Defaults to `.semantix/semantix.db` under the working directory.
 */
export function initializeStore(dbPath?: string): SemantixStore {
  const db = getDatabase({ dbPath });

  return {
    db,
    vectors: new VectorRepository(db),
    conversations: new ConversationRepository(db),
  };
}
