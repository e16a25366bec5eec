import type { Migration } from '../migrations.js';

export const migration002: Migration = {
  version: 2,
  name: 'conversations',
  up(db) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS conversations (
        id           TEXT PRIMARY KEY,
        type_tag     TEXT NOT NULL,
        memory       TEXT NOT NULL,
        token_ratio  REAL NOT NULL,
        dynamic_ctx  TEXT NOT NULL,
        created_at   TEXT NOT NULL,
        updated_at   TEXT NOT NULL
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_conversations_updated ON conversations(updated_at)');

    db.exec(`
      CREATE TABLE IF NOT EXISTS conversation_turns (
        id              INTEGER PRIMARY KEY AUTOINCREMENT,
        conversation_id TEXT NOT NULL REFERENCES conversations(id) ON DELETE CASCADE,
        role            TEXT NOT NULL,
        content         TEXT NOT NULL,
        timestamp       TEXT NOT NULL
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_turns_conversation ON conversation_turns(conversation_id)');
  },
};
