import type { Migration } from '../migrations.js';

export const migration001: Migration = {
  version: 1,
  name: 'vector-index',
  up(db) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS vector_indices (
        name       TEXT PRIMARY KEY,
        created_at TEXT NOT NULL DEFAULT (datetime('now'))
      )
    `);

    // seq preserves insertion order, which breaks score ties on query
    db.exec(`
      CREATE TABLE IF NOT EXISTS vector_entries (
        seq        INTEGER PRIMARY KEY AUTOINCREMENT,
        index_name TEXT NOT NULL REFERENCES vector_indices(name) ON DELETE CASCADE,
        vector     TEXT NOT NULL,
        text       TEXT NOT NULL,
        metadata   TEXT NOT NULL
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_vector_entries_index ON vector_entries(index_name)');
  },
};
