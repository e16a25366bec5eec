import type Database from 'better-sqlite3';

export interface Migration {
  version: number;
  name: string;
  up(db: Database.Database): void;
}

/**
 * Apply pending migrations in version order, each in its own transaction.
 * Returns the names of the migrations applied by this call.
 */
export function runMigrations(db: Database.Database, migrations: Migration[]): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version    INTEGER PRIMARY KEY,
      name       TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const currentVersion = getCurrentVersion(db);
  const applied: string[] = [];
  const record = db.prepare('INSERT INTO _migrations (version, name) VALUES (?, ?)');

  for (const migration of [...migrations].sort((a, b) => a.version - b.version)) {
    if (migration.version <= currentVersion) continue;

    db.transaction(() => {
      migration.up(db);
      record.run(migration.version, migration.name);
    })();
    applied.push(migration.name);
  }

  return applied;
}

/** Highest applied version, or 0 on a database that has never been migrated. */
export function getCurrentVersion(db: Database.Database): number {
  const table = db
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = '_migrations'")
    .get();
  if (!table) return 0;

  const row = db.prepare('SELECT COALESCE(MAX(version), 0) AS v FROM _migrations').get() as { v: number };
  return row.v;
}
