import Database from 'better-sqlite3';
import * as path from 'node:path';
import * as fs from 'node:fs';
import { SemantixError } from '@semantix/shared';
import { runMigrations, type Migration } from './migrations.js';
import { allMigrations } from './migrations/index.js';

export const DEFAULT_DB_PATH = '.semantix/semantix.db';
export const IN_MEMORY = ':memory:';

export interface DatabaseOptions {
  /** File path or `:memory:`. Defaults to .semantix/semantix.db under the working directory */
  dbPath?: string;
  /** Applied on open. Pass [] to open the schema as it is */
  migrations?: Migration[];
}

let instance: { db: Database.Database; dbPath: string } | null = null;

/**
 * Open a connection with the store's pragmas and an up-to-date schema.
 * Each call returns a new connection.
 */
export function openDatabase(options: DatabaseOptions = {}): Database.Database {
  const dbPath = resolveDbPath(options.dbPath);

  if (dbPath !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  // WAL needs a file; in-memory databases keep their own journal
  if (dbPath !== IN_MEMORY) db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');

  runMigrations(db, options.migrations ?? allMigrations);
  return db;
}

/**
 * The process-wide connection, opened on first use. Asking for another file
 * while one is open is an error; close it first.
 */
export function getDatabase(options: DatabaseOptions = {}): Database.Database {
  const dbPath = resolveDbPath(options.dbPath);
  if (instance) {
    if (instance.dbPath !== dbPath) {
      throw new SemantixError(`Database already open at ${instance.dbPath}; close it before opening ${dbPath}`);
    }
    return instance.db;
  }

  const db = openDatabase({ ...options, dbPath });
  instance = { db, dbPath };
  return db;
}

export function closeDatabase(): void {
  if (instance) {
    instance.db.close();
    instance = null;
  }
}

/** Forget the singleton without closing it. Test-only. */
export function _resetSingleton(): void {
  instance = null;
}

/** Fresh, isolated in-memory database for tests, migrated unless told otherwise. */
export function createTestDatabase(migrations: Migration[] = allMigrations): Database.Database {
  return openDatabase({ dbPath: IN_MEMORY, migrations });
}

function resolveDbPath(dbPath: string | undefined): string {
  if (dbPath === IN_MEMORY) return dbPath;
  return path.resolve(dbPath ?? DEFAULT_DB_PATH);
}
