import {
  ConfigManager,
  createRuntimeFromConfig,
  initializeRuntime,
  type SemanticRuntime,
} from '@semantix/core';
import type { SemantixConfig } from '@semantix/shared';
import { closeDatabase, initializeStore, type SemantixStore } from '@semantix/store';

export interface Session {
  config: SemantixConfig;
  runtime: SemanticRuntime;
  /** Opened when indexing uses SQLite */
  store?: SemantixStore;
}

export interface OpenOptions {
  configPath?: string;
  /** Open the SQLite store even when indexing keeps vectors in memory */
  withStore?: boolean;
}

/**
 * Load configuration and build the process-wide runtime. Callers must
 * `closeSession` when done so the database handle is released.
 */
export async function openSession(options: OpenOptions = {}): Promise<Session> {
  const config = await new ConfigManager().load({ configPath: options.configPath });

  const needsStore = options.withStore === true || config.indexing.provider === 'sqlite';
  const store = needsStore ? initializeStore(config.store.dbPath) : undefined;

  const runtime = initializeRuntime(createRuntimeFromConfig(config, { vectors: store?.vectors }));
  return { config, runtime, store };
}

export function closeSession(session: Session): void {
  if (session.store) closeDatabase();
}

/** Run `body` against an open session and always close it. */
export async function withSession<T>(options: OpenOptions, body: (session: Session) => Promise<T>): Promise<T> {
  const session = await openSession(options);
  try {
    return await body(session);
  } finally {
    closeSession(session);
  }
}
