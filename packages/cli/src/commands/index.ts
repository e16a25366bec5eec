import * as path from 'node:path';
import { Command } from 'commander';
import { DocumentRetriever } from '@semantix/core';
import { DEFAULT_INDEX_NAME, type StoreConfig } from '@semantix/shared';
import { withSession } from '../setup.js';

/** `--dump` wins; otherwise `<dumpDir>/<index>/dump_file` when a dump directory is configured. */
export function resolveDumpPath(dump: string | undefined, store: StoreConfig, indexName: string): string | undefined {
  if (dump) return dump;
  return store.dumpDir ? path.join(store.dumpDir, indexName, 'dump_file') : undefined;
}

export const indexCommand = new Command('index')
  .description('Chunk, embed and store a document in a vector index')
  .argument('<file>', 'Path or http(s) URL of the document')
  .option('-n, --name <index>', 'Index name', DEFAULT_INDEX_NAME)
  .option('--overwrite', 'Rebuild the index if it exists', false)
  .option('--dump <path>', 'Also write the indexed text to this path (defaults under store.dumpDir)')
  .option('-c, --config <path>', 'Config file to read instead of searching')
  .action(async (file: string, options: { name: string; overwrite: boolean; dump?: string; config?: string }) => {
    await withSession({ configPath: options.config }, async ({ config, runtime }) => {
      if (config.indexing.provider === 'memory') {
        console.warn('Indexing provider is "memory"; the index is lost when this command exits.');
      }

      const retriever = await DocumentRetriever.open(
        { path: file },
        { runtime, indexName: options.name, overwrite: options.overwrite, dumpPath: resolveDumpPath(options.dump, config.store, options.name) },
      );

      if (retriever.text === null) {
        console.log(`Index "${options.name}" already exists; use --overwrite to rebuild it.`);
      } else {
        console.log(`Indexed ${file} into "${options.name}".`);
      }
    });
  });
