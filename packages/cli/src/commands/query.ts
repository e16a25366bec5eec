import { Command } from 'commander';
import { Indexer } from '@semantix/core';
import { SemantixError } from '@semantix/shared';
import { withSession } from '../setup.js';
import { formatMatches } from '../output/formatter.js';

export function parseTopK(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const topK = Number(value);
  if (!Number.isInteger(topK) || topK < 1) {
    throw new SemantixError(`--top-k must be a positive integer, got '${value}'`);
  }
  return topK;
}

export const queryCommand = new Command('query')
  .description('Return the chunks of an index nearest to a text')
  .argument('<index>', 'Index name')
  .argument('<text>', 'Query text')
  .option('-k, --top-k <n>', 'Number of matches')
  .option('-c, --config <path>', 'Config file to read instead of searching')
  .action(async (index: string, text: string, options: { topK?: string; config?: string }) => {
    await withSession({ configPath: options.config }, async ({ config, runtime }) => {
      const topK = parseTopK(options.topK, config.indexing.topK);
      const indexer = new Indexer({ runtime, indexName: index, topK });

      if (!(await indexer.exists())) {
        console.error(`Index not found: ${index}`);
        process.exitCode = 1;
        return;
      }

      console.log(formatMatches(await indexer.search(text)));
    });
  });
