import fs from 'node:fs/promises';
import path from 'node:path';
import { SemantixError } from '@semantix/shared';
import { Expression } from '../expression.js';
import type { SemanticValue } from '../value.js';
import { FileReader } from './file-reader.js';
import { Indexer, type IndexerOptions } from './indexer.js';

export type DocumentSource = { path: string } | { text: string };

export interface DocumentRetrieverOptions extends IndexerOptions {
  /** Rebuild the index even when it exists */
  overwrite?: boolean;
  reader?: FileReader;
  /** Write the indexed source text here after building */
  dumpPath?: string;
}

/**
 * An index over one document. Opening reads and indexes the source only when
 * the index is absent or `overwrite` is set; otherwise it queries what is
 * already there.
 */
export class DocumentRetriever extends Expression<SemanticValue> {
  static typeTag = 'DocumentRetriever';

  private constructor(
    readonly indexer: Indexer,
    /** Source text, when this instance built the index */
    readonly text: string | null,
  ) {
    super(undefined, { runtime: indexer.runtime });
  }

  static async open(source: DocumentSource, options: DocumentRetrieverOptions = {}): Promise<DocumentRetriever> {
    const indexer = new Indexer(options);

    // register is false for an existing index unless overwrite is set
    if (!(await indexer.register(options.overwrite ?? false))) {
      return new DocumentRetriever(indexer, null);
    }

    const text = 'path' in source
      ? await (options.reader ?? new FileReader()).read(source.path)
      : source.text;
    await indexer.index(text);

    const retriever = new DocumentRetriever(indexer, text);
    if (options.dumpPath) await retriever.dump(options.dumpPath);
    return retriever;
  }

  get indexName(): string {
    return this.indexer.indexName;
  }

  forward(query: string, topK?: number): Promise<SemanticValue> {
    return this.indexer.query(query, topK);
  }

  async dump(filePath: string): Promise<void> {
    if (this.text === null) {
      throw new SemantixError(`No source text to dump for index '${this.indexName}'`);
    }
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, this.text, 'utf-8');
  }
}
