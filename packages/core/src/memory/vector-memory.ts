import { generateId } from '@semantix/shared';
import type { ValueOptions } from '../value.js';
import { Indexer } from '../retrieval/indexer.js';
import { Memory } from './memory.js';

export interface VectorMemoryOptions extends ValueOptions {
  /** A disabled memory stores nothing and recalls nothing */
  enabled?: boolean;
  topK?: number;
  /** Defaults to a fresh name, so unnamed memories never share an index */
  indexName?: string;
}

/** Entries embedded into a vector index; recall returns the nearest texts. */
export class VectorMemory extends Memory<string[]> {
  static typeTag = 'VectorMemory';

  readonly enabled: boolean;
  readonly topK: number;

  private indexer: Indexer;
  private registered = false;

  constructor(options: VectorMemoryOptions = {}) {
    super(undefined, options);
    this.enabled = options.enabled ?? true;
    this.topK = options.topK ?? 3;
    this.indexer = new Indexer({
      runtime: this.runtime,
      indexName: options.indexName ?? generateId('memory'),
      topK: this.topK,
    });
  }

  async store(text: string): Promise<void> {
    if (!this.enabled) return;
    await this.ensureIndex();
    await this.indexer.add([text]);
  }

  async forget(): Promise<void> {
    // Vector entries are append-only
  }

  async recall(query = ''): Promise<string[]> {
    if (!this.enabled) return [];
    if (!(await this.indexer.exists())) return [];
    return this.indexer.search(query, this.topK);
  }

  private async ensureIndex(): Promise<void> {
    if (this.registered) return;
    await this.indexer.register(false);
    this.registered = true;
  }
}
