import { z } from 'zod';
import {
  DEFAULT_INDEX_NAME,
  DEFAULT_TOP_K,
  SemantixError,
  vectorMatchSchema,
  type IndexCommand,
  type VectorEntryInput,
} from '@semantix/shared';
import { Expression } from '../expression.js';
import { indexOperation } from '../operations.js';
import { SemanticValue, type ValueOptions } from '../value.js';
import { ParagraphFormatter, type Formatter } from './paragraph-formatter.js';

export interface IndexerOptions extends ValueOptions {
  indexName?: string;
  topK?: number;
  formatter?: Formatter;
}

const vectorsSchema = z.array(z.array(z.number()));
const matchesSchema = z.array(vectorMatchSchema);

/**
 * Chunk → embed → upsert, and embed → top-k for queries. Every step is a
 * dispatch: embeddings go through the `embedding` capability, index
 * commands through `indexing`.
 */
export class Indexer extends Expression<SemanticValue> {
  static typeTag = 'Indexer';

  readonly indexName: string;
  readonly topK: number;
  readonly formatter: Formatter;

  constructor(options: IndexerOptions = {}) {
    super(undefined, options);
    this.indexName = options.indexName ?? DEFAULT_INDEX_NAME;
    this.topK = options.topK ?? DEFAULT_TOP_K;
    this.formatter = options.formatter ?? new ParagraphFormatter();
  }

  /** Creates the index. False when it already existed and `overwrite` is off. */
  async register(overwrite = false): Promise<boolean> {
    const reply = await this.command({ op: 'register', index: this.indexName, overwrite });
    return reply.payload === true;
  }

  async exists(): Promise<boolean> {
    const reply = await this.command({ op: 'exists', index: this.indexName });
    return reply.payload === true;
  }

  async drop(): Promise<boolean> {
    const reply = await this.command({ op: 'drop', index: this.indexName });
    return reply.payload === true;
  }

  /** Format `text` into chunks and add each one. Returns the number stored. */
  async index(text: string): Promise<number> {
    return this.add(this.formatter.format(text));
  }

  /** Embed each chunk on its own and upsert them in one command. */
  async add(chunks: string[]): Promise<number> {
    if (chunks.length === 0) return 0;

    const entries: VectorEntryInput[] = [];
    for (const [chunk, text] of chunks.entries()) {
      entries.push({
        vector: await this.embedText(text),
        metadata: { text, chunk, indexName: this.indexName },
      });
    }

    const reply = await this.command({ op: 'upsert', index: this.indexName, entries });
    return typeof reply.payload === 'number' ? reply.payload : entries.length;
  }

  /** Texts of the top-k matches, best first. */
  async search(text: string, topK = this.topK): Promise<string[]> {
    const vector = await this.embedText(text);
    const reply = await this.command({ op: 'query', index: this.indexName, vector, topK });
    return matchesSchema.parse(reply.payload).map(match => match.metadata.text);
  }

  async query(text: string, topK?: number): Promise<SemanticValue> {
    return new SemanticValue(await this.search(text, topK), { runtime: this.runtime });
  }

  forward(text: string, topK?: number): Promise<SemanticValue> {
    return this.query(text, topK);
  }

  private command(command: IndexCommand): Promise<SemanticValue> {
    return this.call(indexOperation(command), [], {}, SemanticValue);
  }

  private async embedText(text: string): Promise<number[]> {
    const reply = await new SemanticValue(text, { runtime: this.runtime }).embed();
    const [vector] = vectorsSchema.parse(reply.payload);
    if (!vector) throw new SemantixError('Embedding backend returned no vector');
    return vector;
  }
}
