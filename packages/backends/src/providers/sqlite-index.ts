import {
  BackendError,
  Capability,
  NotFoundError,
  cosineSimilarity,
  rankByScore,
  type BackendInput,
  type BackendProperties,
  type BackendReply,
  type BackendSettings,
  type CapabilityName,
  type IndexCommand,
  type VectorMatch,
} from '@semantix/shared';
import type { VectorRepository } from '@semantix/store';
import { Backend } from '../backend.js';

/**
 * Vector index persisted through the store's VectorRepository.
 * Scoring is a linear cosine scan over the index's rows.
 */
export class SqliteVectorIndex extends Backend {
  readonly name = 'sqlite-index';
  readonly capabilities: CapabilityName[] = [Capability.Indexing];

  constructor(private vectors: VectorRepository) {
    super();
  }

  async invoke(input: BackendInput): Promise<BackendReply> {
    if (input.kind !== 'index') {
      throw new BackendError(this.name, `unsupported input kind '${input.kind}'`);
    }
    return this.execute(input.command);
  }

  properties(): BackendProperties {
    return {};
  }

  command(_settings: BackendSettings): void {
    // Nothing to configure at runtime
  }

  private execute(command: IndexCommand): boolean | number | VectorMatch[] {
    switch (command.op) {
      case 'register': {
        const exists = this.vectors.hasIndex(command.index);
        if (exists && !command.overwrite) return false;
        if (exists) this.vectors.dropIndex(command.index);
        this.vectors.createIndex(command.index);
        return true;
      }
      case 'exists':
        return this.vectors.hasIndex(command.index);
      case 'upsert':
        this.requireIndex(command.index);
        return this.vectors.insert(command.index, command.entries);
      case 'query': {
        this.requireIndex(command.index);
        const scored = this.vectors.entries(command.index).map(entry => ({
          score: cosineSimilarity(command.vector, entry.vector),
          metadata: entry.metadata,
        }));
        return rankByScore(scored, command.topK);
      }
      case 'drop':
        return this.vectors.dropIndex(command.index);
    }
  }

  private requireIndex(index: string): void {
    if (!this.vectors.hasIndex(index)) throw new NotFoundError('Index', index);
  }
}
