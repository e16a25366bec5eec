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
  type VectorEntryInput,
  type VectorMatch,
} from '@semantix/shared';
import { Backend } from '../backend.js';

/**
 * In-process vector index. Entries live for the lifetime of the instance.
 */
export class MemoryVectorIndex extends Backend {
  readonly name = 'memory-index';
  readonly capabilities: CapabilityName[] = [Capability.Indexing];

  private indices = new Map<string, VectorEntryInput[]>();

  async invoke(input: BackendInput): Promise<BackendReply> {
    if (input.kind !== 'index') {
      throw new BackendError(this.name, `unsupported input kind '${input.kind}'`);
    }
    return this.execute(input.command);
  }

  properties(): BackendProperties {
    return {};
  }

  command(settings: BackendSettings): void {
    if (settings.reset === true) this.indices.clear();
  }

  private execute(command: IndexCommand): boolean | number | VectorMatch[] {
    switch (command.op) {
      case 'register': {
        if (this.indices.has(command.index) && !command.overwrite) return false;
        this.indices.set(command.index, []);
        return true;
      }
      case 'exists':
        return this.indices.has(command.index);
      case 'upsert': {
        const entries = this.entries(command.index);
        entries.push(...command.entries);
        return command.entries.length;
      }
      case 'query': {
        const scored = this.entries(command.index).map(entry => ({
          score: cosineSimilarity(command.vector, entry.vector),
          metadata: { ...entry.metadata },
        }));
        return rankByScore(scored, command.topK);
      }
      case 'drop':
        return this.indices.delete(command.index);
    }
  }

  private entries(index: string): VectorEntryInput[] {
    const entries = this.indices.get(index);
    if (!entries) throw new NotFoundError('Index', index);
    return entries;
  }
}
