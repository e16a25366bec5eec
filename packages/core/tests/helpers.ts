import {
  Capability,
  OperationKind,
  type BackendInput,
  type BackendProperties,
  type BackendSettings,
  type CapabilityName,
  type InvokeOptions,
  type PromptInput,
} from '@semantix/shared';
import { Backend, BackendRegistry, MemoryVectorIndex } from '@semantix/backends';
import { SemanticRuntime, type RuntimeOptions } from '../src/runtime.js';
import { WhitespaceTokenizer } from '../src/tokenizer.js';

type Handler = (input: PromptInput, options: InvokeOptions) => unknown;

/** Reasoning double: answers each operation with a scripted handler and counts calls. */
export class ScriptedBackend extends Backend {
  readonly name = 'scripted';
  readonly capabilities: CapabilityName[] = [Capability.Reasoning];
  readonly calls: Array<{ input: PromptInput; options: InvokeOptions }> = [];
  readonly settings: BackendSettings[] = [];

  constructor(
    private handlers: Partial<Record<OperationKind, Handler>> = {},
    private maxTokens?: number,
  ) {
    super();
  }

  on(kind: OperationKind, handler: Handler): this {
    this.handlers[kind] = handler;
    return this;
  }

  async invoke(input: BackendInput, options: InvokeOptions): Promise<unknown> {
    if (input.kind !== 'prompt') throw new Error(`scripted backend got '${input.kind}'`);
    this.calls.push({ input, options });
    const handler = this.handlers[input.operation];
    return handler ? handler(input, options) : '';
  }

  properties(): BackendProperties {
    return { model: 'scripted', maxTokens: this.maxTokens };
  }

  command(settings: BackendSettings): void {
    this.settings.push(settings);
  }
}

/** Embedding double: word counts hashed into a fixed number of buckets. */
export class HashingEmbedder extends Backend {
  readonly name = 'hashing-embedder';
  readonly capabilities: CapabilityName[] = [Capability.Embedding];
  calls = 0;

  constructor(private dimensions = 32) {
    super();
  }

  async invoke(input: BackendInput): Promise<number[][]> {
    if (input.kind !== 'embed') throw new Error(`embedder got '${input.kind}'`);
    this.calls++;
    return input.texts.map(text => this.vectorize(text));
  }

  properties(): BackendProperties {
    return { dimensions: this.dimensions };
  }

  command(): void {}

  private vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const word of text.toLowerCase().split(/\W+/)) {
      if (!word) continue;
      let hash = 0;
      for (const char of word) hash = (hash * 31 + char.charCodeAt(0)) % this.dimensions;
      vector[hash] += 1;
    }
    return vector;
  }
}

export interface TestRuntime {
  runtime: SemanticRuntime;
  reasoning: ScriptedBackend;
  embedder: HashingEmbedder;
  index: MemoryVectorIndex;
}

export function createTestRuntime(options: { maxTokens?: number; memory?: RuntimeOptions['memory'] } = {}): TestRuntime {
  const reasoning = new ScriptedBackend({}, options.maxTokens);
  const embedder = new HashingEmbedder();
  const index = new MemoryVectorIndex();
  const registry = new BackendRegistry();
  registry.configure(Capability.Reasoning, reasoning);
  registry.configure(Capability.Embedding, embedder);
  registry.configure(Capability.Indexing, index);
  const runtime = new SemanticRuntime({ registry, tokenizer: new WhitespaceTokenizer(), memory: options.memory });
  return { runtime, reasoning, embedder, index };
}
