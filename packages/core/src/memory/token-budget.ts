import {
  Capability,
  ConfigurationError,
  DEFAULT_CONTEXT_WINDOW,
  MEMORY_MARKER,
  type CapabilityName,
} from '@semantix/shared';
import { SemanticValue, type ValueOptions } from '../value.js';
import { Memory } from './memory.js';

export interface TokenBudgetMemoryOptions extends ValueOptions {
  /** Share of the context window the buffer may fill, in (0, 1]. Defaults to the runtime's */
  tokenRatio?: number;
  /** Context window in tokens. Read from the backend when absent */
  maxTokens?: () => number;
  /** Capability whose backend reports `maxTokens` */
  capability?: CapabilityName;
}

/**
 * Text buffer of marker-terminated entries kept under
 * `maxTokens() * tokenRatio` tokens by dropping whole space-delimited units
 * from the front.
 */
export class TokenBudgetMemory extends Memory<SemanticValue> {
  static typeTag = 'TokenBudgetMemory';

  readonly marker = MEMORY_MARKER;
  readonly tokenRatio: number;

  private buffer = '';
  private readonly maxTokensSource?: () => number;
  private readonly capability: CapabilityName;

  constructor(options: TokenBudgetMemoryOptions = {}) {
    super(undefined, options);
    const ratio = options.tokenRatio ?? this.runtime.memory.tokenRatio;
    if (!(ratio > 0 && ratio <= 1)) {
      throw new ConfigurationError(`tokenRatio must be in (0, 1], got ${ratio}`);
    }
    this.tokenRatio = ratio;
    this.maxTokensSource = options.maxTokens;
    this.capability = options.capability ?? Capability.Reasoning;
  }

  maxTokens(): number {
    if (this.maxTokensSource) return this.maxTokensSource();
    return this.property(this.capability, 'maxTokens') ?? DEFAULT_CONTEXT_WINDOW;
  }

  /** Raw buffer, markers included. */
  get contents(): string {
    return this.buffer;
  }

  tokens(): number {
    return this.runtime.tokenizer.count(this.buffer);
  }

  async store(text: string): Promise<void> {
    this.buffer += `${text}${this.marker}`;
    const budget = this.maxTokens() * this.tokenRatio;

    let evicted = 0;
    while (this.buffer.length > 0 && this.tokens() > budget) {
      this.buffer = this.buffer.trim().split(' ').slice(1).join(' ');
      evicted++;
    }

    if (evicted > 0) {
      this.runtime.tracer.notice('memory_eviction', { memory: this.typeTag, units: evicted, budget });
    }
  }

  /**
   * Semantic removal through the backend's replace. The buffer is left as
   * the backend returns it, so a missing entry changes nothing.
   */
  async forget(text: string): Promise<void> {
    if (!this.buffer) return;
    const result = await new SemanticValue(this.buffer, { runtime: this.runtime }).remove(text);
    this.buffer = result.toString();
  }

  /** Ask the backend `query` over the whole buffer at once. */
  async recall(query = ''): Promise<SemanticValue> {
    return new SemanticValue(this.history().join(''), { runtime: this.runtime }).query(query);
  }

  drop(): void {
    this.buffer = '';
  }

  /** Stored entries in order, without markers. */
  history(): string[] {
    return this.buffer.split(this.marker).filter(segment => segment.length > 0);
  }

  /** Replace the buffer with a previously saved one. */
  restore(contents: string): void {
    this.buffer = contents;
  }
}
