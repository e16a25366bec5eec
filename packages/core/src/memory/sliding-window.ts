import { NotFoundError } from '@semantix/shared';
import type { ValueOptions } from '../value.js';
import { Memory } from './memory.js';

/** Sizes default to the runtime's memory settings. */
export interface SlidingWindowListMemoryOptions extends ValueOptions {
  windowSize?: number;
  maxSize?: number;
}

/**
 * Keeps at most `maxSize` entries, oldest dropped first; `recall` returns
 * the last `windowSize`.
 */
export class SlidingWindowListMemory extends Memory<string[]> {
  static typeTag = 'SlidingWindowListMemory';

  readonly windowSize: number;
  readonly maxSize: number;

  private entries: string[] = [];

  constructor(options: SlidingWindowListMemoryOptions = {}) {
    super(undefined, options);
    this.windowSize = options.windowSize ?? this.runtime.memory.windowSize;
    this.maxSize = options.maxSize ?? this.runtime.memory.maxSize;
  }

  get size(): number {
    return this.entries.length;
  }

  async store(text: string): Promise<void> {
    this.entries.push(text);
    if (this.entries.length > this.maxSize) {
      this.entries = this.entries.slice(-this.maxSize);
    }
  }

  /** Removes the first exact match; throws NotFoundError when there is none. */
  async forget(text: string): Promise<void> {
    const idx = this.entries.indexOf(text);
    if (idx === -1) throw new NotFoundError('Memory entry', text);
    this.entries.splice(idx, 1);
  }

  async recall(): Promise<string[]> {
    return this.windowSize > 0 ? this.entries.slice(-this.windowSize) : [];
  }

  all(): string[] {
    return [...this.entries];
  }
}
