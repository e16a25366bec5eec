import { Expression } from '../expression.js';

/** A store of text a caller can add to, remove from and recall. */
export abstract class Memory<TRecall> extends Expression<TRecall> {
  static typeTag = 'Memory';

  abstract store(text: string): Promise<void>;
  abstract forget(text: string): Promise<void>;
  abstract recall(query?: string): Promise<TRecall>;

  forward(query?: string): Promise<TRecall> {
    return this.recall(query);
  }
}
