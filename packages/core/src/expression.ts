import { SemanticValue, type ValueOptions } from './value.js';

/**
 * A value that computes something when called. Results of operators on an
 * expression are plain values unless `setReturnClass` says otherwise.
 */
export abstract class Expression<TResult = SemanticValue> extends SemanticValue {
  static typeTag = 'Expression';

  private resultClass: typeof SemanticValue = SemanticValue;

  constructor(payload?: unknown, options: ValueOptions = {}) {
    super(payload, options);
  }

  get returnClass(): typeof SemanticValue {
    return this.resultClass;
  }

  setReturnClass(valueClass: typeof SemanticValue): void {
    this.resultClass = valueClass;
  }

  abstract forward(...args: unknown[]): Promise<TResult>;
}
