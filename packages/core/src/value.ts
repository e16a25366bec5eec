import {
  AttributeResolutionError,
  OperationKind,
  type BackendProperties,
  type CapabilityName,
  type CompareOperator,
  type LogicOperator,
  type Overrides,
} from '@semantix/shared';
import { renderStaticContext } from './context-registry.js';
import { compareOperation, logicOperation, type Operation } from './operations.js';
import { getRuntime, type SemanticRuntime } from './runtime.js';

export interface ValueOptions {
  metadata?: Record<string, unknown>;
  /** Defaults to the runtime of a wrapped value, then to the process-wide runtime */
  runtime?: SemanticRuntime;
}

/** Key types accepted by item access on arrays and mappings. */
export type ItemKey = string | number;

/**
 * A payload whose operators are answered by a backend.
 *
 * Subtypes set `typeTag` to key their run-time context and `staticContext`
 * to prepend fixed instructions to every request. Dispatch never mutates a
 * value: every operator returns a new one.
 */
export class SemanticValue {
  static typeTag = 'SemanticValue';
  static staticContext = '';

  readonly payload: unknown;
  readonly metadata: Record<string, unknown>;
  readonly runtime: SemanticRuntime;

  private readonly valueClass: typeof SemanticValue;

  constructor(payload?: unknown, options: ValueOptions = {}) {
    this.valueClass = new.target;
    const source = payload instanceof SemanticValue ? payload : undefined;
    this.runtime = options.runtime ?? source?.runtime ?? getRuntime();
    this.metadata = { ...(source?.metadata ?? {}), ...(options.metadata ?? {}) };
    this.payload = unwrap(payload);
  }

  get typeTag(): string {
    return this.valueClass.typeTag;
  }

  get staticContext(): string {
    return renderStaticContext(this.valueClass.staticContext);
  }

  get dynamicContext(): string {
    return this.runtime.contexts.render(this.typeTag);
  }

  get globalContext(): string {
    return this.staticContext + this.dynamicContext;
  }

  /** Class used to wrap dispatch results when the operation names none. */
  get returnClass(): typeof SemanticValue {
    return this.valueClass;
  }

  /** Wrap a raw value in this value's return class and runtime. */
  derive(payload: unknown): SemanticValue {
    return new this.returnClass(payload, { runtime: this.runtime });
  }

  toString(): string {
    return renderPayload(this.payload);
  }

  /** String form of each element of an array payload, else the whole string form. */
  textItems(): string[] {
    return Array.isArray(this.payload) ? this.payload.map(renderPayload) : [this.toString()];
  }

  toBoolean(): boolean {
    if (this.payload === null || this.payload === undefined) return false;
    if (typeof this.payload === 'boolean') return this.payload;
    return true;
  }

  /** Token count of the string form, by the runtime's tokenizer. */
  get length(): number {
    return this.runtime.tokenizer.count(this.toString());
  }

  // ── Local sugar ──────────────────────────────────────────────────

  concat(other: unknown): SemanticValue {
    return new SemanticValue(this.toString() + renderPayload(other), { runtime: this.runtime });
  }

  split(separator: unknown): SemanticValue {
    return new SemanticValue(this.toString().split(renderPayload(separator)), { runtime: this.runtime });
  }

  /**
   * Get-or-delegate: a property of this wrapper, else a property of the
   * payload. Methods found on the payload come back bound to it.
   */
  attribute(name: string): unknown {
    if (Reflect.has(this, name)) {
      return Reflect.get(this, name);
    }
    try {
      if (this.payload === null || this.payload === undefined) {
        throw new TypeError(`payload is ${String(this.payload)}`);
      }
      const holder = Object(this.payload);
      if (!Reflect.has(holder, name)) {
        throw new TypeError(`'${typeof this.payload}' payload has no attribute '${name}'`);
      }
      const found: unknown = Reflect.get(holder, name);
      return typeof found === 'function' ? found.bind(this.payload) : found;
    } catch (err) {
      throw new AttributeResolutionError(name, err);
    }
  }

  // ── Dispatched operators ─────────────────────────────────────────

  async equals(other: unknown, overrides?: Overrides): Promise<boolean> {
    return (await this.call(OperationKind.Equals, [other], overrides)).toBoolean();
  }

  async notEquals(other: unknown, overrides?: Overrides): Promise<boolean> {
    return !(await this.equals(other, overrides));
  }

  /** Set and Map payloads holding the operand answer locally. */
  async contains(other: unknown, overrides?: Overrides): Promise<boolean> {
    const needle = other instanceof SemanticValue ? other.payload : other;
    if ((this.payload instanceof Set || this.payload instanceof Map) && this.payload.has(needle)) {
      return true;
    }
    return (await this.call(OperationKind.Contains, [other], overrides)).toBoolean();
  }

  async isInstanceOf(typeName: string, overrides?: Overrides): Promise<boolean> {
    return (await this.call(OperationKind.IsInstanceOf, [typeName], overrides)).toBoolean();
  }

  async compare(operator: CompareOperator, other: unknown, overrides?: Overrides): Promise<boolean> {
    return (await this.call(compareOperation(operator), [other], overrides)).toBoolean();
  }

  /** In-range array indices and present mapping keys answer locally. */
  async getItem(key: ItemKey, overrides?: Overrides): Promise<SemanticValue> {
    const local = lookupLocal(this.payload, key);
    if (local.found) return new SemanticValue(local.value, { runtime: this.runtime });
    return this.call(OperationKind.GetItem, [key], overrides, SemanticValue);
  }

  /** New value with the item set. Arrays and mappings update a copy locally. */
  async setItem(key: ItemKey, value: unknown, overrides?: Overrides): Promise<SemanticValue> {
    const item = value instanceof SemanticValue ? value.payload : value;
    if (Array.isArray(this.payload) && isIndex(key, this.payload.length)) {
      const copy = [...this.payload];
      copy[Number(key)] = item;
      return this.derive(copy);
    }
    if (this.payload instanceof Map) {
      return this.derive(new Map(this.payload).set(key, item));
    }
    if (isPlainObject(this.payload)) {
      return this.derive({ ...this.payload, [key]: item });
    }
    return this.call(OperationKind.SetItem, [key, value], overrides);
  }

  /** New value without the item. Mappings holding the key update a copy locally. */
  async deleteItem(key: ItemKey, overrides?: Overrides): Promise<SemanticValue> {
    if (this.payload instanceof Map && this.payload.has(key)) {
      const copy = new Map(this.payload);
      copy.delete(key);
      return this.derive(copy);
    }
    if (isPlainObject(this.payload) && Object.hasOwn(this.payload, key)) {
      const copy = { ...this.payload };
      delete copy[String(key)];
      return this.derive(copy);
    }
    return this.call(OperationKind.DeleteItem, [key], overrides);
  }

  negate(overrides?: Overrides): Promise<SemanticValue> {
    return this.call(OperationKind.Negate, [], overrides);
  }

  invert(overrides?: Overrides): Promise<SemanticValue> {
    return this.call(OperationKind.Invert, [], overrides);
  }

  include(information: unknown, overrides?: Overrides): Promise<SemanticValue> {
    return this.call(OperationKind.Include, [information], overrides);
  }

  combine(other: unknown, overrides?: Overrides): Promise<SemanticValue> {
    return this.call(OperationKind.Combine, [other], overrides);
  }

  /** Semantic removal: replaces matches of `other` with nothing. */
  remove(other: unknown, overrides?: Overrides): Promise<SemanticValue> {
    return this.replace(other, '', overrides);
  }

  replace(target: unknown, replacement: unknown, overrides?: Overrides): Promise<SemanticValue> {
    return this.call(OperationKind.Replace, [target, replacement], overrides);
  }

  logic(operator: LogicOperator, other: unknown, overrides?: Overrides): Promise<SemanticValue> {
    return this.call(logicOperation(operator), [other], overrides);
  }

  query(question: unknown, overrides?: Overrides): Promise<SemanticValue> {
    return this.call(OperationKind.Query, [question], overrides);
  }

  /** Semantic iteration: the items of this value matching `criteria`. */
  list(criteria: unknown, overrides?: Overrides): Promise<SemanticValue> {
    return this.call(OperationKind.List, [criteria], overrides, SemanticValue);
  }

  /**
   * Iteration. Arrays and Sets yield their elements, Maps and plain objects
   * their keys; any other payload is split into items by the backend.
   */
  async items(overrides?: Overrides): Promise<SemanticValue[]> {
    const local = localItems(this.payload);
    const items = local ?? toArray((await this.list('item', overrides)).payload);
    return items.map(item => this.toValue(item));
  }

  async reversedItems(overrides?: Overrides): Promise<SemanticValue[]> {
    return (await this.items(overrides)).reverse();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<SemanticValue> {
    yield* await this.items();
  }

  embed(overrides?: Overrides): Promise<SemanticValue> {
    return this.call(OperationKind.Embed, [], overrides, SemanticValue);
  }

  /** A property of the backend bound to a capability, e.g. `maxTokens`. */
  property<K extends keyof BackendProperties>(capability: CapabilityName, key: K): BackendProperties[K] {
    return this.runtime.dispatcher.property(capability, key);
  }

  // ── Internals ────────────────────────────────────────────────────

  protected call(
    operation: OperationKind | Operation,
    operands: unknown[],
    overrides: Overrides = {},
    returns?: typeof SemanticValue,
  ): Promise<SemanticValue> {
    const op: Operation = typeof operation === 'string' ? { kind: operation } : operation;
    return this.runtime.dispatcher.dispatch(
      returns && !op.returns ? { ...op, returns } : op,
      this,
      operands.map(operand => this.toValue(operand)),
      overrides,
    );
  }

  protected toValue(operand: unknown): SemanticValue {
    return operand instanceof SemanticValue ? operand : new SemanticValue(operand, { runtime: this.runtime });
  }
}

// ── Payload helpers ──────────────────────────────────────────────────

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function localItems(payload: unknown): unknown[] | null {
  if (Array.isArray(payload) || payload instanceof Set) return Array.from(payload);
  if (payload instanceof Map) return Array.from(payload.keys());
  if (isPlainObject(payload)) return Object.keys(payload);
  return null;
}

function toArray(payload: unknown): unknown[] {
  return Array.isArray(payload) ? payload : [payload];
}

function unwrapItem(item: unknown): unknown {
  return item instanceof SemanticValue ? item.payload : item;
}

/**
 * Nested values collapse to their payload; containers are copied one level
 * deep so the result never aliases the source container.
 */
export function unwrap(payload: unknown): unknown {
  const value = unwrapItem(payload);
  if (Array.isArray(value)) return value.map(unwrapItem);
  if (value instanceof Set) return new Set(Array.from(value, unwrapItem));
  if (value instanceof Map) {
    return new Map(Array.from(value, ([k, v]): [unknown, unknown] => [k, unwrapItem(v)]));
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, unwrapItem(v)]));
  }
  return value;
}

export function renderPayload(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof SemanticValue) return value.toString();
  if (Array.isArray(value) || value instanceof Set) {
    return `[${Array.from(value, renderPayload).join(', ')}]`;
  }
  if (value instanceof Map) {
    return `{${Array.from(value, ([k, v]) => `${renderPayload(k)}: ${renderPayload(v)}`).join(', ')}}`;
  }
  if (isPlainObject(value)) {
    return `{${Object.entries(value).map(([k, v]) => `${k}: ${renderPayload(v)}`).join(', ')}}`;
  }
  return String(value);
}

function isIndex(key: ItemKey, length: number): boolean {
  return Number.isInteger(key) && Number(key) >= 0 && Number(key) < length;
}

function lookupLocal(payload: unknown, key: ItemKey): { found: boolean; value?: unknown } {
  if (Array.isArray(payload) && isIndex(key, payload.length)) {
    return { found: true, value: payload[Number(key)] };
  }
  if (payload instanceof Map && payload.has(key)) {
    return { found: true, value: payload.get(key) };
  }
  if (isPlainObject(payload) && Object.hasOwn(payload, key)) {
    return { found: true, value: payload[String(key)] };
  }
  return { found: false };
}
