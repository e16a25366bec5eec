import { describe, it, expect, beforeEach } from 'vitest';
import {
  AttributeResolutionError,
  OperationKind,
  ReservedKeywordCollisionError,
} from '@semantix/shared';
import { SemanticValue } from '../src/value.js';
import type { SemanticRuntime } from '../src/runtime.js';
import { createTestRuntime, type ScriptedBackend } from './helpers.js';

class Animal extends SemanticValue {
  static typeTag = 'Animal';
  static staticContext = 'Answer about animals.';
}

describe('SemanticValue', () => {
  let runtime: SemanticRuntime;
  let reasoning: ScriptedBackend;

  beforeEach(() => {
    ({ runtime, reasoning } = createTestRuntime());
  });

  const value = (payload: unknown) => new SemanticValue(payload, { runtime });

  describe('construction', () => {
    it('copies array payloads from another value', () => {
      const original = value(['a', 'b']);
      const copy = new SemanticValue(original);

      expect(copy.toString()).toBe('[a, b]');
      if (Array.isArray(copy.payload)) copy.payload.push('c');
      expect(original.toString()).toBe('[a, b]');
      expect(copy.toString()).toBe('[a, b, c]');
    });

    it('copies map payloads from another value', () => {
      const original = value(new Map([['k', 'v']]));
      const copy = new SemanticValue(original);

      if (copy.payload instanceof Map) copy.payload.set('x', 'y');
      expect(original.toString()).toBe('{k: v}');
      expect(copy.toString()).toBe('{k: v, x: y}');
    });

    it('inherits runtime and metadata from a wrapped value', () => {
      const original = new SemanticValue('x', { runtime, metadata: { source: 'test' } });
      const copy = new SemanticValue(original, { metadata: { extra: 1 } });

      expect(copy.runtime).toBe(runtime);
      expect(copy.metadata).toEqual({ source: 'test', extra: 1 });
    });

    it('unwraps nested values one level into containers', () => {
      const nested = value([value('a'), value(2)]);
      expect(nested.payload).toEqual(['a', 2]);
    });

    it('stores unsupported payloads as-is', () => {
      const fn = () => 1;
      expect(value(fn).payload).toBe(fn);
    });
  });

  describe('local behaviour', () => {
    it('renders payloads as strings', () => {
      expect(value(null).toString()).toBe('');
      expect(value(undefined).toString()).toBe('');
      expect(value(['a', ['b', 'c']]).toString()).toBe('[a, [b, c]]');
      expect(value(new Set([1, 2])).toString()).toBe('[1, 2]');
      expect(value({ name: 'cat', legs: 4 }).toString()).toBe('{name: cat, legs: 4}');
      expect(value(3.5).toString()).toBe('3.5');
    });

    it('coerces to boolean', () => {
      expect(value(null).toBoolean()).toBe(false);
      expect(value(false).toBoolean()).toBe(false);
      expect(value(true).toBoolean()).toBe(true);
      expect(value('').toBoolean()).toBe(true);
      expect(value(0).toBoolean()).toBe(true);
    });

    it('reports length in tokens', () => {
      expect(value('one two three').length).toBe(3);
      expect(value(['a', 'b']).length).toBe(2);
    });

    it('concatenates and splits without dispatching', () => {
      expect(value('foo').concat('bar').toString()).toBe('foobar');
      expect(value('a,b').split(',').payload).toEqual(['a', 'b']);
      expect(reasoning.calls).toHaveLength(0);
    });

    it('resolves attributes on the wrapper, then the payload', () => {
      const v = value('hello');
      expect(v.attribute('payload')).toBe('hello');

      const upper = v.attribute('toUpperCase');
      expect(typeof upper === 'function' ? upper() : undefined).toBe('HELLO');
    });

    it('fails attribute lookup with one chained error', () => {
      const v = value('hello');
      expect(() => v.attribute('missing')).toThrow(AttributeResolutionError);
      expect(() => v.attribute('missing')).toThrow(/attribute 'missing'/);
      expect(() => value(null).attribute('missing')).toThrow(/payload is null/);
    });
  });

  describe('fast paths', () => {
    it('reads array items and mapping keys locally', async () => {
      expect((await value(['a', 'b']).getItem(1)).toString()).toBe('b');
      expect((await value({ k: 'v' }).getItem('k')).toString()).toBe('v');
      expect((await value(new Map([['k', 'm']])).getItem('k')).toString()).toBe('m');
      expect(reasoning.calls).toHaveLength(0);
    });

    it('dispatches item lookups it cannot answer', async () => {
      reasoning.on(OperationKind.GetItem, () => 'the last one');
      const result = await value(['a', 'b']).getItem('last');

      expect(result.toString()).toBe('the last one');
      expect(reasoning.calls[0]?.input.text.endsWith('[QUERY]\n[a, b][last] =>')).toBe(true);
    });

    it('answers containment from sets and maps', async () => {
      expect(await value(new Set(['x'])).contains('x')).toBe(true);
      expect(await value(new Map([['x', 1]])).contains(value('x'))).toBe(true);
      expect(reasoning.calls).toHaveLength(0);
    });

    it('iterates containers locally', async () => {
      const collected: unknown[] = [];
      for await (const item of value(['a', value('b')])) collected.push(item.payload);

      expect(collected).toEqual(['a', 'b']);
      expect((await value(new Set([1, 2])).reversedItems()).map(item => item.payload)).toEqual([2, 1]);
      expect((await value(new Map([['k', 'v']])).items()).map(item => item.payload)).toEqual(['k']);
      expect((await value({ x: 1, y: 2 }).items()).map(item => item.payload)).toEqual(['x', 'y']);
      expect(reasoning.calls).toHaveLength(0);
    });

    it('sets and deletes items on copies', async () => {
      const original = value({ a: 1 });
      const updated = await original.setItem('b', 2);
      const removed = await updated.deleteItem('a');

      expect(updated.payload).toEqual({ a: 1, b: 2 });
      expect(removed.payload).toEqual({ b: 2 });
      expect(original.payload).toEqual({ a: 1 });

      const list = await value(['x', 'y']).setItem(0, 'z');
      expect(list.payload).toEqual(['z', 'y']);
      expect(reasoning.calls).toHaveLength(0);
    });
  });

  describe('dispatched operators', () => {
    it('combines two values through the backend', async () => {
      reasoning.on(OperationKind.Combine, input => `${input.args[0]} ${input.args[1]}`);
      const result = await value('hello').combine(value('world'));

      expect(result).toBeInstanceOf(SemanticValue);
      expect(result.toString()).toBe('hello world');
    });

    it('parses boolean replies', async () => {
      reasoning.on(OperationKind.Equals, () => 'Yes.');
      expect(await value('car').equals('automobile')).toBe(true);
      expect(await value('car').notEquals('automobile')).toBe(false);

      reasoning.on(OperationKind.Contains, () => ' false ');
      expect(await value('a sentence').contains('dog')).toBe(false);
    });

    it('renders comparisons with the operator', async () => {
      reasoning.on(OperationKind.Compare, () => 'true');
      await value('a mouse').compare('<', 'an elephant');

      expect(reasoning.calls[0]?.input.args).toEqual(['a mouse', 'an elephant']);
      expect(reasoning.calls[0]?.input.text.endsWith('[QUERY]\na mouse < an elephant =>')).toBe(true);
    });

    it('parses list replies into arrays', async () => {
      reasoning.on(OperationKind.List, () => '- apple\n- pear\n');
      const fruits = await value('apple, chair, pear').list('fruits');
      expect(fruits.payload).toEqual(['apple', 'pear']);
    });

    it('iterates a text payload through a dispatched item list', async () => {
      reasoning.on(OperationKind.List, () => '- red\n- green\n- blue\n');
      const colours = value('red, green and blue');

      const items = await colours.items();

      expect(items.map(item => item.payload)).toEqual(['red', 'green', 'blue']);
      expect(items[0]?.runtime).toBe(runtime);
      expect(reasoning.calls[0]?.input.args).toEqual(['red, green and blue', 'item']);
      expect((await colours.reversedItems()).map(item => item.toString())).toEqual(['blue', 'green', 'red']);
    });

    it('removes by replacing with nothing', async () => {
      reasoning.on(OperationKind.Replace, input => input.args[0]?.replace(input.args[1] ?? '', input.args[2] ?? ''));
      const result = await value('keep drop').remove(' drop');

      expect(result.toString()).toBe('keep');
      expect(reasoning.calls[0]?.input.args).toEqual(['keep drop', ' drop', '']);
    });

    it('wraps results in the subject class and folds in its context', async () => {
      runtime.contexts.add('Animal', 'Cats are mammals.');
      reasoning.on(OperationKind.Combine, () => 'catdog');

      const result = await new Animal('cat', { runtime }).combine('dog');
      const text = reasoning.calls[0]?.input.text ?? '';

      expect(result).toBeInstanceOf(Animal);
      expect(result.typeTag).toBe('Animal');
      expect(text.startsWith('Combine the two values into one.\n[STATIC CONTEXT]\nAnswer about animals.\n[DYNAMIC CONTEXT]\nCats are mammals.\n[EXAMPLES]\n')).toBe(true);
      expect(text.endsWith('[QUERY]\ncat + dog =>')).toBe(true);
    });

    it('passes overrides through to the backend', async () => {
      await value('context').query('question', { temperature: 0.5 });
      expect(reasoning.calls[0]?.options.overrides).toEqual({ temperature: 0.5 });
    });

    it('rejects reserved override keys before calling the backend', async () => {
      await expect(value('x').query('y', { model: 'other', stop: [] })).rejects.toThrow(ReservedKeywordCollisionError);
      await expect(value('x').query('y', { model: 'other' })).rejects.toThrow('Reserved keyword collision: model');
      expect(reasoning.calls).toHaveLength(0);
    });

    it('reads backend properties', () => {
      const { runtime: sized } = createTestRuntime({ maxTokens: 2048 });
      expect(new SemanticValue('x', { runtime: sized }).property('reasoning', 'maxTokens')).toBe(2048);
    });
  });
});
