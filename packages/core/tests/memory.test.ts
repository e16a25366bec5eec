import { describe, it, expect, vi } from 'vitest';
import { ConfigurationError, MEMORY_MARKER, NotFoundError, OperationKind } from '@semantix/shared';
import { SlidingWindowListMemory } from '../src/memory/sliding-window.js';
import { TokenBudgetMemory } from '../src/memory/token-budget.js';
import { VectorMemory } from '../src/memory/vector-memory.js';
import { createTestRuntime } from './helpers.js';

describe('TokenBudgetMemory', () => {
  it('evicts leading units until the buffer fits the budget', async () => {
    const { runtime } = createTestRuntime();
    const memory = new TokenBudgetMemory({ runtime, maxTokens: () => 10, tokenRatio: 0.5 });

    await memory.store('one two three four five six');

    expect(memory.history()).toEqual(['two three four five six']);
    expect(memory.tokens()).toBe(5);
  });

  it('keeps entries separated by the marker', async () => {
    const { runtime } = createTestRuntime();
    const memory = new TokenBudgetMemory({ runtime, maxTokens: () => 100, tokenRatio: 1 });

    await memory.store('first');
    await memory.store('second entry');

    expect(memory.contents).toBe(`first${MEMORY_MARKER}second entry${MEMORY_MARKER}`);
    expect(memory.history()).toEqual(['first', 'second entry']);
  });

  it('evicts across entry boundaries', async () => {
    const { runtime } = createTestRuntime();
    const memory = new TokenBudgetMemory({ runtime, maxTokens: () => 2, tokenRatio: 1 });

    await memory.store('a b');
    await memory.store('c d');
    expect(memory.history()).toEqual(['b', 'c d']);
    await memory.store('e f');

    expect(memory.history()).toEqual(['d', 'e f']);
  });

  it('reports evictions to the tracer', async () => {
    const { runtime } = createTestRuntime();
    const notice = vi.spyOn(runtime.tracer, 'notice');
    const memory = new TokenBudgetMemory({ runtime, maxTokens: () => 2, tokenRatio: 1 });

    await memory.store('x y z');

    expect(notice).toHaveBeenCalledWith('memory_eviction', { memory: 'TokenBudgetMemory', units: 1, budget: 2 });
  });

  it('reads its window from the reasoning backend', () => {
    const { runtime } = createTestRuntime({ maxTokens: 300 });
    expect(new TokenBudgetMemory({ runtime }).maxTokens()).toBe(300);
  });

  it('falls back to the default window when the backend reports none', () => {
    const { runtime } = createTestRuntime();
    expect(new TokenBudgetMemory({ runtime }).maxTokens()).toBe(4096);
  });

  it('takes its ratio from the runtime unless given one', () => {
    const { runtime } = createTestRuntime({ memory: { tokenRatio: 0.25 } });

    expect(new TokenBudgetMemory({ runtime }).tokenRatio).toBe(0.25);
    expect(new TokenBudgetMemory({ runtime, tokenRatio: 0.5 }).tokenRatio).toBe(0.5);
  });

  it('rejects a ratio outside (0, 1]', () => {
    const { runtime } = createTestRuntime();
    expect(() => new TokenBudgetMemory({ runtime, tokenRatio: 0 })).toThrow(ConfigurationError);
    expect(() => new TokenBudgetMemory({ runtime, tokenRatio: 1.5 })).toThrow('tokenRatio must be in (0, 1], got 1.5');
  });

  it('recalls by querying the backend over the history', async () => {
    const { runtime, reasoning } = createTestRuntime();
    reasoning.on(OperationKind.Query, () => 'blue');
    const memory = new TokenBudgetMemory({ runtime, maxTokens: () => 100 });

    await memory.store('the sky is blue');
    const answer = await memory.forward('what colour is the sky');

    expect(answer.toString()).toBe('blue');
    expect(reasoning.calls[0]?.input.args).toEqual(['the sky is blue', 'what colour is the sky']);
  });

  it('forgets through a semantic replace', async () => {
    const { runtime, reasoning } = createTestRuntime();
    reasoning.on(OperationKind.Replace, input => (input.args[0] ?? '').replace(input.args[1] ?? '', ''));
    const memory = new TokenBudgetMemory({ runtime, maxTokens: () => 100, tokenRatio: 1 });

    await memory.store('keep');
    await memory.store('secret');
    await memory.forget(`secret${MEMORY_MARKER}`);

    expect(memory.history()).toEqual(['keep']);
  });

  it('treats forgetting something absent as a no-op', async () => {
    const { runtime, reasoning } = createTestRuntime();
    reasoning.on(OperationKind.Replace, input => input.args[0]);
    const memory = new TokenBudgetMemory({ runtime, maxTokens: () => 100 });

    await memory.forget('anything');
    expect(reasoning.calls).toHaveLength(0);

    await memory.store('keep');
    await expect(memory.forget('missing')).resolves.toBeUndefined();
    expect(memory.history()).toEqual(['keep']);
  });

  it('drops and restores the buffer', async () => {
    const { runtime } = createTestRuntime();
    const memory = new TokenBudgetMemory({ runtime, maxTokens: () => 100 });

    await memory.store('a');
    const saved = memory.contents;
    memory.drop();
    expect(memory.history()).toEqual([]);

    memory.restore(saved);
    expect(memory.history()).toEqual(['a']);
  });
});

describe('SlidingWindowListMemory', () => {
  it('recalls the last windowSize entries in order', async () => {
    const { runtime } = createTestRuntime();
    const memory = new SlidingWindowListMemory({ runtime, windowSize: 2 });

    for (const entry of ['a', 'b', 'c']) await memory.store(entry);

    expect(await memory.recall()).toEqual(['b', 'c']);
    expect(memory.all()).toEqual(['a', 'b', 'c']);
  });

  it('keeps at most maxSize entries, dropping the oldest', async () => {
    const { runtime } = createTestRuntime();
    const memory = new SlidingWindowListMemory({ runtime, windowSize: 10, maxSize: 3 });

    for (const entry of ['1', '2', '3', '4', '5']) await memory.store(entry);

    expect(memory.size).toBe(3);
    expect(await memory.forward()).toEqual(['3', '4', '5']);
  });

  it('sizes itself from the runtime memory settings', async () => {
    const { runtime } = createTestRuntime({ memory: { windowSize: 1, maxSize: 2 } });
    const memory = new SlidingWindowListMemory({ runtime });

    await memory.store('a');
    await memory.store('b');
    await memory.store('c');

    expect(memory.windowSize).toBe(1);
    expect(memory.all()).toEqual(['b', 'c']);
    expect(await memory.recall()).toEqual(['c']);
  });

  it('forgets the first exact match', async () => {
    const { runtime } = createTestRuntime();
    const memory = new SlidingWindowListMemory({ runtime });

    for (const entry of ['x', 'y', 'x']) await memory.store(entry);
    await memory.forget('x');

    expect(memory.all()).toEqual(['y', 'x']);
  });

  it('throws NotFoundError when forgetting a missing entry', async () => {
    const { runtime } = createTestRuntime();
    const memory = new SlidingWindowListMemory({ runtime });

    await expect(memory.forget('ghost')).rejects.toThrow(NotFoundError);
    await expect(memory.forget('ghost')).rejects.toThrow('Memory entry not found: ghost');
  });

  it('does not dispatch', async () => {
    const { runtime, reasoning } = createTestRuntime();
    const memory = new SlidingWindowListMemory({ runtime });

    await memory.store('a');
    await memory.recall();
    expect(reasoning.calls).toHaveLength(0);
  });
});

describe('VectorMemory', () => {
  it('recalls the nearest stored entries', async () => {
    const { runtime } = createTestRuntime();
    const memory = new VectorMemory({ runtime, topK: 1 });

    await memory.store('the cat sat on the mat');
    await memory.store('stock prices fell sharply');

    expect(await memory.recall('stock prices fell sharply')).toEqual(['stock prices fell sharply']);
  });

  it('keeps unnamed memories in separate indices', async () => {
    const { runtime } = createTestRuntime();
    const first = new VectorMemory({ runtime });
    const second = new VectorMemory({ runtime });

    await first.store('only the first memory knows this');

    expect(first.indexName).not.toBe(second.indexName);
    expect(await second.recall('only the first memory knows this')).toEqual([]);
    expect(await first.recall('only the first memory knows this')).toEqual(['only the first memory knows this']);
  });

  it('shares an index when given the same name', async () => {
    const { runtime } = createTestRuntime();
    const writer = new VectorMemory({ runtime, indexName: 'shared' });
    const reader = new VectorMemory({ runtime, indexName: 'shared' });

    await writer.store('visible to both');

    expect(await reader.recall('visible to both')).toEqual(['visible to both']);
  });

  it('recalls nothing before anything is stored', async () => {
    const { runtime, embedder } = createTestRuntime();
    const memory = new VectorMemory({ runtime });

    expect(await memory.recall('anything')).toEqual([]);
    expect(embedder.calls).toBe(0);
  });

  it('is a no-op when disabled', async () => {
    const { runtime, embedder, index } = createTestRuntime();
    const memory = new VectorMemory({ runtime, enabled: false });
    const invoke = vi.spyOn(index, 'invoke');

    await memory.store('ignored');
    expect(await memory.recall('ignored')).toEqual([]);
    expect(embedder.calls).toBe(0);
    expect(invoke).not.toHaveBeenCalled();
  });
});
