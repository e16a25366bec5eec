import { describe, it, expect, vi } from 'vitest';
import {
  BackendError,
  BackendUnavailableError,
  Capability,
  ConfigurationError,
  OperationKind,
} from '@semantix/shared';
import { BackendRegistry } from '@semantix/backends';
import { Expression } from '../src/expression.js';
import { SemanticRuntime } from '../src/runtime.js';
import { WhitespaceTokenizer } from '../src/tokenizer.js';
import { SemanticValue } from '../src/value.js';
import { createTestRuntime, ScriptedBackend } from './helpers.js';

class Summary extends SemanticValue {
  static typeTag = 'Summary';
}

class Echo extends Expression {
  async forward(): Promise<SemanticValue> {
    return this.combine('!');
  }
}

describe('Dispatcher', () => {
  it('fails with a configuration error when the capability is unbound', async () => {
    const runtime = new SemanticRuntime({ tokenizer: new WhitespaceTokenizer() });
    const v = new SemanticValue('x', { runtime });

    await expect(v.query('y')).rejects.toThrow(BackendUnavailableError);
    await expect(v.query('y')).rejects.toThrow(ConfigurationError);
    await expect(v.query('y')).rejects.toThrow("No backend configured for capability 'reasoning'");
  });

  it('calls the backend once per dispatch with stop markers and overrides', async () => {
    const { runtime, reasoning } = createTestRuntime();
    await runtime.dispatcher.dispatch(
      { kind: OperationKind.Query, stop: ['\n\n'] },
      new SemanticValue('ctx', { runtime }),
      [new SemanticValue('q', { runtime })],
      { timeoutMs: 500 },
    );

    expect(reasoning.calls).toHaveLength(1);
    expect(reasoning.calls[0]?.options).toEqual({ stop: ['\n\n'], overrides: { timeoutMs: 500 } });
    expect(reasoning.calls[0]?.input.operation).toBe(OperationKind.Query);
  });

  it('assembles instruction, examples and query from an operation builder', async () => {
    const { runtime, reasoning } = createTestRuntime();
    await runtime.dispatcher.dispatch(
      {
        kind: OperationKind.Query,
        instruction: 'Be brief.',
        examples: ['Context: sky\nQuestion: colour? => blue'],
        preProcessors: [req => `${req.args[1]}?`, () => undefined, () => ' =>'],
      },
      new SemanticValue('ctx', { runtime }),
      [new SemanticValue('why', { runtime })],
    );

    expect(reasoning.calls[0]?.input.text).toBe(
      'Be brief.\n[EXAMPLES]\nContext: sky\nQuestion: colour? => blue\n[QUERY]\nwhy? =>',
    );
  });

  it('applies post-processors in order', async () => {
    const { runtime, reasoning } = createTestRuntime();
    reasoning.on(OperationKind.Query, () => '  Answer  ');

    const result = await runtime.dispatcher.dispatch(
      {
        kind: OperationKind.Query,
        postProcessors: [reply => String(reply).trim(), reply => `${String(reply)}!`, reply => String(reply).toLowerCase()],
      },
      new SemanticValue('ctx', { runtime }),
    );

    expect(result.toString()).toBe('answer!');
  });

  it('turns an absent reply into an empty string', async () => {
    const { runtime, reasoning } = createTestRuntime();
    reasoning.on(OperationKind.Negate, () => null);

    const result = await new SemanticValue('it rains', { runtime }).negate();
    expect(result.payload).toBe('');
  });

  it('wraps results in the declared return class', async () => {
    const { runtime, reasoning } = createTestRuntime();
    reasoning.on(OperationKind.Query, () => 'short');

    const result = await runtime.dispatcher.dispatch(
      { kind: OperationKind.Query, returns: Summary },
      new SemanticValue('long text', { runtime }),
    );

    expect(result).toBeInstanceOf(Summary);
    expect(result.typeTag).toBe('Summary');
  });

  it('returns plain values from expressions unless told otherwise', async () => {
    const { runtime, reasoning } = createTestRuntime();
    reasoning.on(OperationKind.Combine, input => `${input.args[0]}${input.args[1]}`);

    const echo = new Echo('hi', { runtime });
    const plain = await echo.forward();
    expect(plain.constructor).toBe(SemanticValue);
    expect(plain.toString()).toBe('hi!');

    echo.setReturnClass(Summary);
    expect(await echo.forward()).toBeInstanceOf(Summary);
  });

  it('never mutates the subject', async () => {
    const { runtime, reasoning } = createTestRuntime();
    reasoning.on(OperationKind.Include, () => 'a b');
    const subject = new SemanticValue('a', { runtime });

    await subject.include('b');
    expect(subject.payload).toBe('a');
  });

  it('records a completed trace per dispatch', async () => {
    const { runtime, reasoning } = createTestRuntime();
    reasoning.on(OperationKind.Combine, () => 'ab');

    await new SemanticValue('a', { runtime }).combine('b');
    const [trace] = runtime.tracer.getCompleted();

    expect(trace?.operation).toBe('combine');
    const events = trace?.spans[0]?.events.map(e => e.type);
    expect(events).toEqual(['dispatch_start', 'backend_request', 'backend_reply']);
    expect(trace?.spans[0]?.events[0]?.data).toEqual({
      operation: 'combine',
      capability: Capability.Reasoning,
      backend: 'scripted',
    });
  });

  it('propagates backend errors after tracing them', async () => {
    const failing = new ScriptedBackend({
      [OperationKind.Query]: () => {
        throw new BackendError('scripted', 'boom');
      },
    });
    const registry = new BackendRegistry();
    registry.configure(Capability.Reasoning, failing);
    const runtime = new SemanticRuntime({ registry, tokenizer: new WhitespaceTokenizer() });

    await expect(new SemanticValue('x', { runtime }).query('y')).rejects.toThrow("Backend 'scripted' failed: boom");

    const [trace] = runtime.tracer.getCompleted();
    const last = trace?.spans[0]?.events.at(-1);
    expect(last?.type).toBe('dispatch_error');
    expect(last?.data.error).toBe("Backend 'scripted' failed: boom");
  });

  it('uses a backend configured at runtime for subsequent dispatches', async () => {
    const { runtime } = createTestRuntime();
    const replacement = new ScriptedBackend({ [OperationKind.Negate]: () => 'not so' });
    const notice = vi.spyOn(runtime.tracer, 'notice');

    runtime.configure(Capability.Reasoning, replacement);
    const result = await new SemanticValue('so', { runtime }).negate();

    expect(result.toString()).toBe('not so');
    expect(notice).toHaveBeenCalledWith('registry_change', { capability: 'reasoning', backend: 'scripted' });
  });
});
