import {
  RESERVED_OVERRIDE_KEYS,
  ReservedKeywordCollisionError,
  type BackendInput,
  type BackendProperties,
  type CapabilityName,
  type OperationKind,
  type Overrides,
} from '@semantix/shared';
import type { BackendRegistry } from '@semantix/backends';
import { resolveOperation, type Operation } from './operations.js';
import { renderPrompt } from './prompt.js';
import type { DispatchRequest } from './processors.js';
import type { TraceLogger } from './trace-logger.js';
import type { SemanticValue } from './value.js';

/**
 * Turns one operation on a subject into one backend call.
 *
 * Collisions are checked before anything else, so a rejected request never
 * reaches a backend. There is no retry and no timeout here: both belong to
 * the backend and are passed through as overrides.
 */
export class Dispatcher {
  constructor(
    private registry: BackendRegistry,
    private tracer: TraceLogger,
  ) {}

  async dispatch(
    operation: OperationKind | Operation,
    subject: SemanticValue,
    operands: SemanticValue[] = [],
    overrides: Overrides = {},
  ): Promise<SemanticValue> {
    const collisions = Object.keys(overrides).filter(key => RESERVED_OVERRIDE_KEYS.includes(key));
    if (collisions.length > 0) {
      throw new ReservedKeywordCollisionError(collisions);
    }

    const op = resolveOperation(typeof operation === 'string' ? { kind: operation } : operation);
    const request: DispatchRequest = {
      operation: op.kind,
      subject,
      operands,
      overrides,
      args: [subject, ...operands].map(value => value.toString()),
    };

    const query = op.preProcessors.map(pre => pre(request) ?? '').join('');
    const prompt = renderPrompt({
      instruction: op.instruction,
      globalContext: subject.globalContext,
      examples: op.examples,
      query,
    });
    const input: BackendInput = op.encode
      ? op.encode(request, prompt)
      : { kind: 'prompt', text: prompt, operation: op.kind, args: request.args };

    const backend = this.registry.resolve(op.capability);

    const traceId = this.tracer.createTrace(op.kind);
    const spanId = this.tracer.startSpan(traceId, `dispatch:${op.kind}`);
    this.tracer.logEvent(traceId, 'dispatch_start', {
      operation: op.kind,
      capability: op.capability,
      backend: backend.name,
    });

    let reply: unknown;
    try {
      this.tracer.logEvent(traceId, 'backend_request', { backend: backend.name, input: input.kind });
      reply = await backend.invoke(input, { stop: op.stop, overrides });
      this.tracer.logEvent(traceId, 'backend_reply', { backend: backend.name, empty: isAbsent(reply) || reply === '' });
    } catch (err) {
      this.tracer.logEvent(traceId, 'dispatch_error', {
        backend: backend.name,
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    } finally {
      this.tracer.endSpan(traceId, spanId);
      this.tracer.completeTrace(traceId);
    }

    const result = op.postProcessors.reduce<unknown>(
      (value, post) => post(value, request),
      isAbsent(reply) ? '' : reply,
    );

    const Returns = op.returns ?? subject.returnClass;
    return new Returns(isAbsent(result) ? '' : result, { runtime: subject.runtime });
  }

  /** Read a property of the backend bound to a capability. */
  property<K extends keyof BackendProperties>(capability: CapabilityName, key: K): BackendProperties[K] {
    return this.registry.resolve(capability).properties()[key];
  }
}

function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}
