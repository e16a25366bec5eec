import {
  generateId,
  monotonicNow,
  isoNow,
  type DispatchTrace,
  type LogLevel,
  type TraceEvent,
  type TraceEventType,
  type TraceSpan,
} from '@semantix/shared';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const EVENT_LEVELS: Record<TraceEventType, LogLevel> = {
  dispatch_start: 'debug',
  backend_request: 'debug',
  backend_reply: 'debug',
  dispatch_error: 'error',
  registry_change: 'info',
  memory_eviction: 'debug',
  info: 'info',
};

export interface TraceLoggerOptions {
  level?: LogLevel;
  /** Mirror events to the console as they are logged */
  console?: boolean;
  /** Completed traces kept in memory, oldest dropped first */
  maxCompleted?: number;
}

export class TraceLogger {
  private traces = new Map<string, TraceState>();
  private completed: DispatchTrace[] = [];
  private level: LogLevel;
  private mirror: boolean;
  private maxCompleted: number;

  constructor(options: TraceLoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.mirror = options.console ?? false;
    this.maxCompleted = options.maxCompleted ?? 100;
  }

  createTrace(operation: string): string {
    const traceId = generateId('trace');
    this.traces.set(traceId, {
      traceId,
      operation,
      startedAt: isoNow(),
      startTime: monotonicNow(),
      spans: [],
      spanStack: [],
    });
    return traceId;
  }

  startSpan(traceId: string, name: string, data?: Record<string, unknown>): string {
    const state = this.getState(traceId);
    const spanId = generateId('span');
    const parentSpanId = state.spanStack.length > 0
      ? state.spanStack[state.spanStack.length - 1]
      : undefined;

    const span: TraceSpan = {
      id: spanId,
      traceId,
      name,
      startTime: monotonicNow(),
      events: [],
      children: [],
    };

    if (parentSpanId) {
      const parent = this.findSpan(state.spans, parentSpanId);
      parent?.children.push(span);
    } else {
      state.spans.push(span);
    }

    state.spanStack.push(spanId);

    if (data) {
      this.logEvent(traceId, 'info', data, spanId);
    }
    return spanId;
  }

  endSpan(traceId: string, spanId: string): void {
    const state = this.getState(traceId);
    const span = this.findSpan(state.spans, spanId);
    if (span) {
      span.endTime = monotonicNow();
    }
    const idx = state.spanStack.indexOf(spanId);
    if (idx !== -1) {
      state.spanStack.splice(idx, 1);
    }
  }

  logEvent(
    traceId: string,
    type: TraceEventType,
    data: Record<string, unknown>,
    parentSpanId?: string,
  ): void {
    const state = this.getState(traceId);
    const event: TraceEvent = {
      id: generateId('evt'),
      traceId,
      parentSpanId: parentSpanId ?? state.spanStack[state.spanStack.length - 1],
      type,
      timestamp: monotonicNow(),
      wallClock: isoNow(),
      data,
    };

    const spanId = event.parentSpanId;
    if (spanId) {
      const span = this.findSpan(state.spans, spanId);
      span?.events.push(event);
    }

    this.print(type, { traceId, ...data });
  }

  /** Events that belong to no dispatch, such as registry changes. */
  notice(type: TraceEventType, data: Record<string, unknown>): void {
    this.print(type, data);
  }

  /** Finish a trace and move it to the completed list. */
  completeTrace(traceId: string): DispatchTrace {
    const state = this.getState(traceId);
    const trace: DispatchTrace = {
      traceId: state.traceId,
      operation: state.operation,
      startedAt: state.startedAt,
      completedAt: isoNow(),
      totalDurationMs: monotonicNow() - state.startTime,
      spans: state.spans,
    };

    this.traces.delete(traceId);
    this.completed.push(trace);
    if (this.completed.length > this.maxCompleted) {
      this.completed.splice(0, this.completed.length - this.maxCompleted);
    }
    return trace;
  }

  getCompleted(): DispatchTrace[] {
    return [...this.completed];
  }

  hasTrace(traceId: string): boolean {
    return this.traces.has(traceId);
  }

  private print(type: TraceEventType, data: Record<string, unknown>): void {
    if (!this.mirror) return;
    const level = EVENT_LEVELS[type];
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const line = `[semantix] ${type} ${JSON.stringify(data)}`;
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private getState(traceId: string): TraceState {
    const state = this.traces.get(traceId);
    if (!state) throw new Error(`Trace not found: ${traceId}`);
    return state;
  }

  private findSpan(spans: TraceSpan[], id: string): TraceSpan | undefined {
    for (const span of spans) {
      if (span.id === id) return span;
      const found = this.findSpan(span.children, id);
      if (found) return found;
    }
    return undefined;
  }
}

interface TraceState {
  traceId: string;
  operation: string;
  startedAt: string;
  startTime: number;
  spans: TraceSpan[];
  spanStack: string[];
}
