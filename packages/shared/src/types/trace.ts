export type TraceEventType =
  | 'dispatch_start'
  | 'backend_request'
  | 'backend_reply'
  | 'dispatch_error'
  | 'registry_change'
  | 'memory_eviction'
  | 'info';

export interface TraceEvent {
  id: string;
  traceId: string;
  parentSpanId?: string;
  type: TraceEventType;
  timestamp: number;
  wallClock: string;
  duration?: number;
  data: Record<string, unknown>;
}

export interface TraceSpan {
  id: string;
  traceId: string;
  name: string;
  startTime: number;
  endTime?: number;
  events: TraceEvent[];
  children: TraceSpan[];
}

export interface DispatchTrace {
  traceId: string;
  operation: string;
  startedAt: string;
  completedAt?: string;
  totalDurationMs?: number;
  spans: TraceSpan[];
}
