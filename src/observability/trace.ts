import { v4 as uuidv4 } from 'uuid';

export type SpanStatus = 'ok' | 'error';

export type SpanAttributes = Record<string, string | number | boolean>;

export interface SpanRecord {
  name: string;
  startTime: number;
  endTime?: number;
  attributes: SpanAttributes;
  status: SpanStatus;
}

/** Spans recorded while one message is processed */
export interface TraceContext {
  requestId: string;
  tenantId?: string;
  conversationId?: string;
  spans: SpanRecord[];
}

export function createTraceContext(ids: Partial<Omit<TraceContext, 'spans'>> = {}): TraceContext {
  return {
    requestId: ids.requestId ?? uuidv4(),
    tenantId: ids.tenantId,
    conversationId: ids.conversationId,
    spans: [],
  };
}

export function startSpan(ctx: TraceContext, name: string, attrs: SpanAttributes = {}): SpanRecord {
  const span: SpanRecord = { name, startTime: Date.now(), attributes: { ...attrs }, status: 'ok' };
  ctx.spans.push(span);
  return span;
}

/**
 * Close a span and return its duration in seconds. A failed span keeps the
 * error message as its `error` attribute.
 */
export function endSpan(span: SpanRecord, error?: unknown): number {
  span.endTime = Date.now();
  if (error !== undefined) {
    span.status = 'error';
    span.attributes.error = error instanceof Error ? error.message : String(error);
  }
  return (span.endTime - span.startTime) / 1000;
}

/** Milliseconds per closed span, keyed by span name; a span that repeats adds up */
export function spanTimings(ctx: TraceContext): Record<string, number> {
  const timings: Record<string, number> = {};
  for (const span of ctx.spans) {
    if (span.endTime === undefined) continue;
    timings[span.name] = (timings[span.name] ?? 0) + (span.endTime - span.startTime);
  }
  return timings;
}
