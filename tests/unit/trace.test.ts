import { createTraceContext, endSpan, spanTimings, startSpan } from '../../src/observability/trace';

describe('trace', () => {
  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2026-03-02T10:00:00.000Z'));
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should keep the ids it is given and generate a request id otherwise', () => {
    const ctx = createTraceContext({ requestId: 'r-1', tenantId: 't-1', conversationId: 'c-1' });
    expect(ctx).toEqual({ requestId: 'r-1', tenantId: 't-1', conversationId: 'c-1', spans: [] });
    expect(createTraceContext().requestId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should return the span duration in seconds', () => {
    const ctx = createTraceContext({ requestId: 'r-1' });
    const span = startSpan(ctx, 'stage.entry', { stage: 'entry' });
    jest.advanceTimersByTime(250);

    expect(endSpan(span)).toBe(0.25);
    expect(span.status).toBe('ok');
    expect(span.attributes).toEqual({ stage: 'entry' });
  });

  it('should mark a failed span with the error message', () => {
    const ctx = createTraceContext({ requestId: 'r-1' });
    const span = startSpan(ctx, 'stage.governance');
    endSpan(span, new Error('classifier down'));

    expect(span.status).toBe('error');
    expect(span.attributes.error).toBe('classifier down');
  });

  it('should sum timings per span name and skip open spans', () => {
    const ctx = createTraceContext({ requestId: 'r-1' });
    const first = startSpan(ctx, 'stage.response_generation');
    jest.advanceTimersByTime(10);
    endSpan(first);
    const second = startSpan(ctx, 'stage.response_generation');
    jest.advanceTimersByTime(5);
    endSpan(second);
    startSpan(ctx, 'stage.persistence');

    expect(spanTimings(ctx)).toEqual({ 'stage.response_generation': 15 });
  });
});
