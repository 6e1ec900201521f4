import { test } from 'node:test';
import assert from 'node:assert/strict';
import { trace } from '@opentelemetry/api';
import { CorrelationContext, OpenSpanRegistry, extractTraceContext } from './trace-context.ts';

const TRACE_ID = '4bf92f3577b34da6a3ce929d0e0e4736';
const PARENT_SPAN_ID = '00f067aa0ba902b7';
const TRACEPARENT = `00-${TRACE_ID}-${PARENT_SPAN_ID}-01`;

test('extractTraceContext - reads a W3C traceparent header', () => {
  const extracted = trace.getSpanContext(extractTraceContext({ traceparent: TRACEPARENT, tracestate: 'vendor=abc' }));

  assert.equal(extracted?.traceId, TRACE_ID);
  assert.equal(extracted?.spanId, PARENT_SPAN_ID);
  assert.equal(extracted?.isRemote, true);
  assert.equal(extracted?.traceState?.get('vendor'), 'abc');
});

test('extractTraceContext - malformed headers yield no span context', () => {
  assert.equal(trace.getSpanContext(extractTraceContext({ traceparent: 'garbage' })), undefined);
  assert.equal(trace.getSpanContext(extractTraceContext({})), undefined);
});

test('CorrelationContext - root without headers has no ids', () => {
  const ctx = CorrelationContext.root({ requestId: 'req-1' });

  assert.equal(ctx.traceId, undefined);
  assert.equal(ctx.spanId, undefined);
  assert.equal(ctx.span, undefined);
  assert.equal(ctx.requestId, 'req-1');
});

test('CorrelationContext - root continues the caller trace', () => {
  const ctx = CorrelationContext.root({ headers: { traceparent: TRACEPARENT } });

  assert.equal(ctx.traceId, TRACE_ID);
  assert.equal(ctx.spanId, PARENT_SPAN_ID);
});

test('CorrelationContext - deriving a child leaves the parent untouched', () => {
  const parent = CorrelationContext.root({ headers: { traceparent: TRACEPARENT }, deadline: 5000, requestId: 'req-2' });
  const childSpan = trace.wrapSpanContext({
    traceId: TRACE_ID,
    spanId: '1111111111111111',
    traceFlags: 1,
  });

  const child = parent.withSpan(childSpan);

  assert.notEqual(child, parent);
  assert.equal(child.spanId, '1111111111111111');
  assert.equal(parent.spanId, PARENT_SPAN_ID);
  assert.equal(child.deadline, 5000);
  assert.equal(child.requestId, 'req-2');
  assert.equal(child.spans, parent.spans);
});

test('CorrelationContext - deadline arithmetic', () => {
  const ctx = CorrelationContext.root({ deadline: 1000 });

  assert.equal(ctx.remainingMs(400), 600);
  assert.equal(ctx.isExpired(999), false);
  assert.equal(ctx.isExpired(1000), true);
  assert.equal(ctx.remainingMs(1500), 0);

  const unbounded = CorrelationContext.background();
  assert.equal(unbounded.remainingMs(), Infinity);
  assert.equal(unbounded.isExpired(), false);
});

test('OpenSpanRegistry - cancelAll closes newest first and empties the registry', () => {
  const registry = new OpenSpanRegistry();
  const cancelled: string[] = [];
  const entry = (name: string) => ({ markCancelled: (reason: string) => cancelled.push(`${name}:${reason}`) });

  const outer = entry('outer');
  const inner = entry('inner');
  const finished = entry('finished');
  registry.add(outer);
  registry.add(finished);
  registry.add(inner);
  registry.remove(finished);

  assert.equal(registry.size, 2);
  assert.equal(registry.cancelAll('deadline exceeded'), 2);
  assert.deepEqual(cancelled, ['inner:deadline exceeded', 'outer:deadline exceeded']);
  assert.equal(registry.size, 0);
});
