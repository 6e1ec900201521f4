import { test } from 'node:test';
import assert from 'node:assert/strict';
import { SpanKind, SpanStatusCode } from '@opentelemetry/api';
import { SpanEmitter } from './span-emitter.ts';
import { CorrelationContext } from './trace-context.ts';
import { createTestTelemetry } from '../../../tests/test-utils.ts';

test('SpanEmitter - nested spans share the trace and link to their parent', async () => {
  const telemetry = createTestTelemetry();
  const emitter = new SpanEmitter(telemetry.providers.tracerProvider);

  const root = emitter.startSpan(CorrelationContext.root(), 'GET /api/v1/tasks', { 'http.method': 'GET' }, SpanKind.SERVER);
  const child = emitter.startSpan(root.context, 'TaskRepository.List');
  child.span.setAttributes({ 'task.count': 0 });
  child.span.end();
  root.span.end();

  const spans = await telemetry.finishedSpans();
  const [repoSpan, serverSpan] = spans;
  assert.equal(spans.length, 2);
  assert.equal(serverSpan.name, 'GET /api/v1/tasks');
  assert.equal(serverSpan.kind, SpanKind.SERVER);
  assert.equal(repoSpan.kind, SpanKind.INTERNAL);
  assert.equal(repoSpan.spanContext().traceId, serverSpan.spanContext().traceId);
  assert.equal(repoSpan.parentSpanId, serverSpan.spanContext().spanId);
  assert.equal(repoSpan.attributes['task.count'], 0);
  assert.equal(root.context.spanId, serverSpan.spanContext().spanId);
  await telemetry.providers.tracerProvider.shutdown();
});

test('SpanEmitter - root span continues an incoming trace', async () => {
  const telemetry = createTestTelemetry();
  const emitter = new SpanEmitter(telemetry.providers.tracerProvider);
  const incoming = CorrelationContext.root({
    headers: { traceparent: '00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01' },
  });

  emitter.startSpan(incoming, 'GET /api/v1/tasks', {}, SpanKind.SERVER).span.end();

  const [span] = await telemetry.finishedSpans();
  assert.equal(span.spanContext().traceId, '4bf92f3577b34da6a3ce929d0e0e4736');
  assert.equal(span.parentSpanId, '00f067aa0ba902b7');
  await telemetry.providers.tracerProvider.shutdown();
});

test('SpanHandle - end is idempotent', async () => {
  const telemetry = createTestTelemetry();
  const emitter = new SpanEmitter(telemetry.providers.tracerProvider);
  const parent = CorrelationContext.root();

  const { span } = emitter.startSpan(parent, 'once');
  assert.equal(parent.spans.size, 1);
  span.end();
  span.end();
  span.setAttributes({ late: true });

  const spans = await telemetry.finishedSpans();
  assert.equal(spans.length, 1);
  assert.equal(spans[0].attributes.late, undefined);
  assert.equal(span.isEnded, true);
  assert.equal(parent.spans.size, 0);
  await telemetry.providers.tracerProvider.shutdown();
});

test('SpanEmitter.withSpan - closes the span and records thrown errors', async () => {
  const telemetry = createTestTelemetry();
  const emitter = new SpanEmitter(telemetry.providers.tracerProvider);
  const parent = CorrelationContext.root();

  const value = await emitter.withSpan(parent, 'ok', {}, async (ctx) => ctx.spanId);
  await assert.rejects(
    emitter.withSpan(parent, 'fails', { 'task.id': 'abc' }, async () => {
      throw new Error('store unavailable');
    }),
    /store unavailable/,
  );

  const [okSpan, failedSpan] = await telemetry.finishedSpans();
  assert.equal(value, okSpan.spanContext().spanId);
  assert.equal(okSpan.status.code, SpanStatusCode.UNSET);
  assert.equal(failedSpan.status.code, SpanStatusCode.ERROR);
  assert.equal(failedSpan.status.message, 'store unavailable');
  assert.equal(failedSpan.events[0].name, 'exception');
  assert.equal(parent.spans.size, 0);
  await telemetry.providers.tracerProvider.shutdown();
});

test('SpanHandle - cancelling open spans closes them once with ERROR status', async () => {
  const telemetry = createTestTelemetry();
  const emitter = new SpanEmitter(telemetry.providers.tracerProvider);
  const root = emitter.startSpan(CorrelationContext.root({ deadline: Date.now() }), 'PUT /api/v1/tasks/{id}');
  const child = emitter.startSpan(root.context, 'TaskRepository.Update');

  assert.equal(root.context.spans.cancelAll('request deadline exceeded'), 2);
  child.span.end();
  root.span.end();

  const spans = await telemetry.finishedSpans();
  assert.equal(spans.length, 2);
  for (const span of spans) {
    assert.equal(span.status.code, SpanStatusCode.ERROR);
    assert.equal(span.status.message, 'request deadline exceeded');
    assert.equal(span.attributes['span.cancelled'], true);
  }
  assert.deepEqual(spans.map((span) => span.name), ['TaskRepository.Update', 'PUT /api/v1/tasks/{id}']);
  await telemetry.providers.tracerProvider.shutdown();
});
