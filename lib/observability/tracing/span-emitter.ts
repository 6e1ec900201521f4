/**
 * Span Emitter - Opens hierarchical spans under an explicit CorrelationContext
 */

import { SpanKind, SpanStatusCode } from '@opentelemetry/api';
import type { Span, SpanContext, Tracer, TracerProvider } from '@opentelemetry/api';
import type { CancellableSpan, CorrelationContext, OpenSpanRegistry } from './trace-context.ts';

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Span attribute values accepted by the emitter
 */
export type SpanAttributes = Record<string, string | number | boolean>;

/**
 * Result of opening a span: the derived context and the span's handle
 */
export interface StartedSpan {
  context: CorrelationContext;
  span: SpanHandle;
}

// ============================================================================
// SPAN HANDLE
// ============================================================================

/**
 * Handle on an open span. `end()` closes the span exactly once.
 */
export class SpanHandle implements CancellableSpan {
  private ended = false;

  constructor(
    private readonly span: Span,
    private readonly registry: OpenSpanRegistry,
  ) {
    registry.add(this);
  }

  get isEnded(): boolean {
    return this.ended;
  }

  get spanContext(): SpanContext {
    return this.span.spanContext();
  }

  setAttributes(attributes: SpanAttributes): void {
    if (this.ended) return;
    this.span.setAttributes(attributes);
  }

  /**
   * Record an error and set ERROR status
   */
  recordError(error: unknown): void {
    if (this.ended) return;
    const err = error instanceof Error ? error : new Error(String(error));
    this.span.recordException(err);
    this.span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
  }

  /**
   * Close the span as abandoned (deadline exceeded, client gone)
   */
  markCancelled(reason: string): void {
    if (this.ended) return;
    this.span.setAttribute('span.cancelled', true);
    this.span.setStatus({ code: SpanStatusCode.ERROR, message: reason });
    this.end();
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;
    this.registry.remove(this);
    this.span.end();
  }
}

// ============================================================================
// SPAN EMITTER
// ============================================================================

/**
 * Creates spans from an explicit tracer provider
 */
export class SpanEmitter {
  private readonly tracer: Tracer;

  constructor(tracerProvider: TracerProvider, instrumentationName = 'task-service', instrumentationVersion?: string) {
    this.tracer = tracerProvider.getTracer(instrumentationName, instrumentationVersion);
  }

  /**
   * Open a span as a child of `parent`'s active span.
   * The returned context must be passed downstream for correlation.
   */
  startSpan(
    parent: CorrelationContext,
    name: string,
    attributes: SpanAttributes = {},
    kind: SpanKind = SpanKind.INTERNAL,
  ): StartedSpan {
    const span = this.tracer.startSpan(name, { kind, attributes }, parent.otelContext);
    return {
      context: parent.withSpan(span),
      span: new SpanHandle(span, parent.spans),
    };
  }

  /**
   * Run `fn` inside a span that is always closed, recording thrown errors on it
   */
  async withSpan<T>(
    parent: CorrelationContext,
    name: string,
    attributes: SpanAttributes,
    fn: (context: CorrelationContext, span: SpanHandle) => Promise<T> | T,
  ): Promise<T> {
    const { context, span } = this.startSpan(parent, name, attributes);
    try {
      return await fn(context, span);
    } catch (error) {
      span.recordError(error);
      throw error;
    } finally {
      span.end();
    }
  }
}
