/**
 * Trace Context Management - Request-scoped correlation carried explicitly through every layer
 *
 * This module provides:
 * - CorrelationContext, an immutable handle on the active span, deadline and request id
 * - OpenSpanRegistry, the per-request set of spans that have not been closed yet
 * - Extraction of W3C trace context from incoming HTTP headers
 */

import { ROOT_CONTEXT, trace } from '@opentelemetry/api';
import type { Context as OtelContext, Span, SpanContext, TextMapGetter } from '@opentelemetry/api';
import { W3CTraceContextPropagator } from '@opentelemetry/core';

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Incoming HTTP headers as Node exposes them
 */
export type IncomingHeaders = Record<string, string | string[] | undefined>;

/**
 * A span that can be force-closed when its request is abandoned
 */
export interface CancellableSpan {
  /** Close the span with ERROR status; no-op if already closed */
  markCancelled(reason: string): void;
}

/**
 * Options for creating a request's root context
 */
export interface RootContextOptions {
  /** Incoming headers carrying `traceparent`/`tracestate` */
  headers?: IncomingHeaders;
  /** Absolute deadline in epoch milliseconds */
  deadline?: number;
  /** Request identifier echoed in logs and response headers */
  requestId?: string;
}

// ============================================================================
// OPEN SPAN REGISTRY
// ============================================================================

/**
 * Spans opened for one request that have not ended yet
 */
export class OpenSpanRegistry {
  private readonly open = new Set<CancellableSpan>();

  add(span: CancellableSpan): void {
    this.open.add(span);
  }

  remove(span: CancellableSpan): void {
    this.open.delete(span);
  }

  get size(): number {
    return this.open.size;
  }

  /**
   * Close every span still open, most recently opened first.
   * Returns how many were cancelled.
   */
  cancelAll(reason: string): number {
    const pending = [...this.open].reverse();
    for (const span of pending) {
      span.markCancelled(reason);
    }
    this.open.clear();
    return pending.length;
  }
}

// ============================================================================
// HEADER EXTRACTION
// ============================================================================

const propagator = new W3CTraceContextPropagator();

const headerGetter: TextMapGetter<IncomingHeaders> = {
  keys(carrier) {
    return Object.keys(carrier);
  },
  get(carrier, key) {
    return carrier[key.toLowerCase()];
  },
};

/**
 * Extract the caller's trace context from W3C headers.
 * Missing or malformed headers yield the root context.
 */
export function extractTraceContext(headers: IncomingHeaders): OtelContext {
  return propagator.extract(ROOT_CONTEXT, headers, headerGetter);
}

// ============================================================================
// CORRELATION CONTEXT
// ============================================================================

/**
 * Immutable request-scoped correlation handle.
 *
 * Deriving a child never mutates the parent, so a caller that keeps its own
 * reference is unaffected by spans opened further down.
 */
export class CorrelationContext {
  private constructor(
    readonly otelContext: OtelContext,
    readonly spans: OpenSpanRegistry,
    readonly deadline?: number,
    readonly requestId?: string,
  ) {}

  /**
   * Context for a new inbound request
   */
  static root(options: RootContextOptions = {}): CorrelationContext {
    const otelContext = options.headers ? extractTraceContext(options.headers) : ROOT_CONTEXT;
    return new CorrelationContext(otelContext, new OpenSpanRegistry(), options.deadline, options.requestId);
  }

  /**
   * Context with no span, deadline or request, for work outside a request
   */
  static background(): CorrelationContext {
    return new CorrelationContext(ROOT_CONTEXT, new OpenSpanRegistry());
  }

  /**
   * Child context whose active span is `span`
   */
  withSpan(span: Span): CorrelationContext {
    return new CorrelationContext(trace.setSpan(this.otelContext, span), this.spans, this.deadline, this.requestId);
  }

  /** Active span, if any */
  get span(): Span | undefined {
    return trace.getSpan(this.otelContext);
  }

  get spanContext(): SpanContext | undefined {
    const spanContext = trace.getSpanContext(this.otelContext);
    return spanContext && trace.isSpanContextValid(spanContext) ? spanContext : undefined;
  }

  get traceId(): string | undefined {
    return this.spanContext?.traceId;
  }

  get spanId(): string | undefined {
    return this.spanContext?.spanId;
  }

  /**
   * Milliseconds left before the deadline; Infinity without one
   */
  remainingMs(now: number = Date.now()): number {
    if (this.deadline === undefined) {
      return Infinity;
    }
    return Math.max(0, this.deadline - now);
  }

  isExpired(now: number = Date.now()): boolean {
    return this.deadline !== undefined && now >= this.deadline;
  }
}
