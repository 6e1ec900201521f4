/**
 * Tracing Middleware - HTTP request tracing, metrics and deadline handling
 *
 * This middleware provides:
 * - A SERVER root span per request, continuing any incoming W3C trace
 * - A request deadline that cancels every span still open when it elapses
 * - Outcome classification and the error body mapping for domain errors
 * - One counter increment and one duration observation per request
 * - X-Request-ID and X-Trace-ID response headers
 */

import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import { SpanKind } from '@opentelemetry/api';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { DomainError } from '../domain/errors/index.ts';
import { CorrelationContext } from '../observability/tracing/trace-context.ts';
import type { SpanEmitter, SpanHandle } from '../observability/tracing/span-emitter.ts';
import type { IMetricsCollector } from '../observability/metrics/metrics-collector.ts';
import type { IStructuredLogger } from '../observability/logging/structured-logger.ts';

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Dependencies shared by every traced route
 */
export interface TracingMiddlewareOptions {
  spans: SpanEmitter;
  metrics: IMetricsCollector;
  logger: IStructuredLogger;
  /** Per-request deadline in milliseconds */
  requestTimeoutMs: number;
}

/**
 * Request tracing context handed to route handlers
 */
export interface RequestTracingContext {
  /** Context of the root span; pass it to every downstream call */
  correlation: CorrelationContext;
  /** Root span */
  span: SpanHandle;
  /** Request ID, taken from X-Request-ID when the caller sends one */
  requestId: string;
  /** Logger carrying the request ID and operation */
  logger: IStructuredLogger;
}

/**
 * Error response body
 */
export interface ErrorBody {
  error: string;
  code: string;
}

/**
 * What a route handler produced; the middleware writes it
 */
export interface RouteOutcome {
  statusCode: number;
  body?: unknown;
}

export type TracedRouteHandler = (request: FastifyRequest, tracing: RequestTracingContext) => Promise<RouteOutcome>;

export type OutcomeClass = 'success' | 'not-found' | 'bad-input' | 'internal-error';

// ============================================================================
// OUTCOMES
// ============================================================================

export const DEADLINE_EXCEEDED_REASON = 'request deadline exceeded';

const INTERNAL_ERROR: ErrorBody = { error: 'internal server error', code: 'INTERNAL_ERROR' };
const DEADLINE_EXCEEDED_BODY: ErrorBody = { error: DEADLINE_EXCEEDED_REASON, code: 'DEADLINE_EXCEEDED' };

/**
 * Classify a response status into exactly one outcome
 */
export function classifyOutcome(statusCode: number): OutcomeClass {
  if (statusCode < 400) return 'success';
  if (statusCode === 404) return 'not-found';
  if (statusCode < 500) return 'bad-input';
  return 'internal-error';
}

/**
 * Map an error to its response. Domain errors keep their status and code;
 * anything else is an internal error with a generic body.
 */
export function errorOutcome(error: unknown): RouteOutcome {
  if (error instanceof DomainError && error.statusCode < 500) {
    const body: ErrorBody = { error: error.message, code: error.code };
    return { statusCode: error.statusCode, body };
  }
  return { statusCode: 500, body: INTERNAL_ERROR };
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function headerValue(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  return first?.trim() || undefined;
}

const DEADLINE = Symbol('deadline');

/**
 * Settle with `work`, or with DEADLINE once the context's deadline passes
 */
function raceDeadline<T>(work: Promise<T>, correlation: CorrelationContext): Promise<T | typeof DEADLINE> {
  const remaining = correlation.remainingMs();
  if (!Number.isFinite(remaining)) {
    return work;
  }

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<typeof DEADLINE>((resolve) => {
    timer = setTimeout(() => resolve(DEADLINE), remaining);
  });
  return Promise.race([work, expired]).finally(() => clearTimeout(timer));
}

// ============================================================================
// TRACING MIDDLEWARE
// ============================================================================

/**
 * Wrap a route handler with request telemetry.
 *
 * @param route route template recorded on spans and metrics, e.g. `/api/v1/tasks/{id}`
 */
export function withTracing(
  options: TracingMiddlewareOptions,
  route: string,
  handler: TracedRouteHandler,
): (request: FastifyRequest, reply: FastifyReply) => Promise<void> {
  return async (request, reply) => {
    const startTime = performance.now();
    const method = request.method;
    const operation = `${method} ${route}`;
    const requestId = headerValue(request.headers['x-request-id']) ?? randomUUID();

    const root = CorrelationContext.root({
      headers: request.headers,
      deadline: Date.now() + options.requestTimeoutMs,
      requestId,
    });
    const { context, span } = options.spans.startSpan(
      root,
      operation,
      {
        'http.method': method,
        'http.route': route,
        'http.target': request.url,
        'request.id': requestId,
      },
      SpanKind.SERVER,
    );
    const logger = options.logger.child({ requestId, operation });

    let outcome: RouteOutcome;
    let timedOut = false;
    try {
      const result = await raceDeadline(handler(request, { correlation: context, span, requestId, logger }), context);
      if (result === DEADLINE) {
        timedOut = true;
        outcome = { statusCode: 500, body: DEADLINE_EXCEEDED_BODY };
        logger.error(DEADLINE_EXCEEDED_REASON, undefined, {
          correlation: context,
          metadata: { timeoutMs: options.requestTimeoutMs, openSpans: context.spans.size },
        });
      } else {
        outcome = result;
      }
    } catch (error) {
      // Handler bugs become internal errors; the server keeps running
      span.recordError(error);
      logger.error('unhandled error in request handler', toError(error), { correlation: context });
      outcome = errorOutcome(error);
    }

    const { statusCode } = outcome;
    span.setAttributes({ 'http.status_code': statusCode, 'request.outcome': classifyOutcome(statusCode) });
    if (timedOut) {
      context.spans.cancelAll(DEADLINE_EXCEEDED_REASON);
    }

    reply.header('x-request-id', requestId);
    if (context.traceId) {
      reply.header('x-trace-id', context.traceId);
    }
    reply.code(statusCode);
    if (outcome.body === undefined) {
      reply.send();
    } else {
      reply.send(outcome.body);
    }

    const durationSeconds = (performance.now() - startTime) / 1000;
    logger.info('request completed', {
      correlation: context,
      metadata: { statusCode, durationMs: Math.round(durationSeconds * 1000) },
    });
    span.end();
    options.metrics.recordHttpRequest({ method, route, statusCode, durationSeconds });
  };
}
