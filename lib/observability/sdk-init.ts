/**
 * OpenTelemetry SDK Initialization
 *
 * Builds one explicit provider per telemetry channel (traces, metrics, logs),
 * all sharing one resource and exporting over OTLP to the configured collector.
 * Nothing is registered globally; callers hold the returned instances.
 */

import { Resource } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import { BasicTracerProvider } from '@opentelemetry/sdk-trace-base';
import type { SpanExporter } from '@opentelemetry/sdk-trace-base';
import {
  ExplicitBucketHistogramAggregation,
  MeterProvider,
  PeriodicExportingMetricReader,
  View,
} from '@opentelemetry/sdk-metrics';
import type { MetricReader, PushMetricExporter } from '@opentelemetry/sdk-metrics';
import { LoggerProvider } from '@opentelemetry/sdk-logs';
import type { LogRecordExporter } from '@opentelemetry/sdk-logs';
import { OTLPTraceExporter as GrpcTraceExporter } from '@opentelemetry/exporter-trace-otlp-grpc';
import { OTLPTraceExporter as HttpTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { OTLPMetricExporter as GrpcMetricExporter } from '@opentelemetry/exporter-metrics-otlp-grpc';
import { OTLPMetricExporter as HttpMetricExporter } from '@opentelemetry/exporter-metrics-otlp-http';
import { OTLPLogExporter as GrpcLogExporter } from '@opentelemetry/exporter-logs-otlp-grpc';
import { OTLPLogExporter as HttpLogExporter } from '@opentelemetry/exporter-logs-otlp-http';
import type { ObservabilityConfig } from './config/observability-config.ts';
import { QueuedLogRecordProcessor, QueuedSpanProcessor } from './export/batch-processors.ts';
import type { ExportErrorHandler } from './export/batch-export-queue.ts';
import { HTTP_DURATION_BUCKETS, METRIC_NAMES } from './metrics/metric-names.ts';

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Providers for the three telemetry channels
 */
export interface TelemetryProviders {
  resource: Resource;
  tracerProvider: BasicTracerProvider;
  meterProvider: MeterProvider;
  loggerProvider: LoggerProvider;
  /** Absent when the SDK is disabled */
  spanProcessor?: QueuedSpanProcessor;
  logProcessor?: QueuedLogRecordProcessor;
}

/**
 * Replacements for the OTLP exporters, used by tests and local tooling
 */
export interface ProviderOverrides {
  spanExporter?: SpanExporter;
  logExporter?: LogRecordExporter;
  metricReaders?: MetricReader[];
  /** Receives export failures from the span and log queues */
  onExportError?: ExportErrorHandler;
}

// ============================================================================
// RESOURCE AND EXPORTERS
// ============================================================================

/**
 * Resource describing this service, shared by every provider
 */
export function createResource(config: ObservabilityConfig): Resource {
  return new Resource({
    [ATTR_SERVICE_NAME]: config.otel.serviceName,
    [ATTR_SERVICE_VERSION]: config.otel.serviceVersion,
    'service.namespace': config.otel.serviceNamespace,
    'deployment.environment': config.otel.environment,
  });
}

/**
 * OTLP/HTTP needs the signal path appended; gRPC takes the bare endpoint
 */
function signalUrl(config: ObservabilityConfig, signal: 'traces' | 'metrics' | 'logs'): string {
  return `${config.exporter.endpoint.replace(/\/+$/, '')}/v1/${signal}`;
}

export function createSpanExporter(config: ObservabilityConfig): SpanExporter {
  if (config.exporter.protocol === 'http/json') {
    return new HttpTraceExporter({
      url: signalUrl(config, 'traces'),
      headers: config.exporter.headers ?? {},
      timeoutMillis: config.exporter.timeout,
    });
  }
  return new GrpcTraceExporter({ url: config.exporter.endpoint, timeoutMillis: config.exporter.timeout });
}

export function createMetricExporter(config: ObservabilityConfig): PushMetricExporter {
  if (config.exporter.protocol === 'http/json') {
    return new HttpMetricExporter({
      url: signalUrl(config, 'metrics'),
      headers: config.exporter.headers ?? {},
      timeoutMillis: config.exporter.timeout,
    });
  }
  return new GrpcMetricExporter({ url: config.exporter.endpoint, timeoutMillis: config.exporter.timeout });
}

export function createLogExporter(config: ObservabilityConfig): LogRecordExporter {
  if (config.exporter.protocol === 'http/json') {
    return new HttpLogExporter({
      url: signalUrl(config, 'logs'),
      headers: config.exporter.headers ?? {},
      timeoutMillis: config.exporter.timeout,
    });
  }
  return new GrpcLogExporter({ url: config.exporter.endpoint, timeoutMillis: config.exporter.timeout });
}

// ============================================================================
// PROVIDERS
// ============================================================================

/**
 * Histogram buckets are fixed at provider construction
 */
function createViews(): View[] {
  return [
    new View({
      instrumentName: METRIC_NAMES.HTTP_REQUEST_DURATION,
      aggregation: new ExplicitBucketHistogramAggregation([...HTTP_DURATION_BUCKETS]),
    }),
  ];
}

/**
 * Build the tracer, meter and logger providers.
 *
 * With `performance.sdkDisabled` the providers are built without exporters, so
 * instruments and loggers still work and record nothing.
 * Exporter construction errors propagate; callers treat them as fatal.
 */
export function createProviders(config: ObservabilityConfig, overrides: ProviderOverrides = {}): TelemetryProviders {
  const resource = createResource(config);
  const disabled = config.performance.sdkDisabled;

  const spanProcessor = disabled ? undefined : new QueuedSpanProcessor(
    overrides.spanExporter ?? createSpanExporter(config),
    config.instrumentation.batchSpanProcessor,
    overrides.onExportError,
  );

  const tracerProvider = new BasicTracerProvider({
    resource,
    spanProcessors: spanProcessor ? [spanProcessor] : [],
  });

  const readers = disabled ? [] : overrides.metricReaders ?? [
    new PeriodicExportingMetricReader({
      exporter: createMetricExporter(config),
      exportIntervalMillis: config.instrumentation.metricExportInterval,
      exportTimeoutMillis: config.exporter.timeout,
    }),
  ];

  const meterProvider = new MeterProvider({ resource, readers, views: createViews() });

  const loggerProvider = new LoggerProvider({ resource });
  const logProcessor = disabled ? undefined : new QueuedLogRecordProcessor(
    overrides.logExporter ?? createLogExporter(config),
    config.instrumentation.batchLogProcessor,
    overrides.onExportError,
  );
  if (logProcessor) {
    loggerProvider.addLogRecordProcessor(logProcessor);
  }

  return { resource, tracerProvider, meterProvider, loggerProvider, spanProcessor, logProcessor };
}
