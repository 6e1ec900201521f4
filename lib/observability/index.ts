/**
 * Observability - Main export file for OpenTelemetry observability
 *
 * This module exports:
 * - Service initialization and shutdown
 * - Configuration interfaces and utilities
 * - Correlation contexts and span creation
 * - Metrics recording
 * - Structured logging with trace correlation
 */

// Re-export OpenTelemetry API constants used with the span emitter
export { SpanStatusCode, SpanKind } from '@opentelemetry/api';

// Configuration
export type {
  ObservabilityConfig,
  OtelConfig,
  OtlpExporterConfig,
  BatchProcessorConfig,
  InstrumentationConfig,
  PerformanceConfig,
  ExportProtocol,
  OverflowPolicy,
} from './config/observability-config.ts';

export {
  DEFAULT_CONFIG,
  loadConfigFromEnv,
  validateConfig,
  loadAndValidateConfig,
  ConfigValidationError,
} from './config/observability-config.ts';

// Service and providers
export type {
  IObservabilityService,
  ObservabilityInitOptions,
  ServiceHealth,
  ShutdownResult,
} from './observability-service.ts';

export { ObservabilityService, DEFAULT_SHUTDOWN_TIMEOUT_MS, settleWithin } from './observability-service.ts';

export type { TelemetryProviders, ProviderOverrides } from './sdk-init.ts';
export { createProviders, createResource } from './sdk-init.ts';

// Export pipeline
export type { BatchExportStats } from './export/batch-export-queue.ts';
export { BatchExportQueue } from './export/batch-export-queue.ts';
export { QueuedSpanProcessor, QueuedLogRecordProcessor } from './export/batch-processors.ts';

// Tracing
export type { IncomingHeaders, RootContextOptions } from './tracing/trace-context.ts';
export { CorrelationContext, OpenSpanRegistry, extractTraceContext } from './tracing/trace-context.ts';
export type { SpanAttributes, StartedSpan } from './tracing/span-emitter.ts';
export { SpanEmitter, SpanHandle } from './tracing/span-emitter.ts';

// Metrics
export type { HttpRequestMetricsContext, IMetricsCollector, TaskCountSource } from './metrics/metrics-collector.ts';
export { MetricsCollector, InstrumentRegistrationError } from './metrics/metrics-collector.ts';
export { METRIC_NAMES, METRIC_UNITS, HTTP_DURATION_BUCKETS } from './metrics/metric-names.ts';

// Logging
export type { IStructuredLogger, LogContext, LogLevel, LoggerConfig } from './logging/structured-logger.ts';
export {
  StructuredLogger,
  createLogger,
  createStartupLogger,
  createComponentLogger,
  getLoggerConfigFromEnv,
} from './logging/structured-logger.ts';
