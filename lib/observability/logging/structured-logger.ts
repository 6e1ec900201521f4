/**
 * StructuredLogger - Structured logging with OpenTelemetry trace correlation
 *
 * This module provides:
 * - Logger with trace ID and span ID taken from an explicit CorrelationContext
 * - Structured log formatting with consistent schema
 * - Emission to an OpenTelemetry logger for batched OTLP export
 * - Span events for logs written while a span is open
 */

import { ROOT_CONTEXT } from '@opentelemetry/api';
import { SeverityNumber } from '@opentelemetry/api-logs';
import type { AnyValueMap, Logger as OtelLogger } from '@opentelemetry/api-logs';
import type { CorrelationContext } from '../tracing/trace-context.ts';

// ============================================================================
// INTERFACES AND TYPES
// ============================================================================

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

/**
 * Log levels supported by the structured logger
 */
export type LogLevel = typeof LOG_LEVELS[number];

/**
 * Log context for additional metadata
 */
export interface LogContext {
  /** Request correlation; supplies trace and span IDs */
  correlation?: CorrelationContext;
  /** Operation name or identifier */
  operation?: string;
  /** Component or service name */
  component?: string;
  /** Request ID for request correlation */
  requestId?: string;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

/**
 * Structured log entry format
 */
export interface LogEntry {
  /** Timestamp in ISO format */
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  version: string;
  environment: string;
  traceId?: string;
  spanId?: string;
  operation?: string;
  component?: string;
  requestId?: string;
  /** Error details if applicable */
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string | number;
  };
  metadata?: Record<string, unknown>;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  serviceName: string;
  serviceVersion: string;
  environment: string;
  /** Minimum log level */
  level: LogLevel;
  /** Enable human-readable console output */
  enableConsole: boolean;
  /** Enable structured JSON output; takes precedence over enableConsole */
  enableStructured: boolean;
  /** Attach trace IDs and span events from the correlation context */
  enableTraceCorrelation: boolean;
}

/**
 * Structured logger interface
 */
export interface IStructuredLogger {
  /** Log debug message */
  debug(message: string, context?: LogContext): void;
  /** Log info message */
  info(message: string, context?: LogContext): void;
  /** Log warning message */
  warn(message: string, context?: LogContext): void;
  /** Log error message */
  error(message: string, error?: Error, context?: LogContext): void;
  /** Create child logger with additional context */
  child(context: Partial<LogContext>): IStructuredLogger;
  /** Set log level */
  setLevel(level: LogLevel): void;
  /** Get current log level */
  getLevel(): LogLevel;
}

// ============================================================================
// STRUCTURED LOGGER IMPLEMENTATION
// ============================================================================

/**
 * Default logger configuration
 */
export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  serviceName: 'task-service',
  serviceVersion: '1.0.0',
  environment: 'development',
  level: 'info',
  enableConsole: true,
  enableStructured: true,
  enableTraceCorrelation: true,
};

/**
 * Log level priorities for filtering
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SEVERITY: Record<LogLevel, { number: SeverityNumber; text: string }> = {
  debug: { number: SeverityNumber.DEBUG, text: 'DEBUG' },
  info: { number: SeverityNumber.INFO, text: 'INFO' },
  warn: { number: SeverityNumber.WARN, text: 'WARN' },
  error: { number: SeverityNumber.ERROR, text: 'ERROR' },
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function errorCode(error: Error): string | number | undefined {
  const code = 'code' in error ? error.code : undefined;
  return typeof code === 'string' || typeof code === 'number' ? code : undefined;
}

function toAttributeValue(value: unknown): string | number | boolean {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return JSON.stringify(value) ?? String(value);
}

/**
 * StructuredLogger implementation
 */
export class StructuredLogger implements IStructuredLogger {
  private config: LoggerConfig;
  private baseContext: Partial<LogContext>;

  constructor(
    config: Partial<LoggerConfig> = {},
    baseContext: Partial<LogContext> = {},
    private readonly otelLogger?: OtelLogger,
  ) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
    this.baseContext = baseContext;
  }

  /**
   * Log debug message
   */
  debug(message: string, context: LogContext = {}): void {
    this.log('debug', message, undefined, context);
  }

  /**
   * Log info message
   */
  info(message: string, context: LogContext = {}): void {
    this.log('info', message, undefined, context);
  }

  /**
   * Log warning message
   */
  warn(message: string, context: LogContext = {}): void {
    this.log('warn', message, undefined, context);
  }

  /**
   * Log error message
   */
  error(message: string, error?: Error, context: LogContext = {}): void {
    this.log('error', message, error, context);
  }

  /**
   * Create child logger with additional context
   */
  child(context: Partial<LogContext>): IStructuredLogger {
    const mergedContext = { ...this.baseContext, ...context };
    return new StructuredLogger(this.config, mergedContext, this.otelLogger);
  }

  /**
   * Set log level
   */
  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  /**
   * Get current log level
   */
  getLevel(): LogLevel {
    return this.config.level;
  }

  /**
   * Core logging method
   */
  private log(level: LogLevel, message: string, error?: Error, context: LogContext = {}): void {
    // Check if log level meets minimum threshold
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.level]) {
      return;
    }

    const { correlation, ...fields } = { ...this.baseContext, ...context };
    const traced = this.config.enableTraceCorrelation ? correlation : undefined;

    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.config.serviceName,
      version: this.config.serviceVersion,
      environment: this.config.environment,
      ...(traced?.traceId && { traceId: traced.traceId, spanId: traced.spanId }),
      ...fields,
    };

    if (error) {
      logEntry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
        code: errorCode(error),
      };
    }

    this.output(logEntry);
    this.emit(logEntry, traced);

    if (traced) {
      this.recordToSpan(traced, logEntry, error);
    }
  }

  /**
   * Hand the record to the OpenTelemetry logger; trace IDs come from the
   * correlation context, never the ambient one
   */
  private emit(logEntry: LogEntry, correlation?: CorrelationContext): void {
    if (!this.otelLogger) {
      return;
    }

    const attributes: AnyValueMap = {
      ...(logEntry.component && { 'component.name': logEntry.component }),
      ...(logEntry.operation && { 'operation.name': logEntry.operation }),
      ...(logEntry.requestId && { 'request.id': logEntry.requestId }),
    };
    for (const [key, value] of Object.entries(logEntry.metadata ?? {})) {
      attributes[key] = toAttributeValue(value);
    }
    if (logEntry.error) {
      attributes['exception.type'] = logEntry.error.name;
      attributes['exception.message'] = logEntry.error.message;
      if (logEntry.error.stack) {
        attributes['exception.stacktrace'] = logEntry.error.stack;
      }
    }

    this.otelLogger.emit({
      timestamp: new Date(logEntry.timestamp),
      severityNumber: SEVERITY[logEntry.level].number,
      severityText: SEVERITY[logEntry.level].text,
      body: logEntry.message,
      attributes,
      context: correlation?.otelContext ?? ROOT_CONTEXT,
    });
  }

  /**
   * Record log entry as an event on the open span
   */
  private recordToSpan(correlation: CorrelationContext, logEntry: LogEntry, error?: Error): void {
    const span = correlation.span;
    if (!span || !span.isRecording()) {
      return;
    }

    span.addEvent(`log.${logEntry.level}`, {
      'log.severity': logEntry.level,
      'log.message': logEntry.message,
      'log.timestamp': logEntry.timestamp,
      ...(logEntry.operation && { 'operation.name': logEntry.operation }),
      ...(logEntry.component && { 'component.name': logEntry.component }),
    });

    if (error) {
      span.recordException(error);
    }
  }

  /**
   * Output log entry to configured destinations
   */
  private output(logEntry: LogEntry): void {
    if (this.config.enableStructured) {
      console.log(JSON.stringify(logEntry));
    } else if (this.config.enableConsole) {
      const level = logEntry.level.toUpperCase().padEnd(5);
      const traceInfo = logEntry.traceId ? ` [${logEntry.traceId.slice(0, 8)}]` : '';
      const contextInfo = this.formatContextInfo(logEntry);

      console.log(`${logEntry.timestamp} ${level}${traceInfo}${contextInfo} ${logEntry.message}`);

      if (logEntry.error?.stack) {
        console.log(logEntry.error.stack);
      }
    }
  }

  /**
   * Format context information for human-readable output
   */
  private formatContextInfo(logEntry: LogEntry): string {
    const parts: string[] = [];

    if (logEntry.requestId) parts.push(`req:${logEntry.requestId}`);
    if (logEntry.operation) parts.push(`op:${logEntry.operation}`);
    if (logEntry.component) parts.push(`comp:${logEntry.component}`);

    return parts.length > 0 ? ` [${parts.join(', ')}]` : '';
  }
}

// ============================================================================
// LOGGER FACTORY AND UTILITIES
// ============================================================================

/**
 * Get logger configuration from environment variables
 */
export function getLoggerConfigFromEnv(env: Record<string, string | undefined> = process.env): Partial<LoggerConfig> {
  const level = env.LOG_LEVEL?.toLowerCase();
  return {
    serviceName: env.OTEL_SERVICE_NAME || DEFAULT_LOGGER_CONFIG.serviceName,
    serviceVersion: env.OTEL_SERVICE_VERSION || DEFAULT_LOGGER_CONFIG.serviceVersion,
    environment: env.ENVIRONMENT || DEFAULT_LOGGER_CONFIG.environment,
    level: isLogLevel(level) ? level : DEFAULT_LOGGER_CONFIG.level,
    enableConsole: env.LOG_ENABLE_CONSOLE !== 'false',
    enableStructured: env.LOG_ENABLE_STRUCTURED !== 'false',
    enableTraceCorrelation: env.LOG_ENABLE_TRACE_CORRELATION !== 'false',
  };
}

/**
 * Create a logger that also emits to an OpenTelemetry logger
 */
export function createLogger(
  config: Partial<LoggerConfig>,
  otelLogger?: OtelLogger,
  context: Partial<LogContext> = {},
): IStructuredLogger {
  return new StructuredLogger(config, context, otelLogger);
}

/**
 * Console-only logger for use before the log provider exists and after it shuts down
 */
export function createStartupLogger(config: Partial<LoggerConfig> = {}): IStructuredLogger {
  return new StructuredLogger(config, { component: 'startup' });
}

/**
 * Create a logger with specific context for a component
 */
export function createComponentLogger(
  parent: IStructuredLogger,
  component: string,
  additionalContext: Partial<LogContext> = {},
): IStructuredLogger {
  return parent.child({ component, ...additionalContext });
}
