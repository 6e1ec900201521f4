/**
 * MetricsCollector - HTTP request and task store metrics
 *
 * This module provides:
 * - `http_requests_total` counter per method, route template and status code
 * - `http_request_duration_seconds` histogram (buckets fixed by the provider's view)
 * - `tasks_total` observable gauge sampled from the store at export time
 */

import type { Counter, Histogram, Meter, MeterProvider, ObservableGauge, ObservableCallback } from '@opentelemetry/api';
import { InfrastructureError } from '../../domain/errors/index.ts';
import { METRIC_NAMES, METRIC_UNITS } from './metric-names.ts';

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * HTTP request metrics context
 */
export interface HttpRequestMetricsContext {
  method: string;
  /** Route template such as `/api/v1/tasks/{id}`, never the raw path */
  route: string;
  statusCode: number;
  /** Wall time from request entry to response write */
  durationSeconds: number;
}

/**
 * Reads the current number of stored tasks
 */
export type TaskCountSource = () => number;

/**
 * Collector health snapshot
 */
export interface CollectorHealth {
  healthy: boolean;
  initialized: boolean;
  metricsRecorded: number;
  lastError?: string;
}

/**
 * Metrics collector interface
 */
export interface IMetricsCollector {
  // Lifecycle
  initialize(meterProvider: MeterProvider, countTasks: TaskCountSource): void;
  shutdown(): void;

  // HTTP metrics
  recordHttpRequest(context: HttpRequestMetricsContext): void;

  // Health and status
  getCollectorHealth(): CollectorHealth;
}

/**
 * Instrument setup failed; startup must abort
 */
export class InstrumentRegistrationError extends InfrastructureError {
  override readonly code = 'INSTRUMENT_REGISTRATION_FAILED';

  constructor(message: string, originalError?: Error) {
    super(message, originalError);
  }
}

// ============================================================================
// METRICS COLLECTOR IMPLEMENTATION
// ============================================================================

/**
 * MetricsCollector implementation using OpenTelemetry
 */
export class MetricsCollector implements IMetricsCollector {
  private meter: Meter | null = null;
  private initialized = false;
  private metricsRecorded = 0;
  private lastError: string | null = null;

  // HTTP metrics
  private requestCounter: Counter | null = null;
  private requestDuration: Histogram | null = null;

  // Store metrics
  private tasksGauge: ObservableGauge | null = null;
  private tasksCallback: ObservableCallback | null = null;

  constructor(
    private readonly instrumentationName = 'task-service',
    private readonly instrumentationVersion?: string,
  ) {}

  /**
   * Create the instruments. Throws InstrumentRegistrationError on failure or
   * when called twice.
   */
  initialize(meterProvider: MeterProvider, countTasks: TaskCountSource): void {
    if (this.initialized) {
      throw new InstrumentRegistrationError(
        `instruments ${Object.values(METRIC_NAMES).join(', ')} are already registered`,
      );
    }

    try {
      this.lastError = null;
      this.meter = meterProvider.getMeter(this.instrumentationName, this.instrumentationVersion);

      this.requestCounter = this.meter.createCounter(METRIC_NAMES.HTTP_REQUESTS_TOTAL, {
        description: 'Total number of HTTP requests',
        unit: METRIC_UNITS.REQUEST,
      });

      this.requestDuration = this.meter.createHistogram(METRIC_NAMES.HTTP_REQUEST_DURATION, {
        description: 'HTTP request duration in seconds',
        unit: METRIC_UNITS.SECONDS,
      });

      this.tasksGauge = this.meter.createObservableGauge(METRIC_NAMES.TASKS_TOTAL, {
        description: 'Current number of tasks in the store',
        unit: METRIC_UNITS.TASK,
      });
      this.tasksCallback = (result) => {
        result.observe(countTasks());
      };
      this.tasksGauge.addCallback(this.tasksCallback);

      this.initialized = true;
    } catch (error) {
      this.handleError('initialize', error);
      throw new InstrumentRegistrationError(
        `failed to create instruments: ${this.lastError}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  // ============================================================================
  // HTTP METRICS
  // ============================================================================

  /**
   * Record one completed HTTP request
   */
  recordHttpRequest(context: HttpRequestMetricsContext): void {
    if (!this.initialized) return;

    try {
      const attributes = {
        'http.method': context.method,
        'http.route': context.route,
        'http.status_code': context.statusCode,
      };

      this.requestCounter?.add(1, attributes);
      this.requestDuration?.record(context.durationSeconds, attributes);

      this.metricsRecorded++;
    } catch (error) {
      this.handleError('recordHttpRequest', error);
    }
  }

  // ============================================================================
  // HEALTH AND LIFECYCLE
  // ============================================================================

  /**
   * Get collector health status
   */
  getCollectorHealth(): CollectorHealth {
    return {
      healthy: this.initialized && this.lastError === null,
      initialized: this.initialized,
      metricsRecorded: this.metricsRecorded,
      ...(this.lastError !== null && { lastError: this.lastError }),
    };
  }

  /**
   * Detach the gauge callback and release instruments
   */
  shutdown(): void {
    if (!this.initialized) return;

    if (this.tasksGauge && this.tasksCallback) {
      this.tasksGauge.removeCallback(this.tasksCallback);
    }
    this.requestCounter = null;
    this.requestDuration = null;
    this.tasksGauge = null;
    this.tasksCallback = null;
    this.meter = null;
    this.initialized = false;
  }

  /**
   * Handle errors consistently
   */
  private handleError(operation: string, error: unknown): void {
    const errorMessage = error instanceof Error ? error.message : String(error);
    this.lastError = `${operation}: ${errorMessage}`;
  }
}
