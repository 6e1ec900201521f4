/**
 * ObservabilityService - Owns the telemetry providers and their shutdown
 *
 * This service provides:
 * - Provider initialization with fatal error propagation
 * - Span emitter and logger factories bound to the live providers
 * - Export pipeline health
 * - One bounded, idempotent shutdown path: traces and metrics flush first,
 *   the log provider shuts down last
 */

import type { BasicTracerProvider } from '@opentelemetry/sdk-trace-base';
import type { MeterProvider } from '@opentelemetry/sdk-metrics';
import type { LoggerProvider } from '@opentelemetry/sdk-logs';
import type { ObservabilityConfig } from './config/observability-config.ts';
import { createProviders, type ProviderOverrides, type TelemetryProviders } from './sdk-init.ts';
import type { BatchExportStats } from './export/batch-export-queue.ts';
import { SpanEmitter } from './tracing/span-emitter.ts';
import {
  createComponentLogger,
  createLogger,
  type IStructuredLogger,
  type LoggerConfig,
} from './logging/structured-logger.ts';
import { InfrastructureError } from '../domain/errors/index.ts';

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Options for initialize()
 */
export interface ObservabilityInitOptions {
  /** Logger settings for loggers bound to the log provider */
  logger?: Partial<LoggerConfig>;
  /** Exporter replacements */
  overrides?: ProviderOverrides;
}

/**
 * Service health status
 */
export interface ServiceHealth {
  /** Overall health status */
  healthy: boolean;
  /** Initialization status */
  initialized: boolean;
  /** Last error if any */
  lastError?: string;
  /** Service uptime in milliseconds */
  uptime: number;
  /** Initialization timestamp */
  startedAt?: Date;
  /** Export queue statistics per channel */
  exports: {
    spans?: BatchExportStats;
    logs?: BatchExportStats;
  };
}

/**
 * Outcome of shutdown()
 */
export interface ShutdownResult {
  /** Every provider finished within the timeout */
  flushed: boolean;
  durationMs: number;
  /** Provider shutdowns that failed or timed out */
  failures: string[];
}

/**
 * Observability service interface
 */
export interface IObservabilityService {
  /** Build the providers; throws on failure */
  initialize(config: ObservabilityConfig, options?: ObservabilityInitOptions): void;

  /** Span emitter bound to the tracer provider */
  createSpanEmitter(): SpanEmitter;

  /** Logger emitting to the log provider */
  createLogger(context?: { component?: string }): IStructuredLogger;

  /** Get service health status */
  getHealth(): ServiceHealth;

  /** Flush and shut down all providers within `timeoutMs` */
  shutdown(timeoutMs?: number): Promise<ShutdownResult>;
}

export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 30000;

export type Settled = { status: 'done' } | { status: 'timeout' } | { status: 'failed'; error: Error };

/**
 * Wait for `promise`, giving up after `ms`
 */
export async function settleWithin(promise: Promise<unknown>, ms: number): Promise<Settled> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<Settled>((resolve) => {
    timer = setTimeout(() => resolve({ status: 'timeout' }), Math.max(0, ms));
  });

  try {
    return await Promise.race([
      promise.then(
        (): Settled => ({ status: 'done' }),
        (error: unknown): Settled => ({
          status: 'failed',
          error: error instanceof Error ? error : new Error(String(error)),
        }),
      ),
      timeout,
    ]);
  } finally {
    clearTimeout(timer);
  }
}

// ============================================================================
// OBSERVABILITY SERVICE IMPLEMENTATION
// ============================================================================

/**
 * ObservabilityService implementation
 */
export class ObservabilityService implements IObservabilityService {
  private config: ObservabilityConfig | null = null;
  private providers: TelemetryProviders | null = null;
  private loggerConfig: Partial<LoggerConfig> = {};
  private logger: IStructuredLogger | null = null;
  private startedAt: Date | null = null;
  private lastError: string | null = null;
  private shutdownPromise: Promise<ShutdownResult> | null = null;

  /**
   * @param startupLogger console-only logger for setup, export and shutdown failures
   */
  constructor(private readonly startupLogger: IStructuredLogger) {}

  /**
   * Initialize the observability service
   */
  initialize(config: ObservabilityConfig, options: ObservabilityInitOptions = {}): void {
    if (this.providers) {
      throw new InfrastructureError('observability providers are already initialized');
    }

    try {
      this.startedAt = new Date();
      this.lastError = null;
      this.config = config;
      this.loggerConfig = {
        serviceName: config.otel.serviceName,
        serviceVersion: config.otel.serviceVersion,
        environment: config.otel.environment,
        ...options.logger,
      };

      this.providers = createProviders(config, {
        ...options.overrides,
        onExportError: options.overrides?.onExportError ?? ((error, itemCount) => {
          this.startupLogger.warn('Telemetry export failed', {
            operation: 'export',
            metadata: { itemCount, reason: error.message },
          });
        }),
      });
      this.logger = this.createLogger({ component: 'observability' });

      if (config.performance.sdkDisabled) {
        this.startupLogger.info('OpenTelemetry export disabled by configuration');
      } else {
        this.startupLogger.info('OpenTelemetry providers initialized', {
          metadata: {
            service: config.otel.serviceName,
            environment: config.otel.environment,
            endpoint: config.exporter.endpoint,
            protocol: config.exporter.protocol,
          },
        });
      }
    } catch (error) {
      this.handleError('initialize', error);
      throw new InfrastructureError(
        `failed to initialize telemetry providers: ${this.lastError}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  get tracerProvider(): BasicTracerProvider {
    return this.requireProviders().tracerProvider;
  }

  get meterProvider(): MeterProvider {
    return this.requireProviders().meterProvider;
  }

  get loggerProvider(): LoggerProvider {
    return this.requireProviders().loggerProvider;
  }

  /**
   * Span emitter bound to the tracer provider
   */
  createSpanEmitter(): SpanEmitter {
    const config = this.requireConfig();
    return new SpanEmitter(this.tracerProvider, config.otel.serviceName, config.otel.serviceVersion);
  }

  /**
   * Logger emitting to the log provider
   */
  createLogger(context: { component?: string } = {}): IStructuredLogger {
    const config = this.requireConfig();
    const otelLogger = this.loggerProvider.getLogger(config.otel.serviceName, config.otel.serviceVersion);
    const logger = createLogger(this.loggerConfig, otelLogger);
    return context.component ? createComponentLogger(logger, context.component) : logger;
  }

  /**
   * Get service health status
   */
  getHealth(): ServiceHealth {
    const now = new Date();
    return {
      healthy: this.providers !== null && this.shutdownPromise === null && this.lastError === null,
      initialized: this.providers !== null,
      lastError: this.lastError ?? undefined,
      uptime: this.startedAt ? now.getTime() - this.startedAt.getTime() : 0,
      startedAt: this.startedAt ?? undefined,
      exports: {
        spans: this.providers?.spanProcessor?.getStats(),
        logs: this.providers?.logProcessor?.getStats(),
      },
    };
  }

  /**
   * Graceful shutdown. Only the first call does any work; later calls
   * resolve with the same result.
   */
  shutdown(timeoutMs: number = DEFAULT_SHUTDOWN_TIMEOUT_MS): Promise<ShutdownResult> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.shutdownProviders(timeoutMs);
    }
    return this.shutdownPromise;
  }

  private async shutdownProviders(timeoutMs: number): Promise<ShutdownResult> {
    const startedAt = Date.now();
    const failures: string[] = [];
    const providers = this.providers;
    if (!providers) {
      return { flushed: true, durationMs: 0, failures };
    }

    const remaining = () => timeoutMs - (Date.now() - startedAt);
    const track = (channel: string, outcome: Settled) => {
      if (outcome.status === 'timeout') {
        failures.push(`${channel}: timed out`);
      } else if (outcome.status === 'failed') {
        failures.push(`${channel}: ${outcome.error.message}`);
      }
    };

    // Traces and metrics first
    const [traces, metrics] = await Promise.all([
      settleWithin(providers.tracerProvider.shutdown(), remaining()),
      settleWithin(providers.meterProvider.shutdown(), remaining()),
    ]);
    track('traces', traces);
    track('metrics', metrics);

    this.logger?.info('Tracer and meter providers shut down', {
      operation: 'shutdown',
      metadata: { failures: failures.length, spans: providers.spanProcessor?.getStats().exported ?? 0 },
    });

    // Logs last, so the lines above are exported
    track('logs', await settleWithin(providers.loggerProvider.shutdown(), remaining()));

    const result: ShutdownResult = {
      flushed: failures.length === 0,
      durationMs: Date.now() - startedAt,
      failures,
    };

    if (result.flushed) {
      this.startupLogger.info('Telemetry shutdown complete', { metadata: { durationMs: result.durationMs } });
    } else {
      this.lastError = `shutdown: ${failures.join('; ')}`;
      this.startupLogger.warn('Telemetry shutdown incomplete; buffered data may be lost', {
        metadata: { durationMs: result.durationMs, failures },
      });
    }

    return result;
  }

  private requireProviders(): TelemetryProviders {
    if (!this.providers) {
      throw new InfrastructureError('observability providers are not initialized');
    }
    return this.providers;
  }

  private requireConfig(): ObservabilityConfig {
    if (!this.config) {
      throw new InfrastructureError('observability providers are not initialized');
    }
    return this.config;
  }

  /**
   * Handle errors consistently
   */
  private handleError(operation: string, error: unknown): void {
    const errorMessage = error instanceof Error ? error.message : String(error);
    this.lastError = `${operation}: ${errorMessage}`;
    this.startupLogger.error(
      `ObservabilityService.${operation} failed`,
      error instanceof Error ? error : new Error(errorMessage),
    );
  }
}
