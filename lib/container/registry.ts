/**
 * Service Registry for Dependency Configuration
 *
 * Configures all service dependencies and their relationships
 * for the dependency injection container.
 */

import { Container } from './container.ts';
import type { AppConfig } from '../config/app-config.ts';
import { InMemoryTaskRepository, type InMemoryTaskRepositoryOptions } from '../infrastructure/repositories/index.ts';
import { ObservabilityService } from '../observability/observability-service.ts';
import { MetricsCollector } from '../observability/metrics/metrics-collector.ts';
import type { ProviderOverrides } from '../observability/sdk-init.ts';
import type { IStructuredLogger } from '../observability/logging/structured-logger.ts';
import type { SpanEmitter } from '../observability/tracing/span-emitter.ts';

/**
 * Services resolvable from the container
 */
export interface AppServices {
  config: AppConfig;
  startupLogger: IStructuredLogger;
  observability: ObservabilityService;
  logger: IStructuredLogger;
  spanEmitter: SpanEmitter;
  metricsCollector: MetricsCollector;
  taskRepository: InMemoryTaskRepository;
}

/**
 * Service keys for type-safe service resolution
 */
export const ServiceKeys = {
  CONFIG: 'config',
  STARTUP_LOGGER: 'startupLogger',

  // Telemetry
  OBSERVABILITY: 'observability',
  LOGGER: 'logger',
  SPAN_EMITTER: 'spanEmitter',
  METRICS_COLLECTOR: 'metricsCollector',

  // Repositories
  TASK_REPOSITORY: 'taskRepository',
} as const satisfies Record<string, keyof AppServices>;

export type ServiceKey = typeof ServiceKeys[keyof typeof ServiceKeys];

export type AppContainer = Container<AppServices>;

/**
 * Service registry configuration
 */
export interface ServiceRegistryConfig {
  config: AppConfig;
  startupLogger: IStructuredLogger;
  /** Exporter replacements, used by tests */
  telemetryOverrides?: ProviderOverrides;
  repository?: InMemoryTaskRepositoryOptions;
}

/**
 * Register all services with the container
 */
export function registerServices(container: AppContainer, registry: ServiceRegistryConfig): void {
  const { config, startupLogger } = registry;

  container.register(ServiceKeys.CONFIG, () => config);
  container.register(ServiceKeys.STARTUP_LOGGER, () => startupLogger);

  container.register(ServiceKeys.OBSERVABILITY, () => {
    const observability = new ObservabilityService(startupLogger);
    observability.initialize(config.observability, {
      logger: config.logger,
      overrides: registry.telemetryOverrides,
    });
    return observability;
  });

  container.register(ServiceKeys.LOGGER, () => {
    return container.get(ServiceKeys.OBSERVABILITY).createLogger({ component: 'http' });
  });

  container.register(ServiceKeys.SPAN_EMITTER, () => {
    return container.get(ServiceKeys.OBSERVABILITY).createSpanEmitter();
  });

  container.register(ServiceKeys.TASK_REPOSITORY, () => {
    return new InMemoryTaskRepository(container.get(ServiceKeys.SPAN_EMITTER), registry.repository);
  });

  container.register(ServiceKeys.METRICS_COLLECTOR, () => {
    const { serviceName, serviceVersion } = config.observability.otel;
    const collector = new MetricsCollector(serviceName, serviceVersion);
    const repository = container.get(ServiceKeys.TASK_REPOSITORY);
    collector.initialize(container.get(ServiceKeys.OBSERVABILITY).meterProvider, () => repository.count());
    return collector;
  });
}

/**
 * Validate that all required services are registered
 * @returns Array of missing service keys
 */
export function validateServiceRegistration(container: AppContainer): ServiceKey[] {
  return Object.values(ServiceKeys).filter((key) => !container.has(key));
}

/**
 * Initialize container with all services. Telemetry providers and
 * instruments are created eagerly so setup failures surface here.
 */
export function initializeContainer(registry: ServiceRegistryConfig): AppContainer {
  const container: AppContainer = new Container<AppServices>();

  registerServices(container, registry);

  const missingServices = validateServiceRegistration(container);
  if (missingServices.length > 0) {
    throw new Error(`Services not registered: ${missingServices.join(', ')}`);
  }

  container.get(ServiceKeys.OBSERVABILITY);
  container.get(ServiceKeys.METRICS_COLLECTOR);

  return container;
}
