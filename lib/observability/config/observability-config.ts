/**
 * ObservabilityConfig - Configuration interface and validation for OpenTelemetry observability
 *
 * This module provides:
 * - Type-safe configuration schema
 * - Environment variable parsing and validation
 * - Configuration defaults and fallback values
 */

// ============================================================================
// CONFIGURATION INTERFACES
// ============================================================================

/**
 * Core OpenTelemetry configuration
 */
export interface OtelConfig {
  /** Service identification */
  serviceName: string;
  serviceVersion: string;
  serviceNamespace: string;
  /** Deployment environment, attached to every resource */
  environment: string;
}

export const EXPORT_PROTOCOLS = ['grpc', 'http/json'] as const;
export type ExportProtocol = typeof EXPORT_PROTOCOLS[number];

/**
 * OTLP Exporter configuration
 */
export interface OtlpExporterConfig {
  /** Collector endpoint URL */
  endpoint: string;
  /** Protocol for OTLP export */
  protocol: ExportProtocol;
  /** Export timeout in milliseconds */
  timeout: number;
  /** Optional authentication headers */
  headers?: Record<string, string>;
}

export const OVERFLOW_POLICIES = ['drop-oldest', 'drop-newest'] as const;
export type OverflowPolicy = typeof OVERFLOW_POLICIES[number];

/**
 * Batch processor configuration, shared by the span and log pipelines
 */
export interface BatchProcessorConfig {
  maxExportBatchSize: number;
  exportTimeout: number;
  scheduleDelay: number;
  maxQueueSize: number;
  overflowPolicy: OverflowPolicy;
}

/**
 * Instrumentation configuration
 */
export interface InstrumentationConfig {
  /** Metric export interval in milliseconds */
  metricExportInterval: number;
  batchSpanProcessor: BatchProcessorConfig;
  batchLogProcessor: BatchProcessorConfig;
}

/**
 * Performance and reliability configuration
 */
export interface PerformanceConfig {
  /** SDK disabled flag: providers are built without exporters */
  sdkDisabled: boolean;
}

/**
 * Complete observability configuration
 */
export interface ObservabilityConfig {
  otel: OtelConfig;
  exporter: OtlpExporterConfig;
  instrumentation: InstrumentationConfig;
  performance: PerformanceConfig;
}

// ============================================================================
// CONFIGURATION DEFAULTS
// ============================================================================

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: ObservabilityConfig = {
  otel: {
    serviceName: 'task-service',
    serviceVersion: '1.0.0',
    serviceNamespace: 'task-service',
    environment: 'development',
  },
  exporter: {
    endpoint: 'http://localhost:4317',
    protocol: 'grpc',
    timeout: 10000,
  },
  instrumentation: {
    metricExportInterval: 10000,
    batchSpanProcessor: {
      maxExportBatchSize: 512,
      exportTimeout: 30000,
      scheduleDelay: 5000,
      maxQueueSize: 2048,
      overflowPolicy: 'drop-oldest',
    },
    batchLogProcessor: {
      maxExportBatchSize: 512,
      exportTimeout: 30000,
      scheduleDelay: 1000,
      maxQueueSize: 2048,
      overflowPolicy: 'drop-oldest',
    },
  },
  performance: {
    sdkDisabled: false,
  },
};

// ============================================================================
// ENVIRONMENT VARIABLE PARSING
// ============================================================================

export type Env = Record<string, string | undefined>;

/**
 * Parse boolean environment variable with fallback
 */
export function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Parse number environment variable with fallback
 */
export function parseNumberEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = Number(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a `key=value,key2=value2` list
 */
function parseKeyValueList(value: string): Record<string, string> {
  const pairs: Record<string, string> = {};
  for (const pair of value.split(',')) {
    // Values may contain '=' (base64 credentials)
    const separator = pair.indexOf('=');
    if (separator <= 0) continue;
    const key = pair.slice(0, separator).trim();
    const val = pair.slice(separator + 1).trim();
    if (key && val) {
      pairs[key] = val;
    }
  }
  return pairs;
}

function isOneOf<T extends string>(value: string | undefined, validValues: readonly T[]): value is T {
  return validValues.some((valid) => valid === value);
}

function parseBatchProcessorEnv(env: Env, prefix: string, defaults: BatchProcessorConfig): BatchProcessorConfig {
  const overflowPolicy = env[`${prefix}_OVERFLOW_POLICY`];
  return {
    maxExportBatchSize: parseNumberEnv(env[`${prefix}_MAX_EXPORT_BATCH_SIZE`], defaults.maxExportBatchSize),
    exportTimeout: parseNumberEnv(env[`${prefix}_EXPORT_TIMEOUT`], defaults.exportTimeout),
    scheduleDelay: parseNumberEnv(env[`${prefix}_SCHEDULE_DELAY`], defaults.scheduleDelay),
    maxQueueSize: parseNumberEnv(env[`${prefix}_MAX_QUEUE_SIZE`], defaults.maxQueueSize),
    overflowPolicy: isOneOf(overflowPolicy, OVERFLOW_POLICIES) ? overflowPolicy : defaults.overflowPolicy,
  };
}

/**
 * Load configuration from environment variables
 */
export function loadConfigFromEnv(env: Env = process.env): ObservabilityConfig {
  const protocol = env.OTEL_EXPORTER_OTLP_PROTOCOL || DEFAULT_CONFIG.exporter.protocol;
  if (!isOneOf(protocol, EXPORT_PROTOCOLS)) {
    throw new ConfigValidationError(
      `Invalid value '${protocol}'. Must be one of: ${EXPORT_PROTOCOLS.join(', ')}`,
      'exporter.protocol',
    );
  }

  const config: ObservabilityConfig = {
    otel: {
      serviceName: env.OTEL_SERVICE_NAME || DEFAULT_CONFIG.otel.serviceName,
      serviceVersion: env.OTEL_SERVICE_VERSION || DEFAULT_CONFIG.otel.serviceVersion,
      serviceNamespace: env.OTEL_SERVICE_NAMESPACE || DEFAULT_CONFIG.otel.serviceNamespace,
      environment: env.ENVIRONMENT || DEFAULT_CONFIG.otel.environment,
    },
    exporter: {
      endpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT || DEFAULT_CONFIG.exporter.endpoint,
      protocol,
      timeout: parseNumberEnv(env.OTEL_EXPORTER_OTLP_TIMEOUT, DEFAULT_CONFIG.exporter.timeout),
    },
    instrumentation: {
      metricExportInterval: parseNumberEnv(env.OTEL_METRIC_EXPORT_INTERVAL, DEFAULT_CONFIG.instrumentation.metricExportInterval),
      batchSpanProcessor: parseBatchProcessorEnv(env, 'OTEL_BSP', DEFAULT_CONFIG.instrumentation.batchSpanProcessor),
      batchLogProcessor: parseBatchProcessorEnv(env, 'OTEL_BLRP', DEFAULT_CONFIG.instrumentation.batchLogProcessor),
    },
    performance: {
      sdkDisabled: parseBooleanEnv(env.OTEL_SDK_DISABLED, DEFAULT_CONFIG.performance.sdkDisabled),
    },
  };

  // Parse optional headers
  const headersEnv = env.OTEL_EXPORTER_OTLP_HEADERS;
  if (headersEnv) {
    config.exporter.headers = parseKeyValueList(headersEnv);
  }

  return config;
}

// ============================================================================
// CONFIGURATION VALIDATION
// ============================================================================

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(message: string, public field: string) {
    super(`Configuration validation error for field '${field}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Validate URL format
 */
function validateUrl(url: string, field: string): void {
  try {
    new URL(url);
  } catch {
    throw new ConfigValidationError(`Invalid URL format: ${url}`, field);
  }
}

/**
 * Validate number range
 */
export function validateNumberRange(value: number, min: number, max: number, field: string): void {
  if (value < min || value > max) {
    throw new ConfigValidationError(`Value ${value} must be between ${min} and ${max}`, field);
  }
}

/**
 * Validate enum value
 */
function validateEnum<T extends string>(value: string, validValues: readonly T[], field: string): void {
  if (!isOneOf(value, validValues)) {
    throw new ConfigValidationError(`Invalid value '${value}'. Must be one of: ${validValues.join(', ')}`, field);
  }
}

function validateBatchProcessor(config: BatchProcessorConfig, field: string): void {
  validateNumberRange(config.maxQueueSize, 1, 65536, `${field}.maxQueueSize`);
  validateNumberRange(config.maxExportBatchSize, 1, config.maxQueueSize, `${field}.maxExportBatchSize`);
  validateNumberRange(config.exportTimeout, 1, 60000, `${field}.exportTimeout`);
  validateNumberRange(config.scheduleDelay, 1, 60000, `${field}.scheduleDelay`);
  validateEnum(config.overflowPolicy, OVERFLOW_POLICIES, `${field}.overflowPolicy`);
}

/**
 * Validate observability configuration
 */
export function validateConfig(config: ObservabilityConfig): void {
  // Validate OTEL config
  if (!config.otel.serviceName.trim()) {
    throw new ConfigValidationError('Service name cannot be empty', 'otel.serviceName');
  }

  if (!config.otel.serviceVersion.trim()) {
    throw new ConfigValidationError('Service version cannot be empty', 'otel.serviceVersion');
  }

  if (!config.otel.environment.trim()) {
    throw new ConfigValidationError('Environment cannot be empty', 'otel.environment');
  }

  // Validate exporter config
  validateUrl(config.exporter.endpoint, 'exporter.endpoint');
  validateEnum(config.exporter.protocol, EXPORT_PROTOCOLS, 'exporter.protocol');
  validateNumberRange(config.exporter.timeout, 1000, 60000, 'exporter.timeout');

  // Validate instrumentation config; the periodic reader rejects a timeout longer than its interval
  validateNumberRange(config.instrumentation.metricExportInterval, 1000, 60000, 'instrumentation.metricExportInterval');
  if (config.exporter.timeout > config.instrumentation.metricExportInterval) {
    throw new ConfigValidationError(
      `Export timeout ${config.exporter.timeout} exceeds metric export interval ${config.instrumentation.metricExportInterval}`,
      'exporter.timeout',
    );
  }
  validateBatchProcessor(config.instrumentation.batchSpanProcessor, 'instrumentation.batchSpanProcessor');
  validateBatchProcessor(config.instrumentation.batchLogProcessor, 'instrumentation.batchLogProcessor');
}

/**
 * Load and validate configuration from environment
 */
export function loadAndValidateConfig(env: Env = process.env): ObservabilityConfig {
  const config = loadConfigFromEnv(env);
  validateConfig(config);
  return config;
}
