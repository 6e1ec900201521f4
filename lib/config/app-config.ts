/**
 * Application Configuration
 *
 * HTTP server settings read from the environment, next to the
 * observability and logger settings they are loaded with.
 */

import {
  ConfigValidationError,
  loadAndValidateConfig,
  parseNumberEnv,
  validateNumberRange,
  type ObservabilityConfig,
} from '../observability/config/observability-config.ts';
import { getLoggerConfigFromEnv, type LoggerConfig } from '../observability/logging/structured-logger.ts';

type Env = Record<string, string | undefined>;

export interface ServerConfig {
  port: number;
  host: string;
  /** Per-request deadline in milliseconds */
  requestTimeoutMs: number;
  /** Graceful shutdown window in milliseconds */
  shutdownTimeoutMs: number;
}

export interface AppConfig {
  server: ServerConfig;
  observability: ObservabilityConfig;
  logger: Partial<LoggerConfig>;
}

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  port: 8080,
  host: '0.0.0.0',
  requestTimeoutMs: 60000,
  shutdownTimeoutMs: 30000,
};

/**
 * Creates server configuration from environment variables
 */
export function parseServerConfig(env: Env = process.env): ServerConfig {
  const config: ServerConfig = {
    port: parseNumberEnv(env.SERVER_PORT, DEFAULT_SERVER_CONFIG.port),
    host: env.SERVER_HOST || DEFAULT_SERVER_CONFIG.host,
    requestTimeoutMs: parseNumberEnv(env.REQUEST_TIMEOUT_MS, DEFAULT_SERVER_CONFIG.requestTimeoutMs),
    shutdownTimeoutMs: parseNumberEnv(env.SHUTDOWN_TIMEOUT_MS, DEFAULT_SERVER_CONFIG.shutdownTimeoutMs),
  };

  if (!Number.isInteger(config.port)) {
    throw new ConfigValidationError(`Port ${config.port} must be an integer`, 'server.port');
  }
  validateNumberRange(config.port, 0, 65535, 'server.port');
  validateNumberRange(config.requestTimeoutMs, 1, 600000, 'server.requestTimeoutMs');
  validateNumberRange(config.shutdownTimeoutMs, 1, 600000, 'server.shutdownTimeoutMs');

  return config;
}

/**
 * Loads and validates the whole application configuration. Throws
 * ConfigValidationError naming the first invalid field.
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
  return {
    server: parseServerConfig(env),
    observability: loadAndValidateConfig(env),
    logger: getLoggerConfigFromEnv(env),
  };
}
