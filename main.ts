import type { FastifyInstance } from 'fastify';
import { createAppFromContainer } from './app.ts';
import { loadAppConfig, type AppConfig } from './lib/config/app-config.ts';
import { initializeContainer, ServiceKeys, type AppContainer } from './lib/container/index.ts';
import {
  createStartupLogger,
  getLoggerConfigFromEnv,
  settleWithin,
  type IStructuredLogger,
} from './lib/observability/index.ts';

const startupLogger = createStartupLogger(getLoggerConfigFromEnv());

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function fatal(message: string, error: unknown): never {
  startupLogger.error(message, toError(error));
  process.exit(1);
}

/**
 * Stop accepting requests, let in-flight ones finish, then flush telemetry,
 * all within the configured shutdown window
 */
async function shutdown(app: FastifyInstance, container: AppContainer, logger: IStructuredLogger, signal: string): Promise<void> {
  const config = container.get(ServiceKeys.CONFIG);
  const deadline = Date.now() + config.server.shutdownTimeoutMs;

  logger.info('shutting down server...', { metadata: { signal } });

  const closed = await settleWithin(app.close(), config.server.shutdownTimeoutMs);
  if (closed.status === 'done') {
    logger.info('server stopped');
  } else {
    logger.error(
      'server forced to shutdown',
      closed.status === 'failed' ? closed.error : new Error('in-flight requests did not finish in time'),
    );
  }

  await container.get(ServiceKeys.OBSERVABILITY).shutdown(deadline - Date.now());
}

async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadAppConfig();
  } catch (error) {
    fatal('invalid configuration', error);
  }

  startupLogger.info('starting application', {
    metadata: {
      service: config.observability.otel.serviceName,
      environment: config.observability.otel.environment,
      port: config.server.port,
    },
  });

  let container: AppContainer;
  try {
    container = initializeContainer({ config, startupLogger });
  } catch (error) {
    fatal('failed to initialize telemetry', error);
  }

  const logger = container.get(ServiceKeys.LOGGER);
  const app = await createAppFromContainer(container);

  try {
    const address = await app.listen({ port: config.server.port, host: config.server.host });
    logger.info('server listening', { metadata: { addr: address } });
  } catch (error) {
    logger.error('server error', toError(error));
    await container.get(ServiceKeys.OBSERVABILITY).shutdown(config.server.shutdownTimeoutMs);
    process.exit(1);
  }

  let stopping = false;
  const onSignal = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    shutdown(app, container, logger, signal).then(
      () => process.exit(0),
      (error: unknown) => fatal('shutdown failed', error),
    );
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error: unknown) => fatal('startup failed', error));
