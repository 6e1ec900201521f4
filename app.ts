import Fastify, { type FastifyInstance } from 'fastify';
import { healthRoutes } from './routes/api/health.ts';
import { taskRoutes, type TaskRoutesOptions } from './routes/api/tasks.ts';
import { ServiceKeys, type AppContainer } from './lib/container/index.ts';
import type { ErrorBody } from './lib/middleware/tracing.ts';

/**
 * Build the HTTP application. Routes are registered but nothing listens;
 * call `listen` or drive it with `inject`.
 */
export async function createApp(deps: TaskRoutesOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: false, ignoreTrailingSlash: true });

  app.setNotFoundHandler((_request, reply) => {
    const body: ErrorBody = { error: 'not found', code: 'NOT_FOUND' };
    reply.code(404).send(body);
  });

  await app.register(healthRoutes);
  await app.register(taskRoutes, deps);

  return app;
}

/**
 * Resolve route dependencies from the container
 */
export function createAppFromContainer(container: AppContainer): Promise<FastifyInstance> {
  return createApp({
    repository: container.get(ServiceKeys.TASK_REPOSITORY),
    tracing: {
      spans: container.get(ServiceKeys.SPAN_EMITTER),
      metrics: container.get(ServiceKeys.METRICS_COLLECTOR),
      logger: container.get(ServiceKeys.LOGGER),
      requestTimeoutMs: container.get(ServiceKeys.CONFIG).server.requestTimeoutMs,
    },
  });
}
