// Health check API endpoint, outside tracing and metrics
import type { FastifyPluginAsync } from 'fastify';

export const HEALTH_ROUTE = '/health';

export interface HealthResponse {
  status: 'ok';
}

export const healthRoutes: FastifyPluginAsync = async (app) => {
  app.get(HEALTH_ROUTE, async (_request, reply) => {
    const health: HealthResponse = { status: 'ok' };
    reply.header('cache-control', 'no-cache');
    return health;
  });
};
