// Task CRUD API endpoints
import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import {
  TaskDomain,
  DomainError,
  InvalidTaskPayloadError,
  Ok,
  Err,
  type TaskRepository,
  type ValidationError,
  type Result,
} from '../../lib/domain/index.ts';
import type { IStructuredLogger } from '../../lib/observability/logging/structured-logger.ts';
import type { SpanEmitter } from '../../lib/observability/tracing/span-emitter.ts';
import type { CorrelationContext } from '../../lib/observability/tracing/trace-context.ts';
import {
  errorOutcome,
  withTracing,
  type RouteOutcome,
  type TracingMiddlewareOptions,
} from '../../lib/middleware/tracing.ts';

export const TASKS_ROUTE = '/api/v1/tasks';
export const TASK_ROUTE = '/api/v1/tasks/{id}';

export interface TaskRoutesOptions {
  repository: TaskRepository;
  tracing: TracingMiddlewareOptions;
}

/**
 * `/api/v1/tasks/{id}` -> `/api/v1/tasks/:id`
 */
export function toRouterPath(template: string): string {
  return template.replace(/\{(\w+)\}/g, ':$1');
}

/**
 * Bodies arrive as raw strings (see the content type parser below) so a
 * malformed document is a bad-input outcome inside the traced handler.
 */
export function decodeJsonBody(body: unknown): Result<unknown, ValidationError> {
  if (typeof body !== 'string') {
    return body === undefined || body === null ? Err(new InvalidTaskPayloadError()) : Ok(body);
  }
  try {
    const parsed: unknown = JSON.parse(body);
    return Ok(parsed);
  } catch {
    return Err(new InvalidTaskPayloadError());
  }
}

function taskIdParam(request: FastifyRequest): string {
  const params = request.params;
  if (typeof params === 'object' && params !== null && 'id' in params && typeof params.id === 'string') {
    return params.id;
  }
  return '';
}

/**
 * Log a failed operation at the level its outcome deserves and map it to a response
 */
function failure(error: Error, logger: IStructuredLogger, correlation: CorrelationContext, message: string): RouteOutcome {
  if (error instanceof DomainError && error.statusCode < 500) {
    logger.warn(error.message, { correlation, metadata: { code: error.code, ...error.context } });
  } else {
    logger.error(message, error, { correlation });
  }
  return errorOutcome(error);
}

export const taskRoutes: FastifyPluginAsync<TaskRoutesOptions> = async (app, { repository, tracing }) => {
  const spans: SpanEmitter = tracing.spans;

  // Scoped to this plugin: keep the raw body so decoding happens inside the handler span
  app.addContentTypeParser(['application/json', '*'], { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  app.get(TASKS_ROUTE, withTracing(tracing, TASKS_ROUTE, (_request, { correlation, logger }) =>
    spans.withSpan(correlation, 'TaskHandler.List', {}, async (ctx, span) => {
      logger.info('listing all tasks', { correlation: ctx });

      const result = await repository.list(ctx);
      if (!result.success) {
        return failure(result.error, logger, ctx, 'failed to list tasks');
      }

      span.setAttributes({ 'task.count': result.data.length });
      logger.info('tasks listed', { correlation: ctx, metadata: { count: result.data.length } });
      return { statusCode: 200, body: result.data.map(TaskDomain.toResponse) };
    }),
  ));

  app.post(TASKS_ROUTE, withTracing(tracing, TASKS_ROUTE, (request, { correlation, logger }) =>
    spans.withSpan(correlation, 'TaskHandler.Create', {}, async (ctx, span) => {
      const body = decodeJsonBody(request.body);
      if (!body.success) {
        return failure(body.error, logger, ctx, 'invalid request body');
      }
      const data = TaskDomain.parseCreate(body.data);
      if (!data.success) {
        return failure(data.error, logger, ctx, 'validation failed');
      }

      logger.info('creating task', { correlation: ctx, metadata: { title: data.data.title } });
      const result = await repository.create(ctx, data.data);
      if (!result.success) {
        return failure(result.error, logger, ctx, 'failed to create task');
      }

      span.setAttributes({ 'task.id': result.data.id });
      logger.info('task created', { correlation: ctx, metadata: { id: result.data.id } });
      return { statusCode: 201, body: TaskDomain.toResponse(result.data) };
    }),
  ));

  const taskPath = toRouterPath(TASK_ROUTE);

  app.get(taskPath, withTracing(tracing, TASK_ROUTE, (request, { correlation, logger }) => {
    const id = taskIdParam(request);
    return spans.withSpan(correlation, 'TaskHandler.GetByID', { 'task.id': id }, async (ctx) => {
      logger.info('getting task', { correlation: ctx, metadata: { id } });

      const result = await repository.findById(ctx, id);
      if (!result.success) {
        return failure(result.error, logger, ctx, 'failed to get task');
      }

      logger.info('task retrieved', { correlation: ctx, metadata: { id } });
      return { statusCode: 200, body: TaskDomain.toResponse(result.data) };
    });
  }));

  app.put(taskPath, withTracing(tracing, TASK_ROUTE, (request, { correlation, logger }) => {
    const id = taskIdParam(request);
    return spans.withSpan(correlation, 'TaskHandler.Update', { 'task.id': id }, async (ctx) => {
      const body = decodeJsonBody(request.body);
      if (!body.success) {
        return failure(body.error, logger, ctx, 'invalid request body');
      }
      const data = TaskDomain.parseUpdate(body.data);
      if (!data.success) {
        return failure(data.error, logger, ctx, 'validation failed');
      }

      logger.info('updating task', { correlation: ctx, metadata: { id } });
      const result = await repository.update(ctx, id, data.data);
      if (!result.success) {
        return failure(result.error, logger, ctx, 'failed to update task');
      }

      logger.info('task updated', { correlation: ctx, metadata: { id } });
      return { statusCode: 200, body: TaskDomain.toResponse(result.data) };
    });
  }));

  app.delete(taskPath, withTracing(tracing, TASK_ROUTE, (request, { correlation, logger }) => {
    const id = taskIdParam(request);
    return spans.withSpan(correlation, 'TaskHandler.Delete', { 'task.id': id }, async (ctx) => {
      logger.info('deleting task', { correlation: ctx, metadata: { id } });

      const result = await repository.delete(ctx, id);
      if (!result.success) {
        return failure(result.error, logger, ctx, 'failed to delete task');
      }

      logger.info('task deleted', { correlation: ctx, metadata: { id } });
      return { statusCode: 204 };
    });
  }));
};
