/**
 * In-Memory Task Repository Implementation
 *
 * Implements TaskRepository over a Map. Every read and write completes
 * without yielding to the event loop, so concurrent requests observe each
 * operation atomically. Each call is bracketed by a `TaskRepository.<Op>`
 * span nested under the caller's context. Once the caller's deadline has
 * passed, operations fail with RequestDeadlineError and leave the store and
 * the trace untouched.
 */

import { randomUUID } from 'node:crypto';
import type { TaskRepository } from '../../domain/repositories/task-repository.ts';
import { TaskDomain, type Task, type CreateTaskData, type UpdateTaskData } from '../../domain/entities/task.ts';
import { Ok, Err, systemClock, type Result, type Clock } from '../../domain/types/common.ts';
import { TaskNotFoundError, RequestDeadlineError } from '../../domain/errors/index.ts';
import type { SpanAttributes, SpanEmitter, SpanHandle } from '../../observability/tracing/span-emitter.ts';
import type { CorrelationContext } from '../../observability/tracing/trace-context.ts';

export interface InMemoryTaskRepositoryOptions {
  /** Time source for createdAt/updatedAt */
  clock?: Clock;
  /** ID generator, random UUIDs by default */
  generateId?: () => string;
}

/**
 * In-memory implementation of TaskRepository
 */
export class InMemoryTaskRepository implements TaskRepository {
  private readonly tasks = new Map<string, Task>();
  private readonly clock: Clock;
  private readonly generateId: () => string;

  constructor(private readonly spans: SpanEmitter, options: InMemoryTaskRepositoryOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Create a new task
   */
  create(ctx: CorrelationContext, data: CreateTaskData): Promise<Result<Task>> {
    return this.traced(ctx, 'TaskRepository.Create', { 'task.title': data.title }, (_ctx, span) => {
      const now = this.clock();
      const task: Task = {
        id: this.generateId(),
        title: data.title,
        description: data.description,
        done: false,
        createdAt: now,
        updatedAt: now,
      };

      this.tasks.set(task.id, task);
      span.setAttributes({ 'task.id': task.id });
      return Ok({ ...task });
    });
  }

  /**
   * Find task by ID
   */
  findById(ctx: CorrelationContext, id: string): Promise<Result<Task>> {
    return this.traced(ctx, 'TaskRepository.GetByID', { 'task.id': id }, (_ctx, span) => {
      const task = this.tasks.get(id);
      span.setAttributes({ 'task.found': task !== undefined });
      return task ? Ok({ ...task }) : Err(new TaskNotFoundError(id));
    });
  }

  /**
   * Snapshot of all tasks
   */
  list(ctx: CorrelationContext): Promise<Result<Task[]>> {
    return this.traced(ctx, 'TaskRepository.List', {}, (_ctx, span) => {
      const snapshot = Array.from(this.tasks.values(), (task) => ({ ...task }));
      span.setAttributes({ 'task.count': snapshot.length });
      return Ok(snapshot);
    });
  }

  /**
   * Update an existing task
   */
  update(ctx: CorrelationContext, id: string, data: UpdateTaskData): Promise<Result<Task>> {
    return this.traced(ctx, 'TaskRepository.Update', { 'task.id': id }, (_ctx, span) => {
      const existing = this.tasks.get(id);
      span.setAttributes({ 'task.found': existing !== undefined });
      if (!existing) {
        return Err(new TaskNotFoundError(id));
      }

      const updated = TaskDomain.applyUpdate(existing, data, this.clock());
      this.tasks.set(id, updated);
      return Ok({ ...updated });
    });
  }

  /**
   * Delete a task
   */
  delete(ctx: CorrelationContext, id: string): Promise<Result<void>> {
    return this.traced(ctx, 'TaskRepository.Delete', { 'task.id': id }, (_ctx, span) => {
      const found = this.tasks.delete(id);
      span.setAttributes({ 'task.found': found });
      return found ? Ok(undefined) : Err(new TaskNotFoundError(id));
    });
  }

  /**
   * Current number of tasks
   */
  count(): number {
    return this.tasks.size;
  }

  private traced<T>(
    ctx: CorrelationContext,
    name: string,
    attributes: SpanAttributes,
    fn: (ctx: CorrelationContext, span: SpanHandle) => Result<T>,
  ): Promise<Result<T>> {
    if (ctx.isExpired()) {
      return Promise.resolve(Err(new RequestDeadlineError()));
    }
    return this.spans.withSpan(ctx, name, attributes, fn);
  }
}
