// ============================================================================
// Task Repository Interface
// ============================================================================

import type { Task, CreateTaskData, UpdateTaskData } from '../entities/task.ts';
import type { Result } from '../types/common.ts';
import type { CorrelationContext } from '../../observability/tracing/trace-context.ts';

/**
 * Task repository interface for data access abstraction.
 *
 * Every operation except `count` takes the caller's correlation context so the
 * implementation can open a nested span under the request span.
 */
export interface TaskRepository {
  /**
   * Create a new task
   */
  create(ctx: CorrelationContext, data: CreateTaskData): Promise<Result<Task>>;

  /**
   * Find task by ID, failing with TaskNotFoundError
   */
  findById(ctx: CorrelationContext, id: string): Promise<Result<Task>>;

  /**
   * Snapshot of all tasks; order is not guaranteed
   */
  list(ctx: CorrelationContext): Promise<Result<Task[]>>;

  /**
   * Update an existing task, failing with TaskNotFoundError
   */
  update(ctx: CorrelationContext, id: string, data: UpdateTaskData): Promise<Result<Task>>;

  /**
   * Delete a task, failing with TaskNotFoundError
   */
  delete(ctx: CorrelationContext, id: string): Promise<Result<void>>;

  /**
   * Current number of tasks. Synchronous so the metrics gauge can sample it.
   */
  count(): number;
}
