// ============================================================================
// Task Domain Entity
// ============================================================================

import { Ok, Err, type BaseEntity, type Result } from '../types/common.ts';
import { TitleRequiredError, InvalidTaskPayloadError, type ValidationError } from '../errors/index.ts';

/**
 * Task domain entity
 */
export interface Task extends BaseEntity {
  title: string;
  description: string;
  done: boolean;
}

/**
 * Data for creating a new task
 */
export interface CreateTaskData {
  title: string;
  description: string;
}

/**
 * Data for updating a task. Empty strings leave the field unchanged.
 */
export interface UpdateTaskData {
  title?: string;
  description?: string;
  done?: boolean;
}

/**
 * Wire representation of a task
 */
export interface TaskResponse {
  id: string;
  title: string;
  description: string;
  done: boolean;
  created_at: string;
  updated_at: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Task domain service functions
 */
export class TaskDomain {
  /**
   * Decodes and validates a creation payload
   */
  static parseCreate(body: unknown): Result<CreateTaskData, ValidationError> {
    if (!isRecord(body)) {
      return Err(new InvalidTaskPayloadError());
    }

    const { title, description } = body;
    if (title !== undefined && typeof title !== 'string') {
      return Err(new InvalidTaskPayloadError('title'));
    }
    if (description !== undefined && typeof description !== 'string') {
      return Err(new InvalidTaskPayloadError('description'));
    }
    if (!title) {
      return Err(new TitleRequiredError());
    }

    return Ok({ title, description: description ?? '' });
  }

  /**
   * Decodes and validates an update payload
   */
  static parseUpdate(body: unknown): Result<UpdateTaskData, ValidationError> {
    if (!isRecord(body)) {
      return Err(new InvalidTaskPayloadError());
    }

    const { title, description, done } = body;
    if (title !== undefined && typeof title !== 'string') {
      return Err(new InvalidTaskPayloadError('title'));
    }
    if (description !== undefined && typeof description !== 'string') {
      return Err(new InvalidTaskPayloadError('description'));
    }
    if (done !== undefined && done !== null && typeof done !== 'boolean') {
      return Err(new InvalidTaskPayloadError('done'));
    }

    const data: UpdateTaskData = {};
    if (title) data.title = title;
    if (description) data.description = description;
    if (typeof done === 'boolean') data.done = done;
    return Ok(data);
  }

  /**
   * Applies an update to a task, returning the new record.
   * `updatedAt` always moves past the previous value, even within one millisecond.
   */
  static applyUpdate(task: Task, data: UpdateTaskData, now: Date): Task {
    return {
      ...task,
      title: data.title || task.title,
      description: data.description || task.description,
      done: data.done ?? task.done,
      updatedAt: new Date(Math.max(now.getTime(), task.updatedAt.getTime() + 1)),
    };
  }

  /**
   * Maps a task to its JSON wire format
   */
  static toResponse(task: Task): TaskResponse {
    return {
      id: task.id,
      title: task.title,
      description: task.description,
      done: task.done,
      created_at: task.createdAt.toISOString(),
      updated_at: task.updatedAt.toISOString(),
    };
  }
}
