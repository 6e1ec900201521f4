// ============================================================================
// Task Domain Errors
// ============================================================================

import { DomainError, ValidationError } from './base-errors.ts';

/**
 * Task not found error
 */
export class TaskNotFoundError extends DomainError {
  readonly code = 'TASK_NOT_FOUND';
  readonly statusCode = 404;

  constructor(public readonly taskId: string) {
    super('task not found', { taskId });
  }
}

/**
 * Title missing on task creation
 */
export class TitleRequiredError extends ValidationError {
  override readonly code = 'TITLE_REQUIRED';

  constructor() {
    super('title is required', 'title');
  }
}

/**
 * Request body could not be decoded into task fields
 */
export class InvalidTaskPayloadError extends ValidationError {
  override readonly code = 'INVALID_REQUEST_BODY';

  constructor(field?: string) {
    super('invalid request body', field);
  }
}
