// ============================================================================
// Base Domain Error Types
// ============================================================================

/**
 * Base domain error class
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Validation error for domain rules
 */
export class ValidationError extends DomainError {
  readonly code: string = 'VALIDATION_ERROR';
  readonly statusCode = 400;

  constructor(message: string, public readonly field?: string) {
    super(message);
  }
}

/**
 * Infrastructure error (telemetry backends, instrument setup, etc.)
 */
export class InfrastructureError extends DomainError {
  readonly code: string = 'INFRASTRUCTURE_ERROR';
  readonly statusCode = 500;

  constructor(message: string, public readonly originalError?: Error) {
    super(message);
  }
}

/**
 * The request's deadline passed before the work started
 */
export class RequestDeadlineError extends DomainError {
  readonly code = 'DEADLINE_EXCEEDED';
  readonly statusCode = 500;

  constructor() {
    super('request deadline exceeded');
  }
}
