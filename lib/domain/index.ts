// ============================================================================
// Domain Layer Index
// ============================================================================

// Common types and utilities
export * from './types/common.ts';

// Domain errors
export * from './errors/index.ts';

// Domain entities
export * from './entities/task.ts';

// Repository interfaces
export * from './repositories/task-repository.ts';
