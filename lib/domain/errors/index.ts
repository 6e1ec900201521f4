// ============================================================================
// Domain Errors Index
// ============================================================================

// Base errors
export * from './base-errors.ts';

// Specific domain errors
export * from './task-errors.ts';
