/**
 * Infrastructure Repository Exports
 *
 * Provides in-memory implementations of domain repository interfaces
 */

export { InMemoryTaskRepository } from './in-memory-task-repository.ts';
export type { InMemoryTaskRepositoryOptions } from './in-memory-task-repository.ts';
