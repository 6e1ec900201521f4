// ============================================================================
// Common Domain Types and Result Pattern
// ============================================================================

/**
 * Result pattern for consistent error handling across the domain
 */
export type Result<T, E = Error> = Success<T> | Failure<E>;

export interface Success<T> {
  success: true;
  data: T;
}

export interface Failure<E> {
  success: false;
  error: E;
}

/**
 * Helper functions for creating Result instances
 */
export const Ok = <T>(data: T): Success<T> => ({ success: true, data });
export const Err = <E>(error: E): Failure<E> => ({ success: false, error });

/**
 * Base entity interface with common fields
 */
export interface BaseEntity {
  id: string;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Time source, injectable so tests can control timestamps
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
