/**
 * Simplified Result Pattern
 * Basic discriminated union for error handling without complex monadic utilities
 */

/**
 * Result type - simple discriminated union
 */
export type Result<T, E = string> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Create a success result
 */
export const Success = <T, E = never>(value: T): Result<T, E> => ({ ok: true, value });

/**
 * Create a failure result
 */
export const Failure = <T = never, E = string>(error: E): Result<T, E> => ({ ok: false, error });

/**
 * Type guard to check if result is successful
 */
export const isOk = <T, E>(result: Result<T, E>): result is { ok: true; value: T } => result.ok;

/**
 * Type guard to check if result is a failure
 */
export const isFail = <T, E>(result: Result<T, E>): result is { ok: false; error: E } =>
  !result.ok;
