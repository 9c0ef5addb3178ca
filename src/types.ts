/**
 * Core type definitions for the base image advisor.
 * Provides the Result type for error handling and re-exports the recommendation model.
 */

export * from './types/recommendation';

/**
 * Result type for functional error handling
 *
 * Used where a failure is an expected outcome the caller must branch on
 * (unparseable requirements, unreadable catalog files). Infrastructure failures
 * are thrown, not wrapped.
 *
 * @example
 * ```typescript
 * const result = parseRequirement({ language: 'python', version: '3.12' });
 * if (result.ok) {
 *   const recommendations = await engine.recommend(result.value);
 * } else {
 *   console.error(result.error);
 * }
 * ```
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: string };

/** Create a success result */
export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/** Create a failure result */
export const Failure = <T>(error: string): Result<T> => ({ ok: false, error });

/** Type guard to check if result is a failure */
export const isFail = <T>(result: Result<T>): result is { ok: false; error: string } => !result.ok;
