/**
 * Utility Types
 * @module types/utility
 *
 * Branded identifiers and small shared type helpers.
 */

// ============================================================================
// Branded Types
// ============================================================================

/**
 * Brand a primitive so structurally equal values of different meaning do not mix
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };

/**
 * Tag set per test name, as held by the registration bundle
 */
export type TagsMap = ReadonlyMap<string, ReadonlySet<string>>;

/**
 * Values handed to every test run
 */
export type ConfigMap = ReadonlyMap<string, unknown>;

/**
 * Empty config map shared by callers that pass no configuration
 */
export const EMPTY_CONFIG_MAP: ConfigMap = new Map<string, unknown>();

/**
 * A value that may be awaited
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Check whether a value is a thenable
 */
export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}
