/**
 * Guaranteed Cleanup
 * @module errors/recovery
 *
 * Runs an operation followed by a cleanup step that always executes. When both
 * fail, the operation's error is rethrown and the cleanup error is logged.
 */

import type { StructuredLogger } from '../logging/logger.js';
import type { MaybePromise } from '../types/utility.js';

/**
 * Result of an operation run under `runWithCleanup`
 */
type Settled<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: unknown };

async function settle<T>(fn: () => MaybePromise<T>): Promise<Settled<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    return { ok: false, error };
  }
}

/**
 * Run `body`, then `cleanup` whatever happened.
 *
 * @param operation - name used when a suppressed cleanup error is logged
 */
export async function runWithCleanup<T>(
  operation: string,
  body: () => MaybePromise<T>,
  cleanup: () => MaybePromise<void>,
  logger: StructuredLogger
): Promise<T> {
  const result = await settle(body);
  const cleanupResult = await settle(cleanup);

  if (!result.ok) {
    if (!cleanupResult.ok) {
      logger.cleanupErrorSuppressed(operation, cleanupResult.error);
    }
    throw result.error;
  }
  if (!cleanupResult.ok) {
    throw cleanupResult.error;
  }
  return result.value;
}

/**
 * Synchronous counterpart of `runWithCleanup`, used where the caller cannot await
 */
export function runWithCleanupSync<T>(
  operation: string,
  body: () => T,
  cleanup: () => void,
  logger: StructuredLogger
): T {
  let result: Settled<T>;
  try {
    result = { ok: true, value: body() };
  } catch (error) {
    result = { ok: false, error };
  }

  let cleanupError: { readonly error: unknown } | undefined;
  try {
    cleanup();
  } catch (error) {
    cleanupError = { error };
  }

  if (!result.ok) {
    if (cleanupError) {
      logger.cleanupErrorSuppressed(operation, cleanupError.error);
    }
    throw result.error;
  }
  if (cleanupError) {
    throw cleanupError.error;
  }
  return result.value;
}
