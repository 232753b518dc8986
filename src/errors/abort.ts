/**
 * Abort-worthy Errors
 * @module errors/abort
 *
 * The fixed allow-list of errors the engine never catches. They propagate to the
 * caller of run and end the run.
 */

import { isBaseError } from './base.js';
import { isInvariantCode } from './codes.js';
import { SuiteAbortedError } from './engine-errors.js';

/**
 * Node error codes for resource exhaustion
 */
const EXHAUSTION_CODES: ReadonlySet<string> = new Set([
  'ERR_WORKER_OUT_OF_MEMORY',
  'ERR_MEMORY_ALLOCATION_FAILED',
]);

const STACK_EXHAUSTION_MESSAGE = 'Maximum call stack size exceeded';

function nodeErrorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

/**
 * Check whether an error must abort the run instead of failing one test
 */
export function isAbortWorthyError(error: unknown): boolean {
  if (error instanceof SuiteAbortedError) {
    return true;
  }
  if (isBaseError(error)) {
    return isInvariantCode(error.code);
  }
  if (error instanceof RangeError && error.message.includes(STACK_EXHAUSTION_MESSAGE)) {
    return true;
  }
  if (error instanceof Error) {
    const code = nodeErrorCode(error);
    return code !== undefined && EXHAUSTION_CODES.has(code);
  }
  return false;
}
