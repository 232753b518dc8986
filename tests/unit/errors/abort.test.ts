/**
 * Abort-worthy Error Unit Tests
 * @module tests/unit/errors/abort.test
 */

import { describe, it, expect } from 'vitest';
import { isAbortWorthyError } from '../../../src/errors/abort.js';
import {
  ConcurrentModificationError,
  DuplicateTestNameError,
  RegistrationClosedError,
  SuiteAbortedError,
} from '../../../src/errors/engine-errors.js';
import { TestPendingSignal } from '../../../src/errors/signals.js';

function nodeError(code: string): Error {
  return Object.assign(new Error('resource exhausted'), { code });
}

describe('isAbortWorthyError', () => {
  it.each([
    ['a suite abort', new SuiteAbortedError('abort')],
    ['a concurrent modification', new ConcurrentModificationError('two writers')],
    ['a closed registration', new RegistrationClosedError('closed')],
    ['stack exhaustion', new RangeError('Maximum call stack size exceeded')],
    ['worker memory exhaustion', nodeError('ERR_WORKER_OUT_OF_MEMORY')],
    ['allocation failure', nodeError('ERR_MEMORY_ALLOCATION_FAILED')],
  ])('should abort on %s', (_label, error) => {
    expect(isAbortWorthyError(error)).toBe(true);
  });

  it.each([
    ['an assertion failure', new Error('expected true')],
    ['a duplicate name', new DuplicateTestNameError('t')],
    ['a pending signal', new TestPendingSignal()],
    ['an unrelated range error', new RangeError('index out of range')],
    ['an unrelated node error', nodeError('ENOENT')],
    ['a thrown string', 'boom'],
  ])('should not abort on %s', (_label, error) => {
    expect(isAbortWorthyError(error)).toBe(false);
  });
});
