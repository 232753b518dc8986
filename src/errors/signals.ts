/**
 * Test Control Signals
 * @module errors/signals
 *
 * Signals a test body throws to end itself as pending or canceled rather than
 * failed. The engine turns them into outcomes at the invocation boundary.
 */

import { BaseError, type ErrorContext } from './base.js';
import { ExecutionErrorCodes } from './codes.js';

/**
 * The test is not implemented yet
 */
export class TestPendingSignal extends BaseError {
  constructor(context: ErrorContext = {}) {
    super('Test is pending', ExecutionErrorCodes.TEST_PENDING, context);
    this.name = 'TestPendingSignal';
  }
}

/**
 * A precondition of the test was not met
 */
export class TestCanceledSignal extends BaseError {
  public readonly reason: string;

  constructor(reason: string, context: ErrorContext = {}) {
    super(reason, ExecutionErrorCodes.TEST_CANCELED, context);
    this.name = 'TestCanceledSignal';
    this.reason = reason;
  }
}

/**
 * Mark the running test as pending
 *
 * @example
 * ```typescript
 * this.it('should pop values off the stack', () => pending());
 * ```
 */
export function pending(): never {
  throw new TestPendingSignal();
}

/**
 * Cancel the running test
 */
export function cancel(reason = 'Test canceled'): never {
  throw new TestCanceledSignal(reason);
}

/**
 * Cancel the running test unless `condition` holds
 */
export function assume(condition: boolean, clue?: string): asserts condition {
  if (!condition) {
    throw new TestCanceledSignal(clue ? `Assumption failed: ${clue}` : 'Assumption failed');
  }
}

export function isPendingSignal(error: unknown): error is TestPendingSignal {
  return error instanceof TestPendingSignal;
}

export function isCanceledSignal(error: unknown): error is TestCanceledSignal {
  return error instanceof TestCanceledSignal;
}
