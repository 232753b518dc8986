/**
 * Test Outcomes
 * @module engine/outcome
 *
 * Turns whatever a test body did into an explicit outcome. Pending and canceled
 * signals, and ordinary errors, become values here; abort-worthy errors do not.
 */

import { isAbortWorthyError } from '../errors/abort.js';
import { toError } from '../errors/base.js';
import { TestPendingSignal, isCanceledSignal, isPendingSignal } from '../errors/signals.js';
import type { MaybePromise } from '../types/utility.js';

export type TestOutcome =
  | { readonly kind: 'succeeded' }
  | { readonly kind: 'failed'; readonly error: Error }
  | { readonly kind: 'pending' }
  | { readonly kind: 'canceled'; readonly reason: string; readonly error: Error };

export type TestOutcomeKind = TestOutcome['kind'];

export const SUCCEEDED: TestOutcome = { kind: 'succeeded' };
export const PENDING: TestOutcome = { kind: 'pending' };

export function failed(error: Error): TestOutcome {
  return { kind: 'failed', error };
}

/**
 * Classify a thrown value. Abort-worthy errors are rethrown unchanged.
 */
export function outcomeOfError(error: unknown): TestOutcome {
  if (isAbortWorthyError(error)) {
    throw error;
  }
  if (isPendingSignal(error)) {
    return PENDING;
  }
  if (isCanceledSignal(error)) {
    return { kind: 'canceled', reason: error.message, error };
  }
  return failed(toError(error));
}

export async function invokeTest(body: () => MaybePromise<void>): Promise<TestOutcome> {
  try {
    await body();
    return SUCCEEDED;
  } catch (error) {
    return outcomeOfError(error);
  }
}

/**
 * A test function that reproduces an outcome observed earlier
 */
export function replayOutcome(outcome: TestOutcome): () => void {
  return () => {
    switch (outcome.kind) {
      case 'succeeded':
        return;
      case 'pending':
        throw new TestPendingSignal();
      case 'failed':
      case 'canceled':
        throw outcome.error;
    }
  };
}
