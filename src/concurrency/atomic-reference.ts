/**
 * Atomic Reference
 * @module concurrency/atomic-reference
 *
 * A cell replaced wholesale. Callers that read a value, compute a successor and
 * write it back use `swapAndVerify`, which detects any writer that got in between.
 */

import { ConcurrentModificationError } from '../errors/engine-errors.js';

export class AtomicReference<T> {
  private value: T;

  constructor(initial: T) {
    this.value = initial;
  }

  get(): T {
    return this.value;
  }

  set(next: T): void {
    this.value = next;
  }

  getAndSet(next: T): T {
    const previous = this.value;
    this.value = next;
    return previous;
  }

  /**
   * Install `next`, failing if the cell no longer holds `expected`.
   * The new value stays installed either way, so the failure is loud rather than silent.
   */
  swapAndVerify(expected: T, next: T, message: string): void {
    const previous = this.getAndSet(next);
    if (previous !== expected) {
      throw new ConcurrentModificationError(message);
    }
  }
}
