/**
 * Thread Awareness
 * @module concurrency/thread-awareness
 *
 * Remembers the execution context that constructed an object. Messages from that
 * context may be buffered by it; messages from any other context are forwarded
 * as they arrive, because nothing would be left to flush them later.
 */

import { AtomicReference } from './atomic-reference.js';
import { currentExecutionContext, type ExecutionContext } from './execution-context.js';

export abstract class ThreadAwareness {
  private readonly constructingContext = new AtomicReference<ExecutionContext>(
    currentExecutionContext()
  );

  isConstructingThread(): boolean {
    return currentExecutionContext().id === this.constructingContext.get().id;
  }
}
