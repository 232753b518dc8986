/**
 * Concurrency Module
 * @module concurrency
 */

export { AtomicReference } from './atomic-reference.js';
export {
  MAIN_EXECUTION_CONTEXT,
  currentExecutionContext,
  runInExecutionContext,
  type ExecutionContext,
  type ExecutionContextId,
} from './execution-context.js';
export { ThreadAwareness } from './thread-awareness.js';
