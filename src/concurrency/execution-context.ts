/**
 * Execution Context
 * @module concurrency/execution-context
 *
 * AsyncLocalStorage-based identity for "threads" of execution. Code outside any
 * scope runs in the main context; `runInExecutionContext` opens a new one, which
 * async continuations started inside it inherit.
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';
import type { Brand } from '../types/utility.js';

// ============================================================================
// Types
// ============================================================================

export type ExecutionContextId = Brand<string, 'ExecutionContextId'>;

/**
 * Identity of one execution context
 */
export interface ExecutionContext {
  readonly id: ExecutionContextId;
  /** Human-readable name, reported with every event */
  readonly name: string;
}

function createExecutionContextId(id: string): ExecutionContextId {
  return id as ExecutionContextId;
}

// ============================================================================
// AsyncLocalStorage Instance
// ============================================================================

const asyncLocalStorage = new AsyncLocalStorage<ExecutionContext>();

export const MAIN_EXECUTION_CONTEXT: ExecutionContext = {
  id: createExecutionContextId('main'),
  name: 'main',
};

// ============================================================================
// Context Management Functions
// ============================================================================

/**
 * Gets the current execution context
 */
export function currentExecutionContext(): ExecutionContext {
  return asyncLocalStorage.getStore() ?? MAIN_EXECUTION_CONTEXT;
}

/**
 * Runs a function in a fresh execution context
 */
export function runInExecutionContext<T>(name: string, fn: () => T): T {
  const context: ExecutionContext = {
    id: createExecutionContextId(`${name}_${randomUUID()}`),
    name,
  };
  return asyncLocalStorage.run(context, fn);
}
