/**
 * Execution Context Unit Tests
 * @module tests/unit/concurrency/execution-context.test
 */

import { describe, it, expect } from 'vitest';
import {
  MAIN_EXECUTION_CONTEXT,
  currentExecutionContext,
  runInExecutionContext,
} from '../../../src/concurrency/execution-context.js';
import { ThreadAwareness } from '../../../src/concurrency/thread-awareness.js';

class Probe extends ThreadAwareness {}

describe('execution context', () => {
  it('should default to the main context', () => {
    expect(currentExecutionContext()).toBe(MAIN_EXECUTION_CONTEXT);
    expect(currentExecutionContext().name).toBe('main');
  });

  it('should expose the named context inside runInExecutionContext', () => {
    const name = runInExecutionContext('worker-1', () => currentExecutionContext().name);
    expect(name).toBe('worker-1');
  });

  it('should give each run a distinct id even for the same name', () => {
    const a = runInExecutionContext('worker', () => currentExecutionContext().id);
    const b = runInExecutionContext('worker', () => currentExecutionContext().id);
    expect(a).not.toBe(b);
  });

  it('should carry the context across awaits', async () => {
    const name = await runInExecutionContext('async-worker', async () => {
      await new Promise((resolve) => setTimeout(resolve, 1));
      return currentExecutionContext().name;
    });
    expect(name).toBe('async-worker');
  });
});

describe('ThreadAwareness', () => {
  it('should recognize its constructing context', () => {
    const probe = new Probe();
    expect(probe.isConstructingThread()).toBe(true);
  });

  it('should treat other contexts as foreign', () => {
    const probe = new Probe();
    expect(runInExecutionContext('other', () => probe.isConstructingThread())).toBe(false);
  });

  it('should treat the main context as foreign for an object built elsewhere', () => {
    const probe = runInExecutionContext('builder', () => new Probe());
    expect(probe.isConstructingThread()).toBe(false);
  });
});
