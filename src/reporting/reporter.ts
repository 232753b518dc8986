/**
 * Reporter, Tracker and Stopper
 * @module reporting/reporter
 */

import { currentExecutionContext } from '../concurrency/execution-context.js';
import type { EventEnvelope, SuiteEvent } from './events.js';

/**
 * Sink for suite events, called in event order
 */
export interface Reporter {
  apply(event: SuiteEvent): void;
}

/**
 * Hands out increasing ordinals for the events of one run
 */
export class Tracker {
  private next: number;

  constructor(firstOrdinal = 0) {
    this.next = firstOrdinal;
  }

  nextOrdinal(): number {
    const ordinal = this.next;
    this.next += 1;
    return ordinal;
  }

  /**
   * Stamp an event with the next ordinal, the current time and context name
   */
  envelope(): EventEnvelope {
    return {
      ordinal: this.nextOrdinal(),
      timestamp: Date.now(),
      threadName: currentExecutionContext().name,
    };
  }
}

/**
 * Polled between tests; true once the run should stop
 */
export type Stopper = () => boolean;

export interface RequestableStopper {
  (): boolean;
  requestStop(): void;
}

export function createStopper(): RequestableStopper {
  let stopRequested = false;
  return Object.assign(() => stopRequested, {
    requestStop(): void {
      stopRequested = true;
    },
  });
}

/**
 * A stopper that never trips
 */
export const NEVER_STOP: Stopper = () => false;
