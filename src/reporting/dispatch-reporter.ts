/**
 * Dispatch Reporter
 * @module reporting/dispatch-reporter
 */

import type { SuiteEvent } from './events.js';
import type { Reporter } from './reporter.js';

/**
 * Forwards every event to each reporter, in the order they were given
 */
export class DispatchReporter implements Reporter {
  private readonly reporters: ReadonlyArray<Reporter>;

  constructor(reporters: ReadonlyArray<Reporter>) {
    this.reporters = [...reporters];
  }

  apply(event: SuiteEvent): void {
    for (const reporter of this.reporters) {
      reporter.apply(event);
    }
  }
}
