/**
 * Summary Reporter
 * @module reporting/summary-reporter
 *
 * Counts outcomes over a run.
 */

import type { SuiteEvent } from './events.js';
import type { Reporter } from './reporter.js';

export interface RunSummary {
  readonly testsSucceeded: number;
  readonly testsFailed: number;
  readonly testsPending: number;
  readonly testsCanceled: number;
  readonly testsIgnored: number;
  readonly suitesCompleted: number;
  readonly suitesAborted: number;
  readonly scopesOpened: number;
}

type MutableSummary = { -readonly [K in keyof RunSummary]: RunSummary[K] };

function emptySummary(): MutableSummary {
  return {
    testsSucceeded: 0,
    testsFailed: 0,
    testsPending: 0,
    testsCanceled: 0,
    testsIgnored: 0,
    suitesCompleted: 0,
    suitesAborted: 0,
    scopesOpened: 0,
  };
}

export class SummaryReporter implements Reporter {
  private counts: MutableSummary = emptySummary();

  apply(event: SuiteEvent): void {
    switch (event.type) {
      case 'testSucceeded':
        this.counts.testsSucceeded += 1;
        break;
      case 'testFailed':
        this.counts.testsFailed += 1;
        break;
      case 'testPending':
        this.counts.testsPending += 1;
        break;
      case 'testCanceled':
        this.counts.testsCanceled += 1;
        break;
      case 'testIgnored':
        this.counts.testsIgnored += 1;
        break;
      case 'suiteCompleted':
        this.counts.suitesCompleted += 1;
        break;
      case 'suiteAborted':
        this.counts.suitesAborted += 1;
        break;
      case 'scopeOpened':
        this.counts.scopesOpened += 1;
        break;
      default:
        break;
    }
  }

  summary(): RunSummary {
    return { ...this.counts };
  }

  reset(): void {
    this.counts = emptySummary();
  }
}

/**
 * A run succeeds when nothing failed and no suite aborted
 */
export function isSuccessfulRun(summary: RunSummary): boolean {
  return summary.testsFailed === 0 && summary.suitesAborted === 0;
}
