/**
 * Suite Base
 * @module suite/suite
 *
 * The contract every style front-end implements, and the arguments a run
 * hands to it.
 */

import type { Filter } from '../filter/filter.js';
import type { Reporter, Stopper, Tracker } from '../reporting/reporter.js';
import type { ConfigMap, TagsMap } from '../types/utility.js';

// ============================================================================
// Types
// ============================================================================

export interface SuiteIdentity {
  readonly suiteName: string;
  readonly suiteId: string;
}

/**
 * Hands suites to some other executor. Passed through the engine untouched.
 */
export interface Distributor {
  apply(suite: Suite, args: RunArgs): void;
}

export interface RunArgs {
  readonly reporter: Reporter;
  readonly stopper: Stopper;
  readonly filter: Filter;
  readonly configMap: ConfigMap;
  readonly tracker: Tracker;
  readonly distributor?: Distributor;
  /** Prefix test and info text with "-" and "+" icons in formatters */
  readonly includeIcon?: boolean;
}

// ============================================================================
// Suite
// ============================================================================

export abstract class Suite implements SuiteIdentity {
  get suiteName(): string {
    return this.constructor.name;
  }

  get suiteId(): string {
    return this.constructor.name;
  }

  abstract testNames(): ReadonlyArray<string>;

  abstract tags(): TagsMap;

  /**
   * Number of tests the filter would let run
   */
  expectedTestCount(filter: Filter): number {
    return filter.runnableTestCount(this.testNames(), this.tags());
  }

  /**
   * Run one test by name, or every test when `testName` is undefined
   */
  async run(testName: string | undefined, args: RunArgs): Promise<void> {
    await this.runTests(testName, args);
  }

  protected abstract runTests(testName: string | undefined, args: RunArgs): Promise<void>;

  protected abstract runTest(testName: string, args: RunArgs): Promise<void>;
}
