/**
 * Catch Reporter
 * @module reporting/catch-reporter
 *
 * Keeps a misbehaving reporter from breaking a run: anything it throws is
 * logged and dropped.
 */

import type { StructuredLogger } from '../logging/logger.js';
import type { SuiteEvent } from './events.js';
import type { Reporter } from './reporter.js';

export class CatchReporter implements Reporter {
  constructor(
    private readonly delegate: Reporter,
    private readonly logger: StructuredLogger
  ) {}

  apply(event: SuiteEvent): void {
    try {
      this.delegate.apply(event);
    } catch (error) {
      this.logger.reporterFailed(event.type, error);
    }
  }
}

export function wrapReporterIfNecessary(reporter: Reporter, logger: StructuredLogger): Reporter {
  return reporter instanceof CatchReporter ? reporter : new CatchReporter(reporter, logger);
}
