/**
 * Logging Reporter
 * @module reporting/logging-reporter
 *
 * Writes each event to the structured logger. Outcomes go through the
 * `testOutcome` domain method; everything else is logged at debug.
 * Engine errors are logged in their serialized form, other errors through
 * pino's `err` serializer.
 */

import { isBaseError } from '../errors/base.js';
import type { StructuredLogger } from '../logging/logger.js';
import type { SuiteEvent } from './events.js';
import type { Reporter } from './reporter.js';

function errorLogFields(error: Error): Record<string, unknown> {
  if (!isBaseError(error)) {
    return { err: error };
  }
  const rootCause = error.getRootCause();
  return rootCause === error
    ? { failure: error.toJSON() }
    : { failure: error.toJSON(), rootCause: rootCause.message };
}

export class LoggingReporter implements Reporter {
  constructor(private readonly logger: StructuredLogger) {}

  apply(event: SuiteEvent): void {
    switch (event.type) {
      case 'testSucceeded':
      case 'testPending':
        this.logger.testOutcome(event.testName, event.type, event.durationMs);
        break;
      case 'testFailed':
      case 'testCanceled':
        this.logger.testOutcome(event.testName, event.type, event.durationMs);
        this.logger.debug({ testName: event.testName, ...errorLogFields(event.error) }, event.message);
        break;
      case 'suiteAborted': {
        const fields = { suiteName: event.suiteName, ...errorLogFields(event.error) };
        // Operational errors come from the suite's own code, not from the engine
        if (isBaseError(event.error) && event.error.isOperational) {
          this.logger.warn(fields, `Suite aborted: ${event.message}`);
        } else {
          this.logger.error(fields, `Suite aborted: ${event.message}`);
        }
        break;
      }
      case 'infoProvided':
        this.logger.debug({ ordinal: event.ordinal, thread: event.threadName }, event.message);
        break;
      case 'markupProvided':
        this.logger.debug({ ordinal: event.ordinal, thread: event.threadName }, event.text);
        break;
      default:
        this.logger.debug({ ordinal: event.ordinal, eventType: event.type }, 'Suite event');
        break;
    }
  }
}
