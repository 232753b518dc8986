/**
 * Suite Runner
 * @module runner/suite-runner
 *
 * Runs suites one after another, wrapping each in suite starting/completed
 * events. A suite whose run throws is reported as aborted and the run moves on
 * to the next suite.
 */

import { createFilterFromConfig, getConfig } from '../config/index.js';
import type { EngineConfig } from '../config/schema.js';
import { toError } from '../errors/base.js';
import type { Filter } from '../filter/filter.js';
import { createModuleLogger, initLogger, loggerConfigFrom, type StructuredLogger } from '../logging/logger.js';
import { CatchReporter } from '../reporting/catch-reporter.js';
import { DispatchReporter } from '../reporting/dispatch-reporter.js';
import type { SuiteEvent } from '../reporting/events.js';
import { LoggingReporter } from '../reporting/logging-reporter.js';
import { Tracker, createStopper, type Reporter, type RequestableStopper } from '../reporting/reporter.js';
import { SummaryReporter, type RunSummary } from '../reporting/summary-reporter.js';
import type { RunArgs, Suite } from '../suite/suite.js';
import { EMPTY_CONFIG_MAP, type ConfigMap } from '../types/utility.js';

// ============================================================================
// Types
// ============================================================================

export interface RunOptions {
  /** Extra reporters, called after the built-in summary and logging reporters */
  readonly reporters?: ReadonlyArray<Reporter>;
  /** Defaults to the process-wide configuration */
  readonly config?: EngineConfig;
  /** Defaults to a filter built from `config` */
  readonly filter?: Filter;
  readonly stopper?: RequestableStopper;
  readonly configMap?: ConfigMap;
  /** When absent, the root logger is re-initialized from `config.logging` */
  readonly logger?: StructuredLogger;
}

/**
 * Requests a stop on the first failed test
 */
class StopOnFailureReporter implements Reporter {
  constructor(private readonly stopper: RequestableStopper) {}

  apply(event: SuiteEvent): void {
    if (event.type === 'testFailed') {
      this.stopper.requestStop();
    }
  }
}

// ============================================================================
// Runner
// ============================================================================

export async function runSuites(suites: ReadonlyArray<Suite>, options: RunOptions = {}): Promise<RunSummary> {
  const config = options.config ?? getConfig();
  if (!options.logger) {
    initLogger(loggerConfigFrom(config));
  }
  const logger = options.logger ?? createModuleLogger('runner');
  const filter = options.filter ?? createFilterFromConfig(config);
  const stopper = options.stopper ?? createStopper();
  const tracker = new Tracker();
  const summary = new SummaryReporter();

  const reporters: Reporter[] = [summary, new LoggingReporter(logger), ...(options.reporters ?? [])];
  if (config.run.stopOnFirstFailure) {
    reporters.push(new StopOnFailureReporter(stopper));
  }
  const reporter = new DispatchReporter(reporters.map((r) => new CatchReporter(r, logger)));

  const args: RunArgs = {
    reporter,
    stopper,
    filter,
    configMap: options.configMap ?? EMPTY_CONFIG_MAP,
    tracker,
    includeIcon: config.run.includeIcon,
  };

  const expectedTestCount = suites.reduce((total, suite) => total + suite.expectedTestCount(filter), 0);
  logger.info({ suiteCount: suites.length, expectedTestCount }, 'Run starting');

  for (const suite of suites) {
    if (stopper()) {
      break;
    }
    const fields = { suiteName: suite.suiteName, suiteId: suite.suiteId };
    reporter.apply({ type: 'suiteStarting', ...tracker.envelope(), ...fields });
    const start = Date.now();
    try {
      await suite.run(undefined, args);
      reporter.apply({ type: 'suiteCompleted', ...tracker.envelope(), ...fields, durationMs: Date.now() - start });
    } catch (error) {
      const cause = toError(error);
      reporter.apply({
        type: 'suiteAborted',
        ...tracker.envelope(),
        ...fields,
        message: cause.message,
        error: cause,
        durationMs: Date.now() - start,
      });
    }
  }

  const result = summary.summary();
  logger.info({ ...result }, 'Run completed');
  return result;
}
