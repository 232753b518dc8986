/**
 * Reporting Module
 * @module reporting
 */

export * from './events.js';
export * from './formatter.js';
export { NEVER_STOP, Tracker, createStopper, type Reporter, type RequestableStopper, type Stopper } from './reporter.js';
export { CatchReporter, wrapReporterIfNecessary } from './catch-reporter.js';
export { DispatchReporter } from './dispatch-reporter.js';
export { SummaryReporter, isSuccessfulRun, type RunSummary } from './summary-reporter.js';
export { LoggingReporter } from './logging-reporter.js';
