/**
 * Engine Error Classes
 * @module errors/engine-errors
 *
 * Errors raised by the registration and execution engine itself:
 * - RegistrationClosedError - registration attempted after run began
 * - DuplicateTestNameError - a computed test name is already registered
 * - ConcurrentModificationError - swap-and-verify found another writer
 * - NullArgumentError - a required argument was null or undefined
 * - UnknownTestError - a test name that was never registered
 * - InformerClosedError - info/markup called once the suite has finished
 */

import { BaseError, type ErrorContext } from './base.js';
import {
  ConcurrencyErrorCodes,
  ConfigErrorCodes,
  ExecutionErrorCodes,
  RegistrationErrorCodes,
} from './codes.js';

// ============================================================================
// Registration Errors
// ============================================================================

/**
 * Thrown when a test, ignore or branch registration happens after registration closed,
 * or in a place a style forbids (an `it` inside an `it`).
 */
export class RegistrationClosedError extends BaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, RegistrationErrorCodes.REGISTRATION_CLOSED, context, false);
    this.name = 'RegistrationClosedError';
  }
}

/**
 * Thrown when a computed full test name has already been registered
 */
export class DuplicateTestNameError extends BaseError {
  public readonly testName: string;

  constructor(testName: string, context: ErrorContext = {}) {
    super(`Duplicate test name: ${testName}`, RegistrationErrorCodes.DUPLICATE_TEST_NAME, {
      ...context,
      testName,
    });
    this.name = 'DuplicateTestNameError';
    this.testName = testName;
  }
}

/**
 * Thrown by public entry points when a required argument is missing
 */
export class NullArgumentError extends BaseError {
  public readonly argumentName: string;

  constructor(argumentName: string) {
    super(`${argumentName} was null`, RegistrationErrorCodes.NULL_ARGUMENT, {
      details: { argumentName },
    });
    this.name = 'NullArgumentError';
    this.argumentName = argumentName;
  }
}

/**
 * Thrown when a test name is not in the registered tests map
 */
export class UnknownTestError extends BaseError {
  public readonly testName: string;

  constructor(testName: string, context: ErrorContext = {}) {
    super(`No test in this suite has name: "${testName}"`, RegistrationErrorCodes.UNKNOWN_TEST, {
      ...context,
      testName,
    });
    this.name = 'UnknownTestError';
    this.testName = testName;
  }
}

/**
 * Thrown by the zombie informer/documenter after a suite's run has completed
 */
export class InformerClosedError extends BaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, RegistrationErrorCodes.INFORMER_CLOSED, context);
    this.name = 'InformerClosedError';
  }
}

// ============================================================================
// Concurrency Errors
// ============================================================================

/**
 * Thrown when an atomic swap-and-verify finds an unexpected intervening writer
 */
export class ConcurrentModificationError extends BaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ConcurrencyErrorCodes.CONCURRENT_MODIFICATION, context, false);
    this.name = 'ConcurrentModificationError';
  }
}

/**
 * Thrown when path discovery is started on an engine already discovering
 */
export class DiscoveryInProgressError extends BaseError {
  constructor(context: ErrorContext = {}) {
    super(
      'Path discovery was already in progress when another discovery was requested',
      ConcurrencyErrorCodes.DISCOVERY_IN_PROGRESS,
      context,
      false
    );
    this.name = 'DiscoveryInProgressError';
  }
}

/**
 * Thrown when a message recorder is used outside its contract
 */
export class RecorderMisuseError extends BaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ConcurrencyErrorCodes.RECORDER_MISUSE, context, false);
    this.name = 'RecorderMisuseError';
  }
}

// ============================================================================
// Execution Errors
// ============================================================================

/**
 * Thrown to abort the whole run; never caught by the engine
 */
export class SuiteAbortedError extends BaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ExecutionErrorCodes.SUITE_ABORTED, context, false);
    this.name = 'SuiteAbortedError';
  }
}

/**
 * Recorded as the failure of a path-style test whose body returned a promise
 */
export class AsyncPathTestError extends BaseError {
  constructor(testText: string, context: ErrorContext = {}) {
    super(
      `Path-style test "${testText}" returned a promise; path-style test bodies run during construction and must complete synchronously`,
      ExecutionErrorCodes.ASYNC_PATH_TEST,
      context
    );
    this.name = 'AsyncPathTestError';
  }
}

/**
 * Thrown when a filter is constructed with inconsistent arguments
 */
export class InvalidFilterError extends BaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ExecutionErrorCodes.INVALID_FILTER, context);
    this.name = 'InvalidFilterError';
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Configuration validation issue
 */
export interface ConfigIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Thrown when loaded configuration fails validation
 */
export class ConfigurationError extends BaseError {
  public readonly issues: ReadonlyArray<ConfigIssue>;

  constructor(message: string, issues: ReadonlyArray<ConfigIssue> = []) {
    super(message, ConfigErrorCodes.CONFIG_INVALID, { details: { issues } });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

// ============================================================================
// Preconditions
// ============================================================================

/**
 * Fail with NullArgumentError when a required argument is null or undefined
 */
export function checkNotNull<V>(value: V, argumentName: string): asserts value is NonNullable<V> {
  if (value === null || value === undefined) {
    throw new NullArgumentError(argumentName);
  }
}
