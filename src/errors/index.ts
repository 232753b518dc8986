/**
 * Error Handling Module
 * @module errors
 *
 * Error classes, codes, control signals and cleanup helpers for the engine.
 */

export {
  ErrorCodes,
  RegistrationErrorCodes,
  ConcurrencyErrorCodes,
  ExecutionErrorCodes,
  ConfigErrorCodes,
  isInvariantCode,
  type ErrorCode,
  type RegistrationErrorCode,
  type ConcurrencyErrorCode,
  type ExecutionErrorCode,
  type ConfigErrorCode,
} from './codes.js';

export {
  BaseError,
  ThrownValueError,
  isBaseError,
  hasErrorCode,
  toError,
  getErrorMessage,
  describeValue,
  type ErrorContext,
  type SerializedError,
  type SourceLocation,
} from './base.js';

export {
  RegistrationClosedError,
  DuplicateTestNameError,
  NullArgumentError,
  UnknownTestError,
  InformerClosedError,
  ConcurrentModificationError,
  DiscoveryInProgressError,
  RecorderMisuseError,
  SuiteAbortedError,
  AsyncPathTestError,
  InvalidFilterError,
  ConfigurationError,
  checkNotNull,
  type ConfigIssue,
} from './engine-errors.js';

export {
  TestPendingSignal,
  TestCanceledSignal,
  pending,
  cancel,
  assume,
  isPendingSignal,
  isCanceledSignal,
} from './signals.js';

export { isAbortWorthyError } from './abort.js';

export { runWithCleanup, runWithCleanupSync } from './recovery.js';
