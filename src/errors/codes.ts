/**
 * Error Codes Enumeration
 * @module errors/codes
 *
 * Centralized error codes for the registration and execution engine.
 */

// ============================================================================
// Error Code Categories
// ============================================================================

/**
 * Registration Error Codes
 */
export const RegistrationErrorCodes = {
  REGISTRATION_CLOSED: 'REGISTRATION_CLOSED',
  DUPLICATE_TEST_NAME: 'DUPLICATE_TEST_NAME',
  NULL_ARGUMENT: 'NULL_ARGUMENT',
  UNKNOWN_TEST: 'UNKNOWN_TEST',
  INFORMER_CLOSED: 'INFORMER_CLOSED',
} as const;

export type RegistrationErrorCode = typeof RegistrationErrorCodes[keyof typeof RegistrationErrorCodes];

/**
 * Concurrency Error Codes
 */
export const ConcurrencyErrorCodes = {
  CONCURRENT_MODIFICATION: 'CONCURRENT_MODIFICATION',
  DISCOVERY_IN_PROGRESS: 'DISCOVERY_IN_PROGRESS',
  RECORDER_MISUSE: 'RECORDER_MISUSE',
} as const;

export type ConcurrencyErrorCode = typeof ConcurrencyErrorCodes[keyof typeof ConcurrencyErrorCodes];

/**
 * Execution Error Codes
 */
export const ExecutionErrorCodes = {
  TEST_PENDING: 'TEST_PENDING',
  TEST_CANCELED: 'TEST_CANCELED',
  SUITE_ABORTED: 'SUITE_ABORTED',
  ASYNC_PATH_TEST: 'ASYNC_PATH_TEST',
  THROWN_VALUE: 'THROWN_VALUE',
  INVALID_FILTER: 'INVALID_FILTER',
} as const;

export type ExecutionErrorCode = typeof ExecutionErrorCodes[keyof typeof ExecutionErrorCodes];

/**
 * Configuration Error Codes
 */
export const ConfigErrorCodes = {
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const;

export type ConfigErrorCode = typeof ConfigErrorCodes[keyof typeof ConfigErrorCodes];

// ============================================================================
// Combined Error Codes
// ============================================================================

export const ErrorCodes = {
  ...RegistrationErrorCodes,
  ...ConcurrencyErrorCodes,
  ...ExecutionErrorCodes,
  ...ConfigErrorCodes,
} as const;

export type ErrorCode =
  | RegistrationErrorCode
  | ConcurrencyErrorCode
  | ExecutionErrorCode
  | ConfigErrorCode;

/**
 * Codes raised by misuse of the engine itself rather than by a test body
 */
const INVARIANT_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  ConcurrencyErrorCodes.CONCURRENT_MODIFICATION,
  RegistrationErrorCodes.REGISTRATION_CLOSED,
]);

/**
 * Check whether a code marks an engine invariant violation
 */
export function isInvariantCode(code: ErrorCode): boolean {
  return INVARIANT_CODES.has(code);
}
