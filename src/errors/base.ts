/**
 * Base Error Classes
 * @module errors/base
 *
 * Foundation error classes for the engine. Provides a hierarchical error
 * structure with serialization and cause chaining.
 */

import type { ErrorCode } from './codes.js';
import { ExecutionErrorCodes } from './codes.js';

// ============================================================================
// Error Context Types
// ============================================================================

/**
 * Source location of a registration call
 */
export interface SourceLocation {
  readonly file: string;
  readonly line: number;
  readonly column?: number;
}

/**
 * Context information for errors
 */
export interface ErrorContext {
  /** Original error that caused this error */
  cause?: unknown;
  /** Additional details about the error */
  details?: Record<string, unknown>;
  /** Timestamp when error occurred */
  timestamp?: Date;
  /** Suite that was running or being built */
  suiteName?: string;
  /** Test the error relates to */
  testName?: string;
  /** Where the offending call was made */
  location?: SourceLocation;
}

/**
 * Serialized error format for reporters
 */
export interface SerializedError {
  name: string;
  message: string;
  code: string;
  timestamp: string;
  suiteName?: string;
  testName?: string;
  details?: Record<string, unknown>;
  stack?: string;
}

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all engine errors.
 */
export abstract class BaseError extends Error {
  /** Error code for programmatic handling */
  public readonly code: ErrorCode;
  /** Timestamp when the error occurred */
  public readonly timestamp: Date;
  /** Error context with additional information */
  public readonly context: ErrorContext;
  /**
   * Whether this is an operational error.
   * Operational errors come from test code or usage (a pending test, a duplicate name);
   * non-operational errors are engine defects.
   */
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: ErrorCode,
    context: ErrorContext = {},
    isOperational = true
  ) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.timestamp = context.timestamp ?? new Date();
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);

    if (context.cause !== undefined) {
      this.cause = context.cause;
    }
  }

  /**
   * Serialize error to JSON-safe object
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      suiteName: this.context.suiteName,
      testName: this.context.testName,
      details: this.context.details,
    };
  }

  /**
   * String representation
   */
  override toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }

  /**
   * Get the root cause of the error chain
   */
  getRootCause(): Error {
    let current: Error = this;
    while (current.cause instanceof Error) {
      current = current.cause;
    }
    return current;
  }
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if an error is a BaseError
 */
export function isBaseError(error: unknown): error is BaseError {
  return error instanceof BaseError;
}

/**
 * Check if an error has a specific code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
  if (isBaseError(error)) {
    return error.code === code;
  }
  return false;
}

// ============================================================================
// Thrown Values
// ============================================================================

/**
 * Text for an arbitrary value. Values whose conversion throws (a null-prototype
 * object, a throwing `toString`) fall back to their `[object Tag]` form.
 */
export function describeValue(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

/**
 * Stands in for a thrown value that is not an Error (`throw 'boom'`)
 */
export class ThrownValueError extends BaseError {
  public readonly thrownValue: unknown;

  constructor(thrownValue: unknown) {
    super(`Non-error value thrown: ${describeValue(thrownValue)}`, ExecutionErrorCodes.THROWN_VALUE, {
      details: { thrownType: typeof thrownValue },
    });
    this.name = 'ThrownValueError';
    this.thrownValue = thrownValue;
  }
}

/**
 * Normalize anything a test body threw into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new ThrownValueError(value);
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return describeValue(error);
}
