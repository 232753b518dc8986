/**
 * Suite Events
 * @module reporting/events
 *
 * Ordered structured events sent to reporters while suites run. Every event
 * carries an ordinal from the run's tracker, a timestamp and the name of the
 * execution context that produced it.
 */

import type { SourceLocation } from '../errors/base.js';
import type { IndentedText } from './formatter.js';

// ============================================================================
// Common Fields
// ============================================================================

export interface EventEnvelope {
  readonly ordinal: number;
  readonly timestamp: number;
  readonly threadName: string;
}

export interface SuiteFields {
  readonly suiteName: string;
  readonly suiteId: string;
}

export interface TestFields extends SuiteFields {
  readonly testName: string;
  readonly testText: string;
  readonly formatter?: IndentedText;
  readonly location?: SourceLocation;
}

/**
 * Which suite and test an info or markup event is about
 */
export interface NameInfo extends SuiteFields {
  readonly testName?: string;
}

// ============================================================================
// Suite Events
// ============================================================================

export interface SuiteStartingEvent extends EventEnvelope, SuiteFields {
  readonly type: 'suiteStarting';
}

export interface SuiteCompletedEvent extends EventEnvelope, SuiteFields {
  readonly type: 'suiteCompleted';
  readonly durationMs: number;
}

export interface SuiteAbortedEvent extends EventEnvelope, SuiteFields {
  readonly type: 'suiteAborted';
  readonly message: string;
  readonly error: Error;
  readonly durationMs: number;
}

// ============================================================================
// Scope Events
// ============================================================================

export interface ScopeOpenedEvent extends EventEnvelope, SuiteFields {
  readonly type: 'scopeOpened';
  readonly message: string;
  readonly formatter: IndentedText;
  readonly location?: SourceLocation;
}

export interface ScopeClosedEvent extends EventEnvelope, SuiteFields {
  readonly type: 'scopeClosed';
  readonly message: string;
  readonly formatter: IndentedText;
  readonly location?: SourceLocation;
}

// ============================================================================
// Test Events
// ============================================================================

export interface TestStartingEvent extends EventEnvelope, TestFields {
  readonly type: 'testStarting';
}

export interface TestSucceededEvent extends EventEnvelope, TestFields {
  readonly type: 'testSucceeded';
  readonly durationMs: number;
}

export interface TestFailedEvent extends EventEnvelope, TestFields {
  readonly type: 'testFailed';
  readonly message: string;
  readonly error: Error;
  readonly durationMs: number;
}

export interface TestPendingEvent extends EventEnvelope, TestFields {
  readonly type: 'testPending';
  readonly durationMs: number;
}

export interface TestCanceledEvent extends EventEnvelope, TestFields {
  readonly type: 'testCanceled';
  readonly message: string;
  readonly error: Error;
  readonly durationMs: number;
}

export interface TestIgnoredEvent extends EventEnvelope, TestFields {
  readonly type: 'testIgnored';
}

// ============================================================================
// Auxiliary Events
// ============================================================================

export interface InfoProvidedEvent extends EventEnvelope {
  readonly type: 'infoProvided';
  readonly message: string;
  /** Present only for messages sent from the constructing context */
  readonly nameInfo?: NameInfo;
  readonly aboutAPendingTest?: boolean;
  readonly aboutACanceledTest?: boolean;
  readonly formatter?: IndentedText;
  readonly location?: SourceLocation;
}

export interface MarkupProvidedEvent extends EventEnvelope {
  readonly type: 'markupProvided';
  readonly text: string;
  readonly nameInfo?: NameInfo;
  readonly formatter?: IndentedText;
  readonly location?: SourceLocation;
}

export type SuiteEvent =
  | SuiteStartingEvent
  | SuiteCompletedEvent
  | SuiteAbortedEvent
  | ScopeOpenedEvent
  | ScopeClosedEvent
  | TestStartingEvent
  | TestSucceededEvent
  | TestFailedEvent
  | TestPendingEvent
  | TestCanceledEvent
  | TestIgnoredEvent
  | InfoProvidedEvent
  | MarkupProvidedEvent;

export type SuiteEventType = SuiteEvent['type'];

/**
 * Events that end a single test
 */
export type TestCompletionEvent =
  | TestSucceededEvent
  | TestFailedEvent
  | TestPendingEvent
  | TestCanceledEvent;

export function isTestCompletionEvent(event: SuiteEvent): event is TestCompletionEvent {
  return (
    event.type === 'testSucceeded' ||
    event.type === 'testFailed' ||
    event.type === 'testPending' ||
    event.type === 'testCanceled'
  );
}
