/**
 * Informers and Documenters
 * @module messaging/informer
 *
 * Sinks for auxiliary text raised by suites and tests: `info` for plain messages,
 * `markup` for documentation. The engine keeps the active sink in an atomic slot
 * and swaps it as a suite moves from registration to running to finished.
 */

import { ThreadAwareness } from '../concurrency/thread-awareness.js';
import type { SourceLocation } from '../errors/base.js';
import { InformerClosedError, NullArgumentError } from '../errors/engine-errors.js';
import { captureLocation } from '../engine/location.js';

// ============================================================================
// Sink Interfaces
// ============================================================================

export interface Informer {
  apply(message: string): void;
}

export interface Documenter {
  apply(markup: string): void;
}

/**
 * Fires a message as it arrives: message, sent-from-constructing-context, location
 */
export type ConcurrentMessageFiringFn = (
  message: string,
  isConstructingThread: boolean,
  location: SourceLocation | undefined
) => void;

/**
 * Fires a buffered message once the test outcome is known
 */
export type RecordedMessageFiringFn = (
  message: string,
  isConstructingThread: boolean,
  testWasPending: boolean,
  testWasCanceled: boolean,
  location: SourceLocation | undefined
) => void;

export function checkMessage(message: unknown): void {
  if (message === null || message === undefined) {
    throw new NullArgumentError('message');
  }
}

// ============================================================================
// Concurrent Sinks
// ============================================================================

/**
 * Forwards each message immediately, noting whether the constructing context sent it
 */
export class ConcurrentMessageSender extends ThreadAwareness {
  constructor(private readonly fire: ConcurrentMessageFiringFn) {
    super();
  }

  apply(message: string): void {
    checkMessage(message);
    this.fire(message, this.isConstructingThread(), captureLocation());
  }
}

export class ConcurrentInformer extends ConcurrentMessageSender implements Informer {}

export class ConcurrentDocumenter extends ConcurrentMessageSender implements Documenter {}

// ============================================================================
// Zombie Sinks
// ============================================================================

/**
 * Installed once a suite has run; every call fails
 */
export class ZombieSink implements Informer, Documenter {
  private readonly complaint: string;

  constructor(methodName: 'info' | 'markup', suiteKind: string) {
    this.complaint = `Cannot call ${methodName} now: this ${suiteKind} has completed running`;
  }

  apply(message: string): void {
    checkMessage(message);
    throw new InformerClosedError(this.complaint);
  }
}
