/**
 * Message Recorder
 * @module messaging/message-recorder
 *
 * Buffers info and markup raised while a test runs so they reach the reporter
 * only after the test's own outcome event, tagged with that outcome.
 */

import { ThreadAwareness } from '../concurrency/thread-awareness.js';
import { currentExecutionContext } from '../concurrency/execution-context.js';
import type { SourceLocation } from '../errors/base.js';
import { RecorderMisuseError } from '../errors/engine-errors.js';
import { captureLocation } from '../engine/location.js';
import {
  checkMessage,
  type Documenter,
  type Informer,
  type RecordedMessageFiringFn,
} from './informer.js';

interface RecordedMessage {
  readonly message: string;
  readonly fire: RecordedMessageFiringFn;
  readonly location: SourceLocation | undefined;
}

type RecorderState = 'recording' | 'flushed';

export class MessageRecorder extends ThreadAwareness {
  private readonly messages: RecordedMessage[] = [];
  private state: RecorderState = 'recording';

  get isFlushed(): boolean {
    return this.state === 'flushed';
  }

  /**
   * Only the constructing context may record; the buffer is unsynchronized
   */
  record(message: string, fire: RecordedMessageFiringFn, location: SourceLocation | undefined): void {
    if (!this.isConstructingThread()) {
      throw new RecorderMisuseError('record may only be called from the constructing context');
    }
    if (this.state === 'flushed') {
      throw new RecorderMisuseError('record was called after the recorded messages were fired');
    }
    this.messages.push({ message, fire, location });
  }

  apply(message: string, fire: RecordedMessageFiringFn, location: SourceLocation | undefined): void {
    checkMessage(message);
    if (this.isConstructingThread()) {
      this.record(message, fire, location);
    } else {
      fire(message, false, false, false, location);
    }
  }

  /**
   * Send every recorded message, in order, tagged with the test's disposition
   */
  fireRecordedMessages(testWasPending: boolean, testWasCanceled: boolean): void {
    if (this.state === 'flushed') {
      throw new RecorderMisuseError('recorded messages were already fired');
    }
    this.state = 'flushed';
    for (const { message, fire, location } of this.messages) {
      fire(message, true, testWasPending, testWasCanceled, location);
    }
  }
}

export class MessageRecordingInformer implements Informer {
  constructor(
    private readonly recorder: MessageRecorder,
    private readonly fire: RecordedMessageFiringFn
  ) {}

  apply(message: string): void {
    this.recorder.apply(message, this.fire, captureLocation());
  }
}

export class MessageRecordingDocumenter implements Documenter {
  constructor(
    private readonly recorder: MessageRecorder,
    private readonly fire: RecordedMessageFiringFn
  ) {}

  apply(markup: string): void {
    this.recorder.apply(markup, this.fire, captureLocation());
  }
}

// ============================================================================
// Path Recorder
// ============================================================================

/**
 * One message captured while a path-style test ran during construction
 */
export interface PathRecordedMessage {
  readonly kind: 'info' | 'markup';
  readonly message: string;
  readonly contextName: string;
  readonly wasConstructingThread: boolean;
  readonly location: SourceLocation | undefined;
}

/**
 * Fires a path-recorded message when the replayed test completes
 */
export type PathMessageFiringFn = (
  recorded: PathRecordedMessage,
  testWasPending: boolean,
  testWasCanceled: boolean
) => void;

/**
 * Records everything, from any context. Path-style tests run long before their
 * outcome is reported, so even foreign-context messages wait for the replay.
 */
export class PathMessageRecorder extends ThreadAwareness {
  private readonly messages: PathRecordedMessage[] = [];

  readonly informer: Informer = {
    apply: (message: string) => this.record('info', message),
  };

  readonly documenter: Documenter = {
    apply: (markup: string) => this.record('markup', markup),
  };

  get recorded(): ReadonlyArray<PathRecordedMessage> {
    return [...this.messages];
  }

  private record(kind: 'info' | 'markup', message: string): void {
    checkMessage(message);
    this.messages.push({
      kind,
      message,
      contextName: currentExecutionContext().name,
      wasConstructingThread: this.isConstructingThread(),
      location: captureLocation(),
    });
  }

  fireRecordedMessages(testWasPending: boolean, testWasCanceled: boolean, fire: PathMessageFiringFn): void {
    for (const recorded of this.messages) {
      fire(recorded, testWasPending, testWasCanceled);
    }
  }
}
