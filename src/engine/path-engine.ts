/**
 * Path Engine
 * @module engine/path-engine
 *
 * Engine for styles whose tests run while the suite is constructed. The suite
 * is constructed once per test. Every `describe`, `it` and `ignore` gets a path
 * vector (child indices per level) and each pass aims at one target path: only
 * the test on it runs, and the first node met after it becomes the next target.
 * Discovery ends after a pass that finds no next target.
 *
 * The outcome of each test is captured and registered as a replay function, so
 * running the suite later reports what construction observed.
 */

import type { SourceLocation } from '../errors/base.js';
import {
  AsyncPathTestError,
  DiscoveryInProgressError,
  RegistrationClosedError,
  checkNotNull,
} from '../errors/engine-errors.js';
import { runWithCleanupSync } from '../errors/recovery.js';
import { checkMessage } from '../messaging/informer.js';
import { PathMessageRecorder } from '../messaging/message-recorder.js';
import { isPromiseLike } from '../types/utility.js';
import { updateBundle } from './bundle.js';
import { captureLocation } from './location.js';
import type { ChildPosition, DescriptionBranch } from './nodes.js';
import { SUCCEEDED, failed, outcomeOfError, replayOutcome, type TestOutcome } from './outcome.js';
import { SuperEngine } from './super-engine.js';

/**
 * Path-style test bodies run synchronously during construction
 */
export type PathTestFunction = () => void;

export interface PathRegistrationOptions {
  readonly tags?: ReadonlyArray<string>;
  readonly location?: SourceLocation;
}

type DiscoveryState = 'idle' | 'discovering' | 'discovered';

// ============================================================================
// Path Vectors
// ============================================================================

function allZeros(path: ReadonlyArray<number>): boolean {
  return path.every((index) => index === 0);
}

function startsWith(path: ReadonlyArray<number>, prefix: ReadonlyArray<number>): boolean {
  return prefix.length <= path.length && prefix.every((index, i) => path[i] === index);
}

/**
 * Whether a pass aimed at `target` should enter the node at `candidate`.
 * With no target, only the all-zero path qualifies. Otherwise the candidate
 * must lead to the target, be the target, or extend it with zeros only.
 */
export function isInTargetPath(
  candidate: ReadonlyArray<number>,
  target: ReadonlyArray<number> | undefined
): boolean {
  if (target === undefined) {
    return allZeros(candidate);
  }
  if (candidate.length < target.length) {
    return startsWith(target, candidate);
  }
  if (candidate.length > target.length) {
    return startsWith(candidate, target) && allZeros(candidate.slice(target.length));
  }
  return startsWith(candidate, target);
}

function pathKey(path: ReadonlyArray<number>): string {
  return path.join('.');
}

function positionOf(path: ReadonlyArray<number>): ChildPosition {
  return [path[path.length - 1] ?? 0, Number.MAX_SAFE_INTEGER];
}

// ============================================================================
// PathEngine
// ============================================================================

export class PathEngine extends SuperEngine<PathTestFunction> {
  private state: DiscoveryState = 'idle';
  private passes = 0;

  private targetPath: number[] | undefined;
  private nextTargetPath: number[] | undefined;
  private currentPath: number[] = [];
  private targetLeafHasBeenReached = false;
  private describeRegisteredNoTests = false;
  private insideAPathTest = false;

  /** Paths handed out in the current pass */
  private readonly usedPathSet = new Set<string>();
  /** Per-pass count of info/markup calls between two path nodes */
  private readonly messageSlots = new Map<string, number>();

  private readonly registeredBranches = new Map<string, DescriptionBranch<PathTestFunction>>();
  private readonly recordedMessageKeys = new Set<string>();

  /**
   * Construct the suite once per test. Returns the first instance built.
   */
  discover<S>(construct: () => S): S {
    if (this.state === 'discovering') {
      throw new DiscoveryInProgressError({ details: { suiteKind: this.suiteKind } });
    }
    if (this.state === 'discovered') {
      throw new RegistrationClosedError(`Path discovery has already completed for this ${this.suiteKind}`);
    }
    this.state = 'discovering';

    return runWithCleanupSync(
      'discover',
      () => {
        this.startPass(undefined);
        const initial = construct();
        let target = this.nextTargetPath;
        while (target !== undefined) {
          this.startPass(target);
          construct();
          target = this.nextTargetPath;
        }
        this.logger.pathDiscoveryCompleted(this.passes, this.testNames().length);
        return initial;
      },
      () => {
        this.state = 'discovered';
      },
      this.logger
    );
  }

  get passCount(): number {
    return this.passes;
  }

  private startPass(target: number[] | undefined): void {
    this.passes += 1;
    this.targetPath = target;
    this.nextTargetPath = undefined;
    this.currentPath = [];
    this.targetLeafHasBeenReached = false;
    this.usedPathSet.clear();
    this.messageSlots.clear();
    this.logger.pathPassStarted(this.passes, target);
  }

  /**
   * Next unused path under the current one
   */
  getNextPath(): number[] {
    for (let count = 0; ; count += 1) {
      const candidate = [...this.currentPath, count];
      const key = pathKey(candidate);
      if (!this.usedPathSet.has(key)) {
        this.usedPathSet.add(key);
        return candidate;
      }
    }
  }

  private peekNextIndex(): number {
    let count = 0;
    while (this.usedPathSet.has(pathKey([...this.currentPath, count]))) {
      count += 1;
    }
    return count;
  }

  private noteNodeAfterTarget(path: number[]): void {
    if (this.targetLeafHasBeenReached && this.nextTargetPath === undefined) {
      this.nextTargetPath = path;
    }
  }

  // --------------------------------------------------------------------------
  // Registration handlers
  // --------------------------------------------------------------------------

  handleTest(
    testText: string,
    testFun: PathTestFunction,
    registrationClosedMessage: string,
    options: PathRegistrationOptions = {}
  ): void {
    checkNotNull(testText, 'testText');
    checkNotNull(testFun, 'testFun');
    const location = options.location ?? captureLocation();
    if (this.insideAPathTest) {
      throw new RegistrationClosedError(registrationClosedMessage, { location });
    }

    this.insideAPathTest = true;
    try {
      this.describeRegisteredNoTests = false;
      const nextPath = this.getNextPath();
      if (isInTargetPath(nextPath, this.targetPath)) {
        const recorder = new PathMessageRecorder();
        const { outcome, durationMs } = this.runPathTest(testText, testFun, recorder);
        this.registerTest(testText, replayOutcome(outcome), registrationClosedMessage, {
          tags: options.tags,
          location,
          recordedDuration: durationMs,
          recordedMessages: recorder,
          position: positionOf(nextPath),
        });
        this.targetLeafHasBeenReached = true;
      } else {
        this.noteNodeAfterTarget(nextPath);
      }
    } finally {
      this.insideAPathTest = false;
    }
  }

  handleIgnoredTest(
    testText: string,
    testFun: PathTestFunction,
    registrationClosedMessage: string,
    options: PathRegistrationOptions = {}
  ): void {
    checkNotNull(testText, 'testText');
    checkNotNull(testFun, 'testFun');
    const location = options.location ?? captureLocation();
    if (this.insideAPathTest) {
      throw new RegistrationClosedError(registrationClosedMessage, { location });
    }

    const nextPath = this.getNextPath();
    if (isInTargetPath(nextPath, this.targetPath)) {
      this.describeRegisteredNoTests = false;
      this.registerIgnoredTest(testText, testFun, registrationClosedMessage, {
        tags: options.tags,
        location,
        position: positionOf(nextPath),
      });
      this.targetLeafHasBeenReached = true;
    } else {
      this.noteNodeAfterTarget(nextPath);
    }
  }

  handleNestedBranch(
    description: string,
    childPrefix: string | undefined,
    fun: () => void,
    registrationClosedMessage: string,
    options: { readonly location?: SourceLocation } = {}
  ): void {
    checkNotNull(description, 'description');
    checkNotNull(fun, 'fun');
    const location = options.location ?? captureLocation();
    if (this.insideAPathTest) {
      throw new RegistrationClosedError(registrationClosedMessage, { location });
    }

    const nextPath = this.getNextPath();
    if (this.targetLeafHasBeenReached && this.nextTargetPath === undefined) {
      this.nextTargetPath = nextPath;
      return;
    }
    if (!isInTargetPath(nextPath, this.targetPath)) {
      return;
    }

    const oldCurrentPath = this.currentPath;
    try {
      this.currentPath = nextPath;
      const key = pathKey(nextPath);
      const registered = this.registeredBranches.get(key);
      if (registered === undefined) {
        this.describeRegisteredNoTests = true;
        const branch = this.registerNestedBranch(description, childPrefix, fun, registrationClosedMessage, {
          location,
          position: positionOf(nextPath),
        });
        this.registeredBranches.set(key, branch);
        if (this.describeRegisteredNoTests) {
          this.targetLeafHasBeenReached = true;
        }
      } else {
        this.navigateToNestedBranch(registered, fun, registrationClosedMessage);
      }
    } finally {
      this.currentPath = oldCurrentPath;
    }
  }

  /**
   * Re-enter a branch registered on an earlier pass
   */
  private navigateToNestedBranch(
    branch: DescriptionBranch<PathTestFunction>,
    fun: () => void,
    registrationClosedMessage: string
  ): void {
    const oldBundle = this.atomic.get();
    if (oldBundle.registrationClosed) {
      throw new RegistrationClosedError(registrationClosedMessage);
    }
    const previous = oldBundle.currentBranch;
    this.updateAtomic(oldBundle, updateBundle(oldBundle, { currentBranch: branch }));
    this.withinBranch(previous, fun);
  }

  /**
   * Registration-time info and markup: each call site is recorded once, on the
   * first pass that reaches it, and slotted between its path-numbered siblings.
   */
  protected override registerMessageLeaf(
    kind: 'info' | 'markup',
    message: string,
    location: SourceLocation | undefined
  ): void {
    checkMessage(message);
    const slot = this.peekNextIndex();
    const slotKey = `${pathKey(this.currentPath)}|${slot}`;
    const sub = this.messageSlots.get(slotKey) ?? 0;
    this.messageSlots.set(slotKey, sub + 1);

    const messageKey = `${slotKey}|${sub}`;
    if (this.recordedMessageKeys.has(messageKey)) {
      return;
    }
    this.recordedMessageKeys.add(messageKey);
    super.registerMessageLeaf(kind, message, location, [slot, sub]);
  }

  // --------------------------------------------------------------------------
  // Construction-time execution
  // --------------------------------------------------------------------------

  private runPathTest(
    testText: string,
    testFun: PathTestFunction,
    recorder: PathMessageRecorder
  ): { readonly outcome: TestOutcome; readonly durationMs: number } {
    const start = Date.now();
    const oldInformer = this.atomicInformer.getAndSet(recorder.informer);
    const oldDocumenter = this.atomicDocumenter.getAndSet(recorder.documenter);
    const outcome = runWithCleanupSync(
      'runPathTest',
      () => this.invokePathTest(testText, testFun),
      () => {
        this.restoreMessageSlots(recorder.informer, oldInformer, recorder.documenter, oldDocumenter);
      },
      this.logger
    );
    return { outcome, durationMs: Date.now() - start };
  }

  private invokePathTest(testText: string, testFun: PathTestFunction): TestOutcome {
    try {
      const returned: unknown = testFun();
      if (isPromiseLike(returned)) {
        this.observeAbandonedResult(testText, returned);
        return failed(new AsyncPathTestError(testText));
      }
      return SUCCEEDED;
    } catch (error) {
      return outcomeOfError(error);
    }
  }

  private observeAbandonedResult(testText: string, result: PromiseLike<unknown>): void {
    void Promise.resolve(result).then(undefined, (error: unknown) => {
      this.logger.warn(
        { testText, err: error },
        'Promise returned by a path-style test rejected after the test was recorded as failed'
      );
    });
  }
}
