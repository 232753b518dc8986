/**
 * Registration and Execution Engine
 * @module engine/super-engine
 *
 * Collects tests and scopes while a suite is constructed, closes registration
 * when the suite first runs, then walks the registration tree in order and
 * reports one outcome per test.
 *
 * Shared state lives in two kinds of atomic slot: the registration bundle and
 * the informer/documenter sinks. Both are replaced wholesale and verified on
 * swap, so an unexpected writer surfaces as a ConcurrentModificationError.
 */

import { AtomicReference } from '../concurrency/atomic-reference.js';
import type { SourceLocation } from '../errors/base.js';
import {
  ConcurrentModificationError,
  DuplicateTestNameError,
  RegistrationClosedError,
  UnknownTestError,
  checkNotNull,
} from '../errors/engine-errors.js';
import { runWithCleanup, runWithCleanupSync } from '../errors/recovery.js';
import { IGNORE_TAG } from '../filter/filter.js';
import { createModuleLogger, type StructuredLogger } from '../logging/logger.js';
import {
  ConcurrentDocumenter,
  ConcurrentInformer,
  ZombieSink,
  checkMessage,
  type Documenter,
  type Informer,
  type RecordedMessageFiringFn,
} from '../messaging/informer.js';
import {
  MessageRecorder,
  MessageRecordingDocumenter,
  MessageRecordingInformer,
  type PathMessageRecorder,
  type PathRecordedMessage,
} from '../messaging/message-recorder.js';
import { wrapReporterIfNecessary } from '../reporting/catch-reporter.js';
import type { TestFields } from '../reporting/events.js';
import {
  indentedTextForInfo,
  indentedTextForScope,
  indentedTextForTest,
} from '../reporting/formatter.js';
import type { Reporter, Tracker } from '../reporting/reporter.js';
import type { RunArgs, SuiteIdentity } from '../suite/suite.js';
import type { MaybePromise, TagsMap } from '../types/utility.js';
import { initialBundle, updateBundle, withTags, withTest, type Bundle } from './bundle.js';
import { captureLocation } from './location.js';
import {
  appendChild,
  createTrunk,
  fullTestName,
  indentationLevel,
  pathOf,
  prependChildPrefix,
  type Branch,
  type ChildPosition,
  type DescriptionBranch,
  type InfoLeaf,
  type MarkupLeaf,
  type TestLeaf,
  type Trunk,
} from './nodes.js';
import { invokeTest, type TestOutcome } from './outcome.js';

// ============================================================================
// Types
// ============================================================================

export interface TestRegistration {
  readonly tags?: ReadonlyArray<string>;
  readonly location?: SourceLocation;
  readonly recordedDuration?: number;
  readonly recordedMessages?: PathMessageRecorder;
  readonly position?: ChildPosition;
}

export interface BranchRegistration {
  readonly location?: SourceLocation;
  readonly position?: ChildPosition;
}

/**
 * Runs a leaf's test function, supplying a fixture where the style has one
 */
export type FixtureInvoker<T> = (leaf: TestLeaf<T>) => MaybePromise<void>;

export type RunTestFn = (testName: string, args: RunArgs) => Promise<void>;

export type SuperRunFn = (testName: string | undefined, args: RunArgs) => Promise<void>;

interface AuxiliaryMessage {
  readonly message: string;
  readonly level: number;
  readonly location: SourceLocation | undefined;
  readonly isConstructingThread: boolean;
  readonly includeIcon: boolean;
  readonly testName?: string;
  readonly testWasPending?: boolean;
  readonly testWasCanceled?: boolean;
  readonly threadName?: string;
}

type MessageKind = 'info' | 'markup';

// ============================================================================
// SuperEngine
// ============================================================================

export class SuperEngine<T> {
  protected readonly trunk: Trunk<T> = createTrunk<T>();
  protected readonly atomic: AtomicReference<Bundle<T>>;
  protected readonly atomicInformer: AtomicReference<Informer>;
  protected readonly atomicDocumenter: AtomicReference<Documenter>;
  protected readonly logger: StructuredLogger;

  private readonly zombieInformer: Informer;
  private readonly zombieDocumenter: Documenter;

  private readonly registrationInformer: Informer = {
    apply: (message: string) => this.registerMessageLeaf('info', message, captureLocation()),
  };

  private readonly registrationDocumenter: Documenter = {
    apply: (markup: string) => this.registerMessageLeaf('markup', markup, captureLocation()),
  };

  constructor(
    readonly suiteKind: string,
    logger?: StructuredLogger
  ) {
    this.logger = logger ?? createModuleLogger('engine');
    this.atomic = new AtomicReference(initialBundle<T>(this.trunk));
    this.atomicInformer = new AtomicReference<Informer>(this.registrationInformer);
    this.atomicDocumenter = new AtomicReference<Documenter>(this.registrationDocumenter);
    this.zombieInformer = new ZombieSink('info', suiteKind);
    this.zombieDocumenter = new ZombieSink('markup', suiteKind);
  }

  // --------------------------------------------------------------------------
  // Atomic slots
  // --------------------------------------------------------------------------

  protected get concurrentBundleModMessage(): string {
    return `Two execution contexts attempted to modify the registration data of this ${this.suiteKind} at the same time`;
  }

  protected get concurrentInformerModMessage(): string {
    return `Another execution context replaced the informer of this ${this.suiteKind} while it was in use`;
  }

  protected get concurrentDocumenterModMessage(): string {
    return `Another execution context replaced the documenter of this ${this.suiteKind} while it was in use`;
  }

  protected updateAtomic(oldBundle: Bundle<T>, newBundle: Bundle<T>): void {
    this.atomic.swapAndVerify(oldBundle, newBundle, this.concurrentBundleModMessage);
  }

  /**
   * Install the next informer and documenter. Both slots are written before a
   * mismatch on either is reported.
   */
  protected restoreMessageSlots(
    expectedInformer: Informer,
    nextInformer: Informer,
    expectedDocumenter: Documenter,
    nextDocumenter: Documenter
  ): void {
    const informerWasReplaced = this.atomicInformer.getAndSet(nextInformer) !== expectedInformer;
    const documenterWasReplaced = this.atomicDocumenter.getAndSet(nextDocumenter) !== expectedDocumenter;
    if (informerWasReplaced) {
      throw new ConcurrentModificationError(this.concurrentInformerModMessage);
    }
    if (documenterWasReplaced) {
      throw new ConcurrentModificationError(this.concurrentDocumenterModMessage);
    }
  }

  /**
   * Sink for `info` calls: registration-time, run-time or per-test, depending on phase
   */
  get informer(): Informer {
    return this.atomicInformer.get();
  }

  get documenter(): Documenter {
    return this.atomicDocumenter.get();
  }

  // --------------------------------------------------------------------------
  // Registration
  // --------------------------------------------------------------------------

  /**
   * Append an info or markup leaf to the current branch
   */
  protected registerMessageLeaf(
    kind: MessageKind,
    message: string,
    location: SourceLocation | undefined,
    position?: ChildPosition
  ): void {
    checkMessage(message);
    const oldBundle = this.atomic.get();
    const parent = oldBundle.currentBranch;
    const leaf: InfoLeaf<T> | MarkupLeaf<T> =
      kind === 'info'
        ? { kind: 'info', parent, message, location, position }
        : { kind: 'markup', parent, message, location, position };
    appendChild(leaf);
    this.updateAtomic(oldBundle, updateBundle(oldBundle, {}));
  }

  /**
   * Register a test under the current branch and return its full name
   */
  registerTest(
    testText: string,
    testFun: T,
    registrationClosedMessage: string,
    registration: TestRegistration = {}
  ): string {
    checkNotNull(testText, 'testText');
    checkNotNull(testFun, 'testFun');
    checkNotNull(registrationClosedMessage, 'registrationClosedMessage');
    const tagNames = registration.tags ?? [];
    for (const tag of tagNames) {
      checkNotNull(tag, 'tag');
    }

    const location = registration.location ?? captureLocation();
    const oldBundle = this.atomic.get();
    if (oldBundle.registrationClosed) {
      throw new RegistrationClosedError(registrationClosedMessage, { location });
    }

    const parent = oldBundle.currentBranch;
    const testName = fullTestName(testText, parent);
    if (oldBundle.testsMap.has(testName)) {
      throw new DuplicateTestNameError(testName, { location });
    }

    const leaf: TestLeaf<T> = {
      kind: 'test',
      parent,
      testName,
      testText,
      testFun,
      location,
      position: registration.position,
      recordedDuration: registration.recordedDuration,
      recordedMessages: registration.recordedMessages,
    };
    appendChild(leaf);
    this.updateAtomic(oldBundle, withTest(oldBundle, leaf, new Set(tagNames)));
    this.logger.testRegistered(testName, tagNames);
    return testName;
  }

  /**
   * Register a test that is reported as ignored instead of being run
   */
  registerIgnoredTest(
    testText: string,
    testFun: T,
    registrationClosedMessage: string,
    registration: TestRegistration = {}
  ): string {
    const testName = this.registerTest(testText, testFun, registrationClosedMessage, registration);
    const oldBundle = this.atomic.get();
    const tags = new Set(oldBundle.tagsMap.get(testName) ?? []);
    tags.add(IGNORE_TAG);
    this.updateAtomic(oldBundle, withTags(oldBundle, testName, tags));
    return testName;
  }

  /**
   * Open a scope under the current branch and register `fun`'s contents into it
   */
  registerNestedBranch(
    description: string,
    childPrefix: string | undefined,
    fun: () => void,
    registrationClosedMessage: string,
    registration: BranchRegistration = {}
  ): DescriptionBranch<T> {
    checkNotNull(description, 'description');
    checkNotNull(fun, 'fun');
    const location = registration.location ?? captureLocation();
    const oldBundle = this.atomic.get();
    if (oldBundle.registrationClosed) {
      throw new RegistrationClosedError(registrationClosedMessage, { location });
    }

    const previous = oldBundle.currentBranch;
    const branch: DescriptionBranch<T> = {
      kind: 'description',
      parent: previous,
      descriptionText: description,
      childPrefix,
      location,
      position: registration.position,
      children: [],
    };
    appendChild(branch);
    this.updateAtomic(oldBundle, updateBundle(oldBundle, { currentBranch: branch }));
    this.logger.branchRegistered(description, indentationLevel(branch));

    this.withinBranch(previous, fun);
    return branch;
  }

  /**
   * Run `fun` with the current branch already switched, switching back to
   * `previous` afterwards even if `fun` throws
   */
  protected withinBranch(previous: Branch<T>, fun: () => void): void {
    runWithCleanupSync(
      'registerNestedBranch',
      fun,
      () => {
        const bundle = this.atomic.get();
        this.updateAtomic(bundle, updateBundle(bundle, { currentBranch: previous }));
      },
      this.logger
    );
  }

  /**
   * Open a scope directly under the trunk and leave it current. Used by styles
   * whose scopes do not nest.
   */
  registerFlatBranch(
    description: string,
    registrationClosedMessage: string,
    registration: BranchRegistration = {}
  ): void {
    checkNotNull(description, 'description');
    const location = registration.location ?? captureLocation();
    const oldBundle = this.atomic.get();
    if (oldBundle.registrationClosed) {
      throw new RegistrationClosedError(registrationClosedMessage, { location });
    }
    const branch: DescriptionBranch<T> = {
      kind: 'description',
      parent: this.trunk,
      descriptionText: description,
      childPrefix: undefined,
      location,
      position: registration.position,
      children: [],
    };
    appendChild(branch);
    this.updateAtomic(oldBundle, updateBundle(oldBundle, { currentBranch: branch }));
    this.logger.branchRegistered(description, 0);
  }

  // --------------------------------------------------------------------------
  // Accessors
  // --------------------------------------------------------------------------

  testNames(): ReadonlyArray<string> {
    return [...this.atomic.get().testNamesList];
  }

  tags(): TagsMap {
    return this.atomic.get().tagsMap;
  }

  /**
   * Child indices from the trunk to the named test
   */
  testPath(testName: string): number[] {
    const leaf = this.atomic.get().testsMap.get(testName);
    if (leaf === undefined) {
      throw new UnknownTestError(testName);
    }
    return pathOf(leaf);
  }

  currentBranchIsTrunk(): boolean {
    return this.atomic.get().currentBranch.kind === 'trunk';
  }

  isRegistrationClosed(): boolean {
    return this.atomic.get().registrationClosed;
  }

  // --------------------------------------------------------------------------
  // Execution
  // --------------------------------------------------------------------------

  /**
   * Run one registered test, report its outcome, then flush the messages it recorded
   */
  async runTestImpl(
    suite: SuiteIdentity,
    testName: string,
    args: RunArgs,
    invokeWithFixture: FixtureInvoker<T>
  ): Promise<void> {
    checkNotNull(testName, 'testName');
    checkNotNull(args, 'args');
    checkNotNull(args.reporter, 'reporter');
    checkNotNull(args.stopper, 'stopper');
    checkNotNull(args.configMap, 'configMap');
    checkNotNull(args.tracker, 'tracker');

    const report = wrapReporterIfNecessary(args.reporter, this.logger);
    const { tracker } = args;
    const includeIcon = args.includeIcon ?? true;
    const theTest = this.atomic.get().testsMap.get(testName);
    if (theTest === undefined) {
      throw new UnknownTestError(testName);
    }

    const testStartTime = Date.now();
    const level = indentationLevel(theTest);
    const fields: TestFields = {
      suiteName: suite.suiteName,
      suiteId: suite.suiteId,
      testName,
      testText: theTest.testText,
      formatter: indentedTextForTest(prependChildPrefix(theTest.parent, theTest.testText), level, includeIcon),
      location: theTest.location,
    };
    report.apply({ type: 'testStarting', ...tracker.envelope(), ...fields });

    const firing =
      (kind: MessageKind): RecordedMessageFiringFn =>
      (message, isConstructingThread, testWasPending, testWasCanceled, location) =>
        this.reportAuxiliaryMessage(kind, suite, report, tracker, {
          message,
          level: level + 1,
          location,
          isConstructingThread,
          includeIcon,
          testName,
          testWasPending,
          testWasCanceled,
        });
    const recorder = new MessageRecorder();
    const informerForThisTest = new MessageRecordingInformer(recorder, firing('info'));
    const documenterForThisTest = new MessageRecordingDocumenter(recorder, firing('markup'));
    const oldInformer = this.atomicInformer.getAndSet(informerForThisTest);
    const oldDocumenter = this.atomicDocumenter.getAndSet(documenterForThisTest);

    let outcome: TestOutcome | undefined;
    await runWithCleanup(
      'runTest',
      async () => {
        outcome = await invokeTest(() => invokeWithFixture(theTest));
        const durationMs = theTest.recordedDuration ?? Date.now() - testStartTime;
        this.reportOutcome(report, tracker, fields, outcome, durationMs);
      },
      () => {
        const testWasPending = outcome?.kind === 'pending';
        const testWasCanceled = outcome?.kind === 'canceled';
        recorder.fireRecordedMessages(testWasPending, testWasCanceled);
        theTest.recordedMessages?.fireRecordedMessages(
          testWasPending,
          testWasCanceled,
          (recorded: PathRecordedMessage, pending: boolean, canceled: boolean) =>
            this.reportAuxiliaryMessage(recorded.kind, suite, report, tracker, {
              message: recorded.message,
              level: level + 1,
              location: recorded.location,
              isConstructingThread: recorded.wasConstructingThread,
              includeIcon,
              testName,
              testWasPending: pending,
              testWasCanceled: canceled,
              threadName: recorded.contextName,
            })
        );
        this.restoreMessageSlots(informerForThisTest, oldInformer, documenterForThisTest, oldDocumenter);
      },
      this.logger
    );
  }

  /**
   * Run the named test, or every test in registration order
   */
  async runTestsImpl(
    suite: SuiteIdentity,
    testName: string | undefined,
    args: RunArgs,
    runTest: RunTestFn
  ): Promise<void> {
    checkNotNull(args, 'args');
    checkNotNull(args.reporter, 'reporter');
    checkNotNull(args.stopper, 'stopper');
    checkNotNull(args.filter, 'filter');
    checkNotNull(args.configMap, 'configMap');
    checkNotNull(args.tracker, 'tracker');

    const report = wrapReporterIfNecessary(args.reporter, this.logger);
    const newArgs: RunArgs = report === args.reporter ? args : { ...args, reporter: report };

    if (testName === undefined) {
      await this.runTestsInBranch(suite, this.trunk, newArgs, runTest);
      return;
    }

    const { excluded, ignored } = args.filter.apply(testName, this.tags());
    if (excluded) {
      return;
    }
    if (ignored) {
      const theTest = this.atomic.get().testsMap.get(testName);
      if (theTest === undefined) {
        throw new UnknownTestError(testName);
      }
      this.reportTestIgnored(suite, newArgs, theTest);
      return;
    }
    await runTest(testName, newArgs);
  }

  private async runTestsInBranch(
    suite: SuiteIdentity,
    branch: Branch<T>,
    args: RunArgs,
    runTest: RunTestFn
  ): Promise<void> {
    if (branch.kind === 'trunk') {
      await this.traverseChildren(suite, branch, args, runTest);
      return;
    }

    const text = prependChildPrefix(branch.parent, branch.descriptionText);
    const formatter = indentedTextForScope(text, indentationLevel(branch));
    const scopeFields = {
      suiteName: suite.suiteName,
      suiteId: suite.suiteId,
      message: text,
      formatter,
      location: branch.location,
    };
    args.reporter.apply({ type: 'scopeOpened', ...args.tracker.envelope(), ...scopeFields });
    await runWithCleanup(
      'scope',
      () => this.traverseChildren(suite, branch, args, runTest),
      () => args.reporter.apply({ type: 'scopeClosed', ...args.tracker.envelope(), ...scopeFields }),
      this.logger
    );
  }

  private async traverseChildren(
    suite: SuiteIdentity,
    branch: Branch<T>,
    args: RunArgs,
    runTest: RunTestFn
  ): Promise<void> {
    const includeIcon = args.includeIcon ?? true;
    for (const node of [...branch.children]) {
      if (args.stopper()) {
        break;
      }
      switch (node.kind) {
        case 'test': {
          const { excluded, ignored } = args.filter.apply(node.testName, this.tags());
          if (excluded) {
            break;
          }
          if (ignored) {
            this.reportTestIgnored(suite, args, node);
          } else {
            await runTest(node.testName, args);
          }
          break;
        }
        case 'info':
        case 'markup':
          this.reportAuxiliaryMessage(node.kind, suite, args.reporter, args.tracker, {
            message: node.message,
            level: indentationLevel(node),
            location: node.location,
            isConstructingThread: true,
            includeIcon,
          });
          break;
        case 'description':
          await this.runTestsInBranch(suite, node, args, runTest);
          break;
      }
    }
  }

  /**
   * Close registration, install run-time sinks, run, then leave zombie sinks behind
   */
  async runImpl(
    suite: SuiteIdentity,
    testName: string | undefined,
    args: RunArgs,
    superRun: SuperRunFn
  ): Promise<void> {
    checkNotNull(args, 'args');
    checkNotNull(args.reporter, 'reporter');
    checkNotNull(args.tracker, 'tracker');

    const oldBundle = this.atomic.get();
    if (!oldBundle.registrationClosed) {
      this.updateAtomic(oldBundle, updateBundle(oldBundle, { registrationClosed: true }));
      this.logger.registrationClosed(suite.suiteName, oldBundle.testNamesList.length);
    }

    const report = wrapReporterIfNecessary(args.reporter, this.logger);
    const newArgs: RunArgs = report === args.reporter ? args : { ...args, reporter: report };
    const includeIcon = args.includeIcon ?? true;

    const concurrentFiring =
      (kind: MessageKind) =>
      (message: string, isConstructingThread: boolean, location: SourceLocation | undefined): void =>
        this.reportAuxiliaryMessage(kind, suite, report, args.tracker, {
          message,
          level: 1,
          location,
          isConstructingThread,
          includeIcon,
        });
    const informerForThisSuite = new ConcurrentInformer(concurrentFiring('info'));
    const documenterForThisSuite = new ConcurrentDocumenter(concurrentFiring('markup'));
    this.atomicInformer.set(informerForThisSuite);
    this.atomicDocumenter.set(documenterForThisSuite);

    await runWithCleanup(
      'run',
      () => superRun(testName, newArgs),
      () => {
        this.restoreMessageSlots(
          informerForThisSuite,
          this.zombieInformer,
          documenterForThisSuite,
          this.zombieDocumenter
        );
      },
      this.logger
    );
  }

  // --------------------------------------------------------------------------
  // Event helpers
  // --------------------------------------------------------------------------

  private reportOutcome(
    report: Reporter,
    tracker: Tracker,
    fields: TestFields,
    outcome: TestOutcome,
    durationMs: number
  ): void {
    switch (outcome.kind) {
      case 'succeeded':
        report.apply({ type: 'testSucceeded', ...tracker.envelope(), ...fields, durationMs });
        break;
      case 'pending':
        report.apply({ type: 'testPending', ...tracker.envelope(), ...fields, durationMs });
        break;
      case 'canceled':
        report.apply({
          type: 'testCanceled',
          ...tracker.envelope(),
          ...fields,
          message: outcome.reason,
          error: outcome.error,
          durationMs,
        });
        break;
      case 'failed':
        report.apply({
          type: 'testFailed',
          ...tracker.envelope(),
          ...fields,
          message: outcome.error.message,
          error: outcome.error,
          durationMs,
        });
        break;
    }
  }

  private reportTestIgnored(suite: SuiteIdentity, args: RunArgs, theTest: TestLeaf<T>): void {
    const text = prependChildPrefix(theTest.parent, theTest.testText);
    args.reporter.apply({
      type: 'testIgnored',
      ...args.tracker.envelope(),
      suiteName: suite.suiteName,
      suiteId: suite.suiteId,
      testName: theTest.testName,
      testText: text,
      formatter: indentedTextForTest(text, indentationLevel(theTest), true),
      location: theTest.location,
    });
  }

  private reportAuxiliaryMessage(
    kind: MessageKind,
    suite: SuiteIdentity,
    report: Reporter,
    tracker: Tracker,
    aux: AuxiliaryMessage
  ): void {
    const envelope = tracker.envelope();
    const threadName = aux.threadName ?? envelope.threadName;
    const nameInfo = aux.isConstructingThread
      ? { suiteName: suite.suiteName, suiteId: suite.suiteId, testName: aux.testName }
      : undefined;
    const formatter = indentedTextForInfo(aux.message, aux.level, aux.includeIcon);

    if (kind === 'markup') {
      report.apply({
        type: 'markupProvided',
        ...envelope,
        threadName,
        text: aux.message,
        nameInfo,
        formatter,
        location: aux.location,
      });
      return;
    }
    report.apply({
      type: 'infoProvided',
      ...envelope,
      threadName,
      message: aux.message,
      nameInfo,
      aboutAPendingTest: aux.testWasPending,
      aboutACanceledTest: aux.testWasCanceled,
      formatter,
      location: aux.location,
    });
  }
}
