/**
 * FunSuite
 * @module styles/fun-suite
 *
 * Flat list of named test functions.
 *
 * @example
 * ```typescript
 * class SetSuite extends FunSuite {
 *   constructor() {
 *     super();
 *     this.test('an empty set has size 0', () => {
 *       expect(new Set().size).toBe(0);
 *     });
 *   }
 * }
 * ```
 */

import { Engine, type TestFunction } from '../engine/engine.js';
import { Suite, type RunArgs } from '../suite/suite.js';
import type { TagsMap } from '../types/utility.js';
import { misplacedClause, splitTestArgs, type TestArgs } from './style-support.js';

const TEST_IN_TEST = misplacedClause('test', 'test');
const IGNORE_IN_TEST = misplacedClause('ignore', 'test');

export abstract class FunSuite extends Suite {
  private readonly engine = new Engine('FunSuite');

  protected test(testName: string, ...args: TestArgs<TestFunction>): void {
    const { options, testFun } = splitTestArgs(args);
    this.engine.registerTest(testName, testFun, TEST_IN_TEST, { tags: options.tags });
  }

  protected ignore(testName: string, ...args: TestArgs<TestFunction>): void {
    const { options, testFun } = splitTestArgs(args);
    this.engine.registerIgnoredTest(testName, testFun, IGNORE_IN_TEST, { tags: options.tags });
  }

  protected info(message: string): void {
    this.engine.informer.apply(message);
  }

  protected markup(text: string): void {
    this.engine.documenter.apply(text);
  }

  override testNames(): ReadonlyArray<string> {
    return this.engine.testNames();
  }

  override tags(): TagsMap {
    return this.engine.tags();
  }

  override async run(testName: string | undefined, args: RunArgs): Promise<void> {
    await this.engine.runImpl(this, testName, args, (name, runArgs) => super.run(name, runArgs));
  }

  protected override async runTests(testName: string | undefined, args: RunArgs): Promise<void> {
    await this.engine.runTestsImpl(this, testName, args, (name, runArgs) => this.runTest(name, runArgs));
  }

  protected override async runTest(testName: string, args: RunArgs): Promise<void> {
    await this.engine.runTestImpl(this, testName, args, (leaf) => leaf.testFun());
  }
}
