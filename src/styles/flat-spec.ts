/**
 * FlatSpec
 * @module styles/flat-spec
 *
 * One level of scopes. `behaviorOf(subject)` starts a new scope under the
 * root; following `it` calls land in it until the next `behaviorOf`.
 */

import { Engine, type TestFunction } from '../engine/engine.js';
import { Suite, type RunArgs } from '../suite/suite.js';
import type { TagsMap } from '../types/utility.js';
import { misplacedClause, splitTestArgs, type TestArgs } from './style-support.js';

const IT_IN_IT = misplacedClause('it', 'it');
const IGNORE_IN_IT = misplacedClause('ignore', 'it');
const BEHAVIOR_OF_IN_IT = misplacedClause('behaviorOf', 'it');

export abstract class FlatSpec extends Suite {
  private readonly engine = new Engine('FlatSpec');

  protected behaviorOf(subject: string): void {
    this.engine.registerFlatBranch(subject, BEHAVIOR_OF_IN_IT);
  }

  protected it(specText: string, ...args: TestArgs<TestFunction>): void {
    const { options, testFun } = splitTestArgs(args);
    this.engine.registerTest(specText, testFun, IT_IN_IT, { tags: options.tags });
  }

  protected ignore(specText: string, ...args: TestArgs<TestFunction>): void {
    const { options, testFun } = splitTestArgs(args);
    this.engine.registerIgnoredTest(specText, testFun, IGNORE_IN_IT, { tags: options.tags });
  }

  protected info(message: string): void {
    this.engine.informer.apply(message);
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
