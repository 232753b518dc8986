/**
 * FunSpec
 * @module styles/fun-spec
 *
 * Nested `describe` scopes holding `it` tests. A test's name is its scope
 * descriptions followed by its own text, space separated.
 */

import { Engine, type TestFunction } from '../engine/engine.js';
import { Suite, type RunArgs } from '../suite/suite.js';
import type { TagsMap } from '../types/utility.js';
import { misplacedClause, splitTestArgs, type TestArgs } from './style-support.js';

const IT_IN_IT = misplacedClause('it', 'it');
const IGNORE_IN_IT = misplacedClause('ignore', 'it');
const DESCRIBE_IN_IT = misplacedClause('describe', 'it');

export abstract class FunSpec extends Suite {
  private readonly engine = new Engine('FunSpec');

  protected describe(description: string, fun: () => void): void {
    this.engine.registerNestedBranch(description, undefined, fun, DESCRIBE_IN_IT);
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

  protected markup(text: string): void {
    this.engine.documenter.apply(text);
  }

  override testNames(): ReadonlyArray<string> {
    return this.engine.testNames();
  }

  override tags(): TagsMap {
    return this.engine.tags();
  }

  testPath(testName: string): number[] {
    return this.engine.testPath(testName);
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
