/**
 * WordSpec
 * @module styles/word-spec
 *
 * Scopes introduced by a verb that becomes part of every name beneath them:
 * `when("A stack", ...)` then `should("when empty", ...)`... then `in(...)`.
 */

import { Engine, type TestFunction } from '../engine/engine.js';
import { Suite, type RunArgs } from '../suite/suite.js';
import type { TagsMap } from '../types/utility.js';
import { misplacedClause, splitTestArgs, type TestArgs } from './style-support.js';

type Verb = 'when' | 'should' | 'must' | 'can';

const IN_IN_IN = misplacedClause('in', 'in');
const IGNORE_IN_IN = misplacedClause('ignore', 'in');

export abstract class WordSpec extends Suite {
  private readonly engine = new Engine('WordSpec');

  private branch(description: string, verb: Verb, fun: () => void): void {
    this.engine.registerNestedBranch(description, verb, fun, misplacedClause(verb, 'in'));
  }

  protected when(description: string, fun: () => void): void {
    this.branch(description, 'when', fun);
  }

  protected should(description: string, fun: () => void): void {
    this.branch(description, 'should', fun);
  }

  protected must(description: string, fun: () => void): void {
    this.branch(description, 'must', fun);
  }

  protected can(description: string, fun: () => void): void {
    this.branch(description, 'can', fun);
  }

  protected in(specText: string, ...args: TestArgs<TestFunction>): void {
    const { options, testFun } = splitTestArgs(args);
    this.engine.registerTest(specText, testFun, IN_IN_IN, { tags: options.tags });
  }

  protected ignore(specText: string, ...args: TestArgs<TestFunction>): void {
    const { options, testFun } = splitTestArgs(args);
    this.engine.registerIgnoredTest(specText, testFun, IGNORE_IN_IN, { tags: options.tags });
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
