/**
 * FixtureFunSuite
 * @module styles/fixture-fun-suite
 *
 * FunSuite whose tests take a fixture. The suite builds the fixture in
 * `withFixture` and hands it to the test.
 */

import { FixtureEngine, type FixtureTestFunction } from '../engine/engine.js';
import { Suite, type RunArgs } from '../suite/suite.js';
import type { ConfigMap, MaybePromise, TagsMap } from '../types/utility.js';
import { misplacedClause, splitTestArgs, type TestArgs } from './style-support.js';

const TEST_IN_TEST = misplacedClause('test', 'test');
const IGNORE_IN_TEST = misplacedClause('ignore', 'test');

/**
 * A test waiting for its fixture
 */
export interface OneArgTest<F> {
  readonly name: string;
  readonly text: string;
  readonly configMap: ConfigMap;
  apply(fixture: F): MaybePromise<void>;
}

export abstract class FixtureFunSuite<F> extends Suite {
  private readonly engine = new FixtureEngine<F>('FixtureFunSuite');

  /**
   * Create the fixture, pass it to `test.apply`, and clean it up afterwards
   */
  protected abstract withFixture(test: OneArgTest<F>): MaybePromise<void>;

  protected test(testName: string, ...args: TestArgs<FixtureTestFunction<F>>): void {
    const { options, testFun } = splitTestArgs(args);
    this.engine.registerTest(testName, testFun, TEST_IN_TEST, { tags: options.tags });
  }

  protected ignore(testName: string, ...args: TestArgs<FixtureTestFunction<F>>): void {
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
    await this.engine.runTestImpl(this, testName, args, (leaf) =>
      this.withFixture({
        name: leaf.testName,
        text: leaf.testText,
        configMap: args.configMap,
        apply: (fixture: F) => leaf.testFun(fixture),
      })
    );
  }
}
