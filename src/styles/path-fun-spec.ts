/**
 * PathFunSpec
 * @module styles/path-fun-spec
 *
 * FunSpec variant whose tests run while the suite is constructed, each on a
 * fresh instance. Build instances through `createPathSuite`, which constructs
 * the class once per test and returns the first instance.
 *
 * @example
 * ```typescript
 * class ListSpec extends PathFunSpec {
 *   constructor(engine: PathEngine) {
 *     super(engine);
 *     const list: number[] = [];
 *     this.describe('a list', () => {
 *       this.it('starts empty', () => assert.equal(list.length, 0));
 *       this.describe('after push', () => {
 *         list.push(1);
 *         this.it('has one element', () => assert.equal(list.length, 1));
 *       });
 *     });
 *   }
 * }
 * const spec = createPathSuite((engine) => new ListSpec(engine));
 * ```
 */

import { PathEngine, type PathTestFunction } from '../engine/path-engine.js';
import type { StructuredLogger } from '../logging/logger.js';
import { Suite, type RunArgs } from '../suite/suite.js';
import type { TagsMap } from '../types/utility.js';
import { misplacedClause, splitTestArgs, type TestArgs } from './style-support.js';

const IT_IN_IT = misplacedClause('it', 'it');
const IGNORE_IN_IT = misplacedClause('ignore', 'it');
const DESCRIBE_IN_IT = misplacedClause('describe', 'it');

export abstract class PathFunSpec extends Suite {
  constructor(private readonly engine: PathEngine) {
    super();
  }

  protected describe(description: string, fun: () => void): void {
    this.engine.handleNestedBranch(description, undefined, fun, DESCRIBE_IN_IT);
  }

  protected it(specText: string, ...args: TestArgs<PathTestFunction>): void {
    const { options, testFun } = splitTestArgs(args);
    this.engine.handleTest(specText, testFun, IT_IN_IT, { tags: options.tags });
  }

  protected ignore(specText: string, ...args: TestArgs<PathTestFunction>): void {
    const { options, testFun } = splitTestArgs(args);
    this.engine.handleIgnoredTest(specText, testFun, IGNORE_IN_IT, { tags: options.tags });
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

/**
 * Construct a path-style suite once per test and return the first instance
 */
export function createPathSuite<S extends PathFunSpec>(
  factory: (engine: PathEngine) => S,
  logger?: StructuredLogger
): S {
  const engine = new PathEngine('PathFunSpec', logger);
  return engine.discover(() => factory(engine));
}
