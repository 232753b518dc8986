/**
 * Test Filter
 * @module filter/filter
 *
 * Decides, from a test's tags and name, whether a run skips it (excluded),
 * reports it as ignored, or runs it.
 */

import { InvalidFilterError } from '../errors/engine-errors.js';
import type { TagsMap } from '../types/utility.js';

/**
 * Reserved tag carried by tests registered through `ignore`
 */
export const IGNORE_TAG = 'specloom.Ignore';

export interface FilterOptions {
  /** When set, only tests carrying at least one of these tags are included */
  readonly tagsToInclude?: ReadonlySet<string>;
  readonly tagsToExclude?: ReadonlySet<string>;
  /** When set, only these test names are included */
  readonly testNamesToInclude?: ReadonlySet<string>;
}

export interface FilterResult {
  readonly excluded: boolean;
  readonly ignored: boolean;
}

export interface FilteredTest {
  readonly testName: string;
  readonly ignored: boolean;
}

const EMPTY_TAGS: ReadonlySet<string> = new Set<string>();

function intersectionSize(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  let size = 0;
  for (const value of a) {
    if (b.has(value)) {
      size += 1;
    }
  }
  return size;
}

export class Filter {
  readonly tagsToInclude: ReadonlySet<string> | undefined;
  readonly tagsToExclude: ReadonlySet<string>;
  readonly testNamesToInclude: ReadonlySet<string> | undefined;
  private readonly excludeOrIgnore: ReadonlySet<string>;

  constructor(options: FilterOptions = {}) {
    if (options.tagsToInclude !== undefined && options.tagsToInclude.size === 0) {
      throw new InvalidFilterError('tagsToInclude was defined, but contained no tags');
    }
    if (options.testNamesToInclude !== undefined && options.testNamesToInclude.size === 0) {
      throw new InvalidFilterError('testNamesToInclude was defined, but contained no names');
    }
    this.tagsToInclude = options.tagsToInclude;
    this.tagsToExclude = options.tagsToExclude ?? EMPTY_TAGS;
    this.testNamesToInclude = options.testNamesToInclude;
    this.excludeOrIgnore = new Set([...this.tagsToExclude, IGNORE_TAG]);
  }

  private isIncluded(testName: string, tags: TagsMap): boolean {
    if (this.testNamesToInclude !== undefined && !this.testNamesToInclude.has(testName)) {
      return false;
    }
    if (this.tagsToInclude === undefined) {
      return true;
    }
    const testTags = tags.get(testName);
    return testTags !== undefined && intersectionSize(this.tagsToInclude, testTags) > 0;
  }

  /**
   * Filter a list of test names, keeping order. An ignore-tagged test survives
   * unless some other excluded tag removes it.
   */
  applyAll(testNames: ReadonlyArray<string>, tags: TagsMap): FilteredTest[] {
    const result: FilteredTest[] = [];
    for (const testName of testNames) {
      if (!this.isIncluded(testName, tags)) {
        continue;
      }
      const testTags = tags.get(testName);
      if (testTags === undefined) {
        result.push({ testName, ignored: false });
        continue;
      }
      const ignored = testTags.has(IGNORE_TAG);
      const keep =
        (ignored && intersectionSize(testTags, this.excludeOrIgnore) === 1) ||
        intersectionSize(testTags, this.tagsToExclude) === 0;
      if (keep) {
        result.push({ testName, ignored });
      }
    }
    return result;
  }

  apply(testName: string, tags: TagsMap): FilterResult {
    const [filtered] = this.applyAll([testName], tags);
    return filtered === undefined ? { excluded: true, ignored: false } : { excluded: false, ignored: filtered.ignored };
  }

  /**
   * Tests that would actually execute: neither excluded nor ignored
   */
  runnableTestCount(testNames: ReadonlyArray<string>, tags: TagsMap): number {
    let count = 0;
    for (const testName of testNames) {
      if (!this.isIncluded(testName, tags)) {
        continue;
      }
      const testTags = tags.get(testName);
      if (testTags === undefined || (!testTags.has(IGNORE_TAG) && intersectionSize(testTags, this.tagsToExclude) === 0)) {
        count += 1;
      }
    }
    return count;
  }
}

/**
 * Filter that includes everything and excludes nothing
 */
export function defaultFilter(): Filter {
  return new Filter();
}
