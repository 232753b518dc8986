/**
 * Test Filter Unit Tests
 * @module tests/unit/filter/filter.test
 */

import { describe, it, expect } from 'vitest';
import { InvalidFilterError } from '../../../src/errors/engine-errors.js';
import { Filter, IGNORE_TAG, defaultFilter } from '../../../src/filter/filter.js';
import type { TagsMap } from '../../../src/types/utility.js';

const names = ['plain', 'slow', 'ignored', 'ignored and slow', 'db'];
const tags: TagsMap = new Map([
  ['slow', new Set(['slow'])],
  ['ignored', new Set([IGNORE_TAG])],
  ['ignored and slow', new Set([IGNORE_TAG, 'slow'])],
  ['db', new Set(['db'])],
]);

describe('Filter', () => {
  it('should reject an empty include set', () => {
    expect(() => new Filter({ tagsToInclude: new Set() })).toThrow(InvalidFilterError);
    expect(() => new Filter({ testNamesToInclude: new Set() })).toThrow(
      'testNamesToInclude was defined, but contained no names'
    );
  });

  it('should keep everything by default, flagging ignored tests', () => {
    expect(defaultFilter().applyAll(names, tags)).toEqual([
      { testName: 'plain', ignored: false },
      { testName: 'slow', ignored: false },
      { testName: 'ignored', ignored: true },
      { testName: 'ignored and slow', ignored: true },
      { testName: 'db', ignored: false },
    ]);
  });

  it('should drop tests carrying an excluded tag, even ignored ones', () => {
    const filter = new Filter({ tagsToExclude: new Set(['slow']) });
    expect(filter.applyAll(names, tags).map((t) => t.testName)).toEqual(['plain', 'ignored', 'db']);
  });

  it('should keep only tests with an included tag', () => {
    const filter = new Filter({ tagsToInclude: new Set(['db', 'slow']) });
    expect(filter.applyAll(names, tags).map((t) => t.testName)).toEqual(['slow', 'ignored and slow', 'db']);
  });

  it('should keep only named tests', () => {
    const filter = new Filter({ testNamesToInclude: new Set(['db', 'ignored']) });
    expect(filter.applyAll(names, tags)).toEqual([
      { testName: 'ignored', ignored: true },
      { testName: 'db', ignored: false },
    ]);
  });

  it('should classify a single test', () => {
    const filter = new Filter({ tagsToExclude: new Set(['db']) });
    expect(filter.apply('db', tags)).toEqual({ excluded: true, ignored: false });
    expect(filter.apply('ignored', tags)).toEqual({ excluded: false, ignored: true });
    expect(filter.apply('plain', tags)).toEqual({ excluded: false, ignored: false });
  });

  it('should count only tests that would execute', () => {
    expect(defaultFilter().runnableTestCount(names, tags)).toBe(3);
    expect(new Filter({ tagsToExclude: new Set(['slow']) }).runnableTestCount(names, tags)).toBe(2);
    expect(new Filter({ tagsToInclude: new Set(['slow']) }).runnableTestCount(names, tags)).toBe(1);
  });
});
