/**
 * Registration Bundle
 * @module engine/bundle
 *
 * Immutable snapshot of registration state. An engine never edits a bundle;
 * it builds the successor and swaps it into its atomic slot.
 */

import type { TagsMap } from '../types/utility.js';
import type { Branch, TestLeaf } from './nodes.js';

export interface Bundle<T> {
  readonly currentBranch: Branch<T>;
  /** Test names in registration order */
  readonly testNamesList: ReadonlyArray<string>;
  readonly testsMap: ReadonlyMap<string, TestLeaf<T>>;
  readonly tagsMap: TagsMap;
  readonly registrationClosed: boolean;
}

export function initialBundle<T>(trunk: Branch<T>): Bundle<T> {
  return Object.freeze({
    currentBranch: trunk,
    testNamesList: Object.freeze([]),
    testsMap: new Map<string, TestLeaf<T>>(),
    tagsMap: new Map<string, ReadonlySet<string>>(),
    registrationClosed: false,
  });
}

export function updateBundle<T>(bundle: Bundle<T>, changes: Partial<Bundle<T>>): Bundle<T> {
  return Object.freeze({ ...bundle, ...changes });
}

export function withTest<T>(bundle: Bundle<T>, leaf: TestLeaf<T>, tags: ReadonlySet<string>): Bundle<T> {
  const testsMap = new Map(bundle.testsMap);
  testsMap.set(leaf.testName, leaf);
  let tagsMap = bundle.tagsMap;
  if (tags.size > 0) {
    const nextTags = new Map(bundle.tagsMap);
    nextTags.set(leaf.testName, tags);
    tagsMap = nextTags;
  }
  return updateBundle(bundle, {
    testNamesList: Object.freeze([...bundle.testNamesList, leaf.testName]),
    testsMap,
    tagsMap,
  });
}

export function withTags<T>(bundle: Bundle<T>, testName: string, tags: ReadonlySet<string>): Bundle<T> {
  const tagsMap = new Map(bundle.tagsMap);
  tagsMap.set(testName, tags);
  return updateBundle(bundle, { tagsMap });
}
