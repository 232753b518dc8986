/**
 * Registration Tree
 * @module engine/nodes
 *
 * Scopes (branches) and tests, info and markup (leaves) registered while a suite
 * is constructed. Branches own an append-only child list; every child keeps a
 * link back to the branch that owns it.
 */

import type { SourceLocation } from '../errors/base.js';
import type { PathMessageRecorder } from '../messaging/message-recorder.js';

// ============================================================================
// Node Types
// ============================================================================

/**
 * Sort key among siblings: [slot, sub-slot]. Only path-style suites set it,
 * since they may register a branch's children over several passes.
 */
export type ChildPosition = readonly [number, number];

export interface Trunk<T> {
  readonly kind: 'trunk';
  readonly children: ChildNode<T>[];
}

export interface DescriptionBranch<T> {
  readonly kind: 'description';
  readonly parent: Branch<T>;
  readonly descriptionText: string;
  /** Word such as "should" or "when" placed before each child's text */
  readonly childPrefix: string | undefined;
  readonly location: SourceLocation | undefined;
  readonly position?: ChildPosition;
  readonly children: ChildNode<T>[];
}

export interface TestLeaf<T> {
  readonly kind: 'test';
  readonly parent: Branch<T>;
  readonly testName: string;
  readonly testText: string;
  readonly testFun: T;
  readonly location: SourceLocation | undefined;
  readonly position?: ChildPosition;
  /** Duration measured when the body already ran during construction */
  readonly recordedDuration?: number;
  readonly recordedMessages?: PathMessageRecorder;
}

export interface InfoLeaf<T> {
  readonly kind: 'info';
  readonly parent: Branch<T>;
  readonly message: string;
  readonly location: SourceLocation | undefined;
  readonly position?: ChildPosition;
}

export interface MarkupLeaf<T> {
  readonly kind: 'markup';
  readonly parent: Branch<T>;
  readonly message: string;
  readonly location: SourceLocation | undefined;
  readonly position?: ChildPosition;
}

export type Branch<T> = Trunk<T> | DescriptionBranch<T>;

export type Leaf<T> = TestLeaf<T> | InfoLeaf<T> | MarkupLeaf<T>;

export type Node<T> = Branch<T> | Leaf<T>;

export type ChildNode<T> = DescriptionBranch<T> | Leaf<T>;

// ============================================================================
// Construction
// ============================================================================

export function createTrunk<T>(): Trunk<T> {
  return { kind: 'trunk', children: [] };
}

function comparePositions(a: ChildPosition, b: ChildPosition): number {
  return a[0] !== b[0] ? a[0] - b[0] : a[1] - b[1];
}

/**
 * Add a child to its parent's list. Positioned children go before the first
 * positioned sibling that sorts after them; the rest are appended.
 */
export function appendChild<T>(child: ChildNode<T>): void {
  const siblings = child.parent.children;
  const position = child.position;
  if (position === undefined) {
    siblings.push(child);
    return;
  }
  const index = siblings.findIndex(
    (sibling) => sibling.position !== undefined && comparePositions(sibling.position, position) > 0
  );
  if (index === -1) {
    siblings.push(child);
  } else {
    siblings.splice(index, 0, child);
  }
}

// ============================================================================
// Queries
// ============================================================================

function parentOf<T>(node: Node<T>): Branch<T> | undefined {
  return node.kind === 'trunk' ? undefined : node.parent;
}

/**
 * Ancestor count minus one, never negative. Children of the trunk sit at level 0.
 */
export function indentationLevel<T>(node: Node<T>): number {
  let ancestors = 0;
  let current = parentOf(node);
  while (current !== undefined) {
    ancestors += 1;
    current = parentOf(current);
  }
  return Math.max(0, ancestors - 1);
}

/**
 * Text of a branch's enclosing descriptions, each followed by its child prefix
 */
export function testNamePrefix<T>(branch: Branch<T>): string {
  if (branch.kind === 'trunk') {
    return '';
  }
  const ownText = branch.childPrefix
    ? `${branch.descriptionText} ${branch.childPrefix}`
    : branch.descriptionText;
  return `${testNamePrefix(branch.parent)} ${ownText}`.trim();
}

export function fullTestName<T>(testText: string, branch: Branch<T>): string {
  return `${testNamePrefix(branch)} ${testText}`.trim();
}

/**
 * Put the parent's child prefix in front of a child's own text
 */
export function prependChildPrefix<T>(branch: Branch<T>, text: string): string {
  if (branch.kind === 'description' && branch.childPrefix) {
    return `${branch.childPrefix} ${text}`;
  }
  return text;
}

/**
 * Child indices from the trunk down to the node
 */
export function pathOf<T>(node: ChildNode<T>): number[] {
  const path: number[] = [];
  let current: Node<T> = node;
  while (current.kind !== 'trunk') {
    const child: ChildNode<T> = current;
    path.unshift(child.parent.children.indexOf(child));
    current = child.parent;
  }
  return path;
}
