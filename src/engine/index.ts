/**
 * Engine Module
 * @module engine
 */

export { SuperEngine, type BranchRegistration, type FixtureInvoker, type RunTestFn, type SuperRunFn, type TestRegistration } from './super-engine.js';
export { Engine, FixtureEngine, type FixtureTestFunction, type TestFunction } from './engine.js';
export { PathEngine, isInTargetPath, type PathRegistrationOptions, type PathTestFunction } from './path-engine.js';
export { initialBundle, type Bundle } from './bundle.js';
export {
  fullTestName,
  indentationLevel,
  pathOf,
  prependChildPrefix,
  testNamePrefix,
  type Branch,
  type ChildNode,
  type ChildPosition,
  type DescriptionBranch,
  type InfoLeaf,
  type Leaf,
  type MarkupLeaf,
  type Node,
  type TestLeaf,
  type Trunk,
} from './nodes.js';
export { invokeTest, outcomeOfError, replayOutcome, type TestOutcome, type TestOutcomeKind } from './outcome.js';
export { captureLocation, parseStackFrame } from './location.js';
