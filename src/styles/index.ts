/**
 * Style Front-ends
 * @module styles
 */

export { FunSuite } from './fun-suite.js';
export { FixtureFunSuite, type OneArgTest } from './fixture-fun-suite.js';
export { FunSpec } from './fun-spec.js';
export { WordSpec } from './word-spec.js';
export { FlatSpec } from './flat-spec.js';
export { PathFunSpec, createPathSuite } from './path-fun-spec.js';
export { type TestArgs, type TestOptions } from './style-support.js';
