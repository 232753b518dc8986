/**
 * specloom
 * @module specloom
 *
 * Test registration and execution engine with spec-style front-ends.
 */

export * from './errors/index.js';
export * from './logging/index.js';
export * from './concurrency/index.js';
export * from './messaging/index.js';
export * from './engine/index.js';
export * from './filter/index.js';
export * from './reporting/index.js';
export * from './suite/index.js';
export * from './styles/index.js';
export * from './config/index.js';
export * from './runner/index.js';
export type { Brand, ConfigMap, MaybePromise, TagsMap } from './types/utility.js';
export { EMPTY_CONFIG_MAP, isPromiseLike } from './types/utility.js';
