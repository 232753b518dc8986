/**
 * Suite Module
 * @module suite
 */

export { Suite, type Distributor, type RunArgs, type SuiteIdentity } from './suite.js';
