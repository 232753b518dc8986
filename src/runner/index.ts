/**
 * Runner Module
 * @module runner
 */

export { runSuites, type RunOptions } from './suite-runner.js';
