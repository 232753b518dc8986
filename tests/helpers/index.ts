/**
 * Test Helpers
 * @module tests/helpers
 */

export * from './recording-reporter.js';
