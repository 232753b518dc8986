/**
 * Configuration Module
 * @module config
 *
 * Process-wide engine configuration with type-safe access.
 *
 * @example
 * ```typescript
 * import { getConfig, createFilterFromConfig } from './config/index.js';
 *
 * const filter = createFilterFromConfig(getConfig());
 * ```
 */

import { Filter } from '../filter/filter.js';
import { loadConfig, type EnvironmentVariables } from './loader.js';
import type { EngineConfig, EngineConfigInput } from './schema.js';

let currentConfig: EngineConfig | null = null;

/**
 * Load and cache configuration
 */
export function initConfig(env: EnvironmentVariables = process.env, overrides: EngineConfigInput = {}): EngineConfig {
  currentConfig = loadConfig(env, overrides);
  return currentConfig;
}

/**
 * Get the cached configuration, loading it from the environment on first use
 */
export function getConfig(): EngineConfig {
  if (!currentConfig) {
    currentConfig = loadConfig();
  }
  return currentConfig;
}

/**
 * Reset configuration (primarily for testing)
 */
export function resetConfig(): void {
  currentConfig = null;
}

export function createFilterFromConfig(config: EngineConfig): Filter {
  return new Filter({
    tagsToInclude: config.filter.includeTags ? new Set(config.filter.includeTags) : undefined,
    tagsToExclude: new Set(config.filter.excludeTags),
    testNamesToInclude: config.filter.testNames ? new Set(config.filter.testNames) : undefined,
  });
}

export * from './schema.js';
export { configFromEnvironment, loadConfig, parseConfig, type EnvironmentVariables } from './loader.js';
