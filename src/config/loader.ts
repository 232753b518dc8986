/**
 * Configuration Loader
 * @module config/loader
 *
 * Maps environment variables onto the engine configuration and validates the
 * result with zod.
 */

import { ConfigurationError, type ConfigIssue } from '../errors/engine-errors.js';
import { EngineConfigSchema, type EngineConfig, type EngineConfigInput } from './schema.js';

export type EnvironmentVariables = Readonly<Record<string, string | undefined>>;

// ============================================================================
// Value Parsing
// ============================================================================

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Only "true" and "false" are accepted; anything else is left for the schema to reject
 */
function parseBoolean(value: string | undefined): boolean | string | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  if (value === 'true') {
    return true;
  }
  if (value === 'false') {
    return false;
  }
  return value;
}

function definedOnly(value: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
}

// ============================================================================
// Environment Source
// ============================================================================

/**
 * Raw configuration built from environment variables, before validation
 */
export function configFromEnvironment(env: EnvironmentVariables): Record<string, unknown> {
  return definedOnly({
    env: env.NODE_ENV || undefined,
    logging: definedOnly({
      level: env.LOG_LEVEL || undefined,
      pretty: parseBoolean(env.LOG_PRETTY),
    }),
    filter: definedOnly({
      includeTags: parseList(env.SPECLOOM_INCLUDE_TAGS),
      excludeTags: parseList(env.SPECLOOM_EXCLUDE_TAGS),
      testNames: parseList(env.SPECLOOM_TEST_NAMES),
    }),
    run: definedOnly({
      stopOnFirstFailure: parseBoolean(env.SPECLOOM_STOP_ON_FIRST_FAILURE),
      includeIcon: parseBoolean(env.SPECLOOM_INCLUDE_ICON),
    }),
  });
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate raw configuration, applying defaults
 */
export function parseConfig(raw: unknown): EngineConfig {
  const result = EngineConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues: ConfigIssue[] = result.error.errors.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = issues.map((issue) => `${issue.path || '(root)'}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid engine configuration: ${summary}`, issues);
  }
  return result.data;
}

/**
 * Load configuration from environment variables, with optional overrides on top
 */
export function loadConfig(
  env: EnvironmentVariables = process.env,
  overrides: EngineConfigInput = {}
): EngineConfig {
  const fromEnv = configFromEnvironment(env);
  return parseConfig(mergeSections(fromEnv, overrides));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * One-level-deep merge: sections present in both are merged key by key
 */
function mergeSections(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) {
      continue;
    }
    const existing = merged[key];
    merged[key] = isRecord(existing) && isRecord(value) ? { ...existing, ...value } : value;
  }
  return merged;
}
