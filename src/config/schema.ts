/**
 * Configuration Schema Definitions
 * @module config/schema
 *
 * Zod schemas for engine configuration. Types are inferred from the schemas.
 */

import { z } from 'zod';

// ============================================================================
// Environment Enum
// ============================================================================

export const Environment = z.enum(['development', 'test', 'production']);
export type Environment = z.infer<typeof Environment>;

export const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevel>;

// ============================================================================
// Section Schemas
// ============================================================================

export const LoggingConfigSchema = z.object({
  level: LogLevel.default('info'),
  /** Pretty-print through pino-pretty (ignored in production) */
  pretty: z.boolean().default(false),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

const TagName = z.string().min(1);

export const FilterConfigSchema = z.object({
  /** Run only tests carrying one of these tags */
  includeTags: z.array(TagName).nonempty().optional(),
  excludeTags: z.array(TagName).default([]),
  /** Run only these full test names */
  testNames: z.array(z.string().min(1)).nonempty().optional(),
});

export type FilterConfig = z.infer<typeof FilterConfigSchema>;

export const RunConfigSchema = z.object({
  /** Stop entering new tests once one has failed */
  stopOnFirstFailure: z.boolean().default(false),
  /** Prefix formatted test and info text with icons */
  includeIcon: z.boolean().default(true),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;

// ============================================================================
// Engine Configuration
// ============================================================================

export const EngineConfigSchema = z.object({
  env: Environment.default('development'),
  logging: LoggingConfigSchema.default({}),
  filter: FilterConfigSchema.default({}),
  run: RunConfigSchema.default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/**
 * Input accepted before defaults are applied
 */
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
