/**
 * Core Structured Logger
 * @module logging/logger
 *
 * Provides structured logging with Pino for the registration and execution engine.
 * Includes engine-specific logging methods for registration, test outcomes,
 * path discovery and reporter faults.
 */

import pino from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';
import { getConfig } from '../config/index.js';
import type { EngineConfig } from '../config/schema.js';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Log context that can be attached to log entries
 */
export interface LogContext {
  suiteName?: string;
  suiteId?: string;
  testName?: string;
  module?: string;
  operation?: string;
  [key: string]: unknown;
}

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  level: string;
  pretty: boolean;
  redact: string[];
  service: string;
  environment: string;
}

/**
 * Engine-specific logging methods
 */
export interface EngineLogMethods {
  registrationClosed(suiteName: string, testCount: number): void;
  testRegistered(testName: string, tags: ReadonlyArray<string>): void;
  branchRegistered(description: string, depth: number): void;
  testOutcome(testName: string, outcome: string, durationMs: number): void;
  pathPassStarted(pass: number, targetPath: ReadonlyArray<number> | undefined): void;
  pathDiscoveryCompleted(passes: number, testCount: number): void;
  reporterFailed(eventType: string, error: unknown): void;
  cleanupErrorSuppressed(operation: string, error: unknown): void;
}

/**
 * Pino logger extended with engine methods
 */
export type StructuredLogger = Logger & EngineLogMethods;

// ============================================================================
// Default Configuration
// ============================================================================

/**
 * Level, pretty-printing and environment come from the engine configuration
 * (`LOG_LEVEL`, `LOG_PRETTY`, `NODE_ENV`); see `loggerConfigFrom`.
 */
const defaultConfig: LoggerConfig = {
  level: 'info',
  pretty: false,
  redact: ['password', 'token', 'secret', 'apiKey', 'api_key', 'authorization'],
  service: 'specloom',
  environment: 'development',
};

/**
 * Expands redaction keys to nested variations
 */
function createRedactionPaths(paths: string[]): string[] {
  const expandedPaths: string[] = [];

  for (const path of paths) {
    expandedPaths.push(path);
    expandedPaths.push(`*.${path}`);
  }

  return expandedPaths;
}

// ============================================================================
// Engine Method Extensions
// ============================================================================

/**
 * Extends a Pino logger with engine-specific methods
 */
export function withEngineMethods(logger: Logger): StructuredLogger {
  const methods: EngineLogMethods = {
    registrationClosed(suiteName, testCount) {
      logger.debug(
        { event: 'registration_closed', suiteName, testCount },
        `Registration closed for ${suiteName} with ${testCount} tests`
      );
    },

    testRegistered(testName, tags) {
      logger.trace({ event: 'test_registered', testName, tags }, `Registered test: ${testName}`);
    },

    branchRegistered(description, depth) {
      logger.trace(
        { event: 'branch_registered', description, depth },
        `Registered branch: ${description}`
      );
    },

    testOutcome(testName, outcome, durationMs) {
      logger.debug(
        { event: 'test_outcome', testName, outcome, durationMs },
        `Test ${outcome}: ${testName} (${durationMs}ms)`
      );
    },

    pathPassStarted(pass, targetPath) {
      logger.trace(
        { event: 'path_pass_started', pass, targetPath },
        `Path pass ${pass} targeting ${targetPath ? `[${targetPath.join(',')}]` : 'first leaf'}`
      );
    },

    pathDiscoveryCompleted(passes, testCount) {
      logger.debug(
        { event: 'path_discovery_completed', passes, testCount },
        `Path discovery finished after ${passes} passes (${testCount} tests)`
      );
    },

    reporterFailed(eventType, error) {
      logger.error(
        { event: 'reporter_failed', eventType, err: error },
        `Reporter threw while handling ${eventType}`
      );
    },

    cleanupErrorSuppressed(operation, error) {
      logger.warn(
        { event: 'cleanup_error_suppressed', operation, err: error },
        `Cleanup of ${operation} failed after the operation itself failed`
      );
    },
  };

  return Object.assign(logger, methods);
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Creates a new structured logger instance
 */
export function createLogger(
  name: string,
  baseContext?: LogContext,
  overrides: Partial<LoggerConfig> = {}
): StructuredLogger {
  const config: LoggerConfig = { ...defaultConfig, ...overrides };

  const options: LoggerOptions = {
    name,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: createRedactionPaths(config.redact),
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: config.service,
      env: config.environment,
    },
  };

  let destination: DestinationStream | undefined;

  if (config.pretty && config.environment !== 'production') {
    destination = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    });
  }

  const baseLogger = destination ? pino(options, destination) : pino(options);
  const logger = baseContext ? baseLogger.child(baseContext) : baseLogger;

  return withEngineMethods(logger);
}

// ============================================================================
// Singleton Root Logger
// ============================================================================

let rootLogger: StructuredLogger | null = null;

/**
 * Logger settings carried by the engine configuration
 */
export function loggerConfigFrom(config: EngineConfig): Partial<LoggerConfig> {
  return {
    level: config.logging.level,
    pretty: config.logging.pretty,
    environment: config.env,
  };
}

/**
 * Gets the root logger instance, creating it from the process-wide configuration
 */
export function getLogger(): StructuredLogger {
  if (!rootLogger) {
    rootLogger = createLogger('specloom', undefined, loggerConfigFrom(getConfig()));
  }
  return rootLogger;
}

/**
 * Initializes the root logger with custom configuration
 */
export function initLogger(overrides: Partial<LoggerConfig> = {}, context?: LogContext): StructuredLogger {
  rootLogger = createLogger('specloom', context, overrides);
  return rootLogger;
}

/**
 * Resets the root logger (primarily for testing)
 */
export function resetLogger(): void {
  rootLogger = null;
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Creates a logger for a specific module/component
 */
export function createModuleLogger(moduleName: string): StructuredLogger {
  return withEngineMethods(getLogger().child({ module: moduleName }));
}
