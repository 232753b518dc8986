/**
 * Logging Module
 * @module logging
 */

export {
  createLogger,
  createModuleLogger,
  getLogger,
  initLogger,
  loggerConfigFrom,
  resetLogger,
  withEngineMethods,
  type EngineLogMethods,
  type LogContext,
  type LoggerConfig,
  type StructuredLogger,
} from './logger.js';
