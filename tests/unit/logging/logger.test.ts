/**
 * Structured Logger Tests
 * @module tests/unit/logging/logger.test
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { pino } from 'pino';
import { initConfig, loadConfig } from '../../../src/config/index.js';
import { ConfigurationError } from '../../../src/errors/engine-errors.js';
import {
  createModuleLogger,
  getLogger,
  initLogger,
  loggerConfigFrom,
  resetLogger,
  withEngineMethods,
} from '../../../src/logging/logger.js';

function capture(): { readonly lines: Array<Record<string, unknown>>; readonly stream: { write(msg: string): void } } {
  const lines: Array<Record<string, unknown>> = [];
  return {
    lines,
    stream: {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  };
}

describe('engine logger', () => {
  it('should log registration closing with structured fields', () => {
    const { lines, stream } = capture();
    const logger = withEngineMethods(pino({ level: 'trace' }, stream));

    logger.registrationClosed('StackSpec', 3);

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      event: 'registration_closed',
      suiteName: 'StackSpec',
      testCount: 3,
      msg: 'Registration closed for StackSpec with 3 tests',
    });
  });

  it('should describe path passes by their target', () => {
    const { lines, stream } = capture();
    const logger = withEngineMethods(pino({ level: 'trace' }, stream));

    logger.pathPassStarted(1, undefined);
    logger.pathPassStarted(2, [0, 1]);

    expect(lines.map((line) => line.msg)).toEqual([
      'Path pass 1 targeting first leaf',
      'Path pass 2 targeting [0,1]',
    ]);
  });

  it('should respect the configured level', () => {
    const { lines, stream } = capture();
    const logger = withEngineMethods(pino({ level: 'info' }, stream));

    logger.testRegistered('t', []);
    logger.reporterFailed('testStarting', new Error('broken'));

    expect(lines.map((line) => line.event)).toEqual(['reporter_failed']);
  });

  it('should hand out module loggers from the root logger', () => {
    const root = initLogger({ level: 'silent' });
    expect(getLogger()).toBe(root);

    const moduleLogger = createModuleLogger('engine');
    expect(moduleLogger.level).toBe('silent');
    expect(typeof moduleLogger.testOutcome).toBe('function');
  });
});

describe('root logger configuration', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should map the logging section of the engine configuration', () => {
    const config = loadConfig({ LOG_LEVEL: 'debug', LOG_PRETTY: 'false', NODE_ENV: 'production' });

    expect(loggerConfigFrom(config)).toEqual({ level: 'debug', pretty: false, environment: 'production' });
  });

  it('should take its level from the loaded configuration', () => {
    resetLogger();
    initConfig({ LOG_LEVEL: 'warn', NODE_ENV: 'test' });

    expect(getLogger().level).toBe('warn');
    expect(createModuleLogger('engine').level).toBe('warn');
  });

  it('should refuse a level the configuration rejects', () => {
    resetLogger();
    vi.stubEnv('LOG_LEVEL', 'loud');

    expect(() => getLogger()).toThrow(ConfigurationError);
  });
});
