/**
 * Configuration Tests
 * @module tests/unit/config/config.test
 *
 * Environment mapping, schema defaults and validation failures.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  configFromEnvironment,
  createFilterFromConfig,
  getConfig,
  initConfig,
  loadConfig,
  parseConfig,
  resetConfig,
} from '../../../src/config/index.js';
import { ConfigurationError } from '../../../src/errors/engine-errors.js';
import { IGNORE_TAG } from '../../../src/filter/filter.js';

describe('Configuration', () => {
  beforeEach(() => {
    resetConfig();
  });

  describe('configFromEnvironment', () => {
    it('should map variables onto sections', () => {
      expect(
        configFromEnvironment({
          NODE_ENV: 'test',
          LOG_LEVEL: 'debug',
          LOG_PRETTY: 'true',
          SPECLOOM_INCLUDE_TAGS: 'fast, unit ,',
          SPECLOOM_STOP_ON_FIRST_FAILURE: 'false',
        })
      ).toEqual({
        env: 'test',
        logging: { level: 'debug', pretty: true },
        filter: { includeTags: ['fast', 'unit'] },
        run: { stopOnFirstFailure: false },
      });
    });

    it('should leave unset variables out', () => {
      expect(configFromEnvironment({})).toEqual({ logging: {}, filter: {}, run: {} });
    });
  });

  describe('loadConfig', () => {
    it('should apply defaults', () => {
      expect(loadConfig({})).toEqual({
        env: 'development',
        logging: { level: 'info', pretty: false },
        filter: { excludeTags: [] },
        run: { stopOnFirstFailure: false, includeIcon: true },
      });
    });

    it('should let overrides win key by key', () => {
      const config = loadConfig(
        { SPECLOOM_EXCLUDE_TAGS: 'slow', SPECLOOM_INCLUDE_ICON: 'false' },
        { run: { stopOnFirstFailure: true } }
      );
      expect(config.filter.excludeTags).toEqual(['slow']);
      expect(config.run).toEqual({ stopOnFirstFailure: true, includeIcon: false });
    });

    it('should reject a malformed boolean', () => {
      expect(() => loadConfig({ SPECLOOM_STOP_ON_FIRST_FAILURE: 'yes' })).toThrow(ConfigurationError);
    });

    it('should reject an unknown log level with the offending path', () => {
      try {
        loadConfig({ LOG_LEVEL: 'loud' });
        expect.fail('loadConfig should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        if (error instanceof ConfigurationError) {
          expect(error.issues.map((issue) => issue.path)).toEqual(['logging.level']);
          expect(error.message.startsWith('Invalid engine configuration: logging.level: ')).toBe(true);
        }
      }
    });
  });

  describe('parseConfig', () => {
    it('should reject an empty include list', () => {
      expect(() => parseConfig({ filter: { includeTags: [] } })).toThrow(ConfigurationError);
    });
  });

  describe('cached configuration', () => {
    it('should keep the configuration from initConfig', () => {
      const config = initConfig({ NODE_ENV: 'production' });
      expect(getConfig()).toBe(config);
      expect(getConfig().env).toBe('production');
    });

    it('should reload after a reset', () => {
      const first = initConfig({});
      resetConfig();
      expect(getConfig()).not.toBe(first);
    });
  });

  describe('createFilterFromConfig', () => {
    it('should build a filter from the filter section', () => {
      const filter = createFilterFromConfig(
        loadConfig({ SPECLOOM_EXCLUDE_TAGS: 'slow', SPECLOOM_TEST_NAMES: 'a,b' })
      );
      const tags = new Map([
        ['a', new Set(['slow'])],
        ['b', new Set([IGNORE_TAG])],
      ]);

      expect(filter.applyAll(['a', 'b', 'c'], tags)).toEqual([{ testName: 'b', ignored: true }]);
    });
  });
});
