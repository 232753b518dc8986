/**
 * Suite Runner Tests
 * @module tests/unit/runner/suite-runner.test
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { loadConfig } from '../../../src/config/index.js';
import { SuiteAbortedError } from '../../../src/errors/engine-errors.js';
import { Filter } from '../../../src/filter/filter.js';
import { createLogger, getLogger, type StructuredLogger } from '../../../src/logging/logger.js';
import { createStopper } from '../../../src/reporting/reporter.js';
import { runSuites } from '../../../src/runner/suite-runner.js';
import { FunSuite } from '../../../src/styles/fun-suite.js';
import { RecordingReporter } from '../../helpers/index.js';

class PassingSuite extends FunSuite {
  constructor() {
    super();
    this.test('one', () => undefined);
    this.test('two', { tags: ['slow'] }, () => undefined);
  }
}

class FailingSuite extends FunSuite {
  constructor() {
    super();
    this.test('broken', () => {
      throw new Error('assertion failed');
    });
    this.test('after broken', () => undefined);
  }
}

class AbortingSuite extends FunSuite {
  constructor() {
    super();
    this.test('fatal', () => {
      throw new SuiteAbortedError('cannot continue');
    });
  }
}

describe('runSuites', () => {
  let logger: StructuredLogger;
  let reporter: RecordingReporter;

  beforeEach(() => {
    logger = createLogger('test', undefined, { level: 'silent' });
    reporter = new RecordingReporter();
  });

  it('should wrap each suite in starting and completed events', async () => {
    const summary = await runSuites([new PassingSuite()], {
      reporters: [reporter],
      config: loadConfig({}),
      logger,
    });

    expect(reporter.trace()).toEqual([
      'suiteStarting:PassingSuite',
      'testStarting:one',
      'testSucceeded:one',
      'testStarting:two',
      'testSucceeded:two',
      'suiteCompleted:PassingSuite',
    ]);
    expect(summary).toMatchObject({ testsSucceeded: 2, testsFailed: 0, suitesCompleted: 1 });
  });

  it('should build the filter from configuration', async () => {
    const summary = await runSuites([new PassingSuite()], {
      reporters: [reporter],
      config: loadConfig({ SPECLOOM_EXCLUDE_TAGS: 'slow' }),
      logger,
    });

    expect(summary.testsSucceeded).toBe(1);
    expect(reporter.ofType('testStarting').map((e) => e.testName)).toEqual(['one']);
  });

  it('should prefer an explicit filter', async () => {
    const summary = await runSuites([new PassingSuite()], {
      reporters: [reporter],
      config: loadConfig({}),
      filter: new Filter({ testNamesToInclude: new Set(['two']) }),
      logger,
    });

    expect(summary.testsSucceeded).toBe(1);
  });

  it('should report an aborted suite and carry on with the next', async () => {
    const summary = await runSuites([new AbortingSuite(), new PassingSuite()], {
      reporters: [reporter],
      config: loadConfig({}),
      logger,
    });

    const [aborted] = reporter.ofType('suiteAborted');
    expect(aborted?.message).toBe('cannot continue');
    expect(aborted?.error).toBeInstanceOf(SuiteAbortedError);
    expect(summary).toMatchObject({ suitesAborted: 1, suitesCompleted: 1, testsSucceeded: 2 });
  });

  it('should stop after the first failure when configured to', async () => {
    const summary = await runSuites([new FailingSuite(), new PassingSuite()], {
      reporters: [reporter],
      config: loadConfig({ SPECLOOM_STOP_ON_FIRST_FAILURE: 'true' }),
      logger,
    });

    expect(reporter.trace()).toEqual([
      'suiteStarting:FailingSuite',
      'testStarting:broken',
      'testFailed:broken',
      'suiteCompleted:FailingSuite',
    ]);
    expect(summary.testsFailed).toBe(1);
  });

  it('should run nothing once the stopper has tripped', async () => {
    const stopper = createStopper();
    stopper.requestStop();

    const summary = await runSuites([new PassingSuite()], {
      reporters: [reporter],
      config: loadConfig({}),
      stopper,
      logger,
    });

    expect(reporter.events).toEqual([]);
    expect(summary.suitesCompleted).toBe(0);
  });

  it('should keep going when a reporter throws', async () => {
    const summary = await runSuites([new PassingSuite()], {
      reporters: [
        {
          apply: () => {
            throw new Error('reporter broke');
          },
        },
      ],
      config: loadConfig({}),
      logger,
    });

    expect(summary.testsSucceeded).toBe(2);
  });

  it('should initialize the root logger from the configuration when no logger is given', async () => {
    await runSuites([new PassingSuite()], {
      reporters: [reporter],
      config: loadConfig({ LOG_LEVEL: 'warn' }),
    });

    expect(getLogger().level).toBe('warn');
    expect(reporter.ofType('testSucceeded')).toHaveLength(2);
  });
});
