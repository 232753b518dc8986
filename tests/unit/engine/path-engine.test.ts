/**
 * Path Engine Unit Tests
 * @module tests/unit/engine/path-engine.test
 *
 * Target-path discovery, construction-time execution and replay of the
 * observed outcomes when the suite runs.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { PathEngine, isInTargetPath, type PathTestFunction } from '../../../src/engine/path-engine.js';
import {
  AsyncPathTestError,
  DiscoveryInProgressError,
  RegistrationClosedError,
} from '../../../src/errors/engine-errors.js';
import { pending } from '../../../src/errors/signals.js';
import { createLogger, type StructuredLogger } from '../../../src/logging/logger.js';
import { RecordingReporter, createRunArgs, runEngine } from '../../helpers/index.js';

const CLOSED = 'An it clause may not appear inside another it clause.';
const invoke = (fn: PathTestFunction) => fn();

describe('isInTargetPath', () => {
  it('should accept only all-zero paths without a target', () => {
    expect(isInTargetPath([0], undefined)).toBe(true);
    expect(isInTargetPath([0, 0, 0], undefined)).toBe(true);
    expect(isInTargetPath([0, 1], undefined)).toBe(false);
  });

  it('should accept ancestors of the target', () => {
    expect(isInTargetPath([1], [1, 2])).toBe(true);
    expect(isInTargetPath([0], [1, 2])).toBe(false);
  });

  it('should accept the target itself', () => {
    expect(isInTargetPath([1, 2], [1, 2])).toBe(true);
    expect(isInTargetPath([1, 1], [1, 2])).toBe(false);
  });

  it('should accept descendants that only add zeros', () => {
    expect(isInTargetPath([1, 2, 0], [1, 2])).toBe(true);
    expect(isInTargetPath([1, 2, 1], [1, 2])).toBe(false);
  });
});

describe('PathEngine', () => {
  let logger: StructuredLogger;
  let engine: PathEngine;
  let reporter: RecordingReporter;

  beforeEach(() => {
    logger = createLogger('test', undefined, { level: 'silent' });
    engine = new PathEngine('PathFunSpec', logger);
    reporter = new RecordingReporter();
  });

  describe('discovery', () => {
    it('should construct once per test, aiming at the next unvisited path', () => {
      const passStarted = vi.spyOn(logger, 'pathPassStarted');
      const ran: string[] = [];
      let constructions = 0;

      engine.discover(() => {
        constructions += 1;
        engine.handleNestedBranch('A', undefined, () => {
          engine.handleTest('a1', () => {
            ran.push('a1');
          }, CLOSED);
          engine.handleTest('a2', () => {
            ran.push('a2');
          }, CLOSED);
        }, CLOSED);
        engine.handleTest('b', () => {
          ran.push('b');
        }, CLOSED);
      });

      expect(constructions).toBe(3);
      expect(engine.passCount).toBe(3);
      expect(ran).toEqual(['a1', 'a2', 'b']);
      expect(passStarted.mock.calls).toEqual([
        [1, undefined],
        [2, [0, 1]],
        [3, [1]],
      ]);
      expect(engine.testNames()).toEqual(['A a1', 'A a2', 'b']);
      expect(engine.testPath('A a2')).toEqual([0, 1]);
      expect(engine.testPath('b')).toEqual([1]);
    });

    it('should give each test a fresh run of the code before it', () => {
      const seen: number[] = [];

      engine.discover(() => {
        const list: number[] = [];
        engine.handleTest('push one', () => {
          list.push(1);
          seen.push(list.length);
        }, CLOSED);
        engine.handleTest('push another', () => {
          list.push(2);
          seen.push(list.length);
        }, CLOSED);
      });

      expect(seen).toEqual([1, 1]);
    });

    it('should count an empty describe as reaching the target', async () => {
      engine.discover(() => {
        engine.handleNestedBranch('nothing here', undefined, () => undefined, CLOSED);
        engine.handleTest('t', () => undefined, CLOSED);
      });

      expect(engine.passCount).toBe(2);
      expect(engine.testNames()).toEqual(['t']);

      await runEngine(engine, createRunArgs(reporter), invoke);
      expect(reporter.trace()).toEqual([
        'scopeOpened:nothing here',
        'scopeClosed:nothing here',
        'testStarting:t',
        'testSucceeded:t',
      ]);
    });

    it('should return the instance from the first pass', () => {
      let counter = 0;
      const first = engine.discover(() => {
        counter += 1;
        engine.handleTest('first', () => undefined, CLOSED);
        engine.handleTest('second', () => undefined, CLOSED);
        return { pass: counter };
      });
      expect(counter).toBe(2);
      expect(first).toEqual({ pass: 1 });
    });

    it('should refuse a second discovery', () => {
      engine.discover(() => undefined);

      expect(() => engine.discover(() => undefined)).toThrow(
        new RegistrationClosedError('Path discovery has already completed for this PathFunSpec')
      );
    });

    it('should refuse discovery started from inside discovery', () => {
      expect(() => engine.discover(() => engine.discover(() => undefined))).toThrow(DiscoveryInProgressError);
    });

    it('should reject an it nested in an it', () => {
      expect(() =>
        engine.discover(() => {
          engine.handleTest('outer', () => {
            engine.handleTest('inner', () => undefined, CLOSED);
          }, CLOSED);
        })
      ).toThrow(new RegistrationClosedError(CLOSED));
    });
  });

  describe('nesting', () => {
    let ran: string[];
    const recorded =
      (name: string): PathTestFunction =>
      () => {
        ran.push(name);
      };
    const describeIn = (description: string, fun: () => void) =>
      engine.handleNestedBranch(description, undefined, fun, CLOSED);
    const itIn = (testText: string) => engine.handleTest(testText, recorded(testText), CLOSED);

    beforeEach(() => {
      ran = [];
    });

    it('should walk sibling describes under one parent', async () => {
      const passStarted = vi.spyOn(logger, 'pathPassStarted');

      engine.discover(() => {
        describeIn('A', () => {
          describeIn('B', () => {
            itIn('b1');
            itIn('b2');
          });
          describeIn('C', () => {
            itIn('c1');
          });
        });
        itIn('d');
      });

      expect(engine.passCount).toBe(4);
      expect(ran).toEqual(['b1', 'b2', 'c1', 'd']);
      expect(passStarted.mock.calls).toEqual([
        [1, undefined],
        [2, [0, 0, 1]],
        [3, [0, 1]],
        [4, [1]],
      ]);
      expect(engine.testNames()).toEqual(['A B b1', 'A B b2', 'A C c1', 'd']);

      await runEngine(engine, createRunArgs(reporter), invoke);
      expect(reporter.trace()).toEqual([
        'scopeOpened:A',
        'scopeOpened:B',
        'testStarting:A B b1',
        'testSucceeded:A B b1',
        'testStarting:A B b2',
        'testSucceeded:A B b2',
        'scopeClosed:B',
        'scopeOpened:C',
        'testStarting:A C c1',
        'testSucceeded:A C c1',
        'scopeClosed:C',
        'scopeClosed:A',
        'testStarting:d',
        'testSucceeded:d',
      ]);
    });

    it('should handle a describe between two tests of one scope', async () => {
      engine.discover(() => {
        describeIn('S', () => {
          itIn('t1');
          describeIn('D', () => {
            itIn('d1');
          });
          itIn('t2');
        });
      });

      expect(engine.passCount).toBe(3);
      expect(ran).toEqual(['t1', 'd1', 't2']);

      await runEngine(engine, createRunArgs(reporter), invoke);
      expect(reporter.trace()).toEqual([
        'scopeOpened:S',
        'testStarting:S t1',
        'testSucceeded:S t1',
        'scopeOpened:D',
        'testStarting:S D d1',
        'testSucceeded:S D d1',
        'scopeClosed:D',
        'testStarting:S t2',
        'testSucceeded:S t2',
        'scopeClosed:S',
      ]);
    });

    it('should move on from an empty describe to a sibling describe', async () => {
      engine.discover(() => {
        describeIn('E', () => undefined);
        describeIn('F', () => {
          itIn('f1');
        });
      });

      expect(engine.passCount).toBe(2);
      expect(ran).toEqual(['f1']);
      expect(engine.testNames()).toEqual(['F f1']);

      await runEngine(engine, createRunArgs(reporter), invoke);
      expect(reporter.trace()).toEqual([
        'scopeOpened:E',
        'scopeClosed:E',
        'scopeOpened:F',
        'testStarting:F f1',
        'testSucceeded:F f1',
        'scopeClosed:F',
      ]);
    });

    it('should spend one pass on each of consecutive empty describes', async () => {
      engine.discover(() => {
        describeIn('E1', () => undefined);
        describeIn('E2', () => undefined);
        itIn('t');
      });

      expect(engine.passCount).toBe(3);
      expect(ran).toEqual(['t']);

      await runEngine(engine, createRunArgs(reporter), invoke);
      expect(reporter.trace()).toEqual([
        'scopeOpened:E1',
        'scopeClosed:E1',
        'scopeOpened:E2',
        'scopeClosed:E2',
        'testStarting:t',
        'testSucceeded:t',
      ]);
    });

    it('should reach tests three levels deep and climb back out', async () => {
      engine.discover(() => {
        describeIn('L1', () => {
          describeIn('L2', () => {
            describeIn('L3', () => {
              itIn('x');
              itIn('y');
            });
            itIn('w');
          });
          itIn('v');
        });
        itIn('u');
      });

      expect(engine.passCount).toBe(5);
      expect(ran).toEqual(['x', 'y', 'w', 'v', 'u']);
      expect(engine.testPath('L1 L2 L3 y')).toEqual([0, 0, 0, 1]);
      expect(engine.testPath('L1 L2 w')).toEqual([0, 0, 1]);

      await runEngine(engine, createRunArgs(reporter), invoke);
      expect(reporter.trace()).toEqual([
        'scopeOpened:L1',
        'scopeOpened:L2',
        'scopeOpened:L3',
        'testStarting:L1 L2 L3 x',
        'testSucceeded:L1 L2 L3 x',
        'testStarting:L1 L2 L3 y',
        'testSucceeded:L1 L2 L3 y',
        'scopeClosed:L3',
        'testStarting:L1 L2 w',
        'testSucceeded:L1 L2 w',
        'scopeClosed:L2',
        'testStarting:L1 v',
        'testSucceeded:L1 v',
        'scopeClosed:L1',
        'testStarting:u',
        'testSucceeded:u',
      ]);
    });

    it('should register a describe that holds only an ignored test in one pass', async () => {
      engine.discover(() => {
        describeIn('D', () => {
          engine.handleIgnoredTest('i', recorded('i'), CLOSED);
        });
        itIn('t');
      });

      expect(engine.passCount).toBe(2);
      expect(ran).toEqual(['t']);

      await runEngine(engine, createRunArgs(reporter), invoke);
      expect(ran).toEqual(['t']);
      expect(reporter.trace()).toEqual([
        'scopeOpened:D',
        'testIgnored:D i',
        'scopeClosed:D',
        'testStarting:t',
        'testSucceeded:t',
      ]);
    });
  });

  describe('replay', () => {
    it('should report the outcomes observed during construction', async () => {
      const body = vi.fn<() => void>();
      engine.discover(() => {
        engine.handleTest('passes', () => body(), CLOSED);
        engine.handleTest('fails', () => {
          throw new Error('list was not empty');
        }, CLOSED);
        engine.handleTest('todo', () => pending(), CLOSED);
        engine.handleIgnoredTest('skipped', () => body(), CLOSED);
      });
      expect(body).toHaveBeenCalledTimes(1);

      await runEngine(engine, createRunArgs(reporter), invoke);

      expect(body).toHaveBeenCalledTimes(1);
      expect(reporter.trace()).toEqual([
        'testStarting:passes',
        'testSucceeded:passes',
        'testStarting:fails',
        'testFailed:fails',
        'testStarting:todo',
        'testPending:todo',
        'testIgnored:skipped',
      ]);
      expect(reporter.ofType('testFailed')[0]?.message).toBe('list was not empty');
    });

    it('should fail a test whose body returns a promise', async () => {
      const warn = vi.spyOn(logger, 'warn');
      engine.discover(() => {
        engine.handleTest('async body', async () => {
          await Promise.resolve();
          throw new Error('rejected later');
        }, CLOSED);
      });

      await runEngine(engine, createRunArgs(reporter), invoke);

      const [failed] = reporter.ofType('testFailed');
      expect(failed?.error).toBeInstanceOf(AsyncPathTestError);
      await vi.waitFor(() => expect(warn).toHaveBeenCalledTimes(1));
    });

    it('should deliver messages raised inside a test after its outcome', async () => {
      engine.discover(() => {
        engine.handleNestedBranch('A', undefined, () => {
          engine.handleTest('a1', () => engine.informer.apply('inside a1'), CLOSED);
        }, CLOSED);
      });

      await runEngine(engine, createRunArgs(reporter), invoke);

      expect(reporter.trace()).toEqual([
        'scopeOpened:A',
        'testStarting:A a1',
        'testSucceeded:A a1',
        'infoProvided:inside a1',
        'scopeClosed:A',
      ]);
      const [info] = reporter.ofType('infoProvided');
      expect(info?.nameInfo?.testName).toBe('A a1');
      expect(info?.formatter?.formattedText).toBe('    + inside a1');
    });

    it('should record registration-time info once, in place', async () => {
      engine.discover(() => {
        engine.informer.apply('top');
        engine.handleNestedBranch('A', undefined, () => {
          engine.informer.apply('in A');
          engine.handleTest('a1', () => undefined, CLOSED);
          engine.handleTest('a2', () => undefined, CLOSED);
        }, CLOSED);
        engine.handleTest('b', () => undefined, CLOSED);
        engine.informer.apply('bottom');
      });

      await runEngine(engine, createRunArgs(reporter), invoke);

      expect(reporter.trace()).toEqual([
        'infoProvided:top',
        'scopeOpened:A',
        'infoProvided:in A',
        'testStarting:A a1',
        'testSucceeded:A a1',
        'testStarting:A a2',
        'testSucceeded:A a2',
        'scopeClosed:A',
        'testStarting:b',
        'testSucceeded:b',
        'infoProvided:bottom',
      ]);
    });
  });
});
