/**
 * Engines
 * @module engine/engine
 *
 * The engine as used by plain styles, whose tests take no arguments, and by
 * fixture styles, whose tests take the fixture their suite supplies.
 */

import type { MaybePromise } from '../types/utility.js';
import { SuperEngine } from './super-engine.js';

export type TestFunction = () => MaybePromise<void>;

export type FixtureTestFunction<F> = (fixture: F) => MaybePromise<void>;

export class Engine extends SuperEngine<TestFunction> {}

export class FixtureEngine<F> extends SuperEngine<FixtureTestFunction<F>> {}
