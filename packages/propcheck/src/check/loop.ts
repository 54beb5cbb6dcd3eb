/**
 * The synchronous check loop.
 */

import type { Config } from '../config.js';
import type { Discarded } from '../errors.js';
import type { ArgumentsSource } from '../gen/generator.js';
import type { PropertyCheckResult } from '../result.js';
import {
  Classification,
  Evaluation,
  LoopOptions,
  LoopState,
  advance,
  classify,
  generate,
  initialState,
  logCheckResult,
  logCheckStart,
} from './state.js';

/**
 * A predicate over generated arguments.
 */
export type Predicate<Args extends unknown[], T> = (...args: Args) => T | Discarded;

/**
 * Evaluate a predicate until it has succeeded `config.minSuccessful` times,
 * has been discarded `config.maxDiscarded` times, or has failed once.
 *
 * Every evaluation completes before the next one is generated.
 */
export function checkForAll<Args extends unknown[], Pools, T>(
  config: Config,
  source: ArgumentsSource<Args, Pools>,
  fun: Predicate<NoInfer<Args>, T>,
  classification: Classification<T>,
  options: LoopOptions<NoInfer<Args>> = {}
): PropertyCheckResult {
  let state: LoopState<Pools> = initialState(config, source, options.randomizer);
  logCheckStart(config, state);

  for (;;) {
    const generated = generate(config, source, state);
    const evaluation = evaluate(() => fun(...generated.args));
    const step = advance(
      config,
      generated.state,
      classify(evaluation, classification),
      generated.args,
      options
    );

    if (step.type === 'done') {
      logCheckResult(config, step.result);
      return step.result;
    }
    state = step.state;
  }
}

function evaluate<T>(thunk: () => T): Evaluation<T> {
  try {
    return { type: 'returned', value: thunk() };
  } catch (error) {
    return { type: 'threw', error };
  }
}
