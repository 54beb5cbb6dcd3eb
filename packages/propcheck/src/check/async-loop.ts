/**
 * The asynchronous check loop.
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
 * A predicate whose result may arrive later.
 */
export type AsyncPredicate<Args extends unknown[], T> = (
  ...args: Args
) => T | Discarded | PromiseLike<T | Discarded>;

/**
 * Asynchronous counterpart of {@link checkForAll}.
 *
 * Evaluations run strictly one at a time: the next arguments are generated
 * only after the previous evaluation has settled and been classified.
 * Rejections and synchronous throws go through the same classification.
 */
export async function checkForAllAsync<Args extends unknown[], Pools, T>(
  config: Config,
  source: ArgumentsSource<Args, Pools>,
  fun: AsyncPredicate<NoInfer<Args>, T>,
  classification: Classification<T>,
  options: LoopOptions<NoInfer<Args>> = {}
): Promise<PropertyCheckResult> {
  let state: LoopState<Pools> = initialState(config, source, options.randomizer);
  logCheckStart(config, state);

  for (;;) {
    const generated = generate(config, source, state);
    const evaluation = await evaluate(() => fun(...generated.args));
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

function evaluate<T>(thunk: () => T | PromiseLike<T>): Promise<Evaluation<T>> {
  return new Promise<T>((resolve) => resolve(thunk())).then(
    (value): Evaluation<T> => ({ type: 'returned', value }),
    (error: unknown): Evaluation<T> => ({ type: 'threw', error })
  );
}
