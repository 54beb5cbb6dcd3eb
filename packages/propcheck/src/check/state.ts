/**
 * State and transitions shared by the synchronous and asynchronous check loops.
 *
 * Both loops run the same steps per evaluation: take a size, generate the
 * arguments, evaluate the predicate, classify the outcome and advance. Only
 * how the predicate is evaluated differs.
 */

import type { Config } from '../config.js';
import { Randomizer } from '../data/randomizer.js';
import { SizeParam, nextSize, planSizes } from '../data/size.js';
import { Discarded, DiscardedEvaluationError } from '../errors.js';
import type { ArgumentsSource } from '../gen/generator.js';
import {
  PropertyCheckResult,
  exhaustedResult,
  failureResult,
  successResult,
  toPropertyArguments,
} from '../result.js';

/**
 * The classification half of an asserting strategy.
 */
export interface Classification<T> {
  /** Whether a returned result asks for the evaluation to be discarded. */
  discard(result: T): boolean;
  /** Whether a returned result is a success, and the cause if it is not. */
  succeed(result: T): [boolean, unknown];
}

/**
 * Labels an evaluation; `null` means no label.
 */
export type Classifier<Args extends unknown[]> = (...args: Args) => string | null;

export interface LoopOptions<Args extends unknown[]> {
  /** Parameter names, in parameter order. */
  readonly names?: readonly string[];
  /** Random state to start from instead of the next per-check default. */
  readonly randomizer?: Randomizer;
  /** Classifiers whose labels are reported with a failure. */
  readonly classifiers?: ReadonlyArray<Classifier<Args>>;
}

/**
 * Everything a check carries from one evaluation to the next.
 */
export interface LoopState<Pools> {
  readonly succeeded: number;
  readonly discarded: number;
  readonly pools: Pools;
  readonly randomizer: Randomizer;
  /** Planned sizes not yet used. */
  readonly sizes: readonly number[];
}

/**
 * How the predicate completed.
 */
export type Evaluation<T> =
  | { readonly type: 'returned'; readonly value: T }
  | { readonly type: 'threw'; readonly error: unknown };

export type Outcome =
  | { readonly type: 'discard' }
  | { readonly type: 'success' }
  | { readonly type: 'failure'; readonly cause: unknown };

export type Step<Pools> =
  | { readonly type: 'continue'; readonly state: LoopState<Pools> }
  | { readonly type: 'done'; readonly result: PropertyCheckResult };

/**
 * Plan sizes, then let each generator seed its edge pool.
 */
export function initialState<Args extends unknown[], Pools>(
  config: Config,
  source: ArgumentsSource<Args, Pools>,
  randomizer: Randomizer = Randomizer.forNextCheck()
): LoopState<Pools> {
  const [sizes, afterSizes] = planSizes(
    config.minSize,
    config.maxSize,
    randomizer
  );
  const [pools, afterEdges] = source.initEdges(config.maxEdges, afterSizes);
  return { succeeded: 0, discarded: 0, pools, randomizer: afterEdges, sizes };
}

/**
 * Produce the arguments of the next evaluation and the state after it.
 */
export function generate<Args extends unknown[], Pools>(
  config: Config,
  source: ArgumentsSource<Args, Pools>,
  state: LoopState<Pools>
): { readonly args: Args; readonly state: LoopState<Pools> } {
  const [size, sizes, afterSize] = nextSize(
    state.sizes,
    config.minSize,
    config.maxSize,
    state.randomizer
  );
  const [args, pools, afterArgs] = source.next(
    new SizeParam(0, config.maxSize, size),
    state.pools,
    afterSize
  );
  return {
    args,
    state: { ...state, pools, randomizer: afterArgs, sizes },
  };
}

/**
 * Classify a completed evaluation.
 *
 * Only {@link DiscardedEvaluationError} counts as a discard request among
 * thrown values; anything else thrown is a failure.
 */
export function classify<T>(
  evaluation: Evaluation<T | Discarded>,
  classification: Classification<T>
): Outcome {
  if (evaluation.type === 'threw') {
    return evaluation.error instanceof DiscardedEvaluationError
      ? { type: 'discard' }
      : { type: 'failure', cause: evaluation.error };
  }

  const result = evaluation.value;
  if (result === Discarded || classification.discard(result)) {
    return { type: 'discard' };
  }
  const [success, cause] = classification.succeed(result);
  return success ? { type: 'success' } : { type: 'failure', cause };
}

/**
 * Count the outcome and decide whether the check goes on.
 *
 * `state` is the state after generating `args`.
 */
export function advance<Args extends unknown[], Pools>(
  config: Config,
  state: LoopState<Pools>,
  outcome: Outcome,
  args: Args,
  options: LoopOptions<Args>
): Step<Pools> {
  const names = options.names ?? [];
  const argsPassed = toPropertyArguments(names, args);

  switch (outcome.type) {
    case 'discard': {
      const discarded = state.discarded + 1;
      return discarded < config.maxDiscarded
        ? { type: 'continue', state: { ...state, discarded } }
        : {
            type: 'done',
            result: exhaustedResult(state.succeeded, discarded, names, argsPassed),
          };
    }
    case 'success': {
      const succeeded = state.succeeded + 1;
      return succeeded < config.minSuccessful
        ? { type: 'continue', state: { ...state, succeeded } }
        : { type: 'done', result: successResult(argsPassed) };
    }
    case 'failure':
      return {
        type: 'done',
        result: failureResult(
          state.succeeded,
          outcome.cause,
          names,
          argsPassed,
          labelsOf(args, options.classifiers ?? [])
        ),
      };
  }
}

function labelsOf<Args extends unknown[]>(
  args: Args,
  classifiers: ReadonlyArray<Classifier<Args>>
): string[] {
  const labels: string[] = [];
  for (const classifier of classifiers) {
    const label = labelOf(classifier, args);
    if (label !== null && !labels.includes(label)) {
      labels.push(label);
    }
  }
  return labels;
}

// A throwing classifier becomes a label; the failure keeps the predicate's cause.
function labelOf<Args extends unknown[]>(
  classifier: Classifier<Args>,
  args: Args
): string | null {
  try {
    return classifier(...args);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return `classifier threw: ${reason}`;
  }
}

export function logCheckStart<Pools>(
  config: Config,
  state: LoopState<Pools>
): void {
  if (config.enableLogging) {
    console.log(
      `Starting property check: minSuccessful=${config.minSuccessful}, maxDiscarded=${config.maxDiscarded}, sizes=[${state.sizes.join(', ')}]`
    );
  }
}

export function logCheckResult(
  config: Config,
  result: PropertyCheckResult
): void {
  if (!config.enableLogging) {
    return;
  }
  switch (result.type) {
    case 'success':
      console.log(
        `Property check succeeded after ${config.minSuccessful} evaluations`
      );
      break;
    case 'failure':
      console.log(
        `Property check failed after ${result.succeeded} successful evaluations`
      );
      break;
    case 'exhausted':
      console.log(
        `Property check exhausted after ${result.succeeded} successful and ${result.discarded} discarded evaluations`
      );
      break;
  }
}
