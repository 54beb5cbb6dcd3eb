/**
 * Property checkers for predicates of one to six arguments.
 */

import { Config } from './config.js';
import type { PropCheckerAsserting } from './asserting.js';
import {
  AssertionAsserting,
  BooleanAsserting,
  ExpectationAsserting,
} from './asserting.js';
import { checkForAllAsync, AsyncPredicate } from './check/async-loop.js';
import { checkForAll, Predicate } from './check/loop.js';
import type { LoopOptions } from './check/state.js';
import {
  ArgumentsSource,
  Generator,
  argumentsOf,
  noArguments,
} from './gen/generator.js';
import { describeResult, ReportOptions } from './report.js';
import type { PropertyCheckResult } from './result.js';

/**
 * Options of a single check.
 */
export interface CheckOptions<Args extends unknown[]>
  extends LoopOptions<Args>,
    ReportOptions {}

/**
 * Render a terminal result through a strategy.
 */
export function checkResult<T, R>(
  asserting: PropCheckerAsserting<T, R>,
  result: PropertyCheckResult,
  options: ReportOptions = {}
): R {
  const verdict = describeResult(result, options);
  return verdict.type === 'success'
    ? asserting.indicateSuccess(verdict.message)
    : asserting.indicateFailure(verdict);
}

/**
 * Runs checks synchronously, one evaluation after another.
 */
export class PropChecker<T, R> {
  constructor(readonly asserting: PropCheckerAsserting<T, R>) {}

  /**
   * Check a predicate over any argument source.
   */
  checkArguments<Args extends unknown[], Pools>(
    fun: Predicate<Args, T>,
    source: ArgumentsSource<Args, Pools>,
    config: Config = Config.default(),
    options: CheckOptions<Args> = {}
  ): R {
    const result = checkForAll(config, source, fun, this.asserting, options);
    return checkResult(this.asserting, result, options);
  }

  check1<A>(
    fun: Predicate<[A], T>,
    genA: Generator<A>,
    config?: Config,
    options?: CheckOptions<[A]>
  ): R {
    return this.checkArguments(fun, argumentsOf(genA, noArguments), config, options);
  }

  check2<A, B>(
    fun: Predicate<[A, B], T>,
    genA: Generator<A>,
    genB: Generator<B>,
    config?: Config,
    options?: CheckOptions<[A, B]>
  ): R {
    return this.checkArguments(
      fun,
      argumentsOf(genA, argumentsOf(genB, noArguments)),
      config,
      options
    );
  }

  check3<A, B, C>(
    fun: Predicate<[A, B, C], T>,
    genA: Generator<A>,
    genB: Generator<B>,
    genC: Generator<C>,
    config?: Config,
    options?: CheckOptions<[A, B, C]>
  ): R {
    return this.checkArguments(
      fun,
      argumentsOf(genA, argumentsOf(genB, argumentsOf(genC, noArguments))),
      config,
      options
    );
  }

  check4<A, B, C, D>(
    fun: Predicate<[A, B, C, D], T>,
    genA: Generator<A>,
    genB: Generator<B>,
    genC: Generator<C>,
    genD: Generator<D>,
    config?: Config,
    options?: CheckOptions<[A, B, C, D]>
  ): R {
    return this.checkArguments(
      fun,
      argumentsOf(
        genA,
        argumentsOf(genB, argumentsOf(genC, argumentsOf(genD, noArguments)))
      ),
      config,
      options
    );
  }

  check5<A, B, C, D, E>(
    fun: Predicate<[A, B, C, D, E], T>,
    genA: Generator<A>,
    genB: Generator<B>,
    genC: Generator<C>,
    genD: Generator<D>,
    genE: Generator<E>,
    config?: Config,
    options?: CheckOptions<[A, B, C, D, E]>
  ): R {
    return this.checkArguments(
      fun,
      argumentsOf(
        genA,
        argumentsOf(
          genB,
          argumentsOf(genC, argumentsOf(genD, argumentsOf(genE, noArguments)))
        )
      ),
      config,
      options
    );
  }

  check6<A, B, C, D, E, F>(
    fun: Predicate<[A, B, C, D, E, F], T>,
    genA: Generator<A>,
    genB: Generator<B>,
    genC: Generator<C>,
    genD: Generator<D>,
    genE: Generator<E>,
    genF: Generator<F>,
    config?: Config,
    options?: CheckOptions<[A, B, C, D, E, F]>
  ): R {
    return this.checkArguments(
      fun,
      argumentsOf(
        genA,
        argumentsOf(
          genB,
          argumentsOf(
            genC,
            argumentsOf(genD, argumentsOf(genE, argumentsOf(genF, noArguments)))
          )
        )
      ),
      config,
      options
    );
  }
}

/**
 * Runs checks whose predicates may return promises.
 *
 * The verdict is delivered through the returned promise; a strategy that
 * signals failure by throwing makes it reject.
 */
export class AsyncPropChecker<T, R> {
  constructor(readonly asserting: PropCheckerAsserting<T, R>) {}

  async checkArguments<Args extends unknown[], Pools>(
    fun: AsyncPredicate<Args, T>,
    source: ArgumentsSource<Args, Pools>,
    config: Config = Config.default(),
    options: CheckOptions<Args> = {}
  ): Promise<R> {
    const result = await checkForAllAsync(
      config,
      source,
      fun,
      this.asserting,
      options
    );
    return checkResult(this.asserting, result, options);
  }

  check1<A>(
    fun: AsyncPredicate<[A], T>,
    genA: Generator<A>,
    config?: Config,
    options?: CheckOptions<[A]>
  ): Promise<R> {
    return this.checkArguments(fun, argumentsOf(genA, noArguments), config, options);
  }

  check2<A, B>(
    fun: AsyncPredicate<[A, B], T>,
    genA: Generator<A>,
    genB: Generator<B>,
    config?: Config,
    options?: CheckOptions<[A, B]>
  ): Promise<R> {
    return this.checkArguments(
      fun,
      argumentsOf(genA, argumentsOf(genB, noArguments)),
      config,
      options
    );
  }

  check3<A, B, C>(
    fun: AsyncPredicate<[A, B, C], T>,
    genA: Generator<A>,
    genB: Generator<B>,
    genC: Generator<C>,
    config?: Config,
    options?: CheckOptions<[A, B, C]>
  ): Promise<R> {
    return this.checkArguments(
      fun,
      argumentsOf(genA, argumentsOf(genB, argumentsOf(genC, noArguments))),
      config,
      options
    );
  }

  check4<A, B, C, D>(
    fun: AsyncPredicate<[A, B, C, D], T>,
    genA: Generator<A>,
    genB: Generator<B>,
    genC: Generator<C>,
    genD: Generator<D>,
    config?: Config,
    options?: CheckOptions<[A, B, C, D]>
  ): Promise<R> {
    return this.checkArguments(
      fun,
      argumentsOf(
        genA,
        argumentsOf(genB, argumentsOf(genC, argumentsOf(genD, noArguments)))
      ),
      config,
      options
    );
  }

  check5<A, B, C, D, E>(
    fun: AsyncPredicate<[A, B, C, D, E], T>,
    genA: Generator<A>,
    genB: Generator<B>,
    genC: Generator<C>,
    genD: Generator<D>,
    genE: Generator<E>,
    config?: Config,
    options?: CheckOptions<[A, B, C, D, E]>
  ): Promise<R> {
    return this.checkArguments(
      fun,
      argumentsOf(
        genA,
        argumentsOf(
          genB,
          argumentsOf(genC, argumentsOf(genD, argumentsOf(genE, noArguments)))
        )
      ),
      config,
      options
    );
  }

  check6<A, B, C, D, E, F>(
    fun: AsyncPredicate<[A, B, C, D, E, F], T>,
    genA: Generator<A>,
    genB: Generator<B>,
    genC: Generator<C>,
    genD: Generator<D>,
    genE: Generator<E>,
    genF: Generator<F>,
    config?: Config,
    options?: CheckOptions<[A, B, C, D, E, F]>
  ): Promise<R> {
    return this.checkArguments(
      fun,
      argumentsOf(
        genA,
        argumentsOf(
          genB,
          argumentsOf(
            genC,
            argumentsOf(genD, argumentsOf(genE, argumentsOf(genF, noArguments)))
          )
        )
      ),
      config,
      options
    );
  }
}

/** Plain predicates; failures throw. */
export const assertions = new PropChecker(new AssertionAsserting());
/** Boolean predicates; `false` fails and failures throw. */
export const booleans = new PropChecker(new BooleanAsserting());
/** Fact predicates; the verdict is returned as a fact. */
export const expectations = new PropChecker(new ExpectationAsserting());

export const asyncAssertions = new AsyncPropChecker(new AssertionAsserting());
export const asyncBooleans = new AsyncPropChecker(new BooleanAsserting());
export const asyncExpectations = new AsyncPropChecker(new ExpectationAsserting());
