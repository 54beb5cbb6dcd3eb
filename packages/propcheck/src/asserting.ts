/**
 * Asserting strategies: what a predicate's result means, and how a check
 * reports its verdict.
 *
 * The check loop only ever talks to a strategy through its four operations,
 * so supporting a new predicate-result type takes a new strategy and no loop
 * changes.
 */

import { PropertyCheckFailedError } from './errors.js';
import { Assertion, Expectation, Fact, Succeeded } from './fact.js';
import type { Classification } from './check/state.js';
import type { FailureVerdict } from './report.js';

/**
 * Strategy for predicates returning `T`, signalling with `R`.
 */
export interface PropCheckerAsserting<T, R> extends Classification<T> {
  indicateSuccess(message: string): R;
  indicateFailure(verdict: FailureVerdict): R;
}

/**
 * Build the error reported for a failed verdict.
 */
export function toFailedError(verdict: FailureVerdict): PropertyCheckFailedError {
  return new PropertyCheckFailedError({
    message: verdict.message,
    undecoratedMessage: verdict.undecoratedMessage,
    cause: verdict.cause,
    args: verdict.args.map((arg) => arg.value),
    labels: verdict.labels,
    position: verdict.position,
  });
}

/**
 * Plain predicates: whatever they return is a success, only throwing fails.
 * Failure is signalled by throwing {@link PropertyCheckFailedError}.
 */
export class AssertionAsserting implements PropCheckerAsserting<unknown, Assertion> {
  discard(_result: unknown): boolean {
    return false;
  }

  succeed(_result: unknown): [boolean, unknown] {
    return [true, undefined];
  }

  indicateSuccess(_message: string): Assertion {
    return Succeeded;
  }

  indicateFailure(verdict: FailureVerdict): Assertion {
    throw toFailedError(verdict);
  }
}

/**
 * Predicates returning a {@link Fact}: vacuous yes discards, no fails with
 * the fact's cause. The verdict is itself a fact, never thrown.
 */
export class ExpectationAsserting implements PropCheckerAsserting<Expectation, Expectation> {
  discard(result: Expectation): boolean {
    return result.isVacuousYes;
  }

  succeed(result: Expectation): [boolean, unknown] {
    return [result.isYes, result.cause];
  }

  indicateSuccess(message: string): Expectation {
    return Fact.yes(message);
  }

  indicateFailure(verdict: FailureVerdict): Expectation {
    const error = toFailedError(verdict);
    return Fact.no(error.message, error);
  }
}

/**
 * Predicates returning a boolean: `false` fails, anything else succeeds.
 * Failure is signalled by throwing, like {@link AssertionAsserting}.
 */
export class BooleanAsserting implements PropCheckerAsserting<boolean | void, Assertion> {
  discard(_result: boolean | void): boolean {
    return false;
  }

  succeed(result: boolean | void): [boolean, unknown] {
    return [result !== false, undefined];
  }

  indicateSuccess(_message: string): Assertion {
    return Succeeded;
  }

  indicateFailure(verdict: FailureVerdict): Assertion {
    throw toFailedError(verdict);
  }
}
