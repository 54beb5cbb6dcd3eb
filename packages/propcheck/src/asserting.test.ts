import { describe, test, expect } from 'vitest';
import {
  AssertionAsserting,
  BooleanAsserting,
  ExpectationAsserting,
  toFailedError,
} from './asserting.js';
import { PropertyCheckFailedError } from './errors.js';
import { Fact, Succeeded } from './fact.js';
import type { FailureVerdict } from './report.js';
import { PropertyArgument } from './result.js';

const verdict: FailureVerdict = {
  type: 'failure',
  message: 'full report',
  undecoratedMessage: 'summary',
  cause: 'inner',
  args: [new PropertyArgument('x', 1), new PropertyArgument('y', 'a')],
  labels: ['small'],
};

describe('toFailedError', () => {
  test('carries the verdict with plain argument values', () => {
    const error = toFailedError(verdict);
    expect(error.message).toBe('full report');
    expect(error.undecoratedMessage).toBe('summary');
    expect(error.cause).toBe('inner');
    expect(error.args).toEqual([1, 'a']);
    expect(error.labels).toEqual(['small']);
  });
});

describe('AssertionAsserting', () => {
  const asserting = new AssertionAsserting();

  test('any returned value is a success', () => {
    expect(asserting.discard(false)).toBe(false);
    expect(asserting.succeed(false)).toEqual([true, undefined]);
    expect(asserting.indicateSuccess('ok')).toBe(Succeeded);
  });

  test('failure throws', () => {
    expect(() => asserting.indicateFailure(verdict)).toThrow(PropertyCheckFailedError);
  });
});

describe('BooleanAsserting', () => {
  const asserting = new BooleanAsserting();

  test('only false fails', () => {
    expect(asserting.succeed(true)).toEqual([true, undefined]);
    expect(asserting.succeed(undefined)).toEqual([true, undefined]);
    expect(asserting.succeed(false)).toEqual([false, undefined]);
    expect(asserting.discard(false)).toBe(false);
  });

  test('failure throws', () => {
    expect(() => asserting.indicateFailure(verdict)).toThrow('full report');
  });
});

describe('ExpectationAsserting', () => {
  const asserting = new ExpectationAsserting();

  test('vacuous yes discards', () => {
    expect(asserting.discard(Fact.vacuousYes('skip'))).toBe(true);
    expect(asserting.discard(Fact.yes('ok'))).toBe(false);
    expect(asserting.discard(Fact.no('bad'))).toBe(false);
  });

  test('no fails with the fact cause', () => {
    const cause = new Error('inner');
    expect(asserting.succeed(Fact.no('bad', cause))).toEqual([false, cause]);
    expect(asserting.succeed(Fact.yes('ok'))).toEqual([true, undefined]);
  });

  test('verdicts are facts', () => {
    expect(asserting.indicateSuccess('done').toString()).toBe('Yes(done)');

    const failed = asserting.indicateFailure(verdict);
    expect(failed.isNo).toBe(true);
    expect(failed.message).toBe('full report');
    expect(failed.cause).toBeInstanceOf(PropertyCheckFailedError);
  });
});
