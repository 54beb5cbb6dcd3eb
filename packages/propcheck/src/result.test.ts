import { describe, test, expect } from 'vitest';
import {
  PropertyArgument,
  exhaustedResult,
  failureResult,
  successResult,
  toPropertyArguments,
} from './result.js';

describe('PropertyArgument', () => {
  test('displays its label', () => {
    expect(new PropertyArgument('x', 1).displayName(0)).toBe('x');
  });

  test('falls back to a positional name when unlabeled', () => {
    expect(new PropertyArgument(undefined, 1).displayName(2)).toBe('arg2');
    expect(new PropertyArgument('', 1).displayName(0)).toBe('arg0');
  });

  test('withLabel keeps the value', () => {
    const arg = new PropertyArgument(undefined, 42).withLabel('n');
    expect(arg.label).toBe('n');
    expect(arg.value).toBe(42);
  });
});

describe('toPropertyArguments', () => {
  test('labels values by position', () => {
    const args = toPropertyArguments(['x'], [1, 2]);
    expect(args.map((arg) => arg.label)).toEqual(['x', undefined]);
    expect(args.map((arg) => arg.value)).toEqual([1, 2]);
  });
});

describe('result constructors', () => {
  test('build tagged results', () => {
    const args = [new PropertyArgument('x', 1)];

    expect(successResult(args)).toEqual({ type: 'success', args });
    expect(failureResult(2, 'boom', ['x'], args)).toEqual({
      type: 'failure',
      succeeded: 2,
      cause: 'boom',
      names: ['x'],
      args,
      labels: [],
    });
    expect(exhaustedResult(1, 5, ['x'], args)).toEqual({
      type: 'exhausted',
      succeeded: 1,
      discarded: 5,
      names: ['x'],
      args,
    });
  });
});
