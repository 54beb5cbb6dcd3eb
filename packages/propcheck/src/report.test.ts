import { describe, test, expect } from 'vitest';
import { SourcePosition } from './data/position.js';
import { PropertyCheckFailedError } from './errors.js';
import { defaultPrettifier } from './prettifier.js';
import {
  PROPERTY_CHECK_SUCCEEDED,
  describeResult,
  exhaustedMessage,
  prettyArgs,
  succeededMessage,
  withArgNames,
} from './report.js';
import {
  PropertyArgument,
  exhaustedResult,
  failureResult,
  successResult,
} from './result.js';

const xy = [new PropertyArgument('x', 4), new PropertyArgument('y', 5)];

describe('describeResult', () => {
  test('success', () => {
    expect(describeResult(successResult(xy))).toEqual({
      type: 'success',
      message: PROPERTY_CHECK_SUCCEEDED,
    });
  });

  test('failure lists the arguments that failed', () => {
    const verdict = describeResult(failureResult(0, undefined, ['x', 'y'], xy));

    expect(verdict).toEqual({
      type: 'failure',
      message: [
        'PropertyCheckFailedError was thrown during property evaluation.',
        '  Property succeeded 0 times before failure.',
        '  Occurred when passed generated values (',
        '    x = 4,',
        '    y = 5',
        '  )',
      ].join('\n'),
      undecoratedMessage: 'Property succeeded 0 times before failure.',
      cause: undefined,
      args: xy,
      labels: [],
      position: undefined,
    });
  });

  test('failure names the thrown error and shows position and labels', () => {
    const verdict = describeResult(
      failureResult(1, new TypeError('bad'), [], [new PropertyArgument(undefined, 'a')], [
        'small',
      ]),
      { position: SourcePosition.of('/src/math.test.ts', 12) }
    );

    expect(verdict.message).toBe(
      [
        'TypeError was thrown during property evaluation.',
        ' (math.test.ts:12)',
        '  Property succeeded 1 time before failure.',
        '  Occurred when passed generated values (',
        '    arg0 = "a"',
        '  )',
        '  Label of failing property:',
        '    small',
      ].join('\n')
    );
  });

  test('several labels get a plural heading', () => {
    const verdict = describeResult(
      failureResult(0, undefined, [], [new PropertyArgument(undefined, 1)], ['a', 'b'])
    );
    expect(verdict.message.split('\n').slice(-3)).toEqual([
      '  Labels of failing property:',
      '    a',
      '    b',
    ]);
  });

  test('shows where a positioned cause was thrown', () => {
    const cause = new PropertyCheckFailedError({
      message: 'inner',
      undecoratedMessage: 'inner',
      args: [],
      labels: [],
      position: SourcePosition.of('/t/inner.test.ts', 3),
    });
    const verdict = describeResult(
      failureResult(2, cause, [], [new PropertyArgument(undefined, 1)])
    );

    expect(verdict.message.split('\n').slice(0, 3)).toEqual([
      'PropertyCheckFailedError was thrown during property evaluation.',
      '  Property succeeded 2 times before failure.',
      '  Location: (inner.test.ts:3)',
    ]);
  });

  test('argNames replace the labels in the text only', () => {
    const verdict = describeResult(failureResult(0, undefined, ['x', 'y'], xy), {
      argNames: ['first', 'second'],
    });

    expect(verdict.message).toContain('    first = 4,\n    second = 5\n');
    expect(verdict.type === 'failure' ? verdict.args : []).toBe(xy);
  });

  test('a custom prettifier renders the values', () => {
    const verdict = describeResult(failureResult(0, undefined, [], [new PropertyArgument(undefined, 4)]), {
      prettifier: (value) => `<${String(value)}>`,
    });
    expect(verdict.message).toContain('    arg0 = <4>\n');
  });

  test('values a custom prettifier cannot render use the default rendering', () => {
    const verdict = describeResult(
      failureResult(0, undefined, [], [new PropertyArgument(undefined, 'a')]),
      {
        prettifier: () => {
          throw new Error('pretty boom');
        },
      }
    );
    expect(verdict.message).toContain('    arg0 = "a"\n');
  });

  test('exhausted', () => {
    const position = SourcePosition.of('/src/a.test.ts', 1);
    expect(describeResult(exhaustedResult(1, 4, [], []), { position })).toEqual({
      type: 'failure',
      message: 'Property check exhausted after 1 successful evaluation and 4 discarded.',
      undecoratedMessage:
        'Property check exhausted after 1 successful evaluation and 4 discarded.',
      args: [],
      labels: [],
      position,
    });
  });

  test('is deterministic', () => {
    const result = failureResult(3, new Error('boom'), ['x', 'y'], xy, ['big']);
    expect(describeResult(result)).toEqual(describeResult(result));
  });
});

describe('messages', () => {
  test('pluralise counts', () => {
    expect(exhaustedMessage(0, 3)).toBe(
      'Property check exhausted after 0 successful evaluations and 3 discarded.'
    );
    expect(succeededMessage(1)).toBe('Property succeeded 1 time before failure.');
    expect(succeededMessage(5)).toBe('Property succeeded 5 times before failure.');
  });
});

describe('withArgNames', () => {
  test('relabels when there is one name per argument', () => {
    expect(withArgNames(['a', 'b'], xy).map((arg) => arg.label)).toEqual(['a', 'b']);
  });

  test('keeps the labels otherwise', () => {
    expect(withArgNames(['a'], xy)).toBe(xy);
    expect(withArgNames(undefined, xy)).toBe(xy);
  });
});

describe('prettyArgs', () => {
  test('one line per argument, comma-separated', () => {
    expect(prettyArgs(xy, defaultPrettifier)).toEqual(['    x = 4,', '    y = 5']);
    expect(prettyArgs([], defaultPrettifier)).toEqual([]);
  });
});
