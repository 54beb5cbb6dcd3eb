/**
 * Turns the terminal result of a check into report text.
 */

import { SourcePosition, positionOf } from './data/position.js';
import { defaultPrettifier, Prettifier } from './prettifier.js';
import { PropertyArgument, PropertyCheckResult } from './result.js';

export const PROPERTY_CHECK_SUCCEEDED = 'Property check succeeded';

const FAILED_ERROR_NAME = 'PropertyCheckFailedError';

/**
 * What a strategy is asked to signal.
 */
export type Verdict = SuccessVerdict | FailureVerdict;

export interface SuccessVerdict {
  readonly type: 'success';
  readonly message: string;
}

export interface FailureVerdict {
  readonly type: 'failure';
  /** Full report, including argument values. */
  readonly message: string;
  /** One-line summary. */
  readonly undecoratedMessage: string;
  readonly cause?: unknown;
  readonly args: readonly PropertyArgument[];
  readonly labels: readonly string[];
  readonly position?: SourcePosition;
}

export interface ReportOptions {
  readonly prettifier?: Prettifier;
  /** Where the check was invoked. */
  readonly position?: SourcePosition;
  /** Names that replace the argument labels when there is one per argument. */
  readonly argNames?: readonly string[];
}

/**
 * Describe the terminal result of a check.
 *
 * Pure: the same result and options always give the same verdict.
 */
export function describeResult(
  result: PropertyCheckResult,
  options: ReportOptions = {}
): Verdict {
  const prettifier = options.prettifier ?? defaultPrettifier;

  switch (result.type) {
    case 'success':
      return { type: 'success', message: PROPERTY_CHECK_SUCCEEDED };

    case 'exhausted': {
      const message = exhaustedMessage(result.succeeded, result.discarded);
      return {
        type: 'failure',
        message,
        undecoratedMessage: message,
        args: [],
        labels: [],
        position: options.position,
      };
    }

    case 'failure': {
      const args = withArgNames(options.argNames, result.args);
      const lines = [
        `${errorName(result.cause)} was thrown during property evaluation.`,
      ];
      if (options.position !== undefined) {
        lines.push(` (${options.position.toString()})`);
      }
      lines.push(`  ${succeededMessage(result.succeeded)}`);
      const thrownAt = positionOf(result.cause);
      if (thrownAt !== undefined) {
        lines.push(`  Location: (${thrownAt.toString()})`);
      }
      lines.push('  Occurred when passed generated values (');
      lines.push(...prettyArgs(args, prettifier));
      lines.push('  )');
      lines.push(...labelLines(result.labels));

      return {
        type: 'failure',
        message: lines.join('\n'),
        undecoratedMessage: succeededMessage(result.succeeded),
        cause: result.cause,
        args: result.args,
        labels: result.labels,
        position: options.position,
      };
    }
  }
}

export function exhaustedMessage(succeeded: number, discarded: number): string {
  return succeeded === 1
    ? `Property check exhausted after 1 successful evaluation and ${discarded} discarded.`
    : `Property check exhausted after ${succeeded} successful evaluations and ${discarded} discarded.`;
}

export function succeededMessage(succeeded: number): string {
  return succeeded === 1
    ? 'Property succeeded 1 time before failure.'
    : `Property succeeded ${succeeded} times before failure.`;
}

/**
 * Relabel arguments positionally when there is exactly one name per argument.
 */
export function withArgNames(
  argNames: readonly string[] | undefined,
  args: readonly PropertyArgument[]
): readonly PropertyArgument[] {
  if (argNames === undefined || argNames.length !== args.length) {
    return args;
  }
  return args.map((arg, index) => arg.withLabel(argNames[index]));
}

/**
 * One `name = value` line per argument, comma-separated.
 */
export function prettyArgs(
  args: readonly PropertyArgument[],
  prettifier: Prettifier
): string[] {
  return args.map(
    (arg, index) =>
      `    ${arg.displayName(index)} = ${render(arg.value, prettifier)}${index < args.length - 1 ? ',' : ''}`
  );
}

/**
 * Render with the given prettifier, falling back to the default one when it
 * throws.
 */
function render(value: unknown, prettifier: Prettifier): string {
  try {
    return prettifier(value);
  } catch {
    try {
      return defaultPrettifier(value);
    } catch {
      return '<unprintable>';
    }
  }
}

function labelLines(labels: readonly string[]): string[] {
  if (labels.length === 0) {
    return [];
  }
  const heading =
    labels.length === 1 ? 'Label of failing property:' : 'Labels of failing property:';
  return [`  ${heading}`, ...labels.map((label) => `    ${label}`)];
}

function errorName(cause: unknown): string {
  return cause instanceof Error ? cause.name : FAILED_ERROR_NAME;
}
