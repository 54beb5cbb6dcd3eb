/**
 * Result types for property checks.
 */

/**
 * A value fed to the predicate, with the name of its parameter when known.
 */
export class PropertyArgument<T = unknown> {
  constructor(
    public readonly label: string | undefined,
    public readonly value: T
  ) {}

  withLabel(label: string): PropertyArgument<T> {
    return new PropertyArgument(label, this.value);
  }

  /**
   * Name used in reports: the label, or `arg<index>` when unlabeled.
   */
  displayName(index: number): string {
    return this.label === undefined || this.label === ''
      ? `arg${index}`
      : this.label;
  }
}

/**
 * Terminal classification of one property check.
 */
export type PropertyCheckResult = CheckSuccess | CheckFailure | CheckExhausted;

/**
 * The predicate held for the required number of evaluations.
 */
export interface CheckSuccess {
  readonly type: 'success';
  /** Arguments of the last evaluation. */
  readonly args: readonly PropertyArgument[];
}

/**
 * The predicate failed or threw.
 */
export interface CheckFailure {
  readonly type: 'failure';
  /** Successful evaluations before the failing one. */
  readonly succeeded: number;
  readonly cause?: unknown;
  readonly names: readonly string[];
  /** Arguments of the failing evaluation. */
  readonly args: readonly PropertyArgument[];
  readonly labels: readonly string[];
}

/**
 * Too many evaluations were discarded.
 */
export interface CheckExhausted {
  readonly type: 'exhausted';
  readonly succeeded: number;
  readonly discarded: number;
  readonly names: readonly string[];
  /** Arguments of the last discarded evaluation. */
  readonly args: readonly PropertyArgument[];
}

export function successResult(args: readonly PropertyArgument[]): CheckSuccess {
  return { type: 'success', args };
}

export function failureResult(
  succeeded: number,
  cause: unknown,
  names: readonly string[],
  args: readonly PropertyArgument[],
  labels: readonly string[] = []
): CheckFailure {
  return { type: 'failure', succeeded, cause, names, args, labels };
}

export function exhaustedResult(
  succeeded: number,
  discarded: number,
  names: readonly string[],
  args: readonly PropertyArgument[]
): CheckExhausted {
  return { type: 'exhausted', succeeded, discarded, names, args };
}

/**
 * Label each value with the parameter name at the same position, if any.
 */
export function toPropertyArguments(
  names: readonly string[],
  values: readonly unknown[]
): PropertyArgument[] {
  return values.map((value, index) => new PropertyArgument(names[index], value));
}
