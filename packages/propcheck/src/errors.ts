/**
 * Errors raised by and during property checks, and the discard signals.
 */

import type { HasPosition, SourcePosition } from './data/position.js';

/**
 * Raised by a predicate to request that the current evaluation be discarded.
 *
 * Discarded evaluations count towards the discard budget and never towards
 * success or failure.
 */
export class DiscardedEvaluationError extends Error {
  constructor(message: string = 'Evaluation discarded') {
    super(message);
    this.name = 'DiscardedEvaluationError';
  }
}

/**
 * Returned by a predicate to discard the current evaluation without throwing.
 */
export const Discarded: unique symbol = Symbol('Discarded');
export type Discarded = typeof Discarded;

/**
 * Discard the current evaluation.
 */
export function discard(): never {
  throw new DiscardedEvaluationError();
}

/**
 * Discard the current evaluation unless the precondition holds.
 *
 * @example
 * ```typescript
 * assertions.check1((n: number) => {
 *   whenever(n !== 0);
 *   expect(n / n).toBe(1);
 * }, Gen.int(-10, 10));
 * ```
 */
export function whenever(precondition: boolean): void {
  if (!precondition) {
    throw new DiscardedEvaluationError('Precondition not met');
  }
}

/**
 * Details attached to a failed property check.
 */
export interface PropertyCheckFailure {
  /** Full multi-line report. */
  readonly message: string;
  /** One-line summary without argument values. */
  readonly undecoratedMessage: string;
  /** What the predicate threw, or the cause its result carried. */
  readonly cause?: unknown;
  /** Argument values of the failing evaluation, in parameter order. */
  readonly args: readonly unknown[];
  /** Labels of the failing evaluation. */
  readonly labels: readonly string[];
  /** Where the check was invoked. */
  readonly position?: SourcePosition;
}

/**
 * Thrown when a property check fails or gives up.
 */
export class PropertyCheckFailedError extends Error implements HasPosition {
  readonly undecoratedMessage: string;
  readonly args: readonly unknown[];
  readonly labels: readonly string[];
  readonly position?: SourcePosition;

  constructor(failure: PropertyCheckFailure) {
    super(
      failure.message,
      failure.cause === undefined ? undefined : { cause: failure.cause }
    );
    this.name = 'PropertyCheckFailedError';
    this.undecoratedMessage = failure.undecoratedMessage;
    this.args = failure.args;
    this.labels = failure.labels;
    this.position = failure.position;
  }

  /**
   * `file:line` of the check that failed, when known.
   */
  get failedCodeFileNameAndLineNumber(): string | undefined {
    return this.position?.toString();
  }
}

/**
 * Thrown when check configuration is rejected.
 */
export class ConfigurationError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid property check configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigurationError';
  }
}
