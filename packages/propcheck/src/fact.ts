/**
 * Facts: assertion results returned instead of thrown.
 */

/**
 * Token returned by assertions that passed.
 */
export const Succeeded = Object.freeze({ type: 'succeeded' } as const);
export type Assertion = typeof Succeeded;

export type FactKind = 'yes' | 'no' | 'vacuous-yes';

/**
 * A ternary truth value with an explanation.
 *
 * A vacuous yes is a yes whose precondition did not hold; property checks
 * discard evaluations that produce one.
 */
export class Fact {
  private constructor(
    public readonly kind: FactKind,
    public readonly message: string,
    public readonly cause?: unknown
  ) {}

  static yes(message: string): Fact {
    return new Fact('yes', message);
  }

  static no(message: string, cause?: unknown): Fact {
    return new Fact('no', message, cause);
  }

  static vacuousYes(message: string): Fact {
    return new Fact('vacuous-yes', message);
  }

  /**
   * Yes when the condition holds, otherwise no, with the same message.
   */
  static of(condition: boolean, message: string): Fact {
    return condition ? Fact.yes(message) : Fact.no(message);
  }

  /**
   * The consequent when the precondition holds, otherwise a vacuous yes.
   */
  static implies(precondition: boolean, consequent: () => Fact): Fact {
    return precondition
      ? consequent()
      : Fact.vacuousYes('Precondition not met');
  }

  /** True for yes and vacuous yes. */
  get isYes(): boolean {
    return this.kind !== 'no';
  }

  get isNo(): boolean {
    return this.kind === 'no';
  }

  get isVacuousYes(): boolean {
    return this.kind === 'vacuous-yes';
  }

  /**
   * Turn this fact into an assertion, throwing when it is a no.
   */
  toAssertion(): Assertion {
    if (this.isNo) {
      throw new Error(
        this.message,
        this.cause === undefined ? undefined : { cause: this.cause }
      );
    }
    return Succeeded;
  }

  toString(): string {
    switch (this.kind) {
      case 'yes':
        return `Yes(${this.message})`;
      case 'no':
        return `No(${this.message})`;
      case 'vacuous-yes':
        return `VacuousYes(${this.message})`;
    }
  }
}

/**
 * The result type of predicates checked for facts.
 */
export type Expectation = Fact;
