export { Config } from './config.js';
export type { ConfigOptions } from './config.js';
export { Randomizer } from './data/randomizer.js';
export { SizeParam, PLANNED_SIZE_COUNT, planSizes, nextSize } from './data/size.js';
export { SourcePosition, positionOf } from './data/position.js';
export type { HasPosition } from './data/position.js';
export { argumentsOf, noArguments } from './gen/generator.js';
export type { Generator, ArgumentsSource, EdgePools } from './gen/generator.js';
export { Gen, fromFunction } from './gen/generators.js';
export {
  PropertyArgument,
  successResult,
  failureResult,
  exhaustedResult,
  toPropertyArguments,
} from './result.js';
export type {
  PropertyCheckResult,
  CheckSuccess,
  CheckFailure,
  CheckExhausted,
} from './result.js';
export { Fact, Succeeded } from './fact.js';
export type { Assertion, Expectation, FactKind } from './fact.js';
export {
  Discarded,
  DiscardedEvaluationError,
  PropertyCheckFailedError,
  ConfigurationError,
  discard,
  whenever,
} from './errors.js';
export type { PropertyCheckFailure } from './errors.js';
export { defaultPrettifier } from './prettifier.js';
export type { Prettifier } from './prettifier.js';
export {
  describeResult,
  exhaustedMessage,
  succeededMessage,
  withArgNames,
  prettyArgs,
  PROPERTY_CHECK_SUCCEEDED,
} from './report.js';
export type { Verdict, SuccessVerdict, FailureVerdict, ReportOptions } from './report.js';
export { checkForAll } from './check/loop.js';
export type { Predicate } from './check/loop.js';
export { checkForAllAsync } from './check/async-loop.js';
export type { AsyncPredicate } from './check/async-loop.js';
export type {
  Classification,
  Classifier,
  LoopOptions,
} from './check/state.js';
export {
  AssertionAsserting,
  BooleanAsserting,
  ExpectationAsserting,
  toFailedError,
} from './asserting.js';
export type { PropCheckerAsserting } from './asserting.js';
export {
  PropChecker,
  AsyncPropChecker,
  checkResult,
  assertions,
  booleans,
  expectations,
  asyncAssertions,
  asyncBooleans,
  asyncExpectations,
} from './checker.js';
export type { CheckOptions } from './checker.js';
