/**
 * Basic usage of propcheck.
 *
 * This file can be run directly, or used as a reference for writing
 * property checks inside vitest tests.
 */

import {
  Config,
  Fact,
  Gen,
  PropertyCheckFailedError,
  Randomizer,
  SourcePosition,
  assertions,
  booleans,
  expectations,
  whenever,
} from 'propcheck';

console.log('=== propcheck basic usage ===\n');

// Example 1: a boolean property
console.log('Example 1: adding zero');
booleans.check1((n) => n + 0 === n, Gen.int(-1000, 1000));
console.log('Adding zero: PASSED\n');

// Example 2: several parameters, with names for the report
console.log('Example 2: addition commutes');
booleans.check2(
  (a, b) => a + b === b + a,
  Gen.int(-100, 100),
  Gen.int(-100, 100),
  Config.default().withMinSuccessful(50),
  { names: ['a', 'b'] }
);
console.log('Addition commutes: PASSED\n');

// Example 3: preconditions discard evaluations instead of failing them
console.log('Example 3: division with a precondition');
assertions.check1((n) => {
  whenever(n !== 0);
  if (n / n !== 1) {
    throw new Error(`${n} / ${n} is not one`);
  }
}, Gen.int(-10, 10));
console.log('Division: PASSED\n');

// Example 4: a failing property, replayed from a fixed randomizer
console.log('Example 4: a failing property');
try {
  booleans.check1(
    (n) => n < 50,
    Gen.int(0, 100),
    Config.default().withMinSuccessful(100),
    {
      names: ['n'],
      randomizer: Randomizer.fromNumber(42),
      position: SourcePosition.of('examples/basic-usage.ts', 52),
      classifiers: [(n) => (n >= 90 ? 'large' : null)],
    }
  );
} catch (error) {
  if (!(error instanceof PropertyCheckFailedError)) {
    throw error;
  }
  console.log(error.message);
  console.log(`Failing arguments: ${JSON.stringify(error.args)}\n`);
}

// Example 5: facts are returned rather than thrown
console.log('Example 5: expectations');
const fact = expectations.check1(
  (s) => Fact.implies(s.length > 0, () => Fact.of(s.toUpperCase().length === s.length, 'length kept')),
  Gen.elements(['a', 'bc', '', 'def'])
);
console.log(`Expectation: ${fact.toString()}\n`);

// Example 6: progress logging
console.log('Example 6: logging');
booleans.check1(
  (size) => size >= 0,
  Gen.sized((size) => size),
  Config.default().withLogging()
);
