/**
 * A small set of ready-made generators.
 *
 * These cover constants, integer ranges, fixed choices and size-driven values;
 * richer generation is expected to come from callers implementing
 * {@link Generator} themselves.
 */

import type { Randomizer } from '../data/randomizer.js';
import type { SizeParam } from '../data/size.js';
import type { Generator } from './generator.js';

/**
 * Build a generator from a random step and a fixed list of edge cases.
 *
 * Edges are handed out front to back before `generate` is consulted.
 */
export function fromFunction<T>(
  generate: (size: SizeParam, randomizer: Randomizer) => [T, Randomizer],
  edgeCases: readonly T[] = []
): Generator<T> {
  return {
    initEdges(maxLength, randomizer) {
      return [edgeCases.slice(0, Math.max(0, maxLength)), randomizer];
    },
    next(size, edges, randomizer) {
      if (edges.length > 0) {
        const [head, ...tail] = edges;
        return [head, tail, randomizer];
      }
      const [value, next] = generate(size, randomizer);
      return [value, [], next];
    },
  };
}

export const Gen = {
  /**
   * Always the same value.
   */
  constant<T>(value: T): Generator<T> {
    return fromFunction((_size, randomizer) => [value, randomizer]);
  },

  /**
   * Integers in [min, max]; edges are the bounds and zero when in range.
   */
  int(min: number, max: number): Generator<number> {
    if (!Number.isInteger(min) || !Number.isInteger(max)) {
      throw new Error(`Gen.int bounds must be integers, got [${min}, ${max}]`);
    }
    if (min > max) {
      throw new Error(`Gen.int requires min <= max, got [${min}, ${max}]`);
    }
    const edges = [...new Set([min, max, ...(min <= 0 && max >= 0 ? [0] : [])])];
    return fromFunction(
      (_size, randomizer) => randomizer.chooseInt(min, max),
      edges
    );
  },

  /**
   * One of the given values; every value is also an edge case.
   */
  elements<T>(values: readonly T[]): Generator<T> {
    if (values.length === 0) {
      throw new Error('Gen.elements requires at least one value');
    }
    return fromFunction((_size, randomizer) => {
      const [index, next] = randomizer.nextBounded(values.length);
      return [values[index], next];
    }, values);
  },

  /**
   * A value derived from the size of the current evaluation.
   */
  sized<T>(f: (size: number) => T): Generator<T> {
    return fromFunction((size, randomizer) => [f(size.size), randomizer]);
  },
} as const;
