/**
 * Size parameters and the size schedule of a check.
 */

import { Randomizer } from './randomizer.js';

/**
 * How many sizes are planned up front before sizes are drawn at random.
 */
export const PLANNED_SIZE_COUNT = 10;

/**
 * Size parameter handed to generators.
 *
 * `size` controls how large or complex a generated value may be; the bounds
 * describe the size domain of the whole check.
 */
export class SizeParam {
  constructor(
    readonly minSize: number,
    readonly maxSize: number,
    readonly size: number
  ) {
    if (minSize < 0) {
      throw new Error('Size must be non-negative');
    }
    if (minSize > maxSize) {
      throw new Error(`minSize ${minSize} must be <= maxSize ${maxSize}`);
    }
    if (size < minSize || size > maxSize) {
      throw new Error(`Size ${size} must lie in [${minSize}, ${maxSize}]`);
    }
  }

  static of(size: number, maxSize: number = size): SizeParam {
    return new SizeParam(0, maxSize, size);
  }

  toString(): string {
    return `SizeParam(${this.size} in [${this.minSize}, ${this.maxSize}])`;
  }
}

/**
 * Plan the sizes tried first by a check.
 *
 * The plan always starts with `minSize` and holds {@link PLANNED_SIZE_COUNT}
 * sizes in ascending order, so early evaluations lean towards small inputs.
 */
export function planSizes(
  minSize: number,
  maxSize: number,
  randomizer: Randomizer
): [number[], Randomizer] {
  const sizes = [minSize];
  let rnd = randomizer;

  while (sizes.length < PLANNED_SIZE_COUNT) {
    const [size, next] = rnd.chooseInt(minSize, maxSize);
    sizes.push(size);
    rnd = next;
  }

  return [sizes.sort((a, b) => a - b), rnd];
}

/**
 * Take the next size: from the plan while it lasts, then at random.
 */
export function nextSize(
  plan: readonly number[],
  minSize: number,
  maxSize: number,
  randomizer: Randomizer
): [number, number[], Randomizer] {
  if (plan.length > 0) {
    const [head, ...tail] = plan;
    return [head, tail, randomizer];
  }
  const [size, next] = randomizer.chooseInt(minSize, maxSize);
  return [size, [], next];
}
