/**
 * The generator capability consumed by the check loop.
 *
 * How values are produced is up to each generator; the loop only threads the
 * size, the edge-case pool and the randomizer through it.
 */

import type { Randomizer } from '../data/randomizer.js';
import type { SizeParam } from '../data/size.js';

/**
 * Produces values of type `T`.
 */
export interface Generator<T> {
  /**
   * Pick up to `maxLength` edge cases, tried before random values.
   */
  initEdges(maxLength: number, randomizer: Randomizer): [T[], Randomizer];

  /**
   * Produce the next value.
   *
   * Generators consume their edge pool front to back and return what is left
   * of it alongside the value.
   */
  next(
    size: SizeParam,
    edges: readonly T[],
    randomizer: Randomizer
  ): [T, T[], Randomizer];
}

/**
 * Edge pools of a tuple of generators, one pool per parameter.
 */
export interface EdgePools<H, Rest> {
  readonly edges: readonly H[];
  readonly rest: Rest;
}

/**
 * Produces whole argument tuples from one generator per parameter.
 */
export interface ArgumentsSource<Args extends unknown[], Pools> {
  /** Number of parameters produced. */
  readonly arity: number;

  initEdges(maxLength: number, randomizer: Randomizer): [Pools, Randomizer];

  next(
    size: SizeParam,
    pools: Pools,
    randomizer: Randomizer
  ): [Args, Pools, Randomizer];
}

/**
 * Source of the empty argument list.
 */
export const noArguments: ArgumentsSource<[], null> = {
  arity: 0,
  initEdges: (_maxLength, randomizer) => [null, randomizer],
  next: (_size, pools, randomizer) => [[], pools, randomizer],
};

/**
 * Prepend a parameter to an argument source.
 *
 * Edge pools are initialised and values produced in parameter order, each
 * step handing its randomizer to the next.
 */
export function argumentsOf<H, T extends unknown[], P>(
  generator: Generator<H>,
  rest: ArgumentsSource<T, P>
): ArgumentsSource<[H, ...T], EdgePools<H, P>> {
  return {
    arity: rest.arity + 1,

    initEdges(maxLength, randomizer) {
      const [edges, afterHead] = generator.initEdges(maxLength, randomizer);
      const [restPools, afterRest] = rest.initEdges(maxLength, afterHead);
      return [{ edges, rest: restPools }, afterRest];
    },

    next(size, pools, randomizer) {
      const [head, edges, afterHead] = generator.next(
        size,
        pools.edges,
        randomizer
      );
      const [tail, restPools, afterRest] = rest.next(size, pools.rest, afterHead);
      return [[head, ...tail], { edges, rest: restPools }, afterRest];
    },
  };
}
