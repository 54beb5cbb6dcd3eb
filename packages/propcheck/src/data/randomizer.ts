/**
 * Deterministic pseudo-random state for property checks.
 *
 * SplitMix64 over BigInt. A randomizer is immutable: every operation returns
 * the value it produced together with the next randomizer, so a check can
 * thread its random state explicitly and two checks never share one.
 */
export class Randomizer {
  private static defaultSeed: number = Randomizer.freshSeed();
  private static checkStream: Randomizer = Randomizer.fromNumber(
    Randomizer.defaultSeed
  );

  constructor(
    public readonly state: bigint,
    public readonly gamma: bigint
  ) {}

  /**
   * Create a randomizer from a single seed value.
   */
  static fromNumber(value: number): Randomizer {
    const bigValue = BigInt(Math.floor(value));
    const state = splitmix64Mix(bigValue);
    const gamma = mixGamma(state);
    return new Randomizer(state, gamma);
  }

  /**
   * Randomizer built from the process-wide default seed.
   *
   * The seed is picked once per process; reading it never changes it.
   */
  static default(): Randomizer {
    return Randomizer.fromNumber(Randomizer.defaultSeed);
  }

  /**
   * Randomizer for a check that was given none.
   *
   * Each call splits a fresh stream off one derived from the default seed, so
   * successive checks try different values while the whole sequence of checks
   * replays from the same seed.
   */
  static forNextCheck(): Randomizer {
    const [stream, forCheck] = Randomizer.checkStream.split();
    Randomizer.checkStream = stream;
    return forCheck;
  }

  /**
   * Replace the process-wide default seed, e.g. to replay a failing run.
   *
   * Also restarts the sequence handed out by {@link forNextCheck}.
   */
  static setDefaultSeed(seed: number): void {
    if (!Number.isFinite(seed)) {
      throw new Error(`Default seed must be a finite number, got ${seed}`);
    }
    Randomizer.defaultSeed = seed;
    Randomizer.checkStream = Randomizer.fromNumber(seed);
  }

  static getDefaultSeed(): number {
    return Randomizer.defaultSeed;
  }

  private static freshSeed(): number {
    const now =
      BigInt(Date.now()) * BigInt(Math.floor(Math.random() * 0x100000000));
    return Number(now & 0xffffffffn);
  }

  /**
   * Split into two independent randomizers.
   */
  split(): [Randomizer, Randomizer] {
    const newState = addU64(this.state, this.gamma);
    const output = splitmix64Mix(newState);
    const newGamma = mixGamma(output);

    return [
      new Randomizer(newState, this.gamma),
      new Randomizer(output, newGamma),
    ];
  }

  /**
   * Next unsigned 32-bit value.
   */
  nextUint32(): [number, Randomizer] {
    const newState = addU64(this.state, this.gamma);
    const output = splitmix64Mix(newState);
    // Upper 32 bits mix better than the lower ones
    const value = Number((output >> 32n) & 0xffffffffn);
    return [value, new Randomizer(newState, this.gamma)];
  }

  /**
   * Next value in [0, bound).
   */
  nextBounded(bound: number): [number, Randomizer] {
    if (!Number.isFinite(bound) || bound < 0) {
      throw new Error(
        `Invalid bound parameter: ${bound}. Bounds must be finite and non-negative`
      );
    }
    const [value, next] = this.nextUint32();
    return [Math.floor((value / 0x100000000) * bound), next];
  }

  /**
   * Next integer in [from, to], both inclusive, in either order.
   *
   * A single-valued range yields that value without advancing.
   */
  chooseInt(from: number, to: number): [number, Randomizer] {
    if (!Number.isInteger(from) || !Number.isInteger(to)) {
      throw new Error(`Range bounds must be integers, got [${from}, ${to}]`);
    }
    if (from === to) {
      return [from, this];
    }
    const min = Math.min(from, to);
    const max = Math.max(from, to);
    const [offset, next] = this.nextBounded(max - min + 1);
    return [min + offset, next];
  }

  toString(): string {
    return `Randomizer(${this.state}, ${this.gamma})`;
  }
}

const MAX_U64 = 1n << 64n;

export function wrapU64(n: bigint): bigint {
  return ((n % MAX_U64) + MAX_U64) % MAX_U64;
}

function addU64(a: bigint, b: bigint): bigint {
  return wrapU64(a + b);
}

function mulU64(a: bigint, b: bigint): bigint {
  return wrapU64(a * b);
}

function splitmix64Mix(z: bigint): bigint {
  z = addU64(z, 0x9e3779b97f4a7c15n);
  z = mulU64(z ^ (z >> 30n), 0xbf58476d1ce4e5b9n);
  z = mulU64(z ^ (z >> 27n), 0x94d049bb133111ebn);
  return z ^ (z >> 31n);
}

// Gamma must be odd for a full period.
function mixGamma(z: bigint): bigint {
  z = splitmix64Mix(z);
  return mulU64(z | 1n, 0x9e3779b97f4a7c15n);
}
