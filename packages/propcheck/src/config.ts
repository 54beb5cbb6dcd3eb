/**
 * Configuration for property checks.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';

const configSchema = z
  .object({
    minSuccessful: z
      .number()
      .int('minSuccessful must be an integer')
      .positive('minSuccessful must be greater than zero'),
    maxDiscardedFactor: z
      .number()
      .finite('maxDiscardedFactor must be finite')
      .positive('maxDiscardedFactor must be greater than zero'),
    minSize: z
      .number()
      .int('minSize must be an integer')
      .nonnegative('minSize must not be negative'),
    sizeRange: z
      .number()
      .int('sizeRange must be an integer')
      .nonnegative('sizeRange must not be negative'),
    enableLogging: z.boolean(),
  })
  .refine((config) => Number.isSafeInteger(config.minSize + config.sizeRange), {
    message: 'minSize + sizeRange must be a safe integer',
    path: ['sizeRange'],
  });

export type ConfigOptions = Partial<z.input<typeof configSchema>>;

/**
 * Parameters of a property check.
 *
 * Instances are immutable; every `with*` method returns a new, validated
 * configuration.
 */
export class Config {
  /** Number of successful evaluations required for the check to pass. */
  public readonly minSuccessful: number;
  /** Discards tolerated per required success before giving up. */
  public readonly maxDiscardedFactor: number;
  /** Smallest size handed to generators. */
  public readonly minSize: number;
  /** Width of the size domain above `minSize`. */
  public readonly sizeRange: number;
  /** Log check progress to the console. */
  public readonly enableLogging: boolean;

  constructor(options: ConfigOptions = {}) {
    const parsed = configSchema.safeParse({
      minSuccessful: options.minSuccessful ?? 10,
      maxDiscardedFactor: options.maxDiscardedFactor ?? 5,
      minSize: options.minSize ?? 0,
      sizeRange: options.sizeRange ?? 100,
      enableLogging: options.enableLogging ?? false,
    });

    if (!parsed.success) {
      throw new ConfigurationError(
        parsed.error.issues.map((issue) => issue.message)
      );
    }

    this.minSuccessful = parsed.data.minSuccessful;
    this.maxDiscardedFactor = parsed.data.maxDiscardedFactor;
    this.minSize = parsed.data.minSize;
    this.sizeRange = parsed.data.sizeRange;
    this.enableLogging = parsed.data.enableLogging;
  }

  /**
   * Create the default configuration.
   */
  static default(): Config {
    return new Config();
  }

  /**
   * Largest size handed to generators.
   */
  get maxSize(): number {
    return this.minSize + this.sizeRange;
  }

  /**
   * Number of discards after which a check is exhausted.
   *
   * Rounded up, and never below one.
   */
  get maxDiscarded(): number {
    return Math.max(1, Math.ceil(this.minSuccessful * this.maxDiscardedFactor));
  }

  /**
   * Edge cases each generator may contribute before random generation.
   */
  get maxEdges(): number {
    return Math.floor(this.minSuccessful / 5);
  }

  withMinSuccessful(minSuccessful: number): Config {
    return new Config({ ...this.toOptions(), minSuccessful });
  }

  withMaxDiscardedFactor(maxDiscardedFactor: number): Config {
    return new Config({ ...this.toOptions(), maxDiscardedFactor });
  }

  withMinSize(minSize: number): Config {
    return new Config({ ...this.toOptions(), minSize });
  }

  withSizeRange(sizeRange: number): Config {
    return new Config({ ...this.toOptions(), sizeRange });
  }

  withLogging(enableLogging: boolean = true): Config {
    return new Config({ ...this.toOptions(), enableLogging });
  }

  toOptions(): Required<ConfigOptions> {
    return {
      minSuccessful: this.minSuccessful,
      maxDiscardedFactor: this.maxDiscardedFactor,
      minSize: this.minSize,
      sizeRange: this.sizeRange,
      enableLogging: this.enableLogging,
    };
  }

  toString(): string {
    return `Config(minSuccessful: ${this.minSuccessful}, maxDiscardedFactor: ${this.maxDiscardedFactor}, minSize: ${this.minSize}, sizeRange: ${this.sizeRange})`;
  }
}
