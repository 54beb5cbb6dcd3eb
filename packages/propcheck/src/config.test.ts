import { describe, test, expect } from 'vitest';
import { Config } from './config.js';
import { ConfigurationError } from './errors.js';

describe('Config', () => {
  test('creates default configuration', () => {
    const config = Config.default();
    expect(config.minSuccessful).toBe(10);
    expect(config.maxDiscardedFactor).toBe(5);
    expect(config.minSize).toBe(0);
    expect(config.sizeRange).toBe(100);
    expect(config.enableLogging).toBe(false);
  });

  test('accepts partial options', () => {
    const config = new Config({ minSuccessful: 3, sizeRange: 0 });
    expect(config.minSuccessful).toBe(3);
    expect(config.sizeRange).toBe(0);
    expect(config.maxDiscardedFactor).toBe(5); // Others default
  });

  test('builder methods change one field at a time', () => {
    const config = Config.default()
      .withMinSuccessful(50)
      .withMaxDiscardedFactor(2)
      .withMinSize(5)
      .withSizeRange(20)
      .withLogging();

    expect(config.toOptions()).toEqual({
      minSuccessful: 50,
      maxDiscardedFactor: 2,
      minSize: 5,
      sizeRange: 20,
      enableLogging: true,
    });
  });

  test('config chaining preserves immutability', () => {
    const original = Config.default();
    const modified = original.withMinSuccessful(50).withSizeRange(10);

    expect(original.minSuccessful).toBe(10);
    expect(original.sizeRange).toBe(100);
    expect(modified.minSuccessful).toBe(50);
    expect(modified.sizeRange).toBe(10);
  });

  test('derives the size domain', () => {
    const config = new Config({ minSize: 5, sizeRange: 20 });
    expect(config.maxSize).toBe(25);
  });

  test('maxDiscarded rounds up and is at least one', () => {
    expect(new Config({ minSuccessful: 10, maxDiscardedFactor: 5 }).maxDiscarded).toBe(50);
    expect(new Config({ minSuccessful: 3, maxDiscardedFactor: 0.5 }).maxDiscarded).toBe(2);
    expect(new Config({ minSuccessful: 1, maxDiscardedFactor: 0.1 }).maxDiscarded).toBe(1);
  });

  test('maxEdges is a fifth of minSuccessful, floored', () => {
    expect(new Config({ minSuccessful: 4 }).maxEdges).toBe(0);
    expect(new Config({ minSuccessful: 10 }).maxEdges).toBe(2);
    expect(new Config({ minSuccessful: 14 }).maxEdges).toBe(2);
  });

  test('rejects non-positive minSuccessful', () => {
    expect(() => new Config({ minSuccessful: 0 })).toThrow(ConfigurationError);
    expect(() => Config.default().withMinSuccessful(-1)).toThrow(
      /minSuccessful must be greater than zero/
    );
  });

  test('rejects fractional counts and sizes', () => {
    expect(() => new Config({ minSuccessful: 1.5 })).toThrow(
      /minSuccessful must be an integer/
    );
    expect(() => new Config({ minSize: 0.5 })).toThrow(/minSize must be an integer/);
  });

  test('rejects negative sizes', () => {
    expect(() => new Config({ minSize: -1 })).toThrow(/minSize must not be negative/);
    expect(() => new Config({ sizeRange: -1 })).toThrow(
      /sizeRange must not be negative/
    );
  });

  test('rejects non-positive or infinite discard factors', () => {
    expect(() => new Config({ maxDiscardedFactor: 0 })).toThrow(
      /maxDiscardedFactor must be greater than zero/
    );
    expect(() => new Config({ maxDiscardedFactor: Infinity })).toThrow(
      ConfigurationError
    );
  });

  test('rejects a size domain beyond safe integers', () => {
    expect(
      () => new Config({ minSize: Number.MAX_SAFE_INTEGER, sizeRange: 1 })
    ).toThrow(/minSize \+ sizeRange must be a safe integer/);
  });

  test('reports every invalid field', () => {
    try {
      new Config({ minSuccessful: 0, minSize: -1 });
      throw new Error('Expected configuration to be rejected');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues).toContain('minSuccessful must be greater than zero');
        expect(error.issues).toContain('minSize must not be negative');
      }
    }
  });

  test('config toString representation', () => {
    expect(Config.default().toString()).toBe(
      'Config(minSuccessful: 10, maxDiscardedFactor: 5, minSize: 0, sizeRange: 100)'
    );
  });
});
