import crypto from 'crypto';
import seedrandom from 'seedrandom';

/**
 * Random sources
 *
 * The dice engine never calls `Math.random` directly: every roll goes through
 * a `RandomInt` function so callers can pick the generator (or script it in
 * tests).
 *
 * @module rng
 */

/**
 * Returns a uniformly distributed integer in the inclusive range [min, max].
 *
 * @callback RandomInt
 * @param {number} min - Lowest value, inclusive.
 * @param {number} max - Highest value, inclusive.
 * @returns {number}
 */
export type RandomInt = (min: number, max: number) => number;

export type RngMethod = 'math' | 'crypto' | 'seeded';

export const RNG_METHODS: readonly RngMethod[] = ['math', 'crypto', 'seeded'];

/**
 * @param {unknown} value - Value read from configuration.
 * @returns {boolean} True when `value` names a known random source.
 */
export function isRngMethod(value: unknown): value is RngMethod {
  return RNG_METHODS.some(method => method === value);
}

/**
 * Adapt a generator returning floats in [0, 1) to a `RandomInt`.
 *
 * @param {() => number} [random=Math.random] - Float generator.
 * @returns {RandomInt}
 * @throws {RangeError} From the returned function, when the range is not a
 * pair of integers with `min <= max`.
 */
export function fromUniform(random: () => number = Math.random): RandomInt {
  return (min, max) => {
    if (!Number.isInteger(min) || !Number.isInteger(max) || max < min) {
      throw new RangeError(`invalid integer range [${min}, ${max}]`);
    }
    return Math.floor(random() * (max - min + 1)) + min;
  };
}

export const defaultRandom: RandomInt = fromUniform(Math.random);

/**
 * Build the random source named in configuration:
 * - 'crypto': `crypto.randomInt`, nondeterministic
 * - 'seeded': seedrandom, deterministic for a given seed; seeded from the
 *   current time when no seed is configured
 * - 'math' (default): `Math.random`
 *
 * @param {RngMethod} [method='math'] - Generator to use.
 * @param {number|null} [seed=null] - Seed for the 'seeded' method.
 * @returns {RandomInt}
 */
export function createRandomSource(method: RngMethod = 'math', seed: number | null = null): RandomInt {
  if (method === 'crypto') {
    return (min, max) => crypto.randomInt(min, max + 1);
  }
  if (method === 'seeded') {
    return fromUniform(seedrandom(String(seed ?? Date.now())));
  }
  return defaultRandom;
}
