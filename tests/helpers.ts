import { DiceParseError } from '../src/dice/errors';
import type { RandomInt } from '../src/rng';

/**
 * Random source returning the given values in order, whatever range is asked.
 * Throws when more values are requested than scripted.
 */
export function scripted(values: number[]): RandomInt {
  const queue = [...values];
  return () => {
    const next = queue.shift();
    if (next === undefined) throw new Error('scripted random source exhausted');
    return next;
  };
}

/** Run `fn` and return the DiceParseError it throws. */
export function diceErrorOf(fn: () => unknown): DiceParseError {
  try {
    fn();
  } catch (e) {
    if (e instanceof DiceParseError) return e;
    throw e;
  }
  throw new Error('expected a DiceParseError');
}
