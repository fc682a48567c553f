import { defaultRandom, RandomInt } from '../rng';
import { DiceSpec, KeepModifier } from './tokens';

/**
 * Record of one evaluated dice group.
 *
 * `rolls` is in the order the dice were rolled. With a keep modifier, `kept`
 * and `dropped` split `rolls` while preserving that order, and `total` is the
 * sum of `kept`; otherwise `total` is the sum of `rolls`.
 */
export interface DiceRollRecord {
  readonly count: number;
  readonly faces: number;
  readonly rolls: readonly number[];
  readonly total: number;
  readonly kept: readonly number[] | null;
  readonly dropped: readonly number[] | null;
  readonly modifier: KeepModifier | null;
}

function sum(values: readonly number[]): number {
  return values.reduce((acc, v) => acc + v, 0);
}

/**
 * Indices of the dice a keep modifier retains. Equal values favour the die
 * rolled first.
 *
 * @param {readonly number[]} rolls - Dice in roll order.
 * @param {KeepModifier} modifier - `kh` or `kl`.
 * @param {number} keep - How many dice to keep.
 * @returns {Set<number>}
 * @private
 */
function keptIndices(rolls: readonly number[], modifier: KeepModifier, keep: number): Set<number> {
  const order = rolls.map((_, i) => i);
  order.sort((a, b) => (modifier === 'kh' ? rolls[b] - rolls[a] : rolls[a] - rolls[b]) || a - b);
  return new Set(order.slice(0, keep));
}

/**
 * Roll one dice group.
 *
 * @param {DiceSpec} spec - Validated dice group from a DICE token.
 * @param {RandomInt} [random] - Integer source; each die is `random(1, faces)`.
 * @returns {DiceRollRecord} Frozen record.
 */
export function rollDiceGroup(spec: DiceSpec, random: RandomInt = defaultRandom): DiceRollRecord {
  const rolls: number[] = [];
  for (let i = 0; i < spec.count; i++) rolls.push(random(1, spec.faces));

  if (spec.modifier === null || spec.keep === null) {
    return Object.freeze({
      count: spec.count,
      faces: spec.faces,
      rolls,
      total: sum(rolls),
      kept: null,
      dropped: null,
      modifier: null,
    });
  }

  const keepSet = keptIndices(rolls, spec.modifier, spec.keep);
  const kept = rolls.filter((_, i) => keepSet.has(i));
  const dropped = rolls.filter((_, i) => !keepSet.has(i));
  return Object.freeze({
    count: spec.count,
    faces: spec.faces,
    rolls,
    total: sum(kept),
    kept,
    dropped,
    modifier: spec.modifier,
  });
}
