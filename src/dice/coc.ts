import { defaultRandom, RandomInt } from '../rng';
import { DiceParseError, isDiceParseError } from './errors';

/**
 * Call of Cthulhu percentile rolls
 *
 * A d100 is read as a tens d10 plus a ones d10, both 0-9. Bonus dice roll
 * extra tens dice and keep the lowest; penalty dice keep the highest. `00`
 * with a `0` reads as 100.
 *
 * Critical is a result of exactly 1 and fumble is 96 or more, whatever the
 * skill value.
 *
 * @module dice/coc
 */

export const MAX_BONUS_PENALTY_DICE = 3;
export const FUMBLE_THRESHOLD = 96;

export interface CoCRollResult {
  readonly skillValue: number;
  readonly result: number;
  readonly tensDigit: number;
  readonly onesDigit: number;
  /** Every tens die rolled; a single entry without bonus/penalty dice. */
  readonly bonusPenaltyRolls: readonly number[];
  readonly selectedTens: number;
  readonly isBonus: boolean;
  readonly numDice: number;
  readonly isSuccess: boolean;
  readonly isCritical: boolean;
  readonly isFumble: boolean;
}

/**
 * Roll a CoC skill check.
 *
 * @param {number} skillValue - Skill being tested, 1-100.
 * @param {number} [numBonusPenalty=0] - Extra tens dice, 0-3.
 * @param {boolean} [isBonus=true] - Bonus (keep lowest tens) when true, penalty (keep highest) otherwise.
 * @param {RandomInt} [random] - Integer source; the ones die is rolled first, then the tens dice.
 * @returns {CoCRollResult} Frozen result.
 * @throws {DiceParseError} When either parameter is out of range.
 */
export function rollCocDice(
  skillValue: number,
  numBonusPenalty = 0,
  isBonus = true,
  random: RandomInt = defaultRandom,
): CoCRollResult {
  if (!Number.isInteger(skillValue) || skillValue < 1 || skillValue > 100) {
    throw new DiceParseError('技能值必須在 1-100 之間');
  }
  if (!Number.isInteger(numBonusPenalty) || numBonusPenalty < 0 || numBonusPenalty > MAX_BONUS_PENALTY_DICE) {
    throw new DiceParseError('獎勵/懲罰骰數量必須在 0-3 之間');
  }

  const ones = random(0, 9);
  const tensRolls: number[] = [];
  for (let i = 0; i < 1 + numBonusPenalty; i++) tensRolls.push(random(0, 9));
  const selectedTens = numBonusPenalty === 0 ? tensRolls[0] : isBonus ? Math.min(...tensRolls) : Math.max(...tensRolls);

  let result: number;
  if (selectedTens === 0 && ones === 0) {
    result = 100;
  } else {
    result = selectedTens * 10 + ones;
    if (result === 0) result = ones;
  }

  return Object.freeze({
    skillValue,
    result,
    tensDigit: selectedTens,
    onesDigit: ones,
    bonusPenaltyRolls: Object.freeze(tensRolls),
    selectedTens,
    isBonus,
    numDice: numBonusPenalty,
    isSuccess: result <= skillValue,
    isCritical: result === 1,
    isFumble: result >= FUMBLE_THRESHOLD,
  });
}

function diceKind(isBonus: boolean): string {
  return isBonus ? '獎勵骰' : '懲罰骰';
}

function selectWord(isBonus: boolean): string {
  return isBonus ? '最低' : '最高';
}

function comparison(r: CoCRollResult): string {
  return `${r.result} ${r.result <= r.skillValue ? '≤' : '>'} ${r.skillValue}`;
}

/**
 * Full output for a single CoC roll:
 *
 * ```
 * 🎲 CoC 擲骰：技能值 65
 * 獎勵骰 1：十位數 [4, 7] → 選擇最低 4 | 個位數 3
 * 結果：43 ≤ 65 ✅ 成功
 * ```
 */
export function formatCocResult(r: CoCRollResult): string {
  const header = `🎲 CoC 擲骰：技能值 ${r.skillValue}`;
  const breakdown =
    r.numDice === 0
      ? `十位數：${r.tensDigit} | 個位數：${r.onesDigit}`
      : `${diceKind(r.isBonus)} ${r.numDice}：十位數 [${r.bonusPenaltyRolls.join(', ')}] → 選擇${selectWord(r.isBonus)} ${r.selectedTens} | 個位數 ${r.onesDigit}`;

  let status: string;
  if (r.isCritical) status = '🌟 **大成功！**';
  else if (r.isFumble) status = '💀 **大失敗！**';
  else if (r.isSuccess) status = '✅ 成功';
  else status = '❌ 失敗';

  return `${header}\n${breakdown}\n結果：${comparison(r)} ${status}`;
}

function shortStatus(r: CoCRollResult): string {
  if (r.isCritical) return '🌟 大成功';
  if (r.isFumble) return '💀 大失敗';
  return r.isSuccess ? '✅ 成功' : '❌ 失敗';
}

/**
 * One line per roll for repeated CoC checks with the same parameters.
 * All results are expected to share skill value and bonus/penalty setup.
 *
 * @param {readonly CoCRollResult[]} results - Rolls in order.
 * @returns {string} Empty for no results.
 */
export function formatCocBatch(results: readonly CoCRollResult[]): string {
  if (results.length === 0) return '';
  const first = results[0];
  const kind = first.numDice === 0 ? '普通擲骰' : `${diceKind(first.isBonus)} ${first.numDice}`;
  const lines = [`🎲 CoC 擲骰：技能值 ${first.skillValue}，${kind} (重複 ${results.length} 次)`, ''];

  results.forEach((r, i) => {
    const rolls =
      r.numDice === 0
        ? `十位數 ${r.tensDigit} | 個位數 ${r.onesDigit}`
        : `十位數 [${r.bonusPenaltyRolls.join(', ')}] → ${selectWord(r.isBonus)} ${r.selectedTens} | 個位數 ${r.onesDigit}`;
    lines.push(`第${i + 1}次：${rolls} → ${r.result} (${shortStatus(r)})`);
  });
  return lines.join('\n');
}

const COC_COMMAND = /^cc(n)?(\d*)\s+(\d+)/i;

/**
 * Outcome of a CoC command: the formatted rolls, or the reason the
 * parameters were rejected.
 */
export type CocCommandOutcome =
  | { readonly ok: true; readonly text: string }
  | { readonly ok: false; readonly message: string };

/**
 * Roll a CoC check written as chat text: `cc 65`, `cc2 65` (two bonus dice),
 * `ccn1 65 手槍` (one penalty die, trailing note ignored).
 *
 * @param {string} text - Command text after `!r` and any `.N`.
 * @param {number} [times=1] - Repeats; more than one gives a batch.
 * @param {RandomInt} [random] - Random source.
 * @returns {CocCommandOutcome|null} `null` when the text is not a CoC roll.
 * @throws Errors other than `DiceParseError` from the random source.
 */
export function rollCocCommand(text: string, times = 1, random: RandomInt = defaultRandom): CocCommandOutcome | null {
  const m = text.trim().match(COC_COMMAND);
  if (!m) return null;

  const isBonus = m[1] === undefined;
  const numDice = m[2] === '' ? 0 : Number(m[2]);
  const skillValue = Number(m[3]);

  try {
    if (times <= 1) return { ok: true, text: formatCocResult(rollCocDice(skillValue, numDice, isBonus, random)) };
    const results: CoCRollResult[] = [];
    for (let i = 0; i < times; i++) results.push(rollCocDice(skillValue, numDice, isBonus, random));
    return { ok: true, text: formatCocBatch(results) };
  } catch (e) {
    if (isDiceParseError(e)) return { ok: false, message: e.message };
    throw e;
  }
}

/**
 * Chat-text form of `rollCocCommand`.
 *
 * @returns {string|null} The formatted result, `❌ <reason>` for out-of-range
 * parameters, or `null` when the text is not a CoC roll.
 */
export function tryCocRoll(text: string, times = 1, random: RandomInt = defaultRandom): string | null {
  const outcome = rollCocCommand(text, times, random);
  if (outcome === null) return null;
  return outcome.ok ? outcome.text : `❌ ${outcome.message}`;
}
