import { defaultRandom, RandomInt } from '../rng';
import { DiceParseError, isDiceParseError } from './errors';
import { DiceParser, ParseResult } from './parser';
import { Token } from './tokens';
import { tokenize } from './tokenizer';

export const MAX_FORMULA_LENGTH = 500;

function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Parse a dice formula and roll it.
 *
 * Every failure surfaces as a `DiceParseError`; unexpected errors from either
 * stage are wrapped with a stage label.
 *
 * ```ts
 * const { total, rolls } = parseAndRoll('2d6+3')
 * // rolls[0].rolls -> e.g. [3, 4], total -> 10
 * ```
 *
 * @param {string} formula - Dice notation, e.g. `4d6kh3`, `(1d6+2)*3`.
 * @param {RandomInt} [random] - Integer source used for every die.
 * @returns {ParseResult}
 * @throws {DiceParseError} For every failure.
 */
export function parseAndRoll(formula: string, random: RandomInt = defaultRandom): ParseResult {
  if (!formula || !formula.trim()) throw new DiceParseError('公式不能為空');
  if (formula.length > MAX_FORMULA_LENGTH) {
    throw new DiceParseError(`公式長度不能超過 ${MAX_FORMULA_LENGTH} 字符`);
  }

  let tokens: Token[];
  try {
    tokens = tokenize(formula);
  } catch (e) {
    if (isDiceParseError(e)) throw e;
    throw new DiceParseError(`詞法分析錯誤：${describeError(e)}`);
  }

  try {
    return new DiceParser(tokens, random).parse();
  } catch (e) {
    if (isDiceParseError(e)) throw e;
    throw new DiceParseError(`語法分析錯誤：${describeError(e)}`);
  }
}
