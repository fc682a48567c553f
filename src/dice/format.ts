import { ParseResult } from './parser';
import { DiceRollRecord } from './roll';

/**
 * Result formatters
 *
 * Render rolled formulas as chat text. Dropped dice are wrapped in `~~`
 * (strike-through in Markdown-style chat clients).
 *
 * @module dice/format
 */

/** Dice groups as written in a formula, keep suffix included. */
const DICE_GROUP_PATTERN = /\d+d\d+(?:kh\d*|kl\d*)?/gi;
const OPERATORS = ['+', '-', '*', '/'];

function diceGroupCount(formula: string): number {
  return formula.match(DICE_GROUP_PATTERN)?.length ?? 0;
}

/**
 * Display form of one dice group: `[7]`, `[2, 4, 5]`, or `[15, 12](~~8~~)`
 * when a keep modifier dropped dice.
 */
export function formatRoll(record: DiceRollRecord): string {
  if (record.kept !== null && record.dropped !== null && record.dropped.length > 0) {
    return `[${record.kept.join(', ')}](~~${record.dropped.join(', ')}~~)`;
  }
  if (record.rolls.length === 1) return `[${record.rolls[0]}]`;
  return `[${record.rolls.join(', ')}]`;
}

/**
 * Detailed single-roll output:
 *
 * ```
 * 🎲 擲骰結果：1d20+5
 * 骰子：[12] (總和: 12)
 * 計算：[12]+5 = 17
 * ```
 *
 * @param {string} formula - Formula as entered.
 * @param {number} total - Evaluated total.
 * @param {readonly DiceRollRecord[]} records - Dice groups in formula order.
 * @returns {string}
 */
export function formatDiceResult(formula: string, total: number, records: readonly DiceRollRecord[]): string {
  const header = `🎲 擲骰結果：${formula}`;
  if (records.length === 0) return `${header}\n計算：${formula} = ${total}`;

  const display = records.map(formatRoll).join(', ');
  const diceTotal = records.reduce((acc, r) => acc + r.total, 0);

  let index = 0;
  const calculation = formula.replace(DICE_GROUP_PATTERN, match => {
    if (index >= records.length) return match;
    return `[${records[index++].total}]`;
  });

  return `${header}\n骰子：${display} (總和: ${diceTotal})\n計算：${calculation} = ${total}`;
}

/**
 * Strip whitespace and put single spaces around `+ - * /`.
 * @private
 */
function padOperators(text: string): string {
  let padded = text.replace(/\s+/g, '');
  for (const op of OPERATORS) padded = padded.split(op).join(` ${op} `);
  return padded.replace(/ {2,}/g, ' ').trim();
}

/**
 * One `第i次` line body. The remaining arithmetic is only spelled out for a
 * single dice group in a formula without parentheses; `2(1d6)` and
 * `(1d6+1)*2` fall through to the plain `→` form.
 *
 * @param {string} formula - Formula as entered.
 * @param {ParseResult} result - One evaluation of `formula`.
 * @returns {string}
 * @private
 */
function formatAttempt(formula: string, result: ParseResult): string {
  const { total, rolls } = result;
  if (rolls.length === 0) return `= ${total}`;

  const displays = rolls.map(formatRoll);
  if (rolls.length === 1 && diceGroupCount(formula) === 1 && !/[()]/.test(formula)) {
    const remaining = padOperators(formula.replace(new RegExp(DICE_GROUP_PATTERN.source, 'i'), ''));
    return remaining ? `${displays[0]} ${remaining} = ${total}` : `${displays[0]} = ${total}`;
  }

  const coefficient = rolls.length > 1 ? formula.trim().match(/^(\d+)\s*\(/) : null;
  if (coefficient) return `${coefficient[1]} × (${displays.join(' + ')}) = ${total}`;

  return `${displays.join(', ')} → ${total}`;
}

/**
 * Compact output for repeated rolls of one formula, one line per attempt:
 *
 * ```
 * 🎲 擲骰結果：1d20+5 (重複 2 次)
 * 第1次：[12] + 5 = 17
 * 第2次：[3] + 5 = 8
 * ```
 *
 * @param {string} formula - Formula as entered.
 * @param {readonly ParseResult[]} results - One entry per attempt.
 * @param {number} times - Repeat count shown in the header.
 * @returns {string}
 */
export function formatMultipleResults(formula: string, results: readonly ParseResult[], times: number): string {
  const lines = [`🎲 擲骰結果：${formula} (重複 ${times} 次)`];
  results.forEach((result, i) => {
    lines.push(`第${i + 1}次：${formatAttempt(formula, result)}`);
  });
  return lines.join('\n');
}
