/**
 * Roll command helpers
 *
 * Parse `!r` chat commands, run them through the dice engine and split long
 * replies for chat platforms with message size limits.
 *
 * Supported command forms:
 * - `!r 1d20+5` roll once
 * - `!r .5 1d20+5` roll five times
 * - `!r cc 65`, `!r cc2 65`, `!r ccn1 65` CoC checks (also with `.N`)
 *
 * @module commands/roll
 */
import { formatDiceResult, formatMultipleResults } from '../dice/format';
import { parseAndRoll } from '../dice/engine';
import { rollCocCommand } from '../dice/coc';
import type { ParseResult } from '../dice/parser';
import { defaultRandom, RandomInt } from '../rng';

export const DEFAULT_MAX_REPEAT = 20;

export type RollCommand =
  | { kind: 'roll'; times: number; formula: string }
  | { kind: 'invalid'; message: string };

/**
 * Result of running a roll request. `error` holds the reason a CoC check was
 * refused for out-of-range parameters; `text` is then the `❌` reply.
 */
export type RollOutcome =
  | { kind: 'dice'; text: string }
  | { kind: 'coc'; text: string; error: string | null };

/**
 * @param {string} text - Literal text, such as a command prefix.
 * @returns {string} `text` with regular-expression metacharacters escaped.
 * @private
 */
function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Parse a roll command from message text.
 *
 * ```ts
 * parseRollCommand('!r 2d6+3')   // -> { kind: 'roll', times: 1, formula: '2d6+3' }
 * parseRollCommand('!r .3 1d20') // -> { kind: 'roll', times: 3, formula: '1d20' }
 * parseRollCommand('hello')      // -> null
 * ```
 *
 * @param {string} text - The incoming message text.
 * @param {string} [prefix='!'] - Command prefix.
 * @param {number} [maxRepeat=20] - Largest accepted `.N`.
 * @returns {RollCommand|null} The roll request, an `invalid` result carrying
 * the reply text, or `null` when the text is not a roll command.
 */
export function parseRollCommand(text: string, prefix = '!', maxRepeat = DEFAULT_MAX_REPEAT): RollCommand | null {
  const m = text.trim().match(new RegExp(`^${escapeRegExp(prefix)}r(?:\\s+([\\s\\S]*))?$`, 'i'));
  if (!m) return null;

  const args = (m[1] ?? '').trim();
  if (!args) return { kind: 'invalid', message: `❌ 請輸入擲骰公式！例如：\`${prefix}r 1d20+5\`` };
  if (!args.startsWith('.')) return { kind: 'roll', times: 1, formula: args };

  const split = args.match(/^(\S+)\s+([\s\S]+)$/);
  if (!split) {
    return { kind: 'invalid', message: `❌ 格式錯誤！正確格式：\`${prefix}r .次數 公式\`（例如：\`${prefix}r .5 1d20+3\`）` };
  }
  const timesText = split[1].slice(1);
  if (!/^[+-]?\d+$/.test(timesText)) {
    return { kind: 'invalid', message: '❌ 無效的擲骰次數格式！次數必須是整數（例如：`.5`）' };
  }
  const times = Number(timesText);
  if (times < 1) return { kind: 'invalid', message: '❌ 擲骰次數必須至少為 1！' };
  if (times > maxRepeat) return { kind: 'invalid', message: `❌ 擲骰次數不能超過 ${maxRepeat}！` };

  return { kind: 'roll', times, formula: split[2].trim() };
}

/**
 * Run a parsed roll request. CoC checks are tried first; everything else goes
 * through the dice engine.
 *
 * @param {{times: number, formula: string}} request - Parsed `!r` request.
 * @param {RandomInt} [random] - Random source.
 * @returns {RollOutcome}
 * @throws {DiceParseError} When the formula is invalid.
 */
export function executeRollCommand(
  request: { times: number; formula: string },
  random: RandomInt = defaultRandom,
): RollOutcome {
  const { times, formula } = request;

  const coc = rollCocCommand(formula, times, random);
  if (coc !== null) {
    return coc.ok
      ? { kind: 'coc', text: coc.text, error: null }
      : { kind: 'coc', text: `❌ ${coc.message}`, error: coc.message };
  }

  const results: ParseResult[] = [];
  for (let i = 0; i < times; i++) results.push(parseAndRoll(formula, random));

  const text =
    times === 1
      ? formatDiceResult(formula, results[0].total, results[0].rolls)
      : formatMultipleResults(formula, results, times);
  return { kind: 'dice', text };
}

/**
 * Reply text for a roll request.
 *
 * @param {{times: number, formula: string}} request - Parsed `!r` request.
 * @param {RandomInt} [random] - Random source.
 * @returns {string}
 * @throws {DiceParseError} When the formula is invalid.
 */
export function runRollCommand(
  request: { times: number; formula: string },
  random: RandomInt = defaultRandom,
): string {
  return executeRollCommand(request, random).text;
}

/**
 * Split a reply into chunks on line boundaries.
 *
 * Text up to `maxLength` is returned whole. Longer text is cut into chunks of
 * at most `chunkSize` characters; a single line longer than that is cut
 * mid-line.
 *
 * @param {string} text - Reply text.
 * @param {number} [maxLength=2000] - Longest text sent as one message.
 * @param {number} [chunkSize=1900] - Longest chunk once split.
 * @returns {string[]} At least one chunk.
 */
export function splitMessage(text: string, maxLength = 2000, chunkSize = 1900): string[] {
  if (text.length <= maxLength) return [text];

  const chunks: string[] = [];
  let current = '';
  const flush = () => {
    if (current) chunks.push(current);
    current = '';
  };

  for (const line of text.split('\n')) {
    const candidate = current ? `${current}\n${line}` : line;
    if (candidate.length <= chunkSize) {
      current = candidate;
      continue;
    }
    flush();
    let rest = line;
    while (rest.length > chunkSize) {
      chunks.push(rest.slice(0, chunkSize));
      rest = rest.slice(chunkSize);
    }
    current = rest;
  }
  flush();
  return chunks;
}
