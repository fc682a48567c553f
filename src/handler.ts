import { enqueueLog } from './asyncLogger';
import { executeRollCommand, parseRollCommand, splitMessage } from './commands/roll';
import { loadRuntimeConfig, RuntimeConfig } from './config';
import { isDiceParseError } from './dice/errors';
import logger from './logger';
import { createRandomSource, RandomInt } from './rng';

/**
 * Message handler helpers
 *
 * Maps incoming chat text to reply text for the supported commands (`ping`,
 * `help`, `r`). Chat platforms call `getReplyForText` and send `chunks` in
 * order.
 *
 * @module handler
 */

export type Reply = {
  /** Full reply text. */
  text: string;
  /** `text` split to fit the platform's message limit. */
  chunks: string[];
};

export interface ReplyContext {
  /** Shown in command logs. */
  author?: string;
  /** Overrides the configured random source. */
  random?: RandomInt;
  /** Overrides the configuration loaded from `config.json`. */
  config?: RuntimeConfig;
}

const UNEXPECTED_ERROR_REPLY = '❌ 發生未預期的錯誤，請稍後再試或檢查公式格式';

const runtimeCfg = loadRuntimeConfig();
const runtimeRandom = createRandomSource(runtimeCfg.rng.method, runtimeCfg.rng.seed);

/**
 * Help lines per command; `{p}` is replaced by the configured prefix.
 */
const commandHelp: Record<string, string> = {
  ping: '`{p}ping` - 檢查機器人是否在線',
  roll: '`{p}r <公式>` - 擲骰，例如 `{p}r 1d20+5`、`{p}r .5 2d6`、`{p}r cc 65`',
  help: '`{p}help [dice]` - 顯示說明',
};

const DICE_HELP = `🎲 **擲骰指令**
━━━━━━━━━━━━━━━━━━━━━━━━━━━

**基本格式**
\`{p}r <公式>\` - 擲骰一次
\`{p}r .N <公式>\` - 擲骰 N 次

**公式範例**
\`{p}r 1d20\` - 擲一顆 20 面骰
\`{p}r 1d20+5\` - 擲骰並加 5
\`{p}r 2d6+3\` - 擲兩顆 6 面骰再加 3
\`{p}r (1d6+2)*3\` - 括號與四則運算
\`{p}r .5 1d20\` - 擲 5 次 1d20

**進階語法**
\`{p}r 4d6kh3\` - 擲 4 顆 d6，保留最高 3 顆
\`{p}r 2d20kl\` - 擲 2 顆 d20，保留最低
\`{p}r 2d20kh\` - 擲 2 顆 d20，保留最高

**CoC 擲骰**
\`{p}r cc 65\` - CoC 普通擲骰 (技能值 65)
\`{p}r cc1 65\` - 1 顆獎勵骰
\`{p}r cc2 65\` - 2 顆獎勵骰
\`{p}r ccn1 65\` - 1 顆懲罰骰
\`{p}r ccn2 65\` - 2 顆懲罰骰`;

/**
 * @param {string} text - Help text with `{p}` placeholders.
 * @param {string} prefix - Configured command prefix.
 * @returns {string}
 * @private
 */
function withPrefix(text: string, prefix: string): string {
  return text.split('{p}').join(prefix);
}

/**
 * @param {string} text - Full reply.
 * @param {RuntimeConfig} cfg - Supplies the split limits.
 * @returns {Reply}
 * @private
 */
function reply(text: string, cfg: RuntimeConfig): Reply {
  return { text, chunks: splitMessage(text, cfg.dice.maxMessageLength, cfg.dice.chunkSize) };
}

/**
 * Convert an incoming message into an optional reply.
 *
 * Recognized commands (with the configured prefix, `!` by default):
 * - `!ping` -> `pong! 🏓`
 * - `!help`, `!help dice`
 * - `!r ...` -> dice or CoC roll
 *
 * Invalid formulas produce `❌ <reason>`; unexpected failures are logged and
 * answered with a generic error.
 *
 * @param {string} text - Incoming message text.
 * @param {ReplyContext} [context] - Author, random source and configuration overrides.
 * @returns {Reply|null} The reply, or `null` for text that is not an enabled command.
 */
export function getReplyForText(text: string, context: ReplyContext = {}): Reply | null {
  if (!text) return null;
  const trimmed = text.trim();
  if (trimmed.length === 0) return null;

  const cfg = context.config ?? runtimeCfg;
  const { prefix, enabled } = cfg.commands;
  if (!trimmed.startsWith(prefix)) return null;
  const body = trimmed.slice(prefix.length);

  if (/^ping\s*$/i.test(body)) return enabled.ping ? reply('pong! 🏓', cfg) : null;

  const helpMatch = body.match(/^help(?:\s+(\S+))?\s*$/i);
  if (helpMatch) {
    if (!enabled.help) return null;
    const topic = helpMatch[1]?.toLowerCase();
    if (topic && ['dice', 'roll', 'r', '骰子', '擲骰'].includes(topic)) {
      return reply(withPrefix(DICE_HELP, prefix), cfg);
    }
    const lines = Object.entries(enabled)
      .filter(([, on]) => on)
      .map(([name]) => withPrefix(commandHelp[name] ?? `\`{p}${name}\``, prefix));
    return reply(`可用指令：\n${lines.join('\n')}`, cfg);
  }

  const command = parseRollCommand(trimmed, prefix, cfg.dice.maxRepeat);
  if (command === null || !enabled.roll) return null;
  if (command.kind === 'invalid') return reply(command.message, cfg);

  const who = context.author ?? 'unknown';
  const args = trimmed.slice(prefix.length + 1).trim();
  try {
    const outcome = executeRollCommand(command, context.random ?? runtimeRandom);
    if (outcome.kind === 'dice') {
      enqueueLog('info', `🎲 ${who} 擲骰：${args}`);
    } else if (outcome.error !== null) {
      enqueueLog('warn', `❌ ${who} CoC擲骰參數錯誤：${command.formula} - ${outcome.error}`);
    } else {
      enqueueLog('info', `🎲 ${who} CoC擲骰：${args}`);
    }
    return reply(outcome.text, cfg);
  } catch (e) {
    if (isDiceParseError(e)) {
      enqueueLog('warn', `❌ 擲骰解析錯誤：${command.formula} - ${e.message}`);
      return reply(`❌ ${e.message}`, cfg);
    }
    logger.error(`❌ 擲骰未預期錯誤：${command.formula} - ${e instanceof Error ? e.stack ?? e.message : String(e)}`);
    return reply(UNEXPECTED_ERROR_REPLY, cfg);
  }
}
