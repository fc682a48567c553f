#!/usr/bin/env node
import fsSync from 'fs';
import { parseRollCommand, runRollCommand } from './commands/roll';
import { defaultRuntimeConfig, readConfig, resolveRuntimeConfig, writeConfig } from './config';
import { enqueueLog } from './asyncLogger';
import { formatCocBatch, formatCocResult, rollCocDice } from './dice/coc';
import { isDiceParseError } from './dice/errors';
import { describeToken } from './dice/tokens';
import { tokenize } from './dice/tokenizer';
import { loggingQueue } from './queues';
import { createRandomSource, RandomInt } from './rng';

/**
 * Command-line interface
 *
 * Rolls formulas from a terminal through the same code paths the chat
 * handler uses, plus a few maintenance helpers.
 *
 * @module cli
 */

/**
 * @typedef {Object} CliOptions
 * @property {string} [cfgPath] - Configuration file.
 * @property {RandomInt} [random] - Random source for rolls.
 */
export interface CliOptions {
  /** Defaults to `config.json` in the working directory. */
  cfgPath?: string;
  /** Overrides the configured random source. */
  random?: RandomInt;
}

/**
 * Print the command summary.
 * @private
 */
function printUsage(): void {
  console.log('Dice Roll CLI');
  console.log('Usage: dice-roll <command> [args]');
  console.log('Commands:');
  console.log('  roll [.N] <formula>              Roll a formula, e.g. roll 4d6kh3, roll .3 1d20+5');
  console.log('  coc <skill> [--bonus N | --penalty N] [--times N]');
  console.log('                                   Call of Cthulhu percentile check');
  console.log('  tokens <formula>                 Show how a formula is tokenized');
  console.log('  init-config [--force]            Write a default config.json');
  console.log('  help, -h, --help                 Show this help');
}

/**
 * Report a formula error and map it to exit code 1. Anything else is rethrown
 * for `main` to handle.
 *
 * @param {unknown} e - Caught error.
 * @returns {number} Exit code.
 * @private
 */
function reportError(e: unknown): number {
  if (isDiceParseError(e)) {
    console.error(`❌ ${e.message}`);
    return 1;
  }
  throw e;
}

/**
 * Read `--name value` pairs.
 *
 * @param {string[]} args - Arguments after the positional ones.
 * @param {string[]} names - Accepted option names, without `--`.
 * @returns {Record<string, number>|null} Parsed options, or null when an
 * option is unknown or its value is missing or not an integer.
 * @private
 */
function readIntOptions(args: string[], names: string[]): Record<string, number> | null {
  const out: Record<string, number> = {};
  for (let i = 0; i < args.length; i++) {
    const name = args[i].replace(/^--/, '');
    if (!args[i].startsWith('--') || !names.includes(name)) return null;
    const value = args[i + 1];
    if (value === undefined || !/^-?\d+$/.test(value)) return null;
    out[name] = Number(value);
    i++;
  }
  return out;
}

/**
 * `coc <skill> [--bonus N | --penalty N] [--times N]`
 *
 * @param {string[]} args - Arguments after `coc`.
 * @param {RandomInt} random - Random source.
 * @param {number} maxRepeat - Largest accepted `--times`.
 * @returns {number} Exit code.
 * @private
 */
function runCoc(args: string[], random: RandomInt, maxRepeat: number): number {
  const [skillText, ...rest] = args;
  const opts = readIntOptions(rest, ['bonus', 'penalty', 'times']);
  if (skillText === undefined || !/^\d+$/.test(skillText) || opts === null) {
    console.error('Usage: coc <skill> [--bonus N | --penalty N] [--times N]');
    return 2;
  }
  if (opts.bonus !== undefined && opts.penalty !== undefined) {
    console.error('Use either --bonus or --penalty, not both');
    return 2;
  }

  const skill = Number(skillText);
  const isBonus = opts.penalty === undefined;
  const count = opts.penalty ?? opts.bonus ?? 0;
  const times = opts.times ?? 1;
  if (times < 1) {
    console.error('❌ 擲骰次數必須至少為 1！');
    return 2;
  }
  if (times > maxRepeat) {
    console.error(`❌ 擲骰次數不能超過 ${maxRepeat}！`);
    return 2;
  }

  try {
    const results = Array.from({ length: times }, () => rollCocDice(skill, count, isBonus, random));
    console.log(times === 1 ? formatCocResult(results[0]) : formatCocBatch(results));
    return 0;
  } catch (e) {
    return reportError(e);
  }
}

/**
 * Execute a CLI command.
 *
 * @param {string[]} argv - Arguments, typically `process.argv.slice(2)`.
 * @param {CliOptions} [options] - Overrides for tests and embedding.
 * @returns {Promise<number>} Exit code: 0 success, 1 invalid formula or
 * failed write, 2 usage error.
 */
export async function runCLI(argv: string[], options: CliOptions = {}): Promise<number> {
  const args = argv || [];
  if (args.length === 0 || args[0] === 'help' || args[0] === '--help' || args[0] === '-h') {
    printUsage();
    return 0;
  }

  const cmd = args[0];
  const cfgPath = options.cfgPath ?? 'config.json';
  const cfg = resolveRuntimeConfig(await readConfig(cfgPath));
  const random = options.random ?? createRandomSource(cfg.rng.method, cfg.rng.seed);

  if (cmd === 'roll') {
    const text = args.slice(1).join(' ').trim();
    if (!text) {
      console.error('Usage: roll [.N] <formula>');
      return 2;
    }
    const command = parseRollCommand(`!r ${text}`, '!', cfg.dice.maxRepeat);
    if (command === null) {
      console.error('Usage: roll [.N] <formula>');
      return 2;
    }
    if (command.kind === 'invalid') {
      console.error(command.message);
      return 2;
    }
    try {
      console.log(runRollCommand(command, random));
      enqueueLog('info', `CLI roll: ${text}`);
      return 0;
    } catch (e) {
      return reportError(e);
    }
  }

  if (cmd === 'coc') return runCoc(args.slice(1), random, cfg.dice.maxRepeat);

  if (cmd === 'tokens') {
    const formula = args.slice(1).join(' ');
    try {
      console.log(tokenize(formula).map(describeToken).join(' '));
      return 0;
    } catch (e) {
      return reportError(e);
    }
  }

  if (cmd === 'init-config') {
    if (fsSync.existsSync(cfgPath) && !args.includes('--force')) {
      console.error(`${cfgPath} already exists (use --force to overwrite)`);
      return 2;
    }
    const ok = await writeConfig(cfgPath, {
      ...defaultRuntimeConfig(),
      logging: { level: 'info', dailyRotate: true, console: true, maxSize: '20m', maxFiles: '14d' },
      paths: { logsDir: 'logs' },
    });
    if (ok) console.log(`Wrote ${cfgPath}`);
    return ok ? 0 : 1;
  }

  console.error('Unknown command:', cmd);
  printUsage();
  return 2;
}

/**
 * Run the CLI with `process.argv`, flush queued logs and exit.
 *
 * @returns {Promise<void>}
 */
export async function main(): Promise<void> {
  let code: number;
  try {
    code = await runCLI(process.argv.slice(2));
  } catch (err) {
    console.error('CLI error:', err);
    code = 1;
  }
  await loggingQueue.drain();
  process.exit(code);
}

if (require.main === module) {
  void main();
}
