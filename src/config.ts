import fs from 'fs/promises';
import fsSync from 'fs';
import { enqueueLog } from './asyncLogger';
import { isRngMethod, RngMethod } from './rng';

/**
 * Configuration file helpers
 *
 * `config.json` is plain JSON; `resolveRuntimeConfig` merges whatever it
 * contains over the defaults, ignoring values of the wrong type. Read and
 * write failures are logged as warnings and the defaults are used.
 *
 * @module config
 */

export interface CommandsConfig {
  prefix: string;
  enabled: Record<string, boolean>;
}

export interface DiceConfig {
  /** Upper bound for `!r .N` repeats. */
  maxRepeat: number;
  /** Replies longer than this are split. */
  maxMessageLength: number;
  /** Target size of each split chunk. */
  chunkSize: number;
}

export interface RngConfig {
  method: RngMethod;
  seed: number | null;
}

export interface RuntimeConfig {
  commands: CommandsConfig;
  dice: DiceConfig;
  rng: RngConfig;
}

/**
 * @returns {RuntimeConfig} A fresh copy of the defaults.
 */
export function defaultRuntimeConfig(): RuntimeConfig {
  return {
    commands: { prefix: '!', enabled: { ping: true, roll: true, help: true } },
    dice: { maxRepeat: 20, maxMessageLength: 2000, chunkSize: 1900 },
    rng: { method: 'math', seed: null },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function positiveInt(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : fallback;
}

/**
 * Merge a parsed `config.json` over the defaults.
 *
 * @param {unknown} raw - Parsed JSON, of any shape.
 * @returns {RuntimeConfig}
 */
export function resolveRuntimeConfig(raw: unknown): RuntimeConfig {
  const cfg = defaultRuntimeConfig();
  if (!isRecord(raw)) return cfg;

  if (isRecord(raw.commands)) {
    const { prefix, enabled } = raw.commands;
    if (typeof prefix === 'string' && prefix.trim()) cfg.commands.prefix = prefix.trim();
    if (isRecord(enabled)) {
      for (const [name, on] of Object.entries(enabled)) {
        if (typeof on === 'boolean') cfg.commands.enabled[name] = on;
      }
    }
  }

  if (isRecord(raw.dice)) {
    cfg.dice.maxRepeat = positiveInt(raw.dice.maxRepeat, cfg.dice.maxRepeat);
    cfg.dice.maxMessageLength = positiveInt(raw.dice.maxMessageLength, cfg.dice.maxMessageLength);
    cfg.dice.chunkSize = Math.min(positiveInt(raw.dice.chunkSize, cfg.dice.chunkSize), cfg.dice.maxMessageLength);
  }

  if (isRecord(raw.rng)) {
    if (isRngMethod(raw.rng.method)) cfg.rng.method = raw.rng.method;
    if (typeof raw.rng.seed === 'number' && Number.isFinite(raw.rng.seed)) cfg.rng.seed = raw.rng.seed;
  }

  return cfg;
}

/**
 * Read and parse a JSON configuration file asynchronously.
 *
 * @param {string} cfgPath - Path to JSON config file.
 * @returns {Promise<unknown>} The parsed value, or an empty object when the
 * file is missing or unreadable.
 */
export async function readConfig(cfgPath: string): Promise<unknown> {
  try {
    if (!fsSync.existsSync(cfgPath)) return {};
    const raw = await fs.readFile(cfgPath, 'utf8');
    return JSON.parse(raw);
  } catch (e) {
    enqueueLog('warn', `Failed to read config ${cfgPath}: ${e instanceof Error ? e.message : String(e)}`);
    return {};
  }
}

/**
 * Write an object to a JSON configuration file with 2-space indentation.
 *
 * @param {string} cfgPath - Path to JSON config file.
 * @param {unknown} obj - Value to serialize.
 * @returns {Promise<boolean>} true on success, false on failure
 */
export async function writeConfig(cfgPath: string, obj: unknown): Promise<boolean> {
  try {
    await fs.writeFile(cfgPath, JSON.stringify(obj, null, 2) + '\n', 'utf8');
    return true;
  } catch (e) {
    enqueueLog('warn', `Failed to write config ${cfgPath}: ${e instanceof Error ? e.message : String(e)}`);
    return false;
  }
}

/**
 * Synchronous variant used at module load, where awaiting is not possible.
 *
 * @param {string} [cfgPath='config.json'] - Path to JSON config file.
 * @returns {RuntimeConfig}
 */
export function loadRuntimeConfig(cfgPath = 'config.json'): RuntimeConfig {
  try {
    if (!fsSync.existsSync(cfgPath)) return defaultRuntimeConfig();
    return resolveRuntimeConfig(JSON.parse(fsSync.readFileSync(cfgPath, 'utf8')));
  } catch (e) {
    enqueueLog('warn', `Failed to load config ${cfgPath}: ${e instanceof Error ? e.message : String(e)}`);
    return defaultRuntimeConfig();
  }
}
