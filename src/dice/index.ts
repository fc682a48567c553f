export { DiceParseError, isDiceParseError } from './errors';
export { TokenType, describeToken } from './tokens';
export type { DiceSpec, KeepModifier, Token } from './tokens';
export { Tokenizer, tokenize, MAX_DICE_COUNT, MAX_DICE_FACES } from './tokenizer';
export { DiceParser, floorDiv } from './parser';
export type { ParseResult } from './parser';
export { rollDiceGroup } from './roll';
export type { DiceRollRecord } from './roll';
export { parseAndRoll, MAX_FORMULA_LENGTH } from './engine';
export { formatRoll, formatDiceResult, formatMultipleResults } from './format';
export {
  rollCocDice,
  formatCocResult,
  formatCocBatch,
  tryCocRoll,
  rollCocCommand,
  FUMBLE_THRESHOLD,
  MAX_BONUS_PENALTY_DICE,
} from './coc';
export type { CoCRollResult, CocCommandOutcome } from './coc';
