import { defaultRandom, RandomInt } from '../rng';
import { DiceParseError } from './errors';
import { DiceRollRecord, rollDiceGroup } from './roll';
import { EOF_TOKEN, Token, TokenType } from './tokens';

/**
 * Recursive-descent parser and evaluator
 *
 * Parsing and evaluation happen in one pass; no syntax tree is kept. Dice
 * groups are rolled as they are reduced, so the roll log follows the
 * left-to-right order of the formula.
 *
 * ```
 * expression := term (('+' | '-') term)*
 * term       := factor (('*' | '/') factor)*
 * factor     := ('+' | '-') factor | NUMBER | DICE | '(' expression ')'
 * ```
 *
 * @module dice/parser
 */

/**
 * @param {number} value - Arithmetic result.
 * @returns {number} `value`, with -0 as 0.
 * @throws {DiceParseError} When `value` is not a safe integer.
 * @private
 */
function checked(value: number): number {
  if (!Number.isSafeInteger(value)) throw new DiceParseError('數值超出範圍');
  // normalise -0
  return value === 0 ? 0 : value;
}

/**
 * Integer division rounding toward negative infinity. Exact for safe
 * integers, unlike `Math.floor(a / b)`.
 *
 * @param {number} a - Dividend.
 * @param {number} b - Divisor.
 * @returns {number}
 * @throws {DiceParseError} `除以零錯誤` when `b` is 0.
 */
export function floorDiv(a: number, b: number): number {
  if (b === 0) throw new DiceParseError('除以零錯誤');
  const r = a % b;
  const q = (a - r) / b;
  return checked(r !== 0 && (r < 0) !== (b < 0) ? q - 1 : q);
}

export interface ParseResult {
  readonly total: number;
  readonly rolls: readonly DiceRollRecord[];
}

/**
 * Evaluates one token list. Instances are single use: `parse` consumes the
 * tokens and the roll log.
 */
export class DiceParser {
  private readonly tokens: readonly Token[];
  private readonly random: RandomInt;
  private pos = 0;
  private readonly rollLog: DiceRollRecord[] = [];

  constructor(tokens: readonly Token[], random: RandomInt = defaultRandom) {
    this.tokens = tokens;
    this.random = random;
  }

  get currentToken(): Token {
    return this.pos < this.tokens.length ? this.tokens[this.pos] : EOF_TOKEN;
  }

  private advance(): void {
    this.pos++;
  }

  /**
   * @returns {ParseResult} Total and the dice groups in evaluation order.
   * @throws {DiceParseError} On grammar errors, division by zero or overflow.
   */
  parse(): ParseResult {
    const total = this.expression();
    if (this.currentToken.type !== TokenType.EOF) throw new DiceParseError('表達式未完全解析');
    return { total, rolls: this.rollLog };
  }

  private expression(): number {
    let result = this.term();
    for (;;) {
      const op = this.currentToken.type;
      if (op !== TokenType.PLUS && op !== TokenType.MINUS) return result;
      this.advance();
      const right = this.term();
      result = checked(op === TokenType.PLUS ? result + right : result - right);
    }
  }

  private term(): number {
    let result = this.factor();
    for (;;) {
      const op = this.currentToken.type;
      if (op !== TokenType.MULTIPLY && op !== TokenType.DIVIDE) return result;
      this.advance();
      const right = this.factor();
      result = op === TokenType.MULTIPLY ? checked(result * right) : floorDiv(result, right);
    }
  }

  private factor(): number {
    const token = this.currentToken;
    switch (token.type) {
      case TokenType.NUMBER:
        this.advance();
        return token.value;
      case TokenType.DICE: {
        this.advance();
        const record = rollDiceGroup(token.value, this.random);
        this.rollLog.push(record);
        return record.total;
      }
      case TokenType.PLUS:
        this.advance();
        return this.factor();
      case TokenType.MINUS:
        this.advance();
        return checked(-this.factor());
      case TokenType.LPAREN: {
        this.advance();
        const result = this.expression();
        if (this.currentToken.type !== TokenType.RPAREN) throw new DiceParseError("括號不匹配：缺少右括號 ')'");
        this.advance();
        return result;
      }
      default:
        throw new DiceParseError(`無效的語法：期望數字、骰子或左括號，但得到 ${token.type}`);
    }
  }
}
