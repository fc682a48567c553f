import { DiceParseError } from './errors';
import { DiceSpec, EOF_TOKEN, KeepModifier, Token, TokenType } from './tokens';

/**
 * Dice formula tokenizer
 *
 * Scans a formula such as `2d6+3`, `4d6kh3` or `2(1d8+1)` into a flat token
 * list terminated by EOF. All static checks on dice groups (count, faces and
 * keep bounds) happen here, so the parser only sees well-formed DICE tokens.
 *
 * Implicit multiplication is inserted in exactly two places: after a NUMBER or
 * DICE token followed by `(`, and between `)` and `(`.
 *
 * @module dice/tokenizer
 */

export const MAX_DICE_COUNT = 100;
export const MAX_DICE_FACES = 1000;

const SINGLE_CHAR_TOKENS: Readonly<Record<string, Token>> = {
  '+': { type: TokenType.PLUS },
  '-': { type: TokenType.MINUS },
  '*': { type: TokenType.MULTIPLY },
  '/': { type: TokenType.DIVIDE },
  '(': { type: TokenType.LPAREN },
  ')': { type: TokenType.RPAREN },
};

function isDigit(ch: string | null): boolean {
  return ch !== null && ch >= '0' && ch <= '9';
}

function isWhitespace(ch: string | null): boolean {
  return ch !== null && /\s/.test(ch);
}

export class Tokenizer {
  private readonly text: string;
  private pos = 0;

  constructor(text: string) {
    this.text = text.trim();
  }

  private get current(): string | null {
    return this.pos < this.text.length ? this.text[this.pos] : null;
  }

  private advance(): void {
    this.pos++;
  }

  private skipWhitespace(): void {
    while (isWhitespace(this.current)) this.advance();
  }

  private readNumber(): number {
    const start = this.pos;
    while (isDigit(this.current)) this.advance();
    return Number(this.text.slice(start, this.pos));
  }

  /**
   * Read the part of a dice group after its count: `d<faces>[kh|kl[<keep>]]`.
   * The current character is the `d`.
   */
  private readDice(count: number): DiceSpec {
    this.advance();

    if (!isDigit(this.current)) throw new DiceParseError('骰子面數必須是數字');
    const faces = this.readNumber();

    let modifier: KeepModifier | null = null;
    let keep: number | null = null;
    if (this.current?.toLowerCase() === 'k') {
      this.advance();
      const which = this.current?.toLowerCase();
      if (which !== 'h' && which !== 'l') {
        throw new DiceParseError(`'k' 後面必須跟 'h' 或 'l'，但得到 '${this.current ?? ''}'`);
      }
      modifier = which === 'h' ? 'kh' : 'kl';
      this.advance();
      keep = isDigit(this.current) ? this.readNumber() : 1;
    }

    if (count < 1) throw new DiceParseError('骰子數量必須大於 0');
    if (count > MAX_DICE_COUNT) throw new DiceParseError(`骰子數量不能超過 ${MAX_DICE_COUNT}`);
    if (faces < 2) throw new DiceParseError('骰子面數必須至少為 2');
    if (faces > MAX_DICE_FACES) throw new DiceParseError(`骰子面數不能超過 ${MAX_DICE_FACES}`);

    if (modifier !== null && keep !== null) {
      if (keep < 1) throw new DiceParseError('保留數量必須大於 0');
      if (keep > count) throw new DiceParseError(`保留數量 (${keep}) 不能大於骰子數量 (${count})`);
    }

    return { count, faces, modifier, keep };
  }

  /** Append MULTIPLY when the next non-blank character opens a group. */
  private implicitMultiply(tokens: Token[]): void {
    this.skipWhitespace();
    if (this.current === '(') tokens.push({ type: TokenType.MULTIPLY });
  }

  /**
   * @returns {Token[]} Tokens in source order, ending with EOF.
   * @throws {DiceParseError} On invalid characters or dice groups.
   */
  tokenize(): Token[] {
    const tokens: Token[] = [];

    for (;;) {
      this.skipWhitespace();
      const ch = this.current;
      if (ch === null) break;

      if (isDigit(ch)) {
        const value = this.readNumber();
        if (this.current?.toLowerCase() === 'd') {
          tokens.push({ type: TokenType.DICE, value: this.readDice(value) });
        } else {
          if (!Number.isSafeInteger(value)) throw new DiceParseError('數值超出範圍');
          tokens.push({ type: TokenType.NUMBER, value });
        }
        this.implicitMultiply(tokens);
        continue;
      }

      const single = SINGLE_CHAR_TOKENS[ch];
      if (single === undefined) {
        const codePoint = this.text.codePointAt(this.pos);
        const shown = codePoint === undefined ? ch : String.fromCodePoint(codePoint);
        throw new DiceParseError(`無效字符：'${shown}'`);
      }
      tokens.push(single);
      this.advance();
      if (single.type === TokenType.RPAREN) this.implicitMultiply(tokens);
    }

    tokens.push(EOF_TOKEN);
    return tokens;
  }
}

/**
 * Tokenize a formula. Empty or blank input yields `[EOF]`; rejecting empty
 * formulas is up to the caller.
 *
 * @param {string} text - Formula text.
 * @returns {Token[]}
 * @throws {DiceParseError} On invalid characters or dice groups.
 */
export function tokenize(text: string): Token[] {
  return new Tokenizer(text).tokenize();
}
