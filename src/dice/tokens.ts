/**
 * Token definitions shared by the tokenizer and the parser.
 *
 * @module dice/tokens
 */

export const TokenType = {
  NUMBER: 'NUMBER',
  DICE: 'DICE',
  PLUS: 'PLUS',
  MINUS: 'MINUS',
  MULTIPLY: 'MULTIPLY',
  DIVIDE: 'DIVIDE',
  LPAREN: 'LPAREN',
  RPAREN: 'RPAREN',
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];

/** `kh` keeps the highest dice, `kl` the lowest. */
export type KeepModifier = 'kh' | 'kl';

/**
 * Payload of a DICE token: `<count>d<faces>[kh|kl[<keep>]]`.
 * `keep` is set exactly when `modifier` is.
 */
export interface DiceSpec {
  readonly count: number;
  readonly faces: number;
  readonly modifier: KeepModifier | null;
  readonly keep: number | null;
}

export type OperatorTokenType = Exclude<TokenType, 'NUMBER' | 'DICE'>;

export type Token =
  | { readonly type: 'NUMBER'; readonly value: number }
  | { readonly type: 'DICE'; readonly value: DiceSpec }
  | { readonly type: OperatorTokenType };

export const EOF_TOKEN: Token = { type: TokenType.EOF };

/**
 * Short debug rendering of a token, e.g. `NUMBER(42)`, `DICE(3d20kh1)`, `EOF`.
 */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TokenType.NUMBER:
      return `NUMBER(${token.value})`;
    case TokenType.DICE: {
      const { count, faces, modifier, keep } = token.value;
      return `DICE(${count}d${faces}${modifier ? `${modifier}${keep}` : ''})`;
    }
    default:
      return token.type;
  }
}
