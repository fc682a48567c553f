import { describeToken, Token, TokenType } from '../src/dice/tokens';
import { tokenize, Tokenizer } from '../src/dice/tokenizer';
import { diceErrorOf } from './helpers';

const types = (text: string) => tokenize(text).map(t => t.type);

describe('Tokenizer', () => {
  test('number', () => {
    expect(new Tokenizer('42').tokenize()).toEqual([{ type: 'NUMBER', value: 42 }, { type: 'EOF' }]);
  });

  test('plain dice group', () => {
    expect(tokenize('1d20')[0]).toEqual({
      type: 'DICE',
      value: { count: 1, faces: 20, modifier: null, keep: null },
    });
  });

  test('keep highest and keep lowest', () => {
    expect(tokenize('3d20kh1')[0]).toEqual({ type: 'DICE', value: { count: 3, faces: 20, modifier: 'kh', keep: 1 } });
    expect(tokenize('4d6kl3')[0]).toEqual({ type: 'DICE', value: { count: 4, faces: 6, modifier: 'kl', keep: 3 } });
  });

  test('keep count defaults to 1', () => {
    expect(tokenize('2d20kh')[0]).toEqual({ type: 'DICE', value: { count: 2, faces: 20, modifier: 'kh', keep: 1 } });
  });

  test('operators and parentheses', () => {
    expect(types('1d20+5')).toEqual(['DICE', 'PLUS', 'NUMBER', 'EOF']);
    expect(types('2d6-3')).toEqual(['DICE', 'MINUS', 'NUMBER', 'EOF']);
    expect(types('2*3d6')).toEqual(['NUMBER', 'MULTIPLY', 'DICE', 'EOF']);
    expect(types('10/2')).toEqual(['NUMBER', 'DIVIDE', 'NUMBER', 'EOF']);
    expect(types('(1d20+5)*2')).toEqual(['LPAREN', 'DICE', 'PLUS', 'NUMBER', 'RPAREN', 'MULTIPLY', 'NUMBER', 'EOF']);
  });

  test('implicit multiplication after a number', () => {
    expect(types('2(3+4)')).toEqual(['NUMBER', 'MULTIPLY', 'LPAREN', 'NUMBER', 'PLUS', 'NUMBER', 'RPAREN', 'EOF']);
  });

  test('implicit multiplication after a dice group, across whitespace', () => {
    expect(types('2d6 (1+1)')).toEqual(['DICE', 'MULTIPLY', 'LPAREN', 'NUMBER', 'PLUS', 'NUMBER', 'RPAREN', 'EOF']);
  });

  test('implicit multiplication between groups', () => {
    expect(types('(1+2)(3+4)')).toEqual([
      'LPAREN', 'NUMBER', 'PLUS', 'NUMBER', 'RPAREN',
      'MULTIPLY',
      'LPAREN', 'NUMBER', 'PLUS', 'NUMBER', 'RPAREN',
      'EOF',
    ]);
  });

  test('no implicit multiplication elsewhere', () => {
    expect(types(')1')).toEqual(['RPAREN', 'NUMBER', 'EOF']);
    expect(types('2 3')).toEqual(['NUMBER', 'NUMBER', 'EOF']);
  });

  test('whitespace is insignificant', () => {
    expect(types('  1d20  +  5  ')).toEqual(['DICE', 'PLUS', 'NUMBER', 'EOF']);
  });

  test('dice notation is case-insensitive', () => {
    expect(tokenize('1D20')).toEqual(tokenize('1d20'));
    expect(tokenize('3D20KH1')).toEqual(tokenize('3d20kh1'));
    expect(tokenize('4d6Kl2')).toEqual(tokenize('4d6kl2'));
  });

  test('tokenizing twice yields the same tokens', () => {
    const formula = '4(1d20+2d5kh1) - 3/2';
    expect(tokenize(formula)).toEqual(tokenize(formula));
  });

  test('empty and blank input give only EOF', () => {
    expect(tokenize('')).toEqual([{ type: 'EOF' }]);
    expect(tokenize('   ')).toEqual([{ type: 'EOF' }]);
  });

  test.each([
    ['1d20@5', "無效字符：'@'"],
    ['abc', "無效字符：'a'"],
    ['d20', "無效字符：'d'"],
    ['2 d6', "無效字符：'d'"],
    ['1d', '骰子面數必須是數字'],
    ['1dx', '骰子面數必須是數字'],
    ['3d20kx', "'k' 後面必須跟 'h' 或 'l'，但得到 'x'"],
    ['3d20k', "'k' 後面必須跟 'h' 或 'l'，但得到 ''"],
    ['0d20', '骰子數量必須大於 0'],
    ['101d20', '骰子數量不能超過 100'],
    ['1d1', '骰子面數必須至少為 2'],
    ['1d1001', '骰子面數不能超過 1000'],
    ['3d20kh0', '保留數量必須大於 0'],
    ['3d20kh4', '保留數量 (4) 不能大於骰子數量 (3)'],
    ['2d20kl3', '保留數量 (3) 不能大於骰子數量 (2)'],
    ['99999999999999999999', '數值超出範圍'],
  ])('%s is rejected with "%s"', (formula, message) => {
    expect(diceErrorOf(() => tokenize(formula)).message).toBe(message);
  });

  test('bounds are inclusive', () => {
    expect(tokenize('100d1000')[0]).toEqual({
      type: 'DICE',
      value: { count: 100, faces: 1000, modifier: null, keep: null },
    });
    expect(tokenize('1d2')[0].type).toBe(TokenType.DICE);
    expect(tokenize('5d6kl5')[0]).toEqual({ type: 'DICE', value: { count: 5, faces: 6, modifier: 'kl', keep: 5 } });
  });
});

describe('describeToken', () => {
  test('renders payloads', () => {
    const tokens: Token[] = tokenize('2(1d6kh1)+7');
    expect(tokens.map(describeToken).join(' ')).toBe('NUMBER(2) MULTIPLY LPAREN DICE(1d6kh1) RPAREN PLUS NUMBER(7) EOF');
    expect(describeToken({ type: 'DICE', value: { count: 3, faces: 8, modifier: null, keep: null } })).toBe('DICE(3d8)');
  });
});
