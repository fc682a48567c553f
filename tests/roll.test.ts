import { executeRollCommand, parseRollCommand, runRollCommand, splitMessage } from '../src/commands/roll';
import { DiceParseError } from '../src/dice/errors';
import { scripted } from './helpers';

describe('parseRollCommand', () => {
  test('parses a single roll', () => {
    expect(parseRollCommand('!r 2d6+3')).toEqual({ kind: 'roll', times: 1, formula: '2d6+3' });
  });

  test('is case-insensitive and trims', () => {
    expect(parseRollCommand('  !R   1d20 + 5  ')).toEqual({ kind: 'roll', times: 1, formula: '1d20 + 5' });
  });

  test('parses a repeat count', () => {
    expect(parseRollCommand('!r .3 1d20')).toEqual({ kind: 'roll', times: 3, formula: '1d20' });
  });

  test('returns null for non-commands', () => {
    expect(parseRollCommand('hello')).toBeNull();
    expect(parseRollCommand('!roll 1d20')).toBeNull();
    expect(parseRollCommand('r 1d20')).toBeNull();
  });

  test('asks for a formula', () => {
    expect(parseRollCommand('!r')).toEqual({ kind: 'invalid', message: '❌ 請輸入擲骰公式！例如：`!r 1d20+5`' });
  });

  test('repeat count without a formula', () => {
    expect(parseRollCommand('!r .3')).toEqual({
      kind: 'invalid',
      message: '❌ 格式錯誤！正確格式：`!r .次數 公式`（例如：`!r .5 1d20+3`）',
    });
  });

  test('non-integer repeat count', () => {
    expect(parseRollCommand('!r .x 1d20')).toEqual({
      kind: 'invalid',
      message: '❌ 無效的擲骰次數格式！次數必須是整數（例如：`.5`）',
    });
    expect(parseRollCommand('!r .1.5 1d20')).toEqual({
      kind: 'invalid',
      message: '❌ 無效的擲骰次數格式！次數必須是整數（例如：`.5`）',
    });
  });

  test('repeat count below 1', () => {
    expect(parseRollCommand('!r .0 1d20')).toEqual({ kind: 'invalid', message: '❌ 擲骰次數必須至少為 1！' });
    expect(parseRollCommand('!r .-2 1d20')).toEqual({ kind: 'invalid', message: '❌ 擲骰次數必須至少為 1！' });
  });

  test('repeat count above the limit', () => {
    expect(parseRollCommand('!r .20 1d20')).toEqual({ kind: 'roll', times: 20, formula: '1d20' });
    expect(parseRollCommand('!r .21 1d20')).toEqual({ kind: 'invalid', message: '❌ 擲骰次數不能超過 20！' });
    expect(parseRollCommand('!r .6 1d20', '!', 5)).toEqual({ kind: 'invalid', message: '❌ 擲骰次數不能超過 5！' });
  });

  test('honours other prefixes', () => {
    expect(parseRollCommand('/r 1d6', '/')).toEqual({ kind: 'roll', times: 1, formula: '1d6' });
    expect(parseRollCommand('.r 1d6', '.')).toEqual({ kind: 'roll', times: 1, formula: '1d6' });
    expect(parseRollCommand('xr 1d6', '.')).toBeNull();
    expect(parseRollCommand('/r', '/')).toEqual({ kind: 'invalid', message: '❌ 請輸入擲骰公式！例如：`/r 1d20+5`' });
  });
});

describe('runRollCommand', () => {
  test('single roll uses the detailed format', () => {
    expect(runRollCommand({ times: 1, formula: '1d20+5' }, scripted([10]))).toBe(
      '🎲 擲骰結果：1d20+5\n骰子：[10] (總和: 10)\n計算：[10]+5 = 15',
    );
  });

  test('repeats use the compact format', () => {
    expect(runRollCommand({ times: 2, formula: '1d20+5' }, scripted([10, 3]))).toBe(
      '🎲 擲骰結果：1d20+5 (重複 2 次)\n第1次：[10] + 5 = 15\n第2次：[3] + 5 = 8',
    );
  });

  test('CoC checks', () => {
    expect(runRollCommand({ times: 1, formula: 'cc 65' }, scripted([5, 3]))).toBe(
      '🎲 CoC 擲骰：技能值 65\n十位數：3 | 個位數：5\n結果：35 ≤ 65 ✅ 成功',
    );
  });

  test('invalid formulas throw', () => {
    expect(() => runRollCommand({ times: 1, formula: '1d1' }, scripted([]))).toThrow(DiceParseError);
  });
});

describe('splitMessage', () => {
  test('short text stays whole', () => {
    expect(splitMessage('hello')).toEqual(['hello']);
  });

  test('splits on line boundaries', () => {
    const lines = ['a', 'b', 'c', 'd', 'e'].map(ch => ch.repeat(10));
    const text = lines.join('\n');
    expect(splitMessage(text, 30, 25)).toEqual([
      `${lines[0]}\n${lines[1]}`,
      `${lines[2]}\n${lines[3]}`,
      lines[4],
    ]);
  });

  test('cuts lines longer than a chunk', () => {
    expect(splitMessage('x'.repeat(50), 30, 20)).toEqual(['x'.repeat(20), 'x'.repeat(20), 'x'.repeat(10)]);
  });

  test('chunks stay within the size and keep the content', () => {
    const text = Array.from({ length: 300 }, (_, i) => `第${i + 1}次：[${i % 20}] + 5 = ${(i % 20) + 5}`).join('\n');
    const chunks = splitMessage(text);
    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) expect(chunk.length).toBeLessThanOrEqual(1900);
    expect(chunks.join('\n')).toBe(text);
  });
});

describe('executeRollCommand', () => {
  test('dice formulas', () => {
    expect(executeRollCommand({ times: 1, formula: '2+3' }, scripted([]))).toEqual({
      kind: 'dice',
      text: '🎲 擲骰結果：2+3\n計算：2+3 = 5',
    });
  });

  test('CoC checks', () => {
    expect(executeRollCommand({ times: 1, formula: 'cc 65' }, scripted([5, 3]))).toEqual({
      kind: 'coc',
      text: '🎲 CoC 擲骰：技能值 65\n十位數：3 | 個位數：5\n結果：35 ≤ 65 ✅ 成功',
      error: null,
    });
  });

  test('rejected CoC parameters', () => {
    expect(executeRollCommand({ times: 1, formula: 'cc 101' }, scripted([]))).toEqual({
      kind: 'coc',
      text: '❌ 技能值必須在 1-100 之間',
      error: '技能值必須在 1-100 之間',
    });
  });
});
